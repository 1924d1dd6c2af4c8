import { describe, expect, it } from 'vitest';
import { ConfigParseError, parseConfig } from './parser.js';
import type { HostResolver } from './address.js';
import {
  DEFAULT_ADVANCED,
  DEFAULT_JOIN,
  DEFAULT_LOCKOUT,
  DEFAULT_MOTD,
  DEFAULT_PUBLIC,
  DEFAULT_RCON,
  DEFAULT_SERVER,
  DEFAULT_TIME,
} from './defaults.js';

const noDns: HostResolver = {
  resolve: (hostname) => Promise.reject(new Error(`unexpected lookup of ${hostname}`)),
};

function parse(toml: string, resolver: HostResolver = noDns) {
  return parseConfig(toml, { resolver });
}

const MINIMAL = `
[server]
command = "java -Xmx1G -jar server.jar --nogui"
`;

describe('TOML Configuration Parser', () => {
  describe('parseConfig', () => {
    it('should apply defaults to a minimal config', async () => {
      const config = await parse(MINIMAL);

      expect(config.path).toBeUndefined();
      expect(config.server).toEqual({ ...DEFAULT_SERVER, command: 'java -Xmx1G -jar server.jar --nogui' });
      expect(config.public).toEqual(DEFAULT_PUBLIC);
      expect(config.time).toEqual(DEFAULT_TIME);
      expect(config.motd).toEqual(DEFAULT_MOTD);
      expect(config.join).toEqual(DEFAULT_JOIN);
      expect(config.lockout).toEqual(DEFAULT_LOCKOUT);
      expect(config.rcon).toEqual(DEFAULT_RCON);
      expect(config.advanced).toEqual(DEFAULT_ADVANCED);
      expect(config.config).toEqual({});
    });

    it('should parse every section', async () => {
      const config = await parse(`
[public]
address = "0.0.0.0:25000"
version = "1.19.4"
protocol = 762

[server]
directory = "./server"
command = "./start.sh"
address = "127.0.0.1:25001"
freeze_process = false
wake_on_start = true
wake_on_crash = true
probe_on_start = true
forge = true
start_timeout = 600
stop_timeout = 30
wake_whitelist = false
block_banned_ips = false
drop_banned_ips = true
send_proxy_v2 = true

[time]
sleep_after = 300
min_online_time = 120

[motd]
sleeping = "zzz"
starting = "waking"
stopping = "yawning"
from_server = true

[join]
methods = ["lobby", "forward", "kick"]

[join.kick]
starting = "kick starting"
stopping = "kick stopping"

[join.hold]
timeout = 10

[join.forward]
address = "[::1]:25002"
send_proxy_v2 = true

[join.lobby]
timeout = 120
message = "Welcome to the lobby"
ready_sound = "entity.player.levelup"

[lockout]
enabled = true
message = "Maintenance"

[rcon]
enabled = true
port = 25580
password = "test-secret"
randomize_password = false
send_proxy_v2 = true

[advanced]
rewrite_server_properties = false

[config]
version = "0.2.8"
`);

      expect(config.public).toEqual({
        address: { host: '0.0.0.0', port: 25000, family: 4 },
        version: '1.19.4',
        protocol: 762,
      });
      expect(config.server).toEqual({
        directory: './server',
        command: './start.sh',
        address: { host: '127.0.0.1', port: 25001, family: 4 },
        freeze_process: false,
        wake_on_start: true,
        wake_on_crash: true,
        probe_on_start: true,
        forge: true,
        start_timeout: 600,
        stop_timeout: 30,
        wake_whitelist: false,
        block_banned_ips: false,
        drop_banned_ips: true,
        send_proxy_v2: true,
      });
      expect(config.time).toEqual({ sleep_after: 300, min_online_time: 120 });
      expect(config.motd).toEqual({
        sleeping: 'zzz',
        starting: 'waking',
        stopping: 'yawning',
        from_server: true,
      });
      expect(config.join).toEqual({
        methods: ['lobby', 'forward', 'kick'],
        kick: { starting: 'kick starting', stopping: 'kick stopping' },
        hold: { timeout: 10 },
        forward: { address: { host: '::1', port: 25002, family: 6 }, send_proxy_v2: true },
        lobby: { timeout: 120, message: 'Welcome to the lobby', ready_sound: 'entity.player.levelup' },
      });
      expect(config.lockout).toEqual({ enabled: true, message: 'Maintenance' });
      expect(config.rcon).toEqual({
        enabled: true,
        port: 25580,
        password: 'test-secret',
        randomize_password: false,
        send_proxy_v2: true,
      });
      expect(config.advanced).toEqual({ rewrite_server_properties: false });
      expect(config.config).toEqual({ version: '0.2.8' });
    });

    it('should fill missing fields of a partial section', async () => {
      const config = await parse(`${MINIMAL}
[time]
sleep_after = 5
`);

      expect(config.time).toEqual({ sleep_after: 5, min_online_time: 60 });
    });

    it('should accept minimum_online_time as an alias', async () => {
      const config = await parse(`${MINIMAL}
[time]
minimum_online_time = 90
`);

      expect(config.time.min_online_time).toBe(90);
    });

    it('should prefer min_online_time over the alias', async () => {
      const config = await parse(`${MINIMAL}
[time]
min_online_time = 30
minimum_online_time = 90
`);

      expect(config.time.min_online_time).toBe(30);
    });

    it('should allow an empty join method list', async () => {
      const config = await parse(`${MINIMAL}
[join]
methods = []
`);

      expect(config.join.methods).toEqual([]);
    });

    it('should keep the server directory as declared', async () => {
      const config = await parse(`
[server]
command = "run.sh"
directory = "../mc"
`);

      expect(config.server.directory).toBe('../mc');
    });

    it('should not decode escapes in literal strings', async () => {
      const config = await parse(`${MINIMAL}
[motd]
sleeping = 'raw\\ntext'
starting = "real\\nnewline"
`);

      expect(config.motd.sleeping).toBe('raw\\ntext');
      expect(config.motd.starting).toBe('real\nnewline');
    });

    it('should ignore unknown sections and keys', async () => {
      const config = await parse(`
[server]
command = "run.sh"
colour = "blue"

[plugins]
enabled = true
`);

      expect(config.server.command).toBe('run.sh');
    });

    it('should resolve hostnames in addresses', async () => {
      const resolver: HostResolver = {
        resolve: (hostname) => Promise.resolve(hostname === 'localhost' ? ['127.0.0.1'] : []),
      };

      const config = await parse(
        `
[server]
command = "run.sh"
address = "localhost:25566"
`,
        resolver
      );

      expect(config.server.address).toEqual({ host: '127.0.0.1', port: 25566, family: 4 });
    });
  });

  describe('errors', () => {
    async function parseError(toml: string): Promise<ConfigParseError> {
      try {
        await parse(toml);
      } catch (error) {
        if (error instanceof ConfigParseError) {
          return error;
        }
        throw error;
      }
      throw new Error('expected parseConfig to fail');
    }

    it('should require the server section', async () => {
      const error = await parseError(`
[time]
sleep_after = 10
`);
      expect(error.message).toBe("Missing required section '[server]'");
    });

    it('should require the server command', async () => {
      const error = await parseError(`
[server]
directory = "."
`);
      expect(error.message).toBe("Missing required field 'server.command'");
    });

    it('should report invalid TOML syntax', async () => {
      const error = await parseError('[server\ncommand = "x"');
      expect(error.message).toMatch(/^Invalid TOML syntax: /);
      expect(error.cause).toBeInstanceOf(Error);
    });

    it('should reject a string where a number is expected', async () => {
      const error = await parseError(`${MINIMAL}
[time]
sleep_after = "60"
`);
      expect(error.message).toBe("Invalid type for 'time.sleep_after': expected integer, got string");
    });

    it('should reject a float where an integer is expected', async () => {
      const error = await parseError(`${MINIMAL}
[join.hold]
timeout = 1.5
`);
      expect(error.message).toBe("Invalid type for 'join.hold.timeout': expected integer, got float");
    });

    it('should reject a float with an integral value', async () => {
      const error = await parseError(`${MINIMAL}
[time]
sleep_after = 60.0
`);
      expect(error.message).toBe("Invalid type for 'time.sleep_after': expected integer, got float");
    });

    it('should reject a float in exponent form', async () => {
      const error = await parseError(`${MINIMAL}
[rcon]
port = 25e3
`);
      expect(error.message).toBe("Invalid type for 'rcon.port': expected integer, got float");
    });

    it('should reject a float where a string is expected', async () => {
      const error = await parseError(`
[server]
command = 1.0
`);
      expect(error.message).toBe("Invalid type for 'server.command': expected string, got float");
    });

    it('should keep float-looking text inside strings and comments', async () => {
      const config = await parse(`# sleep_after = 60.0
[server]
command = "java -Xmx1.5G -jar server.jar" # 2.0
[motd]
sleeping = '''
v1.0 asleep'''
[time]
sleep_after = 1_200
`);
      expect(config.server.command).toBe('java -Xmx1.5G -jar server.jar');
      expect(config.motd.sleeping).toBe('v1.0 asleep');
      expect(config.time.sleep_after).toBe(1200);
    });

    it('should reject negative integers', async () => {
      const error = await parseError(`${MINIMAL}
[time]
sleep_after = -1
`);
      expect(error.message).toBe(
        "Invalid value for 'time.sleep_after': must be between 0 and 4294967295, got -1"
      );
    });

    it('should reject a port out of u16 range', async () => {
      const error = await parseError(`${MINIMAL}
[rcon]
port = 70000
`);
      expect(error.message).toBe("Invalid value for 'rcon.port': must be between 0 and 65535, got 70000");
    });

    it('should reject a number where a boolean is expected', async () => {
      const error = await parseError(`
[server]
command = "run.sh"
forge = 1
`);
      expect(error.message).toBe("Invalid type for 'server.forge': expected boolean, got number");
    });

    it('should reject a non-string command', async () => {
      const error = await parseError(`
[server]
command = ["java", "-jar"]
`);
      expect(error.message).toBe("Invalid type for 'server.command': expected string, got array");
    });

    it('should reject a section that is not a table', async () => {
      const error = await parseError(`public = 5
${MINIMAL}`);
      expect(error.message).toBe("Invalid type for 'public': expected table, got number");
    });

    it('should reject unknown join methods', async () => {
      const error = await parseError(`${MINIMAL}
[join]
methods = ["hold", "teleport"]
`);
      expect(error.message).toBe(
        "Invalid value for 'join.methods[1]': expected one of 'kick', 'hold', 'forward', 'lobby', got 'teleport'"
      );
    });

    it('should reject join methods in the wrong case', async () => {
      const error = await parseError(`${MINIMAL}
[join]
methods = ["Hold"]
`);
      expect(error.message).toMatch(/^Invalid value for 'join.methods\[0\]'/);
    });

    it('should reject malformed addresses', async () => {
      const error = await parseError(`
[server]
command = "run.sh"
address = "127.0.0.1"
`);
      expect(error.message).toBe(
        "Invalid address for 'server.address': Invalid address '127.0.0.1': missing port"
      );
    });

    it('should reject unresolvable hostnames', async () => {
      const error = await parseError(`${MINIMAL}
[join.forward]
address = "nowhere.test:25565"
`);
      expect(error.message).toBe(
        "Invalid address for 'join.forward.address': Failed to resolve host 'nowhere.test' in 'nowhere.test:25565': unexpected lookup of nowhere.test"
      );
    });
  });
});
