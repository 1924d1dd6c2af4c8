/**
 * Configuration from LAZYMC_* environment variables.
 *
 * Used when no config file exists. Every variable except
 * `LAZYMC_SERVER_COMMAND` is optional; a value that is missing or cannot be
 * coerced to its type silently falls back to that field's default.
 *
 * Naming: LAZYMC_<SECTION>_<FIELD>, e.g. LAZYMC_JOIN_HOLD_TIMEOUT maps to
 * `join.hold.timeout`.
 *
 * @packageDocumentation
 */

import {
  AddressResolutionError,
  parseSocketAddress,
  resolveSocketAddress,
  systemHostResolver,
  type HostResolver,
  type SocketAddress,
} from './address.js';
import {
  DEFAULT_ADVANCED,
  DEFAULT_FORWARD_ADDRESS,
  DEFAULT_JOIN,
  DEFAULT_JOIN_FORWARD,
  DEFAULT_JOIN_HOLD,
  DEFAULT_JOIN_KICK,
  DEFAULT_JOIN_LOBBY,
  DEFAULT_LOCKOUT,
  DEFAULT_MOTD,
  DEFAULT_PUBLIC,
  DEFAULT_PUBLIC_ADDRESS,
  DEFAULT_RCON,
  DEFAULT_SERVER,
  DEFAULT_SERVER_ADDRESS,
  DEFAULT_TIME,
  ENV_PREFIX,
} from './defaults.js';
import { ConfigLoadError } from './errors.js';
import { decodeEscapes } from './escape.js';
import {
  JOIN_METHODS,
  type AdvancedConfig,
  type Config,
  type ConfigMetaConfig,
  type JoinConfig,
  type JoinMethod,
  type LockoutConfig,
  type MotdConfig,
  type PublicConfig,
  type RconConfig,
  type ServerConfig,
  type TimeConfig,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Name of the only required environment variable.
 */
export const SERVER_COMMAND_VAR = `${ENV_PREFIX}SERVER_COMMAND`;

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];
const UNSIGNED_PATTERN = /^\+?\d+$/;

/**
 * Coerces a string to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive. Surrounding whitespace makes the value unrecognized.
 *
 * @returns The boolean, or `undefined` if the string is not recognized.
 */
export function coerceToBoolean(value: string): boolean | undefined {
  const normalized = value.toLowerCase();
  if (TRUTHY.includes(normalized)) {
    return true;
  }
  if (FALSY.includes(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Coerces a string to an unsigned integer no larger than `max`.
 *
 * @returns The integer, or `undefined` if the string is not a decimal integer in range.
 */
export function coerceToUnsigned(value: string, max: number): number | undefined {
  if (!UNSIGNED_PATTERN.test(value)) {
    return undefined;
  }
  const num = Number(value);
  return num <= max ? num : undefined;
}

/**
 * Splits a comma separated list, trimming each element.
 */
export function splitList(value: string): string[] {
  return value.split(',').map((item) => item.trim());
}

/**
 * Parses a join method name, case-insensitively.
 *
 * @returns The method, or `undefined` if the name is unknown.
 */
export function parseJoinMethod(name: string): JoinMethod | undefined {
  const lower = name.toLowerCase();
  return JOIN_METHODS.find((method) => method === lower);
}

/**
 * Typed, never-failing accessors over an environment record.
 *
 * Every accessor takes the variable name without the LAZYMC_ prefix and a
 * default, and returns the default when the variable is unset or malformed.
 */
export class EnvReader {
  private readonly env: EnvRecord;
  private readonly resolver: HostResolver;
  private readonly read: string[] = [];

  /**
   * Creates a new EnvReader.
   *
   * @param env - Environment to read from.
   * @param resolver - Resolver for hostnames in address variables.
   */
  constructor(env: EnvRecord, resolver: HostResolver) {
    this.env = env;
    this.resolver = resolver;
  }

  /**
   * Full names of all variables looked up so far, in lookup order.
   */
  get names(): readonly string[] {
    return this.read;
  }

  /**
   * Gets the raw value of a variable.
   *
   * @param key - Variable name without prefix.
   */
  raw(key: string): string | undefined {
    const name = `${ENV_PREFIX}${key}`;
    this.read.push(name);
    return this.env[name];
  }

  /**
   * Reads a string, decoding escape sequences. An empty string is a value.
   */
  string(key: string, fallback: string): string {
    const value = this.raw(key);
    return value === undefined ? fallback : decodeEscapes(value);
  }

  /**
   * Reads an optional string. Unset uses the fallback; an empty value clears it.
   */
  optionalString(key: string, fallback: string | undefined): string | undefined {
    const value = this.raw(key);
    if (value === undefined) {
      return fallback;
    }
    return value === '' ? undefined : decodeEscapes(value);
  }

  bool(key: string, fallback: boolean): boolean {
    const value = this.raw(key);
    return (value === undefined ? undefined : coerceToBoolean(value)) ?? fallback;
  }

  u16(key: string, fallback: number): number {
    const value = this.raw(key);
    return (value === undefined ? undefined : coerceToUnsigned(value, 0xffff)) ?? fallback;
  }

  u32(key: string, fallback: number): number {
    const value = this.raw(key);
    return (value === undefined ? undefined : coerceToUnsigned(value, 0xffffffff)) ?? fallback;
  }

  /**
   * Reads a comma separated list of strings.
   */
  list(key: string, fallback: readonly string[]): string[] {
    const value = this.raw(key);
    return value === undefined ? [...fallback] : splitList(decodeEscapes(value));
  }

  /**
   * Reads join methods. Unknown names are dropped.
   */
  methods(key: string, fallback: readonly JoinMethod[]): JoinMethod[] {
    const names = this.list(key, fallback);
    const methods: JoinMethod[] = [];
    for (const name of names) {
      const method = parseJoinMethod(name);
      if (method !== undefined) {
        methods.push(method);
      }
    }
    return methods;
  }

  /**
   * Reads and resolves a socket address.
   *
   * @param key - Variable name without prefix.
   * @param fallback - Default address text; must be a literal IP and port.
   */
  async socketAddress(key: string, fallback: string): Promise<SocketAddress> {
    const value = this.raw(key);
    if (value !== undefined) {
      try {
        return await resolveSocketAddress(value, this.resolver);
      } catch (error) {
        if (!(error instanceof AddressResolutionError)) {
          throw error;
        }
      }
    }
    return parseSocketAddress(fallback);
  }
}

async function publicFromEnv(reader: EnvReader): Promise<PublicConfig> {
  return {
    address: await reader.socketAddress('PUBLIC_ADDRESS', DEFAULT_PUBLIC_ADDRESS),
    version: reader.string('PUBLIC_VERSION', DEFAULT_PUBLIC.version),
    protocol: reader.u32('PUBLIC_PROTOCOL', DEFAULT_PUBLIC.protocol),
  };
}

async function serverFromEnv(reader: EnvReader, command: string): Promise<ServerConfig> {
  const d = DEFAULT_SERVER;
  return {
    directory: reader.string('SERVER_DIRECTORY', d.directory),
    command,
    address: await reader.socketAddress('SERVER_ADDRESS', DEFAULT_SERVER_ADDRESS),
    freeze_process: reader.bool('SERVER_FREEZE_PROCESS', d.freeze_process),
    wake_on_start: reader.bool('SERVER_WAKE_ON_START', d.wake_on_start),
    wake_on_crash: reader.bool('SERVER_WAKE_ON_CRASH', d.wake_on_crash),
    probe_on_start: reader.bool('SERVER_PROBE_ON_START', d.probe_on_start),
    forge: reader.bool('SERVER_FORGE', d.forge),
    start_timeout: reader.u32('SERVER_START_TIMEOUT', d.start_timeout),
    stop_timeout: reader.u32('SERVER_STOP_TIMEOUT', d.stop_timeout),
    wake_whitelist: reader.bool('SERVER_WAKE_WHITELIST', d.wake_whitelist),
    block_banned_ips: reader.bool('SERVER_BLOCK_BANNED_IPS', d.block_banned_ips),
    drop_banned_ips: reader.bool('SERVER_DROP_BANNED_IPS', d.drop_banned_ips),
    send_proxy_v2: reader.bool('SERVER_SEND_PROXY_V2', d.send_proxy_v2),
  };
}

function timeFromEnv(reader: EnvReader): TimeConfig {
  return {
    sleep_after: reader.u32('TIME_SLEEP_AFTER', DEFAULT_TIME.sleep_after),
    min_online_time: reader.u32('TIME_MIN_ONLINE_TIME', DEFAULT_TIME.min_online_time),
  };
}

function motdFromEnv(reader: EnvReader): MotdConfig {
  return {
    sleeping: reader.string('MOTD_SLEEPING', DEFAULT_MOTD.sleeping),
    starting: reader.string('MOTD_STARTING', DEFAULT_MOTD.starting),
    stopping: reader.string('MOTD_STOPPING', DEFAULT_MOTD.stopping),
    from_server: reader.bool('MOTD_FROM_SERVER', DEFAULT_MOTD.from_server),
  };
}

async function joinFromEnv(reader: EnvReader): Promise<JoinConfig> {
  return {
    methods: reader.methods('JOIN_METHODS', DEFAULT_JOIN.methods),
    kick: {
      starting: reader.string('JOIN_KICK_STARTING', DEFAULT_JOIN_KICK.starting),
      stopping: reader.string('JOIN_KICK_STOPPING', DEFAULT_JOIN_KICK.stopping),
    },
    hold: {
      timeout: reader.u32('JOIN_HOLD_TIMEOUT', DEFAULT_JOIN_HOLD.timeout),
    },
    forward: {
      address: await reader.socketAddress('JOIN_FORWARD_ADDRESS', DEFAULT_FORWARD_ADDRESS),
      send_proxy_v2: reader.bool('JOIN_FORWARD_SEND_PROXY_V2', DEFAULT_JOIN_FORWARD.send_proxy_v2),
    },
    lobby: {
      timeout: reader.u32('JOIN_LOBBY_TIMEOUT', DEFAULT_JOIN_LOBBY.timeout),
      message: reader.string('JOIN_LOBBY_MESSAGE', DEFAULT_JOIN_LOBBY.message),
      ready_sound: reader.optionalString('JOIN_LOBBY_READY_SOUND', DEFAULT_JOIN_LOBBY.ready_sound),
    },
  };
}

function lockoutFromEnv(reader: EnvReader): LockoutConfig {
  return {
    enabled: reader.bool('LOCKOUT_ENABLED', DEFAULT_LOCKOUT.enabled),
    message: reader.string('LOCKOUT_MESSAGE', DEFAULT_LOCKOUT.message),
  };
}

function rconFromEnv(reader: EnvReader): RconConfig {
  return {
    enabled: reader.bool('RCON_ENABLED', DEFAULT_RCON.enabled),
    port: reader.u16('RCON_PORT', DEFAULT_RCON.port),
    password: reader.string('RCON_PASSWORD', DEFAULT_RCON.password),
    randomize_password: reader.bool('RCON_RANDOMIZE_PASSWORD', DEFAULT_RCON.randomize_password),
    send_proxy_v2: reader.bool('RCON_SEND_PROXY_V2', DEFAULT_RCON.send_proxy_v2),
  };
}

function advancedFromEnv(reader: EnvReader): AdvancedConfig {
  return {
    rewrite_server_properties: reader.bool(
      'ADVANCED_REWRITE_SERVER_PROPERTIES',
      DEFAULT_ADVANCED.rewrite_server_properties
    ),
  };
}

function configMetaFromEnv(reader: EnvReader): ConfigMetaConfig {
  const version = reader.optionalString('CONFIG_VERSION', undefined);
  return version === undefined ? {} : { version };
}

/**
 * Options for {@link readEnvConfig}.
 */
export interface ReadEnvConfigOptions {
  /** Resolver for hostnames in address variables. Defaults to the system resolver. */
  resolver?: HostResolver;
  /** Receives the reader after the config is built, e.g. to inspect which variables were read. */
  onRead?: (reader: EnvReader) => void;
}

/**
 * Builds a complete configuration from environment variables.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Read options.
 * @returns Configuration with no `path`.
 * @throws ConfigLoadError if `LAZYMC_SERVER_COMMAND` is unset or empty.
 *
 * @example
 * ```typescript
 * const config = await readEnvConfig({
 *   LAZYMC_SERVER_COMMAND: 'java -jar server.jar',
 *   LAZYMC_TIME_SLEEP_AFTER: '300',
 * });
 * console.log(config.time.sleep_after); // 300
 * ```
 */
export async function readEnvConfig(
  env: EnvRecord = getDefaultEnv(),
  options: ReadEnvConfigOptions = {}
): Promise<Config> {
  const reader = new EnvReader(env, options.resolver ?? systemHostResolver);

  const command = reader.raw('SERVER_COMMAND');
  if (command === undefined || command.trim() === '') {
    throw new ConfigLoadError(
      'missing_env',
      `Missing required environment variable: ${SERVER_COMMAND_VAR}`,
      { envVar: SERVER_COMMAND_VAR }
    );
  }

  const config: Config = {
    public: await publicFromEnv(reader),
    server: await serverFromEnv(reader, decodeEscapes(command)),
    time: timeFromEnv(reader),
    motd: motdFromEnv(reader),
    join: await joinFromEnv(reader),
    lockout: lockoutFromEnv(reader),
    rcon: rconFromEnv(reader),
    advanced: advancedFromEnv(reader),
    config: configMetaFromEnv(reader),
  };

  options.onRead?.(reader);
  return config;
}

/**
 * Documentation entry for one environment variable.
 */
export interface EnvVarDoc {
  description: string;
  type: 'string' | 'boolean' | 'u16' | 'u32' | 'address' | 'list';
  /** Default value as text, or `undefined` when there is none. */
  default: string | undefined;
}

function doc(
  description: string,
  type: EnvVarDoc['type'],
  defaultValue: string | number | boolean | readonly string[] | undefined
): EnvVarDoc {
  let text: string | undefined;
  if (Array.isArray(defaultValue)) {
    text = defaultValue.join(',');
  } else if (defaultValue !== undefined) {
    text = String(defaultValue);
  }
  return { description, type, default: text };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, EnvVarDoc> {
  const p = ENV_PREFIX;
  const s = DEFAULT_SERVER;
  return {
    [`${p}PUBLIC_ADDRESS`]: doc('Public address to listen on', 'address', DEFAULT_PUBLIC_ADDRESS),
    [`${p}PUBLIC_VERSION`]: doc('Protocol version name hint', 'string', DEFAULT_PUBLIC.version),
    [`${p}PUBLIC_PROTOCOL`]: doc('Protocol version number hint', 'u32', DEFAULT_PUBLIC.protocol),

    [`${p}SERVER_COMMAND`]: doc('Command to start the server (required)', 'string', undefined),
    [`${p}SERVER_DIRECTORY`]: doc('Server working directory', 'string', s.directory),
    [`${p}SERVER_ADDRESS`]: doc('Address the server listens on', 'address', DEFAULT_SERVER_ADDRESS),
    [`${p}SERVER_FREEZE_PROCESS`]: doc('Freeze instead of stopping the server', 'boolean', s.freeze_process),
    [`${p}SERVER_WAKE_ON_START`]: doc('Wake server when lazymc starts', 'boolean', s.wake_on_start),
    [`${p}SERVER_WAKE_ON_CRASH`]: doc('Wake server after a crash', 'boolean', s.wake_on_crash),
    [`${p}SERVER_PROBE_ON_START`]: doc('Probe server details on start', 'boolean', s.probe_on_start),
    [`${p}SERVER_FORGE`]: doc('Server runs Forge', 'boolean', s.forge),
    [`${p}SERVER_START_TIMEOUT`]: doc('Start timeout in seconds', 'u32', s.start_timeout),
    [`${p}SERVER_STOP_TIMEOUT`]: doc('Stop timeout in seconds', 'u32', s.stop_timeout),
    [`${p}SERVER_WAKE_WHITELIST`]: doc('Only whitelisted players wake the server', 'boolean', s.wake_whitelist),
    [`${p}SERVER_BLOCK_BANNED_IPS`]: doc('Block banned IPs', 'boolean', s.block_banned_ips),
    [`${p}SERVER_DROP_BANNED_IPS`]: doc('Drop connections from banned IPs', 'boolean', s.drop_banned_ips),
    [`${p}SERVER_SEND_PROXY_V2`]: doc('Send PROXY v2 header to the server', 'boolean', s.send_proxy_v2),

    [`${p}TIME_SLEEP_AFTER`]: doc('Idle seconds before sleeping', 'u32', DEFAULT_TIME.sleep_after),
    [`${p}TIME_MIN_ONLINE_TIME`]: doc('Minimum online seconds after waking', 'u32', DEFAULT_TIME.min_online_time),

    [`${p}MOTD_SLEEPING`]: doc('MOTD while sleeping', 'string', DEFAULT_MOTD.sleeping),
    [`${p}MOTD_STARTING`]: doc('MOTD while starting', 'string', DEFAULT_MOTD.starting),
    [`${p}MOTD_STOPPING`]: doc('MOTD while stopping', 'string', DEFAULT_MOTD.stopping),
    [`${p}MOTD_FROM_SERVER`]: doc('Use the server MOTD once known', 'boolean', DEFAULT_MOTD.from_server),

    [`${p}JOIN_METHODS`]: doc('Join methods in order (kick, hold, forward, lobby)', 'list', DEFAULT_JOIN.methods),
    [`${p}JOIN_KICK_STARTING`]: doc('Kick message while starting', 'string', DEFAULT_JOIN_KICK.starting),
    [`${p}JOIN_KICK_STOPPING`]: doc('Kick message while stopping', 'string', DEFAULT_JOIN_KICK.stopping),
    [`${p}JOIN_HOLD_TIMEOUT`]: doc('Seconds to hold a joining client', 'u32', DEFAULT_JOIN_HOLD.timeout),
    [`${p}JOIN_FORWARD_ADDRESS`]: doc('Address to forward clients to', 'address', DEFAULT_FORWARD_ADDRESS),
    [`${p}JOIN_FORWARD_SEND_PROXY_V2`]: doc(
      'Send PROXY v2 header to the forward target',
      'boolean',
      DEFAULT_JOIN_FORWARD.send_proxy_v2
    ),
    [`${p}JOIN_LOBBY_TIMEOUT`]: doc('Maximum seconds in the lobby', 'u32', DEFAULT_JOIN_LOBBY.timeout),
    [`${p}JOIN_LOBBY_MESSAGE`]: doc('Lobby banner message', 'string', DEFAULT_JOIN_LOBBY.message),
    [`${p}JOIN_LOBBY_READY_SOUND`]: doc(
      'Sound when the server is ready, empty for none',
      'string',
      DEFAULT_JOIN_LOBBY.ready_sound
    ),

    [`${p}LOCKOUT_ENABLED`]: doc('Kick every connecting player', 'boolean', DEFAULT_LOCKOUT.enabled),
    [`${p}LOCKOUT_MESSAGE`]: doc('Lockout kick message', 'string', DEFAULT_LOCKOUT.message),

    [`${p}RCON_ENABLED`]: doc('Sleep the server through RCON', 'boolean', DEFAULT_RCON.enabled),
    [`${p}RCON_PORT`]: doc('Server RCON port', 'u16', DEFAULT_RCON.port),
    [`${p}RCON_PASSWORD`]: doc('Server RCON password', 'string', DEFAULT_RCON.password),
    [`${p}RCON_RANDOMIZE_PASSWORD`]: doc(
      'Randomize the RCON password on each start',
      'boolean',
      DEFAULT_RCON.randomize_password
    ),
    [`${p}RCON_SEND_PROXY_V2`]: doc('Send PROXY v2 header to RCON', 'boolean', DEFAULT_RCON.send_proxy_v2),

    [`${p}ADVANCED_REWRITE_SERVER_PROPERTIES`]: doc(
      'Rewrite server.properties',
      'boolean',
      DEFAULT_ADVANCED.rewrite_server_properties
    ),

    [`${p}CONFIG_VERSION`]: doc('lazymc version the configuration is for', 'string', undefined),
  };
}
