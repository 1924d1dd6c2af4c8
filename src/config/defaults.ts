/**
 * Default configuration values for lazymc.toml and LAZYMC_* variables.
 *
 * @packageDocumentation
 */

import { parseSocketAddress, type SocketAddress } from './address.js';
import type {
  AdvancedConfig,
  ConfigMetaConfig,
  JoinConfig,
  JoinForwardConfig,
  JoinHoldConfig,
  JoinKickConfig,
  JoinLobbyConfig,
  JoinMethod,
  LockoutConfig,
  MotdConfig,
  PublicConfig,
  RconConfig,
  ServerConfig,
  TimeConfig,
} from './types.js';

/**
 * Default configuration file name, relative to the working directory.
 */
export const CONFIG_FILE = 'lazymc.toml';

/**
 * Config version users should be on. Older declared versions log a warning.
 */
export const CONFIG_VERSION = '0.2.8';

/**
 * Prefix of every environment variable read by lazymc.
 */
export const ENV_PREFIX = 'LAZYMC_';

/**
 * Protocol hints used until the real server version is known.
 */
export const PROTO_DEFAULT_VERSION = '1.20.3';
export const PROTO_DEFAULT_PROTOCOL = 765;

function frozenAddress(address: string): SocketAddress {
  return Object.freeze(parseSocketAddress(address));
}

/** Default public listen address. */
export const DEFAULT_PUBLIC_ADDRESS = '0.0.0.0:25565';
/** Default backend server address. */
export const DEFAULT_SERVER_ADDRESS = '127.0.0.1:25566';
/** Default forward join method target. */
export const DEFAULT_FORWARD_ADDRESS = '127.0.0.1:25565';

export const DEFAULT_PUBLIC: PublicConfig = Object.freeze({
  address: frozenAddress(DEFAULT_PUBLIC_ADDRESS),
  version: PROTO_DEFAULT_VERSION,
  protocol: PROTO_DEFAULT_PROTOCOL,
});

/**
 * Server defaults. `command` has no default and must always be configured.
 */
export const DEFAULT_SERVER: Omit<ServerConfig, 'command'> = Object.freeze({
  directory: '.',
  address: frozenAddress(DEFAULT_SERVER_ADDRESS),
  freeze_process: true,
  wake_on_start: false,
  wake_on_crash: false,
  probe_on_start: false,
  forge: false,
  start_timeout: 300,
  stop_timeout: 150,
  wake_whitelist: true,
  block_banned_ips: true,
  drop_banned_ips: false,
  send_proxy_v2: false,
});

export const DEFAULT_TIME: TimeConfig = Object.freeze({
  sleep_after: 60,
  min_online_time: 60,
});

export const DEFAULT_MOTD: MotdConfig = Object.freeze({
  sleeping: '☠ Server is sleeping\n§2☻ Join to start it up',
  starting: '§2☻ Server is starting...\n§7⌛ Please wait...',
  stopping: '☠ Server going to sleep...\n⌛ Please wait...',
  from_server: false,
});

export const DEFAULT_JOIN_KICK: JoinKickConfig = Object.freeze({
  starting:
    'Server is starting... §c♥§r\n\nThis may take some time.\n\nPlease try to reconnect in a minute.',
  stopping:
    'Server is going to sleep... §7☠§r\n\nPlease try to reconnect in a minute to wake it again.',
});

export const DEFAULT_JOIN_HOLD: JoinHoldConfig = Object.freeze({
  timeout: 25,
});

export const DEFAULT_JOIN_FORWARD: JoinForwardConfig = Object.freeze({
  address: frozenAddress(DEFAULT_FORWARD_ADDRESS),
  send_proxy_v2: false,
});

export const DEFAULT_JOIN_LOBBY: JoinLobbyConfig = Object.freeze({
  timeout: 10 * 60,
  message: '§2Server is starting\n§7⌛ Please wait...',
  ready_sound: 'block.note_block.chime',
});

/**
 * Default join handling: hold the client, then kick it if the hold times out.
 */
export const DEFAULT_JOIN: JoinConfig = Object.freeze({
  methods: Object.freeze<JoinMethod[]>(['hold', 'kick']),
  kick: DEFAULT_JOIN_KICK,
  hold: DEFAULT_JOIN_HOLD,
  forward: DEFAULT_JOIN_FORWARD,
  lobby: DEFAULT_JOIN_LOBBY,
});

export const DEFAULT_LOCKOUT: LockoutConfig = Object.freeze({
  enabled: false,
  message: 'Server is closed §7☠§r\n\nPlease come back another time.',
});

/**
 * RCON defaults. RCON sleeping is enabled by default only on Windows, where
 * freezing the process is not available.
 */
export const DEFAULT_RCON: RconConfig = Object.freeze({
  enabled: process.platform === 'win32',
  port: 25575,
  password: '',
  randomize_password: true,
  send_proxy_v2: false,
});

export const DEFAULT_ADVANCED: AdvancedConfig = Object.freeze({
  rewrite_server_properties: true,
});

export const DEFAULT_CONFIG_META: ConfigMetaConfig = Object.freeze({});
