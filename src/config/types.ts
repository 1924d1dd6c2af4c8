/**
 * Configuration types for lazymc.toml and LAZYMC_* environment variables.
 *
 * Field names follow the TOML keys so the file, the environment variable names
 * and the in-memory tree line up one to one.
 *
 * @packageDocumentation
 */

import type { SocketAddress } from './address.js';

/**
 * Public-facing configuration, shown to clients before the server is awake.
 */
export interface PublicConfig {
  /** Address lazymc listens on. */
  readonly address: SocketAddress;
  /** Protocol version name hint, sent until the real server version is known. */
  readonly version: string;
  /** Protocol version number hint. */
  readonly protocol: number;
}

/**
 * Backend server process configuration.
 */
export interface ServerConfig {
  /**
   * Server working directory.
   *
   * For file-sourced configs this is already resolved against the config file's
   * directory, see {@link resolveServerDirectory}.
   */
  readonly directory: string;
  /** Command used to start the server. */
  readonly command: string;
  /** Address the backend server listens on. */
  readonly address: SocketAddress;
  /** Freeze the process instead of stopping it when idle (Unix only). */
  readonly freeze_process: boolean;
  /** Immediately wake the server when lazymc starts. */
  readonly wake_on_start: boolean;
  /** Immediately wake the server after a crash. */
  readonly wake_on_crash: boolean;
  /** Probe server details on start, which wakes the server. */
  readonly probe_on_start: boolean;
  /** Whether the server runs Forge. */
  readonly forge: boolean;
  /** Seconds to wait for startup before force killing. */
  readonly start_timeout: number;
  /** Seconds to wait for shutdown before force killing. */
  readonly stop_timeout: number;
  /** Only whitelisted players may wake the server, if the server uses a whitelist. */
  readonly wake_whitelist: boolean;
  /** Block IPs listed in banned-ips.json. */
  readonly block_banned_ips: boolean;
  /** Drop connections from banned IPs without a message. */
  readonly drop_banned_ips: boolean;
  /** Send a PROXY protocol v2 header to the backend. */
  readonly send_proxy_v2: boolean;
}

/**
 * Idle timing configuration, in seconds.
 */
export interface TimeConfig {
  readonly sleep_after: number;
  readonly min_online_time: number;
}

/**
 * MOTD texts shown in the server browser.
 */
export interface MotdConfig {
  readonly sleeping: string;
  readonly starting: string;
  readonly stopping: string;
  /** Use the server's own MOTD once it is known. */
  readonly from_server: boolean;
}

/**
 * Ways to occupy a client that joins while the server is not ready.
 */
export type JoinMethod = 'kick' | 'hold' | 'forward' | 'lobby';

/**
 * All join methods, in declaration order.
 */
export const JOIN_METHODS: readonly JoinMethod[] = ['kick', 'hold', 'forward', 'lobby'];

/**
 * Kick join method: disconnect with a message.
 */
export interface JoinKickConfig {
  readonly starting: string;
  readonly stopping: string;
}

/**
 * Hold join method: keep the connection open while the server starts.
 */
export interface JoinHoldConfig {
  /** Seconds to hold a client. Keep below the client timeout of 30 seconds. */
  readonly timeout: number;
}

/**
 * Forward join method: proxy the client to another address.
 */
export interface JoinForwardConfig {
  readonly address: SocketAddress;
  readonly send_proxy_v2: boolean;
}

/**
 * Lobby join method: keep the client in a temporary empty world.
 */
export interface JoinLobbyConfig {
  /** Maximum seconds in the lobby. */
  readonly timeout: number;
  /** Banner message shown in the lobby. */
  readonly message: string;
  /** Sound played when the server is ready, if any. */
  readonly ready_sound?: string | undefined;
}

/**
 * Join handling configuration.
 */
export interface JoinConfig {
  /** Methods to try, in order. An empty list disconnects without a message. */
  readonly methods: readonly JoinMethod[];
  readonly kick: JoinKickConfig;
  readonly hold: JoinHoldConfig;
  readonly forward: JoinForwardConfig;
  readonly lobby: JoinLobbyConfig;
}

/**
 * Lockout configuration. When enabled every connection is kicked.
 */
export interface LockoutConfig {
  readonly enabled: boolean;
  readonly message: string;
}

/**
 * RCON configuration, used to put the server to sleep.
 */
export interface RconConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly password: string;
  /** Generate a new password on every server start. */
  readonly randomize_password: boolean;
  readonly send_proxy_v2: boolean;
}

/**
 * Advanced configuration.
 */
export interface AdvancedConfig {
  /** Rewrite server.properties to match this configuration. */
  readonly rewrite_server_properties: boolean;
}

/**
 * Configuration format metadata.
 */
export interface ConfigMetaConfig {
  /** lazymc version this configuration was written for. */
  readonly version?: string | undefined;
}

/**
 * Complete configuration tree.
 */
export interface Config {
  /**
   * Canonical path of the file this config was loaded from.
   * Absent when the config was built from environment variables.
   */
  readonly path?: string | undefined;
  readonly public: PublicConfig;
  readonly server: ServerConfig;
  readonly time: TimeConfig;
  readonly motd: MotdConfig;
  readonly join: JoinConfig;
  readonly lockout: LockoutConfig;
  readonly rcon: RconConfig;
  readonly advanced: AdvancedConfig;
  readonly config: ConfigMetaConfig;
}
