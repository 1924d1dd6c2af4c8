/**
 * Configuration module for lazymc.
 *
 * Builds one immutable configuration tree from either lazymc.toml or
 * LAZYMC_* environment variables, never both.
 *
 * Source selection: config file if it exists, else environment > defaults
 *
 * @packageDocumentation
 */

export { loadConfig, loadConfigFromEnv, loadConfigFromFile } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { ConfigLoadError } from './errors.js';
export type { ConfigLoadErrorKind } from './errors.js';
export { ConfigParseError, parseConfig } from './parser.js';
export type { ParseConfigOptions } from './parser.js';
export type {
  AdvancedConfig,
  Config,
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
export { JOIN_METHODS } from './types.js';
export {
  CONFIG_FILE,
  CONFIG_VERSION,
  DEFAULT_ADVANCED,
  DEFAULT_JOIN,
  DEFAULT_LOCKOUT,
  DEFAULT_MOTD,
  DEFAULT_PUBLIC,
  DEFAULT_RCON,
  DEFAULT_SERVER,
  DEFAULT_TIME,
  ENV_PREFIX,
} from './defaults.js';
export {
  EnvReader,
  SERVER_COMMAND_VAR,
  getEnvVarDocumentation,
  readEnvConfig,
} from './env.js';
export type { EnvRecord, EnvVarDoc, ReadEnvConfigOptions } from './env.js';
export {
  AddressResolutionError,
  formatSocketAddress,
  parseSocketAddress,
  resolveSocketAddress,
  systemHostResolver,
} from './address.js';
export type { HostResolver, SocketAddress } from './address.js';
export { decodeEscapes } from './escape.js';
export { checkConfigVersion, compareVersions, versionWarning } from './version.js';
export type { VersionCheckResult } from './version.js';
export { resolveServerDirectory } from './derive.js';
