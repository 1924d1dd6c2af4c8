/**
 * TOML configuration parser for lazymc.toml.
 *
 * Fields are type-checked strictly: a value of the wrong type, an unknown join
 * method or an unresolvable address is a parse error. Missing fields take their
 * defaults and unknown tables or keys are ignored.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  AddressResolutionError,
  resolveSocketAddress,
  systemHostResolver,
  type HostResolver,
  type SocketAddress,
} from './address.js';
import {
  DEFAULT_ADVANCED,
  DEFAULT_JOIN,
  DEFAULT_JOIN_FORWARD,
  DEFAULT_JOIN_HOLD,
  DEFAULT_JOIN_KICK,
  DEFAULT_JOIN_LOBBY,
  DEFAULT_LOCKOUT,
  DEFAULT_MOTD,
  DEFAULT_PUBLIC,
  DEFAULT_RCON,
  DEFAULT_SERVER,
  DEFAULT_TIME,
} from './defaults.js';
import {
  JOIN_METHODS,
  type AdvancedConfig,
  type Config,
  type ConfigMetaConfig,
  type JoinConfig,
  type JoinForwardConfig,
  type JoinHoldConfig,
  type JoinKickConfig,
  type JoinLobbyConfig,
  type JoinMethod,
  type LockoutConfig,
  type MotdConfig,
  type PublicConfig,
  type RconConfig,
  type ServerConfig,
  type TimeConfig,
} from './types.js';
import { isFloatMarker, markFloatLiterals } from './toml-floats.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Options for {@link parseConfig}.
 */
export interface ParseConfigOptions {
  /** Resolver for hostnames in address fields. Defaults to the system resolver. */
  resolver?: HostResolver;
}

type Table = Record<string, unknown>;

const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

function isTable(value: unknown): value is Table {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'datetime';
  }
  if (isFloatMarker(value) || (typeof value === 'number' && !Number.isInteger(value))) {
    return 'float';
  }
  return typeof value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string' || isFloatMarker(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Validates that a value is a non-negative integer no larger than `max`.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @param max - Largest accepted value.
 * @returns The validated integer.
 * @throws ConfigParseError if value is not an integer in range.
 */
function validateUnsigned(value: unknown, fieldPath: string, max: number): number {
  const num = typeof value === 'bigint' ? Number(value) : value;
  if (typeof num !== 'number' || !Number.isInteger(num)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected integer, got ${describeType(value)}`
    );
  }
  if (num < 0 || num > max) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': must be between 0 and ${String(max)}, got ${String(num)}`
    );
  }
  return num;
}

function validateU16(value: unknown, fieldPath: string): number {
  return validateUnsigned(value, fieldPath, U16_MAX);
}

function validateU32(value: unknown, fieldPath: string): number {
  return validateUnsigned(value, fieldPath, U32_MAX);
}

/**
 * Reads an optional field, validating it when present.
 */
function field<T>(
  raw: Table,
  key: string,
  section: string,
  fallback: T,
  validate: (value: unknown, fieldPath: string) => T
): T {
  if (!(key in raw)) {
    return fallback;
  }
  return validate(raw[key], `${section}.${key}`);
}

/**
 * Gets a sub-table, or `undefined` when it is absent.
 *
 * @throws ConfigParseError if the key holds something other than a table.
 */
function table(raw: Table | undefined, key: string, fieldPath: string): Table | undefined {
  if (raw === undefined || !(key in raw)) {
    return undefined;
  }
  const value = raw[key];
  if (!isTable(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Resolves an address field, turning resolution failures into parse errors.
 */
async function addressField(
  raw: Table,
  key: string,
  section: string,
  fallback: SocketAddress,
  resolver: HostResolver
): Promise<SocketAddress> {
  if (!(key in raw)) {
    return fallback;
  }
  const fieldPath = `${section}.${key}`;
  const text = validateString(raw[key], fieldPath);
  try {
    return await resolveSocketAddress(text, resolver);
  } catch (error) {
    if (error instanceof AddressResolutionError) {
      throw new ConfigParseError(`Invalid address for '${fieldPath}': ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Parses a join method name. Names are lowercase in the file format.
 */
function validateJoinMethod(value: unknown, fieldPath: string): JoinMethod {
  const name = validateString(value, fieldPath);
  const method = JOIN_METHODS.find((candidate) => candidate === name);
  if (method === undefined) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${JOIN_METHODS.map((m) => `'${m}'`).join(', ')}, got '${name}'`
    );
  }
  return method;
}

function validateJoinMethods(value: unknown, fieldPath: string): JoinMethod[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${describeType(value)}`
    );
  }
  return value.map((item: unknown, index) => validateJoinMethod(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Parses the public section from raw TOML data.
 */
async function parsePublic(raw: Table | undefined, resolver: HostResolver): Promise<PublicConfig> {
  if (raw === undefined) {
    return { ...DEFAULT_PUBLIC };
  }

  return {
    address: await addressField(raw, 'address', 'public', DEFAULT_PUBLIC.address, resolver),
    version: field(raw, 'version', 'public', DEFAULT_PUBLIC.version, validateString),
    protocol: field(raw, 'protocol', 'public', DEFAULT_PUBLIC.protocol, validateU32),
  };
}

/**
 * Parses the server section from raw TOML data.
 *
 * The section and its `command` are required.
 *
 * @throws ConfigParseError if the section or command is missing.
 */
async function parseServer(raw: Table | undefined, resolver: HostResolver): Promise<ServerConfig> {
  if (raw === undefined) {
    throw new ConfigParseError("Missing required section '[server]'");
  }
  if (!('command' in raw)) {
    throw new ConfigParseError("Missing required field 'server.command'");
  }

  const s = 'server';
  const d = DEFAULT_SERVER;
  return {
    directory: field(raw, 'directory', s, d.directory, validateString),
    command: validateString(raw.command, 'server.command'),
    address: await addressField(raw, 'address', s, d.address, resolver),
    freeze_process: field(raw, 'freeze_process', s, d.freeze_process, validateBoolean),
    wake_on_start: field(raw, 'wake_on_start', s, d.wake_on_start, validateBoolean),
    wake_on_crash: field(raw, 'wake_on_crash', s, d.wake_on_crash, validateBoolean),
    probe_on_start: field(raw, 'probe_on_start', s, d.probe_on_start, validateBoolean),
    forge: field(raw, 'forge', s, d.forge, validateBoolean),
    start_timeout: field(raw, 'start_timeout', s, d.start_timeout, validateU32),
    stop_timeout: field(raw, 'stop_timeout', s, d.stop_timeout, validateU32),
    wake_whitelist: field(raw, 'wake_whitelist', s, d.wake_whitelist, validateBoolean),
    block_banned_ips: field(raw, 'block_banned_ips', s, d.block_banned_ips, validateBoolean),
    drop_banned_ips: field(raw, 'drop_banned_ips', s, d.drop_banned_ips, validateBoolean),
    send_proxy_v2: field(raw, 'send_proxy_v2', s, d.send_proxy_v2, validateBoolean),
  };
}

/**
 * Parses the time section from raw TOML data.
 *
 * `minimum_online_time` is accepted as an alias of `min_online_time`.
 */
function parseTime(raw: Table | undefined): TimeConfig {
  if (raw === undefined) {
    return { ...DEFAULT_TIME };
  }

  const minOnlineKey = 'min_online_time' in raw ? 'min_online_time' : 'minimum_online_time';
  return {
    sleep_after: field(raw, 'sleep_after', 'time', DEFAULT_TIME.sleep_after, validateU32),
    min_online_time: field(raw, minOnlineKey, 'time', DEFAULT_TIME.min_online_time, validateU32),
  };
}

function parseMotd(raw: Table | undefined): MotdConfig {
  if (raw === undefined) {
    return { ...DEFAULT_MOTD };
  }

  return {
    sleeping: field(raw, 'sleeping', 'motd', DEFAULT_MOTD.sleeping, validateString),
    starting: field(raw, 'starting', 'motd', DEFAULT_MOTD.starting, validateString),
    stopping: field(raw, 'stopping', 'motd', DEFAULT_MOTD.stopping, validateString),
    from_server: field(raw, 'from_server', 'motd', DEFAULT_MOTD.from_server, validateBoolean),
  };
}

function parseJoinKick(raw: Table | undefined): JoinKickConfig {
  if (raw === undefined) {
    return { ...DEFAULT_JOIN_KICK };
  }

  return {
    starting: field(raw, 'starting', 'join.kick', DEFAULT_JOIN_KICK.starting, validateString),
    stopping: field(raw, 'stopping', 'join.kick', DEFAULT_JOIN_KICK.stopping, validateString),
  };
}

function parseJoinHold(raw: Table | undefined): JoinHoldConfig {
  if (raw === undefined) {
    return { ...DEFAULT_JOIN_HOLD };
  }

  return {
    timeout: field(raw, 'timeout', 'join.hold', DEFAULT_JOIN_HOLD.timeout, validateU32),
  };
}

async function parseJoinForward(
  raw: Table | undefined,
  resolver: HostResolver
): Promise<JoinForwardConfig> {
  if (raw === undefined) {
    return { ...DEFAULT_JOIN_FORWARD };
  }

  return {
    address: await addressField(raw, 'address', 'join.forward', DEFAULT_JOIN_FORWARD.address, resolver),
    send_proxy_v2: field(
      raw,
      'send_proxy_v2',
      'join.forward',
      DEFAULT_JOIN_FORWARD.send_proxy_v2,
      validateBoolean
    ),
  };
}

function parseJoinLobby(raw: Table | undefined): JoinLobbyConfig {
  if (raw === undefined) {
    return { ...DEFAULT_JOIN_LOBBY };
  }

  return {
    timeout: field(raw, 'timeout', 'join.lobby', DEFAULT_JOIN_LOBBY.timeout, validateU32),
    message: field(raw, 'message', 'join.lobby', DEFAULT_JOIN_LOBBY.message, validateString),
    ready_sound: field(
      raw,
      'ready_sound',
      'join.lobby',
      DEFAULT_JOIN_LOBBY.ready_sound,
      validateString
    ),
  };
}

/**
 * Parses the join section and its per-method tables from raw TOML data.
 */
async function parseJoin(raw: Table | undefined, resolver: HostResolver): Promise<JoinConfig> {
  if (raw === undefined) {
    return { ...DEFAULT_JOIN };
  }

  return {
    methods: field(raw, 'methods', 'join', DEFAULT_JOIN.methods, validateJoinMethods),
    kick: parseJoinKick(table(raw, 'kick', 'join.kick')),
    hold: parseJoinHold(table(raw, 'hold', 'join.hold')),
    forward: await parseJoinForward(table(raw, 'forward', 'join.forward'), resolver),
    lobby: parseJoinLobby(table(raw, 'lobby', 'join.lobby')),
  };
}

function parseLockout(raw: Table | undefined): LockoutConfig {
  if (raw === undefined) {
    return { ...DEFAULT_LOCKOUT };
  }

  return {
    enabled: field(raw, 'enabled', 'lockout', DEFAULT_LOCKOUT.enabled, validateBoolean),
    message: field(raw, 'message', 'lockout', DEFAULT_LOCKOUT.message, validateString),
  };
}

function parseRcon(raw: Table | undefined): RconConfig {
  if (raw === undefined) {
    return { ...DEFAULT_RCON };
  }

  const d = DEFAULT_RCON;
  return {
    enabled: field(raw, 'enabled', 'rcon', d.enabled, validateBoolean),
    port: field(raw, 'port', 'rcon', d.port, validateU16),
    password: field(raw, 'password', 'rcon', d.password, validateString),
    randomize_password: field(raw, 'randomize_password', 'rcon', d.randomize_password, validateBoolean),
    send_proxy_v2: field(raw, 'send_proxy_v2', 'rcon', d.send_proxy_v2, validateBoolean),
  };
}

function parseAdvanced(raw: Table | undefined): AdvancedConfig {
  if (raw === undefined) {
    return { ...DEFAULT_ADVANCED };
  }

  return {
    rewrite_server_properties: field(
      raw,
      'rewrite_server_properties',
      'advanced',
      DEFAULT_ADVANCED.rewrite_server_properties,
      validateBoolean
    ),
  };
}

function parseConfigMeta(raw: Table | undefined): ConfigMetaConfig {
  if (raw === undefined || !('version' in raw)) {
    return {};
  }

  return { version: validateString(raw.version, 'config.version') };
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * The returned config has no `path` and its server directory is exactly as
 * declared; {@link loadConfig} adds both.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @param options - Parse options.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax, invalid field values or unresolvable addresses.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const toml = `
 * [server]
 * command = "java -jar server.jar"
 *
 * [time]
 * sleep_after = 120
 * `;
 *
 * const config = await parseConfig(toml);
 * console.log(config.server.command); // "java -jar server.jar"
 * console.log(config.time.sleep_after); // 120
 * ```
 */
export async function parseConfig(
  tomlContent: string,
  options: ParseConfigOptions = {}
): Promise<Config> {
  const resolver = options.resolver ?? systemHostResolver;
  let parsed: Table;

  try {
    parsed = TOML.parse(tomlContent);
    // Second pass keeps float literals apart from integers.
    const marked = markFloatLiterals(tomlContent);
    if (marked !== tomlContent) {
      parsed = TOML.parse(marked);
    }
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    public: await parsePublic(table(parsed, 'public', 'public'), resolver),
    server: await parseServer(table(parsed, 'server', 'server'), resolver),
    time: parseTime(table(parsed, 'time', 'time')),
    motd: parseMotd(table(parsed, 'motd', 'motd')),
    join: await parseJoin(table(parsed, 'join', 'join'), resolver),
    lockout: parseLockout(table(parsed, 'lockout', 'lockout')),
    rcon: parseRcon(table(parsed, 'rcon', 'rcon')),
    advanced: parseAdvanced(table(parsed, 'advanced', 'advanced')),
    config: parseConfigMeta(table(parsed, 'config', 'config')),
  };
}
