/**
 * Loads the configuration from exactly one source.
 *
 * If the config file exists it is the only source; otherwise the environment
 * is. The two are never merged.
 *
 * @packageDocumentation
 */

import { systemHostResolver, type HostResolver } from './address.js';
import { CONFIG_FILE } from './defaults.js';
import { resolveServerDirectory } from './derive.js';
import { readEnvConfig, type EnvRecord } from './env.js';
import { ConfigLoadError } from './errors.js';
import { ConfigParseError, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { checkConfigVersion, versionWarning } from './version.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { safeReadTextFile, safeRealpath, safeStat, validatePath } from '../utils/safe-fs.js';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadConfigOptions {
  /** Environment used when no config file exists. Defaults to process.env. */
  env?: EnvRecord;
  /** Resolver for hostnames in address fields. Defaults to the system resolver. */
  resolver?: HostResolver;
  /** Logger for source selection and version warnings. */
  logger?: Logger;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Recursively freezes a config tree.
 */
function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Finalizes a freshly built tree: sets provenance, derives the server
 * directory and freezes everything.
 */
function finalize(config: Config, configPath: string | undefined): Config {
  const server = {
    ...config.server,
    directory: resolveServerDirectory(config.server.directory, configPath),
  };
  const finished: Config =
    configPath === undefined ? { ...config, server } : { ...config, server, path: configPath };
  return deepFreeze(finished);
}

/**
 * Resolves the candidate path to an absolute, symlink-free path.
 *
 * Falls back to the absolute path when symlinks cannot be resolved, and
 * returns `undefined` when the path itself is invalid (empty or containing
 * null bytes).
 */
async function canonicalize(configPath: string, log: Logger): Promise<string | undefined> {
  let validated: string;
  try {
    validated = validatePath(configPath);
  } catch (error) {
    log.debug('config_path_invalid', { path: configPath, error: toError(error) });
    return undefined;
  }

  try {
    return await safeRealpath(validated);
  } catch (error) {
    log.debug('config_path_not_canonical', { path: validated, error: toError(error) });
    return validated;
  }
}

/**
 * Whether an existing regular file is at the path. Stat failures count as no file.
 */
async function isRegularFile(configPath: string, log: Logger): Promise<boolean> {
  try {
    const stats = await safeStat(configPath);
    return stats?.isFile() ?? false;
  } catch (error) {
    log.debug('config_path_not_accessible', { path: configPath, error: toError(error) });
    return false;
  }
}

/**
 * Loads configuration from a TOML file.
 *
 * A missing, outdated or invalid `[config] version` logs a warning but never fails.
 *
 * @param configPath - Canonical path of an existing config file.
 * @param options - Load options.
 * @throws ConfigLoadError with kind `read` or `parse`.
 */
export async function loadConfigFromFile(
  configPath: string,
  options: LoadConfigOptions = {}
): Promise<Config> {
  const log = options.logger ?? defaultLogger;

  let content: string;
  try {
    content = await safeReadTextFile(configPath);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigLoadError('read', `Failed to load config: ${cause.message}`, {
      configPath,
      cause,
    });
  }

  let parsed: Config;
  try {
    parsed = await parseConfig(
      content,
      options.resolver === undefined ? {} : { resolver: options.resolver }
    );
  } catch (error) {
    if (error instanceof ConfigParseError) {
      throw new ConfigLoadError('parse', `Failed to load config: ${error.message}`, {
        configPath,
        cause: error,
      });
    }
    throw error;
  }

  const check = checkConfigVersion(parsed.config.version);
  const warning = versionWarning(check);
  if (warning !== undefined) {
    log.warn(`config_version_${check.status}`, { message: warning, path: configPath });
  }

  const config = finalize(parsed, configPath);
  log.debug('config_loaded', { source: 'file', path: configPath });
  return config;
}

/**
 * Loads configuration from LAZYMC_* environment variables.
 *
 * @param options - Load options.
 * @throws ConfigLoadError with kind `missing_env` if the server command is unset.
 */
export async function loadConfigFromEnv(options: LoadConfigOptions = {}): Promise<Config> {
  const log = options.logger ?? defaultLogger;
  const parsed = await readEnvConfig(
    options.env ?? process.env,
    options.resolver === undefined ? {} : { resolver: options.resolver }
  );
  const config = finalize(parsed, undefined);
  log.debug('config_loaded', { source: 'env' });
  return config;
}

/**
 * Loads the configuration.
 *
 * If `configPath` names a regular file, it is the only source. Otherwise the
 * configuration is built entirely from environment variables.
 *
 * The returned tree is deeply frozen.
 *
 * @param configPath - Candidate config file path (defaults to `lazymc.toml`).
 * @param options - Load options.
 * @returns The complete configuration.
 * @throws ConfigLoadError when the file cannot be read or parsed, or when the
 *   environment lacks `LAZYMC_SERVER_COMMAND`.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('lazymc.toml');
 * console.log(config.server.directory);
 * ```
 */
export async function loadConfig(
  configPath: string = CONFIG_FILE,
  options: LoadConfigOptions = {}
): Promise<Config> {
  const log = options.logger ?? defaultLogger;
  const canonical = await canonicalize(configPath, log);

  if (canonical !== undefined && (await isRegularFile(canonical, log))) {
    return loadConfigFromFile(canonical, options);
  }

  const shownPath = canonical ?? configPath;
  log.info('config_file_not_found', {
    path: shownPath,
    message: `Config file not found at ${shownPath}, using environment variables and defaults`,
  });
  return loadConfigFromEnv(options);
}
