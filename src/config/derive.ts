/**
 * Values derived from more than one configuration field.
 *
 * @packageDocumentation
 */

import { dirname, resolve } from 'node:path';

/**
 * Resolves the server directory.
 *
 * File-sourced configs resolve the directory relative to the directory holding
 * the config file; an absolute directory is kept as-is. Environment-sourced
 * configs use the directory unchanged. Existence is not
 * checked here; the process supervisor does that when spawning the server.
 *
 * @param directory - Declared server directory.
 * @param configPath - Path of the config file, if file-sourced.
 * @returns The server directory.
 *
 * @example
 * ```typescript
 * resolveServerDirectory('.', '/srv/mc/lazymc.toml'); // "/srv/mc"
 * resolveServerDirectory('world', undefined);         // "world"
 * ```
 */
export function resolveServerDirectory(directory: string, configPath: string | undefined): string {
  if (configPath === undefined) {
    return directory;
  }
  return resolve(dirname(configPath), directory);
}
