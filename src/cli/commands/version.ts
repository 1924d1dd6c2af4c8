/**
 * Version command handler for the lazymc CLI.
 *
 * Displays the CLI version by reading it directly from package.json.
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import { CONFIG_VERSION } from '../../config/index.js';
import type { CliCommandResult } from '../types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Reads the version from package.json.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersionFromPackageJson(): string {
  try {
    const packageJsonPath = join(__dirname, '../../../package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '(unknown)';
  } catch {
    return '(unknown)';
  }
}

/**
 * Handles the version command.
 *
 * @returns The command result.
 */
export function handleVersionCommand(): CliCommandResult {
  const version = getVersionFromPackageJson();
  console.log(`lazymc v${version} (config format ${CONFIG_VERSION})`);
  return { exitCode: 0 };
}
