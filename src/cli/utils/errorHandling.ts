/**
 * Shared error handling utilities for CLI commands.
 *
 * Configuration errors are fatal: they are reported with remediation hints
 * and the process exits with code 1.
 */

import { loadConfig, type Config, type LoadConfigOptions } from '../../config/index.js';
import { displayErrorWithSuggestions, errorContextFor } from '../errors.js';
import type { CliCommandResult } from '../types.js';
import type { DisplayOptions } from './displayUtils.js';

/**
 * Reports a fatal error with suggestions.
 *
 * @param error - The thrown value.
 * @param display - Display options.
 */
export function reportFatalError(error: unknown, display: DisplayOptions): void {
  const message = error instanceof Error ? error.message : String(error);
  displayErrorWithSuggestions(message, errorContextFor(error), display);
}

/**
 * Loads the configuration, terminating the process on failure.
 *
 * This is the startup entry point for anything that needs a configuration:
 * it never returns a partial tree.
 *
 * @param configPath - Candidate config file path.
 * @param options - Load options.
 * @param display - Display options for the error report.
 * @returns The loaded configuration.
 */
export async function loadConfigOrExit(
  configPath: string,
  options: LoadConfigOptions,
  display: DisplayOptions
): Promise<Config> {
  try {
    return await loadConfig(configPath, options);
  } catch (error) {
    reportFatalError(error, display);
    return process.exit(1);
  }
}

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and handles any errors:
 * - On success: exits with the result's exit code
 * - On error: reports it with suggestions and exits with 1
 *
 * @param fn - The function to wrap (sync or async).
 * @param display - Display options for error reports.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  display: DisplayOptions
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      reportFatalError(error, display);
      process.exit(1);
    }
  })();
}
