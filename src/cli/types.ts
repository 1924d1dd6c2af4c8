/**
 * CLI types and interfaces for the lazymc CLI.
 */

import type { DisplayOptions } from './utils/displayUtils.js';
import type { EnvRecord } from '../config/index.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command name, e.g. `config`. Empty when none was given.
   */
  command: string;

  /**
   * Arguments after the command, with global options removed.
   */
  args: string[];

  /**
   * Candidate config file path from `--config`, or `lazymc.toml`.
   */
  configPath: string;

  /**
   * Environment used when the config file does not exist.
   */
  env: EnvRecord;

  /**
   * Terminal display settings.
   */
  display: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
