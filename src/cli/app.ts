/**
 * Command line parsing for the lazymc CLI.
 */

import { CONFIG_FILE, type EnvRecord } from '../config/index.js';
import { detectDisplayOptions, type DisplayOptions } from './utils/displayUtils.js';
import type { CliContext } from './types.js';

/**
 * Error thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Creates the CLI context from raw arguments.
 *
 * `--config <path>`, `--config=<path>` and `-c <path>` may appear anywhere;
 * the first remaining argument is the command.
 *
 * @param argv - Arguments after the executable and script.
 * @param env - Process environment.
 * @param display - Display overrides (detected from the terminal by default).
 * @returns The CLI context.
 * @throws CliUsageError if `--config` has no value.
 */
export function createCliApp(
  argv: readonly string[],
  env: EnvRecord = process.env,
  display: Partial<DisplayOptions> = {}
): CliContext {
  let configPath = CONFIG_FILE;
  const rest: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    if (arg === '--config' || arg === '-c') {
      const value = argv[i + 1];
      if (value === undefined || value === '') {
        throw new CliUsageError(`Option ${arg} requires a path`);
      }
      configPath = value;
      i++;
    } else if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length);
      if (value === '') {
        throw new CliUsageError('Option --config requires a path');
      }
      configPath = value;
    } else {
      rest.push(arg);
    }
  }

  const detected = detectDisplayOptions(env, process.stdout.isTTY === true);

  return {
    command: rest[0] ?? '',
    args: rest.slice(1),
    configPath,
    env,
    display: {
      colors: display.colors ?? detected.colors,
      unicode: display.unicode ?? detected.unicode,
    },
  };
}
