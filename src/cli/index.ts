#!/usr/bin/env node

/**
 * lazymc CLI entry point.
 */

import { CliUsageError, createCliApp } from './app.js';
import { handleConfigCommand } from './commands/config.js';
import { handleVersionCommand } from './commands/version.js';
import { withErrorHandling } from './utils/errorHandling.js';
import type { CliContext } from './types.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
lazymc - wake a game server on demand, sleep it when idle

USAGE:
  lazymc [--config <path>] <command>

COMMANDS:
  config test   Load and validate the configuration
  config show   Print the resolved configuration as JSON
  config env    List supported LAZYMC_* environment variables
  help          Show this help message
  version       Show version information

OPTIONS:
  --config, -c <path>   Config file (default: lazymc.toml). When the file does
                        not exist, configuration is read from LAZYMC_*
                        environment variables instead.
  --help, -h            Show help for a command
  --version, -v         Show version information

EXAMPLES:
  lazymc config test
  lazymc -c /srv/mc/lazymc.toml config show
  LAZYMC_SERVER_COMMAND="java -jar server.jar" lazymc config test
`;
  console.log(helpText);
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const commandHelp: Record<string, string> = {
    config: `
USAGE: lazymc [--config <path>] config <test|show|env>

Loads configuration from the config file if it exists, otherwise from
LAZYMC_* environment variables. LAZYMC_SERVER_COMMAND is required when
no config file is used.

SUBCOMMANDS:
  test   Validate and print a summary
  show   Print the resolved configuration as JSON
  env    List supported environment variables and their defaults

EXAMPLES:
  lazymc config test --config lazymc.toml
  lazymc config env
`,
  };

  const help = commandHelp[commandName];
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "lazymc help" to see all available commands.');
  }
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "lazymc help" for usage information.');
}

function dispatch(context: CliContext): void {
  const { command, args } = context;

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      if (args[0] !== undefined) {
        showHelpForCommand(args[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand(), context.display);
      break;

    case 'config':
      if (args.includes('--help') || args.includes('-h')) {
        showHelpForCommand('config');
        process.exit(0);
      }
      withErrorHandling(() => handleConfigCommand(context), context.display);
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

/**
 * Main CLI entry point.
 */
function main(): void {
  let context: CliContext;
  try {
    context = createCliApp(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      showError(error.message);
      process.exit(1);
    }
    throw error;
  }
  dispatch(context);
}

main();
