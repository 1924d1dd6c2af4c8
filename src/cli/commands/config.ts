/**
 * Config command handler for the lazymc CLI.
 *
 * Subcommands:
 * - `test`: load and validate the configuration, then print a summary
 * - `show`: print the resolved configuration as JSON
 * - `env`: list supported environment variables
 */

import {
  formatSocketAddress,
  getEnvVarDocumentation,
  type Config,
  type SocketAddress,
} from '../../config/index.js';
import { loadConfigOrExit } from '../utils/errorHandling.js';
import { style, symbol } from '../utils/displayUtils.js';
import type { CliCommandResult, CliContext } from '../types.js';

function isSocketAddress(value: unknown): value is SocketAddress {
  return (
    typeof value === 'object' &&
    value !== null &&
    'host' in value &&
    'port' in value &&
    'family' in value &&
    typeof value.host === 'string' &&
    typeof value.port === 'number'
  );
}

function replaceAddresses(_key: string, value: unknown): unknown {
  return isSocketAddress(value) ? formatSocketAddress(value) : value;
}

/**
 * Serializes a config tree to JSON, rendering addresses as `host:port`.
 *
 * @param config - The configuration.
 * @returns Pretty-printed JSON.
 */
export function configToJson(config: Config): string {
  return JSON.stringify(config, replaceAddresses, 2);
}

/**
 * Builds the human readable summary printed by `config test`.
 *
 * @param config - The configuration.
 * @returns Summary lines.
 */
export function summarizeConfig(config: Config): string[] {
  const methods = config.join.methods.length > 0 ? config.join.methods.join(', ') : '(none)';
  return [
    `Source:           ${config.path ?? 'environment variables'}`,
    `Server command:   ${config.server.command}`,
    `Server directory: ${config.server.directory}`,
    `Server address:   ${formatSocketAddress(config.server.address)}`,
    `Public address:   ${formatSocketAddress(config.public.address)}`,
    `Sleep after:      ${String(config.time.sleep_after)}s`,
    `Join methods:     ${methods}`,
  ];
}

async function handleTest(context: CliContext): Promise<CliCommandResult> {
  const config = await loadConfigOrExit(context.configPath, { env: context.env }, context.display);

  console.log(`${style(symbol('✓', 'OK', context.display), 'green', context.display)} Config is valid`);
  for (const line of summarizeConfig(config)) {
    console.log(`  ${line}`);
  }
  return { exitCode: 0 };
}

async function handleShow(context: CliContext): Promise<CliCommandResult> {
  const config = await loadConfigOrExit(context.configPath, { env: context.env }, context.display);
  console.log(configToJson(config));
  return { exitCode: 0 };
}

function handleEnv(): CliCommandResult {
  const docs = getEnvVarDocumentation();
  for (const [name, entry] of Object.entries(docs)) {
    const defaultText =
      entry.default === undefined ? '' : ` (default: ${JSON.stringify(entry.default)})`;
    console.log(`${name} [${entry.type}]`);
    console.log(`    ${entry.description}${defaultText}`);
  }
  return { exitCode: 0 };
}

/**
 * Handles the config command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleConfigCommand(context: CliContext): Promise<CliCommandResult> {
  const subcommand = context.args[0];

  switch (subcommand) {
    case 'test':
      return handleTest(context);
    case 'show':
      return handleShow(context);
    case 'env':
      return handleEnv();
    default:
      console.error(
        subcommand === undefined
          ? 'Missing config subcommand'
          : `Unknown config subcommand: ${subcommand}`
      );
      console.error('\nRun "lazymc help config" for usage information.');
      return { exitCode: 1 };
  }
}
