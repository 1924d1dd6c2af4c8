/**
 * Error suggestion system for the lazymc CLI.
 *
 * Turns fatal configuration errors into a message with remediation hints.
 *
 * @packageDocumentation
 */

import { ConfigLoadError } from '../config/index.js';
import { style, type DisplayOptions } from './utils/displayUtils.js';

/**
 * Error types that can occur while starting up.
 */
export type ErrorType = 'config_read' | 'config_parse' | 'config_missing_env' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** Config file involved. */
    filePath?: string;
    /** Environment variable involved. */
    envVar?: string;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  config_read: [
    {
      text: 'Check that the config file is readable by the current user',
      action: 'ls -l lazymc.toml',
    },
    {
      text: 'Point lazymc at a different config file',
      action: 'lazymc config test --config <path>',
    },
  ],

  config_parse: [
    {
      text: 'Fix the syntax error or invalid value reported above',
    },
    {
      text: 'Make sure every address is a reachable host:port',
    },
    {
      text: 'Validate the config file',
      action: 'lazymc config test --config <path>',
    },
  ],

  config_missing_env: [
    {
      text: 'Set the server start command',
      action: 'export LAZYMC_SERVER_COMMAND="java -jar server.jar"',
    },
    {
      text: 'Or create a config file with a [server] command',
      action: 'lazymc config test --config lazymc.toml',
    },
    {
      text: 'List all supported environment variables',
      action: 'lazymc config env',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'LAZYMC_DEBUG=1 lazymc config test',
    },
  ],
};

/**
 * Identifies the error type of a thrown value.
 *
 * @param error - The thrown value.
 * @returns The identified error type.
 */
export function inferErrorType(error: unknown): ErrorType {
  if (!(error instanceof ConfigLoadError)) {
    return 'unknown';
  }

  switch (error.kind) {
    case 'read':
      return 'config_read';
    case 'parse':
      return 'config_parse';
    case 'missing_env':
      return 'config_missing_env';
    default: {
      // Exhaustive check - if new ConfigLoadErrorKind is added, this will error
      const exhaustiveCheck: never = error.kind;
      return exhaustiveCheck;
    }
  }
}

/**
 * Builds the error context for a thrown value.
 */
export function errorContextFor(error: unknown): ErrorContext {
  const errorType = inferErrorType(error);
  if (!(error instanceof ConfigLoadError)) {
    return { errorType };
  }

  const details: NonNullable<ErrorContext['details']> = {};
  if (error.configPath !== undefined) {
    details.filePath = error.configPath;
  }
  if (error.envVar !== undefined) {
    details.envVar = error.envVar;
  }
  return { errorType, details };
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
export function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const prefix = style(`${String(index)}.`, 'yellow', options);
  const actionText =
    suggestion.action !== undefined ? `\n    ${style(suggestion.action, 'dim', options)}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? 'unknown';
  const suggestions = getSuggestions(errorType);

  let result = `${style('Error:', 'red', options)} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${style('File:', 'yellow', options)} ${context.details.filePath}`;
  }

  if (context.details?.envVar !== undefined) {
    result += `\n  ${style('Variable:', 'yellow', options)} ${context.details.envVar}`;
  }

  result += `\n\n${style('Suggestions:', 'bold', options)}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Displays error message with suggestions to console.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}
