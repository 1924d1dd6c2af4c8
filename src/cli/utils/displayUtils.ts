/**
 * Shared display utilities for CLI commands.
 */

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

export type AnsiStyle = 'bold' | 'dim' | 'red' | 'green' | 'yellow';

const ANSI_CODES: Readonly<Record<AnsiStyle, string>> = {
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
};

const RESET = '\x1b[0m';

/**
 * Wraps text in an ANSI style when colors are enabled.
 */
export function style(text: string, ansi: AnsiStyle, options: DisplayOptions): string {
  return options.colors ? `${ANSI_CODES[ansi]}${text}${RESET}` : text;
}

export function stripAnsiCodes(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

/**
 * Picks a Unicode symbol or its ASCII fallback.
 */
export function symbol(unicode: string, ascii: string, options: DisplayOptions): string {
  return options.unicode ? unicode : ascii;
}

/**
 * Detects display settings from the terminal. Honors NO_COLOR.
 */
export function detectDisplayOptions(
  env: Record<string, string | undefined>,
  isTTY: boolean
): DisplayOptions {
  const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== '';
  return {
    colors: isTTY && !noColor,
    unicode: env.TERM !== 'dumb',
  };
}
