/**
 * Float literal tagging for TOML sources.
 *
 * `@iarna/toml` returns `60.0` and `60` as the same JavaScript number, so an
 * integer field cannot tell them apart after parsing. {@link markFloatLiterals}
 * rewrites every bare float token into a tagged string before a second parse,
 * letting validators reject floats by type.
 *
 * @packageDocumentation
 */

/**
 * Prefix of the string a float literal is rewritten to. Starts with a
 * private-use character so no value written in a file can collide with it.
 */
export const FLOAT_MARKER = '\uE000toml-float:';

const FLOAT_PATTERN = /^[+-]?\d(?:_?\d)*(?:\.\d(?:_?\d)*)?(?:[eE][+-]?\d(?:_?\d)*)?$/;
const SPECIAL_FLOAT_PATTERN = /^[+-]?(?:inf|nan)$/;
const DELIMITER_PATTERN = /[\s=,[\]{}#"']/;

/**
 * Whether a bare token is a TOML float literal.
 */
export function isFloatToken(token: string): boolean {
  if (SPECIAL_FLOAT_PATTERN.test(token)) {
    return true;
  }
  return FLOAT_PATTERN.test(token) && /[.eE]/.test(token);
}

/**
 * Whether a parsed value is a tagged float from {@link markFloatLiterals}.
 */
export function isFloatMarker(value: unknown): value is string {
  return typeof value === 'string' && value.startsWith(FLOAT_MARKER);
}

/** Index just past a closing triple quote, including up to two extra quotes. */
function skipTripleQuoted(source: string, start: number, quote: string, escapes: boolean): number {
  const fence = quote.repeat(3);
  let i = start + 3;
  while (i < source.length) {
    if (escapes && source[i] === '\\') {
      i += 2;
      continue;
    }
    if (source.startsWith(fence, i)) {
      let end = i + 3;
      while (end < i + 5 && source[end] === quote) {
        end++;
      }
      return end;
    }
    i++;
  }
  return source.length;
}

/** Index just past the closing quote of a single-line string. */
function skipQuoted(source: string, start: number, quote: string, escapes: boolean): number {
  let i = start + 1;
  while (i < source.length && source[i] !== '\n') {
    if (escapes && source[i] === '\\') {
      i += 2;
      continue;
    }
    if (source[i] === quote) {
      return i + 1;
    }
    i++;
  }
  return i;
}

/**
 * Rewrites bare float literals into tagged basic strings.
 *
 * Strings and comments are left untouched. The source is expected to be
 * valid TOML already.
 *
 * @param source - TOML text.
 * @returns The rewritten text, identical to `source` when it has no floats.
 *
 * @example
 * ```typescript
 * markFloatLiterals('sleep_after = 60.0'); // 'sleep_after = "\\uE000toml-float:60.0"'
 * ```
 */
export function markFloatLiterals(source: string): string {
  let output = '';
  let i = 0;

  while (i < source.length) {
    const char = source.charAt(i);
    let end: number;

    if (char === '#') {
      const newline = source.indexOf('\n', i);
      end = newline === -1 ? source.length : newline;
    } else if (char === '"' || char === "'") {
      const escapes = char === '"';
      end = source.startsWith(char.repeat(3), i)
        ? skipTripleQuoted(source, i, char, escapes)
        : skipQuoted(source, i, char, escapes);
    } else if (DELIMITER_PATTERN.test(char)) {
      end = i + 1;
    } else {
      end = i + 1;
      while (end < source.length && !DELIMITER_PATTERN.test(source.charAt(end))) {
        end++;
      }
      const token = source.slice(i, end);
      if (isFloatToken(token)) {
        output += `"\\uE000toml-float:${token}"`;
        i = end;
        continue;
      }
    }

    output += source.slice(i, end);
    i = end;
  }

  return output;
}
