/**
 * Escape sequence decoding for environment-sourced text.
 *
 * Environment variables cannot carry newlines conveniently, so `\n`, `\r`,
 * `\t` and `\\` are accepted in their literal backslash form. TOML strings
 * already support escapes natively and are not decoded again.
 *
 * @packageDocumentation
 */

/**
 * Decodes backslash escape sequences.
 *
 * Replacements run in order: `\n`, `\r`, `\t`, then `\\` last. A double
 * backslash before `n` therefore yields a backslash followed by a newline.
 * Unknown sequences such as `\x` are kept verbatim.
 *
 * @param input - Raw text.
 * @returns Text with escapes replaced by their control characters.
 *
 * @example
 * ```typescript
 * decodeEscapes('Line one\\nLine two'); // "Line one\nLine two"
 * ```
 */
export function decodeEscapes(input: string): string {
  return input
    .replaceAll('\\n', '\n')
    .replaceAll('\\r', '\r')
    .replaceAll('\\t', '\t')
    .replaceAll('\\\\', '\\');
}
