/**
 * Fatal configuration loading errors.
 *
 * @packageDocumentation
 */

/**
 * What went wrong while loading configuration.
 *
 * - `read`: the config file exists but could not be read
 * - `parse`: the config file is not valid TOML, has a field of the wrong type,
 *   or has an address that does not resolve
 * - `missing_env`: no config file, and a required environment variable is unset
 */
export type ConfigLoadErrorKind = 'read' | 'parse' | 'missing_env';

/**
 * Error thrown when configuration cannot be loaded. Never recoverable: the
 * service must not start with a partial configuration.
 */
export class ConfigLoadError extends Error {
  /** Failure category, used to pick remediation hints. */
  public readonly kind: ConfigLoadErrorKind;
  /** Config file involved, if the failure was file-sourced. */
  public readonly configPath: string | undefined;
  /** Environment variable involved, for `missing_env`. */
  public readonly envVar: string | undefined;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigLoadError.
   *
   * @param kind - Failure category.
   * @param message - Descriptive error message.
   * @param details - Related file, variable and cause.
   */
  constructor(
    kind: ConfigLoadErrorKind,
    message: string,
    details: { configPath?: string; envVar?: string; cause?: Error } = {}
  ) {
    super(message);
    this.name = 'ConfigLoadError';
    this.kind = kind;
    this.configPath = details.configPath;
    this.envVar = details.envVar;
    this.cause = details.cause;
  }
}
