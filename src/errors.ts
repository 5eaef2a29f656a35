/**
 * Thrown when the runner configuration (flags or config module) is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a suite file cannot be read, parsed or validated.
 */
export class SuiteLoadError extends Error {
  constructor(
    /** Path of the offending suite file */
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${path}: ${message}`, options);
    this.name = 'SuiteLoadError';
  }
}
