export type ConfigErrorCode = "LOAD_ERROR" | "VALIDATION_ERROR";

/**
 * A configuration source could not be read (LOAD_ERROR) or the merged
 * result broke the schema (VALIDATION_ERROR).
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}
