/**
 * Raised when configuration fails validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigError";
  }
}
