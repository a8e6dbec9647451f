/**
 * Raised for problems with the run's inputs or settings (credentials, config
 * file, CSV columns, feed URIs). Fatal for the whole batch.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
