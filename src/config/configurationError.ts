/**
 * Invalid or contradictory configuration, detected before any request
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
