/**
 * Raised when a required capability or setting is missing or invalid.
 *
 * The only error allowed to propagate out of the feed and exporter code;
 * everything else is absorbed at its boundary and logged.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
