/**
 * Configuration Error Class
 *
 * Raised at startup when environment configuration is missing or invalid.
 * Carries an optional suggestion for the operator.
 */

export class ConfigurationError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    public readonly suggestion?: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    this.cause = cause;
  }

  /**
   * Format the error for console output
   */
  override toString(): string {
    let output = `❌ ${this.message}`;
    for (const issue of this.issues) {
      output += `\n   - ${issue}`;
    }
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}
