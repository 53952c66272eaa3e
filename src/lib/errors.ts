/**
 * Error types raised by the scoring library.
 * Scoring itself never throws for documented input; these cover the two ways a caller can step outside it.
 */

/** A value that has no stable textual form (object, symbol, function) was passed to a scorer. */
export class InvalidInputError extends TypeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** Environment configuration failed validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * One-line description of any thrown value, for callers that log failures.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' ? `${error.name}: ${error.message}` : error.message;
  }
  const msg = String(error);
  if (msg.length > 200) {
    return `${msg.slice(0, 197)}...`;
  }
  return msg;
}
