/**
 * transit-reach Error Types
 *
 * RequestError and ParseError are recoverable: they are carried inside a
 * Result and turn the affected origin or trip into a recorded failure.
 * ConfigurationError is fatal and raised before any network call.
 */

export type TransitReachErrorCode =
  | 'REQUEST_FAILED'
  | 'PARSE_FAILED'
  | 'CONFIGURATION_INVALID';

/**
 * Base class for all errors raised or reported by the toolkit
 */
export abstract class TransitReachError extends Error {
  abstract readonly code: TransitReachErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The routing service answered with a non-OK status or could not be reached
 */
export class RequestError extends TransitReachError {
  readonly code = 'REQUEST_FAILED' as const;

  /**
   * @param status - Engine error id, `HTTP_<status>`, `TIMEOUT`, `NETWORK_ERROR` or `ABORTED`
   */
  constructor(
    message: string,
    public readonly status: string,
    public readonly subject?: string
  ) {
    super(message);
  }
}

/**
 * The response payload could not be decoded into polygons or itineraries
 */
export class ParseError extends TransitReachError {
  readonly code = 'PARSE_FAILED' as const;

  constructor(
    message: string,
    public readonly subject?: string,
    public readonly cause?: Error
  ) {
    super(message);
  }
}

/**
 * Caller mistake detected before the run starts (bad row index, missing
 * coordinate columns, invalid configuration values)
 *
 * RECOVERY:
 * - Fix the input file or option named in `field` and rerun
 */
export class ConfigurationError extends TransitReachError {
  readonly code = 'CONFIGURATION_INVALID' as const;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
  }

  /**
   * Get formatted summary including every individual issue
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * Error recorded against a batch item
 */
export type ItemError = RequestError | ParseError;
