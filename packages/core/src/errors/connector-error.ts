/**
 * Errors raised by database and spreadsheet handles
 */

export type ErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'SCHEMA_MISMATCH'
  | 'WRITE_FAILED'
  | 'READ_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN';

export interface ConnectorErrorDetails {
  code: ErrorCode;
  message: string;
  /** Which handle raised it: postgresql, mysql, google-sheets, excel */
  handle?: string;
  /** What the operator should change before the next run */
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ConnectorError extends Error {
  readonly code: ErrorCode;
  readonly handle?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConnectorErrorDetails) {
    super(details.message, details.cause ? { cause: details.cause } : undefined);
    this.name = 'ConnectorError';
    this.code = details.code;
    this.handle = details.handle;
    this.suggestion = details.suggestion;
    this.context = details.context;
  }

  /**
   * Structured log fields; undefined entries are left for the logger to drop
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      handle: this.handle,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Wrap an unknown thrown value as ConnectorError; ConnectorErrors pass through
 */
export function wrapError(error: unknown, code: ErrorCode = 'UNKNOWN', handle?: string): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }
  return new ConnectorError({
    code,
    message: errorMessage(error),
    handle,
    cause: error instanceof Error ? error : undefined,
  });
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
