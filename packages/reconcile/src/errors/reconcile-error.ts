/**
 * Reconciliation Error Types
 */

export type ReconcileErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'SCHEMA_MISMATCH'
  | 'INVALID_ROW'
  | 'INVALID_OPTIONS';

/** Which read side an error belongs to */
export type ReadSource = 'catalog' | 'roster';

export interface ReconcileErrorDetails {
  code: ReconcileErrorCode;
  message: string;
  source?: ReadSource;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly source?: ReadSource;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ReconcileErrorDetails) {
    super(details.message);
    this.name = 'ReconcileError';
    this.code = details.code;
    this.source = details.source;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Structured log fields; undefined entries are left for the logger to drop
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      source: this.source,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
