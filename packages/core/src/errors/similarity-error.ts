/**
 * Error type shared by every set-similarity package.
 */

export type SimilarityErrorCode =
  | 'INVALID_SET_ARGUMENT'
  | 'MIXED_ELEMENT_TYPES'
  | 'INVALID_POLICY'
  | 'UNKNOWN_ALGORITHM'
  | 'INVALID_ARGUMENT'
  | 'DIAGNOSTIC_RAISED'
  | 'CONFIGURATION_ERROR';

export interface SimilarityErrorDetails {
  /** Error code for programmatic handling */
  code: SimilarityErrorCode;
  /** Human-readable message */
  message: string;
  /** Measure that raised the error, when known */
  measure?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class SimilarityError extends Error {
  readonly code: SimilarityErrorCode;
  readonly measure?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SimilarityErrorDetails) {
    super(details.message);
    this.name = 'SimilarityError';
    this.code = details.code;
    this.measure = details.measure;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * True for the per-call argument failures (non-set argument, mixed
   * element classes).
   */
  isTypeError(): boolean {
    return this.code === 'INVALID_SET_ARGUMENT' || this.code === 'MIXED_ELEMENT_TYPES';
  }

  /**
   * Format error as a structured message with the suggested fix
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.measure) {
      parts.push(`Measure: ${this.measure}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      measure: this.measure,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
