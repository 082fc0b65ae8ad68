/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose sensitive data.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'DB_ERROR'
  | 'AGENT_ERROR'
  | 'RATE_LIMIT'
  | 'PIPELINE_CONFIG_INVALID'
  | 'GENERATION_FAILED'
  | 'ASSESSMENT_SOURCE_FAILED'
  | 'PERSISTENCE_FAILED';

/**
 * Codes that abort a pipeline run. Everything else is recovered per candidate.
 */
const FATAL_CODES: ReadonlySet<AppErrorCode> = new Set(['PIPELINE_CONFIG_INVALID']);

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 * The safeMessage should not expose sensitive data (API keys, prompts, etc.).
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. offending config field, base index) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /** True when the error must stop a run instead of being skipped. */
  get isFatal(): boolean {
    return FATAL_CODES.has(this.code);
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Message of any thrown value, for log lines.
 */
export function describeError(error: unknown): string {
  if (error instanceof AppError) return `${error.code}: ${error.safeMessage}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
