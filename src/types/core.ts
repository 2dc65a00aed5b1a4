/**
 * Result type and error guidance shared by every module.
 *
 * Functions that can fail in an expected way return a `Result` instead of
 * throwing, so callers branch on `ok` and keep the error message.
 */

/**
 * Structured guidance attached to a failure.
 */
export interface ErrorGuidance {
  /** Short restatement of the problem */
  message?: string;
  /** What most likely caused it */
  hint?: string;
  /** What the user can do about it */
  resolution?: string;
  /** Machine-readable extras (field errors, offending values) */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/**
 * Create a successful result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failed result with optional guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> =>
  guidance !== undefined ? { ok: false, error, guidance } : { ok: false, error };
