/**
 * Result Type Helpers
 *
 * Result types for explicit per-condition error handling. A failed
 * condition is a value the caller records, not an exception that unwinds
 * the whole analysis run.
 *
 * Usage:
 * ```typescript
 * const result = pipeline.compareCondition(input);
 * if (result.err) {
 *   registry.recordSkipped(toSkip(result.val));
 * } else {
 *   registry.record(result.val); // Type-safe access
 * }
 * ```
 */

import { Result, Ok, Err } from 'ts-results';

/**
 * Used when an operation is attempted in an invalid state
 * (e.g. appending to a frozen SampleSet).
 */
export class InvalidState extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvalidState';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidState);
    }
  }
}

/**
 * Helper to convert Promise<T> to Promise<Result<T, Error>>
 *
 * Useful for wrapping collaborator calls that throw.
 *
 * @example
 * ```typescript
 * const trial = await resultify(executor.run('v1', condition));
 * if (trial.ok) {
 *   samples.append(trial.val.throughput);
 * }
 * ```
 */
export async function resultify<T>(promise: Promise<T>): Promise<Result<T, Error>> {
  try {
    const value = await promise;
    return Ok(value);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}

// Re-export Result types for convenience
export { Result, Ok, Err };
