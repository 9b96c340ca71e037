/**
 * Boundary analysis error utilities.
 *
 * Provides a consistent error type for the analysis surfaces and a helper
 * that turns zod validation failures into BoundaryAnalysisError instances.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to analysis consumers.
 *
 * Per-condition codes (EmptySampleSet, MissingCounterpart) never abort a
 * run; they end up in the registry's skipped list.
 *
 * InsufficientValidSamples and DegenerateAggregate name recoverable
 * degradations. They are never thrown; the pipeline tags its log lines with
 * them (outlier fallback, zero baseline mean) and carries on.
 */
export type BoundaryErrorCode =
  | 'EmptySampleSet'
  | 'InsufficientValidSamples'
  | 'DegenerateAggregate'
  | 'MissingCounterpart'
  | 'InvalidParams'
  | 'ConfigError'
  | 'Cancelled';

/**
 * Plain error shape (for JSON output and logging)
 */
export interface BoundaryErrorShape {
  code: BoundaryErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error implementation raised by the analysis core.
 */
export class BoundaryAnalysisError extends Error implements BoundaryErrorShape {
  public readonly code: BoundaryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: BoundaryErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BoundaryAnalysisError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): BoundaryErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export interface ZodErrorConversion {
  /** Error code of the result (default: InvalidParams) */
  code?: BoundaryErrorCode;
  /** First line of the message (default: "Validation failed") */
  summary?: string;
  /** Path segments prepended to every issue path */
  pathPrefix?: ReadonlyArray<string | number>;
}

/**
 * Convert Zod validation error to BoundaryAnalysisError.
 *
 * The message lists every issue as `field.path message`, one per line.
 *
 * @example
 * ```typescript
 * const result = AnalysisSectionSchema.safeParse({ outlier_k: -1 });
 * if (!result.success) {
 *   throw zodErrorToBoundaryError(result.error);
 * }
 * // Throws: "Validation failed:\noutlier_k Outlier k must be positive\n..."
 * ```
 */
export function zodErrorToBoundaryError(
  error: ZodError,
  { code = 'InvalidParams', summary = 'Validation failed', pathPrefix = [] }: ZodErrorConversion = {}
): BoundaryAnalysisError {
  const issues = error.issues.map((issue) => {
    const path = [...pathPrefix, ...issue.path];
    return {
      field: path.length > 0 ? path.join('.') : 'root',
      message: issue.message,
      code: issue.code,
    };
  });

  return new BoundaryAnalysisError(
    code,
    `${summary}:\n${issues.map((issue) => `${issue.field} ${issue.message}`).join('\n')}`,
    { field: issues[0]?.field ?? 'root', issues }
  );
}
