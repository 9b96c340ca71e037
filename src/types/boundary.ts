/**
 * Boundary Analysis Types
 *
 * Shared shapes for the measurement-aggregation and boundary-classification
 * pipeline. Values produced by the pipeline are frozen plain objects so they
 * can be handed to report writers without defensive copies.
 */

/**
 * Identifier of a protocol variant.
 *
 * `v1` is the variant on the left of every comparison (`a`), `v2` the
 * baseline on the right (`b`).
 */
export type VariantId = 'v1' | 'v2';

/**
 * Role of an aggregate inside a single comparison
 */
export type ComparisonRole = 'a' | 'b';

/**
 * A single scalar measurement from one benchmark trial
 * (requests/second or milliseconds, depending on the metric).
 */
export type Sample = number;

/**
 * Environmental scenario under which both variants are benchmarked.
 *
 * `bandwidthMbps = 0` means the link is not rate limited.
 */
export interface ConditionKey {
  readonly delayMs: number;
  readonly lossPct: number;
  readonly bandwidthMbps: number;
}

/**
 * Whether larger or smaller values of a metric are better
 */
export type MetricDirection = 'higher_is_better' | 'lower_is_better';

/**
 * Metric descriptor (e.g. throughput, latency)
 */
export interface MetricDefinition {
  name: string;
  direction: MetricDirection;
  unit?: string;
}

/**
 * Point estimate derived from a filtered SampleSet.
 *
 * Invariant: 1 <= validCount <= totalCount
 */
export interface Aggregate {
  readonly mean: number;
  readonly stdDev: number;
  readonly validCount: number;
  readonly totalCount: number;
}

export type BoundaryType =
  | 'not_significant'
  | 'close_performance'
  | 'performance_crossover'
  | 'stable_superior';

/**
 * Significance decision policy.
 *
 * - `non_overlap`: the two confidence intervals must not overlap.
 * - `relaxed_ratio`: the gap must exceed `ratio` times the combined margin.
 */
export type SignificancePolicy =
  | { kind: 'non_overlap' }
  | { kind: 'relaxed_ratio'; ratio: number };

/**
 * Per-condition comparison between both variants.
 *
 * `relativeDiffPct` is `(v1 - v2) / |v2| * 100` after orienting the metric so
 * that larger is better; positive means V1 performed better.
 */
export interface ComparisonResult {
  readonly condition: ConditionKey;
  readonly metric: string;
  readonly v1: Aggregate;
  readonly v2: Aggregate;
  readonly relativeDiffPct: number;
  readonly significant: boolean;
  readonly boundaryType: BoundaryType;
  readonly superiorVariant?: VariantId;
}

export type SkipReason = 'EmptySampleSet' | 'MissingCounterpart';

/**
 * A condition the pipeline could not compare
 */
export interface SkippedCondition {
  readonly condition: ConditionKey;
  readonly metric: string;
  readonly reason: SkipReason;
  readonly variant?: VariantId;
  readonly message: string;
}

/**
 * Complete analysis configuration for one pipeline instance
 */
export interface AnalysisConfig {
  /** Outlier cut-off in standard deviations */
  outlierK: number;

  /** Confidence level used to derive the z-multiplier (0 < c < 1) */
  confidence: number;

  significancePolicy: SignificancePolicy;

  /** |relativeDiffPct| at or below this value counts as close performance */
  crossoverThresholdPct: number;

  /** Below this many kept samples the outlier filter falls back to the raw set */
  minValidSamples: number;

  /** Variant expected to lose under normal conditions */
  normallyInferior: VariantId;
}

/**
 * Raw samples for one (variant, condition, metric) as delivered by the
 * benchmark executor
 */
export interface SampleBatch {
  variant: VariantId;
  condition: ConditionKey;
  metric: string;
  samples: readonly Sample[];
}

/**
 * Sweep runner pacing
 */
export interface RunnerSettings {
  /** Benchmark trials per variant and condition */
  trialsPerCondition: number;

  /** Pause after applying a network condition (ms) */
  settleDelayMs: number;

  /** Pause between consecutive trials (ms) */
  trialIntervalMs: number;
}
