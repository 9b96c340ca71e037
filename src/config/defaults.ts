/**
 * Default Configuration Constants
 *
 * In-code defaults for the analysis pipeline and the sweep runner. The YAML
 * configuration (config/boundary.yaml) overrides these per profile.
 */

import type { AnalysisConfig, MetricDefinition } from '../types/boundary.js';

/**
 * Analysis defaults (non-overlap at 95%, 3-sigma outlier rule)
 */
export const DEFAULT_ANALYSIS: Readonly<AnalysisConfig> = Object.freeze({
  /** 3-sigma rule */
  outlierK: 3,

  confidence: 0.95,

  significancePolicy: Object.freeze({ kind: 'non_overlap' as const }),

  /** |diff| up to 5% counts as close performance */
  crossoverThresholdPct: 5,

  minValidSamples: 1,

  /** HTTP/3 (v2) is expected to trail HTTP/2 on a clean network */
  normallyInferior: 'v2' as const,
});

/**
 * Metrics understood out of the box
 */
export const DEFAULT_METRICS: readonly MetricDefinition[] = [
  { name: 'throughput', direction: 'higher_is_better', unit: 'req/s' },
  { name: 'latency', direction: 'lower_is_better', unit: 'ms' },
];

/**
 * Sweep Runner Configuration
 */
export const RUNNER = {
  /** Benchmark trials per variant and condition */
  TRIALS_PER_CONDITION: 3,

  /** Pause after applying a network condition before the first trial (ms) */
  SETTLE_DELAY_MS: 10_000, // 10 seconds

  /** Pause between trials (ms) */
  TRIAL_INTERVAL_MS: 5_000, // 5 seconds
} as const;
