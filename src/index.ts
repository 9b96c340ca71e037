export {
  BoundaryAnalysisError,
  zodErrorToBoundaryError,
  type BoundaryErrorCode,
  type ZodErrorConversion,
  type BoundaryErrorShape,
} from './api/errors.js';

// Analysis core
export { SampleSet } from './analysis/sample-set.js';
export {
  mean,
  populationVariance,
  populationStdDev,
  normalQuantile,
} from './analysis/statistics.js';
export { filterOutliers, type OutlierFilterResult } from './analysis/outlier-filter.js';
export { aggregate, summarizeSamples, type SampleSummary } from './analysis/aggregator.js';
export {
  NON_OVERLAP_POLICY,
  Z_TABLE,
  zForConfidence,
  assertSignificanceParams,
  evaluateSignificance,
  isSignificant,
  type SignificanceEvaluation,
} from './analysis/significance-tester.js';
export { classify, relativeDiffPct, orientAggregate, type Classification } from './analysis/boundary-classifier.js';
export { BoundaryRegistry, type BoundaryRegistryEvents } from './analysis/boundary-registry.js';
export {
  BoundaryPipeline,
  type AnalysisRunResult,
  type BoundaryPipelineOptions,
  type ConditionInput,
  type VariantSamples,
} from './analysis/boundary-pipeline.js';
export { summarizeBoundaries, isBoundary, type BoundarySummary, type RangeStats } from './analysis/boundary-summary.js';

// Conditions
export { createConditionKey, conditionId, conditionsEqual, compareConditions } from './conditions/condition-key.js';
export {
  rangeInclusive,
  expandSweep,
  expandConditionGrid,
  type ConditionSweep,
  type NumericRange,
  type RangeOrList,
} from './conditions/condition-grid.js';

// Sweep runner
export {
  BoundarySweepRunner,
  type BenchmarkExecutor,
  type BoundarySweepRunnerOptions,
  type NetworkConditionController,
  type SweepRunnerEvents,
  type TrialMeasurement,
} from './runner/boundary-sweep-runner.js';

// Configuration
export {
  loadConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  resolveProfile,
  toAnalysisConfig,
  toMetricDefinitions,
  toRunnerSettings,
  toVariantLabels,
  toConditionSweeps,
  type Environment,
} from './config/loader.js';
export { DEFAULT_ANALYSIS, DEFAULT_METRICS, RUNNER } from './config/defaults.js';

export { createLogger, lazyLog, LOG_LEVEL_ENV } from './utils/logger-helpers.js';
export { InvalidState } from './utils/result-helpers.js';

export * from './types/index.js';
