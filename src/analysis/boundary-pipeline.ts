/**
 * Boundary Pipeline
 *
 * Per-condition glue: OutlierFilter → Aggregator (per variant) →
 * SignificanceTester → BoundaryClassifier → BoundaryRegistry.
 *
 * One pipeline instance is one analysis policy. Use cases that need a
 * different strictness build another instance from another configuration
 * rather than another copy of the logic.
 *
 * Per-condition problems (no samples, one variant missing) come back as
 * `Err` values and are recorded as skipped conditions; they never abort the
 * run.
 */

import type { Logger } from 'pino';
import { BoundaryAnalysisError, type BoundaryErrorCode } from '../api/errors.js';
import { compareConditions, conditionId } from '../conditions/condition-key.js';
import { DEFAULT_ANALYSIS, DEFAULT_METRICS } from '../config/defaults.js';
import type {
  AnalysisConfig,
  ComparisonResult,
  ComparisonRole,
  ConditionKey,
  MetricDefinition,
  Sample,
  SampleBatch,
  SkippedCondition,
  SkipReason,
  VariantId,
} from '../types/boundary.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { Err, InvalidState, Ok, type Result } from '../utils/result-helpers.js';
import { summarizeSamples, type SampleSummary } from './aggregator.js';
import { classify, orientAggregate } from './boundary-classifier.js';
import { BoundaryRegistry } from './boundary-registry.js';
import { summarizeBoundaries, type BoundarySummary } from './boundary-summary.js';
import { SampleSet } from './sample-set.js';
import { assertSignificanceParams, evaluateSignificance } from './significance-tester.js';

/**
 * Samples for one variant: a frozen SampleSet or a plain array
 */
export type VariantSamples = SampleSet | readonly Sample[];

/**
 * Input for a single condition
 */
export interface ConditionInput {
  condition: ConditionKey;
  metric: string;
  v1?: VariantSamples;
  v2?: VariantSamples;
}

export interface BoundaryPipelineOptions {
  logger?: Logger;
  registry?: BoundaryRegistry;
  metrics?: readonly MetricDefinition[];
}

/**
 * Outcome of a full analysis run
 */
export interface AnalysisRunResult {
  results: ComparisonResult[];
  skipped: SkippedCondition[];
  summary: BoundarySummary;
}

interface PendingCondition {
  condition: ConditionKey;
  metric: string;
  v1?: Sample[];
  v2?: Sample[];
}

function firstNonFinite(samples: readonly Sample[]): Sample | undefined {
  return samples.find((sample) => !Number.isFinite(sample));
}

const SKIP_CODES: ReadonlySet<string> = new Set<SkipReason>(['EmptySampleSet', 'MissingCounterpart']);

function toRole(variant: VariantId): ComparisonRole {
  return variant === 'v1' ? 'a' : 'b';
}

function toVariant(role: ComparisonRole): VariantId {
  return role === 'a' ? 'v1' : 'v2';
}

function isSkipReason(code: string): code is SkipReason {
  return SKIP_CODES.has(code);
}

export class BoundaryPipeline {
  public readonly config: Readonly<AnalysisConfig>;
  public readonly registry: BoundaryRegistry;

  private readonly logger?: Logger;
  private readonly metrics: ReadonlyMap<string, MetricDefinition>;

  constructor(config: Partial<AnalysisConfig> = {}, options: BoundaryPipelineOptions = {}) {
    this.config = Object.freeze({ ...DEFAULT_ANALYSIS, ...config });
    this.logger = options.logger;
    this.registry = options.registry ?? new BoundaryRegistry(options.logger);
    this.metrics = new Map((options.metrics ?? DEFAULT_METRICS).map((metric) => [metric.name, metric]));

    this.validateConfig();
  }

  /**
   * @throws BoundaryAnalysisError (InvalidParams) before any condition is processed
   */
  private validateConfig(): void {
    const { outlierK, confidence, significancePolicy, crossoverThresholdPct, minValidSamples } = this.config;

    if (!(outlierK > 0)) {
      throw new BoundaryAnalysisError('InvalidParams', `Outlier k must be positive (got ${outlierK})`);
    }
    if (!(crossoverThresholdPct >= 0)) {
      throw new BoundaryAnalysisError(
        'InvalidParams',
        `Crossover threshold must be >= 0 (got ${crossoverThresholdPct})`
      );
    }
    if (!Number.isInteger(minValidSamples) || minValidSamples < 1) {
      throw new BoundaryAnalysisError(
        'InvalidParams',
        `minValidSamples must be an integer >= 1 (got ${minValidSamples})`
      );
    }
    assertSignificanceParams(confidence, significancePolicy);
  }

  /**
   * Names of the metrics this pipeline classifies, in configuration order
   */
  public get metricNames(): string[] {
    return [...this.metrics.keys()];
  }

  /**
   * Compare both variants under one condition without touching the registry.
   *
   * Non-finite samples in a plain array come back as `Err` (InvalidParams).
   *
   * @throws BoundaryAnalysisError (InvalidParams) for an unknown metric
   * @throws InvalidState if a SampleSet is still collecting samples
   */
  public compareCondition(input: ConditionInput): Result<ComparisonResult, BoundaryAnalysisError> {
    const metric = this.resolveMetric(input.metric);
    const id = conditionId(input.condition);

    if (input.v1 === undefined || input.v2 === undefined) {
      const variant: VariantId = input.v1 === undefined ? 'v1' : 'v2';
      return Err(
        new BoundaryAnalysisError('MissingCounterpart', `No ${variant} samples for ${id} (${metric.name})`, {
          variant,
        })
      );
    }

    const v1Samples = this.completeSamples(input.v1, 'v1', id);
    const v2Samples = this.completeSamples(input.v2, 'v2', id);

    for (const [variant, samples] of [['v1', v1Samples], ['v2', v2Samples]] as const) {
      if (samples.length === 0) {
        return Err(
          new BoundaryAnalysisError('EmptySampleSet', `Zero ${variant} samples for ${id} (${metric.name})`, {
            variant,
          })
        );
      }

      const invalid = firstNonFinite(samples);
      if (invalid !== undefined) {
        return Err(
          new BoundaryAnalysisError(
            'InvalidParams',
            `Sample must be a finite number (got ${invalid}) for ${variant} at ${id} (${metric.name})`,
            { variant }
          )
        );
      }
    }

    const { outlierK, minValidSamples, confidence, significancePolicy } = this.config;
    const v1Summary = summarizeSamples(v1Samples, outlierK, minValidSamples);
    const v2Summary = summarizeSamples(v2Samples, outlierK, minValidSamples);

    this.logFilter('v1', id, metric.name, v1Summary);
    this.logFilter('v2', id, metric.name, v2Summary);

    const significance = evaluateSignificance(
      v1Summary.aggregate,
      v2Summary.aggregate,
      confidence,
      significancePolicy
    );

    if (significance.failOpen) {
      this.logger?.warn(
        { condition: id, metric: metric.name },
        'Non-finite significance margins; treating difference as significant'
      );
    }

    const baseline = orientAggregate(v2Summary.aggregate, metric.direction);
    if (baseline.mean === 0) {
      this.logger?.warn(
        { condition: id, metric: metric.name, code: 'DegenerateAggregate' satisfies BoundaryErrorCode },
        'Baseline mean is zero; relative difference is not finite'
      );
    }

    const classification = classify(
      orientAggregate(v1Summary.aggregate, metric.direction),
      baseline,
      significance.significant,
      this.config.crossoverThresholdPct,
      toRole(this.config.normallyInferior)
    );

    lazyLog(
      this.logger,
      'debug',
      () => ({
        condition: id,
        metric: metric.name,
        z: significance.z,
        gap: significance.gap,
        requiredGap: significance.requiredGap,
        relativeDiffPct: classification.relativeDiffPct,
      }),
      'Significance evaluated'
    );

    const result: ComparisonResult = {
      condition: input.condition,
      metric: metric.name,
      v1: v1Summary.aggregate,
      v2: v2Summary.aggregate,
      relativeDiffPct: classification.relativeDiffPct,
      significant: significance.significant,
      boundaryType: classification.boundaryType,
      ...(classification.superiorVariant && { superiorVariant: toVariant(classification.superiorVariant) }),
    };

    return Ok(Object.freeze(result));
  }

  /**
   * Compare one condition and record the outcome (result or skip)
   */
  public processCondition(input: ConditionInput): Result<ComparisonResult, BoundaryAnalysisError> {
    const outcome = this.compareCondition(input);

    if (outcome.ok) {
      this.registry.record(outcome.val);
      this.logger?.info(
        {
          condition: conditionId(input.condition),
          metric: outcome.val.metric,
          boundaryType: outcome.val.boundaryType,
          relativeDiffPct: outcome.val.relativeDiffPct,
          superiorVariant: outcome.val.superiorVariant,
        },
        'Condition classified'
      );
      return outcome;
    }

    const error = outcome.val;
    if (!isSkipReason(error.code)) {
      throw error;
    }

    const variant = error.details?.variant;
    const skip: SkippedCondition = Object.freeze({
      condition: input.condition,
      metric: input.metric,
      reason: error.code,
      ...((variant === 'v1' || variant === 'v2') && { variant }),
      message: error.message,
    });

    this.registry.recordSkipped(skip);
    this.logger?.warn(
      { condition: conditionId(input.condition), metric: input.metric, reason: error.code },
      'Condition skipped'
    );

    return outcome;
  }

  /**
   * Analyze a complete set of sample batches.
   *
   * Batches are grouped by (condition, metric); several batches for the same
   * variant are concatenated in arrival order. Conditions are processed in
   * ascending condition order.
   *
   * @throws BoundaryAnalysisError (InvalidParams) for an unknown metric or a
   * non-finite sample, before any condition is processed
   */
  public analyze(batches: Iterable<SampleBatch>): AnalysisRunResult {
    const groups = new Map<string, PendingCondition>();

    for (const batch of batches) {
      this.resolveMetric(batch.metric);

      const invalid = firstNonFinite(batch.samples);
      if (invalid !== undefined) {
        throw new BoundaryAnalysisError(
          'InvalidParams',
          `Sample must be a finite number (got ${invalid}) for ${batch.variant} at ${conditionId(batch.condition)} (${batch.metric})`,
          { variant: batch.variant }
        );
      }

      const key = `${conditionId(batch.condition)}#${batch.metric}`;
      let group = groups.get(key);
      if (!group) {
        group = { condition: batch.condition, metric: batch.metric };
        groups.set(key, group);
      }

      const existing = group[batch.variant] ?? [];
      existing.push(...batch.samples);
      group[batch.variant] = existing;
    }

    const ordered = [...groups.values()].sort(
      (a, b) => compareConditions(a.condition, b.condition) || a.metric.localeCompare(b.metric)
    );
    for (const input of ordered) {
      this.processCondition(input);
    }

    return this.snapshot();
  }

  /**
   * Current registry contents with a run summary
   */
  public snapshot(): AnalysisRunResult {
    const results = this.registry.all();
    const skipped = this.registry.skipped();
    return {
      results,
      skipped,
      summary: summarizeBoundaries(results, skipped),
    };
  }

  private resolveMetric(name: string): MetricDefinition {
    const metric = this.metrics.get(name);
    if (!metric) {
      throw new BoundaryAnalysisError('InvalidParams', `Unknown metric '${name}'`, {
        known: [...this.metrics.keys()],
      });
    }
    return metric;
  }

  private completeSamples(samples: VariantSamples, variant: VariantId, id: string): readonly Sample[] {
    if (samples instanceof SampleSet) {
      if (!samples.isFrozen) {
        throw new InvalidState(`SampleSet for ${variant} at ${id} is still collecting samples`, {
          variant,
          condition: id,
        });
      }
      return samples.values();
    }
    return samples;
  }

  private logFilter(variant: VariantId, id: string, metric: string, summary: SampleSummary): void {
    if (summary.filter.fallback) {
      this.logger?.debug(
        {
          variant,
          condition: id,
          metric,
          totalCount: summary.filter.totalCount,
          code: 'InsufficientValidSamples' satisfies BoundaryErrorCode,
        },
        'Too few samples survived outlier filtering; using unfiltered set'
      );
      return;
    }

    if (summary.filter.removed.length > 0) {
      lazyLog(
        this.logger,
        'debug',
        () => ({
          variant,
          condition: id,
          metric,
          removed: summary.filter.removed,
          mean: summary.filter.mean,
          limit: this.config.outlierK * summary.filter.stdDev,
        }),
        'Outliers removed'
      );
    }
  }
}
