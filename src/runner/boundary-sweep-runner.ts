/**
 * Boundary Sweep Runner
 *
 * Drives a benchmark sweep over a list of network conditions:
 * - Applies one condition at a time through the network controller
 * - Runs the configured number of trials per variant, sequentially
 * - Freezes the collected samples and hands them to the BoundaryPipeline
 * - Always resets the network controller, also on failure or cancellation;
 *   a reset failure after an earlier error is logged, not rethrown
 *
 * Failed trials are logged and dropped. A variant without any usable trial
 * ends up as a skipped condition, not as a failed run.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { BoundaryAnalysisError } from '../api/errors.js';
import { BoundaryPipeline, type AnalysisRunResult } from '../analysis/boundary-pipeline.js';
import { SampleSet } from '../analysis/sample-set.js';
import { conditionId } from '../conditions/condition-key.js';
import { RUNNER } from '../config/defaults.js';
import type {
  ComparisonResult,
  ConditionKey,
  RunnerSettings,
  SkippedCondition,
  VariantId,
} from '../types/boundary.js';
import { resultify } from '../utils/result-helpers.js';

/**
 * Capability handle for the emulated network (e.g. tc/netem on a router).
 * Only the runner holds it; analysis code never touches network state.
 */
export interface NetworkConditionController {
  apply(condition: ConditionKey): Promise<void>;
  reset(): Promise<void>;
}

/**
 * Metric values of one trial, keyed by metric name
 */
export type TrialMeasurement = Readonly<Record<string, number>>;

/**
 * Runs one benchmark trial of a variant under the currently applied condition
 */
export interface BenchmarkExecutor {
  run(variant: VariantId, condition: ConditionKey, signal?: AbortSignal): Promise<TrialMeasurement>;
}

/**
 * Runner events
 */
export interface SweepRunnerEvents {
  conditionStarted: (condition: ConditionKey, index: number, total: number) => void;
  trialCompleted: (condition: ConditionKey, variant: VariantId, trial: number, measurement: TrialMeasurement) => void;
  trialFailed: (condition: ConditionKey, variant: VariantId, trial: number, error: Error) => void;
  conditionCompleted: (condition: ConditionKey, results: ComparisonResult[]) => void;
  conditionSkipped: (skip: SkippedCondition) => void;
}

export interface BoundarySweepRunnerOptions extends Partial<RunnerSettings> {
  network: NetworkConditionController;
  executor: BenchmarkExecutor;

  /** Pipeline that receives the samples (default: pipeline with default analysis config) */
  pipeline?: BoundaryPipeline;

  logger?: Logger;

  /** Order in which variants are measured under each condition */
  variantOrder?: readonly VariantId[];
}

const DEFAULT_VARIANT_ORDER: readonly VariantId[] = ['v1', 'v2'];

function cancelled(): BoundaryAnalysisError {
  return new BoundaryAnalysisError('Cancelled', 'Sweep cancelled by caller');
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelled();
  }
}

/**
 * Sleep helper aware of AbortSignal
 */
async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);

  if (ms <= 0) {
    return;
  }

  if (!signal) {
    await new Promise((resolve) => setTimeout(resolve, ms));
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      reject(cancelled());
    };

    signal.addEventListener('abort', onAbort);
  });
}

export class BoundarySweepRunner extends EventEmitter<SweepRunnerEvents> {
  public readonly pipeline: BoundaryPipeline;
  public readonly settings: Readonly<RunnerSettings>;

  private readonly network: NetworkConditionController;
  private readonly executor: BenchmarkExecutor;
  private readonly logger?: Logger;
  private readonly variantOrder: readonly VariantId[];

  constructor(options: BoundarySweepRunnerOptions) {
    super();

    this.settings = Object.freeze({
      trialsPerCondition: options.trialsPerCondition ?? RUNNER.TRIALS_PER_CONDITION,
      settleDelayMs: options.settleDelayMs ?? RUNNER.SETTLE_DELAY_MS,
      trialIntervalMs: options.trialIntervalMs ?? RUNNER.TRIAL_INTERVAL_MS,
    });
    this.network = options.network;
    this.executor = options.executor;
    this.logger = options.logger;
    this.pipeline = options.pipeline ?? new BoundaryPipeline({}, { logger: options.logger });
    this.variantOrder = options.variantOrder ?? DEFAULT_VARIANT_ORDER;

    this.validateSettings();
  }

  private validateSettings(): void {
    const { trialsPerCondition, settleDelayMs, trialIntervalMs } = this.settings;

    if (!Number.isInteger(trialsPerCondition) || trialsPerCondition < 1) {
      throw new BoundaryAnalysisError('InvalidParams', `trialsPerCondition must be an integer >= 1 (got ${trialsPerCondition})`);
    }
    if (!(settleDelayMs >= 0) || !(trialIntervalMs >= 0)) {
      throw new BoundaryAnalysisError('InvalidParams', 'Runner delays must be >= 0');
    }
    if (this.variantOrder.length !== 2 || new Set(this.variantOrder).size !== 2) {
      throw new BoundaryAnalysisError('InvalidParams', 'variantOrder must list v1 and v2 exactly once');
    }
  }

  /**
   * Run the sweep over all conditions, in the given order.
   *
   * @throws BoundaryAnalysisError (Cancelled) when the signal aborts
   */
  async run(conditions: readonly ConditionKey[], signal?: AbortSignal): Promise<AnalysisRunResult> {
    const startTime = Date.now();
    this.logger?.info(
      { conditions: conditions.length, ...this.settings },
      'Starting boundary sweep'
    );

    for (let i = 0; i < conditions.length; i++) {
      this.emit('conditionStarted', conditions[i], i, conditions.length);
      await this.runCondition(conditions[i], signal);
    }

    const outcome = this.pipeline.snapshot();
    this.logger?.info(
      {
        durationMs: Date.now() - startTime,
        results: outcome.results.length,
        boundaries: outcome.summary.boundaryCount,
        skipped: outcome.skipped.length,
      },
      'Boundary sweep complete'
    );

    return outcome;
  }

  /**
   * Measure and classify one condition.
   *
   * The pipeline only sees samples after every trial of the condition has
   * finished.
   */
  async runCondition(condition: ConditionKey, signal?: AbortSignal): Promise<ComparisonResult[]> {
    throwIfAborted(signal);

    const id = conditionId(condition);
    const metrics = this.pipeline.metricNames;
    const sets = new Map<VariantId, Map<string, SampleSet>>(
      this.variantOrder.map((variant) => [
        variant,
        new Map(metrics.map((metric) => [metric, new SampleSet(variant, condition, metric)])),
      ])
    );

    try {
      await this.network.apply(condition);
      this.logger?.debug({ condition: id }, 'Network condition applied');
      await delay(this.settings.settleDelayMs, signal);

      let first = true;
      for (const variant of this.variantOrder) {
        for (let trial = 1; trial <= this.settings.trialsPerCondition; trial++) {
          if (!first) {
            await delay(this.settings.trialIntervalMs, signal);
          }
          first = false;

          await this.runTrial(condition, variant, trial, sets.get(variant), signal);
        }
      }
    } catch (error) {
      await this.resetAfterFailure(id);
      throw error;
    }

    await this.network.reset();

    const results: ComparisonResult[] = [];
    for (const metric of metrics) {
      const v1 = sets.get('v1')?.get(metric)?.freeze();
      const v2 = sets.get('v2')?.get(metric)?.freeze();
      const outcome = this.pipeline.processCondition({ condition, metric, v1, v2 });

      if (outcome.ok) {
        results.push(outcome.val);
        continue;
      }

      const skip = this.pipeline.registry.getSkipped(condition, metric);
      if (skip) {
        this.emit('conditionSkipped', skip);
      }
    }

    this.emit('conditionCompleted', condition, results);
    return results;
  }

  /**
   * Reset the network after a failed or cancelled condition. A reset failure
   * is logged so that the error that ended the condition is the one the
   * caller sees.
   */
  private async resetAfterFailure(id: string): Promise<void> {
    const reset = await resultify(this.network.reset());
    if (!reset.ok) {
      this.logger?.error(
        { condition: id, error: reset.val.message },
        'Network reset failed after condition failure'
      );
    }
  }

  private async runTrial(
    condition: ConditionKey,
    variant: VariantId,
    trial: number,
    sets: Map<string, SampleSet> | undefined,
    signal?: AbortSignal
  ): Promise<void> {
    throwIfAborted(signal);

    const outcome = await resultify(this.executor.run(variant, condition, signal));

    if (!outcome.ok) {
      throwIfAborted(signal);
      this.logger?.warn(
        { condition: conditionId(condition), variant, trial, error: outcome.val.message },
        'Benchmark trial failed'
      );
      this.emit('trialFailed', condition, variant, trial, outcome.val);
      return;
    }

    const measurement = outcome.val;
    for (const [metric, set] of sets ?? []) {
      const value = measurement[metric];
      if (typeof value === 'number' && Number.isFinite(value)) {
        set.append(value);
      } else {
        this.logger?.warn(
          { condition: conditionId(condition), variant, trial, metric, value },
          'Trial measurement has no usable value for metric'
        );
      }
    }

    this.emit('trialCompleted', condition, variant, trial, measurement);
  }
}
