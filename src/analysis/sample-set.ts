/**
 * SampleSet
 *
 * Ordered samples for one (variant, condition, metric). Samples are appended
 * while a measurement round is running; `freeze()` ends the round and the set
 * is read-only from then on. A new round builds a new SampleSet.
 */

import { BoundaryAnalysisError } from '../api/errors.js';
import { InvalidState } from '../utils/result-helpers.js';
import type { ConditionKey, Sample, SampleBatch, VariantId } from '../types/boundary.js';
import { conditionId } from '../conditions/condition-key.js';

export class SampleSet {
  public readonly variant: VariantId;
  public readonly condition: ConditionKey;
  public readonly metric: string;

  private readonly samples: Sample[] = [];
  private frozen = false;

  constructor(variant: VariantId, condition: ConditionKey, metric: string) {
    this.variant = variant;
    this.condition = condition;
    this.metric = metric;
  }

  /**
   * Build a frozen set from a batch delivered by the benchmark executor
   */
  public static fromBatch(batch: SampleBatch): SampleSet {
    const set = new SampleSet(batch.variant, batch.condition, batch.metric);
    for (const sample of batch.samples) {
      set.append(sample);
    }
    return set.freeze();
  }

  /**
   * Append one trial measurement.
   *
   * @throws InvalidState if the round has already ended
   * @throws BoundaryAnalysisError (InvalidParams) for NaN or infinite samples
   */
  public append(sample: Sample): this {
    if (this.frozen) {
      throw new InvalidState('Cannot append to a frozen SampleSet', {
        variant: this.variant,
        condition: conditionId(this.condition),
        metric: this.metric,
      });
    }

    if (!Number.isFinite(sample)) {
      throw new BoundaryAnalysisError('InvalidParams', `Sample must be a finite number (got ${sample})`, {
        variant: this.variant,
        condition: conditionId(this.condition),
        metric: this.metric,
      });
    }

    this.samples.push(sample);
    return this;
  }

  /**
   * End the measurement round
   */
  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public get size(): number {
    return this.samples.length;
  }

  public get isEmpty(): boolean {
    return this.samples.length === 0;
  }

  /**
   * Snapshot of the samples in insertion order
   */
  public values(): readonly Sample[] {
    return Object.freeze([...this.samples]);
  }
}
