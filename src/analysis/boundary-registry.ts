/**
 * Boundary Registry
 *
 * Keyed store of comparison results for one analysis run, plus the list of
 * conditions that could not be compared. Writes are last-write-wins per
 * (condition, metric); reads come back ordered by condition so report output
 * is deterministic.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { BoundaryType, ComparisonResult, ConditionKey, SkippedCondition } from '../types/boundary.js';
import { compareConditions, conditionId } from '../conditions/condition-key.js';

/**
 * Registry events
 */
export interface BoundaryRegistryEvents {
  recorded: (result: ComparisonResult, replaced: boolean) => void;
  skipped: (skip: SkippedCondition) => void;
}

function entryKey(condition: ConditionKey, metric: string): string {
  return `${conditionId(condition)}#${metric}`;
}

function compareEntries(
  a: { condition: ConditionKey; metric: string },
  b: { condition: ConditionKey; metric: string }
): number {
  return compareConditions(a.condition, b.condition) || a.metric.localeCompare(b.metric);
}

export class BoundaryRegistry extends EventEmitter<BoundaryRegistryEvents> {
  private readonly results = new Map<string, ComparisonResult>();
  private readonly skips = new Map<string, SkippedCondition>();
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = logger;
  }

  /**
   * Insert or overwrite the result for its (condition, metric).
   * A condition that was skipped earlier in the run is no longer skipped.
   */
  public record(result: ComparisonResult): void {
    const key = entryKey(result.condition, result.metric);
    const replaced = this.results.has(key);

    this.results.set(key, result);
    this.skips.delete(key);

    if (replaced) {
      this.logger?.debug(
        { condition: conditionId(result.condition), metric: result.metric },
        'Replaced earlier comparison result'
      );
    }

    this.emit('recorded', result, replaced);
  }

  /**
   * Remember a condition that produced no result.
   * An existing result for the same (condition, metric) is dropped.
   */
  public recordSkipped(skip: SkippedCondition): void {
    const key = entryKey(skip.condition, skip.metric);

    this.results.delete(key);
    this.skips.set(key, skip);

    this.emit('skipped', skip);
  }

  public get(condition: ConditionKey, metric: string): ComparisonResult | undefined {
    return this.results.get(entryKey(condition, metric));
  }

  public getSkipped(condition: ConditionKey, metric: string): SkippedCondition | undefined {
    return this.skips.get(entryKey(condition, metric));
  }

  public has(condition: ConditionKey, metric: string): boolean {
    return this.results.has(entryKey(condition, metric));
  }

  public get size(): number {
    return this.results.size;
  }

  /**
   * All results, ordered by (delay, loss, bandwidth) ascending, then metric
   */
  public all(): ComparisonResult[] {
    return [...this.results.values()].sort(compareEntries);
  }

  /**
   * Results of one boundary type, in the same order as {@link all}
   */
  public byType(boundaryType: BoundaryType): ComparisonResult[] {
    return this.all().filter((result) => result.boundaryType === boundaryType);
  }

  /**
   * Conditions with insufficient data, ordered like {@link all}
   */
  public skipped(): SkippedCondition[] {
    return [...this.skips.values()].sort(compareEntries);
  }

  /**
   * Drop all results and skips (start of a new run)
   */
  public clear(): void {
    this.results.clear();
    this.skips.clear();
  }
}
