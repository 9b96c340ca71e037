/**
 * Condition key identity and ordering.
 *
 * Two conditions are the same scenario only when all three numbers match
 * exactly; there is no tolerance.
 */

import type { ConditionKey } from '../types/boundary.js';

/**
 * Create a condition key (bandwidth defaults to 0 = not rate limited)
 */
export function createConditionKey(delayMs: number, lossPct: number, bandwidthMbps = 0): ConditionKey {
  return Object.freeze({ delayMs, lossPct, bandwidthMbps });
}

/**
 * Canonical string id, e.g. `50ms/1%/0Mbps`
 */
export function conditionId(key: ConditionKey): string {
  return `${key.delayMs}ms/${key.lossPct}%/${key.bandwidthMbps}Mbps`;
}

export function conditionsEqual(a: ConditionKey, b: ConditionKey): boolean {
  return a.delayMs === b.delayMs && a.lossPct === b.lossPct && a.bandwidthMbps === b.bandwidthMbps;
}

/**
 * Ascending order by (delay, loss, bandwidth)
 */
export function compareConditions(a: ConditionKey, b: ConditionKey): number {
  return a.delayMs - b.delayMs || a.lossPct - b.lossPct || a.bandwidthMbps - b.bandwidthMbps;
}
