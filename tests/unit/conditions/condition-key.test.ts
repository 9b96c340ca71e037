import { describe, it, expect } from 'vitest';
import {
  compareConditions,
  conditionId,
  conditionsEqual,
  createConditionKey,
} from '../../../src/conditions/condition-key.js';

describe('ConditionKey', () => {
  it('should default bandwidth to 0 (not rate limited)', () => {
    expect(createConditionKey(50, 1)).toEqual({ delayMs: 50, lossPct: 1, bandwidthMbps: 0 });
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(createConditionKey(0, 0))).toBe(true);
  });

  it('should format a canonical id', () => {
    expect(conditionId(createConditionKey(50, 1))).toBe('50ms/1%/0Mbps');
    expect(conditionId(createConditionKey(150, 0.5, 20))).toBe('150ms/0.5%/20Mbps');
  });

  it('should compare exactly, without tolerance', () => {
    expect(conditionsEqual(createConditionKey(50, 1), createConditionKey(50, 1, 0))).toBe(true);
    expect(conditionsEqual(createConditionKey(50, 1), createConditionKey(50, 1.0000001))).toBe(false);
  });

  it('should order by delay, then loss, then bandwidth', () => {
    const keys = [
      createConditionKey(100, 0),
      createConditionKey(10, 2),
      createConditionKey(10, 0, 5),
      createConditionKey(10, 0),
    ];

    expect(keys.sort(compareConditions).map(conditionId)).toEqual([
      '10ms/0%/0Mbps',
      '10ms/0%/5Mbps',
      '10ms/2%/0Mbps',
      '100ms/0%/0Mbps',
    ]);
  });
});
