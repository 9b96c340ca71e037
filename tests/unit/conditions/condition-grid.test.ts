import { describe, it, expect } from 'vitest';
import { expandConditionGrid, expandSweep, rangeInclusive } from '../../../src/conditions/condition-grid.js';
import { conditionId } from '../../../src/conditions/condition-key.js';
import { captureError } from '../../helpers/capture.js';

describe('Condition grid', () => {
  describe('rangeInclusive', () => {
    it('should include both ends', () => {
      expect(rangeInclusive(0, 10, 5)).toEqual([0, 5, 10]);
      expect(rangeInclusive(20, 26, 2)).toEqual([20, 22, 24, 26]);
    });

    it('should not drift with fractional steps', () => {
      expect(rangeInclusive(0, 0.3, 0.1)).toEqual([0, 0.1, 0.2, 0.3]);
    });

    it('should stop before passing the end', () => {
      expect(rangeInclusive(0, 7, 3)).toEqual([0, 3, 6]);
    });

    it('should return a single value when start equals end', () => {
      expect(rangeInclusive(5, 5, 1)).toEqual([5]);
    });

    it('should reject a non-positive step or a reversed range', () => {
      expect(captureError(() => rangeInclusive(0, 10, 0))).toMatchObject({ code: 'InvalidParams' });
      expect(captureError(() => rangeInclusive(0, 10, -1))).toMatchObject({ code: 'InvalidParams' });
      expect(captureError(() => rangeInclusive(10, 0, 1))).toMatchObject({ code: 'InvalidParams' });
    });
  });

  describe('expandSweep', () => {
    it('should vary delay with fixed loss', () => {
      const keys = expandSweep({ kind: 'delay', delaysMs: { start: 0, end: 4, step: 2 }, lossPct: 1 });

      expect(keys.map(conditionId)).toEqual(['0ms/1%/0Mbps', '2ms/1%/0Mbps', '4ms/1%/0Mbps']);
    });

    it('should vary loss with fixed delay', () => {
      const keys = expandSweep({ kind: 'loss', delayMs: 50, lossesPct: [0, 0.5], bandwidthMbps: 10 });

      expect(keys.map(conditionId)).toEqual(['50ms/0%/10Mbps', '50ms/0.5%/10Mbps']);
    });

    it('should vary bandwidth with fixed delay and loss', () => {
      const keys = expandSweep({ kind: 'bandwidth', delayMs: 100, lossPct: 2, bandwidthsMbps: [1, 5] });

      expect(keys.map(conditionId)).toEqual(['100ms/2%/1Mbps', '100ms/2%/5Mbps']);
    });
  });

  describe('expandConditionGrid', () => {
    it('should deduplicate and sort conditions across sweeps', () => {
      const grid = expandConditionGrid([
        { kind: 'delay', delaysMs: [20, 10], lossPct: 0 },
        { kind: 'bandwidth', delayMs: 10, lossPct: 0, bandwidthsMbps: [5, 0] },
        { kind: 'delay', delaysMs: { start: 10, end: 20, step: 10 }, lossPct: 0 },
      ]);

      expect(grid.map(conditionId)).toEqual(['10ms/0%/0Mbps', '10ms/0%/5Mbps', '20ms/0%/0Mbps']);
    });

    it('should return an empty grid for no sweeps', () => {
      expect(expandConditionGrid([])).toEqual([]);
    });
  });
});
