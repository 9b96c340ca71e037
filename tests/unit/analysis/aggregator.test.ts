/**
 * Aggregator tests
 */

import { describe, it, expect } from 'vitest';
import { aggregate, summarizeSamples } from '../../../src/analysis/aggregator.js';
import { captureError } from '../../helpers/capture.js';

describe('Aggregator', () => {
  describe('aggregate', () => {
    it('should compute mean, population std and counts', () => {
      const result = aggregate([50, 52, 51, 49], 5);

      expect(result.mean).toBe(50.5);
      // squared deviations 0.25 + 2.25 + 0.25 + 2.25 = 5, / 4 = 1.25
      expect(result.stdDev).toBeCloseTo(Math.sqrt(1.25), 12);
      expect(result.validCount).toBe(4);
      expect(result.totalCount).toBe(5);
    });

    it('should default totalCount to the filtered size', () => {
      expect(aggregate([1, 2, 3]).totalCount).toBe(3);
    });

    it('should return a frozen value', () => {
      expect(Object.isFrozen(aggregate([1]))).toBe(true);
    });

    it('should reject an empty set', () => {
      expect(captureError(() => aggregate([]))).toMatchObject({ code: 'EmptySampleSet' });
    });

    it('should reject a totalCount below the filtered size', () => {
      expect(captureError(() => aggregate([1, 2, 3], 2))).toMatchObject({ code: 'InvalidParams' });
    });
  });

  describe('summarizeSamples', () => {
    it('should aggregate without the outlier when it is removed', () => {
      const { aggregate: result, filter } = summarizeSamples([50, 52, 300, 51, 49], 1.5);

      expect(filter.removed).toEqual([300]);
      expect(result.mean).toBe(50.5);
      expect(result.validCount).toBe(4);
      expect(result.totalCount).toBe(5);
    });

    it('should keep the spike at k = 2 (z-score 1.9999)', () => {
      const { aggregate: result } = summarizeSamples([50, 52, 300, 51, 49], 2);

      expect(result.mean).toBeCloseTo(100.4, 10);
      expect(result.validCount).toBe(5);
    });

    it('should always report at least one valid sample', () => {
      const { aggregate: result, filter } = summarizeSamples([0, 10], 0.5);

      expect(filter.fallback).toBe(true);
      expect(result.validCount).toBe(2);
      expect(result.totalCount).toBe(2);
    });

    it('should be bit-identical across runs', () => {
      const samples = [101.3, 99.7, 100.2, 140.9, 100.05, 99.99];
      const first = summarizeSamples(samples, 2).aggregate;
      const second = summarizeSamples(samples, 2).aggregate;

      expect(Object.is(first.mean, second.mean)).toBe(true);
      expect(Object.is(first.stdDev, second.stdDev)).toBe(true);
      expect(second).toEqual(first);
    });
  });
});
