/**
 * Unit tests for math helper utilities
 *
 * Tests safe mathematical operations for empty inputs and non-finite values.
 */

import { describe, it, expect } from 'vitest';
import { allFinite, safeAverage, safeSum } from '../../../src/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('safeAverage', () => {
    it('should return 0 for empty array', () => {
      expect(safeAverage([])).toBe(0);
    });

    it('should return custom default for empty array', () => {
      expect(safeAverage([], 100)).toBe(100);
    });

    it('should calculate correct average for array with values', () => {
      expect(safeAverage([1, 2, 3])).toBe(2);
      expect(safeAverage([10, 20, 30])).toBe(20);
      expect(safeAverage([5])).toBe(5);
    });

    it('should handle floating point numbers correctly', () => {
      expect(safeAverage([1.5, 2.5, 3.5])).toBe(2.5);
      expect(safeAverage([0.1, 0.2, 0.3])).toBeCloseTo(0.2, 10);
    });

    it('should handle negative numbers correctly', () => {
      expect(safeAverage([-1, -2, -3])).toBe(-2);
      expect(safeAverage([-10, 10])).toBe(0);
    });
  });

  describe('safeSum', () => {
    it('should return 0 for empty array', () => {
      expect(safeSum([])).toBe(0);
    });

    it('should return custom default for empty array', () => {
      expect(safeSum([], 100)).toBe(100);
    });

    it('should calculate correct sum for array with values', () => {
      expect(safeSum([1, 2, 3])).toBe(6);
      expect(safeSum([0.1, 0.2, 0.3])).toBeCloseTo(0.6, 10);
      expect(safeSum([-10, 10])).toBe(0);
    });
  });

  describe('allFinite', () => {
    it('should accept finite numbers', () => {
      expect(allFinite(1, 2, 3)).toBe(true);
      expect(allFinite(0, -0.5)).toBe(true);
      expect(allFinite()).toBe(true);
    });

    it('should reject NaN and infinities', () => {
      expect(allFinite(1, Number.NaN)).toBe(false);
      expect(allFinite(Infinity)).toBe(false);
      expect(allFinite(2, -Infinity)).toBe(false);
    });
  });

  describe('Real-World Use Cases', () => {
    it('should handle throughput averaging with no samples', () => {
      const throughputs: number[] = [];
      const avg = safeAverage(throughputs);
      expect(avg).toBe(0);
      expect(Number.isNaN(avg)).toBe(false);
    });

    it('should flag a margin computed from an infinite spread', () => {
      expect(allFinite(1.96 * Infinity, 4)).toBe(false);
    });
  });
});
