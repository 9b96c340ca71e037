/**
 * Descriptive Statistics for Benchmark Samples
 *
 * Population statistics (divide by n, not n-1) are used throughout the
 * pipeline: outlier cut-offs, aggregates and significance margins must all
 * agree on the same spread estimate.
 */

import { safeAverage } from '../utils/math-helpers.js';

/**
 * Arithmetic mean (0 for an empty array)
 */
export function mean(values: readonly number[]): number {
  return safeAverage(values);
}

/**
 * Population variance: mean of squared deviations from the mean
 */
export function populationVariance(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const m = mean(values);
  return values.reduce((acc, val) => acc + Math.pow(val - m, 2), 0) / values.length;
}

/**
 * Population standard deviation
 */
export function populationStdDev(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}

/**
 * Standard normal quantile function (inverse CDF)
 *
 * Rational approximation (Acklam), relative error below 1.15e-9.
 */
export function normalQuantile(p: number): number {
  if (p <= 0 || p >= 1) {
    throw new Error('Probability must be between 0 and 1');
  }

  const a = [
    -3.969683028665376e1,
    2.209460984245205e2,
    -2.759285104469687e2,
    1.383577518672690e2,
    -3.066479806614716e1,
    2.506628277459239e0,
  ];

  const b = [
    -5.447609879822406e1,
    1.615858368580409e2,
    -1.556989798598866e2,
    6.680131188771972e1,
    -1.328068155288572e1,
  ];

  const c = [
    -7.784894002430293e-3,
    -3.223964580411365e-1,
    -2.400758277161838e0,
    -2.549732539343734e0,
    4.374664141464968e0,
    2.938163982698783e0,
  ];

  const d = [
    7.784695709041462e-3,
    3.224671290700398e-1,
    2.445134137142996e0,
    3.754408661907416e0,
  ];

  const pLow = 0.02425;
  const pHigh = 1 - pLow;

  if (p < pLow) {
    const q = Math.sqrt(-2 * Math.log(p));
    return (
      (((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
    );
  } else if (p <= pHigh) {
    const q = p - 0.5;
    const r = q * q;
    return (
      ((((((a[0] * r + a[1]) * r + a[2]) * r + a[3]) * r + a[4]) * r + a[5]) * q) /
      (((((b[0] * r + b[1]) * r + b[2]) * r + b[3]) * r + b[4]) * r + 1)
    );
  } else {
    const q = Math.sqrt(-2 * Math.log(1 - p));
    return (
      -(((((c[0] * q + c[1]) * q + c[2]) * q + c[3]) * q + c[4]) * q + c[5]) /
      ((((d[0] * q + d[1]) * q + d[2]) * q + d[3]) * q + 1)
    );
  }
}
