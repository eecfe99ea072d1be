/**
 * Descriptive statistics over tracked hours.
 *
 * Pure functions with no knowledge of features or entries. Every function
 * rejects an empty sequence with EmptyInputError instead of dividing by zero.
 */

import { EmptyInputError, ValidationError } from '../models/errors.js';
import { ok, fail } from '../models/outcome.js';
import type { Outcome } from '../models/outcome.js';
import type { StatisticSet } from './types.js';

function requireValues(values: readonly number[], operation: string): void {
  if (values.length === 0) {
    throw new EmptyInputError(operation);
  }
}

function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function mean(values: readonly number[]): number {
  requireValues(values, 'mean');
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

export function median(values: readonly number[]): number {
  requireValues(values, 'median');
  const sorted = sortedCopy(values);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid];
}

/**
 * Linear-interpolation percentile: rank = p/100 x (n - 1), interpolated
 * between the values at floor(rank) and ceil(rank).
 */
export function percentile(values: readonly number[], p: number): number {
  requireValues(values, `P${p}`);
  if (!Number.isFinite(p) || p < 0 || p > 100) {
    throw new ValidationError('percentile', p, 'must be between 0 and 100');
  }

  const sorted = sortedCopy(values);
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  if (lower === upper) {
    return sorted[lower];
  }
  return sorted[lower] + (rank - lower) * (sorted[upper] - sorted[lower]);
}

function sumOfSquaredDeviations(values: readonly number[]): number {
  const avg = mean(values);
  let total = 0;
  for (const value of values) {
    total += (value - avg) ** 2;
  }
  return total;
}

/**
 * Population standard deviation (divides by n). Tracked samples per feature
 * are small and are treated as the whole population of observations.
 */
export function stdDev(values: readonly number[]): number {
  requireValues(values, 'standard deviation');
  return Math.sqrt(sumOfSquaredDeviations(values) / values.length);
}

/**
 * Sample standard deviation (divides by n - 1); 0 for a single value.
 */
export function sampleStdDev(values: readonly number[]): number {
  requireValues(values, 'sample standard deviation');
  if (values.length === 1) return 0;
  return Math.sqrt(sumOfSquaredDeviations(values) / (values.length - 1));
}

export function summarize(values: readonly number[], targetPercentile: number): StatisticSet {
  return {
    count: values.length,
    mean: mean(values),
    median: median(values),
    percentile: percentile(values, targetPercentile),
    stdDev: stdDev(values),
  };
}

/**
 * Like `summarize`, but reports an empty sequence as a failed outcome.
 */
export function trySummarize(
  values: readonly number[],
  targetPercentile: number
): Outcome<StatisticSet, EmptyInputError> {
  try {
    return ok(summarize(values, targetPercentile));
  } catch (error) {
    if (error instanceof EmptyInputError) {
      return fail(error);
    }
    throw error;
  }
}
