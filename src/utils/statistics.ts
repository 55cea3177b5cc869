import { QuantileAggregateType } from '../models/tabular-source';

export const QUANTILES: Record<QuantileAggregateType, number> = {
  q25: 0.25,
  median: 0.5,
  q75: 0.75,
};

/**
 * Sample standard deviation (n - 1 denominator) from a count and the sum
 * of squared deviations from the mean.
 *
 * @returns `null` for fewer than two values
 */
export function sampleStdDev(count: number, sumOfSquares: number): number | null {
  if (count < 2) {
    return null;
  }
  return Math.sqrt(Math.max(sumOfSquares, 0) / (count - 1));
}

export function stdDev(values: readonly number[]): number | null {
  if (values.length < 2) {
    return null;
  }

  const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
  const sumOfSquares = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
  return sampleStdDev(values.length, sumOfSquares);
}

/**
 * Position of quantile `q` in `count` ascending values: the index of the
 * lower neighbour and the weight of the upper one.
 */
export function quantilePosition(count: number, q: number): { lower: number; fraction: number } {
  const position = (count - 1) * q;
  const lower = Math.floor(position);
  return { lower, fraction: position - lower };
}

/**
 * Linear interpolation between the two values around `fraction`.
 */
export function interpolate(lower: number, upper: number | undefined, fraction: number): number {
  if (upper === undefined || fraction === 0) {
    return lower;
  }
  return lower + (upper - lower) * fraction;
}

/**
 * Quantile of already sorted values with linear interpolation between
 * closest ranks.
 *
 * @returns `null` for no values
 */
export function quantile(sorted: readonly number[], q: number): number | null {
  if (sorted.length === 0) {
    return null;
  }

  const { lower, fraction } = quantilePosition(sorted.length, q);
  return interpolate(sorted[lower], sorted[lower + 1], fraction);
}
