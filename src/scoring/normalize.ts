/**
 * Score normalization utilities
 * All points are normalized to 0-100 scale, 100 = best within the peer set
 *
 * Two paths:
 *   - peer count >= minPeerSize: z-score against the peer mean and sample
 *     standard deviation, mapped with center + scale * z and clamped
 *   - smaller peer sets: empirical percentile with average ranks for ties
 */

import { finiteValues, mean, sampleStdDev } from '@/utils/stats';
import type { NormalizationParams } from './scoring_config';
import type { Direction, Metric, PointsResult } from './types';

export const NEUTRAL_POINTS = 50;

export function clamp(value: number, min: number = 0, max: number = 100): number {
  return Math.min(Math.max(value, min), max);
}

export function linearScale(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number = 0,
  outputMax: number = 100
): number {
  if (inputMax === inputMin) return (outputMin + outputMax) / 2;

  const normalized = (value - inputMin) / (inputMax - inputMin);
  return clamp(outputMin + normalized * (outputMax - outputMin), outputMin, outputMax);
}

export function roundScore(score: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}

/**
 * Maps an unbounded z-like value onto [0, 100]. Shared by the z-score path,
 * Relative Strength and Sector Momentum so all three use one curve.
 */
export function boundedScore(z: number, params: NormalizationParams): number {
  if (!Number.isFinite(z)) return params.center;
  return clamp(params.center + params.scale * z);
}

export interface MetricStats {
  /** Count of finite peer values. */
  n: number;
  mean: number;
  std: number;
  sorted: readonly number[];
}

export const EMPTY_STATS: MetricStats = Object.freeze({
  n: 0,
  mean: NaN,
  std: 0,
  sorted: Object.freeze([]),
});

export function summarizeMetric(values: ReadonlyArray<Metric>): MetricStats {
  const finite = finiteValues(values).sort((a, b) => a - b);
  return {
    n: finite.length,
    mean: mean(finite),
    std: sampleStdDev(finite),
    sorted: finite,
  };
}

/**
 * Average-rank percentile of `value` among `sorted`. The value is treated as a
 * member of the set; if no equal entry exists it is inserted virtually.
 */
export function ecdfPercentile(value: number, sorted: readonly number[]): number {
  let less = 0;
  let equal = 0;
  for (const peer of sorted) {
    if (peer < value) less++;
    else if (peer === value) equal++;
  }
  const n = equal > 0 ? sorted.length : sorted.length + 1;
  const ties = Math.max(equal, 1);
  const rank = less + (ties + 1) / 2;
  return (rank / (n + 1)) * 100;
}

/**
 * Average-rank percentile on a rank / n scale, so the best member scores 100.
 * `value` must be one of `values`. A set of one is neutral.
 */
export function percentileRank(value: number, values: readonly number[]): number {
  if (values.length <= 1) return NEUTRAL_POINTS;
  let less = 0;
  let equal = 0;
  for (const other of values) {
    if (other < value) less++;
    else if (other === value) equal++;
  }
  const rank = less + (Math.max(equal, 1) + 1) / 2;
  return clamp((rank / values.length) * 100);
}

export function normalizePoints(
  value: Metric,
  stats: MetricStats,
  direction: Direction,
  params: NormalizationParams
): PointsResult {
  if (value === null || !Number.isFinite(value)) {
    return { points: NEUTRAL_POINTS, imputed: true, method: 'neutral' };
  }

  const containsValue = stats.sorted.includes(value);
  const effectiveN = containsValue ? stats.n : stats.n + 1;
  if (effectiveN <= 1) {
    return { points: NEUTRAL_POINTS, imputed: false, method: 'neutral' };
  }

  if (effectiveN >= params.minPeerSize) {
    if (!Number.isFinite(stats.std) || stats.std <= params.epsilon || !Number.isFinite(stats.mean)) {
      // Degenerate variance: every peer is tied
      return { points: NEUTRAL_POINTS, imputed: false, method: 'neutral' };
    }
    const z = (value - stats.mean) / stats.std;
    const directed = direction === 'lower' ? -z : z;
    return { points: boundedScore(directed, params), imputed: false, method: 'zscore' };
  }

  const percentile = ecdfPercentile(value, stats.sorted);
  const points = direction === 'lower' ? 100 - percentile : percentile;
  return { points: clamp(points), imputed: false, method: 'ecdf' };
}
