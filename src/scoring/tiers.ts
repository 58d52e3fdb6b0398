/**
 * Tier table helpers shared by the additive pillars and the risk model.
 */

import type { RangeTable, ThresholdBin } from './scoring_config';
import type { Metric, TierAward } from './types';

export function matchesRange(value: number, min?: number, max?: number): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value >= max) return false;
  return true;
}

/** Points for `value` from the first matching rule, or the table's fallback. */
export function tierPoints(value: number, table: RangeTable): number {
  const rule = table.ranges.find((r) => matchesRange(value, r.min, r.max));
  return rule ? rule.points : table.otherwise;
}

/** Missing values contribute nothing and are marked imputed. */
export function tierAward(factor: string, value: Metric, table: RangeTable): TierAward {
  if (value === null) {
    return { factor, value, points: 0, imputed: true };
  }
  return { factor, value, points: tierPoints(value, table), imputed: false };
}

/** Penalty of the first bin whose `above` threshold is exceeded. */
export function binPenalty(value: number, bins: readonly ThresholdBin[]): number {
  const bin = bins.find((b) => value > b.above);
  return bin ? bin.penalty : 0;
}

/**
 * Piecewise-linear interpolation over `(x, y)` knots sorted by x. Values
 * outside the knot range take the nearest end value.
 */
export function interpolate(value: number, knots: ReadonlyArray<readonly [number, number]>): number {
  if (knots.length === 0) return 0;
  const [firstX, firstY] = knots[0];
  if (value <= firstX) return firstY;

  for (let i = 1; i < knots.length; i++) {
    const [x0, y0] = knots[i - 1];
    const [x1, y1] = knots[i];
    if (value <= x1) {
      return y0 + ((value - x0) / (x1 - x0)) * (y1 - y0);
    }
  }
  return knots[knots.length - 1][1];
}

export function sumAwards(awards: readonly TierAward[]): number {
  return awards.reduce((sum, award) => sum + award.points, 0);
}
