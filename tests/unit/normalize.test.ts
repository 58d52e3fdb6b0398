import { describe, it, expect } from 'vitest';
import {
  boundedScore,
  clamp,
  ecdfPercentile,
  linearScale,
  normalizePoints,
  roundScore,
  summarizeMetric,
} from '@/scoring/normalize';
import type { NormalizationParams } from '@/scoring/scoring_config';

const PARAMS: NormalizationParams = { minPeerSize: 6, center: 50, scale: 15, epsilon: 1e-8 };

describe('normalize', () => {
  describe('clamp', () => {
    it('clamps values below minimum', () => {
      expect(clamp(-10)).toBe(0);
    });

    it('clamps values above maximum', () => {
      expect(clamp(150)).toBe(100);
    });

    it('leaves values in range unchanged', () => {
      expect(clamp(42.5)).toBe(42.5);
    });
  });

  describe('linearScale', () => {
    it('maps the midpoint of the input range to 50', () => {
      expect(linearScale(50, 30, 70)).toBe(50);
    });

    it('clamps outside the input range', () => {
      expect(linearScale(20, 30, 70)).toBe(0);
      expect(linearScale(90, 30, 70)).toBe(100);
    });

    it('returns the output midpoint for a degenerate range', () => {
      expect(linearScale(5, 3, 3)).toBe(50);
    });
  });

  describe('roundScore', () => {
    it('rounds to two decimals by default', () => {
      expect(roundScore(70.04464)).toBe(70.04);
      expect(roundScore(12.345, 1)).toBe(12.3);
    });
  });

  describe('boundedScore', () => {
    it('maps z onto center + scale * z', () => {
      expect(boundedScore(0, PARAMS)).toBe(50);
      expect(boundedScore(1, PARAMS)).toBe(65);
      expect(boundedScore(-2, PARAMS)).toBe(20);
    });

    it('clamps to [0, 100]', () => {
      expect(boundedScore(5, PARAMS)).toBe(100);
      expect(boundedScore(-4, PARAMS)).toBe(0);
    });

    it('returns the center for non-finite input', () => {
      expect(boundedScore(Number.NaN, PARAMS)).toBe(50);
    });
  });

  describe('ecdfPercentile', () => {
    it('uses rank / (n + 1)', () => {
      expect(ecdfPercentile(1, [1, 2, 3])).toBe(25);
      expect(ecdfPercentile(2, [1, 2, 3])).toBe(50);
      expect(ecdfPercentile(3, [1, 2, 3])).toBe(75);
    });

    it('averages ranks for ties', () => {
      expect(ecdfPercentile(2, [2, 2, 3])).toBe(37.5);
    });

    it('inserts an absent value virtually', () => {
      expect(ecdfPercentile(2, [1, 3])).toBe(50);
    });
  });

  describe('normalizePoints', () => {
    it('returns neutral imputed points for a missing value', () => {
      const stats = summarizeMetric([1, 2, 3]);
      expect(normalizePoints(null, stats, 'higher', PARAMS)).toEqual({
        points: 50,
        imputed: true,
        method: 'neutral',
      });
    });

    it('returns neutral points when the peer set has one member', () => {
      expect(normalizePoints(5, summarizeMetric([5]), 'higher', PARAMS)).toEqual({
        points: 50,
        imputed: false,
        method: 'neutral',
      });
      expect(normalizePoints(5, summarizeMetric([]), 'higher', PARAMS).points).toBe(50);
    });

    it('ignores missing peer values when counting', () => {
      const stats = summarizeMetric([1, null, 2, null, 3]);
      expect(stats.n).toBe(3);
      const result = normalizePoints(3, stats, 'higher', PARAMS);
      expect(result.method).toBe('ecdf');
      expect(result.points).toBe(75);
    });

    it('uses the percentile path below the minimum peer size', () => {
      const stats = summarizeMetric([1, 2, 3]);
      expect(normalizePoints(2, stats, 'higher', PARAMS)).toEqual({
        points: 50,
        imputed: false,
        method: 'ecdf',
      });
    });

    it('inverts the percentile for lower-is-better metrics', () => {
      const stats = summarizeMetric([1, 2, 3]);
      expect(normalizePoints(1, stats, 'lower', PARAMS).points).toBe(75);
      expect(normalizePoints(3, stats, 'lower', PARAMS).points).toBe(25);
    });

    it('uses the z-score path at the minimum peer size', () => {
      // mean 35, sample std sqrt(350)
      const stats = summarizeMetric([10, 20, 30, 40, 50, 60]);
      const result = normalizePoints(60, stats, 'higher', PARAMS);
      expect(result.method).toBe('zscore');
      expect(result.points).toBeCloseTo(50 + (15 * 25) / Math.sqrt(350), 10);
      expect(roundScore(result.points)).toBe(70.04);
    });

    it('mirrors z-score points around the center for lower-is-better', () => {
      const stats = summarizeMetric([10, 20, 30, 40, 50, 60]);
      const higher = normalizePoints(60, stats, 'higher', PARAMS).points;
      const lower = normalizePoints(60, stats, 'lower', PARAMS).points;
      expect(higher + lower).toBeCloseTo(100, 10);
    });

    it('counts an absent target towards the peer size', () => {
      // five peers plus the target makes six
      const stats = summarizeMetric([10, 20, 30, 40, 50]);
      expect(normalizePoints(60, stats, 'higher', PARAMS).method).toBe('zscore');
      expect(normalizePoints(30, stats, 'higher', PARAMS).method).toBe('ecdf');
    });

    it('returns neutral points when every peer is tied', () => {
      const stats = summarizeMetric([5, 5, 5, 5, 5, 5]);
      expect(normalizePoints(5, stats, 'higher', PARAMS)).toEqual({
        points: 50,
        imputed: false,
        method: 'neutral',
      });
    });

    it('is monotonic in the value on both paths', () => {
      for (const peers of [[1, 2, 3, 4], [1, 2, 3, 4, 5, 6, 7, 8, 9, 10]]) {
        const stats = summarizeMetric(peers);
        const points = peers.map((v) => normalizePoints(v, stats, 'higher', PARAMS).points);
        for (let i = 1; i < points.length; i++) {
          expect(points[i]).toBeGreaterThan(points[i - 1]);
        }
      }
    });

    it('stays within [0, 100]', () => {
      const stats = summarizeMetric([0, 0, 0, 0, 0, 0, 0, 0, 0, 1000]);
      const top = normalizePoints(1000, stats, 'higher', PARAMS).points;
      const bottom = normalizePoints(1000, stats, 'lower', PARAMS).points;
      expect(top).toBeLessThanOrEqual(100);
      expect(bottom).toBeGreaterThanOrEqual(0);
    });
  });
});
