import { describe, expect, it } from 'vitest';
import {
  calculateTechnicalScore,
  scoreBreakout,
  scoreRsi,
  scoreVolumeSurprise,
} from '@/scoring/technical';
import { emptyPrices, healthyPrices, testConfig } from '../fixtures/snapshot_factory';

describe('technicals', () => {
  const params = testConfig().technicals;

  it('blends the five components with their weights', () => {
    // trend 100*0.2 + cross 100*0.15 + rsi 50*0.2 + breakout 0 + volume 33.33*0.2
    const result = calculateTechnicalScore(healthyPrices(), params);
    expect(result.score).toBeCloseTo(20 + 15 + 10 + 0 + 20 / 3, 8);
    expect(result.details.missingFields).toEqual([]);
  });

  it('scores every component at 50 when prices are missing', () => {
    const result = calculateTechnicalScore(emptyPrices(), params);
    expect(result.score).toBeCloseTo(50, 10);
    expect(result.details.missingFields).toEqual([
      'above200',
      'goldenCross',
      'rsi',
      'breakout',
      'volume',
    ]);
  });

  describe('scoreRsi', () => {
    it('maps the oversold/overbought band onto 0-100', () => {
      expect(scoreRsi(healthyPrices({ rsi14: 30 }), 0.2, params).value).toBe(0);
      expect(scoreRsi(healthyPrices({ rsi14: 60 }), 0.2, params).value).toBe(75);
      expect(scoreRsi(healthyPrices({ rsi14: 85 }), 0.2, params).value).toBe(100);
    });
  });

  describe('scoreBreakout', () => {
    it('is 0 while the close is below resistance', () => {
      expect(scoreBreakout(healthyPrices({ close: 110, high20: 112 }), 0.25, params).value).toBe(0);
    });

    it('measures the gap against the ATR threshold', () => {
      // resistance 112, gap 1, threshold max(0.75 * 2, 0.01 * 113) = 1.5
      const component = scoreBreakout(healthyPrices({ close: 113, high20: 112 }), 0.25, params);
      expect(component.value).toBeCloseTo(200 / 3, 8);
    });

    it('caps at 100', () => {
      expect(scoreBreakout(healthyPrices({ close: 120, high20: 112 }), 0.25, params).value).toBe(100);
    });

    it('falls back to the close fraction without ATR', () => {
      // gap 2, threshold 0.01 * 114 = 1.14
      const component = scoreBreakout(
        healthyPrices({ close: 114, high20: 112, atr14: null }),
        0.25,
        params
      );
      expect(component.value).toBe(100);
    });
  });

  describe('scoreVolumeSurprise', () => {
    it('needs a full trailing window', () => {
      const prices = healthyPrices({ volumeHistory: Array.from({ length: 19 }, () => 1_000_000) });
      const component = scoreVolumeSurprise(prices, 0.2, params);
      expect(component.value).toBe(50);
      expect(component.imputed).toBe(true);
    });

    it('uses only the most recent window of history', () => {
      const history = [
        ...Array.from({ length: 5 }, () => 5_000_000),
        ...Array.from({ length: 20 }, () => 1_000_000),
      ];
      const prices = healthyPrices({ volume: 2_000_000, volumeHistory: history });
      expect(scoreVolumeSurprise(prices, 0.2, params).value).toBe(100);
    });

    it('scores a volume at the floor ratio as 0', () => {
      const prices = healthyPrices({ volume: 500_000 });
      expect(scoreVolumeSurprise(prices, 0.2, params).value).toBe(0);
    });
  });
});
