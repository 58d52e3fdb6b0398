import { describe, expect, it } from 'vitest';
import {
  GUARDRAIL_RULES,
  applyGuardrails,
  bandRank,
  mostConservative,
  scoreToBand,
  type GuardrailInput,
  type GuardrailSettings,
} from '@/scoring/guardrails';
import { testConfig } from '../fixtures/snapshot_factory';

const config = testConfig();
const settings: GuardrailSettings = {
  thresholds: config.guardrails,
  bands: config.bands,
  liquidityBins: config.riskPenalty.liquidityBins,
};

function input(overrides: Partial<GuardrailInput> = {}): GuardrailInput {
  return {
    scorePreGuard: 70,
    confidence: 1,
    imputedFraction: 0,
    sZ: 0,
    riskPenalty: 0,
    mode: 'investor',
    tradedValueCr: 50,
    pledge: 0,
    ...overrides,
  };
}

describe('guardrails', () => {
  describe('scoreToBand', () => {
    it('applies inclusive lower cutoffs', () => {
      expect(scoreToBand(75, config.bands)).toBe('Strong Buy');
      expect(scoreToBand(74.99, config.bands)).toBe('Buy');
      expect(scoreToBand(65, config.bands)).toBe('Buy');
      expect(scoreToBand(50, config.bands)).toBe('Hold');
      expect(scoreToBand(49.99, config.bands)).toBe('Avoid');
    });
  });

  it('orders bands from most to least favorable', () => {
    expect(bandRank('Strong Buy')).toBeLessThan(bandRank('Avoid'));
    expect(mostConservative('Buy', 'Hold')).toBe('Hold');
    expect(mostConservative('Avoid', 'Hold')).toBe('Avoid');
  });

  it('evaluates rules in a fixed order', () => {
    expect(GUARDRAIL_RULES.map((rule) => rule.name)).toEqual([
      'LowDataHold',
      'Illiquidity',
      'PledgeCap',
      'HighRiskCap',
      'SectorBear',
      'LowCoverage',
    ]);
  });

  it('caps low-confidence results at Hold without changing the score', () => {
    const result = applyGuardrails(
      input({ scorePreGuard: 85, confidence: 0.6, imputedFraction: 0.4 }),
      settings
    );
    expect(result.band).toBe('Hold');
    expect(result.score).toBe(85);
    expect(result.bandPreGuard).toBe('Strong Buy');
    expect(result.flags).toEqual(['LowDataHold', 'LowCoverage']);
  });

  it('caps the band in a sector bear market for traders', () => {
    const result = applyGuardrails(input({ mode: 'trader', sZ: -2, scorePreGuard: 80 }), settings);
    expect(result.band).toBe('Hold');
    expect(result.score).toBe(80);
    expect(result.flags).toEqual(['SectorBear']);
  });

  it('lowers the score in a sector bear market for investors', () => {
    const result = applyGuardrails(input({ sZ: -1.8, scorePreGuard: 75 }), settings);
    expect(result.score).toBe(70);
    expect(result.band).toBe('Buy');
    expect(result.flags).toEqual(['SectorBear']);
    expect(result.trace).toEqual([
      {
        flag: 'SectorBear',
        scoreBefore: 75,
        scoreAfter: 70,
        bandBefore: 'Strong Buy',
        bandAfter: 'Buy',
      },
    ]);
  });

  it('keeps a stricter cap when the sector bear penalty is applied', () => {
    const result = applyGuardrails(input({ pledge: 0.2, sZ: -2, scorePreGuard: 80 }), settings);
    expect(result.flags).toEqual(['PledgeCap', 'SectorBear']);
    expect(result.score).toBe(75);
    expect(result.band).toBe('Hold');
  });

  it('rounds the sector bear score to two decimals', () => {
    // 68.13 - 5 is 63.129999999999995 in floating point
    const result = applyGuardrails(input({ sZ: -2, scorePreGuard: 68.13 }), settings);
    expect(result.score).toBe(63.13);
    expect(result.trace[0].scoreAfter).toBe(63.13);
    expect(result.band).toBe('Hold');
  });

  it('can push an investor score into Avoid', () => {
    const result = applyGuardrails(input({ sZ: -1.5, scorePreGuard: 52 }), settings);
    expect(result.score).toBe(47);
    expect(result.band).toBe('Avoid');
  });

  it('leaves a clean result untouched', () => {
    const result = applyGuardrails(input({ sZ: 1, scorePreGuard: 78 }), settings);
    expect(result.flags).toEqual([]);
    expect(result.score).toBe(78);
    expect(result.band).toBe('Strong Buy');
    expect(result.trace).toEqual([]);
  });

  it('fires Illiquidity against the mode liquidity floor', () => {
    expect(applyGuardrails(input({ mode: 'trader', tradedValueCr: 2.5 }), settings).flags).toEqual([
      'Illiquidity',
    ]);
    expect(applyGuardrails(input({ tradedValueCr: 2.5 }), settings).flags).toEqual([]);
    expect(applyGuardrails(input({ tradedValueCr: null }), settings).flags).toEqual(['Illiquidity']);
  });

  it('fires HighRiskCap at the threshold', () => {
    expect(applyGuardrails(input({ riskPenalty: 15 }), settings).flags).toEqual(['HighRiskCap']);
    expect(applyGuardrails(input({ riskPenalty: 14.99 }), settings).flags).toEqual([]);
  });

  it('never raises the band', () => {
    for (const scorePreGuard of [10, 49.99, 50, 64.99, 65, 74.99, 75, 99]) {
      for (const sZ of [-3, -1.5, 0, 2]) {
        for (const confidence of [0.5, 1]) {
          for (const mode of ['trader', 'investor'] as const) {
            const result = applyGuardrails(
              input({ scorePreGuard, sZ, confidence, imputedFraction: 1 - confidence, mode }),
              settings
            );
            expect(bandRank(result.band)).toBeGreaterThanOrEqual(bandRank(result.bandPreGuard));
            expect(result.score).toBeLessThanOrEqual(scorePreGuard);
          }
        }
      }
    }
  });

  it('is deterministic', () => {
    const args = input({ pledge: 0.3, sZ: -2, riskPenalty: 16, scorePreGuard: 81 });
    expect(applyGuardrails(args, settings)).toEqual(applyGuardrails(args, settings));
  });

  it('runs only the rules it is given', () => {
    const result = applyGuardrails(input({ confidence: 0.1 }), settings, []);
    expect(result.flags).toEqual([]);
  });
});
