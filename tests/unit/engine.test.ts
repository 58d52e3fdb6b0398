import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '@/core/errors';
import { buildDateContext, computeScore, contextForSector, scoreBatch } from '@/scoring/engine';
import { validateScoreOutput } from '@/validation/validators';
import { CODE_VERSION } from '@/version';
import {
  emptyBanking,
  emptyOwnership,
  emptyPrices,
  emptyStandard,
  healthyPrices,
  healthyStandard,
  makeSnapshot,
  testConfig,
} from '../fixtures/snapshot_factory';

const config = testConfig();

function universe() {
  return [
    makeSnapshot({ ticker: 'INFRA', prices: healthyPrices({ ret21d: 0.01 }) }),
    makeSnapshot({
      ticker: 'CODEWORKS',
      fundamentals: healthyStandard({ roe3y: 0.22, salesCagr3y: 0.18 }),
      prices: healthyPrices({ ret21d: 0.04, ret63d: 0.09 }),
    }),
    makeSnapshot({
      ticker: 'BYTEHOUSE',
      fundamentals: healthyStandard({ roe3y: 0.08, debtToEquity: 1.4 }),
      prices: healthyPrices({ ret21d: -0.01, ret63d: 0.01 }),
    }),
    makeSnapshot({
      ticker: 'LENDWELL',
      sector: 'banks',
      fundamentals: emptyBanking({ marketCapCr: 60000, roa3y: 0.014, roe3y: 0.15, gnpaPct: 2.5 }),
      prices: healthyPrices({ ret21d: 0.0, ret63d: 0.02 }),
    }),
  ];
}

describe('computeScore', () => {
  it('scores a lone instrument end to end', () => {
    const snapshot = makeSnapshot();
    const dateContext = buildDateContext('2025-03-14', [snapshot], config);
    const output = computeScore(snapshot, contextForSector(dateContext, 'it', config), 'investor');

    expect(output.pillars).toEqual({ F: 50, T: 51.67, R: 50, O: 82, Q: 82, S: 50 });
    // 0.38*50 + 0.10*51.67 + 0.08*50 + 0.18*82 + 0.12*82 + 0.14*50
    expect(output.details.weightedScore).toBe(59.77);
    expect(output.riskPenalty).toBe(0);
    expect(output.confidence).toBe(1);
    expect(output.score).toBe(59.77);
    expect(output.band).toBe('Hold');
    expect(output.guardrailFlags).toEqual([]);
    expect(output.configHash).toBe(config.hash);
    expect(output.codeVersion).toBe(CODE_VERSION);
  });

  it('applies the mode weight vector', () => {
    const snapshot = makeSnapshot();
    const dateContext = buildDateContext('2025-03-14', [snapshot], config);
    const output = computeScore(snapshot, contextForSector(dateContext, 'it', config), 'trader');
    // 0.12*50 + 0.32*51.67 + 0.16*50 + 0.08*82 + 0.04*82 + 0.28*50
    expect(output.score).toBe(54.37);
  });

  it('subtracts the risk penalty before banding', () => {
    const snapshot = makeSnapshot({ prices: healthyPrices({ medianTradedValueCr: 1 }) });
    const dateContext = buildDateContext('2025-03-14', [snapshot], config);
    const output = computeScore(snapshot, contextForSector(dateContext, 'it', config), 'investor');

    expect(output.riskPenalty).toBe(10);
    expect(output.details.scorePreGuard).toBe(
      Math.round((output.details.weightedScore - 10) * 100) / 100
    );
    expect(output.guardrailFlags).toEqual(['Illiquidity']);
  });

  it('caps an instrument with sparse data at Hold', () => {
    const snapshot = makeSnapshot({
      prices: emptyPrices(),
      fundamentals: emptyStandard(),
      ownership: emptyOwnership(),
    });
    const dateContext = buildDateContext('2025-03-14', [snapshot], config);
    const output = computeScore(snapshot, contextForSector(dateContext, 'it', config), 'trader');

    expect(output.confidence).toBe(0);
    expect(output.imputedFraction).toBe(1);
    expect(output.guardrailFlags).toContain('LowDataHold');
    expect(output.guardrailFlags).toContain('LowCoverage');
    expect(output.details.missingFields).toHaveLength(11);
  });

  it('rejects a context built for another sector', () => {
    const snapshots = universe();
    const dateContext = buildDateContext('2025-03-14', snapshots, config);
    const lender = snapshots[3];
    expect(() => computeScore(lender, contextForSector(dateContext, 'it', config), 'trader')).toThrow(
      InvalidInputError
    );
  });
});

describe('scoreBatch', () => {
  it('returns valid outputs sorted by date and ticker', () => {
    const result = scoreBatch(universe(), 'investor', config);

    expect(result.failures).toEqual([]);
    expect(result.outputs.map((o) => o.ticker)).toEqual([
      'BYTEHOUSE',
      'CODEWORKS',
      'INFRA',
      'LENDWELL',
    ]);
    for (const output of result.outputs) {
      expect(validateScoreOutput(output)).toEqual([]);
    }
  });

  it('ranks stronger fundamentals higher within a sector', () => {
    const { outputs } = scoreBatch(universe(), 'investor', config);
    const f = (ticker: string) => outputs.find((o) => o.ticker === ticker)?.pillars.F ?? 0;
    expect(f('CODEWORKS')).toBeGreaterThan(f('INFRA'));
    expect(f('INFRA')).toBeGreaterThan(f('BYTEHOUSE'));
  });

  it('collects per-instrument failures without stopping the batch', () => {
    const snapshots = [
      ...universe(),
      makeSnapshot({ ticker: 'MINER', sector: 'crypto' }),
      makeSnapshot({ ticker: 'bad ticker!' }),
      makeSnapshot({ ticker: 'INFRA' }),
      makeSnapshot({ ticker: 'MISFILED', sector: 'banks', fundamentals: healthyStandard() }),
    ];
    const result = scoreBatch(snapshots, 'trader', config);

    expect(result.outputs.map((o) => o.ticker)).toEqual([
      'BYTEHOUSE',
      'CODEWORKS',
      'INFRA',
      'LENDWELL',
    ]);
    expect(result.failures).toEqual([
      {
        ticker: 'INFRA',
        date: '2025-03-14',
        reason: 'invalid_input: duplicate snapshot for INFRA on 2025-03-14',
      },
      {
        ticker: 'MINER',
        date: '2025-03-14',
        reason: "configuration_error: unknown sector group 'crypto'",
      },
      {
        ticker: 'MISFILED',
        date: '2025-03-14',
        reason: "invalid_input: MISFILED: sector 'banks' expects banking fundamentals",
      },
      {
        ticker: 'bad ticker!',
        date: '2025-03-14',
        reason: "invalid_input: malformed ticker 'bad ticker!'",
      },
    ]);
  });

  it('keeps rejected rows out of benchmarks and peer sets', () => {
    const [, , , lender] = universe();
    const infra = makeSnapshot({ ticker: 'INFRA' });
    const misfiled = makeSnapshot({
      ticker: 'MISFILED',
      sector: 'banks',
      fundamentals: healthyStandard(),
      prices: healthyPrices({ ret21d: 0.5, sigma20: 0.2 }),
    });

    const clean = scoreBatch([lender, infra], 'investor', config);
    const withRejected = scoreBatch([lender, infra, misfiled], 'investor', config);

    expect(withRejected.failures.map((f) => f.ticker)).toEqual(['MISFILED']);
    expect(withRejected.outputs).toEqual(clean.outputs);
  });

  it('ranks relative strength across the date', () => {
    const snapshots = [0, 0.01, 0.15, 0.3].map((ret21d, i) =>
      makeSnapshot({ ticker: `RS${i + 1}`, prices: healthyPrices({ ret21d, sigma20: 0.02 }) })
    );
    const { outputs } = scoreBatch(snapshots, 'investor', config);

    expect(outputs.map((o) => o.pillars.R)).toEqual([25, 50, 75, 100]);
    expect(outputs.map((o) => o.details.relativeStrength.universeSize)).toEqual([4, 4, 4, 4]);
  });

  it('builds peer sets per date', () => {
    const snapshots = [
      ...universe(),
      makeSnapshot({ ticker: 'INFRA', asOf: '2025-03-13' }),
    ];
    const { outputs } = scoreBatch(snapshots, 'investor', config);
    expect(outputs.map((o) => `${o.date}|${o.ticker}`)).toEqual([
      '2025-03-13|INFRA',
      '2025-03-14|BYTEHOUSE',
      '2025-03-14|CODEWORKS',
      '2025-03-14|INFRA',
      '2025-03-14|LENDWELL',
    ]);
    // alone on its date: every cross-sectional input is neutral
    expect(outputs[0].pillars.F).toBe(50);
    expect(outputs[0].pillars.S).toBe(50);
  });

  it('scores sector momentum at 50 in a single-sector universe', () => {
    const { outputs } = scoreBatch(universe().slice(0, 3), 'trader', config);
    for (const output of outputs) {
      expect(output.sZ).toBe(0);
      expect(output.pillars.S).toBe(50);
    }
  });
});
