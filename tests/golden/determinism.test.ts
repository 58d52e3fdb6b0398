import { describe, it, expect } from 'vitest';
import { scoreBatch } from '@/scoring/engine';
import { contentHash } from '@/utils/hash';
import {
  healthyPrices,
  healthyStandard,
  makeSnapshot,
  testConfig,
} from '../fixtures/snapshot_factory';

const config = testConfig();

function batch() {
  return [
    makeSnapshot({ ticker: 'INFRA' }),
    makeSnapshot({
      ticker: 'CODEWORKS',
      fundamentals: healthyStandard({ roe3y: 0.22, pe: 31 }),
      prices: healthyPrices({ ret63d: 0.09 }),
    }),
    makeSnapshot({
      ticker: 'BYTEHOUSE',
      fundamentals: healthyStandard({ roe3y: 0.08, debtToEquity: 1.4 }),
      prices: healthyPrices({ ret63d: -0.02, rsi14: 38 }),
    }),
    makeSnapshot({ ticker: 'GRAINCO', sector: 'fmcg', prices: healthyPrices({ ret63d: 0.03 }) }),
    makeSnapshot({ ticker: 'SOAPWORKS', sector: 'fmcg' }),
    makeSnapshot({ ticker: 'INFRA', asOf: '2025-03-13', prices: healthyPrices({ close: 108 }) }),
    makeSnapshot({ ticker: 'CODEWORKS', asOf: '2025-03-13' }),
  ];
}

describe('determinism', () => {
  it('produces identical outputs for the same batch', () => {
    const first = scoreBatch(batch(), 'investor', config);
    const second = scoreBatch(batch(), 'investor', config);

    expect(second).toEqual(first);
    expect(contentHash(second.outputs)).toBe(contentHash(first.outputs));
  });

  it('does not depend on input order', () => {
    const forward = scoreBatch(batch(), 'trader', config);
    const reversed = scoreBatch([...batch()].reverse(), 'trader', config);

    expect(reversed.outputs).toEqual(forward.outputs);
  });

  it('orders outputs by date then ticker', () => {
    const keys = scoreBatch(batch(), 'investor', config).outputs.map((o) => `${o.date} ${o.ticker}`);
    expect(keys).toEqual([
      '2025-03-13 CODEWORKS',
      '2025-03-13 INFRA',
      '2025-03-14 BYTEHOUSE',
      '2025-03-14 CODEWORKS',
      '2025-03-14 GRAINCO',
      '2025-03-14 INFRA',
      '2025-03-14 SOAPWORKS',
    ]);
  });

  it('keeps dates independent of each other', () => {
    const full = scoreBatch(batch(), 'investor', config).outputs.filter((o) => o.date === '2025-03-14');
    const single = scoreBatch(
      batch().filter((s) => s.asOf === '2025-03-14'),
      'investor',
      config
    ).outputs;

    expect(single).toEqual(full);
  });
});
