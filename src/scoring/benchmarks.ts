/**
 * Universe and sector return benchmarks, computed once per as-of date.
 */

import { finiteValues, mean } from '@/utils/stats';
import type { Horizon, HorizonValues, InstrumentSnapshot, Metric, PriceRecord } from './types';

export interface MarketBenchmark {
  asOf: string;
  /** Equal-weighted average return of every instrument, per horizon. */
  returns: HorizonValues<number | null>;
  instrumentCount: number;
}

export function horizonReturn(prices: PriceRecord, horizon: Horizon): Metric {
  switch (horizon) {
    case '1m':
      return prices.ret21d;
    case '3m':
      return prices.ret63d;
    case '6m':
      return prices.ret126d;
  }
}

/** Volatility window matched to each return horizon. */
export function horizonVolatility(prices: PriceRecord, horizon: Horizon): Metric {
  return horizon === '1m' ? prices.sigma20 : prices.sigma60;
}

function averageOrNull(values: Metric[]): number | null {
  const finite = finiteValues(values);
  return finite.length > 0 ? mean(finite) : null;
}

export function averageReturns(snapshots: readonly InstrumentSnapshot[]): HorizonValues<number | null> {
  return {
    '1m': averageOrNull(snapshots.map((s) => horizonReturn(s.prices, '1m'))),
    '3m': averageOrNull(snapshots.map((s) => horizonReturn(s.prices, '3m'))),
    '6m': averageOrNull(snapshots.map((s) => horizonReturn(s.prices, '6m'))),
  };
}

export function buildMarketBenchmark(
  asOf: string,
  snapshots: readonly InstrumentSnapshot[]
): MarketBenchmark {
  const members = snapshots.filter((s) => s.asOf === asOf);
  return Object.freeze({
    asOf,
    returns: Object.freeze(averageReturns(members)),
    instrumentCount: members.length,
  });
}

/**
 * Equal-weighted sector average returns on `asOf`, keyed by sector, in sorted
 * sector order.
 */
export function buildSectorReturns(
  asOf: string,
  snapshots: readonly InstrumentSnapshot[]
): Map<string, HorizonValues<number | null>> {
  const bySector = new Map<string, InstrumentSnapshot[]>();
  for (const snapshot of snapshots) {
    if (snapshot.asOf !== asOf) continue;
    const group = bySector.get(snapshot.sector);
    if (group) {
      group.push(snapshot);
    } else {
      bySector.set(snapshot.sector, [snapshot]);
    }
  }

  const result = new Map<string, HorizonValues<number | null>>();
  for (const sector of [...bySector.keys()].sort()) {
    result.set(sector, Object.freeze(averageReturns(bySector.get(sector) ?? [])));
  }
  return result;
}
