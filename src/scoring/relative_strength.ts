/**
 * Relative Strength pillar (R)
 * Per horizon: (instrument return - blended sector/market return) divided by
 * the instrument's own volatility over a matching window. Horizon alphas are
 * combined with fixed weights, and R is the percentile rank of that weighted
 * alpha across every instrument scored on the same date.
 */

import { horizonReturn, horizonVolatility, type MarketBenchmark } from './benchmarks';
import { percentileRank } from './normalize';
import type { NormalizationParams, RelativeStrengthParams } from './scoring_config';
import type { SectorMomentumTable } from './sector_momentum';
import { HORIZONS } from './types';
import type {
  Horizon,
  HorizonAlpha,
  HorizonValues,
  InstrumentSnapshot,
  PillarResult,
  RelativeStrengthDetails,
} from './types';

/**
 * Sector and market returns blended by their configured weights. When only
 * one side is known it is used alone.
 */
export function blendedBenchmark(
  sectorReturn: number | null,
  marketReturn: number | null,
  params: RelativeStrengthParams
): number | null {
  if (sectorReturn !== null && marketReturn !== null) {
    return params.sectorWeight * sectorReturn + params.marketWeight * marketReturn;
  }
  return sectorReturn ?? marketReturn;
}

function horizonAlpha(
  snapshot: InstrumentSnapshot,
  horizon: Horizon,
  sectorReturns: HorizonValues<number | null>,
  market: MarketBenchmark,
  params: RelativeStrengthParams,
  epsilon: number
): HorizonAlpha {
  const instrumentReturn = horizonReturn(snapshot.prices, horizon);
  const volatility = horizonVolatility(snapshot.prices, horizon);
  const benchmarkReturn = blendedBenchmark(sectorReturns[horizon], market.returns[horizon], params);
  const weight = params.horizonWeights[horizon];

  if (
    instrumentReturn === null ||
    benchmarkReturn === null ||
    volatility === null ||
    !(volatility > epsilon)
  ) {
    return {
      instrumentReturn,
      benchmarkReturn,
      volatility,
      alpha: 0,
      weight,
      valid: false,
      reason: 'missing_or_invalid_data',
    };
  }

  return {
    instrumentReturn,
    benchmarkReturn,
    volatility,
    alpha: (instrumentReturn - benchmarkReturn) / volatility,
    weight,
    valid: true,
  };
}

const NO_SECTOR_RETURNS: HorizonValues<number | null> = Object.freeze({
  '1m': null,
  '3m': null,
  '6m': null,
});

/** Weighted alphas and their percentile ranks for one date. */
export interface RelativeStrengthTable {
  asOf: string;
  alphas: ReadonlyMap<string, number>;
  ranks: ReadonlyMap<string, number>;
}

interface WeightedAlpha {
  horizons: HorizonValues<HorizonAlpha>;
  weightedAlpha: number;
}

export function calculateWeightedAlpha(
  snapshot: InstrumentSnapshot,
  sectorReturns: HorizonValues<number | null>,
  market: MarketBenchmark,
  params: RelativeStrengthParams,
  epsilon: number
): WeightedAlpha {
  const alpha = (h: Horizon) => horizonAlpha(snapshot, h, sectorReturns, market, params, epsilon);
  const horizons: HorizonValues<HorizonAlpha> = {
    '1m': alpha('1m'),
    '3m': alpha('3m'),
    '6m': alpha('6m'),
  };
  const weightedAlpha = HORIZONS.reduce((sum, h) => sum + horizons[h].alpha * horizons[h].weight, 0);
  return { horizons, weightedAlpha };
}

export function sectorReturnsFor(
  momentum: SectorMomentumTable,
  sector: string
): HorizonValues<number | null> {
  return momentum.sectors.get(sector)?.returns ?? NO_SECTOR_RETURNS;
}

/**
 * Ranks the weighted alpha of every member of one date. `members` must all
 * carry `asOf`; tickers are unique per date.
 */
export function buildRelativeStrengthTable(
  asOf: string,
  members: readonly InstrumentSnapshot[],
  momentum: SectorMomentumTable,
  market: MarketBenchmark,
  params: RelativeStrengthParams,
  epsilon: number
): RelativeStrengthTable {
  const alphas = new Map<string, number>();
  for (const member of members) {
    const { weightedAlpha } = calculateWeightedAlpha(
      member,
      sectorReturnsFor(momentum, member.sector),
      market,
      params,
      epsilon
    );
    alphas.set(member.ticker, weightedAlpha);
  }

  const universe = [...alphas.values()];
  const ranks = new Map<string, number>();
  for (const [ticker, alpha] of alphas) {
    ranks.set(ticker, percentileRank(alpha, universe));
  }

  return { asOf, alphas, ranks };
}

function rankAgainst(table: RelativeStrengthTable, ticker: string, weightedAlpha: number): number {
  if (table.alphas.get(ticker) === weightedAlpha) {
    const rank = table.ranks.get(ticker);
    if (rank !== undefined) return rank;
  }
  const others = [...table.alphas].filter(([other]) => other !== ticker).map(([, alpha]) => alpha);
  return percentileRank(weightedAlpha, [...others, weightedAlpha]);
}

/**
 * R for one instrument. An instrument missing from `table`, or whose alpha
 * differs from the ranked one, is ranked against the table's other members.
 */
export function calculateRelativeStrengthScore(
  snapshot: InstrumentSnapshot,
  sectorReturns: HorizonValues<number | null>,
  market: MarketBenchmark,
  table: RelativeStrengthTable,
  params: RelativeStrengthParams,
  normalization: NormalizationParams
): PillarResult<RelativeStrengthDetails> {
  const { horizons, weightedAlpha } = calculateWeightedAlpha(
    snapshot,
    sectorReturns,
    market,
    params,
    normalization.epsilon
  );
  const rank = rankAgainst(table, snapshot.ticker, weightedAlpha);
  const universeSize = table.alphas.has(snapshot.ticker) ? table.alphas.size : table.alphas.size + 1;

  return {
    score: rank,
    details: { horizons, weightedAlpha, percentileRank: rank, universeSize },
  };
}
