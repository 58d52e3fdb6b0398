/**
 * Sector Momentum pillar (S)
 *
 * Each sector's equal-weighted return is compared against the distribution of
 * all sector averages on the same date (cross-sector, not within-sector).
 * Horizon z-scores are blended into S_z, which also feeds the SectorBear
 * guardrail. With fewer than two sectors there is no dispersion to measure
 * and S_z is 0 everywhere.
 */

import { finiteValues, mean, sampleStdDev } from '@/utils/stats';
import type { MarketBenchmark } from './benchmarks';
import { boundedScore } from './normalize';
import type { NormalizationParams } from './scoring_config';
import { HORIZONS } from './types';
import type { Horizon, HorizonValues, PillarResult, SectorMomentumDetails } from './types';

export interface SectorMomentumEntry {
  returns: HorizonValues<number | null>;
  horizonZ: HorizonValues<number>;
  sZ: number;
}

export interface SectorMomentumTable {
  asOf: string;
  sectorCount: number;
  market: HorizonValues<number | null>;
  sectors: ReadonlyMap<string, SectorMomentumEntry>;
}

const ZERO_Z: HorizonValues<number> = Object.freeze({ '1m': 0, '3m': 0, '6m': 0 });
const NO_RETURNS: HorizonValues<number | null> = Object.freeze({ '1m': null, '3m': null, '6m': null });

interface Dispersion {
  mean: number;
  std: number;
  count: number;
}

function crossSectorZ(value: number | null, dispersion: Dispersion, epsilon: number): number {
  if (value === null || dispersion.count < 2 || !(dispersion.std > epsilon)) return 0;
  return (value - dispersion.mean) / dispersion.std;
}

/**
 * Builds S_z for every sector present on a date. `sectorReturns` comes from
 * `buildSectorReturns` and `market` from `buildMarketBenchmark` for the same date.
 */
export function buildSectorMomentumTable(
  asOf: string,
  sectorReturns: ReadonlyMap<string, HorizonValues<number | null>>,
  market: MarketBenchmark,
  horizonWeights: Readonly<Record<Horizon, number>>,
  epsilon: number
): SectorMomentumTable {
  const sectorNames = [...sectorReturns.keys()].sort();

  const dispersion = (h: Horizon): Dispersion => {
    // Sector excess over the market return
    const excess = finiteValues(
      sectorNames.map((name) => {
        const value = sectorReturns.get(name)?.[h] ?? null;
        const base = market.returns[h];
        return value === null ? null : value - (base ?? 0);
      })
    );
    return { mean: mean(excess), std: sampleStdDev(excess), count: excess.length };
  };
  const byHorizon: Readonly<Record<Horizon, Dispersion>> = {
    '1m': dispersion('1m'),
    '3m': dispersion('3m'),
    '6m': dispersion('6m'),
  };

  const sectors = new Map<string, SectorMomentumEntry>();
  for (const name of sectorNames) {
    const returns = sectorReturns.get(name) ?? NO_RETURNS;
    const z = (h: Horizon): number => {
      if (sectorNames.length < 2) return 0;
      const value = returns[h];
      const base = market.returns[h];
      return crossSectorZ(value === null ? null : value - (base ?? 0), byHorizon[h], epsilon);
    };
    const horizonZ: HorizonValues<number> = { '1m': z('1m'), '3m': z('3m'), '6m': z('6m') };
    const sZ = HORIZONS.reduce((sum, h) => sum + horizonWeights[h] * horizonZ[h], 0);
    sectors.set(name, Object.freeze({ returns, horizonZ: Object.freeze(horizonZ), sZ }));
  }

  return Object.freeze({
    asOf,
    sectorCount: sectorNames.length,
    market: market.returns,
    sectors,
  });
}

export function sectorZ(table: SectorMomentumTable, sector: string): number {
  return table.sectors.get(sector)?.sZ ?? 0;
}

export function calculateSectorMomentumScore(
  sector: string,
  table: SectorMomentumTable,
  normalization: NormalizationParams
): PillarResult<SectorMomentumDetails> {
  const entry = table.sectors.get(sector);
  const sZ = entry?.sZ ?? 0;

  return {
    score: boundedScore(sZ, normalization),
    details: {
      sectorReturns: entry?.returns ?? NO_RETURNS,
      marketReturns: table.market,
      horizonZ: entry?.horizonZ ?? ZERO_Z,
      sZ,
      sectorCount: table.sectorCount,
    },
  };
}
