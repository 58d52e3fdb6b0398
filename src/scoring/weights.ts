/**
 * Weight resolver: pillar weight vector per (sector, mode).
 * A sector override replaces the mode default as a whole.
 */

import { ConfigurationError } from '@/core/errors';
import type { ScoringConfig } from './scoring_config';
import { MODES, PILLAR_KEYS } from './types';
import type { Mode, PillarWeights } from './types';

export const RESOLVED_WEIGHT_TOLERANCE = 1e-9;

export function isConfiguredSector(config: ScoringConfig, sector: string): boolean {
  return config.sectors.includes(sector);
}

export function isBankingSector(config: ScoringConfig, sector: string): boolean {
  return config.bankingSectors.includes(sector);
}

export function resolveWeights(config: ScoringConfig, sector: string, mode: Mode): PillarWeights {
  if (!MODES.includes(mode)) {
    throw new ConfigurationError(`unknown mode '${String(mode)}'`);
  }
  if (!isConfiguredSector(config, sector)) {
    throw new ConfigurationError(`unknown sector group '${sector}'`);
  }

  const modeWeights = config.pillarWeights[mode];
  const weights = modeWeights.sectors[sector] ?? modeWeights.default;

  const total = PILLAR_KEYS.reduce((sum, key) => sum + weights[key], 0);
  if (Math.abs(total - 1) > RESOLVED_WEIGHT_TOLERANCE) {
    throw new ConfigurationError(
      `pillar weights for ${mode}/${sector} sum to ${total.toFixed(12)}, expected 1.0`
    );
  }
  return weights;
}

export interface WeightVectorEntry {
  sector: string;
  mode: Mode;
  weights: PillarWeights;
}

/** Every (sector, mode) pair with its resolved vector, in config order. */
export function listWeightVectors(config: ScoringConfig): WeightVectorEntry[] {
  const entries: WeightVectorEntry[] = [];
  for (const mode of MODES) {
    for (const sector of config.sectors) {
      entries.push({ sector, mode, weights: resolveWeights(config, sector, mode) });
    }
  }
  return entries;
}
