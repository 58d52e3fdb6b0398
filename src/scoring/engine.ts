/**
 * Scoring Engine
 * Orchestrates the pillar calculators, weighting, risk penalty, coverage and
 * guardrails for one instrument, and wraps that over a batch of snapshots
 * sharing per-date peer and benchmark data.
 */

import { ConfigurationError, InvalidInputError, errorMessage } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { validateMode, validateSnapshot } from '@/validation/validators';
import { CODE_VERSION } from '@/version';
import { buildMarketBenchmark, buildSectorReturns, type MarketBenchmark } from './benchmarks';
import { calculateCoverage } from './confidence';
import { calculateFundamentalsScore } from './fundamental';
import { applyGuardrails } from './guardrails';
import { clamp, roundScore } from './normalize';
import { calculateOwnershipScore } from './ownership';
import { buildPeerSet, type PeerSet } from './peer_set';
import { calculateQualityScore } from './quality';
import {
  buildRelativeStrengthTable,
  calculateRelativeStrengthScore,
  sectorReturnsFor,
  type RelativeStrengthTable,
} from './relative_strength';
import { calculateRiskPenalty, tradedValueCr } from './risk_penalty';
import { getScoringConfig, type ScoringConfig } from './scoring_config';
import {
  buildSectorMomentumTable,
  calculateSectorMomentumScore,
  type SectorMomentumTable,
} from './sector_momentum';
import { calculateTechnicalScore } from './technical';
import { PILLAR_KEYS } from './types';
import type {
  BatchResult,
  InstrumentSnapshot,
  Mode,
  PillarScores,
  PillarWeights,
  ScoreFailure,
  ScoreOutput,
} from './types';
import {
  RESOLVED_WEIGHT_TOLERANCE,
  isBankingSector,
  isConfiguredSector,
  listWeightVectors,
  resolveWeights,
} from './weights';

const logger = createChildLogger('scoring_engine');

export interface ScoringContext {
  peerSet: PeerSet;
  market: MarketBenchmark;
  momentum: SectorMomentumTable;
  relativeStrength: RelativeStrengthTable;
  config: ScoringConfig;
  /** Explicit weight vector; resolved from config by (sector, mode) when absent. */
  weights?: PillarWeights;
}

/** Read-only aggregates shared by every instrument on one date. */
export interface DateContext {
  asOf: string;
  market: MarketBenchmark;
  momentum: SectorMomentumTable;
  relativeStrength: RelativeStrengthTable;
  peerSets: ReadonlyMap<string, PeerSet>;
}

export function buildDateContext(
  asOf: string,
  snapshots: readonly InstrumentSnapshot[],
  config: ScoringConfig
): DateContext {
  const members = snapshots.filter((s) => s.asOf === asOf);
  const market = buildMarketBenchmark(asOf, members);
  const momentum = buildSectorMomentumTable(
    asOf,
    buildSectorReturns(asOf, members),
    market,
    config.sectorMomentum.horizonWeights,
    config.normalization.epsilon
  );
  const relativeStrength = buildRelativeStrengthTable(
    asOf,
    members,
    momentum,
    market,
    config.relativeStrength,
    config.normalization.epsilon
  );

  const peerSets = new Map<string, PeerSet>();
  for (const sector of [...new Set(members.map((s) => s.sector))].sort()) {
    peerSets.set(sector, buildPeerSet(sector, asOf, members));
  }

  return { asOf, market, momentum, relativeStrength, peerSets };
}

export function contextForSector(
  dateContext: DateContext,
  sector: string,
  config: ScoringConfig
): ScoringContext {
  return {
    peerSet: dateContext.peerSets.get(sector) ?? buildPeerSet(sector, dateContext.asOf, []),
    market: dateContext.market,
    momentum: dateContext.momentum,
    relativeStrength: dateContext.relativeStrength,
    config,
  };
}

function checkWeights(weights: PillarWeights, label: string): PillarWeights {
  const total = PILLAR_KEYS.reduce((sum, key) => sum + weights[key], 0);
  if (Math.abs(total - 1) > RESOLVED_WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`${label} weights sum to ${total.toFixed(12)}, expected 1.0`);
  }
  return weights;
}

function assertContextMatches(snapshot: InstrumentSnapshot, context: ScoringContext): void {
  const { peerSet, market, momentum, relativeStrength } = context;
  if (peerSet.sector !== snapshot.sector) {
    throw new InvalidInputError(
      `${snapshot.ticker}: peer set is for sector '${peerSet.sector}', instrument is '${snapshot.sector}'`
    );
  }
  for (const [label, asOf] of [
    ['peer set', peerSet.asOf],
    ['market benchmark', market.asOf],
    ['sector momentum', momentum.asOf],
    ['relative strength', relativeStrength.asOf],
  ] as const) {
    if (asOf !== snapshot.asOf) {
      throw new InvalidInputError(
        `${snapshot.ticker}: ${label} is dated ${asOf}, instrument is dated ${snapshot.asOf}`
      );
    }
  }
}

/**
 * The sector must be configured and the fundamentals variant must match it.
 */
function assertSectorAccepts(config: ScoringConfig, snapshot: InstrumentSnapshot): void {
  const { sector } = snapshot;
  if (!isConfiguredSector(config, sector)) {
    throw new ConfigurationError(`unknown sector group '${sector}'`);
  }
  const expectsBanking = isBankingSector(config, sector);
  if (expectsBanking !== (snapshot.fundamentals.kind === 'banking')) {
    throw new InvalidInputError(
      `${snapshot.ticker}: sector '${sector}' expects ${expectsBanking ? 'banking' : 'standard'} fundamentals`
    );
  }
}

/**
 * Scores one instrument. Throws InvalidInputError for malformed input and
 * ConfigurationError for an unconfigured sector or a bad weight vector;
 * missing metrics never throw.
 */
export function computeScore(
  snapshot: InstrumentSnapshot,
  context: ScoringContext,
  mode: Mode
): ScoreOutput {
  const resolvedMode = validateMode(mode);
  validateSnapshot(snapshot);
  assertContextMatches(snapshot, context);

  const { config, peerSet, market, momentum } = context;
  const { sector } = snapshot;
  assertSectorAccepts(config, snapshot);

  const weights = context.weights
    ? checkWeights(context.weights, `${resolvedMode}/${sector}`)
    : resolveWeights(config, sector, resolvedMode);

  // 1. Pillars
  const fundamentals = calculateFundamentalsScore(snapshot, peerSet, config);
  const technicals = calculateTechnicalScore(snapshot.prices, config.technicals);
  const relativeStrength = calculateRelativeStrengthScore(
    snapshot,
    sectorReturnsFor(momentum, sector),
    market,
    context.relativeStrength,
    config.relativeStrength,
    config.normalization
  );
  const ownership = calculateOwnershipScore(snapshot, config.ownership);
  const quality = calculateQualityScore(snapshot.fundamentals, config.quality);
  const sectorMomentum = calculateSectorMomentumScore(sector, momentum, config.normalization);

  const pillars: PillarScores = {
    F: roundScore(fundamentals.score),
    T: roundScore(technicals.score),
    R: roundScore(relativeStrength.score),
    O: roundScore(ownership.score),
    Q: roundScore(quality.score),
    S: roundScore(sectorMomentum.score),
  };

  // 2-3. Weighted pre-penalty score
  const weightedScore = roundScore(
    PILLAR_KEYS.reduce((sum, key) => sum + pillars[key] * weights[key], 0)
  );

  // 4-5. Risk penalty
  const risk = calculateRiskPenalty(snapshot, resolvedMode, peerSet, config.riskPenalty);
  const scorePreGuard = roundScore(clamp(Math.max(0, weightedScore - risk.penalty)));

  // 6. Coverage
  const coverage = calculateCoverage(snapshot);

  // 7. Guardrails
  const sZ = sectorMomentum.details.sZ;
  const guard = applyGuardrails(
    {
      scorePreGuard,
      confidence: coverage.confidence,
      imputedFraction: coverage.imputedFraction,
      sZ,
      riskPenalty: risk.penalty,
      mode: resolvedMode,
      tradedValueCr: tradedValueCr(snapshot.prices),
      pledge: snapshot.ownership.promoterPledge,
    },
    {
      thresholds: config.guardrails,
      bands: config.bands,
      liquidityBins: config.riskPenalty.liquidityBins,
    }
  );

  logger.debug(
    {
      ticker: snapshot.ticker,
      asOf: snapshot.asOf,
      mode: resolvedMode,
      weightedScore,
      riskPenalty: risk.penalty,
      scorePreGuard,
      score: guard.score,
      band: guard.band,
      flags: guard.flags,
    },
    'Instrument scored'
  );

  // 8. Output
  return {
    ticker: snapshot.ticker,
    date: snapshot.asOf,
    mode: resolvedMode,
    sector,
    score: guard.score,
    band: guard.band,
    pillars,
    riskPenalty: risk.penalty,
    confidence: coverage.confidence,
    imputedFraction: coverage.imputedFraction,
    sZ,
    guardrailFlags: guard.flags,
    details: {
      weights,
      weightedScore,
      scorePreGuard,
      bandPreGuard: guard.bandPreGuard,
      fundamentals: fundamentals.details,
      technicals: technicals.details,
      relativeStrength: relativeStrength.details,
      ownership: ownership.details,
      quality: quality.details,
      sectorMomentum: sectorMomentum.details,
      risk,
      guardrails: guard.trace,
      missingFields: coverage.missingFields,
    },
    configHash: config.hash,
    codeVersion: CODE_VERSION,
  };
}

interface SortKey {
  date: string;
  ticker: string;
}

function compareKeys(a: SortKey, b: SortKey): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.ticker !== b.ticker) return a.ticker < b.ticker ? -1 : 1;
  return 0;
}

function bySnapshotKey(a: InstrumentSnapshot, b: InstrumentSnapshot): number {
  return compareKeys({ date: a.asOf, ticker: a.ticker }, { date: b.asOf, ticker: b.ticker });
}

/**
 * Scores every snapshot. Peer sets and benchmarks are built once per date
 * from the instruments that passed validation. Per-instrument failures are
 * logged and returned alongside the outputs; an invalid mode or weight table
 * throws before any instrument is scored.
 */
export function scoreBatch(
  snapshots: readonly InstrumentSnapshot[],
  mode: Mode,
  config: ScoringConfig = getScoringConfig()
): BatchResult {
  const resolvedMode = validateMode(mode);
  listWeightVectors(config);

  const failures: ScoreFailure[] = [];
  const fail = (ticker: string, date: string | null, error: unknown) => {
    const reason = errorMessage(error);
    failures.push({ ticker, date, reason });
    logger.error({ ticker, date, error: reason }, 'Failed to score instrument');
  };

  const accepted: InstrumentSnapshot[] = [];
  const seen = new Set<string>();
  for (const snapshot of snapshots) {
    try {
      validateSnapshot(snapshot);
      assertSectorAccepts(config, snapshot);
      const key = `${snapshot.asOf}|${snapshot.ticker}`;
      if (seen.has(key)) {
        throw new InvalidInputError(`duplicate snapshot for ${snapshot.ticker} on ${snapshot.asOf}`);
      }
      seen.add(key);
      accepted.push(snapshot);
    } catch (error) {
      fail(snapshot.ticker, snapshot.asOf, error);
    }
  }

  const dates = [...new Set(accepted.map((s) => s.asOf))].sort();
  const outputs: ScoreOutput[] = [];

  for (const asOf of dates) {
    const members = accepted.filter((s) => s.asOf === asOf).sort(bySnapshotKey);
    const dateContext = buildDateContext(asOf, members, config);
    logger.debug(
      { asOf, instruments: members.length, sectors: dateContext.momentum.sectorCount },
      'Date context built'
    );

    for (const snapshot of members) {
      try {
        const context = contextForSector(dateContext, snapshot.sector, config);
        outputs.push(computeScore(snapshot, context, resolvedMode));
      } catch (error) {
        fail(snapshot.ticker, snapshot.asOf, error);
      }
    }
  }

  outputs.sort(compareKeys);
  failures.sort((a, b) =>
    compareKeys({ date: a.date ?? '', ticker: a.ticker }, { date: b.date ?? '', ticker: b.ticker })
  );

  logger.info(
    {
      mode: resolvedMode,
      dates: dates.length,
      scored: outputs.length,
      failed: failures.length,
      configHash: config.hash.substring(0, 12),
    },
    'Batch scoring complete'
  );

  return { mode: resolvedMode, configHash: config.hash, outputs, failures };
}
