/**
 * Scoring configuration bundle.
 *
 * The bundle is read from `config/scoring.json` (or `SCORING_CONFIG`),
 * schema-checked with Ajv, checked for semantic consistency, frozen, and
 * fingerprinted. The fingerprint is stamped on every score output.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { getEnvConfig } from '@/core/env';
import { ConfigurationError, errorMessage } from '@/core/errors';
import { contentHash } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import { validateScoringConfigDocument } from '@/validation/ajv_instance';
import type { BankingMetricKey, StandardMetricKey } from './metrics';
import { MODES } from './types';
import type { Horizon, Mode, PillarKey, PillarWeights } from './types';

const logger = createChildLogger('scoring_config');

/** Tolerance for weight sums at load time. */
export const CONFIG_WEIGHT_TOLERANCE = 1e-6;
export const MAX_RISK_CAP = 25;

export interface RangeRule {
  min?: number;
  max?: number;
  points: number;
}

/** First matching rule wins; `min` is inclusive, `max` exclusive. */
export interface RangeTable {
  ranges: readonly RangeRule[];
  otherwise: number;
}

export interface ThresholdBin {
  above: number;
  penalty: number;
}

export interface LiquidityBin {
  min: number;
  penalty: number;
}

export type TechnicalWeightKey = 'above_200' | 'golden_cross' | 'rsi' | 'breakout' | 'volume';

export interface NormalizationParams {
  minPeerSize: number;
  center: number;
  scale: number;
  epsilon: number;
}

export interface BandCutoffs {
  strongBuy: number;
  buy: number;
  hold: number;
}

export interface GuardrailThresholds {
  lowDataConfidence: number;
  pledgeCap: number;
  highRiskPenalty: number;
  sectorBearSz: number;
  sectorBearPenalty: number;
  lowCoverageImputed: number;
}

export interface TechnicalsParams {
  weights: Readonly<Record<TechnicalWeightKey, number>>;
  rsiOversold: number;
  rsiOverbought: number;
  breakoutAtrMultiple: number;
  breakoutCloseFraction: number;
  volumeMinHistory: number;
  volumeRatioFloor: number;
  volumeRatioCeiling: number;
}

export interface RelativeStrengthParams {
  horizonWeights: Readonly<Record<Horizon, number>>;
  sectorWeight: number;
  marketWeight: number;
}

export interface OwnershipParams {
  base: number;
  institutional: RangeTable;
  promoter: RangeTable;
  marketCapCr: RangeTable;
  tradedValueCr: RangeTable;
  institutionalFlow3m: RangeTable;
  pledgeCurve: ReadonlyArray<readonly [number, number]>;
}

export interface QualityParams {
  base: number;
  standard: {
    roce3y: RangeTable;
    opmStdev12q: RangeTable;
    opmMargin: RangeTable;
    debtToEquity: RangeTable;
    dividendPayout: RangeTable;
  };
  banking: {
    roa3y: RangeTable;
    roe3y: RangeTable;
    gnpaPct: RangeTable;
    dividendPayout: RangeTable;
  };
}

export interface RiskPenaltyParams {
  caps: Readonly<Record<string, number>>;
  liquidityBins: Readonly<Record<Mode, readonly LiquidityBin[]>>;
  pledgeBins: readonly ThresholdBin[];
  volatility: { sigmaMultiple: number; penalty: number };
  leverage: { debtToEquity: readonly ThresholdBin[]; gnpaPct: readonly ThresholdBin[] };
  valuation: { peAbove: number; evEbitdaAbove: number; penalty: number };
  thinMargin: { opmBelow: number; penalty: number };
  eventWindow: { daysAfterQuarterEnd: number; windowDays: number; penalty: number };
  governance: {
    roeBelow: number;
    roePenalty: number;
    opmStdevAbove: number;
    opmStdevPenalty: number;
    maxPenalty: number;
  };
}

export interface ModeWeights {
  default: PillarWeights;
  sectors: Readonly<Record<string, PillarWeights>>;
}

export interface ScoringConfig {
  version: string;
  /** SHA-256 of the key-sorted source document. */
  hash: string;
  source: string;
  sectors: readonly string[];
  bankingSectors: readonly string[];
  pillarWeights: Readonly<Record<Mode, ModeWeights>>;
  normalization: NormalizationParams;
  bands: BandCutoffs;
  guardrails: GuardrailThresholds;
  fundamentals: {
    standard: Readonly<Record<StandardMetricKey, number>>;
    banking: Readonly<Record<BankingMetricKey, number>>;
  };
  technicals: TechnicalsParams;
  relativeStrength: RelativeStrengthParams;
  sectorMomentum: { horizonWeights: Readonly<Record<Horizon, number>> };
  ownership: OwnershipParams;
  quality: QualityParams;
  riskPenalty: RiskPenaltyParams;
}

type RawPillarWeights = Record<PillarKey, number>;

interface RawModeWeights {
  default: RawPillarWeights;
  sectors?: Record<string, RawPillarWeights>;
}

interface RawRangeTable {
  ranges: RangeRule[];
  otherwise: number;
}

/** Shape of `config/scoring.json` as guaranteed by the JSON schema. */
export interface RawScoringConfig {
  version: string;
  sectors: string[];
  banking_sectors: string[];
  pillar_weights: Record<Mode, RawModeWeights>;
  normalization: {
    min_peer_size: number;
    center: number;
    scale: number;
    epsilon: number;
  };
  bands: { strong_buy: number; buy: number; hold: number };
  guardrails: {
    low_data_confidence: number;
    pledge_cap: number;
    high_risk_penalty: number;
    sector_bear_sz: number;
    sector_bear_penalty: number;
    low_coverage_imputed: number;
  };
  fundamentals: {
    standard: Record<StandardMetricKey, number>;
    banking: Record<BankingMetricKey, number>;
  };
  technicals: {
    weights: Record<TechnicalWeightKey, number>;
    rsi_oversold: number;
    rsi_overbought: number;
    breakout_atr_multiple: number;
    breakout_close_fraction: number;
    volume_min_history: number;
    volume_ratio_floor: number;
    volume_ratio_ceiling: number;
  };
  relative_strength: {
    horizon_weights: Record<Horizon, number>;
    sector_weight: number;
    market_weight: number;
  };
  sector_momentum: {
    horizon_weights: Record<Horizon, number>;
  };
  ownership: {
    base: number;
    institutional: RawRangeTable;
    promoter: RawRangeTable;
    market_cap_cr: RawRangeTable;
    traded_value_cr: RawRangeTable;
    institutional_flow_3m: RawRangeTable;
    pledge_curve: Array<[number, number]>;
  };
  quality: {
    base: number;
    standard: {
      roce_3y: RawRangeTable;
      opm_stdev_12q: RawRangeTable;
      opm_margin: RawRangeTable;
      debt_to_equity: RawRangeTable;
      dividend_payout: RawRangeTable;
    };
    banking: {
      roa_3y: RawRangeTable;
      roe_3y: RawRangeTable;
      gnpa_pct: RawRangeTable;
      dividend_payout: RawRangeTable;
    };
  };
  risk_penalty: {
    caps: Record<string, number>;
    liquidity_bins: Record<Mode, LiquidityBin[]>;
    pledge_bins: ThresholdBin[];
    volatility: { sigma_multiple: number; penalty: number };
    leverage: { debt_to_equity: ThresholdBin[]; gnpa_pct: ThresholdBin[] };
    valuation: { pe_above: number; ev_ebitda_above: number; penalty: number };
    thin_margin: { opm_below: number; penalty: number };
    event_window: { days_after_quarter_end: number; window_days: number; penalty: number };
    governance: {
      roe_below: number;
      roe_penalty: number;
      opm_stdev_above: number;
      opm_stdev_penalty: number;
      max_penalty: number;
    };
  };
}

export function weightSum(weights: Readonly<Record<string, number>>): number {
  return Object.values(weights).reduce((sum, weight) => sum + weight, 0);
}

function assertSumsToOne(
  weights: Readonly<Record<string, number>>,
  label: string,
  tolerance: number = CONFIG_WEIGHT_TOLERANCE
): void {
  const total = weightSum(weights);
  if (Math.abs(total - 1) > tolerance) {
    throw new ConfigurationError(`${label} sum to ${total.toFixed(6)}, expected 1.0`);
  }
}

function assertKnownSectors(names: Iterable<string>, sectors: ReadonlySet<string>, label: string): void {
  for (const name of names) {
    if (!sectors.has(name)) {
      throw new ConfigurationError(`${label} references unknown sector '${name}'`);
    }
  }
}

function assertStrictlyDescending(values: readonly number[], label: string): void {
  for (let i = 1; i < values.length; i++) {
    if (!(values[i] < values[i - 1])) {
      throw new ConfigurationError(`${label} must be strictly descending`);
    }
  }
}

/**
 * Semantic checks the JSON schema cannot express.
 */
export function validateScoringConfig(raw: RawScoringConfig): void {
  const sectors = new Set(raw.sectors);
  assertKnownSectors(raw.banking_sectors, sectors, 'banking_sectors');

  for (const mode of MODES) {
    const modeWeights = raw.pillar_weights[mode];
    assertSumsToOne(modeWeights.default, `pillar_weights.${mode}.default`);
    const overrides = modeWeights.sectors ?? {};
    assertKnownSectors(Object.keys(overrides), sectors, `pillar_weights.${mode}.sectors`);
    for (const [sector, weights] of Object.entries(overrides)) {
      assertSumsToOne(weights, `pillar_weights.${mode}.sectors.${sector}`);
    }
  }

  assertSumsToOne(raw.fundamentals.standard, 'fundamentals.standard weights');
  assertSumsToOne(raw.fundamentals.banking, 'fundamentals.banking weights');
  assertSumsToOne(raw.technicals.weights, 'technicals.weights');
  assertSumsToOne(raw.relative_strength.horizon_weights, 'relative_strength.horizon_weights');
  assertSumsToOne(raw.sector_momentum.horizon_weights, 'sector_momentum.horizon_weights');
  assertSumsToOne(
    {
      sector: raw.relative_strength.sector_weight,
      market: raw.relative_strength.market_weight,
    },
    'relative_strength benchmark weights'
  );

  const { strong_buy, buy, hold } = raw.bands;
  if (!(strong_buy > buy && buy > hold)) {
    throw new ConfigurationError(
      `bands must satisfy strong_buy > buy > hold (got ${strong_buy}/${buy}/${hold})`
    );
  }

  if (!(raw.technicals.rsi_oversold < raw.technicals.rsi_overbought)) {
    throw new ConfigurationError('technicals.rsi_oversold must be below rsi_overbought');
  }
  if (!(raw.technicals.volume_ratio_floor < raw.technicals.volume_ratio_ceiling)) {
    throw new ConfigurationError('technicals.volume_ratio_floor must be below volume_ratio_ceiling');
  }

  const curve = raw.ownership.pledge_curve;
  for (let i = 1; i < curve.length; i++) {
    const [prevX, prevY] = curve[i - 1];
    const [x, y] = curve[i];
    if (!(x > prevX) || y < prevY) {
      throw new ConfigurationError('ownership.pledge_curve must be monotonic');
    }
  }

  const caps = raw.risk_penalty.caps;
  assertKnownSectors(
    Object.keys(caps).filter((key) => key !== 'default'),
    sectors,
    'risk_penalty.caps'
  );
  for (const [sector, cap] of Object.entries(caps)) {
    if (!(cap > 0 && cap <= MAX_RISK_CAP)) {
      throw new ConfigurationError(
        `risk_penalty.caps.${sector} is ${cap}, must be in range (0, ${MAX_RISK_CAP}]`
      );
    }
  }

  for (const mode of MODES) {
    assertStrictlyDescending(
      raw.risk_penalty.liquidity_bins[mode].map((bin) => bin.min),
      `risk_penalty.liquidity_bins.${mode}`
    );
  }
  assertStrictlyDescending(
    raw.risk_penalty.pledge_bins.map((bin) => bin.above),
    'risk_penalty.pledge_bins'
  );
  assertStrictlyDescending(
    raw.risk_penalty.leverage.debt_to_equity.map((bin) => bin.above),
    'risk_penalty.leverage.debt_to_equity'
  );
  assertStrictlyDescending(
    raw.risk_penalty.leverage.gnpa_pct.map((bin) => bin.above),
    'risk_penalty.leverage.gnpa_pct'
  );
}

function copyWeights(weights: RawPillarWeights): PillarWeights {
  return {
    F: weights.F,
    T: weights.T,
    R: weights.R,
    O: weights.O,
    Q: weights.Q,
    S: weights.S,
  };
}

function toModeWeights(raw: RawModeWeights): ModeWeights {
  const sectors: Record<string, PillarWeights> = {};
  for (const [sector, weights] of Object.entries(raw.sectors ?? {})) {
    sectors[sector] = copyWeights(weights);
  }
  return { default: copyWeights(raw.default), sectors };
}

function toRangeTable(raw: RawRangeTable): RangeTable {
  return {
    ranges: raw.ranges.map((rule) => ({ ...rule })),
    otherwise: raw.otherwise,
  };
}

function toHorizonWeights(raw: Record<Horizon, number>): Record<Horizon, number> {
  return { '1m': raw['1m'], '3m': raw['3m'], '6m': raw['6m'] };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates a raw document and maps it to the immutable runtime bundle.
 */
export function buildScoringConfig(document: unknown, source: string = 'inline'): ScoringConfig {
  const result = validateScoringConfigDocument(document);
  if (!result.valid || !result.data) {
    const details = (result.errors ?? []).join('; ');
    throw new ConfigurationError(`invalid scoring config in ${source}: ${details}`);
  }

  const raw = result.data;
  validateScoringConfig(raw);

  const risk = raw.risk_penalty;
  const config: ScoringConfig = {
    version: raw.version,
    hash: contentHash(raw),
    source,
    sectors: [...raw.sectors],
    bankingSectors: [...raw.banking_sectors],
    pillarWeights: {
      trader: toModeWeights(raw.pillar_weights.trader),
      investor: toModeWeights(raw.pillar_weights.investor),
    },
    normalization: {
      minPeerSize: raw.normalization.min_peer_size,
      center: raw.normalization.center,
      scale: raw.normalization.scale,
      epsilon: raw.normalization.epsilon,
    },
    bands: {
      strongBuy: raw.bands.strong_buy,
      buy: raw.bands.buy,
      hold: raw.bands.hold,
    },
    guardrails: {
      lowDataConfidence: raw.guardrails.low_data_confidence,
      pledgeCap: raw.guardrails.pledge_cap,
      highRiskPenalty: raw.guardrails.high_risk_penalty,
      sectorBearSz: raw.guardrails.sector_bear_sz,
      sectorBearPenalty: raw.guardrails.sector_bear_penalty,
      lowCoverageImputed: raw.guardrails.low_coverage_imputed,
    },
    fundamentals: {
      standard: { ...raw.fundamentals.standard },
      banking: { ...raw.fundamentals.banking },
    },
    technicals: {
      weights: { ...raw.technicals.weights },
      rsiOversold: raw.technicals.rsi_oversold,
      rsiOverbought: raw.technicals.rsi_overbought,
      breakoutAtrMultiple: raw.technicals.breakout_atr_multiple,
      breakoutCloseFraction: raw.technicals.breakout_close_fraction,
      volumeMinHistory: raw.technicals.volume_min_history,
      volumeRatioFloor: raw.technicals.volume_ratio_floor,
      volumeRatioCeiling: raw.technicals.volume_ratio_ceiling,
    },
    relativeStrength: {
      horizonWeights: toHorizonWeights(raw.relative_strength.horizon_weights),
      sectorWeight: raw.relative_strength.sector_weight,
      marketWeight: raw.relative_strength.market_weight,
    },
    sectorMomentum: {
      horizonWeights: toHorizonWeights(raw.sector_momentum.horizon_weights),
    },
    ownership: {
      base: raw.ownership.base,
      institutional: toRangeTable(raw.ownership.institutional),
      promoter: toRangeTable(raw.ownership.promoter),
      marketCapCr: toRangeTable(raw.ownership.market_cap_cr),
      tradedValueCr: toRangeTable(raw.ownership.traded_value_cr),
      institutionalFlow3m: toRangeTable(raw.ownership.institutional_flow_3m),
      pledgeCurve: raw.ownership.pledge_curve.map(([x, y]) => [x, y] as const),
    },
    quality: {
      base: raw.quality.base,
      standard: {
        roce3y: toRangeTable(raw.quality.standard.roce_3y),
        opmStdev12q: toRangeTable(raw.quality.standard.opm_stdev_12q),
        opmMargin: toRangeTable(raw.quality.standard.opm_margin),
        debtToEquity: toRangeTable(raw.quality.standard.debt_to_equity),
        dividendPayout: toRangeTable(raw.quality.standard.dividend_payout),
      },
      banking: {
        roa3y: toRangeTable(raw.quality.banking.roa_3y),
        roe3y: toRangeTable(raw.quality.banking.roe_3y),
        gnpaPct: toRangeTable(raw.quality.banking.gnpa_pct),
        dividendPayout: toRangeTable(raw.quality.banking.dividend_payout),
      },
    },
    riskPenalty: {
      caps: { ...risk.caps },
      liquidityBins: {
        trader: risk.liquidity_bins.trader.map((bin) => ({ ...bin })),
        investor: risk.liquidity_bins.investor.map((bin) => ({ ...bin })),
      },
      pledgeBins: risk.pledge_bins.map((bin) => ({ ...bin })),
      volatility: {
        sigmaMultiple: risk.volatility.sigma_multiple,
        penalty: risk.volatility.penalty,
      },
      leverage: {
        debtToEquity: risk.leverage.debt_to_equity.map((bin) => ({ ...bin })),
        gnpaPct: risk.leverage.gnpa_pct.map((bin) => ({ ...bin })),
      },
      valuation: {
        peAbove: risk.valuation.pe_above,
        evEbitdaAbove: risk.valuation.ev_ebitda_above,
        penalty: risk.valuation.penalty,
      },
      thinMargin: {
        opmBelow: risk.thin_margin.opm_below,
        penalty: risk.thin_margin.penalty,
      },
      eventWindow: {
        daysAfterQuarterEnd: risk.event_window.days_after_quarter_end,
        windowDays: risk.event_window.window_days,
        penalty: risk.event_window.penalty,
      },
      governance: {
        roeBelow: risk.governance.roe_below,
        roePenalty: risk.governance.roe_penalty,
        opmStdevAbove: risk.governance.opm_stdev_above,
        opmStdevPenalty: risk.governance.opm_stdev_penalty,
        maxPenalty: risk.governance.max_penalty,
      },
    },
  };

  return deepFreeze(config);
}

export function resolveScoringConfigPath(explicitPath?: string): string {
  if (explicitPath) return explicitPath;
  return getEnvConfig().scoringConfigPath ?? join(process.cwd(), 'config', 'scoring.json');
}

export function loadScoringConfig(path?: string): ScoringConfig {
  const configPath = resolveScoringConfigPath(path);
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`scoring config not found at ${configPath}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `scoring config at ${configPath} is not valid JSON: ${errorMessage(error)}`
    );
  }

  const config = buildScoringConfig(document, configPath);
  logger.info(
    { path: configPath, version: config.version, hash: config.hash.substring(0, 12) },
    'Scoring config loaded'
  );
  return config;
}

let cachedConfig: ScoringConfig | null = null;

export function getScoringConfig(): ScoringConfig {
  if (!cachedConfig) {
    cachedConfig = loadScoringConfig();
  }
  return cachedConfig;
}

export function resetScoringConfig(): void {
  cachedConfig = null;
}
