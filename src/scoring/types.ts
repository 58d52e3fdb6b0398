/**
 * Domain types for the pillar scoring pipeline.
 *
 * Every metric is `number | null`. `null` is the only "missing" marker and is
 * never coerced to zero; consumers resolve it to a neutral value and count it
 * against confidence.
 */

export type Metric = number | null;

export const MODES = ['trader', 'investor'] as const;
/** `trader` is the shorter-horizon mode, `investor` the longer one. */
export type Mode = (typeof MODES)[number];

/** Ordered from most to least favorable. */
export const BANDS = ['Strong Buy', 'Buy', 'Hold', 'Avoid'] as const;
export type Band = (typeof BANDS)[number];

export const PILLAR_KEYS = ['F', 'T', 'R', 'O', 'Q', 'S'] as const;
export type PillarKey = (typeof PILLAR_KEYS)[number];
export type PillarWeights = Readonly<Record<PillarKey, number>>;
export type PillarScores = Readonly<Record<PillarKey, number>>;

export const HORIZONS = ['1m', '3m', '6m'] as const;
export type Horizon = (typeof HORIZONS)[number];
export type HorizonValues<T> = Readonly<Record<Horizon, T>>;

export type Direction = 'higher' | 'lower';

export const GUARDRAIL_FLAGS = [
  'LowDataHold',
  'Illiquidity',
  'PledgeCap',
  'HighRiskCap',
  'SectorBear',
  'LowCoverage',
] as const;
export type GuardrailFlag = (typeof GUARDRAIL_FLAGS)[number];

export interface PriceRecord {
  close: Metric;
  high20: Metric;
  volume: Metric;
  /** Trailing daily volumes, oldest first, excluding the current session. */
  volumeHistory: readonly number[];
  dma20: Metric;
  dma50: Metric;
  dma200: Metric;
  rsi14: Metric;
  atr14: Metric;
  ret21d: Metric;
  ret63d: Metric;
  ret126d: Metric;
  sigma20: Metric;
  sigma60: Metric;
  /** Median daily traded value in crore. */
  medianTradedValueCr: Metric;
  /** Last reported quarter end (YYYY-MM-DD). */
  quarterEnd: string | null;
}

export interface StandardFundamentals {
  kind: 'standard';
  marketCapCr: Metric;
  roe3y: Metric;
  salesCagr3y: Metric;
  epsCagr3y: Metric;
  pe: Metric;
  evEbitda: Metric;
  debtToEquity: Metric;
  opmMargin: Metric;
  roce3y: Metric;
  opmStdev12q: Metric;
  dividendPayout: Metric;
}

export interface BankingFundamentals {
  kind: 'banking';
  marketCapCr: Metric;
  roa3y: Metric;
  roe3y: Metric;
  /** Gross NPA, percent of advances. */
  gnpaPct: Metric;
  /** Provision coverage ratio, percent. */
  pcrPct: Metric;
  nim3y: Metric;
  dividendPayout: Metric;
}

export type Fundamentals = StandardFundamentals | BankingFundamentals;
export type FundamentalsKind = Fundamentals['kind'];

/** Holdings and flows are fractions (0.42 = 42%). */
export interface OwnershipRecord {
  promoterHold: Metric;
  promoterPledge: Metric;
  fiiHold: Metric;
  diiHold: Metric;
  fiiChange3m: Metric;
  diiChange3m: Metric;
}

export interface InstrumentSnapshot {
  ticker: string;
  asOf: string;
  sector: string;
  prices: PriceRecord;
  fundamentals: Fundamentals;
  ownership: OwnershipRecord;
}

export interface PointsResult {
  points: number;
  imputed: boolean;
  method: 'zscore' | 'ecdf' | 'neutral';
}

export interface PillarResult<TDetails> {
  score: number;
  details: TDetails;
}

export interface MetricContribution {
  metric: string;
  value: number | null;
  points: number;
  weight: number;
  method: PointsResult['method'];
  imputed: boolean;
}

export interface FundamentalsDetails {
  kind: FundamentalsKind;
  components: MetricContribution[];
  missingFields: string[];
}

export interface TechnicalComponent {
  value: number;
  weight: number;
  imputed: boolean;
  reason?: string;
}

export interface TechnicalsDetails {
  components: {
    above200: TechnicalComponent;
    goldenCross: TechnicalComponent;
    rsi: TechnicalComponent;
    breakout: TechnicalComponent;
    volume: TechnicalComponent;
  };
  missingFields: string[];
}

export interface HorizonAlpha {
  instrumentReturn: number | null;
  benchmarkReturn: number | null;
  volatility: number | null;
  alpha: number;
  weight: number;
  valid: boolean;
  reason?: 'missing_or_invalid_data';
}

export interface RelativeStrengthDetails {
  horizons: HorizonValues<HorizonAlpha>;
  weightedAlpha: number;
  /** Rank of `weightedAlpha` among every instrument scored on the date. */
  percentileRank: number;
  universeSize: number;
}

export interface TierAward {
  factor: string;
  value: number | null;
  points: number;
  imputed: boolean;
}

export interface TieredDetails {
  base: number;
  awards: TierAward[];
  missingFields: string[];
}

export interface SectorMomentumDetails {
  sectorReturns: HorizonValues<number | null>;
  marketReturns: HorizonValues<number | null>;
  horizonZ: HorizonValues<number>;
  sZ: number;
  sectorCount: number;
}

export type RiskFactor =
  | 'liquidity'
  | 'pledge'
  | 'volatility'
  | 'leverage'
  | 'valuation'
  | 'thin_margin'
  | 'event_window'
  | 'governance';

export interface RiskContribution {
  factor: RiskFactor;
  penalty: number;
  reason: string;
}

export interface RiskPenaltyResult {
  penalty: number;
  uncapped: number;
  cap: number;
  breakdown: RiskContribution[];
}

export interface GuardrailTraceEntry {
  flag: GuardrailFlag;
  scoreBefore: number;
  scoreAfter: number;
  bandBefore: Band;
  bandAfter: Band;
}

export interface ScoreDetails {
  weights: PillarWeights;
  weightedScore: number;
  scorePreGuard: number;
  bandPreGuard: Band;
  fundamentals: FundamentalsDetails;
  technicals: TechnicalsDetails;
  relativeStrength: RelativeStrengthDetails;
  ownership: TieredDetails;
  quality: TieredDetails;
  sectorMomentum: SectorMomentumDetails;
  risk: RiskPenaltyResult;
  guardrails: GuardrailTraceEntry[];
  missingFields: string[];
}

export interface ScoreOutput {
  ticker: string;
  date: string;
  mode: Mode;
  sector: string;
  score: number;
  band: Band;
  pillars: PillarScores;
  riskPenalty: number;
  confidence: number;
  imputedFraction: number;
  sZ: number;
  guardrailFlags: GuardrailFlag[];
  details: ScoreDetails;
  configHash: string;
  codeVersion: string;
}

export interface ScoreFailure {
  ticker: string;
  date: string | null;
  reason: string;
}

export interface BatchResult {
  mode: Mode;
  configHash: string;
  outputs: ScoreOutput[];
  failures: ScoreFailure[];
}
