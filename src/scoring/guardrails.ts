/**
 * Guardrail engine
 *
 * A fixed, ordered list of pure rules folded over an immutable
 * `{ score, band, flags }` state. Each rule may cap the band (never raise it)
 * and SectorBear may also lower the score. Rule order is significant and is
 * exactly the order of GUARDRAIL_RULES.
 */

import { roundScore } from './normalize';
import { isIlliquid } from './risk_penalty';
import type { BandCutoffs, GuardrailThresholds, LiquidityBin } from './scoring_config';
import { BANDS } from './types';
import type { Band, GuardrailFlag, GuardrailTraceEntry, Mode } from './types';

export interface GuardrailInput {
  scorePreGuard: number;
  confidence: number;
  imputedFraction: number;
  sZ: number;
  riskPenalty: number;
  mode: Mode;
  /** Traded value in crore, null when unknown. */
  tradedValueCr: number | null;
  /** Promoter pledge fraction, null when unknown. */
  pledge: number | null;
}

export interface GuardrailSettings {
  thresholds: GuardrailThresholds;
  bands: BandCutoffs;
  liquidityBins: Readonly<Record<Mode, readonly LiquidityBin[]>>;
}

export interface GuardrailState {
  readonly score: number;
  readonly band: Band;
  readonly flags: readonly GuardrailFlag[];
  readonly trace: readonly GuardrailTraceEntry[];
}

export interface GuardrailRule {
  readonly name: GuardrailFlag;
  /** Returns the next state, or null when the rule does not fire. */
  readonly evaluate: (
    state: GuardrailState,
    input: GuardrailInput,
    settings: GuardrailSettings
  ) => Pick<GuardrailState, 'score' | 'band'> | null;
}

export interface GuardrailResult {
  score: number;
  band: Band;
  bandPreGuard: Band;
  flags: GuardrailFlag[];
  trace: GuardrailTraceEntry[];
}

/** Lower is better: 0 = Strong Buy, 3 = Avoid. */
export function bandRank(band: Band): number {
  return BANDS.indexOf(band);
}

export function mostConservative(a: Band, b: Band): Band {
  return bandRank(a) >= bandRank(b) ? a : b;
}

export function scoreToBand(score: number, cutoffs: BandCutoffs): Band {
  if (score >= cutoffs.strongBuy) return 'Strong Buy';
  if (score >= cutoffs.buy) return 'Buy';
  if (score >= cutoffs.hold) return 'Hold';
  return 'Avoid';
}

function capTo(state: GuardrailState, band: Band): Pick<GuardrailState, 'score' | 'band'> {
  return { score: state.score, band: mostConservative(state.band, band) };
}

const lowDataHold: GuardrailRule = {
  name: 'LowDataHold',
  evaluate: (state, input, { thresholds }) =>
    input.confidence < thresholds.lowDataConfidence ? capTo(state, 'Hold') : null,
};

const illiquidity: GuardrailRule = {
  name: 'Illiquidity',
  evaluate: (state, input, { liquidityBins }) =>
    isIlliquid(input.tradedValueCr, liquidityBins[input.mode]) ? capTo(state, 'Hold') : null,
};

const pledgeCap: GuardrailRule = {
  name: 'PledgeCap',
  evaluate: (state, input, { thresholds }) =>
    input.pledge !== null && input.pledge > thresholds.pledgeCap ? capTo(state, 'Hold') : null,
};

const highRiskCap: GuardrailRule = {
  name: 'HighRiskCap',
  evaluate: (state, input, { thresholds }) =>
    input.riskPenalty >= thresholds.highRiskPenalty ? capTo(state, 'Hold') : null,
};

/**
 * Trader mode caps the band. Investor mode lowers the score and re-derives the
 * band from it, keeping any stricter cap already applied.
 */
const sectorBear: GuardrailRule = {
  name: 'SectorBear',
  evaluate: (state, input, { thresholds, bands }) => {
    if (!(input.sZ <= thresholds.sectorBearSz)) return null;
    if (input.mode === 'trader') {
      return capTo(state, 'Hold');
    }
    const score = roundScore(Math.max(0, state.score - thresholds.sectorBearPenalty));
    return { score, band: mostConservative(state.band, scoreToBand(score, bands)) };
  },
};

const lowCoverage: GuardrailRule = {
  name: 'LowCoverage',
  evaluate: (state, input, { thresholds }) =>
    input.imputedFraction >= thresholds.lowCoverageImputed ? capTo(state, 'Hold') : null,
};

export const GUARDRAIL_RULES: readonly GuardrailRule[] = Object.freeze([
  lowDataHold,
  illiquidity,
  pledgeCap,
  highRiskCap,
  sectorBear,
  lowCoverage,
]);

function applyRule(
  state: GuardrailState,
  rule: GuardrailRule,
  input: GuardrailInput,
  settings: GuardrailSettings
): GuardrailState {
  const next = rule.evaluate(state, input, settings);
  if (next === null) return state;

  return Object.freeze({
    score: next.score,
    band: next.band,
    flags: Object.freeze([...state.flags, rule.name]),
    trace: Object.freeze([
      ...state.trace,
      {
        flag: rule.name,
        scoreBefore: state.score,
        scoreAfter: next.score,
        bandBefore: state.band,
        bandAfter: next.band,
      },
    ]),
  });
}

export function applyGuardrails(
  input: GuardrailInput,
  settings: GuardrailSettings,
  rules: readonly GuardrailRule[] = GUARDRAIL_RULES
): GuardrailResult {
  const bandPreGuard = scoreToBand(input.scorePreGuard, settings.bands);
  const initial: GuardrailState = Object.freeze({
    score: input.scorePreGuard,
    band: bandPreGuard,
    flags: Object.freeze([]),
    trace: Object.freeze([]),
  });

  const final = rules.reduce((state, rule) => applyRule(state, rule, input, settings), initial);

  return {
    score: final.score,
    band: final.band,
    bandPreGuard,
    flags: [...final.flags],
    trace: [...final.trace],
  };
}
