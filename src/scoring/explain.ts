/**
 * Human-readable explanations of score outputs and guardrail activity.
 */

import { PILLAR_KEYS } from './types';
import type { GuardrailFlag, PillarKey, ScoreOutput } from './types';

const PILLAR_NAMES: Readonly<Record<PillarKey, string>> = {
  F: 'Fundamentals',
  T: 'Technicals',
  R: 'Relative Strength',
  O: 'Ownership',
  Q: 'Quality',
  S: 'Sector Momentum',
};

const GUARDRAIL_DESCRIPTIONS: Readonly<Record<GuardrailFlag, string>> = {
  LowDataHold: 'Too few required inputs were present; band capped at Hold.',
  Illiquidity: 'Traded value is below the liquidity floor for this mode; band capped at Hold.',
  PledgeCap: 'Promoter pledge exceeds the allowed fraction; band capped at Hold.',
  HighRiskCap: 'Risk penalty is at or above the high-risk threshold; band capped at Hold.',
  SectorBear: 'Sector momentum is deeply negative; band capped or score reduced.',
  LowCoverage: 'Too large a share of inputs was imputed; band capped at Hold.',
};

export function explainGuardrails(flags: readonly GuardrailFlag[]): string[] {
  return flags.map((flag) => `${flag}: ${GUARDRAIL_DESCRIPTIONS[flag]}`);
}

export type GuardrailSummary = Record<GuardrailFlag, number> & { total: number; clean: number };

/** Flag counts across outputs, plus how many outputs had no flag at all. */
export function summarizeGuardrails(outputs: readonly ScoreOutput[]): GuardrailSummary {
  const summary: GuardrailSummary = {
    LowDataHold: 0,
    Illiquidity: 0,
    PledgeCap: 0,
    HighRiskCap: 0,
    SectorBear: 0,
    LowCoverage: 0,
    total: outputs.length,
    clean: 0,
  };

  for (const output of outputs) {
    if (output.guardrailFlags.length === 0) summary.clean++;
    for (const flag of output.guardrailFlags) {
      summary[flag]++;
    }
  }
  return summary;
}

export interface PillarContribution {
  pillar: PillarKey;
  name: string;
  score: number;
  weight: number;
  contribution: number;
}

export interface ScoreExplanation {
  headline: string;
  contributions: PillarContribution[];
  penalties: string[];
  guardrails: string[];
  missingFields: string[];
}

export function explainScore(output: ScoreOutput): ScoreExplanation {
  const weights = output.details.weights;
  const contributions = PILLAR_KEYS.map((pillar) => ({
    pillar,
    name: PILLAR_NAMES[pillar],
    score: output.pillars[pillar],
    weight: weights[pillar],
    contribution: Math.round(output.pillars[pillar] * weights[pillar] * 100) / 100,
  })).sort((a, b) => b.contribution - a.contribution || a.pillar.localeCompare(b.pillar));

  const penalties = output.details.risk.breakdown.map(
    (item) => `${item.factor} -${item.penalty}${item.reason ? ` (${item.reason})` : ''}`
  );
  if (output.details.risk.uncapped > output.details.risk.penalty) {
    penalties.push(`risk capped at ${output.details.risk.cap}`);
  }

  return {
    headline: `${output.ticker} ${output.mode} ${output.date}: ${output.band} at ${output.score.toFixed(2)}`,
    contributions,
    penalties,
    guardrails: explainGuardrails(output.guardrailFlags),
    missingFields: [...output.details.missingFields],
  };
}
