/**
 * Quality pillar (Q)
 * Additive tiers on a base of 50 for profitability persistence, margin level
 * and stability, leverage and dividend sustainability. Banks swap the
 * industrial measures for return on assets, return on equity and asset quality.
 */

import { clamp } from './normalize';
import type { QualityParams } from './scoring_config';
import { sumAwards, tierAward } from './tiers';
import type { Fundamentals, PillarResult, TieredDetails, TierAward } from './types';

export function calculateQualityScore(
  fundamentals: Fundamentals,
  params: QualityParams
): PillarResult<TieredDetails> {
  let awards: TierAward[];

  if (fundamentals.kind === 'banking') {
    const tables = params.banking;
    awards = [
      tierAward('roa_3y', fundamentals.roa3y, tables.roa3y),
      tierAward('roe_3y', fundamentals.roe3y, tables.roe3y),
      tierAward('gnpa_pct', fundamentals.gnpaPct, tables.gnpaPct),
      tierAward('dividend_payout', fundamentals.dividendPayout, tables.dividendPayout),
    ];
  } else {
    const tables = params.standard;
    awards = [
      tierAward('roce_3y', fundamentals.roce3y, tables.roce3y),
      tierAward('opm_stdev_12q', fundamentals.opmStdev12q, tables.opmStdev12q),
      tierAward('opm_margin', fundamentals.opmMargin, tables.opmMargin),
      tierAward('debt_to_equity', fundamentals.debtToEquity, tables.debtToEquity),
      tierAward('dividend_payout', fundamentals.dividendPayout, tables.dividendPayout),
    ];
  }

  return {
    score: clamp(params.base + sumAwards(awards)),
    details: {
      base: params.base,
      awards,
      missingFields: awards.filter((a) => a.imputed).map((a) => a.factor),
    },
  };
}
