/**
 * Ownership pillar (O)
 * Additive tiers on a base of 50: institutional holding, promoter sweet spot,
 * size and liquidity tiers, three-month institutional flow, minus a pledge
 * penalty curve. Clamped to [0, 100].
 */

import { clamp } from './normalize';
import { tradedValueCr } from './risk_penalty';
import type { OwnershipParams } from './scoring_config';
import { interpolate, sumAwards, tierAward } from './tiers';
import type { InstrumentSnapshot, Metric, PillarResult, TieredDetails, TierAward } from './types';

function sumPresent(a: Metric, b: Metric): Metric {
  if (a === null && b === null) return null;
  return (a ?? 0) + (b ?? 0);
}

export function pledgePenalty(pledge: number, params: OwnershipParams): number {
  return Math.max(0, interpolate(pledge, params.pledgeCurve));
}

export function calculateOwnershipScore(
  snapshot: InstrumentSnapshot,
  params: OwnershipParams
): PillarResult<TieredDetails> {
  const { ownership, fundamentals, prices } = snapshot;

  const awards: TierAward[] = [
    tierAward('institutional_hold', sumPresent(ownership.fiiHold, ownership.diiHold), params.institutional),
    tierAward('promoter_hold', ownership.promoterHold, params.promoter),
    tierAward('market_cap_cr', fundamentals.marketCapCr, params.marketCapCr),
    tierAward('traded_value_cr', tradedValueCr(prices), params.tradedValueCr),
    tierAward(
      'institutional_flow_3m',
      sumPresent(ownership.fiiChange3m, ownership.diiChange3m),
      params.institutionalFlow3m
    ),
  ];

  const pledge = ownership.promoterPledge;
  awards.push({
    factor: 'promoter_pledge',
    value: pledge,
    points: pledge === null ? 0 : 0 - pledgePenalty(pledge, params),
    imputed: pledge === null,
  });

  return {
    score: clamp(params.base + sumAwards(awards)),
    details: {
      base: params.base,
      awards,
      missingFields: awards.filter((a) => a.imputed).map((a) => a.factor),
    },
  };
}
