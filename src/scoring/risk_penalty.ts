/**
 * Risk Penalty
 * Independent, threshold-tiered penalties summed and capped per sector.
 * Every contribution is >= 0; factors whose inputs are missing contribute 0,
 * except liquidity, where an unknown traded value is treated as illiquid.
 */

import { addCalendarDays, calendarDaysBetween } from '@/core/time';
import type { PeerSet } from './peer_set';
import type { LiquidityBin, RiskPenaltyParams } from './scoring_config';
import { binPenalty } from './tiers';
import type {
  InstrumentSnapshot,
  Mode,
  PriceRecord,
  RiskContribution,
  RiskPenaltyResult,
} from './types';

/** Rupees per crore; volume * close is in rupees. */
const RUPEES_PER_CRORE = 1e7;

/**
 * Median traded value in crore, falling back to today's volume * close.
 */
export function tradedValueCr(prices: PriceRecord): number | null {
  if (prices.medianTradedValueCr !== null) return prices.medianTradedValueCr;
  if (prices.volume !== null && prices.close !== null) {
    return (prices.volume * prices.close) / RUPEES_PER_CRORE;
  }
  return null;
}

/**
 * Highest bin threshold that still carries a penalty. Traded value below it
 * counts as illiquid.
 */
export function illiquidityThreshold(bins: readonly LiquidityBin[]): number {
  const penalized = bins.filter((bin) => bin.penalty > 0).map((bin) => bin.min);
  return penalized.length > 0 ? Math.max(...penalized) : 0;
}

export function isIlliquid(value: number | null, bins: readonly LiquidityBin[]): boolean {
  return value === null || value < illiquidityThreshold(bins);
}

export function riskCap(sector: string, params: RiskPenaltyParams): number {
  return params.caps[sector] ?? params.caps.default ?? 20;
}

function liquidityPenalty(value: number | null, bins: readonly LiquidityBin[]): RiskContribution {
  const maxPenalty = Math.max(0, ...bins.map((bin) => bin.penalty));
  if (value === null) {
    return { factor: 'liquidity', penalty: maxPenalty, reason: 'traded value unknown' };
  }
  const bin = bins.find((b) => value >= b.min);
  return {
    factor: 'liquidity',
    penalty: bin ? bin.penalty : maxPenalty,
    reason: `traded value ${value.toFixed(2)} Cr`,
  };
}

function eventWindowPenalty(
  asOf: string,
  quarterEnd: string | null,
  params: RiskPenaltyParams['eventWindow']
): RiskContribution | null {
  if (quarterEnd === null) return null;
  const resultsDate = addCalendarDays(quarterEnd, params.daysAfterQuarterEnd);
  if (resultsDate === null) return null;
  const distance = calendarDaysBetween(asOf, resultsDate);
  if (distance === null || Math.abs(distance) > params.windowDays) return null;
  return {
    factor: 'event_window',
    penalty: params.penalty,
    reason: `${Math.abs(distance)} day(s) from expected results on ${resultsDate}`,
  };
}

export function calculateRiskPenalty(
  snapshot: InstrumentSnapshot,
  mode: Mode,
  peerSet: PeerSet,
  params: RiskPenaltyParams
): RiskPenaltyResult {
  const { prices, fundamentals, ownership } = snapshot;
  const breakdown: RiskContribution[] = [];
  const add = (contribution: RiskContribution | null) => {
    if (contribution && contribution.penalty > 0) {
      breakdown.push(contribution);
    }
  };

  add(liquidityPenalty(tradedValueCr(prices), params.liquidityBins[mode]));

  if (ownership.promoterPledge !== null) {
    add({
      factor: 'pledge',
      penalty: binPenalty(ownership.promoterPledge, params.pledgeBins),
      reason: `promoter pledge ${(ownership.promoterPledge * 100).toFixed(1)}%`,
    });
  }

  const sigma = prices.sigma20;
  const peerSigma = peerSet.medianSigma20;
  if (sigma !== null && peerSigma !== null && peerSigma > 0) {
    const limit = params.volatility.sigmaMultiple * peerSigma;
    if (sigma > limit) {
      add({
        factor: 'volatility',
        penalty: params.volatility.penalty,
        reason: `sigma20 ${sigma.toFixed(4)} above ${limit.toFixed(4)}`,
      });
    }
  }

  if (fundamentals.kind === 'banking') {
    if (fundamentals.gnpaPct !== null) {
      add({
        factor: 'leverage',
        penalty: binPenalty(fundamentals.gnpaPct, params.leverage.gnpaPct),
        reason: `gross NPA ${fundamentals.gnpaPct}%`,
      });
    }
  } else {
    if (fundamentals.debtToEquity !== null) {
      add({
        factor: 'leverage',
        penalty: binPenalty(fundamentals.debtToEquity, params.leverage.debtToEquity),
        reason: `debt/equity ${fundamentals.debtToEquity}`,
      });
    }

    const { pe, evEbitda } = fundamentals;
    const expensivePe = pe !== null && pe > params.valuation.peAbove;
    const expensiveEv = evEbitda !== null && evEbitda > params.valuation.evEbitdaAbove;
    if (expensivePe || expensiveEv) {
      add({
        factor: 'valuation',
        penalty: params.valuation.penalty,
        reason: expensivePe ? `P/E ${pe}` : `EV/EBITDA ${evEbitda}`,
      });
    }

    if (fundamentals.opmMargin !== null && fundamentals.opmMargin < params.thinMargin.opmBelow) {
      add({
        factor: 'thin_margin',
        penalty: params.thinMargin.penalty,
        reason: `operating margin ${(fundamentals.opmMargin * 100).toFixed(1)}%`,
      });
    }
  }

  add(eventWindowPenalty(snapshot.asOf, prices.quarterEnd, params.eventWindow));

  const governance = params.governance;
  const governanceReasons: string[] = [];
  let governancePenalty = 0;
  if (fundamentals.roe3y !== null && fundamentals.roe3y < governance.roeBelow) {
    governancePenalty += governance.roePenalty;
    governanceReasons.push('low roe');
  }
  if (
    fundamentals.kind === 'standard' &&
    fundamentals.opmStdev12q !== null &&
    fundamentals.opmStdev12q > governance.opmStdevAbove
  ) {
    governancePenalty += governance.opmStdevPenalty;
    governanceReasons.push('unstable margins');
  }
  add({
    factor: 'governance',
    penalty: Math.min(governance.maxPenalty, governancePenalty),
    reason: governanceReasons.join(', '),
  });

  const uncapped = breakdown.reduce((sum, item) => sum + item.penalty, 0);
  const cap = riskCap(snapshot.sector, params);

  return {
    penalty: Math.min(uncapped, cap),
    uncapped,
    cap,
    breakdown,
  };
}
