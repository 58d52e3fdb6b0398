/**
 * Peer sets: all snapshots sharing a sector on one as-of date.
 * Metric statistics are computed once here and shared read-only by every
 * scoring call for that (sector, date).
 */

import { finiteValues, median } from '@/utils/stats';
import {
  BANKING_METRICS,
  STANDARD_METRICS,
  type BankingMetricKey,
  type StandardMetricKey,
} from './metrics';
import { summarizeMetric, type MetricStats } from './normalize';
import type { BankingFundamentals, InstrumentSnapshot, StandardFundamentals } from './types';

export interface PeerSet {
  sector: string;
  asOf: string;
  tickers: readonly string[];
  standardStats: ReadonlyMap<StandardMetricKey, MetricStats>;
  bankingStats: ReadonlyMap<BankingMetricKey, MetricStats>;
  /** Median 20-day volatility across the peers, null when nobody reports it. */
  medianSigma20: number | null;
}

export function buildPeerSet(
  sector: string,
  asOf: string,
  snapshots: readonly InstrumentSnapshot[]
): PeerSet {
  const members = snapshots.filter((s) => s.sector === sector && s.asOf === asOf);

  const standard: StandardFundamentals[] = [];
  const banking: BankingFundamentals[] = [];
  for (const member of members) {
    if (member.fundamentals.kind === 'banking') {
      banking.push(member.fundamentals);
    } else {
      standard.push(member.fundamentals);
    }
  }

  const standardStats = new Map<StandardMetricKey, MetricStats>();
  for (const metric of STANDARD_METRICS) {
    standardStats.set(metric.key, summarizeMetric(standard.map(metric.read)));
  }

  const bankingStats = new Map<BankingMetricKey, MetricStats>();
  for (const metric of BANKING_METRICS) {
    bankingStats.set(metric.key, summarizeMetric(banking.map(metric.read)));
  }

  const sigmas = finiteValues(members.map((m) => m.prices.sigma20));

  return Object.freeze({
    sector,
    asOf,
    tickers: Object.freeze(members.map((m) => m.ticker).sort()),
    standardStats,
    bankingStats,
    medianSigma20: sigmas.length > 0 ? median(sigmas) : null,
  });
}
