/**
 * Fundamentals pillar (F)
 * Weighted sum of sector-relative points. Banking instruments are scored on
 * asset quality and returns, everything else on returns, growth, valuation,
 * leverage and margin.
 */

import { BANKING_METRICS, STANDARD_METRICS } from './metrics';
import { EMPTY_STATS, clamp, normalizePoints } from './normalize';
import type { PeerSet } from './peer_set';
import type { ScoringConfig } from './scoring_config';
import type {
  FundamentalsDetails,
  InstrumentSnapshot,
  MetricContribution,
  PillarResult,
} from './types';

export function calculateFundamentalsScore(
  snapshot: InstrumentSnapshot,
  peerSet: PeerSet,
  config: ScoringConfig
): PillarResult<FundamentalsDetails> {
  const fundamentals = snapshot.fundamentals;
  const components: MetricContribution[] = [];

  if (fundamentals.kind === 'banking') {
    for (const metric of BANKING_METRICS) {
      const value = metric.read(fundamentals);
      const stats = peerSet.bankingStats.get(metric.key) ?? EMPTY_STATS;
      const result = normalizePoints(value, stats, metric.direction, config.normalization);
      components.push({
        metric: metric.key,
        value,
        points: result.points,
        weight: config.fundamentals.banking[metric.key],
        method: result.method,
        imputed: result.imputed,
      });
    }
  } else {
    for (const metric of STANDARD_METRICS) {
      const value = metric.read(fundamentals);
      const stats = peerSet.standardStats.get(metric.key) ?? EMPTY_STATS;
      const result = normalizePoints(value, stats, metric.direction, config.normalization);
      components.push({
        metric: metric.key,
        value,
        points: result.points,
        weight: config.fundamentals.standard[metric.key],
        method: result.method,
        imputed: result.imputed,
      });
    }
  }

  const total = components.reduce((sum, c) => sum + c.points * c.weight, 0);

  return {
    score: clamp(total),
    details: {
      kind: fundamentals.kind,
      components,
      missingFields: components.filter((c) => c.imputed).map((c) => c.metric),
    },
  };
}
