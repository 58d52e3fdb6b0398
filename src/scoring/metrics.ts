/**
 * Cross-sectional metric definitions for the Fundamentals pillar.
 * Banking and standard instruments use disjoint metric sets.
 */

import type {
  BankingFundamentals,
  Direction,
  Metric,
  StandardFundamentals,
} from './types';

export const STANDARD_METRIC_KEYS = [
  'roe_3y',
  'sales_cagr_3y',
  'eps_cagr_3y',
  'valuation',
  'debt_to_equity',
  'opm_margin',
] as const;
export type StandardMetricKey = (typeof STANDARD_METRIC_KEYS)[number];

export const BANKING_METRIC_KEYS = ['roa_3y', 'roe_3y', 'gnpa_pct', 'pcr_pct', 'nim_3y'] as const;
export type BankingMetricKey = (typeof BANKING_METRIC_KEYS)[number];

export interface MetricDefinition<K extends string, R> {
  key: K;
  direction: Direction;
  read: (record: R) => Metric;
}

export const STANDARD_METRICS: ReadonlyArray<MetricDefinition<StandardMetricKey, StandardFundamentals>> = [
  { key: 'roe_3y', direction: 'higher', read: (f) => f.roe3y },
  { key: 'sales_cagr_3y', direction: 'higher', read: (f) => f.salesCagr3y },
  { key: 'eps_cagr_3y', direction: 'higher', read: (f) => f.epsCagr3y },
  // EV/EBITDA when reported, P/E otherwise
  { key: 'valuation', direction: 'lower', read: (f) => f.evEbitda ?? f.pe },
  { key: 'debt_to_equity', direction: 'lower', read: (f) => f.debtToEquity },
  { key: 'opm_margin', direction: 'higher', read: (f) => f.opmMargin },
];

export const BANKING_METRICS: ReadonlyArray<MetricDefinition<BankingMetricKey, BankingFundamentals>> = [
  { key: 'roa_3y', direction: 'higher', read: (f) => f.roa3y },
  { key: 'roe_3y', direction: 'higher', read: (f) => f.roe3y },
  { key: 'gnpa_pct', direction: 'lower', read: (f) => f.gnpaPct },
  { key: 'pcr_pct', direction: 'higher', read: (f) => f.pcrPct },
  { key: 'nim_3y', direction: 'higher', read: (f) => f.nim3y },
];
