/**
 * Data coverage: fraction of required inputs that were actually present.
 */

import type { InstrumentSnapshot } from './types';

export interface CoverageResult {
  confidence: number;
  imputedFraction: number;
  required: number;
  present: number;
  missingFields: string[];
}

interface RequiredField {
  name: string;
  present: (snapshot: InstrumentSnapshot) => boolean;
}

const REQUIRED_FIELDS: readonly RequiredField[] = [
  { name: 'prices.close', present: (s) => s.prices.close !== null },
  { name: 'prices.volume', present: (s) => s.prices.volume !== null },
  { name: 'prices.rsi14', present: (s) => s.prices.rsi14 !== null },
  { name: 'prices.atr14', present: (s) => s.prices.atr14 !== null },
  { name: 'prices.dma20', present: (s) => s.prices.dma20 !== null },
  { name: 'prices.dma200', present: (s) => s.prices.dma200 !== null },
  { name: 'fundamentals.marketCapCr', present: (s) => s.fundamentals.marketCapCr !== null },
  { name: 'fundamentals.roe3y', present: (s) => s.fundamentals.roe3y !== null },
  {
    // Growth for industrials, asset returns for lenders
    name: 'fundamentals.core',
    present: (s) =>
      s.fundamentals.kind === 'banking'
        ? s.fundamentals.roa3y !== null
        : s.fundamentals.salesCagr3y !== null,
  },
  { name: 'ownership.promoterHold', present: (s) => s.ownership.promoterHold !== null },
  {
    name: 'ownership.institutional',
    present: (s) => s.ownership.fiiHold !== null || s.ownership.diiHold !== null,
  },
];

export function calculateCoverage(snapshot: InstrumentSnapshot): CoverageResult {
  const missingFields = REQUIRED_FIELDS.filter((field) => !field.present(snapshot)).map(
    (field) => field.name
  );
  const required = REQUIRED_FIELDS.length;
  const present = required - missingFields.length;
  const confidence = present / required;

  return {
    confidence,
    imputedFraction: 1 - confidence,
    required,
    present,
    missingFields,
  };
}
