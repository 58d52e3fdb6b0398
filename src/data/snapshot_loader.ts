/**
 * Snapshot file loader
 * Reads a JSON batch of instrument snapshots, validates it against
 * snapshot_batch.v1, and fills absent metrics with null.
 */

import { readFileSync } from 'fs';
import { InvalidInputError, errorMessage } from '@/core/errors';
import type {
  BankingFundamentals,
  Fundamentals,
  InstrumentSnapshot,
  Metric,
  OwnershipRecord,
  PriceRecord,
  StandardFundamentals,
} from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import { validateSnapshotBatch } from '@/validation/ajv_instance';

const logger = createChildLogger('snapshot_loader');

export type RawPrices = Partial<Omit<PriceRecord, 'volumeHistory'>> & {
  volumeHistory?: number[];
};
export type RawStandardFundamentals = Partial<StandardFundamentals> & {
  kind: 'standard';
};
export type RawBankingFundamentals = Partial<BankingFundamentals> & {
  kind: 'banking';
};

export interface RawInstrument {
  ticker: string;
  asOf?: string;
  sector: string;
  prices: RawPrices;
  fundamentals: RawStandardFundamentals | RawBankingFundamentals;
  ownership: Partial<OwnershipRecord>;
}

export interface RawSnapshotBatch {
  asOf?: string;
  instruments: RawInstrument[];
}

const m = (value: Metric | undefined): Metric => value ?? null;

function toPrices(raw: RawPrices): PriceRecord {
  return {
    close: m(raw.close),
    high20: m(raw.high20),
    volume: m(raw.volume),
    volumeHistory: raw.volumeHistory ?? [],
    dma20: m(raw.dma20),
    dma50: m(raw.dma50),
    dma200: m(raw.dma200),
    rsi14: m(raw.rsi14),
    atr14: m(raw.atr14),
    ret21d: m(raw.ret21d),
    ret63d: m(raw.ret63d),
    ret126d: m(raw.ret126d),
    sigma20: m(raw.sigma20),
    sigma60: m(raw.sigma60),
    medianTradedValueCr: m(raw.medianTradedValueCr),
    quarterEnd: raw.quarterEnd ?? null,
  };
}

function toFundamentals(raw: RawInstrument['fundamentals']): Fundamentals {
  if (raw.kind === 'banking') {
    return {
      kind: 'banking',
      marketCapCr: m(raw.marketCapCr),
      roa3y: m(raw.roa3y),
      roe3y: m(raw.roe3y),
      gnpaPct: m(raw.gnpaPct),
      pcrPct: m(raw.pcrPct),
      nim3y: m(raw.nim3y),
      dividendPayout: m(raw.dividendPayout),
    };
  }
  return {
    kind: 'standard',
    marketCapCr: m(raw.marketCapCr),
    roe3y: m(raw.roe3y),
    salesCagr3y: m(raw.salesCagr3y),
    epsCagr3y: m(raw.epsCagr3y),
    pe: m(raw.pe),
    evEbitda: m(raw.evEbitda),
    debtToEquity: m(raw.debtToEquity),
    opmMargin: m(raw.opmMargin),
    roce3y: m(raw.roce3y),
    opmStdev12q: m(raw.opmStdev12q),
    dividendPayout: m(raw.dividendPayout),
  };
}

function toOwnership(raw: Partial<OwnershipRecord>): OwnershipRecord {
  return {
    promoterHold: m(raw.promoterHold),
    promoterPledge: m(raw.promoterPledge),
    fiiHold: m(raw.fiiHold),
    diiHold: m(raw.diiHold),
    fiiChange3m: m(raw.fiiChange3m),
    diiChange3m: m(raw.diiChange3m),
  };
}

/**
 * Converts a schema-valid batch into snapshots. The instrument's own `asOf`
 * wins over the batch default. Per-instrument checks (ticker shape, sector)
 * are left to the scorer so one bad row does not reject the file.
 */
export function toSnapshots(batch: RawSnapshotBatch): InstrumentSnapshot[] {
  return batch.instruments.map((raw, index) => {
    const asOf = raw.asOf ?? batch.asOf;
    if (asOf === undefined) {
      throw new InvalidInputError(`instruments[${index}] (${raw.ticker}) has no asOf date`);
    }
    return {
      ticker: raw.ticker.trim().toUpperCase(),
      asOf,
      sector: raw.sector,
      prices: toPrices(raw.prices),
      fundamentals: toFundamentals(raw.fundamentals),
      ownership: toOwnership(raw.ownership),
    };
  });
}

export function parseSnapshotBatch(data: unknown): InstrumentSnapshot[] {
  const result = validateSnapshotBatch(data);
  if (!result.valid || !result.data) {
    throw new InvalidInputError(
      `snapshot batch failed schema validation: ${(result.errors ?? []).join('; ')}`
    );
  }
  return toSnapshots(result.data);
}

export function loadSnapshotFile(path: string): InstrumentSnapshot[] {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InvalidInputError(`cannot read snapshot file ${path}: ${errorMessage(error)}`);
  }

  const snapshots = parseSnapshotBatch(data);
  logger.info({ path, instruments: snapshots.length }, 'Snapshot file loaded');
  return snapshots;
}
