/**
 * Input validators. All failures are InvalidInputError and are raised before
 * any scoring work happens.
 */

import { InvalidInputError } from '@/core/errors';
import { isIsoDate } from '@/core/time';
import { BANDS, GUARDRAIL_FLAGS, MODES } from '@/scoring/types';
import type {
  Band,
  GuardrailFlag,
  InstrumentSnapshot,
  Mode,
  ScoreOutput,
} from '@/scoring/types';

const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9&.\-]{0,19}$/;
const SECTOR_PATTERN = /^[a-z][a-z0-9_]*$/;

export function isMode(value: unknown): value is Mode {
  return typeof value === 'string' && MODES.some((entry) => entry === value);
}

export function isBand(value: unknown): value is Band {
  return typeof value === 'string' && BANDS.some((entry) => entry === value);
}

export function isGuardrailFlag(value: unknown): value is GuardrailFlag {
  return typeof value === 'string' && GUARDRAIL_FLAGS.some((entry) => entry === value);
}

/** Trims and upper-cases; 1-20 chars of A-Z, 0-9, `&`, `.`, `-`. */
export function validateTicker(ticker: unknown): string {
  if (typeof ticker !== 'string') {
    throw new InvalidInputError(`ticker must be a string, got ${typeof ticker}`);
  }
  const normalized = ticker.trim().toUpperCase();
  if (!TICKER_PATTERN.test(normalized)) {
    throw new InvalidInputError(`malformed ticker '${ticker}'`);
  }
  return normalized;
}

export function validateDate(date: unknown): string {
  if (typeof date !== 'string' || !isIsoDate(date)) {
    throw new InvalidInputError(`malformed date '${String(date)}', expected YYYY-MM-DD`);
  }
  return date;
}

export function validateMode(mode: unknown): Mode {
  if (typeof mode === 'string') {
    const normalized = mode.trim().toLowerCase();
    if (isMode(normalized)) return normalized;
  }
  throw new InvalidInputError(`mode must be one of ${MODES.join(', ')}, got '${String(mode)}'`);
}

/**
 * Shape check only. Whether the sector is configured is a configuration
 * concern handled by the weight resolver.
 */
export function validateSector(sector: unknown): string {
  if (typeof sector !== 'string' || !SECTOR_PATTERN.test(sector)) {
    throw new InvalidInputError(`malformed sector '${String(sector)}'`);
  }
  return sector;
}

function checkMetric(path: string, value: unknown): void {
  if (value === null) return;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`${path} must be a finite number or null, got ${String(value)}`);
  }
}

function checkRecord(path: string, record: object, skip: readonly string[] = []): void {
  for (const [field, value] of Object.entries(record)) {
    if (skip.includes(field)) continue;
    checkMetric(`${path}.${field}`, value);
  }
}

/**
 * Identity fields are well formed and every metric is finite or null.
 */
export function validateSnapshot(snapshot: InstrumentSnapshot): void {
  const ticker = validateTicker(snapshot.ticker);
  if (ticker !== snapshot.ticker) {
    throw new InvalidInputError(`ticker '${snapshot.ticker}' is not normalized`);
  }
  validateDate(snapshot.asOf);
  validateSector(snapshot.sector);

  const { prices, fundamentals, ownership } = snapshot;
  checkRecord(`${ticker}.prices`, prices, ['volumeHistory', 'quarterEnd']);
  prices.volumeHistory.forEach((value, index) =>
    checkMetric(`${ticker}.prices.volumeHistory[${index}]`, value)
  );
  if (prices.quarterEnd !== null && !isIsoDate(prices.quarterEnd)) {
    throw new InvalidInputError(`${ticker}.prices.quarterEnd is not a YYYY-MM-DD date`);
  }

  if (fundamentals.kind !== 'standard' && fundamentals.kind !== 'banking') {
    throw new InvalidInputError(`${ticker}.fundamentals.kind is not recognised`);
  }
  checkRecord(`${ticker}.fundamentals`, fundamentals, ['kind']);
  checkRecord(`${ticker}.ownership`, ownership);
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isFinite(value) && value >= min && value <= max;
}

/**
 * Range checks on a finished output. Returns the list of violations.
 */
export function validateScoreOutput(output: ScoreOutput): string[] {
  const problems: string[] = [];
  if (!inRange(output.score, 0, 100)) problems.push(`score ${output.score} outside [0, 100]`);
  for (const [pillar, value] of Object.entries(output.pillars)) {
    if (!inRange(value, 0, 100)) problems.push(`pillar ${pillar} ${value} outside [0, 100]`);
  }
  if (!(output.riskPenalty >= 0)) problems.push(`risk penalty ${output.riskPenalty} is negative`);
  if (!inRange(output.confidence, 0, 1)) problems.push(`confidence ${output.confidence} outside [0, 1]`);
  if (!isBand(output.band)) problems.push(`unknown band '${output.band}'`);
  if (!isMode(output.mode)) problems.push(`unknown mode '${output.mode}'`);
  for (const flag of output.guardrailFlags) {
    if (!isGuardrailFlag(flag)) problems.push(`unknown guardrail flag '${flag}'`);
  }
  return problems;
}
