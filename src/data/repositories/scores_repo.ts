/**
 * Score repository for persisted pipeline outputs
 */

import type Database from 'better-sqlite3';
import { getDatabase } from '../db';
import type { Band, GuardrailFlag, Mode, PillarScores, ScoreOutput } from '@/scoring/types';
import { createChildLogger } from '@/utils/logger';
import { isBand, isGuardrailFlag, isMode } from '@/validation/validators';

const logger = createChildLogger('scores_repo');

interface ScoreRow {
  ticker: string;
  date: string;
  mode: string;
  sector: string;
  score: number;
  band: string;
  f_score: number;
  t_score: number;
  r_score: number;
  o_score: number;
  q_score: number;
  s_score: number;
  risk_penalty: number;
  confidence: number;
  imputed_fraction: number;
  s_z: number;
  guardrail_flags: string;
  config_hash: string;
  code_version: string;
  updated_at: number;
}

type ScoreParams = Omit<ScoreRow, 'updated_at'> & { details_json: string | null; now: number };

/** A stored output. Pillar detail stays in `details_json` for audit. */
export type StoredScore = Omit<ScoreOutput, 'details'> & { updatedAt: number };

export interface ScoreStats {
  total: number;
  tickers: number;
  dates: number;
  latestDate: string | null;
  byBand: Record<Band, number>;
  byMode: Record<Mode, number>;
}

export interface ScoreQuery {
  from?: string;
  to?: string;
  mode?: Mode;
}

const ROW_COLUMNS = `
  ticker, date, mode, sector, score, band,
  f_score, t_score, r_score, o_score, q_score, s_score,
  risk_penalty, confidence, imputed_fraction, s_z, guardrail_flags,
  config_hash, code_version, updated_at
`;

function parseFlags(raw: string): GuardrailFlag[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isGuardrailFlag);
}

function toStoredScore(row: ScoreRow): StoredScore {
  const { mode, band } = row;
  if (!isMode(mode) || !isBand(band)) {
    throw new Error(`Corrupt score row for ${row.ticker} on ${row.date}: mode=${mode} band=${band}`);
  }
  const pillars: PillarScores = {
    F: row.f_score,
    T: row.t_score,
    R: row.r_score,
    O: row.o_score,
    Q: row.q_score,
    S: row.s_score,
  };
  return {
    ticker: row.ticker,
    date: row.date,
    mode,
    sector: row.sector,
    score: row.score,
    band,
    pillars,
    riskPenalty: row.risk_penalty,
    confidence: row.confidence,
    imputedFraction: row.imputed_fraction,
    sZ: row.s_z,
    guardrailFlags: parseFlags(row.guardrail_flags),
    configHash: row.config_hash,
    codeVersion: row.code_version,
    updatedAt: row.updated_at,
  };
}

function toParams(output: ScoreOutput, now: number, withDetails: boolean): ScoreParams {
  return {
    ticker: output.ticker,
    date: output.date,
    mode: output.mode,
    sector: output.sector,
    score: output.score,
    band: output.band,
    f_score: output.pillars.F,
    t_score: output.pillars.T,
    r_score: output.pillars.R,
    o_score: output.pillars.O,
    q_score: output.pillars.Q,
    s_score: output.pillars.S,
    risk_penalty: output.riskPenalty,
    confidence: output.confidence,
    imputed_fraction: output.imputedFraction,
    s_z: output.sZ,
    guardrail_flags: JSON.stringify(output.guardrailFlags),
    details_json: withDetails ? JSON.stringify(output.details) : null,
    config_hash: output.configHash,
    code_version: output.codeVersion,
    now,
  };
}

export class ScoreRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database = getDatabase()) {
    this.db = db;
  }

  /**
   * Insert or replace the output for (ticker, date, mode). `created_at` of an
   * existing row is kept.
   */
  upsertScore(output: ScoreOutput, options: { withDetails?: boolean } = {}): void {
    this.db
      .prepare<ScoreParams>(
        `
      INSERT INTO scores (
        ticker, date, mode, sector, score, band,
        f_score, t_score, r_score, o_score, q_score, s_score,
        risk_penalty, confidence, imputed_fraction, s_z, guardrail_flags,
        details_json, config_hash, code_version, created_at, updated_at
      ) VALUES (
        @ticker, @date, @mode, @sector, @score, @band,
        @f_score, @t_score, @r_score, @o_score, @q_score, @s_score,
        @risk_penalty, @confidence, @imputed_fraction, @s_z, @guardrail_flags,
        @details_json, @config_hash, @code_version, @now, @now
      )
      ON CONFLICT(ticker, date, mode) DO UPDATE SET
        sector = excluded.sector,
        score = excluded.score,
        band = excluded.band,
        f_score = excluded.f_score,
        t_score = excluded.t_score,
        r_score = excluded.r_score,
        o_score = excluded.o_score,
        q_score = excluded.q_score,
        s_score = excluded.s_score,
        risk_penalty = excluded.risk_penalty,
        confidence = excluded.confidence,
        imputed_fraction = excluded.imputed_fraction,
        s_z = excluded.s_z,
        guardrail_flags = excluded.guardrail_flags,
        details_json = excluded.details_json,
        config_hash = excluded.config_hash,
        code_version = excluded.code_version,
        updated_at = excluded.updated_at
    `
      )
      .run(toParams(output, Date.now(), options.withDetails ?? true));
  }

  /** All-or-nothing: a failing row rolls back the whole batch. */
  upsertScores(outputs: readonly ScoreOutput[], options: { withDetails?: boolean } = {}): number {
    const insertAll = this.db.transaction((items: readonly ScoreOutput[]) => {
      for (const output of items) {
        this.upsertScore(output, options);
      }
    });
    insertAll(outputs);
    logger.info({ count: outputs.length }, 'Scores persisted');
    return outputs.length;
  }

  getScore(ticker: string, date: string, mode: Mode): StoredScore | null {
    const row = this.db
      .prepare<[string, string, string], ScoreRow>(
        `SELECT ${ROW_COLUMNS} FROM scores WHERE ticker = ? AND date = ? AND mode = ?`
      )
      .get(ticker, date, mode);
    return row ? toStoredScore(row) : null;
  }

  /** Raw detail payload as written, or null when stored without details. */
  getScoreDetailsJson(ticker: string, date: string, mode: Mode): string | null {
    const row = this.db
      .prepare<[string, string, string], { details_json: string | null }>(
        'SELECT details_json FROM scores WHERE ticker = ? AND date = ? AND mode = ?'
      )
      .get(ticker, date, mode);
    return row?.details_json ?? null;
  }

  /** Ascending by date, then mode. Bounds are inclusive. */
  getScoresByTicker(ticker: string, query: ScoreQuery = {}): StoredScore[] {
    const clauses = ['ticker = @ticker'];
    if (query.from) clauses.push('date >= @from');
    if (query.to) clauses.push('date <= @to');
    if (query.mode) clauses.push('mode = @mode');

    const rows = this.db
      .prepare<Record<string, string>, ScoreRow>(
        `SELECT ${ROW_COLUMNS} FROM scores WHERE ${clauses.join(' AND ')} ORDER BY date ASC, mode ASC`
      )
      .all({
        ticker,
        ...(query.from ? { from: query.from } : {}),
        ...(query.to ? { to: query.to } : {}),
        ...(query.mode ? { mode: query.mode } : {}),
      });
    return rows.map(toStoredScore);
  }

  /** Highest score first, ties by ticker. */
  getScoresByBand(band: Band, date: string, mode?: Mode): StoredScore[] {
    const rows = mode
      ? this.db
          .prepare<[string, string, string], ScoreRow>(
            `SELECT ${ROW_COLUMNS} FROM scores WHERE band = ? AND date = ? AND mode = ?
             ORDER BY score DESC, ticker ASC`
          )
          .all(band, date, mode)
      : this.db
          .prepare<[string, string], ScoreRow>(
            `SELECT ${ROW_COLUMNS} FROM scores WHERE band = ? AND date = ?
             ORDER BY score DESC, ticker ASC, mode ASC`
          )
          .all(band, date);
    return rows.map(toStoredScore);
  }

  /** Most recent row per (ticker, mode). */
  getLatestScores(mode?: Mode): StoredScore[] {
    const filter = mode ? 'WHERE mode = ?' : '';
    const sql = `
      SELECT ${ROW_COLUMNS.replace(/(\w+)/g, 's.$1')}
      FROM scores s
      JOIN (
        SELECT ticker, mode, MAX(date) AS max_date
        FROM scores ${filter}
        GROUP BY ticker, mode
      ) latest ON s.ticker = latest.ticker AND s.mode = latest.mode AND s.date = latest.max_date
      ORDER BY s.ticker ASC, s.mode ASC
    `;
    const rows = mode
      ? this.db.prepare<[string], ScoreRow>(sql).all(mode)
      : this.db.prepare<[], ScoreRow>(sql).all();
    return rows.map(toStoredScore);
  }

  getStats(): ScoreStats {
    const totals = this.db
      .prepare<
        [],
        { total: number; tickers: number; dates: number; latest_date: string | null }
      >(
        `SELECT COUNT(*) AS total, COUNT(DISTINCT ticker) AS tickers,
                COUNT(DISTINCT date) AS dates, MAX(date) AS latest_date
         FROM scores`
      )
      .get();

    const byBand: Record<Band, number> = { 'Strong Buy': 0, Buy: 0, Hold: 0, Avoid: 0 };
    for (const row of this.db
      .prepare<[], { band: string; count: number }>(
        'SELECT band, COUNT(*) AS count FROM scores GROUP BY band'
      )
      .all()) {
      if (isBand(row.band)) byBand[row.band] = row.count;
    }

    const byMode: Record<Mode, number> = { trader: 0, investor: 0 };
    for (const row of this.db
      .prepare<[], { mode: string; count: number }>(
        'SELECT mode, COUNT(*) AS count FROM scores GROUP BY mode'
      )
      .all()) {
      if (isMode(row.mode)) byMode[row.mode] = row.count;
    }

    return {
      total: totals?.total ?? 0,
      tickers: totals?.tickers ?? 0,
      dates: totals?.dates ?? 0,
      latestDate: totals?.latest_date ?? null,
      byBand,
      byMode,
    };
  }
}
