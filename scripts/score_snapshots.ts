/**
 * Score a snapshot file
 * Loads a snapshot batch, scores it in one mode, optionally persists the
 * outputs and prints a band summary.
 *
 * Usage: npx tsx scripts/score_snapshots.ts <snapshots.json> [--mode=investor] [--persist] [--config=path]
 */

import './load_env';
import { resolve } from 'path';

import { closeDatabase, getDatabase } from '../src/data/db';
import { ScoreRepository } from '../src/data/repositories/scores_repo';
import { loadSnapshotFile } from '../src/data/snapshot_loader';
import { errorMessage } from '../src/core/errors';
import { scoreBatch } from '../src/scoring/engine';
import { summarizeGuardrails } from '../src/scoring/explain';
import { loadScoringConfig } from '../src/scoring/scoring_config';
import { BANDS } from '../src/scoring/types';
import type { Band } from '../src/scoring/types';
import { createChildLogger } from '../src/utils/logger';
import { validateMode } from '../src/validation/validators';

const logger = createChildLogger('score_snapshots');

interface CliArgs {
  file: string;
  mode: string;
  persist: boolean;
  configPath?: string;
}

function readOption(name: string): string | undefined {
  const arg = process.argv.find((a) => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

function parseArgs(): CliArgs {
  const file = process.argv.slice(2).find((a) => !a.startsWith('--'));
  if (!file) {
    throw new Error('Usage: tsx scripts/score_snapshots.ts <snapshots.json> [--mode=investor] [--persist]');
  }
  return {
    file: resolve(process.cwd(), file),
    mode: readOption('mode') ?? 'investor',
    persist: process.argv.includes('--persist'),
    configPath: readOption('config'),
  };
}

function main(): void {
  const args = parseArgs();
  const mode = validateMode(args.mode);
  const config = loadScoringConfig(args.configPath);
  const snapshots = loadSnapshotFile(args.file);

  const result = scoreBatch(snapshots, mode, config);

  if (args.persist && result.outputs.length > 0) {
    new ScoreRepository(getDatabase()).upsertScores(result.outputs);
  }

  const bands: Record<Band, number> = { 'Strong Buy': 0, Buy: 0, Hold: 0, Avoid: 0 };
  for (const output of result.outputs) bands[output.band]++;

  console.log(`\nScored ${result.outputs.length} instrument(s) in ${mode} mode`);
  for (const band of BANDS) {
    console.log(`  ${band.padEnd(11)} ${bands[band]}`);
  }
  const guardrails = summarizeGuardrails(result.outputs);
  console.log(`  guardrail-free ${guardrails.clean}/${guardrails.total}`);

  for (const failure of result.failures) {
    console.log(`  FAILED ${failure.ticker} ${failure.date ?? '-'}: ${failure.reason}`);
  }

  logger.info(
    { file: args.file, mode, scored: result.outputs.length, failed: result.failures.length },
    'Snapshot scoring finished'
  );
}

try {
  main();
} catch (error) {
  logger.error({ error: errorMessage(error) }, 'Snapshot scoring failed');
  process.exitCode = 1;
} finally {
  closeDatabase();
}
