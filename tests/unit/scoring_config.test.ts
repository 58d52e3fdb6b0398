import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { resetEnvConfig } from '@/core/env';
import { ConfigurationError } from '@/core/errors';
import {
  buildScoringConfig,
  getScoringConfig,
  loadScoringConfig,
  resetScoringConfig,
  type RawScoringConfig,
} from '@/scoring/scoring_config';
import { CONFIG_PATH } from '../fixtures/snapshot_factory';

function readDocument(): RawScoringConfig {
  return JSON.parse(readFileSync(CONFIG_PATH, 'utf-8'));
}

describe('scoring config', () => {
  let tempDir: string;
  const originalConfigEnv = process.env.SCORING_CONFIG;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'scoring-config-'));
    resetScoringConfig();
    resetEnvConfig();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    if (originalConfigEnv === undefined) {
      delete process.env.SCORING_CONFIG;
    } else {
      process.env.SCORING_CONFIG = originalConfigEnv;
    }
    resetScoringConfig();
    resetEnvConfig();
  });

  it('loads the bundled configuration', () => {
    const config = loadScoringConfig(CONFIG_PATH);
    expect(config.sectors).toContain('it');
    expect(config.bankingSectors).toEqual(['banks', 'nbfcs', 'psu_banks']);
    expect(config.bands).toEqual({ strongBuy: 75, buy: 65, hold: 50 });
    expect(config.normalization.minPeerSize).toBe(6);
    expect(config.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(Object.isFrozen(config.riskPenalty.caps)).toBe(true);
  });

  it('fingerprints the document independently of key order', () => {
    const document = readDocument();
    const reordered = Object.fromEntries(Object.entries(document).reverse());
    expect(buildScoringConfig(reordered).hash).toBe(buildScoringConfig(document).hash);
  });

  it('changes the fingerprint when a parameter changes', () => {
    const document = readDocument();
    const changed = { ...document, bands: { ...document.bands, hold: 45 } };
    expect(buildScoringConfig(changed).hash).not.toBe(buildScoringConfig(document).hash);
  });

  it('rejects pillar weights that do not sum to one', () => {
    const document = readDocument();
    document.pillar_weights.trader.default.F = 0.13;
    expect(() => buildScoringConfig(document)).toThrow(ConfigurationError);
    expect(() => buildScoringConfig(document)).toThrow(
      'configuration_error: pillar_weights.trader.default sum to 1.010000, expected 1.0'
    );
  });

  it('rejects overrides for sectors that are not configured', () => {
    const document = readDocument();
    document.pillar_weights.investor.sectors = {
      crypto: { F: 0.2, T: 0.2, R: 0.2, O: 0.2, Q: 0.1, S: 0.1 },
    };
    expect(() => buildScoringConfig(document)).toThrow(
      "pillar_weights.investor.sectors references unknown sector 'crypto'"
    );
  });

  it('rejects risk caps outside (0, 25]', () => {
    const document = readDocument();
    document.risk_penalty.caps.metals = 30;
    expect(() => buildScoringConfig(document)).toThrow(
      'risk_penalty.caps.metals is 30, must be in range (0, 25]'
    );
  });

  it('rejects a default risk cap above 25 at the schema step', () => {
    const document = readDocument();
    document.risk_penalty.caps.default = 30;
    expect(() => buildScoringConfig(document, 'test.json')).toThrow(
      /^configuration_error: invalid scoring config in test\.json: \/risk_penalty\/caps\/default: must be <= 25/
    );
  });

  it('rejects bands out of order', () => {
    const document = readDocument();
    document.bands.buy = 80;
    expect(() => buildScoringConfig(document)).toThrow('bands must satisfy strong_buy > buy > hold');
  });

  it('reports schema violations', () => {
    const { bands: _bands, ...withoutBands } = readDocument();
    expect(() => buildScoringConfig(withoutBands, 'test.json')).toThrow(
      /^configuration_error: invalid scoring config in test\.json: /
    );
  });

  it('fails when the file is missing', () => {
    expect(() => loadScoringConfig(join(tempDir, 'missing.json'))).toThrow(
      'scoring config not found'
    );
  });

  it('fails on malformed JSON', () => {
    const path = join(tempDir, 'broken.json');
    writeFileSync(path, '{ "version": ');
    expect(() => loadScoringConfig(path)).toThrow('is not valid JSON');
  });

  it('reads the path from SCORING_CONFIG and caches the result', () => {
    const document = readDocument();
    document.version = 'temp-1';
    const path = join(tempDir, 'scoring.json');
    writeFileSync(path, JSON.stringify(document));
    process.env.SCORING_CONFIG = path;

    const config = getScoringConfig();
    expect(config.version).toBe('temp-1');
    expect(config.source).toBe(path);
    expect(getScoringConfig()).toBe(config);
  });
});
