/**
 * Environment variable handling with validation
 */

import dotenv from 'dotenv';
import { isAbsolute, join } from 'path';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
const NODE_ENVS = ['development', 'production', 'test'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type NodeEnv = (typeof NODE_ENVS)[number];

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  scoresDbPath: string;
  scoringConfigPath: string | null;
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((entry) => entry === value);
}

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((entry) => entry === value);
}

function resolveFromRoot(path: string): string {
  return isAbsolute(path) || path === ':memory:' ? path : join(process.cwd(), path);
}

export function loadEnvConfig(): EnvConfig {
  const logLevelRaw = getEnvVar('LOG_LEVEL') ?? 'info';
  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';
  const configPath = getEnvVar('SCORING_CONFIG');

  return {
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : 'info',
    nodeEnv: isNodeEnv(nodeEnvRaw) ? nodeEnvRaw : 'development',
    scoresDbPath: resolveFromRoot(getEnvVar('SCORES_DB_PATH') ?? join('data', 'scores.db')),
    scoringConfigPath: configPath ? resolveFromRoot(configPath) : null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}

/**
 * Loads `.env.local` then `.env` from `root` (earlier files win, the process
 * environment wins over both) and drops the cached config.
 */
export function loadDotenvFiles(root: string = process.cwd()): void {
  dotenv.config({ path: join(root, '.env.local') });
  dotenv.config({ path: join(root, '.env') });
  resetEnvConfig();
}
