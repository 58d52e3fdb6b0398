/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';

export type JsonSchema = SchemaObject;

const schemaCache = new Map<string, JsonSchema>();

function isJsonObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadSchema(schemaName: string): JsonSchema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isJsonObject(parsed)) {
    throw new Error(`schema_invalid: ${schemaPath} does not contain a JSON object`);
  }

  schemaCache.set(schemaName, parsed);
  return parsed;
}

export function getScoringConfigSchema(): JsonSchema {
  return loadSchema('scoring_config.v1');
}

export function getSnapshotBatchSchema(): JsonSchema {
  return loadSchema('snapshot_batch.v1');
}
