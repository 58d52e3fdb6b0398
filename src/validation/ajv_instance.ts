/**
 * Ajv validation instance with schema validators
 * Config bundles and snapshot files are checked against their schemas before use
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getScoringConfigSchema, getSnapshotBatchSchema } from './schema_loader';
import type { RawScoringConfig } from '@/scoring/scoring_config';
import type { RawSnapshotBatch } from '@/data/snapshot_loader';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, email, uri, etc.)
addFormats(ajv);

// Lazy-loaded validators
let scoringConfigValidator: ValidateFunction<RawScoringConfig> | null = null;
let snapshotBatchValidator: ValidateFunction<RawSnapshotBatch> | null = null;

export function getScoringConfigValidator(): ValidateFunction<RawScoringConfig> {
  if (!scoringConfigValidator) {
    scoringConfigValidator = ajv.compile<RawScoringConfig>(getScoringConfigSchema());
  }
  return scoringConfigValidator;
}

export function getSnapshotBatchValidator(): ValidateFunction<RawSnapshotBatch> {
  if (!snapshotBatchValidator) {
    snapshotBatchValidator = ajv.compile<RawSnapshotBatch>(getSnapshotBatchSchema());
  }
  return snapshotBatchValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateScoringConfigDocument(data: unknown): ValidationResult<RawScoringConfig> {
  return runValidator(getScoringConfigValidator(), data);
}

export function validateSnapshotBatch(data: unknown): ValidationResult<RawSnapshotBatch> {
  return runValidator(getSnapshotBatchValidator(), data);
}
