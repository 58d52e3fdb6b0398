/**
 * Error taxonomy for the scoring pipeline.
 *
 * Missing metrics and degenerate statistics are not errors: they resolve to
 * neutral values and surface through confidence. Only malformed input and
 * deployment defects (bad configuration) throw.
 */

export type ScoringErrorCode = 'invalid_input' | 'configuration_error';

export class ScoringError extends Error {
  readonly code: ScoringErrorCode;

  constructor(code: ScoringErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = 'ScoringError';
    this.code = code;
  }
}

export class InvalidInputError extends ScoringError {
  constructor(detail: string) {
    super('invalid_input', detail);
    this.name = 'InvalidInputError';
  }
}

export class ConfigurationError extends ScoringError {
  constructor(detail: string) {
    super('configuration_error', detail);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
