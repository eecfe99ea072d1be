/**
 * Error taxonomy shared by the estimation core and its collaborators.
 *
 * Every error carries a stable `code` so the CLI and the HTTP API can map
 * it without string matching on messages.
 */

export type EstimatorErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'EMPTY_INPUT'
  | 'COMPUTATION_ERROR'
  | 'CONFIG_VALIDATION_ERROR';

export abstract class EstimatorError extends Error {
  abstract readonly code: EstimatorErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed input: a missing required field, a non-positive hours value,
 * a duplicate name or synonym. Raised before any mutation happens.
 */
export class ValidationError extends EstimatorError {
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly reason: string
  ) {
    super(`Invalid ${field}: ${reason} (got: ${describeValue(value)})`);
  }
}

export class NotFoundError extends EstimatorError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    public readonly resourceType: string,
    public readonly identifier: string
  ) {
    super(`${resourceType} not found: ${identifier}`);
  }
}

/**
 * A statistics function received no values.
 */
export class EmptyInputError extends EstimatorError {
  readonly code = 'EMPTY_INPUT' as const;

  constructor(public readonly operation: string) {
    super(`Cannot compute ${operation} of an empty sequence`);
  }
}

/**
 * An internal invariant was violated. Signals a defect, not bad user input.
 */
export class ComputationError extends EstimatorError {
  readonly code = 'COMPUTATION_ERROR' as const;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
  }
}

export class ConfigValidationError extends EstimatorError {
  readonly code = 'CONFIG_VALIDATION_ERROR' as const;

  constructor(public readonly errors: string[]) {
    super(`Configuration validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

/**
 * A batch row that failed validation. Row numbers are 1-based and count the
 * header line for file imports.
 */
export interface RowError {
  rowNumber: number;
  errors: ValidationError[];
}

export function isEstimatorError(error: unknown): error is EstimatorError {
  return error instanceof EstimatorError;
}

export function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean' || value === null) return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
