import { describe, it, expect } from 'vitest';
import {
  ValidationError,
  NotFoundError,
  EmptyInputError,
  ComputationError,
  ConfigValidationError,
  isEstimatorError,
  describeValue,
} from './errors.js';
import { ok, fail, unwrapOr } from './outcome.js';

describe('errors', () => {
  it('should name the offending field and value', () => {
    const error = new ValidationError('seedTimeHours', -2, 'must be a positive number');

    expect(error.message).toBe('Invalid seedTimeHours: must be a positive number (got: -2)');
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.field).toBe('seedTimeHours');
    expect(error.value).toBe(-2);
  });

  it('should quote string values', () => {
    expect(new ValidationError('team', 'qa', 'unknown team').message).toBe(
      'Invalid team: unknown team (got: "qa")'
    );
  });

  it('should describe not-found resources', () => {
    const error = new NotFoundError('Feature', 'feat_123');
    expect(error.message).toBe('Feature not found: feat_123');
    expect(error.code).toBe('NOT_FOUND');
  });

  it('should describe empty input', () => {
    expect(new EmptyInputError('median').message).toBe('Cannot compute median of an empty sequence');
  });

  it('should list config errors', () => {
    const error = new ConfigValidationError(['a is bad', 'b is bad']);
    expect(error.message).toBe('Configuration validation failed:\n  - a is bad\n  - b is bad');
    expect(error.errors).toEqual(['a is bad', 'b is bad']);
  });

  it('should recognise estimator errors', () => {
    expect(isEstimatorError(new ComputationError('broken'))).toBe(true);
    expect(isEstimatorError(new Error('plain'))).toBe(false);
    expect(new ComputationError('broken')).toBeInstanceOf(Error);
  });

  it('should describe values for messages', () => {
    expect(describeValue(undefined)).toBe('undefined');
    expect(describeValue(null)).toBe('null');
    expect(describeValue(['a'])).toBe('["a"]');
    expect(describeValue(Number.NaN)).toBe('NaN');
  });
});

describe('outcome', () => {
  it('should unwrap successes and fall back on failures', () => {
    expect(unwrapOr(ok(4), 0)).toBe(4);
    expect(unwrapOr(fail(new Error('x')), 0)).toBe(0);
  });
});
