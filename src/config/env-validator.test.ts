import { describe, it, expect } from 'vitest';
import { validateEnv, assertEnv, isDataSourceKind } from './env-validator.js';

describe('validateEnv', () => {
  it('should require nothing for the file data source', () => {
    expect(validateEnv('file', {})).toEqual({ valid: true, dataSource: 'file', missing: [] });
  });

  it('should require Supabase credentials for the supabase data source', () => {
    expect(validateEnv('supabase', { SUPABASE_URL: 'http://localhost:54321' })).toEqual({
      valid: false,
      dataSource: 'supabase',
      missing: ['SUPABASE_SERVICE_KEY'],
    });
  });

  it('should read the data source from EST_DATA_SOURCE', () => {
    const result = validateEnv(undefined, { EST_DATA_SOURCE: ' Supabase ' });
    expect(result.dataSource).toBe('supabase');
    expect(result.missing).toEqual(['SUPABASE_URL', 'SUPABASE_SERVICE_KEY']);
  });

  it('should fall back to file for an unknown EST_DATA_SOURCE', () => {
    expect(validateEnv(undefined, { EST_DATA_SOURCE: 'mongo' }).dataSource).toBe('file');
  });

  it('should pass with every required variable set', () => {
    const env = { SUPABASE_URL: 'http://localhost:54321', SUPABASE_SERVICE_KEY: 'test-secret' };
    expect(validateEnv('supabase', env).valid).toBe(true);
  });
});

describe('assertEnv', () => {
  it('should throw listing every missing variable', () => {
    expect(() => assertEnv('supabase', {})).toThrow(
      [
        'Missing required environment variables for the supabase data source:',
        '  - SUPABASE_URL',
        '  - SUPABASE_SERVICE_KEY',
      ].join('\n')
    );
  });

  it('should not throw when the environment is complete', () => {
    expect(() => assertEnv('file', {})).not.toThrow();
  });
});

describe('isDataSourceKind', () => {
  it('should accept only known kinds', () => {
    expect(isDataSourceKind('file')).toBe(true);
    expect(isDataSourceKind('supabase')).toBe(true);
    expect(isDataSourceKind('postgres')).toBe(false);
  });
});
