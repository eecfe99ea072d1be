import { describe, it, expect } from 'vitest';
import { normalizeName, namesMatch } from './normalize.js';

describe('normalizeName', () => {
  it('should trim, lower-case and collapse whitespace', () => {
    expect(normalizeName('  User   Login\tFlow ')).toBe('user login flow');
  });

  it('should keep punctuation', () => {
    expect(normalizeName('Real-Time Chat')).toBe('real-time chat');
  });

  it('should return an empty string for blank input', () => {
    expect(normalizeName('   ')).toBe('');
  });
});

describe('namesMatch', () => {
  it('should compare case and whitespace insensitively', () => {
    expect(namesMatch('CRUD', ' crud ')).toBe(true);
    expect(namesMatch('crud api', 'crud  API')).toBe(true);
    expect(namesMatch('crud', 'cruds')).toBe(false);
  });
});
