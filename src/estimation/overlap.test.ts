import { describe, it, expect } from 'vitest';
import { detectOverlaps, DEFAULT_OVERLAP_KEYWORDS } from './overlap.js';

describe('detectOverlaps', () => {
  it('should flag features sharing a keyword', () => {
    const warnings = detectOverlaps(['User Login', 'User Profile', 'Search'], ['user']);

    expect(warnings).toEqual([
      {
        features: ['User Login', 'User Profile'],
        keywords: ['user'],
        suggestion: '"User Login", "User Profile" share "user"; consider merging or clarifying scope',
      },
    ]);
  });

  it('should match tokens that start with the keyword', () => {
    const warnings = detectOverlaps(['Email Notifications', 'Push notification settings'], ['notif']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].features).toEqual(['Email Notifications', 'Push notification settings']);
  });

  it('should not match a keyword in the middle of a token', () => {
    expect(detectOverlaps(['Reauthorize', 'Auth Flow'], ['auth'])).toEqual([]);
  });

  it('should merge keywords that flag the same feature set', () => {
    const warnings = detectOverlaps(['User Login Page', 'user login api'], ['user', 'login']);

    expect(warnings).toHaveLength(1);
    expect(warnings[0].keywords).toEqual(['user', 'login']);
    expect(warnings[0].suggestion).toBe(
      '"User Login Page", "user login api" share "user", "login"; consider merging or clarifying scope'
    );
  });

  it('should keep separate warnings for different feature sets', () => {
    const warnings = detectOverlaps(['Admin Dashboard', 'Admin Users', 'User Profile'], ['admin', 'user']);

    expect(warnings.map(w => w.features)).toEqual([
      ['Admin Dashboard', 'Admin Users'],
      ['Admin Users', 'User Profile'],
    ]);
  });

  it('should ignore repeated spellings of one feature', () => {
    expect(detectOverlaps(['User Login', 'user  login'], ['user'])).toEqual([]);
  });

  it('should return nothing for a single feature or an empty list', () => {
    expect(detectOverlaps(['User Login'])).toEqual([]);
    expect(detectOverlaps([])).toEqual([]);
  });

  it('should use the default vocabulary', () => {
    expect(DEFAULT_OVERLAP_KEYWORDS).toContain('auth');
    expect(detectOverlaps(['Auth Service', 'OAuth login', 'Authentication UI'])[0].features)
      .toEqual(['Auth Service', 'Authentication UI']);
  });
});
