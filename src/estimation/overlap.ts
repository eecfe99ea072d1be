/**
 * Heuristic detection of features in one project that probably cover the
 * same ground ("User Login" and "Auth Flow" both touching authentication).
 * Best effort only: it flags for review and never changes the totals.
 */

import { normalizeName } from './normalize.js';
import type { OverlapWarning } from './types.js';

export const DEFAULT_OVERLAP_KEYWORDS: readonly string[] = [
  'auth',
  'login',
  'signup',
  'user',
  'profile',
  'admin',
  'dashboard',
  'payment',
  'checkout',
  'notif',
  'email',
  'search',
  'upload',
  'chat',
  'realtime',
  'websocket',
  'report',
  'crud',
];

function tokenize(name: string): string[] {
  return normalizeName(name).split(/[^a-z0-9]+/).filter(token => token.length > 0);
}

function suggestionFor(features: string[], keywords: string[]): string {
  const quoted = features.map(name => `"${name}"`).join(', ');
  return `${quoted} share ${keywords.map(k => `"${k}"`).join(', ')}; consider merging or clarifying scope`;
}

/**
 * Features sharing a keyword produce one warning; keywords that flag the
 * same set of features are merged into a single warning.
 */
export function detectOverlaps(
  featureNames: readonly string[],
  keywords: readonly string[] = DEFAULT_OVERLAP_KEYWORDS
): OverlapWarning[] {
  const vocabulary = [...new Set(keywords.map(normalizeName).filter(k => k.length > 0))];

  // Distinct features only, first spelling wins
  const features = new Map<string, string[]>();
  const seen = new Set<string>();
  for (const name of featureNames) {
    const key = normalizeName(name);
    if (key.length > 0 && !seen.has(key)) {
      seen.add(key);
      features.set(name, tokenize(name));
    }
  }

  const warnings = new Map<string, OverlapWarning>();
  for (const keyword of vocabulary) {
    const matching = [...features.entries()]
      .filter(([, tokens]) => tokens.some(token => token.startsWith(keyword)))
      .map(([name]) => name);
    if (matching.length < 2) continue;

    const setKey = matching.map(normalizeName).sort().join('\u0000');
    const existing = warnings.get(setKey);
    if (existing) {
      existing.keywords.push(keyword);
      existing.suggestion = suggestionFor(existing.features, existing.keywords);
    } else {
      warnings.set(setKey, {
        features: matching,
        keywords: [keyword],
        suggestion: suggestionFor(matching, [keyword]),
      });
    }
  }

  return [...warnings.values()];
}
