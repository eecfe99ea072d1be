/**
 * Canonical form used for every name and synonym comparison: trimmed,
 * lower-cased, internal whitespace runs collapsed to one space.
 */
export function normalizeName(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function namesMatch(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b);
}
