/**
 * Masks credentials before they reach log output.
 */

// Matched against the end of a lower-cased field name, so `supabaseKey`
// is masked while `overlapKeywords` is not.
const DEFAULT_REDACT_FIELDS = [
  'token',
  'password',
  'secret',
  'key',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'credentials',
  'jwt',
  'bearer',
  'access_token',
  'refresh_token',
  'service_key',
  'servicekey',
];

const SENSITIVE_PATTERNS = [
  /^eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/,    // JWTs (Supabase anon/service keys)
  /^sb_(secret|publishable)_[a-zA-Z0-9_-]+$/, // Supabase API keys
  /^sk-[a-zA-Z0-9]+$/,
  /^postgres(ql)?:\/\/[^:\s]+:[^@\s]+@/,   // connection strings with a password
];

const REDACTED = '[REDACTED]';

function shouldRedactField(fieldName: string, customFields: string[]): boolean {
  const normalizedName = fieldName.toLowerCase();
  const allFields = [...DEFAULT_REDACT_FIELDS, ...customFields.map(f => f.toLowerCase())];

  return allFields.some(field => normalizedName === field || normalizedName.endsWith(field));
}

function looksLikeSensitiveValue(value: string): boolean {
  return SENSITIVE_PATTERNS.some(pattern => pattern.test(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function redactItem(item: unknown, customFields: string[]): unknown {
  if (typeof item === 'string') {
    return looksLikeSensitiveValue(item) ? REDACTED : item;
  }
  if (Array.isArray(item)) {
    return item.map(inner => redactItem(inner, customFields));
  }
  if (isRecord(item)) {
    return redact(item, customFields);
  }
  return item;
}

/**
 * Returns a copy of `obj` with sensitive fields and token-shaped values
 * replaced by `[REDACTED]`.
 */
export function redact(
  obj: Record<string, unknown>,
  customFields: string[] = []
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (shouldRedactField(key, customFields)) {
      result[key] = REDACTED;
    } else {
      result[key] = redactItem(value, customFields);
    }
  }

  return result;
}

export function redactValue(value: string): string {
  return looksLikeSensitiveValue(value) ? REDACTED : value;
}

export function getDefaultRedactFields(): string[] {
  return [...DEFAULT_REDACT_FIELDS];
}
