import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../logging/index.js';

export type { SupabaseClient } from '@supabase/supabase-js';

const log = logger.child('Database');

export interface SupabaseConnectionConfig {
  url?: string;
  serviceKey?: string;
}

let client: SupabaseClient | null = null;

/**
 * Creates or returns the shared Supabase client. Explicit settings win over
 * SUPABASE_URL and SUPABASE_SERVICE_KEY.
 *
 * @throws Error if neither source provides both values
 */
export function createSupabaseClient(config: SupabaseConnectionConfig = {}): SupabaseClient {
  if (client) return client;

  const url = config.url ?? process.env.SUPABASE_URL;
  const key = config.serviceKey ?? process.env.SUPABASE_SERVICE_KEY;

  if (!url || !key) {
    log.error('Missing Supabase connection settings', {
      hasUrl: !!url,
      hasKey: !!key,
    });
    throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_KEY environment variables');
  }

  client = createClient(url, key, { auth: { persistSession: false } });
  log.info('Supabase client created', { url });
  return client;
}

/**
 * Drops the shared client. Used by tests.
 */
export function resetClient(): void {
  client = null;
}

export interface HealthCheckResult {
  healthy: boolean;
  latencyMs: number;
  error?: string;
}

const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;

/**
 * Missing tables mean the database answered but the schema is not applied;
 * that still counts as reachable.
 */
function isTableNotFound(message: string): boolean {
  const lower = message.toLowerCase();
  return (
    lower.includes('does not exist') ||
    lower.includes('relation') ||
    lower.includes('could not find the table') ||
    lower.includes('schema cache')
  );
}

/**
 * Runs a one-row query against the feature table with a timeout.
 */
export async function checkHealth(
  supabase: SupabaseClient,
  timeoutMs: number = DEFAULT_HEALTH_CHECK_TIMEOUT_MS
): Promise<HealthCheckResult> {
  const startTime = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Health check timed out after ${timeoutMs}ms`)), timeoutMs);
    });
    const { error } = await Promise.race([
      supabase.from('est_features').select('id').limit(1),
      timeout,
    ]);
    const latencyMs = Date.now() - startTime;

    if (error && !isTableNotFound(error.message)) {
      log.warn('Health check failed', { latencyMs, error: error.message });
      return { healthy: false, latencyMs, error: error.message };
    }

    log.debug('Database health check passed', { latencyMs, schemaApplied: !error });
    return { healthy: true, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - startTime;
    const errorMessage = err instanceof Error ? err.message : String(err);
    log.error('Health check threw exception', err instanceof Error ? err : undefined, { latencyMs });
    return { healthy: false, latencyMs, error: errorMessage };
  } finally {
    if (timer) clearTimeout(timer);
  }
}
