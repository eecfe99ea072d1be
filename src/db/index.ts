// Database module exports
export {
  createSupabaseClient,
  resetClient,
  checkHealth,
} from './client.js';
export type { SupabaseClient, SupabaseConnectionConfig, HealthCheckResult } from './client.js';

export * from './repositories/index.js';
