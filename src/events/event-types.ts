/**
 * Event Bus Type Definitions
 *
 * Event types and payloads published by the estimation core when its
 * catalog, tracked time or configuration changes.
 */

import type { ExperienceLevel, EstimationStyle } from '../estimation/types.js';

// ============================================================================
// Event Types
// ============================================================================

export type EventType =
  | 'config:changed'
  | 'catalog:changed'
  | 'tracked_time:ingested'
  | 'estimate:computed'
  | 'system:error';

const ALL_EVENT_TYPES: Set<string> = new Set([
  'config:changed',
  'catalog:changed',
  'tracked_time:ingested',
  'estimate:computed',
  'system:error',
]);

/**
 * Type guard to check if a string is a valid EventType
 */
export function isEventType(type: string): type is EventType {
  return ALL_EVENT_TYPES.has(type);
}

// ============================================================================
// Payload Types
// ============================================================================

export interface ConfigChangedPayload {
  version: number;
  /** Top-level config keys whose value changed */
  changedKeys: string[];
}

export type CatalogChangeAction = 'added' | 'updated' | 'removed';

export interface CatalogChangedPayload {
  version: number;
  action: CatalogChangeAction;
  featureId: string;
  featureName: string;
}

export interface TrackedTimeIngestedPayload {
  version: number;
  accepted: number;
  rejected: number;
}

export interface EstimateComputedPayload {
  estimateId: string;
  lineItemCount: number;
  grandTotalHours: number;
  style: EstimationStyle;
  experienceLevel?: ExperienceLevel;
  configVersion: number;
}

export interface SystemErrorPayload {
  error: Error;
  component: string;
  message: string;
}

// ============================================================================
// Event Payload Mapping
// ============================================================================

export interface EventPayloads {
  'config:changed': ConfigChangedPayload;
  'catalog:changed': CatalogChangedPayload;
  'tracked_time:ingested': TrackedTimeIngestedPayload;
  'estimate:computed': EstimateComputedPayload;
  'system:error': SystemErrorPayload;
}

export type PayloadFor<T extends EventType> = EventPayloads[T];

// ============================================================================
// TypedEvent Interface
// ============================================================================

export interface TypedEvent<T extends EventType, P = PayloadFor<T>> {
  type: T;
  payload: P;
  timestamp: Date;
  correlationId?: string;
}

/**
 * Creates a typed event with automatic timestamp
 */
export function createEvent<T extends EventType>(
  type: T,
  payload: PayloadFor<T>,
  correlationId?: string
): TypedEvent<T, PayloadFor<T>> {
  return {
    type,
    payload,
    timestamp: new Date(),
    correlationId,
  };
}

// ============================================================================
// Event Handler Types
// ============================================================================

export type EventHandler<T extends EventType> = (
  event: TypedEvent<T, PayloadFor<T>>
) => void | Promise<void>;

export type GenericEventHandler = (
  event: TypedEvent<EventType, unknown>
) => void | Promise<void>;

/**
 * Filter options for querying event history
 */
export interface EventFilter {
  types?: EventType[];
  correlationId?: string;
  startTime?: Date;
  endTime?: Date;
  limit?: number;
}
