/**
 * Events Module
 *
 * Change notifications published by the catalog, the tracked-time store,
 * the configuration store and the estimation service.
 *
 * @module events
 */

export {
  createEvent,
  isEventType,
} from './event-types.js';

export type {
  EventType,
  TypedEvent,
  EventHandler,
  GenericEventHandler,
  EventFilter,
  PayloadFor,
  EventPayloads,
  ConfigChangedPayload,
  CatalogChangeAction,
  CatalogChangedPayload,
  TrackedTimeIngestedPayload,
  EstimateComputedPayload,
  SystemErrorPayload,
} from './event-types.js';

export { EventBus } from './event-bus.js';
export type { EventBusConfig } from './event-bus.js';
