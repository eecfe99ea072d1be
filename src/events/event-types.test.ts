import { describe, it, expect } from 'vitest';
import { createEvent, isEventType } from './event-types.js';

describe('event-types', () => {
  describe('isEventType', () => {
    it('should accept every published event type', () => {
      for (const type of [
        'config:changed',
        'catalog:changed',
        'tracked_time:ingested',
        'estimate:computed',
        'system:error',
      ]) {
        expect(isEventType(type)).toBe(true);
      }
    });

    it('should reject unknown types', () => {
      expect(isEventType('config:deleted')).toBe(false);
      expect(isEventType('')).toBe(false);
    });
  });

  describe('createEvent', () => {
    it('should stamp the event with the current time', () => {
      const before = new Date();
      const event = createEvent('config:changed', { version: 2, changedKeys: ['style'] });
      const after = new Date();

      expect(event.type).toBe('config:changed');
      expect(event.payload).toEqual({ version: 2, changedKeys: ['style'] });
      expect(event.timestamp.getTime()).toBeGreaterThanOrEqual(before.getTime());
      expect(event.timestamp.getTime()).toBeLessThanOrEqual(after.getTime());
      expect(event.correlationId).toBeUndefined();
    });

    it('should carry a correlation id when given', () => {
      const event = createEvent(
        'tracked_time:ingested',
        { version: 1, accepted: 3, rejected: 1 },
        'est-abc-12345678'
      );
      expect(event.correlationId).toBe('est-abc-12345678');
    });
  });
});
