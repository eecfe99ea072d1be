import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventBus } from './event-bus.js';
import { createEvent } from './event-types.js';
import type { ConfigChangedPayload, CatalogChangedPayload } from './event-types.js';

describe('EventBus', () => {
  let eventBus: EventBus;

  const configPayload: ConfigChangedPayload = { version: 2, changedKeys: ['style'] };
  const catalogPayload: CatalogChangedPayload = {
    version: 1,
    action: 'added',
    featureId: 'feat_00000001',
    featureName: 'CRUD',
  };

  beforeEach(() => {
    eventBus = new EventBus({ logErrors: false });
  });

  afterEach(() => {
    eventBus.destroy();
  });

  describe('on()', () => {
    it('should deliver events of the subscribed type', () => {
      const handler = vi.fn();
      eventBus.on('config:changed', handler);

      eventBus.emit(createEvent('config:changed', configPayload));

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(
        expect.objectContaining({ type: 'config:changed', payload: configPayload })
      );
    });

    it('should not deliver events of other types', () => {
      const handler = vi.fn();
      eventBus.on('config:changed', handler);

      eventBus.emit(createEvent('catalog:changed', catalogPayload));

      expect(handler).not.toHaveBeenCalled();
    });

    it('should return an unsubscribe function', () => {
      const handler = vi.fn();
      const unsubscribe = eventBus.on('config:changed', handler);

      unsubscribe();
      eventBus.emit(createEvent('config:changed', configPayload));

      expect(handler).not.toHaveBeenCalled();
      expect(eventBus.listenerCount('config:changed')).toBe(0);
    });
  });

  describe('once()', () => {
    it('should fire only for the first emission', () => {
      const handler = vi.fn();
      eventBus.once('config:changed', handler);

      eventBus.emit(createEvent('config:changed', configPayload));
      eventBus.emit(createEvent('config:changed', configPayload));

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('off()', () => {
    it('should remove a specific handler', () => {
      const kept = vi.fn();
      const removed = vi.fn();
      eventBus.on('config:changed', kept);
      eventBus.on('config:changed', removed);

      eventBus.off('config:changed', removed);
      eventBus.emit(createEvent('config:changed', configPayload));

      expect(kept).toHaveBeenCalledTimes(1);
      expect(removed).not.toHaveBeenCalled();
    });
  });

  describe('removeAllListeners()', () => {
    it('should remove handlers of one type only', () => {
      eventBus.on('config:changed', vi.fn());
      eventBus.on('catalog:changed', vi.fn());

      eventBus.removeAllListeners('config:changed');

      expect(eventBus.listenerCount('config:changed')).toBe(0);
      expect(eventBus.listenerCount('catalog:changed')).toBe(1);
    });

    it('should remove every handler without a type', () => {
      eventBus.on('config:changed', vi.fn());
      eventBus.on('catalog:changed', vi.fn());

      eventBus.removeAllListeners();

      expect(eventBus.listenerCount('config:changed')).toBe(0);
      expect(eventBus.listenerCount('catalog:changed')).toBe(0);
    });
  });

  describe('error isolation', () => {
    it('should keep calling other handlers when one throws', () => {
      const after = vi.fn();
      eventBus.on('config:changed', () => {
        throw new Error('handler broke');
      });
      eventBus.on('config:changed', after);

      expect(() => eventBus.emit(createEvent('config:changed', configPayload))).not.toThrow();
      expect(after).toHaveBeenCalledTimes(1);
    });

    it('should report a throwing handler as system:error', () => {
      const errorHandler = vi.fn();
      eventBus.on('system:error', errorHandler);
      eventBus.on('config:changed', () => {
        throw new Error('handler broke');
      });

      eventBus.emit(createEvent('config:changed', configPayload, 'est-test-00000001'));

      expect(errorHandler).toHaveBeenCalledTimes(1);
      const [event] = errorHandler.mock.calls[0];
      expect(event.payload.message).toBe('Handler error for event config:changed');
      expect(event.payload.component).toBe('event-bus');
      expect(event.payload.error.message).toBe('handler broke');
      expect(event.correlationId).toBe('est-test-00000001');
    });

    it('should not loop when a system:error handler throws', () => {
      const errorHandler = vi.fn(() => {
        throw new Error('also broke');
      });
      eventBus.on('system:error', errorHandler);
      eventBus.on('config:changed', () => {
        throw new Error('handler broke');
      });

      eventBus.emit(createEvent('config:changed', configPayload));

      expect(errorHandler).toHaveBeenCalledTimes(1);
    });

    it('should report async handler rejections', async () => {
      const errorHandler = vi.fn();
      eventBus.on('system:error', errorHandler);
      eventBus.on('config:changed', async () => {
        throw new Error('async broke');
      });

      eventBus.emit(createEvent('config:changed', configPayload));
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(errorHandler).toHaveBeenCalledTimes(1);
    });
  });

  describe('getHistory()', () => {
    it('should be empty before any emission', () => {
      expect(eventBus.getHistory()).toEqual([]);
    });

    it('should keep only the most recent events', () => {
      const bus = new EventBus({ historySize: 3 });
      for (let version = 1; version <= 5; version++) {
        bus.emit(createEvent('config:changed', { version, changedKeys: [] }));
      }

      const versions = bus.getHistory().map((event) => {
        const payload = event.payload;
        return typeof payload === 'object' && payload !== null && 'version' in payload
          ? payload.version
          : undefined;
      });
      expect(versions).toEqual([3, 4, 5]);
      bus.destroy();
    });

    it('should filter by type, correlation id and limit', () => {
      eventBus.emit(createEvent('config:changed', configPayload, 'a'));
      eventBus.emit(createEvent('catalog:changed', catalogPayload, 'b'));
      eventBus.emit(createEvent('config:changed', configPayload, 'b'));

      expect(eventBus.getHistory({ types: ['config:changed'] })).toHaveLength(2);
      expect(eventBus.getHistory({ correlationId: 'b' })).toHaveLength(2);
      expect(eventBus.getHistory({ limit: 1 })[0].correlationId).toBe('a');
    });

    it('should filter by time range', () => {
      eventBus.emit(createEvent('config:changed', configPayload));
      const future = new Date(Date.now() + 60_000);

      expect(eventBus.getHistory({ startTime: future })).toEqual([]);
      expect(eventBus.getHistory({ endTime: future })).toHaveLength(1);
    });
  });

  describe('clearHistory()', () => {
    it('should empty the history and keep handlers', () => {
      const handler = vi.fn();
      eventBus.on('config:changed', handler);
      eventBus.emit(createEvent('config:changed', configPayload));

      eventBus.clearHistory();

      expect(eventBus.getHistory()).toEqual([]);
      expect(eventBus.listenerCount('config:changed')).toBe(1);
    });
  });
});
