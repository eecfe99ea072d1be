/**
 * TrackedTimeStore - validated ingestion of actual effort observations
 *
 * Entries are immutable once stored. Like the catalog, every write swaps in
 * a new frozen list and bumps `version`.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError, NotFoundError } from '../models/errors.js';
import type { RowError } from '../models/errors.js';
import { logger } from '../logging/index.js';
import { createEvent } from '../events/index.js';
import type { EventBus } from '../events/index.js';
import { isTeam } from './types.js';
import type { CreateTrackedTimeInput, TrackedTimeEntry } from './types.js';

const log = logger.child('TrackedTimeStore');

export interface TrackedTimeSnapshot {
  readonly version: number;
  readonly entries: readonly TrackedTimeEntry[];
}

export interface BatchResult {
  accepted: TrackedTimeEntry[];
  rejected: RowError[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(T[\d:.]+(Z|[+-]\d{2}:?\d{2})?)?$/;

function parseDate(value: Date | string): Date | undefined {
  const date = typeof value === 'string' && ISO_DATE.test(value.trim())
    ? new Date(value.trim())
    : value instanceof Date ? value : undefined;
  return date && !Number.isNaN(date.getTime()) ? date : undefined;
}

function requireText(field: string, value: unknown, errors: ValidationError[]): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    errors.push(new ValidationError(field, value, 'must be a non-empty string'));
    return '';
  }
  return value.trim();
}

/**
 * Collects every problem with the input instead of stopping at the first.
 */
export function validateTrackedTimeInput(
  input: CreateTrackedTimeInput
): { entry?: TrackedTimeEntry; errors: ValidationError[] } {
  const errors: ValidationError[] = [];

  const teamLabel = typeof input.team === 'string' ? input.team.trim().toLowerCase() : input.team;
  if (!isTeam(teamLabel)) {
    errors.push(new ValidationError('team', input.team, 'must be one of frontend, backend, both'));
  }
  const memberName = requireText('memberName', input.memberName, errors);
  const feature = requireText('feature', input.feature, errors);

  if (typeof input.hours !== 'number' || !Number.isFinite(input.hours) || input.hours <= 0) {
    errors.push(new ValidationError('hours', input.hours, 'must be a positive finite number'));
  }

  let date: Date | undefined;
  if (input.date !== undefined) {
    date = parseDate(input.date);
    if (!date) {
      errors.push(new ValidationError('date', input.date, 'must be an ISO-8601 date'));
    }
  }

  if (errors.length > 0 || !isTeam(teamLabel)) {
    return { errors };
  }

  const process = input.process?.trim();
  const entry: TrackedTimeEntry = {
    id: input.id ?? randomUUID(),
    team: teamLabel,
    memberName,
    feature,
    hours: input.hours,
    ...(process ? { process } : {}),
    ...(date ? { date } : {}),
  };
  return { entry: Object.freeze(entry), errors };
}

export interface TrackedTimeStoreOptions {
  eventBus?: EventBus;
}

export class TrackedTimeStore {
  private entries: readonly TrackedTimeEntry[] = Object.freeze([]);
  private currentVersion = 0;
  private readonly eventBus?: EventBus;

  constructor(options: TrackedTimeStoreOptions = {}) {
    this.eventBus = options.eventBus;
  }

  get version(): number {
    return this.currentVersion;
  }

  get size(): number {
    return this.entries.length;
  }

  snapshot(): TrackedTimeSnapshot {
    return { version: this.currentVersion, entries: this.entries };
  }

  /**
   * @throws ValidationError for the first invalid field
   */
  add(input: CreateTrackedTimeInput): TrackedTimeEntry {
    const { entry, errors } = validateTrackedTimeInput(input);
    if (!entry) {
      throw errors[0];
    }
    this.assertIdsAvailable([entry]);
    this.commit([entry], 0);
    return entry;
  }

  /**
   * Stores every valid row and reports the rest. Row numbers are 1-based
   * positions in `inputs` unless `rowNumberOf` maps them (e.g. to file lines).
   */
  addMany(
    inputs: readonly CreateTrackedTimeInput[],
    rowNumberOf: (index: number) => number = index => index + 1
  ): BatchResult {
    const accepted: TrackedTimeEntry[] = [];
    const rejected: RowError[] = [];
    const seenIds = new Set(this.entries.map(entry => entry.id));

    inputs.forEach((input, index) => {
      const { entry, errors } = validateTrackedTimeInput(input);
      if (entry && seenIds.has(entry.id)) {
        errors.push(new ValidationError('id', entry.id, 'is already in use'));
      }
      if (!entry || errors.length > 0) {
        rejected.push({ rowNumber: rowNumberOf(index), errors });
        return;
      }
      seenIds.add(entry.id);
      accepted.push(entry);
    });

    if (accepted.length > 0 || rejected.length > 0) {
      this.commit(accepted, rejected.length);
    }
    if (rejected.length > 0) {
      log.warn('Tracked time rows rejected', {
        accepted: accepted.length,
        rejected: rejected.length,
        firstRow: rejected[0].rowNumber,
      });
    }
    return { accepted, rejected };
  }

  list(): TrackedTimeEntry[] {
    return [...this.entries];
  }

  remove(id: string): void {
    if (!this.entries.some(entry => entry.id === id)) {
      throw new NotFoundError('TrackedTimeEntry', id);
    }
    this.entries = Object.freeze(this.entries.filter(entry => entry.id !== id));
    this.currentVersion++;
    log.debug('Tracked time entry removed', { entryId: id, version: this.currentVersion });
  }

  clear(): void {
    this.entries = Object.freeze([]);
    this.currentVersion++;
  }

  private assertIdsAvailable(incoming: TrackedTimeEntry[]): void {
    for (const entry of incoming) {
      if (this.entries.some(existing => existing.id === entry.id)) {
        throw new ValidationError('id', entry.id, 'is already in use');
      }
    }
  }

  private commit(added: TrackedTimeEntry[], rejectedCount: number): void {
    if (added.length > 0) {
      this.entries = Object.freeze([...this.entries, ...added]);
      this.currentVersion++;
    }
    log.debug('Tracked time ingested', {
      accepted: added.length,
      rejected: rejectedCount,
      version: this.currentVersion,
    });
    this.eventBus?.emit(createEvent('tracked_time:ingested', {
      version: this.currentVersion,
      accepted: added.length,
      rejected: rejectedCount,
    }));
  }
}
