/**
 * FeatureCatalog - canonical features with synonym-aware lookup
 *
 * Writes are copy-on-write: each one builds a new frozen map and bumps
 * `version`, so a snapshot taken by a running computation never changes
 * under it.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError, NotFoundError } from '../models/errors.js';
import { logger } from '../logging/index.js';
import { createEvent } from '../events/index.js';
import type { EventBus, CatalogChangeAction } from '../events/index.js';
import { normalizeName } from './normalize.js';
import { isTeam } from './types.js';
import type { CreateFeatureInput, Feature, SeedTimeChange, Team, UpdateFeatureInput } from './types.js';

const log = logger.child('FeatureCatalog');

/**
 * Immutable view of the catalog at one version.
 */
export interface CatalogSnapshot {
  readonly version: number;
  readonly features: ReadonlyMap<string, Feature>;
  getById(id: string): Feature | undefined;
  findByNameOrSynonym(query: string): Feature | undefined;
}

export function generateFeatureId(): string {
  return `feat_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

function cloneFeature(feature: Feature): Feature {
  return {
    ...feature,
    synonyms: [...feature.synonyms],
    seedTimeHistory: feature.seedTimeHistory.map(change => ({ ...change })),
  };
}

/**
 * Stored features are frozen in place, arrays and history records
 * included, so a snapshot cannot be changed through the objects it hands
 * out.
 */
function freezeFeature(feature: Feature): Feature {
  Object.freeze(feature.synonyms);
  for (const change of feature.seedTimeHistory) Object.freeze(change);
  Object.freeze(feature.seedTimeHistory);
  return Object.freeze(feature);
}

function findIn(features: ReadonlyMap<string, Feature>, query: string): Feature | undefined {
  const needle = normalizeName(query);
  if (needle.length === 0) return undefined;
  for (const feature of features.values()) {
    if (normalizeName(feature.name) === needle) return feature;
    if (feature.synonyms.some(synonym => normalizeName(synonym) === needle)) return feature;
  }
  return undefined;
}

function buildSnapshot(version: number, features: ReadonlyMap<string, Feature>): CatalogSnapshot {
  return Object.freeze({
    version,
    features,
    getById: (id: string) => features.get(id),
    findByNameOrSynonym: (query: string) => findIn(features, query),
  });
}

function validateName(name: unknown): string {
  if (typeof name !== 'string' || name.trim().length === 0) {
    throw new ValidationError('name', name, 'must be a non-empty string');
  }
  return name.trim();
}

function validateTeam(team: unknown): Team {
  if (!isTeam(team)) {
    throw new ValidationError('team', team, 'must be one of frontend, backend, both');
  }
  return team;
}

function validateSeedTime(hours: unknown): number {
  if (typeof hours !== 'number' || !Number.isFinite(hours) || hours <= 0) {
    throw new ValidationError('seedTimeHours', hours, 'must be a positive number');
  }
  return hours;
}

function validateHistory(history: SeedTimeChange[]): SeedTimeChange[] {
  return history.map(change => {
    validateSeedTime(change.previousValue);
    validateSeedTime(change.newValue);
    if (!(change.changedAt instanceof Date) || Number.isNaN(change.changedAt.getTime())) {
      throw new ValidationError('seedTimeHistory', change.changedAt, 'must hold valid change dates');
    }
    return { ...change };
  });
}

function validateSynonyms(synonyms: unknown): string[] {
  if (!Array.isArray(synonyms)) {
    throw new ValidationError('synonyms', synonyms, 'must be a list of strings');
  }
  const result: string[] = [];
  const seen = new Set<string>();
  for (const synonym of synonyms) {
    if (typeof synonym !== 'string' || synonym.trim().length === 0) {
      throw new ValidationError('synonyms', synonym, 'must contain only non-empty strings');
    }
    const key = normalizeName(synonym);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(synonym.trim());
    }
  }
  return result;
}

export interface FeatureCatalogOptions {
  eventBus?: EventBus;
}

export class FeatureCatalog {
  private features: ReadonlyMap<string, Feature> = new Map();
  private currentVersion = 0;
  private current: CatalogSnapshot = buildSnapshot(0, this.features);
  private readonly eventBus?: EventBus;

  constructor(options: FeatureCatalogOptions = {}) {
    this.eventBus = options.eventBus;
  }

  get version(): number {
    return this.currentVersion;
  }

  get size(): number {
    return this.features.size;
  }

  snapshot(): CatalogSnapshot {
    return this.current;
  }

  /**
   * Validates every field and the uniqueness of the name and synonyms
   * before anything is stored.
   */
  addFeature(input: CreateFeatureInput): Feature {
    const name = validateName(input.name);
    const team = validateTeam(input.team);
    const seedTimeHours = validateSeedTime(input.seedTimeHours);
    const synonyms = validateSynonyms(input.synonyms ?? []);
    const seedTimeHistory = validateHistory(input.seedTimeHistory ?? []);

    const id = input.id ?? generateFeatureId();
    if (this.features.has(id)) {
      throw new ValidationError('id', id, 'is already in use');
    }
    this.assertLabelsAvailable(name, synonyms);

    const feature: Feature = {
      id,
      name,
      team,
      process: input.process?.trim() ?? '',
      seedTimeHours,
      synonyms,
      notes: input.notes ?? '',
      seedTimeHistory,
    };

    this.commit(next => next.set(id, feature), 'added', feature);
    log.info('Feature added', { featureId: id, name, team, seedTimeHours });
    return cloneFeature(feature);
  }

  /**
   * Records the current seed time in the history, then applies the new one.
   */
  updateSeedTime(id: string, newValue: number, changedAt: Date = new Date()): Feature {
    const existing = this.require(id);
    const seedTimeHours = validateSeedTime(newValue);

    const updated: Feature = {
      ...existing,
      seedTimeHours,
      seedTimeHistory: [
        ...existing.seedTimeHistory,
        { previousValue: existing.seedTimeHours, newValue: seedTimeHours, changedAt },
      ],
    };

    this.commit(next => next.set(id, updated), 'updated', updated);
    log.info('Seed time updated', {
      featureId: id,
      previousValue: existing.seedTimeHours,
      newValue: seedTimeHours,
    });
    return cloneFeature(updated);
  }

  updateFeature(id: string, patch: UpdateFeatureInput): Feature {
    const existing = this.require(id);

    const name = patch.name !== undefined ? validateName(patch.name) : existing.name;
    const team = patch.team !== undefined ? validateTeam(patch.team) : existing.team;
    const synonyms = patch.synonyms !== undefined ? validateSynonyms(patch.synonyms) : existing.synonyms;
    this.assertLabelsAvailable(name, synonyms, id);

    const updated: Feature = {
      ...existing,
      name,
      team,
      synonyms,
      process: patch.process !== undefined ? patch.process.trim() : existing.process,
      notes: patch.notes ?? existing.notes,
    };

    this.commit(next => next.set(id, updated), 'updated', updated);
    log.info('Feature updated', { featureId: id, fields: Object.keys(patch) });
    return cloneFeature(updated);
  }

  /**
   * Estimates computed earlier hold their own copies and are not affected.
   */
  removeFeature(id: string): void {
    const existing = this.require(id);
    this.commit(next => next.delete(id), 'removed', existing);
    log.info('Feature removed', { featureId: id, name: existing.name });
  }

  /**
   * Puts a feature back exactly as it was, history included. Used to undo a
   * change that could not be persisted.
   */
  restoreFeature(feature: Feature): Feature {
    this.assertLabelsAvailable(feature.name, feature.synonyms, feature.id);
    const restored = cloneFeature(feature);
    const action: CatalogChangeAction = this.features.has(feature.id) ? 'updated' : 'added';
    this.commit(next => next.set(feature.id, restored), action, restored);
    log.info('Feature restored', { featureId: feature.id, name: feature.name });
    return cloneFeature(restored);
  }

  getById(id: string): Feature | undefined {
    const feature = this.features.get(id);
    return feature ? cloneFeature(feature) : undefined;
  }

  /**
   * Exact normalized match against a name or synonym. Labels are unique, so
   * at most one feature can match.
   */
  findByNameOrSynonym(query: string): Feature | undefined {
    const feature = findIn(this.features, query);
    return feature ? cloneFeature(feature) : undefined;
  }

  /**
   * Substring match over names and synonyms, sorted by name.
   */
  search(query: string): Feature[] {
    const needle = normalizeName(query);
    if (needle.length === 0) return [];

    return this.sorted([...this.features.values()].filter(feature =>
      normalizeName(feature.name).includes(needle) ||
      feature.synonyms.some(synonym => normalizeName(synonym).includes(needle))
    ));
  }

  list(team?: Team): Feature[] {
    const all = [...this.features.values()];
    return this.sorted(team ? all.filter(feature => feature.team === team) : all);
  }

  private sorted(features: Feature[]): Feature[] {
    return features
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(cloneFeature);
  }

  private require(id: string): Feature {
    const feature = this.features.get(id);
    if (!feature) {
      throw new NotFoundError('Feature', id);
    }
    return feature;
  }

  /**
   * Rejects a name or synonym that collides with another feature's name or
   * synonym, or a synonym that repeats the feature's own name.
   */
  private assertLabelsAvailable(name: string, synonyms: string[], ownId?: string): void {
    const taken = new Map<string, string>();
    for (const feature of this.features.values()) {
      if (feature.id === ownId) continue;
      taken.set(normalizeName(feature.name), feature.name);
      for (const synonym of feature.synonyms) {
        taken.set(normalizeName(synonym), feature.name);
      }
    }

    const nameKey = normalizeName(name);
    const nameOwner = taken.get(nameKey);
    if (nameOwner !== undefined) {
      throw new ValidationError('name', name, `already used by feature "${nameOwner}"`);
    }

    for (const synonym of synonyms) {
      const key = normalizeName(synonym);
      if (key === nameKey) {
        throw new ValidationError('synonyms', synonym, 'repeats the feature name');
      }
      const owner = taken.get(key);
      if (owner !== undefined) {
        throw new ValidationError('synonyms', synonym, `already used by feature "${owner}"`);
      }
    }
  }

  private commit(
    mutate: (next: Map<string, Feature>) => void,
    action: CatalogChangeAction,
    feature: Feature
  ): void {
    freezeFeature(feature);
    const next = new Map(this.features);
    mutate(next);
    this.features = next;
    this.currentVersion++;
    this.current = buildSnapshot(this.currentVersion, next);

    this.eventBus?.emit(createEvent('catalog:changed', {
      version: this.currentVersion,
      action,
      featureId: feature.id,
      featureName: feature.name,
    }));
  }
}
