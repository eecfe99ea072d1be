/**
 * YAML feature library: the seed catalog shipped with the project and the
 * file the `file` data source writes catalog changes back to.
 *
 * ```yaml
 * version: 1
 * features:
 *   - id: feat_crud
 *     name: CRUD
 *     team: backend
 *     process: Data Operations
 *     seedTimeHours: 4
 *     synonyms: [basic api]
 * ```
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { ValidationError } from '../models/errors.js';
import { logger } from '../logging/index.js';
import { isTeam } from '../estimation/types.js';
import type { CreateFeatureInput, Feature, SeedTimeChange } from '../estimation/types.js';
import type { FeatureCatalog } from '../estimation/feature-catalog.js';

const log = logger.child('FeatureLibrary');

export const FEATURE_LIBRARY_VERSION = 1;

export interface LibraryEntryError {
  /** 0-based position in the `features` list */
  index: number;
  name?: string;
  errors: ValidationError[];
}

export interface LibraryLoadResult {
  loaded: Feature[];
  rejected: LibraryEntryError[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(entry: Record<string, unknown>, field: string): string | undefined {
  const value = entry[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(field, value, 'must be a string');
  }
  return value;
}

function toHistory(value: unknown): SeedTimeChange[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('seedTimeHistory', value, 'must be a list');
  }
  return value.map((change: unknown): SeedTimeChange => {
    if (!isRecord(change)) {
      throw new ValidationError('seedTimeHistory', change, 'must contain change records');
    }
    const { previousValue, newValue, changedAt } = change;
    if (typeof previousValue !== 'number' || typeof newValue !== 'number') {
      throw new ValidationError('seedTimeHistory', change, 'must record numeric values');
    }
    // js-yaml already turns ISO timestamps into Date objects
    const date = changedAt instanceof Date ? changedAt : new Date(String(changedAt));
    return { previousValue, newValue, changedAt: date };
  });
}

/**
 * Type-level checks on one raw YAML entry. Semantic rules (positive hours,
 * unique names) are left to the catalog.
 */
export function toFeatureInput(entry: unknown): CreateFeatureInput {
  if (!isRecord(entry)) {
    throw new ValidationError('feature', entry, 'must be a mapping');
  }

  const name = entry.name;
  if (typeof name !== 'string') {
    throw new ValidationError('name', name, 'must be a string');
  }
  const team = typeof entry.team === 'string' ? entry.team.trim().toLowerCase() : entry.team;
  if (!isTeam(team)) {
    throw new ValidationError('team', entry.team, 'must be one of frontend, backend, both');
  }
  const seedTimeHours = entry.seedTimeHours;
  if (typeof seedTimeHours !== 'number') {
    throw new ValidationError('seedTimeHours', seedTimeHours, 'must be a number');
  }

  let synonyms: string[] | undefined;
  if (entry.synonyms !== undefined && entry.synonyms !== null) {
    if (!Array.isArray(entry.synonyms)) {
      throw new ValidationError('synonyms', entry.synonyms, 'must be a list of strings');
    }
    synonyms = entry.synonyms.map((synonym: unknown) => String(synonym));
  }

  return {
    id: optionalString(entry, 'id'),
    name,
    team,
    seedTimeHours,
    process: optionalString(entry, 'process'),
    synonyms,
    notes: optionalString(entry, 'notes'),
    seedTimeHistory: toHistory(entry.seedTimeHistory),
  };
}

/**
 * Parses library YAML into raw entries. Accepts a `features` mapping or a
 * bare list.
 *
 * @throws ValidationError when the document is not a feature list
 */
export function parseFeatureLibrary(text: string): unknown[] {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('featureLibrary', reason, 'is not valid YAML');
  }

  if (document === undefined || document === null) return [];
  if (Array.isArray(document)) return document;
  if (isRecord(document)) {
    if (document.features === undefined || document.features === null) return [];
    if (Array.isArray(document.features)) return document.features;
  }
  throw new ValidationError('featureLibrary', typeof document, 'must be a list of features');
}

/**
 * Adds every valid entry to the catalog. Invalid entries are reported by
 * index and skipped; the rest still load.
 */
export function seedCatalog(catalog: FeatureCatalog, text: string): LibraryLoadResult {
  const loaded: Feature[] = [];
  const rejected: LibraryEntryError[] = [];

  parseFeatureLibrary(text).forEach((entry, index) => {
    try {
      loaded.push(catalog.addFeature(toFeatureInput(entry)));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      rejected.push({ index, name: entryName(entry), errors: [error] });
    }
  });

  if (rejected.length > 0) {
    log.warn('Feature library entries rejected', {
      loaded: loaded.length,
      rejected: rejected.map(r => ({ index: r.index, name: r.name, error: r.errors[0].message })),
    });
  }
  return { loaded, rejected };
}

export async function loadFeatureLibrary(catalog: FeatureCatalog, filePath: string): Promise<LibraryLoadResult> {
  log.time('load-feature-library');
  const text = await fs.readFile(filePath, 'utf-8');
  const result = seedCatalog(catalog, text);
  log.timeEnd('load-feature-library', { path: filePath, loaded: result.loaded.length });
  return result;
}

const DUMP_OPTIONS: yaml.DumpOptions = { lineWidth: 100, noRefs: true };

export function toLibraryEntry(feature: Feature): Record<string, unknown> {
  return {
    id: feature.id,
    name: feature.name,
    team: feature.team,
    ...(feature.process ? { process: feature.process } : {}),
    seedTimeHours: feature.seedTimeHours,
    ...(feature.synonyms.length > 0 ? { synonyms: [...feature.synonyms] } : {}),
    ...(feature.notes ? { notes: feature.notes } : {}),
    ...(feature.seedTimeHistory.length > 0
      ? {
          seedTimeHistory: feature.seedTimeHistory.map(change => ({
            previousValue: change.previousValue,
            newValue: change.newValue,
            changedAt: change.changedAt.toISOString(),
          })),
        }
      : {}),
  };
}

export function serializeFeatureLibrary(features: readonly Feature[]): string {
  return yaml.dump({ version: FEATURE_LIBRARY_VERSION, features: features.map(toLibraryEntry) }, DUMP_OPTIONS);
}

/**
 * Applies `edit` to the raw entry list of a library document. Entries the
 * edit leaves alone are written back as they were, including ones the
 * catalog would reject, and so are other top-level keys.
 *
 * @throws ValidationError when the document is not a feature list
 */
export function editFeatureLibrary(text: string, edit: (entries: unknown[]) => unknown[]): string {
  const entries = parseFeatureLibrary(text);
  const document: unknown = yaml.load(text);
  const base = isRecord(document) ? document : { version: FEATURE_LIBRARY_VERSION };
  return yaml.dump({ ...base, features: edit(entries) }, DUMP_OPTIONS);
}

export function entryId(entry: unknown): string | undefined {
  return isRecord(entry) && typeof entry.id === 'string' ? entry.id : undefined;
}

export function entryName(entry: unknown): string | undefined {
  return isRecord(entry) && typeof entry.name === 'string' ? entry.name : undefined;
}

/**
 * Writes through a temporary file so a crash never leaves half a library.
 */
export async function saveFeatureLibrary(filePath: string, features: readonly Feature[]): Promise<void> {
  await writeFileAtomic(filePath, serializeFeatureLibrary(features));
  log.debug('Feature library saved', { path: filePath, count: features.length });
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}
