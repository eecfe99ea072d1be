/**
 * File-backed data source: the YAML feature library, a tracked-time CSV and
 * one JSON file per saved estimate.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger } from '../logging/index.js';
import { ValidationError } from '../models/errors.js';
import { FeatureCatalog } from '../estimation/feature-catalog.js';
import { normalizeName } from '../estimation/normalize.js';
import type { Feature, ProjectEstimate, TrackedTimeEntry } from '../estimation/types.js';
import {
  editFeatureLibrary,
  entryId,
  entryName,
  parseFeatureLibrary,
  seedCatalog,
  toLibraryEntry,
  writeFileAtomic,
} from '../library/feature-library.js';
import { appendTrackedTimeCsv, importTrackedTimeCsv } from '../import/csv-importer.js';
import { estimateFromRow, estimateToRow } from '../db/repositories/estimates.js';
import type { ProjectEstimateRow } from '../db/repositories/estimates.js';
import type { DataSourceHealth, EstimationDataSource, TrackedTimeLoad } from './data-source.js';

const log = logger.child('FileDataSource');

export interface FileDataSourceOptions {
  featureLibraryPath: string;
  trackedTimePath?: string;
  estimatesDir: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
}

type Mutex = { run<T>(fn: () => Promise<T>): Promise<T> };

function createMutex(): Mutex {
  let chain: Promise<void> = Promise.resolve();
  return {
    run<T>(fn: () => Promise<T>): Promise<T> {
      const next = chain.then(fn, fn);
      chain = next.then(() => undefined, () => undefined);
      return next;
    },
  };
}

/**
 * Writes never rebuild a file from validated data: library edits touch only
 * the entry being saved or deleted, and tracked time is appended. Rows and
 * entries that fail validation stay in the files for the user to fix.
 */
export class FileDataSource implements EstimationDataSource {
  readonly kind = 'file' as const;
  private readonly libraryLock = createMutex();
  private readonly trackedTimeLock = createMutex();
  /** Catalog ids given to library entries that are stored without one */
  private readonly unsavedIds = new Map<string, string>();

  constructor(private readonly options: FileDataSourceOptions) {}

  /**
   * A missing library is an empty one. Invalid entries are logged by the
   * loader and left out.
   */
  async loadFeatures(): Promise<Feature[]> {
    const libraryPath = this.options.featureLibraryPath;
    const text = await readIfExists(libraryPath);
    if (text === undefined) {
      log.debug('Feature library not found, starting empty', { path: libraryPath });
      return [];
    }

    const catalog = new FeatureCatalog();
    seedCatalog(catalog, text);

    for (const entry of parseFeatureLibrary(text)) {
      const name = entryName(entry);
      if (entryId(entry) !== undefined || name === undefined) continue;
      const feature = catalog.findByNameOrSynonym(name);
      if (feature) this.unsavedIds.set(feature.id, name);
    }
    return catalog.list();
  }

  async saveFeature(feature: Feature): Promise<void> {
    await this.editLibrary(feature.id, entries => {
      const index = entries.findIndex(entry => this.matches(entry, feature.id));
      const updated = toLibraryEntry(feature);
      return index >= 0
        ? entries.map((entry, i) => (i === index ? updated : entry))
        : [...entries, updated];
    });
  }

  async deleteFeature(id: string): Promise<void> {
    await this.editLibrary(id, entries => entries.filter(entry => !this.matches(entry, id)));
  }

  async loadTrackedTime(): Promise<TrackedTimeLoad> {
    const csvPath = this.options.trackedTimePath;
    const text = csvPath ? await readIfExists(csvPath) : undefined;
    if (text === undefined || text.trim().length === 0) {
      return { entries: [], rejected: [] };
    }
    const result = importTrackedTimeCsv(text);
    return { entries: result.accepted, rejected: result.rejected };
  }

  /**
   * Ids are not stored in the file, so entries get fresh ids on the next
   * load.
   */
  async appendTrackedTime(entries: readonly TrackedTimeEntry[]): Promise<number> {
    const csvPath = this.options.trackedTimePath;
    if (!csvPath) {
      throw new ValidationError('trackedTimePath', csvPath, 'must be configured to store tracked time');
    }
    if (entries.length === 0) return 0;

    return this.trackedTimeLock.run(async () => {
      const change = appendTrackedTimeCsv((await readIfExists(csvPath)) ?? '', entries);
      if (change.kind === 'append') {
        await fs.appendFile(csvPath, change.text, 'utf-8');
      } else {
        await writeFileAtomic(csvPath, change.text);
      }
      log.debug('Tracked time written', { path: csvPath, appended: entries.length, mode: change.kind });
      return entries.length;
    });
  }

  async saveEstimate(estimate: ProjectEstimate): Promise<void> {
    await fs.mkdir(this.options.estimatesDir, { recursive: true });
    const content = JSON.stringify(estimateToRow(estimate), null, 2);
    await fs.writeFile(this.estimatePath(estimate.id), content, 'utf-8');
  }

  async getEstimate(id: string): Promise<ProjectEstimate | null> {
    try {
      const content = await fs.readFile(this.estimatePath(id), 'utf-8');
      return estimateFromRow(JSON.parse(content) as ProjectEstimateRow);
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async listEstimates(limit: number = 20): Promise<ProjectEstimate[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.options.estimatesDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const estimates: ProjectEstimate[] = [];
    for (const file of files.filter(name => name.endsWith('.json'))) {
      const estimate = await this.getEstimate(path.basename(file, '.json'));
      if (estimate) estimates.push(estimate);
    }
    return estimates
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit);
  }

  async checkHealth(): Promise<DataSourceHealth> {
    const start = Date.now();
    try {
      await fs.access(this.options.featureLibraryPath);
      return { healthy: true, kind: this.kind, latencyMs: Date.now() - start };
    } catch (error) {
      return {
        healthy: false,
        kind: this.kind,
        latencyMs: Date.now() - start,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private editLibrary(id: string, edit: (entries: unknown[]) => unknown[]): Promise<void> {
    const libraryPath = this.options.featureLibraryPath;
    return this.libraryLock.run(async () => {
      const text = (await readIfExists(libraryPath)) ?? '';
      await writeFileAtomic(libraryPath, editFeatureLibrary(text, edit));
      this.unsavedIds.delete(id);
      log.debug('Feature library updated', { path: libraryPath, featureId: id });
    });
  }

  /**
   * By stored id, or by name for an entry stored without an id.
   */
  private matches(entry: unknown, id: string): boolean {
    const storedId = entryId(entry);
    if (storedId !== undefined) return storedId === id;
    const name = this.unsavedIds.get(id);
    const storedName = entryName(entry);
    return name !== undefined && storedName !== undefined && normalizeName(storedName) === normalizeName(name);
  }

  private estimatePath(id: string): string {
    if (!/^[\w-]+$/.test(id)) {
      throw new ValidationError('estimateId', id, 'must contain only letters, digits, "_" or "-"');
    }
    return path.join(this.options.estimatesDir, `${id}.json`);
  }
}
