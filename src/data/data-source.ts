import type { Feature, ProjectEstimate, TrackedTimeEntry } from '../estimation/types.js';
import type { DataSourceKind } from '../config/env-validator.js';
import type { RowError } from '../models/errors.js';

export interface TrackedTimeLoad {
  entries: TrackedTimeEntry[];
  /** Stored rows that fail validation; they stay in storage untouched */
  rejected: RowError[];
}

export interface DataSourceHealth {
  healthy: boolean;
  kind: DataSourceKind;
  latencyMs?: number;
  error?: string;
}

/**
 * Durable backing for the in-memory catalog, tracked-time store and
 * computed estimates. The engine never calls it directly; the CLI and the
 * API load from it at start-up and write changes through it.
 */
export interface EstimationDataSource {
  readonly kind: DataSourceKind;

  loadFeatures(): Promise<Feature[]>;
  /** Inserts or replaces by id */
  saveFeature(feature: Feature): Promise<void>;
  deleteFeature(id: string): Promise<void>;

  loadTrackedTime(): Promise<TrackedTimeLoad>;
  /** Adds entries without rewriting what is already stored */
  appendTrackedTime(entries: readonly TrackedTimeEntry[]): Promise<number>;

  saveEstimate(estimate: ProjectEstimate): Promise<void>;
  getEstimate(id: string): Promise<ProjectEstimate | null>;
  /** Newest first */
  listEstimates(limit?: number): Promise<ProjectEstimate[]>;

  checkHealth(): Promise<DataSourceHealth>;
}
