import type { SupabaseClient } from '@supabase/supabase-js';
import { checkHealth } from '../db/client.js';
import { FeatureRepository } from '../db/repositories/features.js';
import { TrackedTimeRepository } from '../db/repositories/tracked-time.js';
import { EstimateRepository } from '../db/repositories/estimates.js';
import type { Feature, ProjectEstimate, TrackedTimeEntry } from '../estimation/types.js';
import type { DataSourceHealth, EstimationDataSource, TrackedTimeLoad } from './data-source.js';

export class SupabaseDataSource implements EstimationDataSource {
  readonly kind = 'supabase' as const;
  private readonly features: FeatureRepository;
  private readonly trackedTime: TrackedTimeRepository;
  private readonly estimates: EstimateRepository;

  constructor(private readonly client: SupabaseClient) {
    this.features = new FeatureRepository(client);
    this.trackedTime = new TrackedTimeRepository(client);
    this.estimates = new EstimateRepository(client);
  }

  loadFeatures(): Promise<Feature[]> {
    return this.features.listAll();
  }

  async saveFeature(feature: Feature): Promise<void> {
    await this.features.upsert(feature);
  }

  deleteFeature(id: string): Promise<void> {
    return this.features.delete(id);
  }

  async loadTrackedTime(): Promise<TrackedTimeLoad> {
    return { entries: await this.trackedTime.listAll(), rejected: [] };
  }

  appendTrackedTime(entries: readonly TrackedTimeEntry[]): Promise<number> {
    return this.trackedTime.insertMany([...entries]);
  }

  saveEstimate(estimate: ProjectEstimate): Promise<void> {
    return this.estimates.save(estimate);
  }

  getEstimate(id: string): Promise<ProjectEstimate | null> {
    return this.estimates.getById(id);
  }

  listEstimates(limit?: number): Promise<ProjectEstimate[]> {
    return this.estimates.listRecent(limit);
  }

  async checkHealth(): Promise<DataSourceHealth> {
    const result = await checkHealth(this.client);
    return { ...result, kind: this.kind };
  }
}
