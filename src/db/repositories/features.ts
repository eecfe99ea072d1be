import type { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../../logging/index.js';
import type { Feature, Team } from '../../estimation/types.js';

const log = logger.child('Database.FeatureRepo');

const TABLE = 'est_features';

interface SeedTimeChangeRow {
  previous_value: number;
  new_value: number;
  changed_at: string;
}

export interface FeatureRow {
  id: string;
  name: string;
  team: Team;
  process: string | null;
  seed_time_hours: number;
  synonyms: string[] | null;
  notes: string | null;
  seed_time_history: SeedTimeChangeRow[] | null;
  updated_at?: string;
}

export function featureFromRow(row: FeatureRow): Feature {
  return {
    id: row.id,
    name: row.name,
    team: row.team,
    process: row.process ?? '',
    seedTimeHours: Number(row.seed_time_hours),
    synonyms: row.synonyms ?? [],
    notes: row.notes ?? '',
    seedTimeHistory: (row.seed_time_history ?? []).map(change => ({
      previousValue: Number(change.previous_value),
      newValue: Number(change.new_value),
      changedAt: new Date(change.changed_at),
    })),
  };
}

export function featureToRow(feature: Feature): FeatureRow {
  return {
    id: feature.id,
    name: feature.name,
    team: feature.team,
    process: feature.process || null,
    seed_time_hours: feature.seedTimeHours,
    synonyms: feature.synonyms,
    notes: feature.notes || null,
    seed_time_history: feature.seedTimeHistory.map(change => ({
      previous_value: change.previousValue,
      new_value: change.newValue,
      changed_at: change.changedAt.toISOString(),
    })),
  };
}

export class FeatureRepository {
  constructor(private client: SupabaseClient) {}

  async listAll(): Promise<Feature[]> {
    log.time('list-features');
    const { data, error } = await this.client
      .from(TABLE)
      .select()
      .order('name', { ascending: true });

    log.timeEnd('list-features', { table: TABLE, operation: 'select', rowCount: data?.length });

    if (error) {
      log.error('Failed to list features', { operation: 'select', table: TABLE, error: error.message });
      throw new Error(`Failed to list features: ${error.message}`);
    }
    return ((data ?? []) as FeatureRow[]).map(featureFromRow);
  }

  async getById(id: string): Promise<Feature | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select()
      .eq('id', id)
      .single();

    // PGRST116: no rows
    if (error && error.code !== 'PGRST116') {
      log.error('Failed to get feature', { operation: 'select', table: TABLE, featureId: id, error: error.message });
      throw new Error(`Failed to get feature: ${error.message}`);
    }
    return data ? featureFromRow(data as FeatureRow) : null;
  }

  /**
   * Inserts or replaces the row with the feature's id.
   */
  async upsert(feature: Feature): Promise<Feature> {
    log.time('upsert-feature');
    const { data, error } = await this.client
      .from(TABLE)
      .upsert({ ...featureToRow(feature), updated_at: new Date().toISOString() })
      .select()
      .single();

    log.timeEnd('upsert-feature', { table: TABLE, operation: 'upsert', featureId: feature.id });

    if (error) {
      log.error('Failed to save feature', { operation: 'upsert', table: TABLE, featureId: feature.id, error: error.message });
      throw new Error(`Failed to save feature: ${error.message}`);
    }
    log.debug('Feature saved', { featureId: feature.id, name: feature.name });
    return featureFromRow(data as FeatureRow);
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .delete()
      .eq('id', id);

    if (error) {
      log.error('Failed to delete feature', { operation: 'delete', table: TABLE, featureId: id, error: error.message });
      throw new Error(`Failed to delete feature: ${error.message}`);
    }
    log.debug('Feature deleted', { featureId: id });
  }
}
