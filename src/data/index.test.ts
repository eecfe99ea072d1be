import { describe, it, expect, afterEach } from 'vitest';
import { createDataSource, hydrate, FileDataSource, SupabaseDataSource } from './index.js';
import type { EstimationDataSource } from './index.js';
import { resetClient } from '../db/client.js';
import { createFakeSupabase } from '../db/testing/fake-supabase.js';
import { FeatureCatalog } from '../estimation/feature-catalog.js';
import { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import { ConfigLoader } from '../cli/config-loader.js';
import { ValidationError } from '../models/errors.js';
import type { Feature } from '../estimation/types.js';

const crud: Feature = {
  id: 'feat_crud',
  name: 'CRUD',
  team: 'backend',
  process: '',
  seedTimeHours: 4,
  synonyms: [],
  notes: '',
  seedTimeHistory: [],
};

function memorySource(features: Feature[]): EstimationDataSource {
  return {
    kind: 'file',
    loadFeatures: async () => features,
    saveFeature: async () => undefined,
    deleteFeature: async () => undefined,
    loadTrackedTime: async () => ({
      entries: [
        { id: 'tt-1', team: 'backend', memberName: 'alice', feature: 'CRUD', hours: 3 },
        { id: 'tt-2', team: 'backend', memberName: 'bob', feature: 'CRUD', hours: -1 },
      ],
      rejected: [{ rowNumber: 7, errors: [new ValidationError('hours', 'abc', 'must be a positive number')] }],
    }),
    appendTrackedTime: async entries => entries.length,
    saveEstimate: async () => undefined,
    getEstimate: async () => null,
    listEstimates: async () => [],
    checkHealth: async () => ({ healthy: true, kind: 'file' }),
  };
}

describe('createDataSource', () => {
  afterEach(() => {
    resetClient();
  });

  it('should build a file data source by default', () => {
    expect(createDataSource(ConfigLoader.getDefaults())).toBeInstanceOf(FileDataSource);
  });

  it('should build a Supabase data source with credentials', () => {
    const config = {
      ...ConfigLoader.getDefaults(),
      dataSource: 'supabase' as const,
      supabaseUrl: 'http://localhost:54321',
      supabaseKey: 'test-secret',
    };
    expect(createDataSource(config)).toBeInstanceOf(SupabaseDataSource);
  });

  it('should refuse Supabase without credentials', () => {
    const config = { ...ConfigLoader.getDefaults(), dataSource: 'supabase' as const };
    expect(() => createDataSource(config)).toThrow('Missing required environment variables for the supabase data source');
  });
});

describe('hydrate', () => {
  it('should fill the catalog and store and report rejects', async () => {
    const catalog = new FeatureCatalog();
    const store = new TrackedTimeStore();

    const result = await hydrate(memorySource([crud, { ...crud, id: 'feat_dup' }]), catalog, store);

    expect(result.features).toBe(1);
    expect(result.trackedTime).toBe(1);
    expect(result.rejectedFeatures.map(r => r.id)).toEqual(['feat_dup']);
    expect(result.rejectedTrackedTime.map(r => r.rowNumber)).toEqual([7, 2]);
    expect(store.list()[0].id).toBe('tt-1');
  });
});

describe('SupabaseDataSource', () => {
  it('should read features through the repository', async () => {
    const { client, calls } = createFakeSupabase([{
      data: [{
        id: 'feat_crud',
        name: 'CRUD',
        team: 'backend',
        process: null,
        seed_time_hours: 4,
        synonyms: null,
        notes: null,
        seed_time_history: null,
      }],
      error: null,
    }]);

    const features = await new SupabaseDataSource(client).loadFeatures();

    expect(features).toEqual([crud]);
    expect(calls[0].table).toBe('est_features');
  });

  it('should tag health results with its kind', async () => {
    const { client } = createFakeSupabase([{ data: [], error: null }]);
    expect(await new SupabaseDataSource(client).checkHealth()).toMatchObject({ healthy: true, kind: 'supabase' });
  });

  it('should report no rejected rows for tracked time', async () => {
    const { client } = createFakeSupabase([{
      data: [{
        id: 'tt-1',
        team: 'backend',
        member_name: 'alice',
        feature: 'CRUD',
        hours: 3,
        process: null,
        date: null,
      }],
      error: null,
    }]);

    const stored = await new SupabaseDataSource(client).loadTrackedTime();

    expect(stored.rejected).toEqual([]);
    expect(stored.entries.map(e => [e.memberName, e.hours])).toEqual([['alice', 3]]);
  });

  it('should skip the insert for an empty batch', async () => {
    const { client, calls } = createFakeSupabase([]);
    expect(await new SupabaseDataSource(client).appendTrackedTime([])).toBe(0);
    expect(calls).toEqual([]);
  });
});
