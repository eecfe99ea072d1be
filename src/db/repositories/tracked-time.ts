import type { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../../logging/index.js';
import type { Team, TrackedTimeEntry } from '../../estimation/types.js';

const log = logger.child('Database.TrackedTimeRepo');

const TABLE = 'est_tracked_time';

export interface TrackedTimeRow {
  id: string;
  team: Team;
  member_name: string;
  feature: string;
  hours: number;
  process: string | null;
  date: string | null;
}

export function trackedTimeFromRow(row: TrackedTimeRow): TrackedTimeEntry {
  const entry: TrackedTimeEntry = {
    id: row.id,
    team: row.team,
    memberName: row.member_name,
    feature: row.feature,
    hours: Number(row.hours),
  };
  if (row.process) entry.process = row.process;
  if (row.date) entry.date = new Date(row.date);
  return entry;
}

export function trackedTimeToRow(entry: TrackedTimeEntry): TrackedTimeRow {
  return {
    id: entry.id,
    team: entry.team,
    member_name: entry.memberName,
    feature: entry.feature,
    hours: entry.hours,
    process: entry.process ?? null,
    date: entry.date ? entry.date.toISOString() : null,
  };
}

export class TrackedTimeRepository {
  constructor(private client: SupabaseClient) {}

  async listAll(): Promise<TrackedTimeEntry[]> {
    log.time('list-tracked-time');
    const { data, error } = await this.client
      .from(TABLE)
      .select()
      .order('date', { ascending: true, nullsFirst: true });

    log.timeEnd('list-tracked-time', { table: TABLE, operation: 'select', rowCount: data?.length });

    if (error) {
      log.error('Failed to list tracked time', { operation: 'select', table: TABLE, error: error.message });
      throw new Error(`Failed to list tracked time: ${error.message}`);
    }
    return ((data ?? []) as TrackedTimeRow[]).map(trackedTimeFromRow);
  }

  /**
   * @returns number of rows written
   */
  async insertMany(entries: TrackedTimeEntry[]): Promise<number> {
    if (entries.length === 0) return 0;

    log.time('insert-tracked-time');
    const { error } = await this.client
      .from(TABLE)
      .insert(entries.map(trackedTimeToRow));

    log.timeEnd('insert-tracked-time', { table: TABLE, operation: 'insert', rowCount: entries.length });

    if (error) {
      log.error('Failed to insert tracked time', { operation: 'insert', table: TABLE, error: error.message });
      throw new Error(`Failed to insert tracked time: ${error.message}`);
    }
    return entries.length;
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .delete()
      .eq('id', id);

    if (error) {
      log.error('Failed to delete tracked time', { operation: 'delete', table: TABLE, entryId: id, error: error.message });
      throw new Error(`Failed to delete tracked time: ${error.message}`);
    }
  }
}
