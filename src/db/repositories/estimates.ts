import type { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../../logging/index.js';
import { overallConfidence } from '../../estimation/confidence.js';
import type {
  ConfidenceLevel,
  EstimateLineItem,
  EstimationStyle,
  ExperienceLevel,
  OverlapWarning,
  ProjectEstimate,
} from '../../estimation/types.js';

const log = logger.child('Database.EstimateRepo');

const TABLE = 'est_project_estimates';

/**
 * Line items and warnings are stored as jsonb; they are plain data with no
 * dates inside.
 */
export interface ProjectEstimateRow {
  id: string;
  line_items: EstimateLineItem[];
  frontend_total_hours: number;
  backend_total_hours: number;
  grand_total_hours: number;
  buffer_hours: number | null;
  total_days: number;
  /** Null on rows written before project confidence was stored */
  confidence: ConfidenceLevel | null;
  overlap_warnings: OverlapWarning[];
  style: EstimationStyle;
  experience_level: ExperienceLevel | null;
  config_version: number;
  created_at: string;
}

export function estimateFromRow(row: ProjectEstimateRow): ProjectEstimate {
  const estimate: ProjectEstimate = {
    id: row.id,
    lineItems: row.line_items,
    frontendTotalHours: Number(row.frontend_total_hours),
    backendTotalHours: Number(row.backend_total_hours),
    grandTotalHours: Number(row.grand_total_hours),
    totalDays: Number(row.total_days),
    confidence: row.confidence ?? overallConfidence(row.line_items.map(item => item.confidence)),
    overlapWarnings: row.overlap_warnings ?? [],
    style: row.style,
    configVersion: row.config_version,
    createdAt: new Date(row.created_at),
  };
  if (row.buffer_hours !== null) estimate.bufferHours = Number(row.buffer_hours);
  if (row.experience_level) estimate.experienceLevel = row.experience_level;
  return estimate;
}

export function estimateToRow(estimate: ProjectEstimate): ProjectEstimateRow {
  return {
    id: estimate.id,
    line_items: estimate.lineItems,
    frontend_total_hours: estimate.frontendTotalHours,
    backend_total_hours: estimate.backendTotalHours,
    grand_total_hours: estimate.grandTotalHours,
    buffer_hours: estimate.bufferHours ?? null,
    total_days: estimate.totalDays,
    confidence: estimate.confidence,
    overlap_warnings: estimate.overlapWarnings,
    style: estimate.style,
    experience_level: estimate.experienceLevel ?? null,
    config_version: estimate.configVersion,
    created_at: estimate.createdAt.toISOString(),
  };
}

export class EstimateRepository {
  constructor(private client: SupabaseClient) {}

  async save(estimate: ProjectEstimate): Promise<void> {
    log.time('save-estimate');
    const { error } = await this.client
      .from(TABLE)
      .insert(estimateToRow(estimate));

    log.timeEnd('save-estimate', { table: TABLE, operation: 'insert', estimateId: estimate.id });

    if (error) {
      log.error('Failed to save estimate', { operation: 'insert', table: TABLE, estimateId: estimate.id, error: error.message });
      throw new Error(`Failed to save estimate: ${error.message}`);
    }
    log.debug('Estimate saved', { estimateId: estimate.id, lineItemCount: estimate.lineItems.length });
  }

  async getById(id: string): Promise<ProjectEstimate | null> {
    const { data, error } = await this.client
      .from(TABLE)
      .select()
      .eq('id', id)
      .single();

    if (error && error.code !== 'PGRST116') {
      log.error('Failed to get estimate', { operation: 'select', table: TABLE, estimateId: id, error: error.message });
      throw new Error(`Failed to get estimate: ${error.message}`);
    }
    return data ? estimateFromRow(data as ProjectEstimateRow) : null;
  }

  async listRecent(limit: number = 20): Promise<ProjectEstimate[]> {
    const { data, error } = await this.client
      .from(TABLE)
      .select()
      .order('created_at', { ascending: false })
      .limit(limit);

    if (error) {
      log.error('Failed to list estimates', { operation: 'select', table: TABLE, error: error.message });
      throw new Error(`Failed to list estimates: ${error.message}`);
    }
    return ((data ?? []) as ProjectEstimateRow[]).map(estimateFromRow);
  }
}
