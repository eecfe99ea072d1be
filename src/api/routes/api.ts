import type { Request, Response, RequestHandler } from 'express';
import { isEstimatorError } from '../../models/errors.js';
import { logger } from '../../logging/index.js';
import { toFeatureInput } from '../../library/feature-library.js';
import { isTeam } from '../../estimation/types.js';
import type { Feature } from '../../estimation/types.js';
import type { FeatureCatalog } from '../../estimation/feature-catalog.js';
import type { TrackedTimeStore } from '../../estimation/tracked-time-store.js';
import type { ConfigStore } from '../../estimation/config-store.js';
import type { EstimationService } from '../../estimation/estimation-service.js';
import type { EstimationDataSource } from '../../data/index.js';

const log = logger.child('Api');

/**
 * Everything the route handlers read from or write to
 */
export interface ApiContext {
  catalog: FeatureCatalog;
  trackedTime: TrackedTimeStore;
  configStore: ConfigStore;
  service: EstimationService;
  /** Changes are written through when present */
  dataSource?: EstimationDataSource;
}

const STATUS_BY_CODE = {
  VALIDATION_ERROR: 400,
  CONFIG_VALIDATION_ERROR: 400,
  EMPTY_INPUT: 400,
  NOT_FOUND: 404,
  COMPUTATION_ERROR: 500,
} as const;

const CONFIG_KEYS = new Set([
  'style',
  'targetPercentile',
  'workingHoursPerDay',
  'experienceMultipliers',
  'bufferPercentage',
  'outlierThresholdMultiplier',
  'minPointsForHighConfidence',
  'highConfidenceMaxCv',
  'useRobustStatistics',
  'overlapKeywords',
]);

/**
 * Maps estimator errors to their status code; anything else is a 500 with
 * a generic message.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (isEstimatorError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status === 500) {
      log.error(fallbackMessage, error);
      res.status(500).json({ error: fallbackMessage, code: error.code });
      return;
    }
    res.status(status).json({ error: error.message, code: error.code });
    return;
  }
  log.error(fallbackMessage, error instanceof Error ? error : undefined);
  res.status(500).json({ error: fallbackMessage });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Runs `persist` when a data source is configured. A failed write undoes
 * the in-memory change before the error reaches the client, so memory and
 * storage stay in step.
 */
async function persistOrUndo(
  context: ApiContext,
  persist: (dataSource: EstimationDataSource) => Promise<unknown>,
  undo: () => void
): Promise<void> {
  if (!context.dataSource) return;
  try {
    await persist(context.dataSource);
  } catch (error) {
    undo();
    throw error;
  }
}

/**
 * GET /api/health
 */
export function createHealthHandler(context: ApiContext, startTime: () => Date | null): RequestHandler {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const started = startTime();
      const dataSource = context.dataSource ? await context.dataSource.checkHealth() : undefined;
      const healthy = dataSource?.healthy ?? true;
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        uptime: started ? Date.now() - started.getTime() : 0,
        catalogVersion: context.catalog.version,
        trackedTimeVersion: context.trackedTime.version,
        configVersion: context.configStore.version,
        features: context.catalog.size,
        trackedTimeEntries: context.trackedTime.size,
        ...(dataSource ? { dataSource } : {}),
      });
    } catch (error) {
      sendError(res, error, 'Failed to check health');
    }
  };
}

/**
 * GET /api/features?team=
 */
export function createListFeaturesHandler(context: ApiContext): RequestHandler {
  return (req: Request, res: Response): void => {
    const team = req.query.team;
    if (team !== undefined && !isTeam(team)) {
      res.status(400).json({ error: 'team must be one of frontend, backend, both' });
      return;
    }
    res.json(context.catalog.list(team));
  };
}

/**
 * GET /api/features/search?q=
 */
export function createSearchFeaturesHandler(context: ApiContext): RequestHandler {
  return (req: Request, res: Response): void => {
    const query = req.query.q;
    if (typeof query !== 'string' || query.trim().length === 0) {
      res.status(400).json({ error: 'Query parameter q is required' });
      return;
    }
    res.json(context.catalog.search(query));
  };
}

/**
 * POST /api/features
 */
export function createAddFeatureHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const feature = context.catalog.addFeature(toFeatureInput(req.body));
      await persistOrUndo(
        context,
        dataSource => dataSource.saveFeature(feature),
        () => context.catalog.removeFeature(feature.id)
      );
      res.status(201).json(feature);
    } catch (error) {
      sendError(res, error, 'Failed to add feature');
    }
  };
}

/**
 * PUT /api/features/:id/seed-time
 */
export function createUpdateSeedTimeHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      const hours = isRecord(body) ? body.seedTimeHours : undefined;
      if (typeof hours !== 'number') {
        res.status(400).json({ error: 'seedTimeHours must be a number' });
        return;
      }
      const previous = context.catalog.getById(req.params.id);
      const feature: Feature = context.catalog.updateSeedTime(req.params.id, hours);
      await persistOrUndo(
        context,
        dataSource => dataSource.saveFeature(feature),
        () => {
          if (previous) context.catalog.restoreFeature(previous);
        }
      );
      res.json(feature);
    } catch (error) {
      sendError(res, error, 'Failed to update seed time');
    }
  };
}

/**
 * DELETE /api/features/:id
 */
export function createDeleteFeatureHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const previous = context.catalog.getById(req.params.id);
      context.catalog.removeFeature(req.params.id);
      await persistOrUndo(
        context,
        dataSource => dataSource.deleteFeature(req.params.id),
        () => {
          if (previous) context.catalog.restoreFeature(previous);
        }
      );
      res.status(204).end();
    } catch (error) {
      sendError(res, error, 'Failed to delete feature');
    }
  };
}

/**
 * GET /api/features/:name/statistics
 */
export function createFeatureStatisticsHandler(context: ApiContext): RequestHandler {
  return (req: Request, res: Response): void => {
    try {
      res.json(context.service.featureStatistics(req.params.name));
    } catch (error) {
      sendError(res, error, 'Failed to compute statistics');
    }
  };
}

/**
 * POST /api/tracked-time with a list of entries or `{ entries: [...] }`.
 * Valid rows are stored even when others are rejected.
 */
export function createTrackedTimeHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      const entries: unknown = isRecord(body) ? body.entries : body;
      if (!Array.isArray(entries)) {
        res.status(400).json({ error: 'Body must be a list of tracked time entries' });
        return;
      }

      const result = context.trackedTime.addMany(entries);
      await persistOrUndo(
        context,
        dataSource => dataSource.appendTrackedTime(result.accepted),
        () => {
          for (const entry of result.accepted) context.trackedTime.remove(entry.id);
        }
      );

      res.status(result.accepted.length > 0 ? 201 : 400).json({
        accepted: result.accepted.length,
        rejected: result.rejected.map(row => ({
          row: row.rowNumber,
          errors: row.errors.map(e => ({ field: e.field, message: e.message })),
        })),
      });
    } catch (error) {
      sendError(res, error, 'Failed to store tracked time');
    }
  };
}

/**
 * POST /api/estimates
 */
export function createEstimateHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        res.status(400).json({ error: 'Body must be an estimate request' });
        return;
      }
      const estimate = context.service.estimateProject(req.body);
      await context.dataSource?.saveEstimate(estimate);
      res.status(201).json(estimate);
    } catch (error) {
      sendError(res, error, 'Failed to compute estimate');
    }
  };
}

/**
 * GET /api/estimates/:id
 */
export function createGetEstimateHandler(context: ApiContext): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const estimate = context.dataSource ? await context.dataSource.getEstimate(req.params.id) : null;
      if (!estimate) {
        res.status(404).json({ error: 'Estimate not found' });
        return;
      }
      res.json(estimate);
    } catch (error) {
      sendError(res, error, 'Failed to get estimate');
    }
  };
}

/**
 * GET /api/config
 */
export function createGetConfigHandler(context: ApiContext): RequestHandler {
  return (_req: Request, res: Response): void => {
    res.json(context.configStore.snapshot());
  };
}

/**
 * PATCH /api/config. Unknown keys are refused; the rest is validated as a
 * whole before anything changes.
 */
export function createPatchConfigHandler(context: ApiContext): RequestHandler {
  return (req: Request, res: Response): void => {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        res.status(400).json({ error: 'Body must be an object of configuration fields' });
        return;
      }
      const unknownKeys = Object.keys(body).filter(key => !CONFIG_KEYS.has(key));
      if (unknownKeys.length > 0) {
        res.status(400).json({ error: `Unknown configuration fields: ${unknownKeys.join(', ')}` });
        return;
      }
      if (body.experienceMultipliers !== undefined && !isRecord(body.experienceMultipliers)) {
        res.status(400).json({ error: 'experienceMultipliers must be an object' });
        return;
      }
      res.json(context.configStore.update(req.body));
    } catch (error) {
      sendError(res, error, 'Failed to update configuration');
    }
  };
}
