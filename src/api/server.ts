import express from 'express';
import type { Application, Request, Response, NextFunction } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { logger } from '../logging/index.js';
import {
  createHealthHandler,
  createListFeaturesHandler,
  createSearchFeaturesHandler,
  createAddFeatureHandler,
  createUpdateSeedTimeHandler,
  createDeleteFeatureHandler,
  createFeatureStatisticsHandler,
  createTrackedTimeHandler,
  createEstimateHandler,
  createGetEstimateHandler,
  createGetConfigHandler,
  createPatchConfigHandler,
} from './routes/api.js';
import type { ApiContext } from './routes/api.js';

const log = logger.child('ApiServer');

export interface ApiServerConfig extends ApiContext {
  port: number;
}

/**
 * JSON HTTP front end over the estimation engine
 */
export class EstimatorApiServer {
  private app: Application;
  private server: Server | null = null;
  private config: ApiServerConfig;
  private startTime: Date | null = null;

  constructor(config: ApiServerConfig) {
    this.config = config;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const allowedOrigins = process.env.CORS_ALLOWED_ORIGINS?.split(',') || [];
      const origin = req.headers.origin;

      if (process.env.NODE_ENV === 'production') {
        if (origin && allowedOrigins.includes(origin)) {
          res.header('Access-Control-Allow-Origin', origin);
        }
      } else {
        res.header('Access-Control-Allow-Origin', '*');
      }

      res.header('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
      res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
      next();
    });
  }

  private setupRoutes(): void {
    const context = this.config;

    this.app.get('/api/health', createHealthHandler(context, () => this.startTime));

    // search is registered before the :name routes so it is not read as a name
    this.app.get('/api/features', createListFeaturesHandler(context));
    this.app.get('/api/features/search', createSearchFeaturesHandler(context));
    this.app.post('/api/features', createAddFeatureHandler(context));
    this.app.put('/api/features/:id/seed-time', createUpdateSeedTimeHandler(context));
    this.app.delete('/api/features/:id', createDeleteFeatureHandler(context));
    this.app.get('/api/features/:name/statistics', createFeatureStatisticsHandler(context));

    this.app.post('/api/tracked-time', createTrackedTimeHandler(context));

    this.app.post('/api/estimates', createEstimateHandler(context));
    this.app.get('/api/estimates/:id', createGetEstimateHandler(context));

    this.app.get('/api/config', createGetConfigHandler(context));
    this.app.patch('/api/config', createPatchConfigHandler(context));

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // body-parser failures arrive here with a status of their own
    this.app.use((err: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction) => {
      if (err.status === 400) {
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
      }
      log.error('API server error', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, () => {
        this.startTime = new Date();
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.config.port;
        log.info(`API server started on port ${port}`);
        resolve();
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.server = null;
        this.startTime = null;
        log.info('API server stopped');
        resolve();
      });
    });
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  getApp(): Application {
    return this.app;
  }

  getAddress(): AddressInfo | null {
    const address = this.server?.address();
    return typeof address === 'object' && address ? address : null;
  }
}
