import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import logger from './utils/logger.js';
import { toHttpError } from './utils/errors.js';
import { createWaterRouter } from './water/water.routes.js';
import { createAdvisoryRouter } from './advisory/advisory.routes.js';
import type { WaterDataStore } from './water/water.store.js';
import type { SimulatedAdvisor } from './advisory/simulated-advisor.js';
import type { Advisor } from './advisory/types.js';

export interface AppDependencies {
  store: WaterDataStore;
  advisor: Advisor;
  simulated: SimulatedAdvisor;
  corsOrigin: string;
  exposeRawUpstream?: boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.set('trust proxy', 1);

  // JSON API only, so the default policy is enough
  app.use(helmet());

  app.use(cors({
    origin: deps.corsOrigin,
    credentials: true,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.debug(`${req.method} ${req.path}`, {
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createWaterRouter(deps.store));
  app.use(createAdvisoryRouter({
    advisor: deps.advisor,
    simulated: deps.simulated,
    exposeRawUpstream: deps.exposeRawUpstream,
  }));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error('Unhandled error', { error: err.message, stack: err.stack });
    const { status, body } = toHttpError(err);
    res.status(status).json(body);
  });

  return app;
}
