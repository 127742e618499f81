/**
 * Water Data Routes
 *
 * Read-only lookups delegated to the water data store.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { DataStoreError, NotFoundError, toHttpError } from '../utils/errors.js';
import { alertSeveritySchema } from '../types/index.js';
import type { WaterDataStore } from './water.store.js';

// ============================================
// Validation Schemas
// ============================================

const HistoricalQuerySchema = z.object({
  metricId: z.string().min(1).optional(),
  from: z.string().date().optional(),
  to: z.string().date().optional(),
});

const AlertsQuerySchema = z.object({
  sourceId: z.string().min(1).optional(),
  severity: alertSeveritySchema.optional(),
});

function sendError(res: Response, error: unknown, operation: string) {
  const failure = error instanceof NotFoundError || error instanceof DataStoreError
    ? error
    : new DataStoreError(`Failed to ${operation}`, { cause: error });

  const { status, body } = toHttpError(failure);
  if (status >= 500) {
    logger.error(`Failed to ${operation}`, { error: error instanceof Error ? error.message : String(error) });
  }
  return res.status(status).json(body);
}

function sendInvalidQuery(res: Response, error: z.ZodError) {
  const issue = error.errors[0];
  return res.status(400).json({
    error: 'Invalid query parameters',
    detail: issue ? `${issue.path.join('.')}: ${issue.message}` : undefined,
  });
}

// ============================================
// Routes
// ============================================

export function createWaterRouter(store: WaterDataStore): Router {
  const router = Router();

  /**
   * GET /water-sources
   */
  router.get('/water-sources', async (_req: Request, res: Response) => {
    try {
      return res.json(await store.listSources());
    } catch (error) {
      return sendError(res, error, 'list water sources');
    }
  });

  /**
   * GET /water-source/:sourceId
   */
  router.get('/water-source/:sourceId', async (req: Request, res: Response) => {
    const { sourceId } = req.params;
    try {
      const source = await store.getSource(sourceId);
      if (!source) {
        throw new NotFoundError(`No water source with id "${sourceId}"`, 'Water source');
      }
      return res.json(source);
    } catch (error) {
      return sendError(res, error, 'fetch water source');
    }
  });

  /**
   * GET /quality-predictions/:sourceId
   */
  router.get('/quality-predictions/:sourceId', async (req: Request, res: Response) => {
    const { sourceId } = req.params;
    try {
      const prediction = await store.getPrediction(sourceId);
      if (!prediction) {
        throw new NotFoundError(`No quality prediction for source "${sourceId}"`, 'Prediction');
      }
      return res.json(prediction);
    } catch (error) {
      return sendError(res, error, 'fetch quality prediction');
    }
  });

  /**
   * GET /historical-data?metricId=&from=&to=
   */
  router.get('/historical-data', async (req: Request, res: Response) => {
    const parsed = HistoricalQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendInvalidQuery(res, parsed.error);
    }

    try {
      return res.json(await store.listHistorical(parsed.data));
    } catch (error) {
      return sendError(res, error, 'list historical data');
    }
  });

  /**
   * GET /alerts?sourceId=&severity=
   */
  router.get('/alerts', async (req: Request, res: Response) => {
    const parsed = AlertsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendInvalidQuery(res, parsed.error);
    }

    try {
      return res.json(await store.listAlerts(parsed.data));
    } catch (error) {
      return sendError(res, error, 'list alerts');
    }
  });

  return router;
}
