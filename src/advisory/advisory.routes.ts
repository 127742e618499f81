/**
 * Advisory Routes
 *
 * Natural-language advisory endpoints. Every route funnels into one handler
 * parameterized by role.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { toHttpError } from '../utils/errors.js';
import type { SimulatedAdvisor } from './simulated-advisor.js';
import type { Advisor, AdvisoryRole } from './types.js';

export interface AdvisoryRouterOptions {
  advisor: Advisor;
  simulated: SimulatedAdvisor;
  exposeRawUpstream?: boolean;
}

// ============================================
// Validation Schemas
// ============================================

const EMPTY_QUERY = "Parameter 'query' must not be empty";

const queryParam = z.string({
  required_error: "Missing required parameter 'query'",
  invalid_type_error: "Parameter 'query' must be a single string",
});

const AdvisoryQuerySchema = z.object({
  query: queryParam.trim().min(1, EMPTY_QUERY),
});

// Canned tables are keyed by the exact text, so the query is not trimmed
const SimulatedQuerySchema = z.object({
  query: queryParam.refine(query => query.trim().length > 0, EMPTY_QUERY),
});

const ROUTE_ROLES: ReadonlyArray<[string, AdvisoryRole]> = [
  ['water-quality-agent', 'water-quality'],
  ['health-risk-agent', 'health-risk'],
];

function parseQuery(
  schema: z.ZodType<{ query: string }, z.ZodTypeDef, unknown>,
  req: Request,
  res: Response
): string | null {
  const parsed = schema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json({
      error: 'Invalid query parameters',
      detail: parsed.error.errors[0]?.message,
    });
    return null;
  }
  return parsed.data.query;
}

// ============================================
// Routes
// ============================================

export function createAdvisoryRouter(options: AdvisoryRouterOptions): Router {
  const { advisor, simulated, exposeRawUpstream = false } = options;
  const router = Router();

  const askAdvisor = (role: AdvisoryRole) => async (req: Request, res: Response) => {
    const query = parseQuery(AdvisoryQuerySchema, req, res);
    if (query === null) return;

    // Abandon the upstream call if the caller goes away first
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await advisor.query(role, query, { signal: controller.signal });
      return res.json(exposeRawUpstream ? { answer: result.answer, raw: result.raw } : { answer: result.answer });
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug('Client disconnected before advisory answer', { role });
        return;
      }

      const { status, body } = toHttpError(error);
      logger.warn('Advisory request failed', {
        role,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      return res.status(status).json(body);
    }
  };

  const askSimulated = (role: AdvisoryRole) => (req: Request, res: Response) => {
    const query = parseQuery(SimulatedQuerySchema, req, res);
    if (query === null) return;

    return res.json({ response: simulated.respond(role, query) });
  };

  /**
   * GET /water-quality-agent?query=...            -> { answer }
   * GET /health-risk-agent?query=...              -> { answer }
   * GET /simulate-water-quality-agent?query=...   -> { response }
   * GET /simulate-health-risk-agent?query=...     -> { response }
   */
  for (const [path, role] of ROUTE_ROLES) {
    router.get(`/${path}`, askAdvisor(role));
    router.get(`/simulate-${path}`, askSimulated(role));
  }

  return router;
}
