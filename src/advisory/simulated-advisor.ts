import { readFileSync } from 'fs';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import type { AdvisoryRole } from './types.js';

export const FALLBACK_RESPONSE = "I'm sorry, I don't have an answer for that.";

const responseTableSchema = z.record(z.string());

const simulatedResponsesSchema = z.object({
  'water-quality': responseTableSchema,
  'health-risk': responseTableSchema,
});

export type SimulatedResponses = z.infer<typeof simulatedResponsesSchema>;

/**
 * Canned answers keyed by the exact question text. Never calls upstream.
 */
export class SimulatedAdvisor {
  private readonly tables: Map<AdvisoryRole, Map<string, string>>;

  constructor(responses: SimulatedResponses) {
    this.tables = new Map<AdvisoryRole, Map<string, string>>([
      ['water-quality', new Map(Object.entries(responses['water-quality']))],
      ['health-risk', new Map(Object.entries(responses['health-risk']))],
    ]);
  }

  respond(role: AdvisoryRole, text: string): string {
    if (!text.trim()) {
      throw new ValidationError('Query must not be empty', 'query');
    }
    return this.tables.get(role)?.get(text) ?? FALLBACK_RESPONSE;
  }
}

export function loadSimulatedResponses(filePath: string): SimulatedResponses {
  const parsed = simulatedResponsesSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf8')));
  if (!parsed.success) {
    throw new Error(`Invalid simulated responses file ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
