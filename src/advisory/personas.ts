import type { AdvisoryRequest, AdvisoryRole } from './types.js';
import { ValidationError } from '../utils/errors.js';

export const ROLE_PREAMBLES: Readonly<Record<AdvisoryRole, string>> = {
  'water-quality':
    'You are a water-quality advisor for mining sites, water treatment plants, water utilities and farms. ' +
    'Answer with the relevant regulatory limits, the likely causes of an out-of-range reading and the treatment or remediation steps to take. ' +
    'Keep the answer short and practical.',
  'health-risk':
    'You are a public-health advisor for drinking water. ' +
    'Explain the health effects of the contaminant or condition in question for people and livestock, the symptoms to watch for and the protective steps to take. ' +
    'Recommend medical attention where exposure could be serious. Keep the answer short and practical.',
};

export function createAdvisoryRequest(role: AdvisoryRole, text: string): AdvisoryRequest {
  const query = text.trim();
  if (!query) {
    throw new ValidationError('Query must not be empty', 'query');
  }
  return Object.freeze({ role, query });
}

/**
 * Preamble first, then the question, separated by a blank line.
 */
export function buildPrompt(request: AdvisoryRequest): string {
  return `${ROLE_PREAMBLES[request.role]}\n\n${request.query}`;
}
