import { describe, it, expect } from 'vitest';
import { FALLBACK_RESPONSE, SimulatedAdvisor } from './simulated-advisor.js';
import { ValidationError } from '../utils/errors.js';

describe('SimulatedAdvisor', () => {
  const advisor = new SimulatedAdvisor({
    'water-quality': { 'Is the pH okay?': 'Yes, 7.2 is within range.' },
    'health-risk': {},
  });

  it('answers from the table of the requested role', () => {
    expect(advisor.respond('water-quality', 'Is the pH okay?')).toBe('Yes, 7.2 is within range.');
    expect(advisor.respond('health-risk', 'Is the pH okay?')).toBe(FALLBACK_RESPONSE);
  });

  it('only matches the exact text', () => {
    expect(advisor.respond('water-quality', 'Is the pH okay? ')).toBe(FALLBACK_RESPONSE);
    expect(advisor.respond('water-quality', 'is the pH okay?')).toBe(FALLBACK_RESPONSE);
  });

  it('does not match inherited object keys', () => {
    expect(advisor.respond('water-quality', 'toString')).toBe(FALLBACK_RESPONSE);
  });

  it('rejects a blank question', () => {
    expect(() => advisor.respond('water-quality', '  ')).toThrow(ValidationError);
  });
});
