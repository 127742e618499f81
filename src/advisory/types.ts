// Advisory pipeline types

export type AdvisoryRole = 'water-quality' | 'health-risk';

export const ADVISORY_ROLES: readonly AdvisoryRole[] = ['water-quality', 'health-risk'];

export interface Credential {
  readonly token: string;
  /** Epoch milliseconds */
  readonly expiresAt: number;
}

export interface AdvisoryRequest {
  readonly role: AdvisoryRole;
  readonly query: string;
}

export interface AdvisoryResponse {
  answer: string;
  /** Parsed upstream payload, passed through untouched */
  raw: unknown;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface QueryOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can answer an advisory question for a role.
 */
export interface Advisor {
  query(role: AdvisoryRole, text: string, options?: QueryOptions): Promise<AdvisoryResponse>;
}

export interface TokenSource {
  getToken(): Promise<Credential>;
  invalidate(token?: string): boolean;
}

export type FetchFn = typeof fetch;
