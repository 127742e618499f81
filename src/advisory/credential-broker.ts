/**
 * Credential Broker
 *
 * Exchanges a long-lived API key for a short-lived IAM bearer token and
 * caches it for the life of the process.
 */

import { z } from 'zod';
import logger from '../utils/logger.js';
import { AuthError } from '../utils/errors.js';
import type { Credential, FetchFn, TokenSource } from './types.js';

const APIKEY_GRANT_TYPE = 'urn:ibm:params:oauth:grant-type:apikey';

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_SAFETY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

export interface CredentialBrokerOptions {
  apiKey: string;
  iamUrl: string;
  timeoutMs?: number;
  safetyMarginMs?: number;
  fetch?: FetchFn;
  now?: () => number;
}

export class CredentialBroker implements TokenSource {
  private credential: Credential | null = null;
  // Shared by every caller that misses the cache while a refresh is running
  private inFlight: Promise<Credential> | null = null;

  private readonly apiKey: string;
  private readonly iamUrl: string;
  private readonly timeoutMs: number;
  private readonly safetyMarginMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;

  constructor(options: CredentialBrokerOptions) {
    this.apiKey = options.apiKey;
    this.iamUrl = options.iamUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<Credential> {
    const cached = this.credential;
    if (cached && this.now() < cached.expiresAt - this.safetyMarginMs) {
      return cached;
    }

    if (this.inFlight) {
      logger.debug('IAM token refresh coalesced');
      return this.inFlight;
    }

    const refresh = this.refresh();
    this.inFlight = refresh;

    try {
      return await refresh;
    } finally {
      if (this.inFlight === refresh) {
        this.inFlight = null;
      }
    }
  }

  /**
   * Drop the cached credential. With a token, only that exact token is dropped,
   * so a stale 401 cannot discard a credential fetched after it.
   */
  invalidate(token?: string): boolean {
    if (!this.credential) return false;
    if (token !== undefined && this.credential.token !== token) return false;

    this.credential = null;
    logger.debug('IAM token invalidated');
    return true;
  }

  private async refresh(): Promise<Credential> {
    const started = this.now();
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    let status: number | undefined;

    try {
      const response = await this.fetchFn(this.iamUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        body: new URLSearchParams({
          grant_type: APIKEY_GRANT_TYPE,
          apikey: this.apiKey,
        }),
        signal: controller.signal,
      });
      status = response.status;

      const text = await response.text();

      if (!response.ok) {
        throw new AuthError(`Identity endpoint responded ${response.status}`, 'STATUS', response.status);
      }

      const parsed = tokenResponseSchema.safeParse(parseJson(text));
      if (!parsed.success) {
        throw new AuthError('Identity endpoint returned a malformed token response', 'MALFORMED', response.status);
      }

      const issuedAt = this.now();
      const credential: Credential = Object.freeze({
        token: parsed.data.access_token,
        expiresAt: issuedAt + parsed.data.expires_in * 1000,
      });
      this.credential = credential;

      logger.debug('IAM token refreshed', {
        endpoint: this.iamUrl,
        expiresInSeconds: parsed.data.expires_in,
        elapsedMs: issuedAt - started,
      });

      return credential;
    } catch (error) {
      const authError = this.toAuthError(error, timedOut);
      logger.error('IAM token request failed', {
        endpoint: this.iamUrl,
        status,
        code: authError.code,
        elapsedMs: this.now() - started,
        error: authError.message,
      });
      throw authError;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toAuthError(error: unknown, timedOut: boolean): AuthError {
    if (error instanceof AuthError) return error;
    if (timedOut) {
      return new AuthError(`Identity endpoint timed out after ${this.timeoutMs}ms`, 'TIMEOUT', undefined, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new AuthError(`Identity endpoint unreachable: ${message}`, 'NETWORK', undefined, { cause: error });
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
