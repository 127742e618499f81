/**
 * Advisory Client
 *
 * Sends role-prefixed questions to the hosted chat model and returns the
 * generated answer. One implementation serves every advisory role.
 */

import { z } from 'zod';
import logger from '../utils/logger.js';
import { UpstreamError } from '../utils/errors.js';
import { buildPrompt, createAdvisoryRequest } from './personas.js';
import type {
  Advisor,
  AdvisoryResponse,
  AdvisoryRole,
  ChatMessage,
  Credential,
  FetchFn,
  QueryOptions,
  TokenSource,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_API_VERSION = '2024-03-14';

const chatResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().min(1),
    }),
  })).min(1),
});

interface ChatRequestBody {
  model_id: string;
  project_id: string;
  messages: ChatMessage[];
}

interface UpstreamReply {
  status: number;
  ok: boolean;
  body: string;
}

export interface AdvisoryClientOptions {
  broker: TokenSource;
  baseUrl: string;
  projectId: string;
  modelId: string;
  apiVersion?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

export class AdvisoryClient implements Advisor {
  private readonly broker: TokenSource;
  private readonly endpoint: string;
  private readonly projectId: string;
  private readonly modelId: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: AdvisoryClientOptions) {
    const apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    const params = new URLSearchParams({ version: apiVersion });

    this.broker = options.broker;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/ml/v1/text/chat?${params}`;
    this.projectId = options.projectId;
    this.modelId = options.modelId;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async query(role: AdvisoryRole, text: string, options: QueryOptions = {}): Promise<AdvisoryResponse> {
    const request = createAdvisoryRequest(role, text);
    const body: ChatRequestBody = {
      model_id: this.modelId,
      project_id: this.projectId,
      messages: [{ role: 'user', content: buildPrompt(request) }],
    };

    let credential = await this.broker.getToken();
    let reply = await this.send(body, credential, options.signal);

    if (reply.status === 401) {
      logger.warn('Model endpoint rejected token, re-authenticating', { endpoint: this.endpoint, role });
      this.broker.invalidate(credential.token);
      credential = await this.broker.getToken();
      reply = await this.send(body, credential, options.signal);
      if (reply.status === 401) {
        this.broker.invalidate(credential.token);
      }
    }

    if (!reply.ok) {
      throw new UpstreamError(`Model endpoint responded ${reply.status}`, 'STATUS', reply.status, reply.body);
    }

    return parseReply(reply);
  }

  private async send(body: ChatRequestBody, credential: Credential, signal?: AbortSignal): Promise<UpstreamReply> {
    if (signal?.aborted) {
      throw new UpstreamError('Advisory request was cancelled', 'CANCELLED');
    }

    const started = Date.now();
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${credential.token}`,
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      const elapsedMs = Date.now() - started;

      if (response.ok) {
        logger.debug('Model call completed', { endpoint: this.endpoint, status: response.status, elapsedMs });
      } else {
        logger.error('Model call failed', { endpoint: this.endpoint, status: response.status, elapsedMs });
      }

      return { status: response.status, ok: response.ok, body: text };
    } catch (error) {
      const upstreamError = this.toUpstreamError(error, timedOut, signal?.aborted === true);
      logger.error('Model call failed', {
        endpoint: this.endpoint,
        code: upstreamError.code,
        elapsedMs: Date.now() - started,
        error: upstreamError.message,
      });
      throw upstreamError;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private toUpstreamError(error: unknown, timedOut: boolean, cancelled: boolean): UpstreamError {
    if (timedOut) {
      return new UpstreamError(`Model endpoint timed out after ${this.timeoutMs}ms`, 'TIMEOUT', undefined, undefined, { cause: error });
    }
    if (cancelled) {
      return new UpstreamError('Advisory request was cancelled', 'CANCELLED', undefined, undefined, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamError(`Model endpoint unreachable: ${message}`, 'NETWORK', undefined, undefined, { cause: error });
  }
}

function parseReply(reply: UpstreamReply): AdvisoryResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(reply.body);
  } catch {
    throw new UpstreamError('Model endpoint returned a non-JSON body', 'PARSE', reply.status, reply.body);
  }

  const parsed = chatResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError('Model response has no generated message', 'PARSE', reply.status, reply.body);
  }

  return {
    answer: parsed.data.choices[0].message.content,
    raw,
  };
}
