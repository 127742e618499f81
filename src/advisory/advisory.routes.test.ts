import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { createApp } from '../app.js';
import { listen, type RunningServer } from '../testing/listen.js';
import { AdvisoryClient } from './advisory.client.js';
import { CredentialBroker } from './credential-broker.js';
import { FALLBACK_RESPONSE, SimulatedAdvisor } from './simulated-advisor.js';
import { InMemoryWaterDataStore } from '../water/water.store.js';
import logger from '../utils/logger.js';
import type { Advisor, AdvisoryResponse, FetchFn } from './types.js';

const IAM_URL = 'https://iam.test/identity/token';
const MODEL_URL = 'https://model.test/ml/v1/text/chat?version=2024-03-14';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const emptyStore = new InMemoryWaterDataStore({
  waterSources: [],
  qualityPredictions: {},
  historicalData: [],
  alerts: [],
});

const simulated = new SimulatedAdvisor({
  'water-quality': { 'Is 2 mg/L dissolved oxygen enough?': 'No, aim for at least 5 mg/L.' },
  'health-risk': { 'Is nitrate dangerous for infants?': 'Yes, above 10 mg/L it can cause methemoglobinemia.' },
});

describe('advisory routes', () => {
  let iamReplies: Array<() => Response>;
  let modelReplies: Array<() => Response>;
  let fetchMock: Mock<FetchFn>;
  let broker: CredentialBroker;
  let server: RunningServer;

  const callsTo = (url: string) => fetchMock.mock.calls.filter(([input]) => input === url);

  async function start(exposeRawUpstream = false, advisor: Advisor = new AdvisoryClient({
    broker,
    baseUrl: 'https://model.test',
    projectId: 'test-project',
    modelId: 'test-model',
    fetch: fetchMock,
  })) {
    server = await listen(createApp({
      store: emptyStore,
      advisor,
      simulated,
      corsOrigin: 'http://localhost:8080',
      exposeRawUpstream,
    }));
  }

  const get = (path: string) => fetch(`${server.baseUrl}${path}`);

  beforeEach(() => {
    iamReplies = [];
    modelReplies = [];
    fetchMock = vi.fn<FetchFn>(async input => {
      const next = (input === IAM_URL ? iamReplies : modelReplies).shift();
      if (!next) throw new Error(`Unexpected request to ${String(input)}`);
      return next();
    });
    broker = new CredentialBroker({ apiKey: 'test-api-key', iamUrl: IAM_URL, fetch: fetchMock });
  });

  afterEach(async () => {
    await server.close();
  });

  it('answers a water-quality question with a cached token', async () => {
    iamReplies.push(() => jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    await broker.getToken();
    fetchMock.mockClear();

    modelReplies.push(() => jsonResponse({
      choices: [{ message: { content: 'Arsenic above 10 ppb increases long-term health risk.' } }],
    }));
    await start();

    const res = await get(`/water-quality-agent?query=${encodeURIComponent('What is the risk of high arsenic levels?')}`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ answer: 'Arsenic above 10 ppb increases long-term health risk.' });
    expect(callsTo(IAM_URL)).toHaveLength(0);
    expect(callsTo(MODEL_URL)).toHaveLength(1);
  });

  it('includes the raw upstream payload when configured to', async () => {
    iamReplies.push(() => jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    modelReplies.push(() => jsonResponse({ choices: [{ message: { content: 'Flush the taps.' } }], model_id: 'test-model' }));
    await start(true);

    const res = await get('/health-risk-agent?query=lead');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      answer: 'Flush the taps.',
      raw: { choices: [{ message: { content: 'Flush the taps.' } }], model_id: 'test-model' },
    });
  });

  it.each([
    ['/water-quality-agent', "Missing required parameter 'query'"],
    ['/health-risk-agent?query=', "Parameter 'query' must not be empty"],
    ['/water-quality-agent?query=%20%20%20', "Parameter 'query' must not be empty"],
    ['/health-risk-agent?query=a&query=b', "Parameter 'query' must be a single string"],
  ])('rejects %s with 400 and no outbound call', async (path, detail) => {
    await start();

    const res = await get(path);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid query parameters', detail });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns 502 when the identity endpoint fails and does not cache the failure', async () => {
    iamReplies.push(
      () => new Response('iam down', { status: 500 }),
      () => new Response('iam down', { status: 500 })
    );
    await start();

    const first = await get('/water-quality-agent?query=pH');
    expect(first.status).toBe(502);
    expect(await first.json()).toEqual({
      error: 'Upstream authentication failed',
      detail: 'Identity endpoint responded 500',
    });

    const second = await get('/water-quality-agent?query=pH');
    expect(second.status).toBe(502);
    expect(callsTo(IAM_URL)).toHaveLength(2);
    expect(callsTo(MODEL_URL)).toHaveLength(0);
  });

  it('echoes the upstream status and body on a model failure', async () => {
    iamReplies.push(() => jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    modelReplies.push(() => new Response('model overloaded', { status: 503 }));
    await start();

    const res = await get('/health-risk-agent?query=lead');

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: 'Upstream model call failed',
      detail: 'Model endpoint responded 503',
      upstreamStatus: 503,
      upstreamBody: 'model overloaded',
    });
  });

  it('returns 502 when the model reply cannot be parsed', async () => {
    iamReplies.push(() => jsonResponse({ access_token: 'tok-1', expires_in: 3600 }));
    modelReplies.push(() => jsonResponse({ unexpected: true }));
    await start();

    const res = await get('/water-quality-agent?query=pH');

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({
      error: 'Upstream model call failed',
      detail: 'Model response has no generated message',
      upstreamStatus: 200,
    });
  });

  it('retries once after a 401 and answers', async () => {
    iamReplies.push(
      () => jsonResponse({ access_token: 'tok-1', expires_in: 3600 }),
      () => jsonResponse({ access_token: 'tok-2', expires_in: 3600 })
    );
    modelReplies.push(
      () => new Response('expired', { status: 401 }),
      () => jsonResponse({ choices: [{ message: { content: 'Second time lucky.' } }] })
    );
    await start();

    const res = await get('/water-quality-agent?query=pH');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ answer: 'Second time lucky.' });
    expect(callsTo(MODEL_URL)).toHaveLength(2);
  });

  it('aborts the pending advisory call when the client disconnects', async () => {
    let received: AbortSignal | undefined;
    const pendingAdvisor: Advisor = {
      query: (_role, _text, options = {}) => {
        received = options.signal;
        return new Promise<AdvisoryResponse>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      },
    };
    const debug = vi.spyOn(logger, 'debug');
    const warn = vi.spyOn(logger, 'warn');
    await start(false, pendingAdvisor);

    const client = new AbortController();
    const pending = fetch(`${server.baseUrl}/health-risk-agent?query=lead`, { signal: client.signal });
    await vi.waitFor(() => expect(received).toBeDefined());
    expect(received?.aborted).toBe(false);

    client.abort();
    await expect(pending).rejects.toThrow();

    await vi.waitFor(() => expect(received?.aborted).toBe(true));
    await vi.waitFor(() =>
      expect(debug).toHaveBeenCalledWith('Client disconnected before advisory answer', { role: 'health-risk' })
    );
    expect(warn).not.toHaveBeenCalled();

    debug.mockRestore();
    warn.mockRestore();
  });

  describe('simulated advisors', () => {
    it('answers a known question from the canned table', async () => {
      await start();

      const res = await get(`/simulate-health-risk-agent?query=${encodeURIComponent('Is nitrate dangerous for infants?')}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ response: 'Yes, above 10 mg/L it can cause methemoglobinemia.' });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('falls back for an unknown question', async () => {
      await start();

      const res = await get('/simulate-water-quality-agent?query=constructor');

      expect(await res.json()).toEqual({ response: FALLBACK_RESPONSE });
    });

    it('matches the question text exactly, without trimming', async () => {
      await start();

      const res = await get(`/simulate-health-risk-agent?query=${encodeURIComponent(' Is nitrate dangerous for infants?')}`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ response: FALLBACK_RESPONSE });
    });

    it('rejects a blank question', async () => {
      await start();

      const res = await get('/simulate-water-quality-agent?query=%20');

      expect(res.status).toBe(400);
    });
  });
});
