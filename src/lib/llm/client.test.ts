import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MockAgent } from 'undici';

import { LlmAuthError, LlmRequestError } from '../errors.js';
import { OpenAICompatibleClient, parseRetryAfter } from './client.js';

const ORIGIN = 'https://llm.test';
const PATH = '/v1/chat/completions';

describe('OpenAICompatibleClient', () => {
  let agent: MockAgent;
  let client: OpenAICompatibleClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    client = new OpenAICompatibleClient({
      apiKey: 'test-key',
      baseUrl: `${ORIGIN}/v1/`,
      model: 'test-model',
      timeoutMs: 5_000,
      dispatcher: agent,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('posts a chat completion and returns the message text', async () => {
    let sentBody = '';
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST', headers: { authorization: 'Bearer test-key' } })
      .reply((opts) => {
        sentBody = typeof opts.body === 'string' ? opts.body : '';
        return {
          statusCode: 200,
          data: {
            choices: [{ message: { role: 'assistant', content: '2' } }],
            usage: { prompt_tokens: 120, completion_tokens: 1 },
          },
        };
      });

    const res = await client.complete({ prompt: 'score this', temperature: 0, maxTokens: 2 });

    expect(res).toEqual({ text: '2' });
    expect(JSON.parse(sentBody)).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'score this' }],
      temperature: 0,
      max_tokens: 2,
    });
  });

  it('maps 429 to a retryable error with the Retry-After hint', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .reply(429, 'slow down', { headers: { 'retry-after': '3' } });

    const err = await client.complete({ prompt: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmRequestError);
    expect(err).toMatchObject({
      retryable: true,
      status: 429,
      retryAfterMs: 3000,
      message: 'Completion API returned 429: slow down',
    });
  });

  it('maps 5xx to a retryable error', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(503, '');
    await expect(client.complete({ prompt: 'x' })).rejects.toMatchObject({ retryable: true, status: 503 });
  });

  it('maps other 4xx to a non-retryable error', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(400, '{"error":"bad model"}');
    await expect(client.complete({ prompt: 'x' })).rejects.toMatchObject({ retryable: false, status: 400 });
  });

  it('maps 401 to LlmAuthError', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(401, 'invalid api key');
    const err = await client.complete({ prompt: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmAuthError);
    expect(err).toMatchObject({ status: 401 });
  });

  it('treats a response without choices as retryable', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).reply(200, { choices: [] });
    await expect(client.complete({ prompt: 'x' })).rejects.toMatchObject({ retryable: true, status: 200 });
  });

  it('treats network errors as retryable', async () => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'POST' }).replyWithError(new Error('ECONNRESET'));
    const err = await client.complete({ prompt: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmRequestError);
    expect(err).toMatchObject({ retryable: true });
  });

  it('gives up on a slow reply after timeoutMs with a retryable error', async () => {
    const impatient = new OpenAICompatibleClient({
      apiKey: 'test-key',
      baseUrl: `${ORIGIN}/v1`,
      model: 'test-model',
      timeoutMs: 50,
      dispatcher: agent,
    });
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .reply(200, { choices: [{ message: { content: '1' } }] })
      .delay(1_000);

    const err = await impatient.complete({ prompt: 'x' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmRequestError);
    expect(err).toMatchObject({ retryable: true, status: undefined });
    expect(err instanceof Error ? err.message : '').toMatch(/^Completion request failed: /);
  });

  it('returns an empty string for a null content', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'POST' })
      .reply(200, { choices: [{ message: { content: null } }] });
    await expect(client.complete({ prompt: 'x' })).resolves.toEqual({ text: '' });
  });
});

describe('parseRetryAfter', () => {
  it('parses delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter(['1.5'])).toBe(1500);
  });

  it('parses an HTTP date relative to now', () => {
    const now = Date.parse('2026-03-01T10:00:00Z');
    expect(parseRetryAfter('Sun, 01 Mar 2026 10:00:05 GMT', now)).toBe(5000);
  });

  it('ignores missing or malformed values', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
