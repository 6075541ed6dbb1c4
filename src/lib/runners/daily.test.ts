import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AppConfig, PaperRecord } from '../types.js';
import type { CompletionClient, CompletionRequest } from '../llm/client.js';
import { LlmAuthError, LlmRequestError } from '../errors.js';

// Mock the paper source (arXiv)
const listed = vi.hoisted((): PaperRecord[] => []);
vi.mock('../arxiv.js', async (orig) => {
  const actual = await orig<typeof import('../arxiv.js')>();
  return {
    ...actual,
    fetchNewPapers: vi.fn(async () => listed.slice()),
  };
});

import { isoDate, runDaily } from './daily.js';

function paper(n: number, title: string): PaperRecord {
  return {
    id: `2510.0000${n}`,
    title,
    abstract: `Abstract of ${title}`,
    authors: 'Alice, Bob',
    url: `https://arxiv.org/abs/2510.0000${n}`,
  };
}

function baseConfig(overrides: Partial<AppConfig['digest']> = {}): AppConfig {
  return {
    llm: {
      apiKey: 'test-key',
      baseUrl: 'https://llm.test/v1',
      model: 'test-model',
      timeoutMs: 5_000,
      maxConcurrency: 2,
      minIntervalMs: 0,
    },
    retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 1, jitter: false },
    digest: {
      category: 'eess.AS',
      userInterest: 'audio synthesis',
      filterLevel: 'mid',
      language: 'English',
      translateTitles: false,
      maxPapersPerMessage: 10,
      ...overrides,
    },
    webhook: { url: 'https://hooks.test/hook', delayMsBetweenMessages: 0 },
  };
}

/** Answers by prompt kind; scores come from a title → score map. */
function stubClient(scores: Record<string, number | Error>) {
  const complete = vi.fn<CompletionClient['complete']>(async (req: CompletionRequest) => {
    const title = /(?:Paper Title|Title): (.+)/.exec(req.prompt)?.[1] ?? '';
    if (req.prompt.startsWith('Given the following')) {
      const s = scores[title];
      if (s instanceof Error) throw s;
      return { text: String(s ?? 0) };
    }
    if (req.prompt.startsWith('Summarize')) return { text: `Summary of ${title}.` };
    return { text: `Translated ${req.prompt.split(': ').pop() ?? ''}` };
  });
  return { complete };
}

const noWait = { sleep: async () => {} };

describe('runDaily', () => {
  const originalLog = console.log;
  const originalWarn = console.warn;
  const originalError = console.error;

  beforeAll(() => {
    console.log = () => {};
    console.warn = () => {};
    console.error = () => {};
  });

  afterAll(() => {
    console.log = originalLog;
    console.warn = originalWarn;
    console.error = originalError;
  });

  beforeEach(() => {
    listed.length = 0;
  });

  it('scores, filters, summarizes and sends one message', async () => {
    listed.push(paper(1, 'Neural vocoders'), paper(2, 'Graph theory'), paper(3, 'Singing synthesis'));
    const client = stubClient({ 'Neural vocoders': 2, 'Graph theory': 0, 'Singing synthesis': 1 });
    const send = vi.fn(async (_m: string) => {});

    const res = await runDaily({
      config: baseConfig(),
      now: new Date('2026-10-19T06:00:00Z'),
      client,
      send,
      retryHooks: noWait,
    });

    expect(res.status).toBe('ok');
    expect(res.digest.map((p) => p.id)).toEqual(['2510.00001', '2510.00003']);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith(
      [
        '2026-10-19 arXiv papers summary for eess.AS:',
        '',
        'Title: Neural vocoders',
        'Authors: Alice, Bob',
        'URL: https://arxiv.org/abs/2510.00001',
        'Relevance: High',
        'Summary: Summary of Neural vocoders.',
        '',
        'Title: Singing synthesis',
        'Authors: Alice, Bob',
        'URL: https://arxiv.org/abs/2510.00003',
        'Relevance: Medium',
        'Summary: Summary of Singing synthesis.',
      ].join('\n')
    );
    expect(res.stats).toMatchObject({ fetched: 3, scored: 3, filteredOut: 1, summarized: 2, messages: 1, delivered: 1 });
    // 3 scoring calls + 2 summaries; Graph theory is never summarized
    expect(client.complete).toHaveBeenCalledTimes(5);
  });

  it('skips nothing and makes no scoring calls without an interest', async () => {
    listed.push(paper(1, 'A'), paper(2, 'B'));
    const client = stubClient({});
    const res = await runDaily({
      config: baseConfig({ userInterest: '', filterLevel: 'none' }),
      client,
      send: vi.fn(async () => {}),
      retryHooks: noWait,
    });

    expect(res.digest.map((p) => [p.id, p.relevanceScore])).toEqual([
      ['2510.00001', 0],
      ['2510.00002', 0],
    ]);
    expect(client.complete.mock.calls.every(([req]) => req.prompt.startsWith('Summarize'))).toBe(true);
    expect(res.messages[0]).not.toContain('Relevance:');
  });

  it('delivers the rest and reports a paper that keeps failing', async () => {
    listed.push(paper(1, 'Good'), paper(2, 'Flaky'));
    const client = stubClient({
      Good: 1,
      Flaky: new LlmRequestError('Completion API returned 429', { retryable: true, status: 429 }),
    });
    const send = vi.fn(async (_m: string) => {});

    const res = await runDaily({ config: baseConfig(), client, send, retryHooks: noWait });

    expect(res.status).toBe('warn');
    expect(res.digest.map((p) => p.id)).toEqual(['2510.00001']);
    expect(res.failures).toEqual([
      { paperId: '2510.00002', title: 'Flaky', stage: 'scoring', attempts: 2, error: 'Completion API returned 429' },
    ]);
    const message = send.mock.calls[0]?.[0] ?? '';
    expect(message.endsWith('- 2510.00002 (scoring failed after 2 attempt(s): Completion API returned 429)')).toBe(true);
  });

  it('adds translated titles when enabled', async () => {
    listed.push(paper(1, 'Neural vocoders'));
    const res = await runDaily({
      config: baseConfig({ translateTitles: true, language: 'German' }),
      client: stubClient({ 'Neural vocoders': 2 }),
      send: null,
      retryHooks: noWait,
    });
    expect(res.digest[0]?.translatedTitle).toBe('Translated Neural vocoders');
    expect(res.messages[0]).toContain('Title: Neural vocoders\nTranslated Neural vocoders\n');
  });

  it('returns empty without calling the model when nothing is listed', async () => {
    const client = stubClient({});
    const send = vi.fn(async () => {});
    const res = await runDaily({ config: baseConfig(), client, send });

    expect(res.status).toBe('empty');
    expect(client.complete).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
  });

  it('renders but does not send when sending is disabled', async () => {
    listed.push(paper(1, 'Neural vocoders'));
    const res = await runDaily({
      config: baseConfig(),
      client: stubClient({ 'Neural vocoders': 2 }),
      send: null,
      retryHooks: noWait,
    });
    expect(res.messages).toHaveLength(1);
    expect(res.stats.delivered).toBe(0);
    expect(res.status).toBe('ok');
  });

  it('aborts on an authentication error', async () => {
    listed.push(paper(1, 'Neural vocoders'));
    const client = stubClient({ 'Neural vocoders': new LlmAuthError('Completion API returned 401', 401) });
    await expect(runDaily({ config: baseConfig(), client, send: null, retryHooks: noWait })).rejects.toBeInstanceOf(
      LlmAuthError
    );
  });
});

describe('isoDate', () => {
  it('formats the UTC date', () => {
    expect(isoDate(new Date('2026-01-05T23:30:00Z'))).toBe('2026-01-05');
  });
});
