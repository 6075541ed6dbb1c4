import type { AppConfig, DigestEntry, PaperFailure } from '../types.js';
import { fetchNewPapers } from '../arxiv.js';
import { OpenAICompatibleClient, type CompletionClient } from '../llm/client.js';
import { RequestThrottle, ThrottledCompletionClient } from '../llm/throttle.js';
import { runPipeline, type PipelineStats } from '../pipeline/orchestrator.js';
import { createLlmScorer } from '../pipeline/score.js';
import { createLlmSummarizer, createLlmTitleTranslator } from '../pipeline/summarize.js';
import { renderDigestMessages } from '../digest/render.js';
import { deliverDigest, type SendFn } from '../notify/orchestrator.js';
import { postWebhookText } from '../notify/webhook.js';
import type { RetryHooks } from '../llm/retry.js';

export interface DailyRunOptions {
  config: AppConfig;
  now?: Date;
  client?: CompletionClient; // default: OpenAI-compatible client from config.llm
  send?: SendFn | null; // default: post to config.webhook.url; null = print only
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
}

export type DailyRunStatus = 'ok' | 'warn' | 'empty';

export interface DailyRunStats extends Partial<PipelineStats> {
  category: string;
  fetched: number;
  messages: number;
  delivered: number;
  deliveryFailures: number;
  startedAt: string;
  finishedAt?: string;
}

export interface DailyRunResult {
  status: DailyRunStatus;
  stats: DailyRunStats;
  digest: DigestEntry[];
  failures: PaperFailure[];
  messages: string[];
}

export function isoDate(now: Date): string {
  const yyyy = now.getUTCFullYear();
  const mm = String(now.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(now.getUTCDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}`;
}

export function createCompletionClient(config: AppConfig): CompletionClient {
  const base = new OpenAICompatibleClient({
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    model: config.llm.model,
    timeoutMs: config.llm.timeoutMs,
  });
  const throttle = new RequestThrottle({
    maxInFlight: config.llm.maxConcurrency,
    minIntervalMs: config.llm.minIntervalMs,
  });
  return new ThrottledCompletionClient(base, throttle);
}

function defaultSend(config: AppConfig): SendFn | null {
  const url = config.webhook.url;
  if (!url) return null;
  return (message) => postWebhookText(url, message);
}

export async function runDaily(opts: DailyRunOptions): Promise<DailyRunResult> {
  const { config, now = new Date(), retryHooks } = opts;
  const { digest: digestConfig } = config;
  const client = opts.client ?? createCompletionClient(config);
  const send = opts.send === undefined ? defaultSend(config) : opts.send;

  const stats: DailyRunStats = {
    category: digestConfig.category,
    fetched: 0,
    messages: 0,
    delivered: 0,
    deliveryFailures: 0,
    startedAt: new Date().toISOString(),
  };

  // A source failure is not per-paper: let it abort the run.
  const papers = await fetchNewPapers(digestConfig.category);
  stats.fetched = papers.length;
  console.log(`Fetched ${papers.length} new paper(s) for ${digestConfig.category}.`);

  if (papers.length === 0) {
    stats.finishedAt = new Date().toISOString();
    return { status: 'empty', stats, digest: [], failures: [], messages: [] };
  }

  const result = await runPipeline(papers, {
    scorer: createLlmScorer(client),
    summarizer: createLlmSummarizer(client),
    ...(digestConfig.translateTitles ? { titleTranslator: createLlmTitleTranslator(client) } : {}),
    userInterest: digestConfig.userInterest,
    filterLevel: digestConfig.filterLevel,
    language: digestConfig.language,
    retry: config.retry,
    concurrency: config.llm.maxConcurrency,
    ...(retryHooks ? { retryHooks } : {}),
  });
  Object.assign(stats, result.stats);

  const messages = renderDigestMessages({
    dateIso: isoDate(now),
    category: digestConfig.category,
    entries: result.digest,
    failures: result.failures,
    showRelevance: digestConfig.userInterest.trim() !== '',
    maxPerMessage: digestConfig.maxPapersPerMessage,
  });
  stats.messages = messages.length;

  if (send && messages.length > 0) {
    console.log(`Sending ${result.digest.length} paper(s) in ${messages.length} message(s)...`);
    const delivery = await deliverDigest(send, messages, {
      delayMsBetweenMessages: config.webhook.delayMsBetweenMessages,
    });
    stats.delivered = delivery.sentCount;
    stats.deliveryFailures = delivery.failed.length;
  } else if (!send) {
    console.log('Webhook URL not configured. Digest will not be sent.');
  }

  if (result.failures.length > 0) {
    console.warn(`${result.failures.length} paper(s) skipped: ${result.failures.map((f) => `${f.paperId} (${f.stage})`).join(', ')}`);
  }

  stats.finishedAt = new Date().toISOString();

  let status: DailyRunStatus = 'ok';
  if (result.digest.length === 0 && result.failures.length === 0) status = 'empty';
  else if (result.failures.length > 0 || stats.deliveryFailures > 0) status = 'warn';

  return { status, stats, digest: result.digest, failures: result.failures, messages };
}
