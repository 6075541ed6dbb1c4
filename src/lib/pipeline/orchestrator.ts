import { RetryExhaustedError, errorMessage, isFatal } from '../errors.js';
import { withRetry, type RetryHooks, type RetryPolicy } from '../llm/retry.js';
import { mapWithConcurrency } from '../pool.js';
import type { DigestEntry, FilterLevel, PaperFailure, PaperRecord, PipelineStage, ScoredPaper } from '../types.js';
import { applyFilter, resolveFilterLevel } from './filter.js';
import type { RelevanceScorer } from './score.js';
import type { Summarizer, TitleTranslator } from './summarize.js';

export interface PipelineOptions {
  scorer: RelevanceScorer;
  summarizer: Summarizer;
  titleTranslator?: TitleTranslator; // omit to keep original titles only
  userInterest: string;
  filterLevel: FilterLevel;
  language: string;
  retry: RetryPolicy;
  concurrency: number;
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random'>;
}

export interface PipelineStats {
  input: number;
  scored: number;
  filteredOut: number;
  summarized: number;
  scoringFailures: number;
  summarizationFailures: number;
  translationFailures: number;
  filterLevel: FilterLevel;
}

export interface PipelineResult {
  digest: DigestEntry[];
  failures: PaperFailure[];
  stats: PipelineStats;
}

type StageOutcome<T> = { ok: true; value: T } | { ok: false; failure: PaperFailure };

/** Stable: ties keep fetch order. */
export function sortByRelevance<T extends ScoredPaper>(papers: readonly T[]): T[] {
  return papers
    .map((paper, index) => ({ paper, index }))
    .sort((a, b) => b.paper.relevanceScore - a.paper.relevanceScore || a.index - b.index)
    .map((x) => x.paper);
}

function toFailure(paper: PaperRecord, stage: PipelineStage, err: unknown, attempts: number): PaperFailure {
  const cause = err instanceof RetryExhaustedError ? err.lastError : err;
  return { paperId: paper.id, title: paper.title, stage, attempts, error: errorMessage(cause) };
}

export async function runPipeline(papers: readonly PaperRecord[], opts: PipelineOptions): Promise<PipelineResult> {
  const { scorer, summarizer, titleTranslator, userInterest, language, retry, concurrency, retryHooks = {} } = opts;
  const filterLevel = resolveFilterLevel(opts.filterLevel, userInterest);

  async function attempt<T>(
    paper: PaperRecord,
    stage: PipelineStage | 'translation',
    call: () => Promise<T>,
    onGiveUp?: RetryHooks['onGiveUp']
  ): Promise<T> {
    return withRetry(() => call(), retry, {
      ...retryHooks,
      ...(onGiveUp ? { onGiveUp } : {}),
      onRetry: ({ attempt: n, delayMs, error }) => {
        console.warn(`[${stage}] ${paper.id} attempt ${n} failed (${errorMessage(error)}); retrying in ${delayMs}ms`);
      },
    });
  }

  async function stage<T>(paper: PaperRecord, name: PipelineStage, call: () => Promise<T>): Promise<StageOutcome<T>> {
    let attempts = 1;
    try {
      return {
        ok: true,
        value: await attempt(paper, name, call, ({ attempt: n }) => {
          attempts = n;
        }),
      };
    } catch (err) {
      if (isFatal(err)) throw err;
      const failure = toFailure(paper, name, err, attempts);
      console.error(`[${name}] ${paper.id} failed after ${failure.attempts} attempt(s): ${failure.error}`);
      return { ok: false, failure };
    }
  }

  const failures: PaperFailure[] = [];

  // 1. score
  const scoredOutcomes = await mapWithConcurrency(papers, concurrency, (paper) =>
    stage(paper, 'scoring', async (): Promise<ScoredPaper> => ({
      ...paper,
      relevanceScore: await scorer.score(paper, userInterest),
    }))
  );
  const scored: ScoredPaper[] = [];
  for (const o of scoredOutcomes) {
    if (o.ok) scored.push(o.value);
    else failures.push(o.failure);
  }

  // 2-3. sort, filter
  const kept = applyFilter(filterLevel, sortByRelevance(scored));
  if (kept.length < scored.length) {
    console.log(`Filter "${filterLevel}" dropped ${scored.length - kept.length} of ${scored.length} paper(s).`);
  }

  // 4. summarize (+ best-effort title translation)
  let translationFailures = 0;
  const summarizedOutcomes = await mapWithConcurrency(kept, concurrency, async (paper): Promise<StageOutcome<DigestEntry>> => {
    const summary = await stage(paper, 'summarization', () => summarizer.summarize(paper, language));
    if (!summary.ok) return summary;

    const entry: DigestEntry = { ...paper, summary: summary.value };
    if (!titleTranslator) return { ok: true, value: entry };

    try {
      const translatedTitle = await attempt(paper, 'translation', () => titleTranslator.translate(paper.title, language));
      return { ok: true, value: { ...entry, translatedTitle } };
    } catch (err) {
      if (isFatal(err)) throw err;
      translationFailures += 1;
      console.warn(`[translation] ${paper.id} keeps its original title: ${errorMessage(err)}`);
      return { ok: true, value: entry };
    }
  });

  // 5. collect, keeping the sorted order
  const digest: DigestEntry[] = [];
  for (const o of summarizedOutcomes) {
    if (o.ok) digest.push(o.value);
    else failures.push(o.failure);
  }

  const stats: PipelineStats = {
    input: papers.length,
    scored: scored.length,
    filteredOut: scored.length - kept.length,
    summarized: digest.length,
    scoringFailures: failures.filter((f) => f.stage === 'scoring').length,
    summarizationFailures: failures.filter((f) => f.stage === 'summarization').length,
    translationFailures,
    filterLevel,
  };

  return { digest, failures, stats };
}
