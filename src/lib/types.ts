export type IsoDateTime = string;

export type FilterLevel = 'none' | 'low' | 'mid' | 'high';

/** One paper as handed over by the paper source. Never mutated. */
export interface PaperRecord {
  id: string; // arXiv id, no version
  title: string;
  abstract: string;
  authors: string; // display form, e.g. "Alice, Bob, et al."
  url: string;
}

export interface ScoredPaper extends PaperRecord {
  relevanceScore: number;
}

export interface DigestEntry extends ScoredPaper {
  summary: string;
  translatedTitle?: string;
}

export type PipelineStage = 'scoring' | 'summarization';

export interface PaperFailure {
  paperId: string;
  title: string;
  stage: PipelineStage;
  attempts: number;
  error: string;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxConcurrency: number;
  minIntervalMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
}

export interface DigestConfig {
  category: string;
  userInterest: string;
  filterLevel: FilterLevel;
  language: string;
  translateTitles: boolean;
  maxPapersPerMessage: number;
}

export interface WebhookConfig {
  url: string | null;
  delayMsBetweenMessages: number;
}

export interface AppConfig {
  llm: LlmConfig;
  retry: RetryConfig;
  digest: DigestConfig;
  webhook: WebhookConfig;
}
