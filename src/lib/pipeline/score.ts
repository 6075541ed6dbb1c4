import { ScoreParseError } from '../errors.js';
import type { CompletionClient } from '../llm/client.js';
import type { PaperRecord } from '../types.js';

export const MIN_RELEVANCE = 0;
export const MAX_RELEVANCE = 2;

export interface RelevanceScorer {
  score(paper: PaperRecord, userInterest: string): Promise<number>;
}

export function buildRelevancePrompt(paper: Pick<PaperRecord, 'title' | 'abstract'>, userInterest: string): string {
  return [
    "Given the following research paper's title and abstract, and a (list of) user's area of interest,",
    "rate the relevance of the paper to the user's interest.",
    'Respond with only a single integer:',
    "0 for Low relevance to all of the user's interests,",
    "1 for Medium relevance to any of the user's interests,",
    "2 for High relevance to any of the user's interests.",
    '',
    `User's Interest: ${userInterest}`,
    '',
    `Paper Title: ${paper.title}`,
    `Paper Abstract: ${paper.abstract}`,
    '',
    'Relevance Score (0, 1, or 2):',
  ].join('\n');
}

/** Strict: the reply must be exactly one allowed integer, surrounding whitespace aside. */
export function parseRelevanceScore(text: string): number {
  const t = text.trim();
  if (!/^\d+$/.test(t)) throw new ScoreParseError(text);
  const n = Number.parseInt(t, 10);
  if (n < MIN_RELEVANCE || n > MAX_RELEVANCE) throw new ScoreParseError(text);
  return n;
}

export function createLlmScorer(client: CompletionClient): RelevanceScorer {
  return {
    async score(paper, userInterest) {
      if (userInterest.trim() === '') return 0;
      const res = await client.complete({
        prompt: buildRelevancePrompt(paper, userInterest),
        temperature: 0,
        maxTokens: 2,
      });
      return parseRelevanceScore(res.text);
    },
  };
}
