import { EmptyCompletionError } from '../errors.js';
import type { CompletionClient } from '../llm/client.js';
import type { PaperRecord } from '../types.js';

export interface Summarizer {
  summarize(paper: PaperRecord, language: string): Promise<string>;
}

export interface TitleTranslator {
  translate(title: string, language: string): Promise<string>;
}

export function buildSummaryPrompt(paper: Pick<PaperRecord, 'title' | 'abstract'>, language: string): string {
  return [
    `Summarize the following research paper. Provide the most important information in up to 3 sentences. Respond in ${language}.`,
    '',
    `Title: ${paper.title}`,
    `Abstract: ${paper.abstract}`,
  ].join('\n');
}

export function buildTitlePrompt(title: string, language: string): string {
  return `Translate the following title of article to ${language}, only respond with the translated title: ${title}`;
}

function nonEmpty(text: string, what: string): string {
  const t = text.trim();
  if (!t) throw new EmptyCompletionError(`Model returned an empty ${what}`);
  return t;
}

export function createLlmSummarizer(client: CompletionClient): Summarizer {
  return {
    async summarize(paper, language) {
      const res = await client.complete({
        prompt: buildSummaryPrompt(paper, language),
        temperature: 0.7,
        maxTokens: 400,
      });
      return nonEmpty(res.text, 'summary');
    },
  };
}

export function createLlmTitleTranslator(client: CompletionClient): TitleTranslator {
  return {
    async translate(title, language) {
      const res = await client.complete({
        prompt: buildTitlePrompt(title, language),
        temperature: 0,
        maxTokens: 200,
      });
      return nonEmpty(res.text, 'title translation');
    },
  };
}
