import type { DigestEntry, PaperFailure } from '../types.js';
import { splitIntoBatches } from './split.js';
import { truncateForWebhook } from './truncate.js';

export const RELEVANCE_LABELS: Readonly<Record<number, string>> = {
  0: 'Low',
  1: 'Medium',
  2: 'High',
};

export function relevanceLabel(score: number): string {
  return RELEVANCE_LABELS[score] ?? 'N/A';
}

export interface DigestMessageInput {
  dateIso: string;
  label: string; // category, plus batch suffix
  entries: readonly DigestEntry[];
  showRelevance: boolean;
}

function sameTitle(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function renderDigestMessage(input: DigestMessageInput): string {
  const lines: string[] = [];
  lines.push(`${input.dateIso} arXiv papers summary for ${input.label}:`);
  lines.push('');

  for (const p of input.entries) {
    lines.push(`Title: ${p.title}`);
    if (p.translatedTitle && !sameTitle(p.translatedTitle, p.title)) lines.push(p.translatedTitle);
    if (p.authors) lines.push(`Authors: ${p.authors}`);
    lines.push(`URL: ${p.url}`);
    if (input.showRelevance) lines.push(`Relevance: ${relevanceLabel(p.relevanceScore)}`);
    lines.push(`Summary: ${p.summary}`);
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}

function shortError(s: string, maxLen = 120): string {
  const t = s.replace(/\s+/g, ' ').trim();
  if (t.length <= maxLen) return t;
  return t.slice(0, maxLen - 1) + '…';
}

export function renderSkippedNote(failures: readonly PaperFailure[]): string {
  if (failures.length === 0) return '';
  const lines = [`Skipped ${failures.length} paper(s):`];
  for (const f of failures) {
    lines.push(`- ${f.paperId} (${f.stage} failed after ${f.attempts} attempt(s): ${shortError(f.error)})`);
  }
  return lines.join('\n');
}

export interface DigestMessagesInput {
  dateIso: string;
  category: string;
  entries: readonly DigestEntry[];
  failures: readonly PaperFailure[];
  showRelevance: boolean;
  maxPerMessage: number;
  maxChars?: number;
}

/**
 * One chat message per batch. The skipped-papers note rides on the last
 * message; with nothing to summarize but failures to report it stands alone.
 */
export function renderDigestMessages(input: DigestMessagesInput): string[] {
  const note = renderSkippedNote(input.failures);
  const batches = splitIntoBatches(input.entries, input.maxPerMessage);

  if (batches.length === 0) {
    if (!note) return [];
    const text = [
      `${input.dateIso} arXiv papers summary for ${input.category}:`,
      '',
      'No papers could be summarized today.',
      '',
      note,
    ].join('\n');
    return [truncateForWebhook(text, input.maxChars).text];
  }

  return batches.map((batch, i) => {
    let text = renderDigestMessage({
      dateIso: input.dateIso,
      label: input.category + batch.suffix,
      entries: batch.items,
      showRelevance: input.showRelevance,
    });
    if (note && i === batches.length - 1) text += `\n\n${note}`;
    return truncateForWebhook(text, input.maxChars).text;
  });
}
