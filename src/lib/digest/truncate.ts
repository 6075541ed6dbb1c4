import { MAX_WEBHOOK_CHARS } from './limits.js';

export const TRUNCATION_NOTE = '\n\n(Truncated: message exceeded the webhook size limit. Lower --max-papers-split to send smaller batches.)';

// Largest end <= `end` that leaves no lone high surrogate at the cut.
function safeEnd(text: string, end: number): number {
  if (end <= 0) return 0;
  if (end >= text.length) return text.length;
  const code = text.charCodeAt(end - 1);
  return code >= 0xd800 && code <= 0xdbff ? end - 1 : end;
}

/**
 * Where to cut so the message ends on a whole paper: the last blank line
 * before the budget, else the last line break, else a plain cut. Boundaries
 * in the first half of the budget are ignored.
 */
function cutPoint(text: string, budget: number): number {
  const end = safeEnd(text, budget);
  const head = text.slice(0, end);
  const paragraph = head.lastIndexOf('\n\n');
  if (paragraph > budget / 2) return paragraph;
  const line = head.lastIndexOf('\n');
  if (line > budget / 2) return line;
  return end;
}

export function truncateForWebhook(text: string, maxChars = MAX_WEBHOOK_CHARS): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };

  if (maxChars <= TRUNCATION_NOTE.length) {
    return { text: text.slice(0, safeEnd(text, maxChars)).trimEnd(), truncated: true };
  }

  const budget = maxChars - TRUNCATION_NOTE.length;
  return { text: text.slice(0, cutPoint(text, budget)).trimEnd() + TRUNCATION_NOTE, truncated: true };
}
