import { XMLParser } from 'fast-xml-parser';

import { errorMessage } from './errors.js';
import { sleep as realSleep } from './sleep.js';
import type { PaperRecord } from './types.js';

export interface ArxivEntry {
  arxivId: string; // canonical, no version
  version: string; // v1, v2, ...
  title: string;
  summary: string;
  authors: string[];
  categories: string[];
  publishedAt: string;
  updatedAt: string;
  pdfUrl: string | null;
  absUrl: string | null;
  rawIdUrl: string;
}

const USER_AGENT = 'arxiv-daily-digest (Node.js)';
const ID_CHUNK = 100;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
});

function text(x: unknown): string {
  if (typeof x === 'string') return x;
  if (typeof x === 'number') return String(x);
  return '';
}

function asArray<T>(x: T | T[] | undefined | null): T[] {
  if (!x) return [];
  return Array.isArray(x) ? x : [x];
}

function field(x: unknown, key: string): unknown {
  if (typeof x !== 'object' || x === null) return undefined;
  const value: unknown = Object.getOwnPropertyDescriptor(x, key)?.value;
  return value;
}

// Example id URL: http://arxiv.org/abs/2502.12345v2
export function parseArxivId(idUrl: string): { arxivId: string; version: string } {
  const m = idUrl.match(/arxiv\.org\/abs\/(.+)$/);
  const tail = m?.[1] ?? idUrl;
  const mv = tail.match(/^(?<id>\d{4}\.\d{4,5})(?<v>v\d+)?$/);
  const arxivId = mv?.groups?.id ?? tail.replace(/v\d+$/, '');
  const version = mv?.groups?.v ?? 'v1';
  return { arxivId, version };
}

function normalizeWhitespace(t: string): string {
  return t.replace(/\s+/g, ' ').trim();
}

export interface FetchRetryOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * GET with retry on 429/5xx and on network errors or timeouts.
 * arXiv rate-limits aggressively; keep maxAttempts conservative.
 */
export async function fetchTextWithRetry(url: string, label: string, opts: FetchRetryOptions = {}): Promise<string> {
  const {
    maxAttempts = 5,
    timeoutMs = 30_000,
    sleep = realSleep,
  } = opts;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const signal = AbortSignal.timeout(timeoutMs);
    let res: Response;
    try {
      res = await fetch(url, { signal, headers: { 'User-Agent': USER_AGENT } });
    } catch (err) {
      if (attempt === maxAttempts) {
        throw new Error(`arXiv fetch failed for ${label} (attempt ${attempt}): ${errorMessage(err)}`);
      }
      await sleep(backoffMs(attempt));
      continue;
    }

    if (res.ok) return await res.text();

    const status = res.status;
    const retryable = status === 429 || (status >= 500 && status <= 599);
    if (!retryable || attempt === maxAttempts) {
      throw new Error(`arXiv fetch failed for ${label}: ${status} ${res.statusText}`);
    }
    await sleep(backoffMs(attempt));
  }

  throw new Error(`arXiv fetch failed for ${label}: exceeded retries`);
}

function backoffMs(attempt: number): number {
  const base = Math.min(60_000, 1000 * 2 ** (attempt - 1));
  return Math.floor(base * (0.75 + Math.random() * 0.75));
}

/** Paper ids linked from a listing page, in page order, without versions or duplicates. */
export function extractAbsIds(html: string): string[] {
  const seen = new Set<string>();
  const ids: string[] = [];
  for (const m of html.matchAll(/href\s*=\s*["'](?:https?:\/\/arxiv\.org)?\/abs\/([^"'#?\s]+)["']/g)) {
    const raw = m[1];
    if (!raw) continue;
    const { arxivId } = parseArxivId(raw);
    if (seen.has(arxivId)) continue;
    seen.add(arxivId);
    ids.push(arxivId);
  }
  return ids;
}

export function newListingUrl(category: string): string {
  return `https://arxiv.org/list/${encodeURIComponent(category)}/new`;
}

export async function fetchNewListingIds(category: string, opts?: FetchRetryOptions): Promise<string[]> {
  const html = await fetchTextWithRetry(newListingUrl(category), category, opts);
  return extractAbsIds(html);
}

export function atomByIdsUrl(ids: readonly string[]): string {
  return `https://export.arxiv.org/api/query?id_list=${ids.map(encodeURIComponent).join(',')}&max_results=${ids.length}`;
}

/** Metadata for the given ids, in the order arXiv returns them. */
export async function fetchEntriesByIds(ids: readonly string[], opts?: FetchRetryOptions): Promise<ArxivEntry[]> {
  const out: ArxivEntry[] = [];
  for (let i = 0; i < ids.length; i += ID_CHUNK) {
    const chunk = ids.slice(i, i + ID_CHUNK);
    const xml = await fetchTextWithRetry(atomByIdsUrl(chunk), `id_list[${i}..${i + chunk.length - 1}]`, opts);
    out.push(...parseAtom(xml));
  }
  return out;
}

export function parseAtom(xml: string): ArxivEntry[] {
  const doc: unknown = parser.parse(xml);
  const entries = asArray(field(field(doc, 'feed'), 'entry'));

  return entries.map((e) => {
    const rawIdUrl = text(field(e, 'id'));
    const { arxivId, version } = parseArxivId(rawIdUrl);

    const authors = asArray(field(e, 'author'))
      .map((a) => normalizeWhitespace(text(field(a, 'name'))))
      .filter(Boolean);

    const categories = asArray(field(e, 'category'))
      .map((c) => text(field(c, '@_term')))
      .filter(Boolean);

    const links = asArray(field(e, 'link'));
    const absUrl = links.map((l) => text(field(l, '@_href'))).find((href) => href.includes('/abs/')) ?? null;
    const pdfUrl = links
      .map((l) => ({ href: text(field(l, '@_href')), type: text(field(l, '@_type')) }))
      .find((l) => l.type === 'application/pdf')?.href ?? null;

    return {
      arxivId,
      version,
      title: normalizeWhitespace(text(field(e, 'title'))),
      summary: normalizeWhitespace(text(field(e, 'summary'))),
      authors,
      categories,
      publishedAt: text(field(e, 'published')),
      updatedAt: text(field(e, 'updated')),
      pdfUrl,
      absUrl,
      rawIdUrl,
    } satisfies ArxivEntry;
  });
}

export function formatAuthors(authors: readonly string[]): string {
  const shown = authors.length > 3 ? [...authors.slice(0, 2), 'et al.'] : authors;
  return shown.join(', ');
}

export function toPaperRecord(entry: ArxivEntry): PaperRecord {
  return {
    id: entry.arxivId,
    title: entry.title,
    abstract: entry.summary,
    authors: formatAuthors(entry.authors),
    url: (entry.absUrl ?? entry.rawIdUrl).replace(/^http:\/\//, 'https://'),
  };
}

/**
 * Today's new submissions for a category, in listing order.
 * Ids that the API does not return (withdrawn, not yet indexed) are skipped.
 */
export async function fetchNewPapers(category: string, opts?: FetchRetryOptions): Promise<PaperRecord[]> {
  const ids = await fetchNewListingIds(category, opts);
  if (ids.length === 0) return [];

  const byId = new Map<string, ArxivEntry>();
  for (const entry of await fetchEntriesByIds(ids, opts)) byId.set(entry.arxivId, entry);

  const missing = ids.filter((id) => !byId.has(id));
  if (missing.length) {
    console.warn(`No arXiv metadata for ${missing.length} listed paper(s): ${missing.join(', ')}`);
  }

  return ids.flatMap((id) => {
    const entry = byId.get(id);
    return entry ? [toPaperRecord(entry)] : [];
  });
}
