import { ConfigError } from '../errors.js';
import type { FilterLevel, ScoredPaper } from '../types.js';

// null = no filtering
export const FILTER_THRESHOLDS: Readonly<Record<FilterLevel, number | null>> = {
  none: null,
  low: 0,
  mid: 1,
  high: 2,
};

export const FILTER_LEVELS: readonly FilterLevel[] = ['none', 'low', 'mid', 'high'];

export function isFilterLevel(x: string): x is FilterLevel {
  return Object.prototype.hasOwnProperty.call(FILTER_THRESHOLDS, x);
}

export function parseFilterLevel(raw: string): FilterLevel {
  const v = raw.trim().toLowerCase();
  if (!isFilterLevel(v)) {
    throw new ConfigError(`Unknown filter level "${raw}" (expected one of ${FILTER_LEVELS.join(', ')})`);
  }
  return v;
}

/** Keeps the papers whose score meets the level's threshold (inclusive), in input order. */
export function applyFilter<T extends Pick<ScoredPaper, 'relevanceScore'>>(level: FilterLevel, papers: readonly T[]): T[] {
  const threshold = FILTER_THRESHOLDS[level];
  if (threshold === null) return [...papers];
  return papers.filter((p) => p.relevanceScore >= threshold);
}

/**
 * Without an interest every score is the default 0, so a filter level other
 * than `none` would either keep everything or drop everything.
 */
export function resolveFilterLevel(level: FilterLevel, userInterest: string): FilterLevel {
  if (level !== 'none' && userInterest.trim() === '') {
    console.warn(`No user interest given; ignoring filter level "${level}".`);
    return 'none';
  }
  return level;
}
