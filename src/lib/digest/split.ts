export interface Batch<T> {
  items: T[];
  suffix: string; // "" for a single batch, otherwise " (i/n)"
}

/**
 * Splits into the fewest batches of at most maxPerBatch items, balanced so
 * that sizes differ as little as possible from the front (23 at 10 → 8, 8, 7).
 */
export function splitIntoBatches<T>(items: readonly T[], maxPerBatch: number): Batch<T>[] {
  if (items.length === 0) return [];
  const max = Math.max(1, Math.floor(maxPerBatch));
  const count = Math.ceil(items.length / max);
  const size = Math.ceil(items.length / count);

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));

  return chunks.map((chunk, i) => ({
    items: chunk,
    suffix: chunks.length === 1 ? '' : ` (${i + 1}/${chunks.length})`,
  }));
}
