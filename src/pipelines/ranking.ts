import { ChunkMatch } from "../domain/types.js";

export const DEFAULT_TOP_N = 5;

/**
 * Re-checks the chunk threshold, orders by similarity (highest first) and
 * caps the list at `topN`. The store applies its own threshold, but it may
 * be looser or stale, so this is the one that counts.
 *
 * Array#sort is stable, so equal similarities keep their retrieval order.
 */
export function rankAndFilter(
  chunks: ChunkMatch[],
  chunkThreshold: number,
  topN: number = DEFAULT_TOP_N,
): ChunkMatch[] {
  const limit = Math.max(0, Math.floor(topN));
  return chunks
    .filter((chunk) => chunk.similarity >= chunkThreshold)
    .sort((a, b) => b.similarity - a.similarity)
    .slice(0, limit);
}
