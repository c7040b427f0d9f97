import { ChunkMatch, GuidelineSummaryMatch } from "./types.js";

export interface SummarySearchInput {
  queryEmbedding: number[];
  threshold: number;
  limit: number;
}

export interface ChunkSearchInput {
  queryEmbedding: number[];
  guidelineIds: string[];
  threshold: number;
  contextSize: number;
}

/**
 * Threshold-based nearest-neighbour queries over the two guideline indexes.
 *
 * Implementations return already-validated records; rows that fail
 * validation are dropped before they reach the caller. Transport failures
 * surface as `StoreUnavailableError`.
 */
export interface GuidelineStore {
  searchSummaries(input: SummarySearchInput): Promise<GuidelineSummaryMatch[]>;
  searchChunks(input: ChunkSearchInput): Promise<ChunkMatch[]>;
}
