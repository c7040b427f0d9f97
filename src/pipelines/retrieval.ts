import { StoreUnavailableError } from "../domain/errors.js";
import { GuidelineStore } from "../domain/guidelineStore.js";
import { ChunkMatch, RetrievalOutcome } from "../domain/types.js";
import { createLogger, describeError } from "../utils/logger.js";

const logger = createLogger("retrieval");

export const DEFAULT_SUMMARY_LIMIT = 5;
export const DEFAULT_CONTEXT_SIZE = 1;

export interface RetrieveOptions {
  summaryThreshold: number;
  chunkThreshold: number;
  summaryLimit?: number;
  contextSize?: number;
}

/**
 * Two-stage search: guideline summaries first, then chunks restricted to the
 * guidelines stage one returned.
 *
 * A failing summary search propagates. A failing chunk search is logged and
 * the outcome carries no chunks, so an answer can still be built from the
 * guideline summaries.
 */
export async function retrieveTwoStage(
  store: GuidelineStore,
  queryEmbedding: number[],
  options: RetrieveOptions,
): Promise<RetrievalOutcome> {
  const summaries = await store.searchSummaries({
    queryEmbedding,
    threshold: options.summaryThreshold,
    limit: options.summaryLimit ?? DEFAULT_SUMMARY_LIMIT,
  });

  if (summaries.length === 0) {
    logger.debug("No guideline summaries above threshold; skipping chunk search.", {
      summary_threshold: options.summaryThreshold,
    });
    return { kind: "empty_scope", summaries: [], chunks: [] };
  }

  const scope = new Set(summaries.map((summary) => summary.id));
  let chunks: ChunkMatch[];
  try {
    chunks = await store.searchChunks({
      queryEmbedding,
      guidelineIds: [...scope],
      threshold: options.chunkThreshold,
      contextSize: options.contextSize ?? DEFAULT_CONTEXT_SIZE,
    });
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) {
      throw error;
    }
    logger.warn("Chunk search failed; continuing with guideline summaries only.", {
      reason: describeError(error),
      scoped_guidelines: scope.size,
    });
    return { kind: "matched", summaries, chunks: [], chunkSearchFailed: true };
  }

  const scoped = chunks.filter((chunk) => scope.has(chunk.guidelineId));
  if (scoped.length < chunks.length) {
    logger.warn("Dropped chunks outside the guideline scope.", {
      dropped: chunks.length - scoped.length,
    });
  }

  return { kind: "matched", summaries, chunks: scoped, chunkSearchFailed: false };
}
