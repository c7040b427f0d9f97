import { Pool } from "pg";
import { StoreStage, StoreUnavailableError } from "../../domain/errors.js";
import {
  ChunkSearchInput,
  GuidelineStore,
  SummarySearchInput,
} from "../../domain/guidelineStore.js";
import { ChunkMatch, GuidelineSummaryMatch } from "../../domain/types.js";
import { toVectorLiteral } from "../../utils/vector.js";
import { parseChunkRows, parseSummaryRows } from "./rowSchemas.js";

/**
 * Reads the `guidelines` and `chunks` tables written by the ingestion job.
 * Similarity is cosine similarity, `1 - (a <=> b)`.
 */
export class PgVectorGuidelineStore implements GuidelineStore {
  constructor(private readonly pool: Pool) {}

  async searchSummaries(input: SummarySearchInput): Promise<GuidelineSummaryMatch[]> {
    const rows = await this.run("summaries", `
        SELECT
          g.id::text AS id,
          g.title,
          g.version,
          g.adopted_date::text AS adopted_date,
          g.document_type,
          g.summary,
          (1 - (g.summary_embedding <=> $1::vector)) AS similarity
        FROM guidelines g
        WHERE g.summary_embedding IS NOT NULL
          AND (1 - (g.summary_embedding <=> $1::vector)) >= $2
        ORDER BY g.summary_embedding <=> $1::vector
        LIMIT $3
      `,
      [toVectorLiteral(input.queryEmbedding), input.threshold, input.limit],
    );
    return parseSummaryRows(rows);
  }

  async searchChunks(input: ChunkSearchInput): Promise<ChunkMatch[]> {
    if (input.guidelineIds.length === 0) {
      return [];
    }

    const rows = await this.run("chunks", `
        WITH matches AS (
          SELECT
            c.id,
            c.guideline_id,
            c.chunk_index,
            c.content,
            (1 - (c.embedding <=> $1::vector)) AS similarity
          FROM chunks c
          WHERE c.guideline_id::text = ANY($2::text[])
            AND (1 - (c.embedding <=> $1::vector)) >= $3
        )
        SELECT
          m.id::text AS id,
          m.guideline_id::text AS guideline_id,
          m.content,
          m.similarity,
          COALESCE(
            (
              SELECT json_agg(
                json_build_object(
                  'chunk_id', n.id::text,
                  'content', n.content,
                  'position_key', n.chunk_index
                )
                ORDER BY n.chunk_index
              )
              FROM chunks n
              WHERE n.guideline_id = m.guideline_id
                AND n.chunk_index BETWEEN m.chunk_index - $4 AND m.chunk_index + $4
            ),
            '[]'::json
          ) AS context_chunks
        FROM matches m
        ORDER BY m.similarity DESC
      `,
      [
        toVectorLiteral(input.queryEmbedding),
        input.guidelineIds,
        input.threshold,
        input.contextSize,
      ],
    );
    return parseChunkRows(rows);
  }

  private async run(stage: StoreStage, sql: string, params: unknown[]): Promise<unknown[]> {
    try {
      const result = await this.pool.query(sql, params);
      return result.rows;
    } catch (error) {
      throw new StoreUnavailableError(stage, error);
    }
  }
}
