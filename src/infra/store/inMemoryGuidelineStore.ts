import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  ChunkSearchInput,
  GuidelineStore,
  SummarySearchInput,
} from "../../domain/guidelineStore.js";
import { ChunkMatch, GuidelineSummaryMatch } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface GuidelineRecord {
  id: string;
  title: string;
  version: string | null;
  adoptedDate: string | null;
  documentType: string | null;
  summary: string;
  summaryEmbedding: number[] | null;
}

export interface ChunkRecord {
  id: string;
  guidelineId: string;
  index: number;
  content: string;
  embedding: number[] | null;
}

export interface GuidelineSnapshot {
  guidelines: GuidelineRecord[];
  chunks: ChunkRecord[];
}

const snapshotSchema = z.object({
  guidelines: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string().min(1),
      version: z.string().nullish(),
      adopted_date: z.string().nullish(),
      document_type: z.string().nullish(),
      summary: z.string().default(""),
      summary_embedding: z.array(z.number()).nullish(),
    }),
  ),
  chunks: z.array(
    z.object({
      id: z.string().min(1),
      guideline_id: z.string().min(1),
      chunk_index: z.number().int().nonnegative(),
      content: z.string(),
      embedding: z.array(z.number()).nullish(),
    }),
  ),
});

export class InMemoryGuidelineStore implements GuidelineStore {
  private readonly guidelineById = new Map<string, GuidelineRecord>();

  private readonly chunksByGuidelineId = new Map<string, ChunkRecord[]>();

  constructor(snapshot?: GuidelineSnapshot) {
    if (snapshot) {
      this.load(snapshot);
    }
  }

  static async fromFile(filePath: string): Promise<InMemoryGuidelineStore> {
    const absolutePath = path.resolve(filePath);
    const raw = await fs.readFile(absolutePath, "utf-8");

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new Error(`Guideline snapshot is not valid JSON: ${absolutePath}`);
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(
        `Invalid guideline snapshot (${absolutePath}): ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
      );
    }

    return new InMemoryGuidelineStore({
      guidelines: parsed.data.guidelines.map((row) => ({
        id: row.id,
        title: row.title,
        version: row.version ?? null,
        adoptedDate: row.adopted_date ?? null,
        documentType: row.document_type ?? null,
        summary: row.summary,
        summaryEmbedding: row.summary_embedding ?? null,
      })),
      chunks: parsed.data.chunks.map((row) => ({
        id: row.id,
        guidelineId: row.guideline_id,
        index: row.chunk_index,
        content: row.content,
        embedding: row.embedding ?? null,
      })),
    });
  }

  load(snapshot: GuidelineSnapshot): void {
    for (const guideline of snapshot.guidelines) {
      this.guidelineById.set(guideline.id, guideline);
    }
    for (const chunk of snapshot.chunks) {
      const chunks = this.chunksByGuidelineId.get(chunk.guidelineId) ?? [];
      chunks.push(chunk);
      this.chunksByGuidelineId.set(chunk.guidelineId, chunks);
    }
    for (const chunks of this.chunksByGuidelineId.values()) {
      chunks.sort((a, b) => a.index - b.index);
    }
  }

  async searchSummaries(input: SummarySearchInput): Promise<GuidelineSummaryMatch[]> {
    const scored: GuidelineSummaryMatch[] = [];
    for (const guideline of this.guidelineById.values()) {
      if (!guideline.summaryEmbedding) {
        continue;
      }
      const similarity = scoreEmbedding(
        input.queryEmbedding,
        guideline.summaryEmbedding,
        `guideline ${guideline.id}`,
      );
      if (similarity < input.threshold) {
        continue;
      }
      scored.push({
        id: guideline.id,
        title: guideline.title,
        similarity,
        version: guideline.version,
        adoptedDate: guideline.adoptedDate,
        documentType: guideline.documentType,
        summary: guideline.summary,
      });
    }

    return scored
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, Math.max(0, input.limit));
  }

  async searchChunks(input: ChunkSearchInput): Promise<ChunkMatch[]> {
    const matches: ChunkMatch[] = [];
    for (const guidelineId of new Set(input.guidelineIds)) {
      const chunks = this.chunksByGuidelineId.get(guidelineId) ?? [];
      for (const chunk of chunks) {
        if (!chunk.embedding) {
          continue;
        }
        const similarity = scoreEmbedding(input.queryEmbedding, chunk.embedding, `chunk ${chunk.id}`);
        if (similarity < input.threshold) {
          continue;
        }
        matches.push({
          id: chunk.id,
          guidelineId,
          content: chunk.content,
          similarity,
          contextChunks: chunks
            .filter((neighbor) => Math.abs(neighbor.index - chunk.index) <= input.contextSize)
            .map((neighbor) => ({
              chunkId: neighbor.id,
              content: neighbor.content,
              positionKey: neighbor.index,
            })),
        });
      }
    }

    return matches.sort((a, b) => b.similarity - a.similarity);
  }
}

function scoreEmbedding(query: number[], embedding: number[], owner: string): number {
  if (embedding.length !== query.length) {
    throw new Error(
      `Embedding of ${owner} has ${embedding.length} dimensions but the query has ${query.length}. ` +
        "Rebuild the snapshot with the configured EMBEDDING_DIMENSION.",
    );
  }
  return cosineSimilarity(query, embedding);
}
