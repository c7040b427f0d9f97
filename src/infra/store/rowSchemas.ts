import { z } from "zod";
import { ChunkMatch, ContextChunk, GuidelineSummaryMatch } from "../../domain/types.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("store");

const idSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((value) => String(value));
const numericSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform((value) => Number(value))
  .pipe(z.number().finite());
const optionalText = z
  .union([z.string(), z.date(), z.null(), z.undefined()])
  .transform((value) => {
    if (value instanceof Date) {
      return value.toISOString().slice(0, 10);
    }
    return value ?? null;
  });

export const summaryRowSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  similarity: numericSchema,
  version: optionalText,
  adopted_date: optionalText,
  document_type: optionalText,
  summary: z.string().nullish(),
});

export const contextRowSchema = z.object({
  chunk_id: idSchema,
  content: z.string(),
  position_key: numericSchema,
});

export const chunkRowSchema = z.object({
  id: idSchema,
  guideline_id: idSchema,
  content: z.string(),
  similarity: numericSchema,
  context_chunks: z.array(z.unknown()).nullish(),
});

export function parseSummaryRows(rows: unknown[]): GuidelineSummaryMatch[] {
  const parsed: GuidelineSummaryMatch[] = [];
  for (const row of rows) {
    const result = summaryRowSchema.safeParse(row);
    if (!result.success) {
      logger.warn("Dropped malformed summary match.", {
        issues: result.error.issues.map((issue) => issue.path.join(".") || issue.message),
      });
      continue;
    }
    parsed.push({
      id: result.data.id,
      title: result.data.title,
      similarity: result.data.similarity,
      version: result.data.version,
      adoptedDate: result.data.adopted_date,
      documentType: result.data.document_type,
      summary: result.data.summary ?? "",
    });
  }
  return parsed;
}

export function parseChunkRows(rows: unknown[]): ChunkMatch[] {
  const parsed: ChunkMatch[] = [];
  for (const row of rows) {
    const result = chunkRowSchema.safeParse(row);
    if (!result.success) {
      logger.warn("Dropped malformed chunk match.", {
        issues: result.error.issues.map((issue) => issue.path.join(".") || issue.message),
      });
      continue;
    }
    parsed.push({
      id: result.data.id,
      guidelineId: result.data.guideline_id,
      content: result.data.content,
      similarity: result.data.similarity,
      contextChunks: parseContextRows(result.data.id, result.data.context_chunks ?? []),
    });
  }
  return parsed;
}

function parseContextRows(chunkId: string, rows: unknown[]): ContextChunk[] {
  const parsed: ContextChunk[] = [];
  for (const row of rows) {
    const result = contextRowSchema.safeParse(row);
    if (!result.success) {
      logger.warn("Dropped malformed context chunk.", { chunk_id: chunkId });
      continue;
    }
    parsed.push({
      chunkId: result.data.chunk_id,
      content: result.data.content,
      positionKey: result.data.position_key,
    });
  }
  return parsed;
}
