import { ChunkMatch, GuidelineSummaryMatch } from "../domain/types.js";
import { createLogger, describeError, Logger } from "../utils/logger.js";
import { excerpt } from "../utils/text.js";

const DIAGNOSTIC_EXCERPT_CHARS = 200;

export interface ContextDiagnostics {
  query: string;
  chunk_count: number;
  chunks: Array<{ similarity: number; excerpt: string }>;
  guidelines: Array<{ title: string; version: string }>;
  context: string;
}

export type DiagnosticSink = (record: ContextDiagnostics) => void;

export interface AssembledContext {
  query: string;
  text: string;
  guidelineCount: number;
  chunkCount: number;
}

export function createLoggingDiagnosticSink(
  logger: Logger = createLogger("context"),
): DiagnosticSink {
  return ({ context, ...summary }) => {
    logger.info("Assembled generation context.", { ...summary });
    logger.debug("Full generation context.", { context });
  };
}

/**
 * Builds the text block handed to the answer generator: guideline metadata
 * first, then the ranked passages in order.
 */
export function assembleContext(
  query: string,
  rankedChunks: ChunkMatch[],
  guidelines: GuidelineSummaryMatch[],
  sink: DiagnosticSink,
): AssembledContext {
  const lines: string[] = ["Guidelines Information:"];
  for (const guideline of guidelines) {
    lines.push(
      "",
      `Guideline: ${guideline.title}`,
      `Version: ${guideline.version ?? "N/A"}`,
      `Adopted Date: ${guideline.adoptedDate ?? "N/A"}`,
    );
  }

  lines.push("", "Relevant Sections:");
  for (const chunk of rankedChunks) {
    lines.push("", chunk.content);
  }

  const text = lines.join("\n");
  const diagnostics: ContextDiagnostics = {
    query,
    chunk_count: rankedChunks.length,
    chunks: rankedChunks.map((chunk) => ({
      similarity: Number(chunk.similarity.toFixed(3)),
      excerpt: excerpt(chunk.content, DIAGNOSTIC_EXCERPT_CHARS),
    })),
    guidelines: guidelines.map((guideline) => ({
      title: guideline.title,
      version: guideline.version ?? "N/A",
    })),
    context: text,
  };

  try {
    sink(diagnostics);
  } catch (error) {
    createLogger("context").warn("Diagnostic sink failed.", { reason: describeError(error) });
  }

  return {
    query,
    text,
    guidelineCount: guidelines.length,
    chunkCount: rankedChunks.length,
  };
}
