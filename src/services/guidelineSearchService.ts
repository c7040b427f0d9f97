import { RetrievalSettings } from "../config/env.js";
import { InvalidSearchInputError } from "../domain/errors.js";
import { GuidelineStore } from "../domain/guidelineStore.js";
import { ChunkMatch, GuidelineSummaryMatch, StitchResult } from "../domain/types.js";
import { EmbeddingService, GenerationService } from "../infra/ai/types.js";
import {
  AssembledContext,
  assembleContext,
  createLoggingDiagnosticSink,
  DiagnosticSink,
} from "../pipelines/contextAssembly.js";
import { rankAndFilter } from "../pipelines/ranking.js";
import { retrieveTwoStage } from "../pipelines/retrieval.js";
import { stitchContext } from "../pipelines/stitching.js";
import { normalizeText } from "../utils/text.js";
import { ChatTurn, SessionState } from "./sessionHistory.js";

export const UNKNOWN_GUIDELINE_TITLE = "Unknown Guideline";

export interface SearchGuidelinesInput {
  query: string;
  summaryThreshold?: number;
  chunkThreshold?: number;
}

export interface RankedPassage {
  rank: number;
  chunkId: string;
  guidelineId: string;
  guidelineTitle: string;
  similarity: number;
  content: string;
  context: StitchResult;
}

export interface SearchGuidelinesResult {
  query: string;
  scope: "matched" | "empty_scope";
  guidelines: GuidelineSummaryMatch[];
  passages: RankedPassage[];
  chunkSearchDegraded: boolean;
  guidance?: string;
}

export interface AskGuidelinesResult extends SearchGuidelinesResult {
  answer: string;
  latencyMs: number;
}

export interface GuidelineSearchServiceDeps {
  store: GuidelineStore;
  embeddings: EmbeddingService;
  generator: GenerationService;
  settings: RetrievalSettings;
  session: SessionState;
  diagnostics?: DiagnosticSink;
}

interface PreparedContext {
  result: SearchGuidelinesResult;
  context: AssembledContext;
}

/**
 * One request runs strictly in sequence: embed, summary search, scoped chunk
 * search, rank/filter, stitch, assemble and (for `ask`) generate.
 */
export class GuidelineSearchService {
  private readonly diagnostics: DiagnosticSink;

  constructor(private readonly deps: GuidelineSearchServiceDeps) {
    this.diagnostics = deps.diagnostics ?? createLoggingDiagnosticSink();
  }

  async search(input: SearchGuidelinesInput): Promise<SearchGuidelinesResult> {
    const prepared = await this.prepare(input);
    return prepared.result;
  }

  async ask(input: SearchGuidelinesInput): Promise<AskGuidelinesResult> {
    const startedAt = Date.now();
    const prepared = await this.prepare(input);
    const { query } = prepared.result;

    const answer = await this.deps.generator.generateAnswer(query, prepared.context);
    // A failed generation leaves no unanswered question behind.
    this.deps.session.chat.append("user", query);
    this.deps.session.chat.append("assistant", answer);

    return {
      ...prepared.result,
      answer,
      latencyMs: Date.now() - startedAt,
    };
  }

  recentSearches(): string[] {
    return this.deps.session.searches.recent();
  }

  chatHistory(): ChatTurn[] {
    return this.deps.session.chat.list();
  }

  private async prepare(input: SearchGuidelinesInput): Promise<PreparedContext> {
    const query = normalizeText(input.query);
    if (!query) {
      throw new InvalidSearchInputError("Query must not be empty.");
    }
    const summaryThreshold = resolveThreshold(
      "summary",
      input.summaryThreshold,
      this.deps.settings.summaryThreshold,
    );
    const chunkThreshold = resolveThreshold(
      "chunk",
      input.chunkThreshold,
      this.deps.settings.chunkThreshold,
    );

    this.deps.session.searches.record(query);

    const queryEmbedding = await this.deps.embeddings.embedQuery(query);
    const outcome = await retrieveTwoStage(this.deps.store, queryEmbedding, {
      summaryThreshold,
      chunkThreshold,
      summaryLimit: this.deps.settings.summaryLimit,
      contextSize: this.deps.settings.contextSize,
    });

    const ranked =
      outcome.kind === "matched"
        ? rankAndFilter(outcome.chunks, chunkThreshold, this.deps.settings.topN)
        : [];
    const passages = this.buildPassages(ranked, outcome.summaries);
    const context = assembleContext(query, ranked, outcome.summaries, this.diagnostics);

    return {
      result: {
        query,
        scope: outcome.kind,
        guidelines: outcome.summaries,
        passages,
        chunkSearchDegraded: outcome.kind === "matched" && outcome.chunkSearchFailed,
        guidance: buildGuidance(outcome.kind, passages.length),
      },
      context,
    };
  }

  private buildPassages(
    ranked: ChunkMatch[],
    guidelines: GuidelineSummaryMatch[],
  ): RankedPassage[] {
    const titleById = new Map<string, string>(guidelines.map((guideline) => [guideline.id, guideline.title]));
    const options = { minOverlapLength: this.deps.settings.minOverlapLength };

    return ranked.map((chunk, index) => ({
      rank: index + 1,
      chunkId: chunk.id,
      guidelineId: chunk.guidelineId,
      guidelineTitle: titleById.get(chunk.guidelineId) ?? UNKNOWN_GUIDELINE_TITLE,
      similarity: chunk.similarity,
      content: chunk.content,
      context: stitchContext(chunk.id, chunk.contextChunks, options),
    }));
  }
}

function resolveThreshold(
  name: "summary" | "chunk",
  requested: number | undefined,
  fallback: number,
): number {
  const value = requested ?? fallback;
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidSearchInputError(`The ${name} threshold must be between 0 and 1.`);
  }
  return value;
}

function buildGuidance(
  scope: "matched" | "empty_scope",
  passageCount: number,
): string | undefined {
  if (scope === "empty_scope") {
    return "No guideline summaries met the summary threshold. Try lowering summary_threshold or rephrasing the question.";
  }
  if (passageCount === 0) {
    return "Guidelines matched but no passages met the chunk threshold. Try lowering chunk_threshold.";
  }
  return undefined;
}
