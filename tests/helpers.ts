import { StoreUnavailableError } from "../src/domain/errors.js";
import {
  ChunkSearchInput,
  GuidelineStore,
  SummarySearchInput,
} from "../src/domain/guidelineStore.js";
import { ChunkMatch, ContextChunk, GuidelineSummaryMatch } from "../src/domain/types.js";
import { EmbeddingService, GenerationService } from "../src/infra/ai/types.js";
import { AssembledContext } from "../src/pipelines/contextAssembly.js";
import { RetrievalSettings } from "../src/config/env.js";

export const TEST_SETTINGS: RetrievalSettings = {
  summaryThreshold: 0.4,
  chunkThreshold: 0.45,
  summaryLimit: 5,
  contextSize: 1,
  topN: 5,
  minOverlapLength: 50,
};

export function makeSummary(overrides: Partial<GuidelineSummaryMatch> = {}): GuidelineSummaryMatch {
  return {
    id: "g-1",
    title: "Guidelines on Consent",
    similarity: 0.8,
    version: "1.1",
    adoptedDate: "2020-05-04",
    documentType: "Guidelines",
    summary: "How consent must be obtained and documented.",
    ...overrides,
  };
}

export function makeChunk(overrides: Partial<ChunkMatch> = {}): ChunkMatch {
  const id = overrides.id ?? "c-1";
  const content = overrides.content ?? `Passage ${id}.`;
  return {
    id,
    guidelineId: "g-1",
    content,
    similarity: 0.7,
    contextChunks: [{ chunkId: id, content, positionKey: 1 }],
    ...overrides,
  };
}

export function makeContext(chunkId: string, content: string, positionKey: number): ContextChunk {
  return { chunkId, content, positionKey };
}

/** Store double that returns canned results and records every call. */
export class FakeGuidelineStore implements GuidelineStore {
  summaryCalls: SummarySearchInput[] = [];

  chunkCalls: ChunkSearchInput[] = [];

  summaryError: Error | null = null;

  chunkError: Error | null = null;

  constructor(
    public summaries: GuidelineSummaryMatch[] = [],
    public chunks: ChunkMatch[] = [],
  ) {}

  async searchSummaries(input: SummarySearchInput): Promise<GuidelineSummaryMatch[]> {
    this.summaryCalls.push(input);
    if (this.summaryError) {
      throw this.summaryError;
    }
    return this.summaries;
  }

  async searchChunks(input: ChunkSearchInput): Promise<ChunkMatch[]> {
    this.chunkCalls.push(input);
    if (this.chunkError) {
      throw this.chunkError;
    }
    return this.chunks;
  }
}

export function unavailable(stage: "summaries" | "chunks"): StoreUnavailableError {
  return new StoreUnavailableError(stage, new Error("connect ECONNREFUSED"));
}

export class FixedEmbeddings implements EmbeddingService {
  readonly queries: string[] = [];

  constructor(private readonly vector: number[] = [1, 0]) {}

  async embedQuery(text: string): Promise<number[]> {
    this.queries.push(text);
    return this.vector;
  }
}

export class EchoGenerator implements GenerationService {
  readonly contexts: AssembledContext[] = [];

  async generateAnswer(query: string, context: AssembledContext): Promise<string> {
    this.contexts.push(context);
    return `Answer to "${query}" from ${context.chunkCount} passage(s).`;
  }
}
