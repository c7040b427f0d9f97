export interface GuidelineSummaryMatch {
  id: string;
  title: string;
  similarity: number;
  version: string | null;
  adoptedDate: string | null;
  documentType: string | null;
  summary: string;
}

export interface ContextChunk {
  chunkId: string;
  content: string;
  positionKey: number;
}

export interface ChunkMatch {
  id: string;
  guidelineId: string;
  content: string;
  similarity: number;
  contextChunks: ContextChunk[];
}

export type StitchResult =
  | { kind: "no_context" }
  | { kind: "stitched"; text: string; windows: string[] };

export type RetrievalOutcome =
  | { kind: "empty_scope"; summaries: GuidelineSummaryMatch[]; chunks: ChunkMatch[] }
  | {
      kind: "matched";
      summaries: GuidelineSummaryMatch[];
      chunks: ChunkMatch[];
      chunkSearchFailed: boolean;
    };
