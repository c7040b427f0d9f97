import { AssembledContext } from "../../pipelines/contextAssembly.js";

export interface EmbeddingService {
  /** Returns an L2-normalised vector of fixed length. */
  embedQuery(text: string): Promise<number[]>;
}

export interface GenerationService {
  generateAnswer(query: string, context: AssembledContext): Promise<string>;
}
