import { AssembledContext } from "../../pipelines/contextAssembly.js";
import { normalizeL2 } from "../../utils/vector.js";
import { EmbeddingService, GenerationService } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  embeddingDimension: number;
}

interface EmbeddingResponse {
  data: Array<{
    embedding: number[];
    index: number;
  }>;
}

interface ChatResponse {
  choices: Array<{
    message: {
      content: string | null;
    };
  }>;
}

const SYSTEM_PROMPT = [
  "You are a regulatory compliance assistant. Answer accurately and only from the provided guidelines.",
  "Answer in the same language as the user's question, and keep that language for the whole response.",
  "",
  "When answering:",
  '- When citing a guideline, name the source right after the citation, like "[From <guideline title>: cited text]".',
  '- When referencing articles of the underlying regulation, cite them inline, like "[Art. XX: relevant text]".',
  "- Prefer the more recently adopted guideline when guidelines conflict.",
  "- If you provide information that the guidelines do not cover, say so explicitly.",
].join("\n");

export class OpenAiClient implements EmbeddingService, GenerationService {
  constructor(private readonly options: OpenAiClientOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async embedQuery(query: string): Promise<number[]> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.options.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        input: query,
        encoding_format: "float",
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as EmbeddingResponse;
    const [first] = [...data.data].sort((a, b) => a.index - b.index);
    if (!first || first.embedding.length === 0) {
      throw new Error("OpenAI embeddings returned an empty vector.");
    }
    // The indexes store the leading dimensions only; truncated vectors need re-normalising.
    return normalizeL2(first.embedding.slice(0, this.options.embeddingDimension));
  }

  async generateAnswer(query: string, context: AssembledContext): Promise<string> {
    const apiKey = this.requireApiKey();

    const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        temperature: 0,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          {
            role: "user",
            content: [
              `Question: ${query}`,
              "",
              "Relevant Context:",
              context.text,
              "",
              "Provide a comprehensive answer, citing sources inline when referencing guidelines or regulation articles.",
              "Prioritize information from more recent guidelines when available.",
            ].join("\n"),
          },
        ],
      }),
    });

    if (!response.ok) {
      throw new Error(
        `OpenAI chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as ChatResponse;
    return data.choices[0]?.message?.content?.trim() ?? "";
  }

  private requireApiKey(): string {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is required for OpenAI operations.");
    }
    return this.options.apiKey;
  }
}
