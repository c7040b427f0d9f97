import { z } from "zod";

const thresholdSchema = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  GUIDELINE_STORE: z.enum(["pgvector", "memory"]).default("pgvector"),
  DATABASE_URL: z.string().optional(),
  MEMORY_SNAPSHOT_PATH: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o"),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(256),
  SUMMARY_THRESHOLD: thresholdSchema.default(0.4),
  CHUNK_THRESHOLD: thresholdSchema.default(0.45),
  SUMMARY_LIMIT: z.coerce.number().int().positive().default(5),
  CONTEXT_SIZE: z.coerce.number().int().nonnegative().default(1),
  TOP_N: z.coerce.number().int().positive().default(5),
  MIN_OVERLAP_LENGTH: z.coerce.number().int().positive().default(50),
  SEARCH_HISTORY_LIMIT: z.coerce.number().int().positive().default(5),
  LOG_DIRECTORY: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export interface RetrievalSettings {
  summaryThreshold: number;
  chunkThreshold: number;
  summaryLimit: number;
  contextSize: number;
  topN: number;
  minOverlapLength: number;
}

export interface AppConfig {
  store: "pgvector" | "memory";
  databaseUrl: string | null;
  memorySnapshotPath: string | null;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  embeddingDimension: number;
  retrieval: RetrievalSettings;
  searchHistoryLimit: number;
  logLevel: "debug" | "info" | "warn" | "error";
  logDirectory: string | null;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.GUIDELINE_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new Error("GUIDELINE_STORE=pgvector requires DATABASE_URL.");
  }
  if (parsed.GUIDELINE_STORE === "memory" && !parsed.MEMORY_SNAPSHOT_PATH) {
    throw new Error("GUIDELINE_STORE=memory requires MEMORY_SNAPSHOT_PATH.");
  }

  return {
    store: parsed.GUIDELINE_STORE,
    databaseUrl: parsed.DATABASE_URL ?? null,
    memorySnapshotPath: parsed.MEMORY_SNAPSHOT_PATH ?? null,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    chatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingDimension: parsed.EMBEDDING_DIMENSION,
    retrieval: {
      summaryThreshold: parsed.SUMMARY_THRESHOLD,
      chunkThreshold: parsed.CHUNK_THRESHOLD,
      summaryLimit: parsed.SUMMARY_LIMIT,
      contextSize: parsed.CONTEXT_SIZE,
      topN: parsed.TOP_N,
      minOverlapLength: parsed.MIN_OVERLAP_LENGTH,
    },
    searchHistoryLimit: parsed.SEARCH_HISTORY_LIMIT,
    logLevel: parsed.LOG_LEVEL,
    logDirectory: parsed.LOG_DIRECTORY ? parsed.LOG_DIRECTORY : null,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
