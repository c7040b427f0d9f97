import { AppConfig } from "../../config/env.js";
import { GuidelineStore } from "../../domain/guidelineStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryGuidelineStore } from "./inMemoryGuidelineStore.js";
import { PgVectorGuidelineStore } from "./pgVectorGuidelineStore.js";

export interface GuidelineStoreBootstrapResult {
  store: GuidelineStore;
  close: () => Promise<void>;
}

export async function createGuidelineStore(
  config: AppConfig,
): Promise<GuidelineStoreBootstrapResult> {
  if (config.store === "memory") {
    if (!config.memorySnapshotPath) {
      throw new Error("GUIDELINE_STORE=memory requires MEMORY_SNAPSHOT_PATH.");
    }
    return {
      store: await InMemoryGuidelineStore.fromFile(config.memorySnapshotPath),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when GUIDELINE_STORE=pgvector.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  return {
    store: new PgVectorGuidelineStore(pool),
    close: async () => {
      await pool.end();
    },
  };
}
