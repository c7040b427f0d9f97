import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import { InMemoryGuidelineStore } from "../src/infra/store/inMemoryGuidelineStore.js";

const FIXTURE_PATH = path.join(path.dirname(fileURLToPath(import.meta.url)), "fixtures/guidelines.json");

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("InMemoryGuidelineStore", () => {
  it("loads a snapshot and ranks summaries by cosine similarity", async () => {
    const store = await InMemoryGuidelineStore.fromFile(FIXTURE_PATH);

    const summaries = await store.searchSummaries({
      queryEmbedding: [0.8, 0.6, 0],
      threshold: 0.5,
      limit: 5,
    });

    expect(summaries.map((summary) => summary.id)).toEqual(["consent", "transfers"]);
    expect(summaries[0]?.similarity).toBeCloseTo(0.8);
    expect(summaries[0]).toMatchObject({
      title: "Guidelines on Consent",
      version: "1.1",
      adoptedDate: "2020-05-04",
      documentType: "Guidelines",
    });
  });

  it("applies the summary threshold and limit", async () => {
    const store = await InMemoryGuidelineStore.fromFile(FIXTURE_PATH);

    const aboveThreshold = await store.searchSummaries({
      queryEmbedding: [0.8, 0.6, 0],
      threshold: 0.7,
      limit: 5,
    });
    const limited = await store.searchSummaries({
      queryEmbedding: [0.8, 0.6, 0],
      threshold: 0,
      limit: 1,
    });

    expect(aboveThreshold.map((summary) => summary.id)).toEqual(["consent"]);
    expect(limited.map((summary) => summary.id)).toEqual(["consent"]);
  });

  it("searches only chunks of the scoped guidelines", async () => {
    const store = await InMemoryGuidelineStore.fromFile(FIXTURE_PATH);

    const chunks = await store.searchChunks({
      queryEmbedding: [1, 0, 0],
      guidelineIds: ["consent"],
      threshold: 0.5,
      contextSize: 1,
    });

    expect(chunks.map((chunk) => chunk.id)).toEqual(["consent-1", "consent-0"]);
    expect(chunks.every((chunk) => chunk.guidelineId === "consent")).toBe(true);
  });

  it("attaches neighbouring chunks, including the match itself", async () => {
    const store = await InMemoryGuidelineStore.fromFile(FIXTURE_PATH);

    const [match] = await store.searchChunks({
      queryEmbedding: [1, 0, 0],
      guidelineIds: ["consent"],
      threshold: 0.9,
      contextSize: 1,
    });

    expect(match?.id).toBe("consent-1");
    expect(match?.contextChunks).toEqual([
      { chunkId: "consent-0", content: "Consent must be freely given.", positionKey: 0 },
      { chunkId: "consent-1", content: "Consent must be specific and informed.", positionKey: 1 },
      { chunkId: "consent-2", content: "Withdrawal must be as easy as giving consent.", positionKey: 2 },
    ]);
  });

  it("fails loudly when the query dimension does not match the snapshot", async () => {
    const store = await InMemoryGuidelineStore.fromFile(FIXTURE_PATH);

    await expect(
      store.searchSummaries({ queryEmbedding: [1, 0], threshold: 0, limit: 5 }),
    ).rejects.toThrow("Embedding of guideline consent has 3 dimensions but the query has 2.");
    await expect(
      store.searchChunks({
        queryEmbedding: [1, 0],
        guidelineIds: ["transfers"],
        threshold: 0,
        contextSize: 1,
      }),
    ).rejects.toThrow("Embedding of chunk transfers-0 has 3 dimensions but the query has 2.");
  });

  it("rejects snapshots that fail validation", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "guideline-store-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "broken.json");
    await fs.writeFile(filePath, JSON.stringify({ guidelines: [{ id: "x" }], chunks: [] }));

    await expect(InMemoryGuidelineStore.fromFile(filePath)).rejects.toThrow(
      "Invalid guideline snapshot",
    );
  });

  it("rejects snapshots that are not JSON", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "guideline-store-"));
    tempDirs.push(dir);
    const filePath = path.join(dir, "broken.json");
    await fs.writeFile(filePath, "not json");

    await expect(InMemoryGuidelineStore.fromFile(filePath)).rejects.toThrow(
      "Guideline snapshot is not valid JSON",
    );
  });
});
