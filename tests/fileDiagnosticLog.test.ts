import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { FileDiagnosticLog } from "../src/infra/diagnostics/fileDiagnosticLog.js";
import { assembleContext } from "../src/pipelines/contextAssembly.js";
import { makeChunk, makeSummary } from "./helpers.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

async function makeTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "guideline-diagnostics-"));
  tempDirs.push(dir);
  return dir;
}

describe("FileDiagnosticLog", () => {
  it("appends one JSON line per assembled context, full context included", async () => {
    const dir = await makeTempDir();
    const log = new FileDiagnosticLog(path.join(dir, "logs"));

    const first = assembleContext(
      "Is consent required?",
      [makeChunk({ id: "c-1", content: "Consent is one lawful basis.", similarity: 0.9 })],
      [makeSummary()],
      log.sink,
    );
    assembleContext("Anything on cookies?", [], [], log.sink);
    await log.flush();

    const lines = (await fs.readFile(path.join(dir, "logs", "app.log"), "utf-8"))
      .trimEnd()
      .split("\n");
    expect(lines).toHaveLength(2);

    const record: unknown = JSON.parse(lines[0] ?? "");
    expect(record).toMatchObject({
      query: "Is consent required?",
      chunk_count: 1,
      chunks: [{ similarity: 0.9, excerpt: "Consent is one lawful basis." }],
      guidelines: [{ title: "Guidelines on Consent", version: "1.1" }],
      context: first.text,
    });
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({
      query: "Anything on cookies?",
      chunk_count: 0,
      context: "Guidelines Information:\n\nRelevant Sections:",
    });
  });

  it("keeps serving requests when the log cannot be written", async () => {
    const dir = await makeTempDir();
    const blocker = path.join(dir, "not-a-directory");
    await fs.writeFile(blocker, "", "utf-8");
    const log = new FileDiagnosticLog(path.join(blocker, "logs"));

    const context = assembleContext("Question?", [makeChunk()], [makeSummary()], log.sink);
    await log.flush();

    expect(context.chunkCount).toBe(1);
    await expect(fs.stat(log.filePath)).rejects.toThrow();
  });
});
