import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, describe, expect, it } from "vitest";
import { createAppServer } from "../src/app.js";
import {
  EchoGenerator,
  FakeGuidelineStore,
  FixedEmbeddings,
  makeChunk,
  makeSummary,
  TEST_SETTINGS,
  unavailable,
} from "./helpers.js";

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const cleanup of cleanups.splice(0)) {
    await cleanup();
  }
});

async function connect(store: FakeGuidelineStore): Promise<Client> {
  const server = createAppServer({
    store,
    embeddings: new FixedEmbeddings(),
    generator: new EchoGenerator(),
    settings: TEST_SETTINGS,
    searchHistoryLimit: 5,
    diagnostics: () => {},
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);

  const client = new Client({ name: "test-client", version: "0.0.1" });
  await client.connect(clientTransport);

  cleanups.push(async () => {
    await client.close();
    await server.close();
  });
  return client;
}

function readText(result: unknown): string {
  const content =
    typeof result === "object" && result !== null && "content" in result ? result.content : [];
  if (!Array.isArray(content)) {
    return "";
  }
  return content
    .map((item: unknown) =>
      typeof item === "object" && item !== null && "text" in item && typeof item.text === "string"
        ? item.text
        : "",
    )
    .join("\n");
}

describe("MCP tools", () => {
  it("registers the guideline tools", async () => {
    const client = await connect(new FakeGuidelineStore());

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_guidelines",
      "chat_history",
      "recent_searches",
      "search_guidelines",
    ]);
  });

  it("returns ranked passages with their stitched context", async () => {
    const store = new FakeGuidelineStore(
      [makeSummary({ similarity: 0.81234 })],
      [makeChunk({ id: "c-1", content: "Consent must be informed.", similarity: 0.7 })],
    );
    const client = await connect(store);

    const result = await client.callTool({
      name: "search_guidelines",
      arguments: { query: "Is consent informed?" },
    });
    const payload: unknown = JSON.parse(readText(result));

    expect(payload).toEqual({
      query: "Is consent informed?",
      scope: "matched",
      chunk_search_degraded: false,
      guidelines: [
        {
          id: "g-1",
          title: "Guidelines on Consent",
          similarity: 0.8123,
          version: "1.1",
          adopted_date: "2020-05-04",
          document_type: "Guidelines",
          summary: "How consent must be obtained and documented.",
        },
      ],
      passages: [
        {
          rank: 1,
          chunk_id: "c-1",
          guideline_id: "g-1",
          guideline_title: "Guidelines on Consent",
          similarity: 0.7,
          content: "Consent must be informed.",
          full_context: "Consent must be informed.",
        },
      ],
    });
  });

  it("shows a placeholder when a passage has no context", async () => {
    const store = new FakeGuidelineStore([makeSummary()], [makeChunk({ contextChunks: [] })]);
    const client = await connect(store);

    const result = await client.callTool({
      name: "search_guidelines",
      arguments: { query: "Consent" },
    });

    expect(readText(result)).toContain('"full_context": "No additional context available"');
  });

  it("answers questions and tracks recent searches per session", async () => {
    const store = new FakeGuidelineStore([makeSummary()], [makeChunk()]);
    const client = await connect(store);

    const answer = await client.callTool({
      name: "ask_guidelines",
      arguments: { question: "What is valid consent?" },
    });
    const recent = await client.callTool({ name: "recent_searches", arguments: {} });

    expect(readText(answer)).toContain('"answer": "Answer to \\"What is valid consent?\\" from 1 passage(s)."');
    expect(JSON.parse(readText(recent))).toEqual({ searches: ["What is valid consent?"] });
  });

  it("lists the answered questions of the session", async () => {
    const store = new FakeGuidelineStore([makeSummary()], [makeChunk()]);
    const client = await connect(store);

    await client.callTool({
      name: "ask_guidelines",
      arguments: { question: "Can consent be withdrawn?" },
    });
    const history = await client.callTool({ name: "chat_history", arguments: {} });
    const payload: unknown = JSON.parse(readText(history));

    expect(payload).toMatchObject({
      turns: [
        { role: "user", content: "Can consent be withdrawn?" },
        { role: "assistant", content: 'Answer to "Can consent be withdrawn?" from 1 passage(s).' },
      ],
    });
  });

  it("returns a generic error when the summary search fails", async () => {
    const store = new FakeGuidelineStore();
    store.summaryError = unavailable("summaries");
    const client = await connect(store);

    const result = await client.callTool({
      name: "ask_guidelines",
      arguments: { question: "What is valid consent?" },
    });

    expect(result).toMatchObject({ isError: true });
    expect(readText(result)).toBe("The guideline search failed. Please try again later.");
  });
});
