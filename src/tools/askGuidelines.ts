import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { GuidelineSearchService } from "../services/guidelineSearchService.js";
import { presentSearch } from "./presenters.js";
import { thresholdInputs } from "./searchGuidelines.js";
import { errorResult, jsonResult } from "./toolResult.js";

export function registerAskGuidelinesTool(
  server: McpServer,
  service: GuidelineSearchService,
) {
  server.registerTool(
    "ask_guidelines",
    {
      title: "Ask Guidelines",
      description:
        "Answers a question from the guideline corpus with inline citations and returns the supporting passages.",
      inputSchema: {
        question: z.string().min(2).describe("Question about the guidelines"),
        ...thresholdInputs,
      },
    },
    async ({ question, summary_threshold, chunk_threshold }) => {
      try {
        const result = await service.ask({
          query: question,
          summaryThreshold: summary_threshold,
          chunkThreshold: chunk_threshold,
        });
        return jsonResult({
          answer: result.answer,
          latency_ms: result.latencyMs,
          ...presentSearch(result),
        });
      } catch (error) {
        return errorResult("ask_guidelines", error);
      }
    },
  );
}
