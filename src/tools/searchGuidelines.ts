import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { GuidelineSearchService } from "../services/guidelineSearchService.js";
import { presentSearch } from "./presenters.js";
import { errorResult, jsonResult } from "./toolResult.js";

export const thresholdInputs = {
  summary_threshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe("Minimum similarity for guideline summaries"),
  chunk_threshold: z
    .number()
    .min(0)
    .max(1)
    .optional()
    .describe("Minimum similarity for content passages"),
};

export function registerSearchGuidelinesTool(
  server: McpServer,
  service: GuidelineSearchService,
) {
  server.registerTool(
    "search_guidelines",
    {
      title: "Search Guidelines",
      description:
        "Finds the guidelines and ranked passages relevant to a question, each passage with its stitched surrounding context.",
      inputSchema: {
        query: z.string().min(2).describe("Question about the guidelines"),
        ...thresholdInputs,
      },
    },
    async ({ query, summary_threshold, chunk_threshold }) => {
      try {
        const result = await service.search({
          query,
          summaryThreshold: summary_threshold,
          chunkThreshold: chunk_threshold,
        });
        return jsonResult(presentSearch(result));
      } catch (error) {
        return errorResult("search_guidelines", error);
      }
    },
  );
}
