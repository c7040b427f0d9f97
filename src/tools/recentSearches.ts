import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GuidelineSearchService } from "../services/guidelineSearchService.js";
import { jsonResult } from "./toolResult.js";

export function registerRecentSearchesTool(
  server: McpServer,
  service: GuidelineSearchService,
) {
  server.registerTool(
    "recent_searches",
    {
      title: "Recent Searches",
      description: "Lists the most recent distinct questions of this session, newest first.",
      inputSchema: {},
    },
    async () => jsonResult({ searches: service.recentSearches() }),
  );
}

export function registerChatHistoryTool(
  server: McpServer,
  service: GuidelineSearchService,
) {
  server.registerTool(
    "chat_history",
    {
      title: "Chat History",
      description: "Lists the answered questions of this session with their answers, oldest first.",
      inputSchema: {},
    },
    async () => jsonResult({ turns: service.chatHistory() }),
  );
}
