import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  GuidelineSearchService,
  GuidelineSearchServiceDeps,
} from "./services/guidelineSearchService.js";
import { createSessionState } from "./services/sessionHistory.js";
import { registerAskGuidelinesTool } from "./tools/askGuidelines.js";
import { registerChatHistoryTool, registerRecentSearchesTool } from "./tools/recentSearches.js";
import { registerSearchGuidelinesTool } from "./tools/searchGuidelines.js";

export const SERVER_NAME = "guideline-rag-mcp";
export const SERVER_VERSION = "0.1.0";

export interface AppServerOptions extends Omit<GuidelineSearchServiceDeps, "session"> {
  searchHistoryLimit: number;
}

/** Builds one MCP server with its own session history. */
export function createAppServer(options: AppServerOptions): McpServer {
  const { searchHistoryLimit, ...deps } = options;
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  const service = new GuidelineSearchService({
    ...deps,
    session: createSessionState(searchHistoryLimit),
  });

  registerSearchGuidelinesTool(server, service);
  registerAskGuidelinesTool(server, service);
  registerRecentSearchesTool(server, service);
  registerChatHistoryTool(server, service);

  return server;
}
