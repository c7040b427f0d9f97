import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./app.js";
import { loadConfig } from "./config/env.js";
import { OpenAiClient } from "./infra/ai/openAiClient.js";
import { combineDiagnosticSinks, FileDiagnosticLog } from "./infra/diagnostics/fileDiagnosticLog.js";
import { createLoggingDiagnosticSink, DiagnosticSink } from "./pipelines/contextAssembly.js";
import { createGuidelineStore } from "./infra/store/createGuidelineStore.js";
import { MCP_PATH, startHttpServer } from "./transport/http.js";
import { createLogger, describeError, setLogLevel } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const aiClient = new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.embeddingModel,
    chatModel: config.chatModel,
    embeddingDimension: config.embeddingDimension,
  });

  if (!aiClient.isConfigured()) {
    throw new Error("OPENAI_API_KEY is required to embed queries and generate answers.");
  }

  const { store, close } = await createGuidelineStore(config);
  const shutdownTasks: Array<() => Promise<void>> = [close];

  let diagnostics: DiagnosticSink = createLoggingDiagnosticSink();
  if (config.logDirectory) {
    const diagnosticLog = new FileDiagnosticLog(config.logDirectory);
    diagnostics = combineDiagnosticSinks(diagnostics, diagnosticLog.sink);
    shutdownTasks.push(() => diagnosticLog.flush());
    logger.info(`Writing context diagnostics to ${diagnosticLog.filePath}`);
  }

  // Called once per MCP session so each gets its own search and chat history.
  const newServer = () =>
    createAppServer({
      store,
      embeddings: aiClient,
      generator: aiClient,
      settings: config.retrieval,
      diagnostics,
      searchHistoryLimit: config.searchHistoryLimit,
    });

  if (config.transport === "http") {
    const stopHttpServer = await startHttpServer({
      host: config.host,
      port: config.port,
      createSessionServer: newServer,
    });
    shutdownTasks.unshift(stopHttpServer);
    logger.info(`MCP HTTP server listening on http://${config.host}:${config.port}${MCP_PATH}`);
  } else {
    await runStdioServer(newServer());
  }

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed.", { reason: describeError(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  logger.error("Failed to start MCP server.", { reason: describeError(error) });
  process.exit(1);
});
