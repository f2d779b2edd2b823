#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createAnalyticsRuntime, createLogger } from "@playcaller/agents";
import { registerAnalyticsTools } from "./tools/analytics.js";

const log = createLogger("mcp-server");

const runtime = await createAnalyticsRuntime();

const server = new McpServer({
  name: "playcaller-analytics-mcp",
  version: "0.1.0",
});

registerAnalyticsTools(server, runtime);

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, "Shutting down");
  await server.close();
  runtime.shutdown();
  process.exit(0);
};

process.once("SIGINT", (signal) => {
  shutdown(signal).catch((err: unknown) => {
    log.error({ error: err instanceof Error ? err.message : String(err) }, "Shutdown failed");
    process.exit(1);
  });
});

const transport = new StdioServerTransport();
await server.connect(transport);
log.info("Analytics MCP server listening on stdio");
