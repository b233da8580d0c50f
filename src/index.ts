#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { createMcpServer } from "./mcp.js";
import { createHttpApp, listenHttp } from "./http.js";
import { resolvePlugins } from "./plugins/index.js";
import { LimeSurveyClient } from "./limesurvey/client.js";

// stdout belongs to the stdio transport, so everything here logs to stderr.
async function main() {
  const config = loadConfig();
  const client = new LimeSurveyClient(config.limesurvey);
  const plugins = resolvePlugins(config);
  const buildServer = () => createMcpServer(config, client, plugins);

  console.error(
    `Starting ${config.server.name} (${config.server.transport}) for ${config.limesurvey.url}` +
      ` with plugins: ${plugins.map((p) => p.name).join(", ")}${config.limesurvey.readOnly ? " [read-only]" : ""}`
  );

  if (config.server.transport === "stdio") {
    const mcp = buildServer();
    await mcp.connect(new StdioServerTransport());
    console.error("MCP server running on stdio");

    const shutdown = () => {
      mcp.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("Error during shutdown:", error);
          process.exit(1);
        }
      );
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
    return;
  }

  const app = createHttpApp(config, buildServer);
  const server = await listenHttp(app, config.server.port);
  server.on("error", (error) => {
    console.error("HTTP server error:", error);
    process.exit(1);
  });
  console.error(`MCP server running at http://localhost:${config.server.port}`);
  console.error(`MCP endpoint: http://localhost:${config.server.port}/mcp`);

  const shutdown = () => {
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
