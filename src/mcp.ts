import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Config } from "./config.js";
import type { LimeSurveyClient } from "./limesurvey/client.js";
import { loadPlugins, type ResolvedPlugin } from "./plugins/index.js";

export const VERSION = "1.0.0";

export function createMcpServer(config: Config, client: LimeSurveyClient, plugins: ResolvedPlugin[]): McpServer {
  const mcp = new McpServer({
    name: config.server.name,
    version: VERSION,
  });
  loadPlugins(mcp, plugins, client, config.limesurvey.readOnly);
  return mcp;
}
