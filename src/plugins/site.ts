import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { PluginContext } from "./index.js";
import { JSON_MIME, jsonResource } from "./helpers.js";

export function registerSite(mcp: McpServer, { client }: PluginContext): void {
  mcp.resource(
    "server-version",
    "server://version",
    { description: "LimeSurvey version number", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.getServerVersion()))
  );

  mcp.resource(
    "db-version",
    "server://db_version",
    { description: "LimeSurvey database schema version", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.getDbVersion()))
  );

  mcp.resource(
    "site-name",
    "server://site_name",
    { description: "Site name", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.getSiteName()))
  );

  mcp.resource(
    "users",
    "server://users",
    { description: "Administration users", mimeType: JSON_MIME },
    async (uri) => jsonResource(uri, await client.session((s) => s.listUsers()))
  );
}
