import express, { type Express, type RequestHandler } from "express";
import type { Server } from "http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { Config } from "./config.js";
import { createAuth } from "./auth.js";

function rpcError(code: number, message: string) {
  return { jsonrpc: "2.0", error: { code, message }, id: null };
}

/**
 * Express app for the Streamable HTTP transport. Every POST /mcp gets a
 * fresh server and transport from `buildServer`, closed with the response.
 */
export function createHttpApp(config: Config, buildServer: () => McpServer): Express {
  const app = express();
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  const guards: RequestHandler[] = [];
  const { password, clientSecret } = config.auth;
  if (password && clientSecret) {
    const auth = createAuth({ password, clientSecret });
    app.use(auth.router);
    guards.push(auth.requireAuth);
  }

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", name: config.server.name });
  });

  app.post("/mcp", ...guards, async (req, res) => {
    const mcp = buildServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    res.on("close", () => {
      mcp.close().catch((error: unknown) => console.error("Failed to close MCP server:", error));
    });

    try {
      await mcp.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error("MCP request error:", error);
      if (!res.headersSent) {
        res.status(500).json(rpcError(-32603, "Internal server error"));
      }
    }
  });

  // Stateless: there is no session to stream from or to delete.
  const methodNotAllowed: RequestHandler = (_req, res) => {
    res.status(405).set("Allow", "POST").json(rpcError(-32000, "Method not allowed."));
  };
  app.get("/mcp", methodNotAllowed);
  app.delete("/mcp", methodNotAllowed);

  return app;
}

/** Starts listening. Rejects when the port cannot be bound. */
export function listenHttp(app: Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    const onError = (error: Error) => reject(error);
    server.once("error", onError);
    server.once("listening", () => {
      server.off("error", onError);
      resolve(server);
    });
  });
}
