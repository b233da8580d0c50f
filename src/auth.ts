import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import crypto from "crypto";
import { z } from "zod";

const CODE_TTL_MS = 60 * 1000;
const TOKEN_TTL_MS = 30 * 24 * 60 * 60 * 1000;

export interface AuthOptions {
  password: string;
  clientSecret: string;
  now?: () => number;
}

/**
 * In-memory authorization codes and access tokens (fine for a single
 * instance). Expired entries are pruned whenever something is issued.
 */
export class TokenStore {
  private readonly authCodes = new Map<string, number>();
  private readonly accessTokens = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  issueCode(): string {
    this.prune();
    const code = crypto.randomUUID();
    this.authCodes.set(code, this.now() + CODE_TTL_MS);
    return code;
  }

  /** Codes are single use: a code is removed whether or not it was still valid. */
  consumeCode(code: string): boolean {
    const expires = this.authCodes.get(code);
    this.authCodes.delete(code);
    return expires !== undefined && expires >= this.now();
  }

  issueAccessToken(): { token: string; expiresIn: number } {
    this.prune();
    const token = crypto.randomUUID();
    this.accessTokens.set(token, this.now() + TOKEN_TTL_MS);
    return { token, expiresIn: TOKEN_TTL_MS / 1000 };
  }

  verifyAccessToken(token: string): boolean {
    const expires = this.accessTokens.get(token);
    if (expires === undefined) return false;
    if (expires < this.now()) {
      this.accessTokens.delete(token);
      return false;
    }
    return true;
  }

  prune(): void {
    const now = this.now();
    for (const [code, expires] of this.authCodes) {
      if (expires < now) this.authCodes.delete(code);
    }
    for (const [token, expires] of this.accessTokens) {
      if (expires < now) this.accessTokens.delete(token);
    }
  }
}

const authorizeBody = z.object({
  password: z.string(),
  redirect_uri: z.string().url(),
  state: z.string().optional(),
});

const tokenBody = z.object({
  grant_type: z.string().optional(),
  code: z.string(),
  client_secret: z.string(),
});

function safeEqual(a: string, b: string): boolean {
  const ha = crypto.createHash("sha256").update(a).digest();
  const hb = crypto.createHash("sha256").update(b).digest();
  return crypto.timingSafeEqual(ha, hb);
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function queryString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function discoveryDocument(req: Request) {
  const baseUrl = `${req.protocol}://${req.get("host")}`;
  return {
    issuer: baseUrl,
    authorization_endpoint: `${baseUrl}/authorize`,
    token_endpoint: `${baseUrl}/token`,
    response_types_supported: ["code"],
    grant_types_supported: ["authorization_code"],
    token_endpoint_auth_methods_supported: ["client_secret_post"],
  };
}

function loginPage(fields: { redirectUri: string; state: string; clientId: string }): string {
  return `<!DOCTYPE html>
<html>
<head>
  <title>LimeSurvey MCP Login</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; display: flex; justify-content: center; padding-top: 80px; }
    form { width: 320px; }
    input, button { width: 100%; padding: 10px; margin-bottom: 12px; font-size: 16px; box-sizing: border-box; }
  </style>
</head>
<body>
  <form method="POST" action="/authorize">
    <h1>LimeSurvey MCP</h1>
    <p>Enter the server password to authorize access.</p>
    <input type="password" name="password" placeholder="Password" required autofocus>
    <input type="hidden" name="redirect_uri" value="${escapeHtml(fields.redirectUri)}">
    <input type="hidden" name="state" value="${escapeHtml(fields.state)}">
    <input type="hidden" name="client_id" value="${escapeHtml(fields.clientId)}">
    <button type="submit">Authorize</button>
  </form>
</body>
</html>`;
}

export interface Auth {
  router: Router;
  requireAuth: RequestHandler;
  store: TokenStore;
}

/**
 * Minimal OAuth authorization-code flow guarded by a single shared password,
 * enough for MCP clients that insist on OAuth before talking to /mcp.
 */
export function createAuth(options: AuthOptions): Auth {
  const store = new TokenStore(options.now);
  const router = Router();

  router.get("/.well-known/oauth-authorization-server", (req, res) => {
    res.json(discoveryDocument(req));
  });

  // Also support the OpenID Connect discovery path
  router.get("/.well-known/openid-configuration", (req, res) => {
    res.json(discoveryDocument(req));
  });

  router.get("/authorize", (req, res) => {
    res.type("html").send(
      loginPage({
        redirectUri: queryString(req.query.redirect_uri),
        state: queryString(req.query.state),
        clientId: queryString(req.query.client_id),
      })
    );
  });

  router.post("/authorize", (req, res) => {
    const body = authorizeBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).type("html").send("<h1>Invalid authorization request</h1>");
      return;
    }
    if (!safeEqual(body.data.password, options.password)) {
      res.status(401).type("html").send('<h1>Wrong password</h1><p><a href="javascript:history.back()">Try again</a></p>');
      return;
    }

    const redirectUrl = new URL(body.data.redirect_uri);
    redirectUrl.searchParams.set("code", store.issueCode());
    if (body.data.state) redirectUrl.searchParams.set("state", body.data.state);
    res.redirect(redirectUrl.toString());
  });

  router.post("/token", (req, res) => {
    const body = tokenBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "invalid_request" });
      return;
    }
    if (body.data.grant_type !== undefined && body.data.grant_type !== "authorization_code") {
      res.status(400).json({ error: "unsupported_grant_type" });
      return;
    }
    if (!safeEqual(body.data.client_secret, options.clientSecret)) {
      res.status(401).json({ error: "invalid_client" });
      return;
    }
    if (!store.consumeCode(body.data.code)) {
      res.status(400).json({ error: "invalid_grant" });
      return;
    }

    const { token, expiresIn } = store.issueAccessToken();
    res.json({ access_token: token, token_type: "bearer", expires_in: expiresIn });
  });

  const requireAuth = (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader?.startsWith("Bearer ")) {
      res.status(401).json({ error: "Missing authorization header" });
      return;
    }
    if (!store.verifyAccessToken(authHeader.slice("Bearer ".length))) {
      res.status(401).json({ error: "Invalid or expired token" });
      return;
    }
    next();
  };

  return { router, requireAuth, store };
}
