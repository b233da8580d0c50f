import { z } from "zod";
import {
  LimeSurveyAuthError,
  LimeSurveyHttpError,
  LimeSurveyResponseError,
  LimeSurveyRpcError,
  LimeSurveyStatusError,
} from "./errors.js";
import { LimeSurveySession } from "./session.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface LimeSurveyClientOptions {
  url: string;
  username: string;
  password: string;
  authPlugin?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export interface InvokeOptions<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  // Status replies that mean "nothing there" rather than failure.
  empty?: { statuses: readonly string[]; value: T };
  acceptStatus?: (status: string) => boolean;
}

const rpcEnvelopeSchema = z.object({
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown(),
  error: z.unknown(),
});

const sessionKeySchema = z.union([z.string().min(1), z.object({ status: z.string() })]);

function statusOf(result: unknown): string | undefined {
  if (result === null || typeof result !== "object" || Array.isArray(result)) {
    return undefined;
  }
  const status: unknown = Reflect.get(result, "status");
  return typeof status === "string" ? status : undefined;
}

function describeRpcError(error: unknown): string {
  if (typeof error === "string") return error;
  if (error && typeof error === "object") {
    const message: unknown = Reflect.get(error, "message");
    if (typeof message === "string") return message;
  }
  return JSON.stringify(error);
}

function requestFailed(method: string, err: unknown): LimeSurveyHttpError {
  const message = err instanceof Error ? err.message : String(err);
  return new LimeSurveyHttpError(method, 0, `${method}: request failed (${message})`, { cause: err });
}

/**
 * JSON-RPC client for LimeSurvey's RemoteControl 2 API.
 *
 * The client holds credentials only. Every unit of work runs inside
 * {@link LimeSurveyClient.session}, which obtains a session key, hands a
 * {@link LimeSurveySession} to the callback and releases the key afterwards.
 */
export class LimeSurveyClient {
  private readonly url: string;
  private readonly username: string;
  private readonly password: string;
  private readonly authPlugin: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private nextId = 1;

  constructor(options: LimeSurveyClientOptions) {
    this.url = options.url;
    this.username = options.username;
    this.password = options.password;
    this.authPlugin = options.authPlugin ?? "Authdb";
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /** Sends one RPC and returns its raw `result`. */
  async call(method: string, params: unknown[]): Promise<unknown> {
    const id = this.nextId++;
    let res: Response;
    try {
      res = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({ method, params, id }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw requestFailed(method, err);
    }

    if (!res.ok) {
      throw new LimeSurveyHttpError(method, res.status, `${method}: HTTP ${res.status} ${res.statusText}`.trim());
    }

    // The timeout signal still covers the body, so reading it can fail too.
    let raw: string;
    try {
      raw = await res.text();
    } catch (err) {
      throw requestFailed(method, err);
    }
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err) {
      throw new LimeSurveyResponseError(method, "body is not JSON", { cause: err });
    }

    const envelope = rpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new LimeSurveyResponseError(method, "not a JSON-RPC reply", { cause: envelope.error });
    }
    if (envelope.data.error !== null && envelope.data.error !== undefined) {
      throw new LimeSurveyRpcError(method, describeRpcError(envelope.data.error));
    }
    return envelope.data.result;
  }

  /** Sends one RPC and maps status replies and the result shape. */
  async invoke<T>(method: string, params: unknown[], options: InvokeOptions<T>): Promise<T> {
    const result = await this.call(method, params);

    const status = statusOf(result);
    if (status !== undefined) {
      if (options.empty?.statuses.includes(status)) {
        return options.empty.value;
      }
      if (status !== "OK" && !options.acceptStatus?.(status)) {
        throw new LimeSurveyStatusError(method, status);
      }
    }

    const parsed = options.schema.safeParse(result);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new LimeSurveyResponseError(method, `${issue?.message ?? "invalid"}${where}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async getSessionKey(): Promise<string> {
    const result = await this.call("get_session_key", [this.username, this.password, this.authPlugin]);
    const parsed = sessionKeySchema.safeParse(result);
    if (!parsed.success) {
      throw new LimeSurveyResponseError("get_session_key", "expected a session key", { cause: parsed.error });
    }
    if (typeof parsed.data !== "string") {
      throw new LimeSurveyAuthError(parsed.data.status);
    }
    return parsed.data;
  }

  async releaseSessionKey(key: string): Promise<void> {
    await this.call("release_session_key", [key]);
  }

  /**
   * Runs `fn` with a fresh session. The key is released whether `fn`
   * resolves or throws; a failed release is logged and otherwise ignored.
   */
  async session<T>(fn: (session: LimeSurveySession) => Promise<T>): Promise<T> {
    const key = await this.getSessionKey();
    try {
      return await fn(new LimeSurveySession(this, key));
    } finally {
      try {
        await this.releaseSessionKey(key);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`Failed to release LimeSurvey session key: ${message}`);
      }
    }
  }
}
