import { z } from "zod";
import type { FetchLike } from "../../src/limesurvey/client.js";

export type Handler = (params: unknown[]) => unknown;

export interface RecordedCall {
  method: string;
  params: unknown[];
  id: unknown;
}

/** Returned from a handler to make the fake answer with a JSON-RPC error. */
export class RpcFailure {
  constructor(readonly message: string) {}
}

const requestSchema = z.object({
  method: z.string(),
  params: z.array(z.unknown()),
  id: z.unknown(),
});

export const TEST_USER = "test-user";
export const TEST_PASSWORD = "test-secret";
export const SESSION_KEY = "test-session-key";

/**
 * In-process stand-in for a LimeSurvey RemoteControl endpoint. Plug its
 * `fetch` into a LimeSurveyClient and register handlers per RPC method.
 */
export class FakeRemoteControl {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, Handler>();

  constructor() {
    this.on("get_session_key", ([username, password]) =>
      username === TEST_USER && password === TEST_PASSWORD
        ? SESSION_KEY
        : { status: "Invalid user name or password" }
    );
    this.on("release_session_key", () => "OK");
  }

  on(method: string, handler: Handler): this {
    this.handlers.set(method, handler);
    return this;
  }

  /** RPC methods called, without the session bookkeeping. */
  methods(): string[] {
    return this.calls
      .map((c) => c.method)
      .filter((m) => m !== "get_session_key" && m !== "release_session_key");
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  readonly fetch: FetchLike = async (_url, init) => {
    const raw = typeof init.body === "string" ? init.body : "";
    const request = requestSchema.parse(JSON.parse(raw));
    this.calls.push({ method: request.method, params: request.params, id: request.id });

    const handler = this.handlers.get(request.method);
    const result = handler ? handler(request.params) : new RpcFailure(`No handler for ${request.method}`);
    const body =
      result instanceof RpcFailure
        ? { id: request.id, result: null, error: result.message }
        : { id: request.id, result, error: null };

    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { "Content-Type": "application/json" },
    });
  };
}
