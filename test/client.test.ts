import { describe, it, expect, beforeEach, vi } from "vitest";
import { ReadableStream } from "stream/web";
import { LimeSurveyClient } from "../src/limesurvey/client.js";
import {
  LimeSurveyAuthError,
  LimeSurveyHttpError,
  LimeSurveyResponseError,
  LimeSurveyRpcError,
  LimeSurveyStatusError,
} from "../src/limesurvey/errors.js";
import { FakeRemoteControl, RpcFailure, SESSION_KEY, TEST_PASSWORD, TEST_USER } from "./fakes/remote-control.js";

const ENDPOINT = "https://survey.test/index.php/admin/remotecontrol";

function toBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

describe("LimeSurveyClient", () => {
  let fake: FakeRemoteControl;
  let client: LimeSurveyClient;

  beforeEach(() => {
    fake = new FakeRemoteControl();
    client = new LimeSurveyClient({ url: ENDPOINT, username: TEST_USER, password: TEST_PASSWORD, fetch: fake.fetch });
  });

  describe("session", () => {
    it("authenticates, calls with the session key and releases it", async () => {
      fake.on("list_surveys", () => [{ sid: 123, surveyls_title: "Feedback" }]);

      const surveys = await client.session((s) => s.listSurveys());

      expect(surveys).toEqual([{ sid: 123, surveyls_title: "Feedback" }]);
      expect(fake.calls).toEqual([
        { method: "get_session_key", params: [TEST_USER, TEST_PASSWORD, "Authdb"], id: 1 },
        { method: "list_surveys", params: [SESSION_KEY, null], id: 2 },
        { method: "release_session_key", params: [SESSION_KEY], id: 3 },
      ]);
    });

    it("passes the configured auth plugin", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        authPlugin: "AuthLDAP",
        fetch: fake.fetch,
      });

      await client.session(async () => undefined);

      expect(fake.callsTo("get_session_key")[0]?.params).toEqual([TEST_USER, TEST_PASSWORD, "AuthLDAP"]);
    });

    it("rejects bad credentials without calling anything else", async () => {
      client = new LimeSurveyClient({ url: ENDPOINT, username: TEST_USER, password: "wrong", fetch: fake.fetch });
      const fn = vi.fn(async () => "unreachable");

      const error = await client.session(fn).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyAuthError);
      expect(error).toHaveProperty("message", "get_session_key: Invalid user name or password");
      expect(fn).not.toHaveBeenCalled();
      expect(fake.calls.map((c) => c.method)).toEqual(["get_session_key"]);
    });

    it("releases the key when the callback fails", async () => {
      fake.on("get_survey_properties", () => ({ status: "Error: Invalid survey ID" }));

      const error = await client.session((s) => s.getSurveyProperties(999)).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyStatusError);
      expect(error).toHaveProperty("status", "Error: Invalid survey ID");
      expect(error).toHaveProperty("method", "get_survey_properties");
      expect(fake.callsTo("release_session_key")).toHaveLength(1);
    });

    it("keeps the result when releasing the key fails", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      fake.on("release_session_key", () => new RpcFailure("already released"));
      fake.on("get_site_settings", () => "Test Site");

      await expect(client.session((s) => s.getSiteName())).resolves.toBe("Test Site");
      expect(warn).toHaveBeenCalledWith(
        "Failed to release LimeSurvey session key: release_session_key: already released"
      );
      warn.mockRestore();
    });
  });

  describe("result handling", () => {
    it("maps empty-list statuses to an empty list", async () => {
      fake.on("list_surveys", () => ({ status: "No surveys found" }));
      fake.on("list_questions", () => ({ status: "No questions found" }));

      await expect(client.session((s) => s.listSurveys())).resolves.toEqual([]);
      await expect(client.session((s) => s.listQuestions(5))).resolves.toEqual([]);
    });

    it("raises JSON-RPC errors", async () => {
      fake.on("list_users", () => new RpcFailure("Invalid method"));

      const error = await client.session((s) => s.listUsers()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyRpcError);
      expect(error).toHaveProperty("message", "list_users: Invalid method");
    });

    it("raises HTTP errors with the status", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        fetch: async () => new Response("down", { status: 503, statusText: "Service Unavailable" }),
      });

      const error = await client.call("list_surveys", []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyHttpError);
      expect(error).toHaveProperty("status", 503);
      expect(error).toHaveProperty("message", "list_surveys: HTTP 503 Service Unavailable");
    });

    it("raises network failures as status 0", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        fetch: async () => {
          throw new Error("connect ECONNREFUSED");
        },
      });

      const error = await client.getSessionKey().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyHttpError);
      expect(error).toHaveProperty("status", 0);
      expect(error).toHaveProperty("message", "get_session_key: request failed (connect ECONNREFUSED)");
    });

    it("raises timeouts as status 0", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        timeoutMs: 5,
        fetch: (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init.signal;
            if (signal) signal.addEventListener("abort", () => reject(signal.reason));
          }),
      });

      const error = await client.call("list_surveys", []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyHttpError);
      expect(error).toHaveProperty("status", 0);
      expect(error).toHaveProperty("message", expect.stringMatching(/^list_surveys: request failed \(/));
    });

    it("raises failures while reading the body as status 0", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        fetch: async () =>
          new Response(
            new ReadableStream({
              start(controller) {
                controller.error(new Error("socket hang up"));
              },
            })
          ),
      });

      const error = await client.call("list_surveys", []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyHttpError);
      expect(error).toHaveProperty("status", 0);
      expect(error).toHaveProperty("message", "list_surveys: request failed (socket hang up)");
    });

    it("rejects JSON bodies that are not a reply object", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        fetch: async () => new Response("[1, 2]", { status: 200 }),
      });

      const error = await client.call("list_surveys", []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyResponseError);
      expect(error).toHaveProperty("message", "list_surveys: unexpected response (not a JSON-RPC reply)");
    });

    it("rejects bodies that are not JSON", async () => {
      client = new LimeSurveyClient({
        url: ENDPOINT,
        username: TEST_USER,
        password: TEST_PASSWORD,
        fetch: async () => new Response("<html>Login</html>", { status: 200 }),
      });

      const error = await client.call("list_surveys", []).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyResponseError);
      expect(error).toHaveProperty("message", "list_surveys: unexpected response (body is not JSON)");
    });

    it("rejects results of the wrong shape", async () => {
      fake.on("add_group", () => ({ gid: 3 }));

      const error = await client.session((s) => s.addGroup(1, "Demographics")).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LimeSurveyResponseError);
      expect(error).toHaveProperty("method", "add_group");
    });

    it("accepts invitation progress statuses", async () => {
      const reply = { status: "2 left to send", "17": { name: "Ada", email: "ada@example.test", status: "OK" } };
      fake.on("invite_participants", () => reply);

      await expect(client.session((s) => s.inviteParticipants(5))).resolves.toEqual(reply);
      expect(fake.callsTo("invite_participants")[0]?.params).toEqual([SESSION_KEY, 5, false, true]);
    });

    it("still rejects other invitation statuses", async () => {
      fake.on("invite_participants", () => ({ status: "Error: No candidate tokens" }));

      await expect(client.session((s) => s.inviteParticipants(5, [17]))).rejects.toBeInstanceOf(
        LimeSurveyStatusError
      );
    });
  });

  describe("typed API", () => {
    it("decodes exported responses", async () => {
      fake.on("export_responses", () => toBase64("id,q1\n1,Ja\n"));

      const csv = await client.session((s) => s.exportResponses(42));

      expect(csv).toBe("id,q1\n1,Ja\n");
      expect(fake.callsTo("export_responses")[0]?.params).toEqual([
        SESSION_KEY, 42, "csv", null, "all", "code", "short", null, null, null,
      ]);
    });

    it("decodes HTML statistics but keeps PDF as base64", async () => {
      fake.on("export_statistics", ([, , type]) => toBase64(type === "html" ? "<table></table>" : "%PDF"));

      await expect(client.session((s) => s.exportStatistics(42, "html"))).resolves.toBe("<table></table>");
      await expect(client.session((s) => s.exportStatistics(42, "pdf"))).resolves.toBe(toBase64("%PDF"));
    });

    it("returns the new survey id of a copy", async () => {
      fake.on("copy_survey", () => ({ status: "OK", newsid: "321" }));

      await expect(client.session((s) => s.copySurvey(123, "Copy"))).resolves.toBe(321);
      expect(fake.callsTo("copy_survey")[0]?.params).toEqual([SESSION_KEY, 123, "Copy", null]);
    });

    it("adds several responses in one session", async () => {
      let next = 10;
      fake.on("add_response", () => next++);

      const ids = await client.session((s) => s.addResponses(42, [{ q1: "A" }, { q1: "B" }]));

      expect(ids).toEqual([10, 11]);
      expect(fake.callsTo("get_session_key")).toHaveLength(1);
      expect(fake.methods()).toEqual(["add_response", "add_response"]);
    });

    it("merges the response id into updated data", async () => {
      fake.on("update_response", () => true);

      await expect(client.session((s) => s.updateResponse(42, 3, { q1: "B" }))).resolves.toBe(true);
      expect(fake.callsTo("update_response")[0]?.params).toEqual([SESSION_KEY, 42, { q1: "B", id: 3 }]);
    });

    it("splits the site's language restriction", async () => {
      fake.on("get_site_settings", ([, name]) => (name === "restrictToLanguages" ? "en de  fr" : null));

      await expect(client.session((s) => s.getAvailableLanguages())).resolves.toEqual(["en", "de", "fr"]);
    });

    it("treats an unset language restriction as no restriction", async () => {
      fake.on("get_site_settings", () => null);

      await expect(client.session((s) => s.getAvailableLanguages())).resolves.toEqual([]);
    });

    it("sends quota defaults", async () => {
      fake.on("add_quota", () => 8);

      await client.session((s) => s.addQuota(42, { name: "Women", limit: 100 }));

      expect(fake.callsTo("add_quota")[0]?.params).toEqual([
        SESSION_KEY, 42, "Women", 100, true, "terminate", false, "", "", "",
      ]);
    });

    it("marks imported questions mandatory with Y/N", async () => {
      fake.on("import_question", () => "77");

      await expect(client.session((s) => s.importQuestion(42, 3, "ZGF0YQ==", "lsq", true))).resolves.toBe(77);
      await client.session((s) => s.importQuestion(42, 3, "ZGF0YQ==", "lsq"));

      expect(fake.callsTo("import_question").map((c) => c.params)).toEqual([
        [SESSION_KEY, 42, 3, "ZGF0YQ==", "lsq", "Y"],
        [SESSION_KEY, 42, 3, "ZGF0YQ==", "lsq", "N"],
      ]);
    });

    it("confirms status-only replies", async () => {
      fake.on("delete_survey", () => ({ status: "OK" }));

      await expect(client.session((s) => s.deleteSurvey(42))).resolves.toBe(true);
    });
  });
});
