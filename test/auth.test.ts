import { describe, it, expect, beforeEach } from "vitest";
import { TokenStore } from "../src/auth.js";

const MINUTE = 60 * 1000;
const DAY = 24 * 60 * MINUTE;

describe("TokenStore", () => {
  let now: number;
  let store: TokenStore;

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new TokenStore(() => now);
  });

  it("accepts an authorization code exactly once", () => {
    const code = store.issueCode();

    expect(store.consumeCode(code)).toBe(true);
    expect(store.consumeCode(code)).toBe(false);
  });

  it("rejects codes after one minute", () => {
    const code = store.issueCode();
    now += MINUTE + 1;

    expect(store.consumeCode(code)).toBe(false);
  });

  it("rejects unknown codes", () => {
    expect(store.consumeCode("not-a-code")).toBe(false);
  });

  it("issues access tokens valid for thirty days", () => {
    const { token, expiresIn } = store.issueAccessToken();

    expect(expiresIn).toBe(30 * 24 * 60 * 60);
    now += 30 * DAY;
    expect(store.verifyAccessToken(token)).toBe(true);
    now += 1;
    expect(store.verifyAccessToken(token)).toBe(false);
  });

  it("forgets expired tokens when pruning", () => {
    const { token } = store.issueAccessToken();
    now += 31 * DAY;
    store.prune();
    now -= 31 * DAY;

    expect(store.verifyAccessToken(token)).toBe(false);
  });

  it("issues distinct tokens", () => {
    const a = store.issueAccessToken().token;
    const b = store.issueAccessToken().token;

    expect(a).not.toBe(b);
    expect(store.verifyAccessToken(a)).toBe(true);
    expect(store.verifyAccessToken(b)).toBe(true);
  });
});
