import { describe, expect, test } from "vitest";
import {
  checkBearer,
  extractBearerToken,
  tokensMatch,
} from "../../src/transports/sse/auth.js";

describe("bearer auth", () => {
  test("extracts the token with a case-insensitive scheme", () => {
    expect(extractBearerToken("Bearer test-secret")).toBe("test-secret");
    expect(extractBearerToken("bearer   test-secret ")).toBe("test-secret");
    expect(extractBearerToken("BEARER test-secret")).toBe("test-secret");
  });

  test("ignores other schemes and empty headers", () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken("")).toBeNull();
    expect(extractBearerToken("Basic dXNlcjpwYXNz")).toBeNull();
    expect(extractBearerToken("Bearer")).toBeNull();
  });

  test("compares tokens of any length", () => {
    expect(tokensMatch("test-secret", "test-secret")).toBe(true);
    expect(tokensMatch("test-secret", "test-secre")).toBe(false);
    expect(tokensMatch("test-secret", "test-secret-but-longer")).toBe(false);
  });

  test("reports why a request was refused", () => {
    expect(checkBearer("test-secret", "Bearer test-secret")).toEqual({ ok: true });
    expect(checkBearer("test-secret", undefined)).toEqual({ ok: false, reason: "missing_token" });
    expect(checkBearer("test-secret", "Bearer wrong")).toEqual({
      ok: false,
      reason: "invalid_token",
    });
  });
});
