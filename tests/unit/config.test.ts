import { describe, expect, test } from "vitest";
import {
  ConfigError,
  applyOverrides,
  loadConfig,
  loadCredentials,
} from "../../src/app/config.js";
import { REQUIRED_ENV } from "../support/fixtures.js";

function captureConfigError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("config", () => {
  test("applies defaults when only the required variables are set", () => {
    const config = loadConfig({ ...REQUIRED_ENV });

    expect(config.server).toEqual({
      name: "telegram-mcp-server",
      version: "0.1.0",
      transport: "stdio",
      host: "0.0.0.0",
      port: 3001,
    });
    expect(config.telegram).toEqual({
      apiId: 12345,
      apiHash: "test-hash",
      sessionString: "test-session",
      timeoutSeconds: 10,
      retryDelaySeconds: 1,
      connectionRetries: 5,
      requestRetries: 5,
    });
    expect(config.observability).toEqual({ logLevel: "info", metricsEnabled: true });
  });

  test("reads optional server and client tuning variables", () => {
    const config = loadConfig({
      ...REQUIRED_ENV,
      TELEGRAM_MCP_TRANSPORT: "sse",
      TELEGRAM_MCP_HOST: "127.0.0.1",
      TELEGRAM_MCP_PORT: "8080",
      TELEGRAM_MCP_SSE_API_KEY: "test-secret",
      TELEGRAM_TIMEOUT: "30",
      TELEGRAM_RETRY_DELAY: "2.5",
      TELEGRAM_CONNECTION_RETRIES: "10",
      TELEGRAM_REQUEST_RETRIES: "3",
      TELEGRAM_MCP_LOG_LEVEL: "debug",
      TELEGRAM_MCP_METRICS: "false",
    });

    expect(config.server.transport).toBe("sse");
    expect(config.server.host).toBe("127.0.0.1");
    expect(config.server.port).toBe(8080);
    expect(config.server.sseApiKey).toBe("test-secret");
    expect(config.telegram.timeoutSeconds).toBe(30);
    expect(config.telegram.retryDelaySeconds).toBe(2.5);
    expect(config.telegram.connectionRetries).toBe(10);
    expect(config.telegram.requestRetries).toBe(3);
    expect(config.observability).toEqual({ logLevel: "debug", metricsEnabled: false });
  });

  test("names every missing required variable", () => {
    const error = captureConfigError(() => loadConfig({}));

    expect(new Set(error.variables)).toEqual(
      new Set(["TELEGRAM_API_ID", "TELEGRAM_API_HASH", "TELEGRAM_SESSION_STRING"]),
    );
    expect(error.message.startsWith("Missing required environment variables:")).toBe(true);
    expect(error.message).toContain("TELEGRAM_SESSION_STRING");
  });

  test("treats blank values as unset", () => {
    const error = captureConfigError(() =>
      loadConfig({ ...REQUIRED_ENV, TELEGRAM_SESSION_STRING: "   " }),
    );

    expect(error.variables).toEqual(["TELEGRAM_SESSION_STRING"]);
    expect(error.message).toBe(
      "Missing required environment variables: TELEGRAM_SESSION_STRING",
    );
  });

  test("reports malformed values as invalid rather than missing", () => {
    const error = captureConfigError(() =>
      loadConfig({ ...REQUIRED_ENV, TELEGRAM_API_ID: "abc", TELEGRAM_MCP_PORT: "70000" }),
    );

    expect(error.variables).toEqual(["TELEGRAM_MCP_PORT", "TELEGRAM_API_ID"]);
    expect(error.message.startsWith("Invalid environment variables: TELEGRAM_MCP_PORT (")).toBe(
      true,
    );
  });

  test("rejects an unknown transport", () => {
    const error = captureConfigError(() =>
      loadConfig({ ...REQUIRED_ENV, TELEGRAM_MCP_TRANSPORT: "http" }),
    );

    expect(error.variables).toEqual(["TELEGRAM_MCP_TRANSPORT"]);
  });

  test("command-line overrides win over the environment", () => {
    const base = loadConfig({ ...REQUIRED_ENV, TELEGRAM_MCP_PORT: "8080" });
    const config = applyOverrides(base, { transport: "sse", port: 9090 });

    expect(config.server.transport).toBe("sse");
    expect(config.server.port).toBe(9090);
    expect(config.server.host).toBe("0.0.0.0");
    expect(base.server.port).toBe(8080);
  });

  test("ignores overrides that were not given", () => {
    const base = loadConfig({ ...REQUIRED_ENV });

    expect(applyOverrides(base, {})).toEqual(base);
  });

  test("loads credentials without a session string", () => {
    expect(
      loadCredentials({ TELEGRAM_API_ID: "12345", TELEGRAM_API_HASH: "test-hash" }),
    ).toEqual({ apiId: 12345, apiHash: "test-hash" });
  });

  test("credential loading still names missing variables", () => {
    const error = captureConfigError(() => loadCredentials({ TELEGRAM_API_ID: "12345" }));

    expect(error.variables).toEqual(["TELEGRAM_API_HASH"]);
  });
});
