import pino from "pino";
import {
  createContainer,
  type AppContainer,
  type ContainerOptions,
} from "../../src/app/container.js";
import type { AppConfig } from "../../src/app/config.js";

export const REQUIRED_ENV = {
  TELEGRAM_API_ID: "12345",
  TELEGRAM_API_HASH: "test-hash",
  TELEGRAM_SESSION_STRING: "test-session",
};

// Version "1", then dc id, address length, address, port and a placeholder key,
// so the client library can parse it without a network.
export const TEST_SESSION_STRING = `1${Buffer.concat([
  Buffer.from([2, 0, 9]),
  Buffer.from("127.0.0.1", "utf8"),
  Buffer.from([1, 187]),
  Buffer.from("test-key", "utf8"),
]).toString("base64")}`;

export function testConfig(server: Partial<AppConfig["server"]> = {}): AppConfig {
  return {
    server: {
      name: "telegram-mcp-server",
      version: "0.1.0",
      transport: "stdio",
      host: "127.0.0.1",
      port: 0,
      ...server,
    },
    telegram: {
      apiId: 12345,
      apiHash: "test-hash",
      sessionString: TEST_SESSION_STRING,
      timeoutSeconds: 10,
      retryDelaySeconds: 1,
      connectionRetries: 5,
      requestRetries: 5,
    },
    observability: {
      logLevel: "silent",
      metricsEnabled: true,
    },
  };
}

/**
 * Without a `loadModule` the Telegram client is never connected and tests stub
 * the services; with one, the services run against that module's client.
 */
export function testContainer(
  server: Partial<AppConfig["server"]> = {},
  options: ContainerOptions = {},
): AppContainer {
  const config = testConfig(server);
  return createContainer(config, pino({ level: "silent" }), options);
}
