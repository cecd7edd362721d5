import pino from "pino";
import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";
import type { AppConfig } from "./config.js";

export interface AppMetrics {
  registry: Registry;
  authFailures: Counter<"reason">;
  toolCalls: Counter<"tool" | "status">;
  telegramApiLatencyMs: Histogram<"operation" | "status">;
  telegramApiErrors: Counter<"operation" | "kind">;
  sseSessions: Gauge;
}

// stdout belongs to the stdio transport, so logs always go to stderr.
export function createLogger(
  config: AppConfig,
  destination: pino.DestinationStream = pino.destination(2),
) {
  return pino(
    {
      level: config.observability.logLevel,
      redact: {
        paths: [
          "req.headers.authorization",
          "sessionString",
          "apiHash",
          "apiKey",
          "*.sessionString",
          "*.apiHash",
          "*.sseApiKey",
        ],
        remove: true,
      },
      base: {
        service: config.server.name,
        env: process.env.NODE_ENV ?? "development",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
}

export function createMetrics(enabled: boolean): AppMetrics | null {
  if (!enabled) {
    return null;
  }

  const registry = new Registry();
  collectDefaultMetrics({ register: registry });

  const authFailures = new Counter({
    name: "telegram_mcp_auth_failures_total",
    help: "Total number of rejected SSE requests",
    labelNames: ["reason"] as const,
    registers: [registry],
  });

  const toolCalls = new Counter({
    name: "telegram_mcp_tool_calls_total",
    help: "Total MCP tool invocations by outcome",
    labelNames: ["tool", "status"] as const,
    registers: [registry],
  });

  const telegramApiLatencyMs = new Histogram({
    name: "telegram_mcp_telegram_api_latency_ms",
    help: "Latency of Telegram client operations in milliseconds",
    labelNames: ["operation", "status"] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 3000, 10000],
    registers: [registry],
  });

  const telegramApiErrors = new Counter({
    name: "telegram_mcp_telegram_api_errors_total",
    help: "Total Telegram client errors by classified kind",
    labelNames: ["operation", "kind"] as const,
    registers: [registry],
  });

  const sseSessions = new Gauge({
    name: "telegram_mcp_sse_sessions",
    help: "Currently open SSE sessions",
    registers: [registry],
  });

  return {
    registry,
    authFailures,
    toolCalls,
    telegramApiLatencyMs,
    telegramApiErrors,
    sseSessions,
  };
}
