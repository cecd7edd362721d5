import type { CallToolResult, ToolAnnotations } from "@modelcontextprotocol/sdk/types.js";
import * as z from "zod/v4";
import type { AppContainer } from "../app/container.js";
import { classifyTelegramError } from "../telegram/errors.js";

export const entityInputSchema = z
  .union([z.string().min(1), z.number().int()])
  .describe("Chat or user id, @username, or 'me'");

export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  openWorldHint: true,
};

export const WRITES: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  openWorldHint: true,
};

export const DESTRUCTIVE: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: true,
  openWorldHint: true,
};

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toolResult(payload: unknown): CallToolResult {
  const text = JSON.stringify(payload, jsonReplacer, 2) ?? "null";
  const structured: unknown = JSON.parse(text);
  return {
    content: [{ type: "text", text }],
    structuredContent: isRecord(structured) ? structured : { value: structured },
  };
}

export function toolErrorResult(tool: string, error: unknown): CallToolResult {
  const classified = classifyTelegramError(error);
  const body = {
    ok: false,
    tool,
    error: {
      kind: classified.kind,
      message: classified.message,
      hint: classified.hint,
      retryAfterSeconds: classified.retryAfterSeconds,
    },
  };
  return {
    content: [{ type: "text", text: JSON.stringify(body, null, 2) }],
    isError: true,
  };
}

/** Runs one tool call; failures come back as tool errors, never as thrown exceptions. */
export async function runTool(
  container: AppContainer,
  tool: string,
  task: () => Promise<unknown>,
): Promise<CallToolResult> {
  const startedAt = Date.now();
  try {
    const payload = await task();
    container.metrics?.toolCalls.inc({ tool, status: "ok" });
    container.logger.debug({ tool, durationMs: Date.now() - startedAt }, "tool call completed");
    return toolResult(payload);
  } catch (error) {
    const result = toolErrorResult(tool, error);
    container.metrics?.toolCalls.inc({ tool, status: "error" });
    container.logger.error(
      { err: error, tool, durationMs: Date.now() - startedAt },
      "tool call failed",
    );
    return result;
  }
}
