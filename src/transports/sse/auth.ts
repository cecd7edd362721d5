import { createHash, timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import type { AppContainer } from "../../app/container.js";

export type AuthFailureReason = "missing_token" | "invalid_token";

export function jsonRpcError(res: Response, status: number, message: string, code = -32000): void {
  res.status(status).json({
    jsonrpc: "2.0",
    error: {
      code,
      message,
    },
    id: null,
  });
}

/** Returns the token of an `Authorization: Bearer <token>` header; the scheme is case-insensitive. */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^bearer\s+(.+)$/i.exec(header.trim());
  const token = match?.[1]?.trim();
  return token ? token : null;
}

// Digests have equal length, so the comparison time does not depend on the key length either.
export function tokensMatch(expected: string, provided: string): boolean {
  const left = createHash("sha256").update(expected, "utf8").digest();
  const right = createHash("sha256").update(provided, "utf8").digest();
  return timingSafeEqual(left, right);
}

export function checkBearer(
  expected: string,
  header: string | undefined,
): { ok: true } | { ok: false; reason: AuthFailureReason } {
  const token = extractBearerToken(header);
  if (token === null) {
    return { ok: false, reason: "missing_token" };
  }
  if (!tokensMatch(expected, token)) {
    return { ok: false, reason: "invalid_token" };
  }
  return { ok: true };
}

export function createBearerGuard(container: AppContainer): RequestHandler {
  const apiKey = container.config.server.sseApiKey;
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }
    const result = checkBearer(apiKey, req.headers.authorization);
    if (result.ok) {
      next();
      return;
    }
    container.metrics?.authFailures.inc({ reason: result.reason });
    container.logger.warn(
      { method: req.method, path: req.path, reason: result.reason },
      "request denied: auth failed",
    );
    res.setHeader("WWW-Authenticate", 'Bearer realm="telegram-mcp"');
    jsonRpcError(res, 401, "Unauthorized", -32001);
  };
}
