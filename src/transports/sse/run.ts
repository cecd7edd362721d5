import type { Server } from "node:http";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { createMcpExpressApp } from "@modelcontextprotocol/sdk/server/express.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import type { Express, Request, Response } from "express";
import type { AppContainer } from "../../app/container.js";
import { buildMcpServer } from "../../mcp/server.js";
import { createBearerGuard, jsonRpcError } from "./auth.js";

export const SSE_PATH = "/sse";
export const MESSAGES_PATH = "/messages";

interface SseSession {
  transport: SSEServerTransport;
  server: McpServer;
}

export interface SseApp {
  app: Express;
  closeSessions(): Promise<void>;
}

export interface SseHandle {
  port: number;
  close(): Promise<void>;
}

function sessionIdFrom(req: Request): string | null {
  const candidate = req.query.sessionId ?? req.query.session_id;
  return typeof candidate === "string" && candidate.length > 0 ? candidate : null;
}

export function createSseApp(container: AppContainer): SseApp {
  const { config, logger, metrics } = container;
  const sessions = new Map<string, SseSession>();
  const app = createMcpExpressApp({ host: config.server.host });
  const requireApiKey = createBearerGuard(container);

  async function closeSession(sessionId: string): Promise<void> {
    const session = sessions.get(sessionId);
    if (!session) {
      return;
    }
    sessions.delete(sessionId);
    metrics?.sseSessions.dec();
    try {
      await session.server.close();
    } catch (error) {
      logger.warn({ err: error, sessionId }, "failed to close sse session");
    }
  }

  app.use((req, _res, next) => {
    logger.info(
      {
        method: req.method,
        path: req.path,
        correlationId: req.headers["x-correlation-id"],
      },
      "http request",
    );
    next();
  });

  app.get("/health", (_req, res) => {
    res.status(200).json({
      ok: true,
      service: config.server.name,
      version: config.server.version,
      transport: "sse",
      sessions: sessions.size,
    });
  });

  app.get("/ready", (_req, res) => {
    const status = container.telegram.status();
    const ready = status.connected && status.authorized === true;
    res.status(ready ? 200 : 503).json({ ok: ready, ...status });
  });

  app.get("/metrics", async (_req, res) => {
    if (!metrics) {
      res.status(404).json({ error: "metrics disabled" });
      return;
    }
    res.setHeader("content-type", metrics.registry.contentType);
    res.status(200).send(await metrics.registry.metrics());
  });

  app.get(SSE_PATH, requireApiKey, async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    const server = buildMcpServer(container);
    const sessionId = transport.sessionId;
    sessions.set(sessionId, { transport, server });
    metrics?.sseSessions.inc();

    res.on("close", () => {
      closeSession(sessionId).catch((error: unknown) => {
        logger.warn({ err: error, sessionId }, "sse session cleanup failed");
      });
    });

    try {
      await server.connect(transport);
      logger.info({ sessionId }, "sse session opened");
    } catch (error) {
      logger.error({ err: error, sessionId }, "failed to open sse session");
      await closeSession(sessionId);
      if (!res.headersSent) {
        jsonRpcError(res, 500, "Internal server error", -32603);
      }
    }
  });

  app.post(MESSAGES_PATH, requireApiKey, async (req: Request, res: Response) => {
    const sessionId = sessionIdFrom(req);
    if (!sessionId) {
      jsonRpcError(res, 400, "Missing sessionId query parameter");
      return;
    }
    const session = sessions.get(sessionId);
    if (!session) {
      jsonRpcError(res, 404, `Unknown session: ${sessionId}`);
      return;
    }
    try {
      await session.transport.handlePostMessage(req, res, req.body);
    } catch (error) {
      logger.error({ err: error, sessionId }, "failed to handle mcp message");
      if (!res.headersSent) {
        jsonRpcError(res, 500, "Internal server error", -32603);
      }
    }
  });

  return {
    app,
    closeSessions: async () => {
      await Promise.all([...sessions.keys()].map((sessionId) => closeSession(sessionId)));
    },
  };
}

function closeListener(listener: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    listener.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    listener.closeAllConnections();
  });
}

export async function runSseTransport(container: AppContainer): Promise<SseHandle> {
  const { host, port, sseApiKey } = container.config.server;
  const sseApp = createSseApp(container);

  const listener = await new Promise<Server>((resolve, reject) => {
    const server = sseApp.app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(server);
    });
    server.on("error", reject);
  });

  const address = listener.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;

  if (!sseApiKey) {
    container.logger.warn(
      { host, port: boundPort },
      "TELEGRAM_MCP_SSE_API_KEY is not set; the SSE endpoint accepts unauthenticated clients",
    );
  }
  container.logger.info(
    { host, port: boundPort, auth: Boolean(sseApiKey) },
    "telegram-mcp sse transport started",
  );

  return {
    port: boundPort,
    close: async () => {
      await sseApp.closeSessions();
      await closeListener(listener);
      container.logger.info("telegram-mcp sse transport stopped");
    },
  };
}
