import type pino from "pino";
import type { TelegramClient } from "telegram";
import type { AppConfig } from "../app/config.js";
import type { AppMetrics } from "../app/logger.js";
import { classifyTelegramError, operationError } from "./errors.js";

export type TelegramModule = typeof import("telegram");

/** The client surface the services use; gramjs clients satisfy it as-is. */
export type TelegramClientLike = Pick<
  TelegramClient,
  | "connected"
  | "connect"
  | "checkAuthorization"
  | "destroy"
  | "getEntity"
  | "getMe"
  | "getMessages"
  | "getDialogs"
  | "getParticipants"
  | "sendMessage"
  | "editMessage"
  | "deleteMessages"
  | "forwardMessages"
  | "pinMessage"
  | "unpinMessage"
  | "markAsRead"
  | "invoke"
>;

export interface GramJsModule {
  Api: TelegramModule["Api"];
  helpers: TelegramModule["helpers"];
  sessions: TelegramModule["sessions"];
  TelegramClient: new (
    ...args: ConstructorParameters<TelegramModule["TelegramClient"]>
  ) => TelegramClientLike;
}

export interface ClientTaskArgs {
  client: TelegramClientLike;
  gram: GramJsModule;
}

export interface ClientStatus {
  connected: boolean;
  authorized: boolean | null;
}

let gramJsPromise: Promise<TelegramModule> | null = null;

export async function loadGramJs(): Promise<TelegramModule> {
  if (!gramJsPromise) {
    gramJsPromise = import("telegram");
  }
  return gramJsPromise;
}

/**
 * Holds the process-wide Telegram client. The session always comes from the
 * configured session string; nothing is persisted locally.
 */
export class TelegramClientContext {
  private clientPromise: Promise<ClientTaskArgs> | null = null;
  private current: ClientTaskArgs | null = null;
  private authorized: boolean | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly logger: pino.Logger,
    private readonly metrics: AppMetrics | null,
    private readonly loadModule: () => Promise<GramJsModule> = loadGramJs,
  ) {}

  /** Reads the live connection flag, so a dropped link reports as disconnected. */
  status(): ClientStatus {
    return {
      connected: this.current?.client.connected === true,
      authorized: this.authorized,
    };
  }

  /** Concurrent callers share one connection attempt; a failed one is forgotten. */
  connect(): Promise<ClientTaskArgs> {
    if (!this.clientPromise) {
      const attempt: Promise<ClientTaskArgs> = this.openClient().catch(
        (error: unknown) => {
          if (this.clientPromise === attempt) {
            this.clientPromise = null;
          }
          throw error;
        },
      );
      this.clientPromise = attempt;
    }
    return this.clientPromise;
  }

  async ensureAuthorized(): Promise<void> {
    const { client } = await this.connect();
    const authorized = await client.checkAuthorization();
    this.authorized = authorized;
    if (!authorized) {
      throw operationError(
        "invalid_session",
        "Telegram session is not authorized",
      );
    }
  }

  async withClient<T>(
    domain: string,
    operation: string,
    task: (args: ClientTaskArgs) => Promise<T>,
    metadata?: Record<string, unknown>,
  ): Promise<T> {
    const startedAt = Date.now();
    const label = `${domain}.${operation}`;
    try {
      const args = await this.connect();
      const result = await task(args);
      this.metrics?.telegramApiLatencyMs.observe(
        { operation: label, status: "ok" },
        Date.now() - startedAt,
      );
      return result;
    } catch (error) {
      const classified = classifyTelegramError(error);
      this.metrics?.telegramApiLatencyMs.observe(
        { operation: label, status: "error" },
        Date.now() - startedAt,
      );
      this.metrics?.telegramApiErrors.inc({ operation: label, kind: classified.kind });
      if (classified.kind === "invalid_session") {
        this.authorized = false;
      }
      this.logger.debug(
        { err: error, domain, operation, kind: classified.kind, ...metadata },
        "telegram operation failed",
      );
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    const pending = this.clientPromise;
    this.clientPromise = null;
    if (!pending) {
      return;
    }
    try {
      const { client } = await pending;
      this.current = null;
      await client.destroy();
      this.logger.info("telegram client disconnected");
    } catch (error) {
      this.logger.debug({ err: error }, "telegram client was not connected");
    }
  }

  private async openClient(): Promise<ClientTaskArgs> {
    const gram = await this.loadModule();
    const telegram = this.config.telegram;
    const client = new gram.TelegramClient(
      new gram.sessions.StringSession(telegram.sessionString),
      telegram.apiId,
      telegram.apiHash,
      {
        connectionRetries: telegram.connectionRetries,
        requestRetries: telegram.requestRetries,
        retryDelay: Math.round(telegram.retryDelaySeconds * 1000),
        timeout: telegram.timeoutSeconds,
        autoReconnect: true,
      },
    );

    try {
      await client.connect();
    } catch (error) {
      const classified = classifyTelegramError(error);
      this.logger.error(
        { err: error, kind: classified.kind },
        "telegram client failed to connect",
      );
      await client.destroy().catch((destroyError: unknown) => {
        this.logger.debug({ err: destroyError }, "telegram client cleanup failed");
      });
      throw error;
    }

    const args: ClientTaskArgs = { client, gram };
    this.current = args;
    this.logger.info(
      {
        connectionRetries: telegram.connectionRetries,
        timeoutSeconds: telegram.timeoutSeconds,
      },
      "telegram client connected",
    );
    return args;
  }
}
