import readline from "node:readline/promises";
import { stdin as input, stderr as output } from "node:process";
import { Command } from "commander";
import { z } from "zod";
import { createContainer, type AppContainer } from "../app/container.js";
import {
  applyOverrides,
  loadConfig,
  loadCredentials,
  loadEnvFileIfPresent,
} from "../app/config.js";
import { createLogger } from "../app/logger.js";
import { classifyTelegramError } from "../telegram/errors.js";
import { generateSessionString } from "../telegram/session.js";
import { runSseTransport } from "../transports/sse/run.js";
import { runStdioTransport } from "../transports/stdio/run.js";

const serveOptionsSchema = z.object({
  transport: z.enum(["stdio", "sse"]).optional(),
  host: z.string().min(1).optional(),
  port: z.coerce.number().int().min(0).max(65535).optional(),
  envFile: z.string().min(1).optional(),
});

const envFileOptionsSchema = z.object({
  envFile: z.string().min(1).optional(),
});

interface RunningTransport {
  close(): Promise<void>;
}

// Prompts go to stderr so stdout only carries the session line.
async function promptValue(question: string): Promise<string> {
  const rl = readline.createInterface({ input, output });
  try {
    const result = await rl.question(question);
    return result.trim();
  } finally {
    rl.close();
  }
}

function handleShutdown(
  container: AppContainer,
  transport: RunningTransport,
  stopOnStdinClose: boolean,
): void {
  let stopping = false;
  const stop = (reason: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    container.logger.info({ reason }, "telegram-mcp shutting down");
    void transport
      .close()
      .then(() => container.telegram.disconnect())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          container.logger.error({ err: error }, "shutdown failed");
          process.exit(1);
        },
      );
  };

  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
  if (stopOnStdinClose) {
    process.stdin.once("close", () => stop("stdin closed"));
  }
}

async function serve(rawOptions: unknown): Promise<void> {
  const options = serveOptionsSchema.parse(rawOptions);
  loadEnvFileIfPresent(options.envFile);
  const config = applyOverrides(loadConfig(), {
    transport: options.transport,
    host: options.host,
    port: options.port,
  });
  const logger = createLogger(config);
  const container = createContainer(config, logger);

  try {
    await container.telegram.ensureAuthorized();
  } catch (error) {
    const classified = classifyTelegramError(error);
    logger.fatal(
      { err: error, kind: classified.kind, hint: classified.hint },
      "telegram session check failed",
    );
    await container.telegram.disconnect();
    throw error;
  }

  if (config.server.transport === "stdio") {
    const transport = await runStdioTransport(container);
    handleShutdown(container, transport, true);
    return;
  }
  const transport = await runSseTransport(container);
  handleShutdown(container, transport, false);
}

export function createCli(): Command {
  const cli = new Command();
  cli
    .name("telegram-mcp-server")
    .description("Telegram user-account tools over the Model Context Protocol")
    .version("0.1.0");

  cli
    .command("serve", { isDefault: true })
    .description("Run the MCP server")
    .option("-t, --transport <transport>", "stdio or sse")
    .option("--host <host>", "SSE bind address")
    .option("--port <port>", "SSE port")
    .option("--env-file <path>", "Path to a .env file")
    .action(async (options: unknown) => {
      await serve(options);
    });

  cli
    .command("session")
    .description("Log in interactively and print a session string")
    .option("--env-file <path>", "Path to a .env file")
    .action(async (rawOptions: unknown) => {
      const options = envFileOptionsSchema.parse(rawOptions);
      loadEnvFileIfPresent(options.envFile);
      const credentials = loadCredentials();
      console.log = console.error;
      const sessionString = await generateSessionString({
        credentials,
        prompts: {
          phoneNumber: () => promptValue("Phone number (international format): "),
          phoneCode: () => promptValue("Login code (from Telegram): "),
          password: () => promptValue("2FA password (press enter if not enabled): "),
          onError: (error) => {
            console.error(`Login error: ${error.message}`);
          },
        },
      });
      process.stdout.write(`TELEGRAM_SESSION_STRING=${sessionString}\n`);
    });

  cli
    .command("check")
    .description("Verify configuration and the Telegram session")
    .option("--env-file <path>", "Path to a .env file")
    .action(async (rawOptions: unknown) => {
      const options = envFileOptionsSchema.parse(rawOptions);
      loadEnvFileIfPresent(options.envFile);
      const config = loadConfig();
      const logger = createLogger(config);
      const container = createContainer(config, logger);
      try {
        await container.telegram.ensureAuthorized();
        const me = await container.profileService.getMe();
        process.stdout.write(`${JSON.stringify({ ok: true, me }, null, 2)}\n`);
      } catch (error) {
        const classified = classifyTelegramError(error);
        process.stderr.write(
          `${JSON.stringify(
            { ok: false, error: { kind: classified.kind, message: classified.message, hint: classified.hint } },
            null,
            2,
          )}\n`,
        );
        process.exitCode = 1;
      } finally {
        await container.telegram.disconnect();
      }
    });

  return cli;
}
