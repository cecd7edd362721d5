import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";

export const DEFAULT_ENV_FILE = ".env";

const booleanFromEnv = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const serverSchema = z.object({
  name: z.string().min(1).default("telegram-mcp-server"),
  version: z.string().min(1).default("0.1.0"),
  transport: z.enum(["stdio", "sse"]).default("stdio"),
  host: z.string().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().min(0).max(65535).default(3001),
  sseApiKey: z.string().min(1).optional(),
});

const telegramSchema = z.object({
  apiId: z.coerce.number().int().positive(),
  apiHash: z.string().min(1),
  sessionString: z.string().min(1),
  timeoutSeconds: z.coerce.number().positive().default(10),
  retryDelaySeconds: z.coerce.number().min(0).default(1),
  connectionRetries: z.coerce.number().int().min(0).max(100).default(5),
  requestRetries: z.coerce.number().int().min(0).max(100).default(5),
});

const observabilitySchema = z.object({
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  metricsEnabled: booleanFromEnv.default(true),
});

export const configSchema = z.object({
  server: serverSchema,
  telegram: telegramSchema,
  observability: observabilitySchema,
});

export type AppConfig = z.infer<typeof configSchema>;
export type TransportKind = AppConfig["server"]["transport"];

const credentialsSchema = telegramSchema.pick({ apiId: true, apiHash: true });
export type TelegramCredentials = z.infer<typeof credentialsSchema>;

/**
 * Environment variable backing each config field. Also used to translate
 * validation issues back into the names operators actually set.
 */
export const ENV_BINDINGS = {
  "server.transport": "TELEGRAM_MCP_TRANSPORT",
  "server.host": "TELEGRAM_MCP_HOST",
  "server.port": "TELEGRAM_MCP_PORT",
  "server.sseApiKey": "TELEGRAM_MCP_SSE_API_KEY",
  "telegram.apiId": "TELEGRAM_API_ID",
  "telegram.apiHash": "TELEGRAM_API_HASH",
  "telegram.sessionString": "TELEGRAM_SESSION_STRING",
  "telegram.timeoutSeconds": "TELEGRAM_TIMEOUT",
  "telegram.retryDelaySeconds": "TELEGRAM_RETRY_DELAY",
  "telegram.connectionRetries": "TELEGRAM_CONNECTION_RETRIES",
  "telegram.requestRetries": "TELEGRAM_REQUEST_RETRIES",
  "observability.logLevel": "TELEGRAM_MCP_LOG_LEVEL",
  "observability.metricsEnabled": "TELEGRAM_MCP_METRICS",
} as const;

type ConfigPath = keyof typeof ENV_BINDINGS;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly variables: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(env: NodeJS.ProcessEnv, path: ConfigPath): string | undefined {
  const value = env[ENV_BINDINGS[path]];
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isConfigPath(value: string): value is ConfigPath {
  return value in ENV_BINDINGS;
}

function toConfigError(
  error: z.ZodError,
  env: NodeJS.ProcessEnv,
): ConfigError {
  const missing: string[] = [];
  const invalid: string[] = [];
  const details: string[] = [];
  for (const issue of error.issues) {
    const path = issue.path.map(String).join(".");
    const variable = isConfigPath(path) ? ENV_BINDINGS[path] : path;
    if (isConfigPath(path) && readEnv(env, path) === undefined) {
      missing.push(variable);
      continue;
    }
    invalid.push(variable);
    details.push(`${variable} (${issue.message})`);
  }

  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(`Missing required environment variables: ${missing.join(", ")}`);
  }
  if (invalid.length > 0) {
    parts.push(`Invalid environment variables: ${details.join(", ")}`);
  }
  return new ConfigError(parts.join(". "), [...missing, ...invalid]);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const candidate = {
    server: {
      transport: readEnv(env, "server.transport"),
      host: readEnv(env, "server.host"),
      port: readEnv(env, "server.port"),
      sseApiKey: readEnv(env, "server.sseApiKey"),
    },
    telegram: {
      apiId: readEnv(env, "telegram.apiId"),
      apiHash: readEnv(env, "telegram.apiHash"),
      sessionString: readEnv(env, "telegram.sessionString"),
      timeoutSeconds: readEnv(env, "telegram.timeoutSeconds"),
      retryDelaySeconds: readEnv(env, "telegram.retryDelaySeconds"),
      connectionRetries: readEnv(env, "telegram.connectionRetries"),
      requestRetries: readEnv(env, "telegram.requestRetries"),
    },
    observability: {
      logLevel: readEnv(env, "observability.logLevel"),
      metricsEnabled: readEnv(env, "observability.metricsEnabled"),
    },
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw toConfigError(parsed.error, env);
  }
  return parsed.data;
}

/** API id and hash only; the session generator runs before a session exists. */
export function loadCredentials(
  env: NodeJS.ProcessEnv = process.env,
): TelegramCredentials {
  const parsed = z.object({ telegram: credentialsSchema }).safeParse({
    telegram: {
      apiId: readEnv(env, "telegram.apiId"),
      apiHash: readEnv(env, "telegram.apiHash"),
    },
  });
  if (!parsed.success) {
    throw toConfigError(parsed.error, env);
  }
  return parsed.data.telegram;
}

export interface ConfigOverrides {
  transport?: TransportKind;
  host?: string;
  port?: number;
}

export function applyOverrides(
  config: AppConfig,
  overrides: ConfigOverrides,
): AppConfig {
  return {
    ...config,
    server: {
      ...config.server,
      ...(overrides.transport ? { transport: overrides.transport } : {}),
      ...(overrides.host ? { host: overrides.host } : {}),
      ...(overrides.port !== undefined && Number.isInteger(overrides.port)
        ? { port: overrides.port }
        : {}),
    },
  };
}

export interface LoadEnvFileResult {
  path: string;
  loaded: boolean;
}

/**
 * Applies a dotenv-style file to `env` without overriding variables that are
 * already set. An explicitly requested file must exist.
 */
export function loadEnvFileIfPresent(
  envFilePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): LoadEnvFileResult {
  const explicit = envFilePath !== undefined;
  const rawPath = envFilePath ?? DEFAULT_ENV_FILE;
  const path = isAbsolute(rawPath) ? rawPath : resolve(process.cwd(), rawPath);

  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigError(`Env file not found: ${path}`, []);
    }
    return { path, loaded: false };
  }

  const values = parseDotenv(readFileSync(path, "utf8"));
  for (const [key, value] of Object.entries(values)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return { path, loaded: true };
}
