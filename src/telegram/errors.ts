export type TelegramErrorKind =
  | "invalid_session"
  | "flood_wait"
  | "session_locked"
  | "connection"
  | "invalid_input"
  | "permission"
  | "telegram";

export interface ClassifiedTelegramError {
  kind: TelegramErrorKind;
  message: string;
  hint: string;
  code?: string;
  retryAfterSeconds?: number;
}

export class InvalidEntityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidEntityError";
  }
}

export class TelegramOperationError extends Error {
  readonly kind: TelegramErrorKind;
  readonly hint: string;
  readonly code?: string;

  constructor(classified: ClassifiedTelegramError, options?: { cause?: unknown }) {
    super(classified.message, options);
    this.name = "TelegramOperationError";
    this.kind = classified.kind;
    this.hint = classified.hint;
    this.code = classified.code;
  }
}

const HINTS: Record<TelegramErrorKind, string> = {
  invalid_session:
    "The session string is expired, revoked or corrupted. Generate a new one and update TELEGRAM_SESSION_STRING.",
  flood_wait: "Telegram rate limit hit. Retry after the indicated delay.",
  session_locked:
    "Another process holds the session storage. Use TELEGRAM_SESSION_STRING instead of a file session.",
  connection:
    "Telegram data centers are unreachable. Check network egress and firewall rules, or raise TELEGRAM_TIMEOUT.",
  invalid_input: "Check the chat, user or message identifiers passed to the tool.",
  permission: "The account lacks the rights or privacy access for this action.",
  telegram: "Telegram rejected the request.",
};

const SESSION_CODES = new Set([
  "AUTH_KEY_UNREGISTERED",
  "AUTH_KEY_INVALID",
  "AUTH_KEY_DUPLICATED",
  "SESSION_REVOKED",
  "SESSION_EXPIRED",
  "USER_DEACTIVATED",
  "USER_DEACTIVATED_BAN",
]);

const INPUT_CODES = new Set([
  "PEER_ID_INVALID",
  "USERNAME_NOT_OCCUPIED",
  "USERNAME_INVALID",
  "MESSAGE_ID_INVALID",
  "MSG_ID_INVALID",
  "CHAT_ID_INVALID",
  "CHANNEL_INVALID",
  "USER_ID_INVALID",
  "INVITE_HASH_INVALID",
  "INVITE_HASH_EXPIRED",
  "MESSAGE_EMPTY",
  "MESSAGE_NOT_MODIFIED",
  "PHONE_NUMBER_INVALID",
]);

const PERMISSION_CODES = new Set([
  "CHAT_ADMIN_REQUIRED",
  "CHAT_WRITE_FORBIDDEN",
  "USER_PRIVACY_RESTRICTED",
  "USER_NOT_MUTUAL_CONTACT",
  "CHANNEL_PRIVATE",
  "USER_BANNED_IN_CHANNEL",
  "MESSAGE_AUTHOR_REQUIRED",
]);

const CONNECTION_PATTERNS = [
  /timed? ?out/i,
  /not connected/i,
  /ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|EHOSTUNREACH/,
  /connection (closed|lost|failed)/i,
];

interface ErrorShape {
  message?: unknown;
  errorMessage?: unknown;
  code?: unknown;
  seconds?: unknown;
}

function asShape(error: unknown): ErrorShape {
  return typeof error === "object" && error !== null ? error : {};
}

function errorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}

function build(
  kind: TelegramErrorKind,
  message: string,
  extra: Pick<ClassifiedTelegramError, "code" | "retryAfterSeconds"> = {},
): ClassifiedTelegramError {
  return { kind, message, hint: HINTS[kind], ...extra };
}

/**
 * Maps client library and transport failures onto the operator runbook
 * categories. Works on the error's shape so RPC errors from any copy of the
 * library classify the same way.
 */
export function classifyTelegramError(error: unknown): ClassifiedTelegramError {
  if (error instanceof TelegramOperationError) {
    return {
      kind: error.kind,
      message: error.message,
      hint: error.hint,
      ...(error.code ? { code: error.code } : {}),
    };
  }
  const message = errorText(error);
  if (error instanceof InvalidEntityError) {
    return build("invalid_input", message);
  }

  const shape = asShape(error);
  const rpcCode =
    typeof shape.errorMessage === "string" ? shape.errorMessage : undefined;

  if (rpcCode) {
    if (rpcCode === "FLOOD" || rpcCode.startsWith("FLOOD_WAIT")) {
      const seconds =
        typeof shape.seconds === "number" ? shape.seconds : undefined;
      return build("flood_wait", message, {
        code: rpcCode,
        ...(seconds !== undefined ? { retryAfterSeconds: seconds } : {}),
      });
    }
    if (SESSION_CODES.has(rpcCode)) {
      return build("invalid_session", message, { code: rpcCode });
    }
    if (INPUT_CODES.has(rpcCode)) {
      return build("invalid_input", message, { code: rpcCode });
    }
    if (PERMISSION_CODES.has(rpcCode)) {
      return build("permission", message, { code: rpcCode });
    }
    return build("telegram", message, { code: rpcCode });
  }

  if (/database is locked/i.test(message)) {
    return build("session_locked", message);
  }
  if (/Cannot find any entity|Could not find the input entity/i.test(message)) {
    return build("invalid_input", message);
  }
  const systemCode = typeof shape.code === "string" ? shape.code : "";
  if (CONNECTION_PATTERNS.some((pattern) => pattern.test(`${systemCode} ${message}`))) {
    return build("connection", message, systemCode ? { code: systemCode } : {});
  }
  return build("telegram", message);
}

export function operationError(
  kind: TelegramErrorKind,
  message: string,
  cause?: unknown,
): TelegramOperationError {
  return new TelegramOperationError(
    { kind, message, hint: HINTS[kind] },
    cause === undefined ? undefined : { cause },
  );
}
