import type { TelegramClient } from "telegram";
import { InvalidEntityError } from "./errors.js";

export type TelegramEntityInput = string | number;

const USERNAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]{4,31}$/;

export function extractInviteHash(input: string): string | null {
  const trimmed = input.trim();
  const invitePrefixPatterns = [
    "https://t.me/+",
    "http://t.me/+",
    "t.me/+",
    "https://telegram.me/+",
    "telegram.me/+",
    "https://t.me/joinchat/",
    "http://t.me/joinchat/",
    "t.me/joinchat/",
    "https://telegram.me/joinchat/",
    "telegram.me/joinchat/",
  ];
  for (const prefix of invitePrefixPatterns) {
    if (trimmed.startsWith(prefix)) {
      const hash = trimmed.slice(prefix.length).trim();
      return hash.length > 0 ? hash : null;
    }
  }
  if (trimmed.startsWith("+") && !/^\+\d+$/.test(trimmed)) {
    const hash = trimmed.slice(1).trim();
    return hash.length > 0 ? hash : null;
  }
  return null;
}

/**
 * Public link (`t.me/name`) to `@name`; anything else passes through.
 */
function stripPublicLink(value: string): string {
  const match = /^(?:https?:\/\/)?(?:t|telegram)\.me\/([A-Za-z0-9_]+)\/?$/.exec(value);
  return match?.[1] ? `@${match[1]}` : value;
}

/**
 * Validates a caller-supplied chat/user reference. Integer ids (including the
 * negative ids of groups and channels) come back as numbers, usernames as
 * `@name`, and `me` as-is.
 */
export function parseEntityInput(input: TelegramEntityInput): number | string {
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input) || input === 0) {
      throw new InvalidEntityError(`Invalid chat or user id: ${input}`);
    }
    return input;
  }

  const trimmed = stripPublicLink(input.trim());
  if (trimmed.length === 0) {
    throw new InvalidEntityError("Chat or user reference must not be empty");
  }
  if (trimmed.toLowerCase() === "me" || trimmed.toLowerCase() === "self") {
    return "me";
  }
  if (/^-?\d+$/.test(trimmed)) {
    const parsed = Number.parseInt(trimmed, 10);
    if (!Number.isSafeInteger(parsed) || parsed === 0) {
      throw new InvalidEntityError(`Invalid chat or user id: ${trimmed}`);
    }
    return parsed;
  }

  const username = trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
  if (!USERNAME_PATTERN.test(username)) {
    throw new InvalidEntityError(
      `Invalid chat or user reference "${input}": expected an integer id or a username of 5-32 letters, digits or underscores`,
    );
  }
  return `@${username}`;
}

export class EntityResolver {
  async resolveEntity(client: Pick<TelegramClient, "getEntity">, input: TelegramEntityInput) {
    return client.getEntity(parseEntityInput(input));
  }
}
