import type { TelegramClientContext } from "../client-context.js";
import type { EntityResolver, TelegramEntityInput } from "../entity-resolver.js";
import { operationError } from "../errors.js";
import { formatMessage, pageSlice, type MessageLike } from "../format.js";

export type ParseMode = "markdown" | "html";

function toUnixSeconds(value: string, field: string): number {
  const timestamp = Date.parse(value);
  if (Number.isNaN(timestamp)) {
    throw operationError("invalid_input", `${field} is not a valid ISO date: ${value}`);
  }
  return Math.floor(timestamp / 1000);
}

/** Keeps messages dated within [from, to]; either bound may be absent. */
export function withinDateRange<T extends MessageLike>(
  messages: readonly T[],
  fromSeconds: number | null,
  toSeconds: number | null,
): T[] {
  return messages.filter((message) => {
    if (message.date === undefined) {
      return true;
    }
    if (fromSeconds !== null && message.date < fromSeconds) {
      return false;
    }
    if (toSeconds !== null && message.date > toSeconds) {
      return false;
    }
    return true;
  });
}

function gramParseMode(parseMode: ParseMode | undefined): "md" | "html" | undefined {
  if (parseMode === "markdown") {
    return "md";
  }
  return parseMode;
}

export class MessagesService {
  constructor(
    private readonly context: TelegramClientContext,
    private readonly resolver: EntityResolver,
  ) {}

  async getMessages(input: {
    chatId: TelegramEntityInput;
    page?: number;
    pageSize?: number;
  }) {
    return this.context.withClient("messages", "get_messages", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const page = input.page ?? 1;
      const pageSize = input.pageSize ?? 20;
      const messages = await client.getMessages(entity, { limit: page * pageSize });
      return {
        page,
        pageSize,
        totalFetched: messages.length,
        messages: pageSlice(messages, page, pageSize).map((message) => formatMessage(message)),
      };
    });
  }

  async listMessages(input: {
    chatId: TelegramEntityInput;
    limit?: number;
    searchQuery?: string;
    fromDate?: string;
    toDate?: string;
  }) {
    const fromSeconds = input.fromDate ? toUnixSeconds(input.fromDate, "fromDate") : null;
    const toSeconds = input.toDate ? toUnixSeconds(input.toDate, "toDate") : null;
    return this.context.withClient("messages", "list_messages", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const messages = await client.getMessages(entity, {
        limit: input.limit ?? 100,
        ...(input.searchQuery ? { search: input.searchQuery } : {}),
        // history is walked backwards from offsetDate
        ...(toSeconds !== null ? { offsetDate: toSeconds + 1 } : {}),
      });
      const filtered = withinDateRange(messages, fromSeconds, toSeconds);
      return {
        count: filtered.length,
        messages: filtered.map((message) => formatMessage(message)),
      };
    });
  }

  async sendMessage(input: {
    chatId: TelegramEntityInput;
    message: string;
    parseMode?: ParseMode;
  }) {
    return this.context.withClient("messages", "send_message", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const parseMode = gramParseMode(input.parseMode);
      const sent = await client.sendMessage(entity, {
        message: input.message,
        ...(parseMode ? { parseMode } : {}),
      });
      return { ok: true, message: formatMessage(sent) };
    });
  }

  async replyToMessage(input: {
    chatId: TelegramEntityInput;
    messageId: number;
    text: string;
  }) {
    return this.context.withClient("messages", "reply_to_message", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const sent = await client.sendMessage(entity, {
        message: input.text,
        replyTo: input.messageId,
      });
      return { ok: true, message: formatMessage(sent) };
    });
  }

  async editMessage(input: {
    chatId: TelegramEntityInput;
    messageId: number;
    newText: string;
  }) {
    return this.context.withClient("messages", "edit_message", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const edited = await client.editMessage(entity, {
        message: input.messageId,
        text: input.newText,
      });
      return { ok: true, message: formatMessage(edited) };
    });
  }

  async deleteMessage(input: {
    chatId: TelegramEntityInput;
    messageIds: number[];
    revoke?: boolean;
  }) {
    return this.context.withClient(
      "messages",
      "delete_message",
      async ({ client }) => {
        const entity = await this.resolver.resolveEntity(client, input.chatId);
        const affected = await client.deleteMessages(entity, input.messageIds, {
          revoke: input.revoke ?? true,
        });
        return {
          ok: true,
          deleted: input.messageIds,
          ptsCount: affected.reduce((total, item) => total + item.ptsCount, 0),
        };
      },
      { messageCount: input.messageIds.length },
    );
  }

  async forwardMessage(input: {
    fromChatId: TelegramEntityInput;
    toChatId: TelegramEntityInput;
    messageIds: number[];
  }) {
    return this.context.withClient("messages", "forward_message", async ({ client }) => {
      const from = await this.resolver.resolveEntity(client, input.fromChatId);
      const to = await this.resolver.resolveEntity(client, input.toChatId);
      const forwarded = await client.forwardMessages(to, {
        messages: input.messageIds,
        fromPeer: from,
      });
      return {
        ok: true,
        messages: forwarded.map((message) => formatMessage(message)),
      };
    });
  }

  async pinMessage(input: {
    chatId: TelegramEntityInput;
    messageId: number;
    notify?: boolean;
  }) {
    return this.context.withClient("messages", "pin_message", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      await client.pinMessage(entity, input.messageId, {
        notify: input.notify ?? false,
      });
      return { ok: true, messageId: input.messageId };
    });
  }

  async unpinMessage(input: { chatId: TelegramEntityInput; messageId?: number }) {
    return this.context.withClient("messages", "unpin_message", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      if (input.messageId === undefined) {
        await client.unpinMessage(entity);
      } else {
        await client.unpinMessage(entity, input.messageId);
      }
      return { ok: true, messageId: input.messageId ?? null };
    });
  }

  async markAsRead(input: { chatId: TelegramEntityInput }) {
    return this.context.withClient("messages", "mark_as_read", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const ok = await client.markAsRead(entity);
      return { ok };
    });
  }

  async getMessageContext(input: {
    chatId: TelegramEntityInput;
    messageId: number;
    contextSize?: number;
  }) {
    return this.context.withClient("messages", "get_message_context", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      const size = input.contextSize ?? 5;
      const center = await client.getMessages(entity, { ids: input.messageId });
      const centerMessage = center[0];
      if (!centerMessage) {
        throw operationError("invalid_input", `Message ${input.messageId} not found`);
      }
      const before = await client.getMessages(entity, {
        offsetId: input.messageId,
        limit: size,
      });
      const after = await client.getMessages(entity, {
        offsetId: input.messageId,
        limit: size,
        reverse: true,
      });
      const ordered = [...before, ...after].sort((left, right) => left.id - right.id);
      return {
        message: formatMessage(centerMessage),
        before: ordered
          .filter((message) => message.id < input.messageId)
          .map((message) => formatMessage(message)),
        after: ordered
          .filter((message) => message.id > input.messageId)
          .map((message) => formatMessage(message)),
      };
    });
  }

  async getLastInteraction(input: { contactId: TelegramEntityInput }) {
    return this.context.withClient("messages", "get_last_interaction", async ({ client }) => {
      const peer = await this.resolver.resolveEntity(client, input.contactId);
      const messages = await client.getMessages(peer, { limit: 1 });
      const last = messages[0];
      return {
        message: last ? formatMessage(last) : null,
      };
    });
  }
}
