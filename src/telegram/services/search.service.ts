import type { TelegramClientContext } from "../client-context.js";
import {
  parseEntityInput,
  type EntityResolver,
  type TelegramEntityInput,
} from "../entity-resolver.js";
import { operationError } from "../errors.js";
import { formatEntity, formatMessage } from "../format.js";

export class SearchService {
  constructor(
    private readonly context: TelegramClientContext,
    private readonly resolver: EntityResolver,
  ) {}

  async searchPublicChats(input: { query: string; limit?: number }) {
    return this.context.withClient("search", "search_public_chats", async ({ client, gram }) => {
      const found = await client.invoke(
        new gram.Api.contacts.Search({
          q: input.query,
          limit: input.limit ?? 20,
        }),
      );
      return {
        users: found.users.map((entity) => formatEntity(entity)),
        chats: found.chats.map((entity) => formatEntity(entity)),
      };
    });
  }

  /** Searches one chat, or every chat when `chatId` is omitted. */
  async searchMessages(input: {
    query: string;
    chatId?: TelegramEntityInput;
    limit?: number;
  }) {
    return this.context.withClient("search", "search_messages", async ({ client }) => {
      const chat =
        input.chatId === undefined
          ? undefined
          : await this.resolver.resolveEntity(client, input.chatId);
      const messages = await client.getMessages(chat, {
        search: input.query,
        limit: input.limit ?? 50,
      });
      return {
        count: messages.length,
        messages: messages.map((message) => ({
          chatId: message.chatId?.toString() ?? null,
          ...formatMessage(message),
        })),
      };
    });
  }

  async resolveUsername(input: { username: string }) {
    const parsed = parseEntityInput(input.username);
    if (typeof parsed !== "string" || parsed === "me") {
      throw operationError("invalid_input", `Not a username: ${input.username}`);
    }
    return this.context.withClient("search", "resolve_username", async ({ client }) => {
      const entity = await this.resolver.resolveEntity(client, parsed);
      return formatEntity(entity);
    });
  }
}
