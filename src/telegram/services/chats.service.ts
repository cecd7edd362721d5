import type { ClientTaskArgs, GramJsModule, TelegramClientContext } from "../client-context.js";
import { extractInviteHash, type EntityResolver, type TelegramEntityInput } from "../entity-resolver.js";
import { operationError } from "../errors.js";
import {
  formatDialog,
  formatEntity,
  formatUser,
  matchesChatType,
  pageSlice,
  type ChatTypeFilter,
  type EntitySummary,
} from "../format.js";

function chatsFromUpdates(gram: GramJsModule, result: unknown): EntitySummary[] {
  const updates =
    typeof result === "object" && result !== null && "updates" in result
      ? result.updates
      : result;
  if (updates instanceof gram.Api.Updates || updates instanceof gram.Api.UpdatesCombined) {
    return updates.chats.map((chat) => formatEntity(chat));
  }
  return [];
}

export class ChatsService {
  constructor(
    private readonly context: TelegramClientContext,
    private readonly resolver: EntityResolver,
  ) {}

  async getChats(input: { page: number; pageSize: number }) {
    return this.context.withClient("chats", "get_chats", async ({ client }) => {
      const dialogs = await client.getDialogs({
        limit: Math.max(input.page * input.pageSize, input.pageSize),
      });
      return {
        page: input.page,
        pageSize: input.pageSize,
        totalFetched: dialogs.length,
        chats: pageSlice(dialogs, input.page, input.pageSize).map((dialog) =>
          formatDialog(dialog),
        ),
      };
    });
  }

  async listChats(input: { chatType?: ChatTypeFilter; limit?: number }) {
    return this.context.withClient("chats", "list_chats", async ({ client }) => {
      const dialogs = await client.getDialogs({ limit: input.limit ?? 100 });
      const chatType = input.chatType ?? "all";
      const filtered = dialogs.filter((dialog) => matchesChatType(dialog, chatType));
      return {
        count: filtered.length,
        chats: filtered.map((dialog) => formatDialog(dialog)),
      };
    });
  }

  async getChat(input: { chatId: TelegramEntityInput }) {
    return this.context.withClient("chats", "get_chat", async ({ client, gram }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      let about: string | null = null;
      if (entity instanceof gram.Api.Channel) {
        const full = await client.invoke(new gram.Api.channels.GetFullChannel({ channel: entity }));
        about = full.fullChat.about;
      } else if (entity instanceof gram.Api.Chat) {
        const full = await client.invoke(new gram.Api.messages.GetFullChat({ chatId: entity.id }));
        about = full.fullChat.about;
      } else if (entity instanceof gram.Api.User) {
        const full = await client.invoke(new gram.Api.users.GetFullUser({ id: entity }));
        about = full.fullUser.about ?? null;
      }
      return {
        ...formatEntity(entity),
        about,
      };
    });
  }

  async createGroup(input: { title: string; userIds: TelegramEntityInput[] }) {
    return this.context.withClient(
      "chats",
      "create_group",
      async ({ client, gram }) => {
        const users = await Promise.all(
          input.userIds.map((userId) => this.resolver.resolveEntity(client, userId)),
        );
        const result = await client.invoke(
          new gram.Api.messages.CreateChat({
            users,
            title: input.title,
          }),
        );
        return { ok: true, chats: chatsFromUpdates(gram, result) };
      },
      { userCount: input.userIds.length },
    );
  }

  async inviteToGroup(input: {
    groupId: TelegramEntityInput;
    userIds: TelegramEntityInput[];
  }) {
    return this.context.withClient(
      "chats",
      "invite_to_group",
      async ({ client, gram }) => {
        const target = await this.resolver.resolveEntity(client, input.groupId);
        const users = await Promise.all(
          input.userIds.map((userId) => this.resolver.resolveEntity(client, userId)),
        );
        if (target instanceof gram.Api.Channel) {
          await client.invoke(
            new gram.Api.channels.InviteToChannel({
              channel: target,
              users,
            }),
          );
          return { ok: true, invited: users.length };
        }
        if (target instanceof gram.Api.Chat) {
          for (const user of users) {
            await client.invoke(
              new gram.Api.messages.AddChatUser({
                chatId: target.id,
                userId: user,
                fwdLimit: 10,
              }),
            );
          }
          return { ok: true, invited: users.length };
        }
        throw operationError("invalid_input", "Target is not a group or channel");
      },
      { userCount: input.userIds.length },
    );
  }

  async joinChat(input: { link: string }) {
    return this.context.withClient("chats", "join_chat", async ({ client, gram }) => {
      const hash = extractInviteHash(input.link);
      if (hash) {
        const result = await client.invoke(new gram.Api.messages.ImportChatInvite({ hash }));
        return { ok: true, chats: chatsFromUpdates(gram, result) };
      }
      const entity = await this.resolver.resolveEntity(client, input.link);
      if (!(entity instanceof gram.Api.Channel)) {
        throw operationError("invalid_input", "Only public groups and channels can be joined by username");
      }
      const result = await client.invoke(new gram.Api.channels.JoinChannel({ channel: entity }));
      return { ok: true, chats: chatsFromUpdates(gram, result) };
    });
  }

  async leaveChat(input: { chatId: TelegramEntityInput }) {
    return this.context.withClient("chats", "leave_chat", async ({ client, gram }) => {
      const entity = await this.resolver.resolveEntity(client, input.chatId);
      if (entity instanceof gram.Api.Channel) {
        await client.invoke(new gram.Api.channels.LeaveChannel({ channel: entity }));
        return { ok: true, chat: formatEntity(entity) };
      }
      if (entity instanceof gram.Api.Chat) {
        await client.invoke(
          new gram.Api.messages.DeleteChatUser({
            chatId: entity.id,
            userId: new gram.Api.InputUserSelf(),
          }),
        );
        return { ok: true, chat: formatEntity(entity) };
      }
      throw operationError("invalid_input", "Only groups and channels can be left");
    });
  }

  async getParticipants(input: { chatId: TelegramEntityInput; limit?: number }) {
    return this.context.withClient("chats", "get_participants", async (args) =>
      this.participants(args, input.chatId, input.limit, "all"),
    );
  }

  async getAdmins(input: { chatId: TelegramEntityInput; limit?: number }) {
    return this.context.withClient("chats", "get_admins", async (args) =>
      this.participants(args, input.chatId, input.limit, "admins"),
    );
  }

  private async participants(
    { client, gram }: ClientTaskArgs,
    chatId: TelegramEntityInput,
    limit: number | undefined,
    scope: "all" | "admins",
  ) {
    const entity = await this.resolver.resolveEntity(client, chatId);
    const participants = await client.getParticipants(entity, {
      limit: limit ?? 200,
      ...(scope === "admins" ? { filter: new gram.Api.ChannelParticipantsAdmins() } : {}),
    });
    return {
      count: participants.length,
      participants: participants.map((participant) => formatUser(participant)),
    };
  }
}
