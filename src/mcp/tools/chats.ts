import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import type { AppContainer } from "../../app/container.js";
import { DESTRUCTIVE, READ_ONLY, WRITES, entityInputSchema, runTool } from "../tooling.js";

export function registerChatTools(server: McpServer, container: AppContainer): void {
  const chats = container.chatsService;

  server.registerTool(
    "get_chats",
    {
      description: "Get a paginated list of dialogs (chats, groups, channels)",
      inputSchema: {
        page: z.number().int().min(1).default(1),
        pageSize: z.number().int().min(1).max(200).default(20),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_chats", () => chats.getChats(args)),
  );

  server.registerTool(
    "list_chats",
    {
      description: "List dialogs filtered by chat type",
      inputSchema: {
        chatType: z.enum(["all", "private", "group", "channel"]).optional(),
        limit: z.number().int().min(1).max(500).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "list_chats", () => chats.listChats(args)),
  );

  server.registerTool(
    "get_chat",
    {
      description: "Get details about a chat, group, channel or user",
      inputSchema: { chatId: entityInputSchema },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_chat", () => chats.getChat(args)),
  );

  server.registerTool(
    "create_group",
    {
      description: "Create a basic group with the given users",
      inputSchema: {
        title: z.string().min(1).max(255),
        userIds: z.array(entityInputSchema).min(1).max(200),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "create_group", () => chats.createGroup(args)),
  );

  server.registerTool(
    "invite_to_group",
    {
      description: "Invite users to a group or channel",
      inputSchema: {
        groupId: entityInputSchema,
        userIds: z.array(entityInputSchema).min(1).max(200),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "invite_to_group", () => chats.inviteToGroup(args)),
  );

  server.registerTool(
    "join_chat",
    {
      description: "Join a public chat by username or a private one by invite link",
      inputSchema: { link: z.string().min(1) },
      annotations: WRITES,
    },
    async (args) => runTool(container, "join_chat", () => chats.joinChat(args)),
  );

  server.registerTool(
    "leave_chat",
    {
      description: "Leave a group or channel",
      inputSchema: { chatId: entityInputSchema },
      annotations: DESTRUCTIVE,
    },
    async (args) => runTool(container, "leave_chat", () => chats.leaveChat(args)),
  );

  server.registerTool(
    "get_participants",
    {
      description: "List members of a group or channel",
      inputSchema: {
        chatId: entityInputSchema,
        limit: z.number().int().min(1).max(1000).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_participants", () => chats.getParticipants(args)),
  );

  server.registerTool(
    "get_admins",
    {
      description: "List administrators of a group or channel",
      inputSchema: {
        chatId: entityInputSchema,
        limit: z.number().int().min(1).max(1000).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_admins", () => chats.getAdmins(args)),
  );
}
