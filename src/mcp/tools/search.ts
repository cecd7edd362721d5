import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import type { AppContainer } from "../../app/container.js";
import { READ_ONLY, entityInputSchema, runTool } from "../tooling.js";

export function registerSearchTools(server: McpServer, container: AppContainer): void {
  const search = container.searchService;

  server.registerTool(
    "search_public_chats",
    {
      description: "Search public users, groups and channels",
      inputSchema: {
        query: z.string().min(1),
        limit: z.number().int().min(1).max(100).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) =>
      runTool(container, "search_public_chats", () => search.searchPublicChats(args)),
  );

  server.registerTool(
    "search_messages",
    {
      description: "Search messages in one chat, or across all chats when chatId is omitted",
      inputSchema: {
        query: z.string().min(1),
        chatId: entityInputSchema.optional(),
        limit: z.number().int().min(1).max(200).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "search_messages", () => search.searchMessages(args)),
  );

  server.registerTool(
    "resolve_username",
    {
      description: "Resolve a public @username to a user, group or channel",
      inputSchema: { username: z.string().min(1) },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "resolve_username", () => search.resolveUsername(args)),
  );
}
