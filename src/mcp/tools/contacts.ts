import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import type { AppContainer } from "../../app/container.js";
import { DESTRUCTIVE, READ_ONLY, WRITES, entityInputSchema, runTool } from "../tooling.js";

export function registerContactTools(server: McpServer, container: AppContainer): void {
  const contacts = container.contactsService;

  server.registerTool(
    "list_contacts",
    {
      description: "List all contacts of the account",
      inputSchema: {},
      annotations: READ_ONLY,
    },
    async () => runTool(container, "list_contacts", () => contacts.listContacts()),
  );

  server.registerTool(
    "search_contacts",
    {
      description: "Search contacts by name, username or phone",
      inputSchema: { query: z.string().min(1) },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "search_contacts", () => contacts.searchContacts(args)),
  );

  server.registerTool(
    "add_contact",
    {
      description: "Add a contact by phone number",
      inputSchema: {
        phone: z.string().min(3).max(32),
        firstName: z.string().min(1).max(64),
        lastName: z.string().max(64).optional(),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "add_contact", () => contacts.addContact(args)),
  );

  server.registerTool(
    "delete_contact",
    {
      description: "Remove a user from contacts",
      inputSchema: { userId: entityInputSchema },
      annotations: DESTRUCTIVE,
    },
    async (args) => runTool(container, "delete_contact", () => contacts.deleteContact(args)),
  );

  server.registerTool(
    "block_user",
    {
      description: "Block a user",
      inputSchema: { userId: entityInputSchema },
      annotations: WRITES,
    },
    async (args) => runTool(container, "block_user", () => contacts.blockUser(args)),
  );

  server.registerTool(
    "unblock_user",
    {
      description: "Unblock a user",
      inputSchema: { userId: entityInputSchema },
      annotations: WRITES,
    },
    async (args) => runTool(container, "unblock_user", () => contacts.unblockUser(args)),
  );

  server.registerTool(
    "get_direct_chat_by_contact",
    {
      description: "Find the private chat with the first contact matching a query",
      inputSchema: { contactQuery: z.string().min(1) },
      annotations: READ_ONLY,
    },
    async (args) =>
      runTool(container, "get_direct_chat_by_contact", () =>
        contacts.getDirectChatByContact(args),
      ),
  );
}
