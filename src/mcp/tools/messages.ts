import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import * as z from "zod/v4";
import type { AppContainer } from "../../app/container.js";
import { DESTRUCTIVE, READ_ONLY, WRITES, entityInputSchema, runTool } from "../tooling.js";

const messageIdSchema = z.number().int().positive();

export function registerMessageTools(server: McpServer, container: AppContainer): void {
  const messages = container.messagesService;

  server.registerTool(
    "get_messages",
    {
      description: "Get a page of recent messages from a chat",
      inputSchema: {
        chatId: entityInputSchema,
        page: z.number().int().min(1).optional(),
        pageSize: z.number().int().min(1).max(200).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "get_messages", () => messages.getMessages(args)),
  );

  server.registerTool(
    "list_messages",
    {
      description: "List messages with optional text search and ISO date bounds",
      inputSchema: {
        chatId: entityInputSchema,
        limit: z.number().int().min(1).max(500).optional(),
        searchQuery: z.string().min(1).optional(),
        fromDate: z.string().min(1).optional().describe("ISO 8601 date, inclusive"),
        toDate: z.string().min(1).optional().describe("ISO 8601 date, inclusive"),
      },
      annotations: READ_ONLY,
    },
    async (args) => runTool(container, "list_messages", () => messages.listMessages(args)),
  );

  server.registerTool(
    "send_message",
    {
      description: "Send a text message to a chat",
      inputSchema: {
        chatId: entityInputSchema,
        message: z.string().min(1).max(4096),
        parseMode: z.enum(["markdown", "html"]).optional(),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "send_message", () => messages.sendMessage(args)),
  );

  server.registerTool(
    "reply_to_message",
    {
      description: "Reply to a specific message",
      inputSchema: {
        chatId: entityInputSchema,
        messageId: messageIdSchema,
        text: z.string().min(1).max(4096),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "reply_to_message", () => messages.replyToMessage(args)),
  );

  server.registerTool(
    "edit_message",
    {
      description: "Edit a message sent by this account",
      inputSchema: {
        chatId: entityInputSchema,
        messageId: messageIdSchema,
        newText: z.string().min(1).max(4096),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "edit_message", () => messages.editMessage(args)),
  );

  server.registerTool(
    "delete_message",
    {
      description: "Delete messages, for everyone unless revoke is false",
      inputSchema: {
        chatId: entityInputSchema,
        messageIds: z.array(messageIdSchema).min(1).max(100),
        revoke: z.boolean().optional(),
      },
      annotations: DESTRUCTIVE,
    },
    async (args) => runTool(container, "delete_message", () => messages.deleteMessage(args)),
  );

  server.registerTool(
    "forward_message",
    {
      description: "Forward messages from one chat to another",
      inputSchema: {
        fromChatId: entityInputSchema,
        toChatId: entityInputSchema,
        messageIds: z.array(messageIdSchema).min(1).max(100),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "forward_message", () => messages.forwardMessage(args)),
  );

  server.registerTool(
    "pin_message",
    {
      description: "Pin a message in a chat",
      inputSchema: {
        chatId: entityInputSchema,
        messageId: messageIdSchema,
        notify: z.boolean().optional(),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "pin_message", () => messages.pinMessage(args)),
  );

  server.registerTool(
    "unpin_message",
    {
      description: "Unpin one message, or every pinned message when messageId is omitted",
      inputSchema: {
        chatId: entityInputSchema,
        messageId: messageIdSchema.optional(),
      },
      annotations: WRITES,
    },
    async (args) => runTool(container, "unpin_message", () => messages.unpinMessage(args)),
  );

  server.registerTool(
    "mark_as_read",
    {
      description: "Mark all messages in a chat as read",
      inputSchema: { chatId: entityInputSchema },
      annotations: WRITES,
    },
    async (args) => runTool(container, "mark_as_read", () => messages.markAsRead(args)),
  );

  server.registerTool(
    "get_message_context",
    {
      description: "Get a message with the messages around it",
      inputSchema: {
        chatId: entityInputSchema,
        messageId: messageIdSchema,
        contextSize: z.number().int().min(1).max(50).optional(),
      },
      annotations: READ_ONLY,
    },
    async (args) =>
      runTool(container, "get_message_context", () => messages.getMessageContext(args)),
  );

  server.registerTool(
    "get_last_interaction",
    {
      description: "Get the most recent message exchanged with a contact",
      inputSchema: { contactId: entityInputSchema },
      annotations: READ_ONLY,
    },
    async (args) =>
      runTool(container, "get_last_interaction", () => messages.getLastInteraction(args)),
  );
}
