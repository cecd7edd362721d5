import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { AppContainer } from "../../src/app/container.js";
import { buildMcpServer } from "../../src/mcp/server.js";
import { operationError } from "../../src/telegram/errors.js";
import { testContainer } from "../support/fixtures.js";
import { isErrorResult, resultJson } from "../support/mcp-client.js";

const TOOL_NAMES = [
  "add_contact",
  "block_user",
  "create_group",
  "delete_contact",
  "delete_message",
  "edit_message",
  "forward_message",
  "get_admins",
  "get_chat",
  "get_chats",
  "get_direct_chat_by_contact",
  "get_last_interaction",
  "get_me",
  "get_message_context",
  "get_messages",
  "get_participants",
  "get_user_status",
  "invite_to_group",
  "join_chat",
  "leave_chat",
  "list_chats",
  "list_contacts",
  "list_messages",
  "mark_as_read",
  "pin_message",
  "reply_to_message",
  "resolve_username",
  "search_contacts",
  "search_messages",
  "search_public_chats",
  "send_message",
  "unblock_user",
  "unpin_message",
  "update_profile",
];

const me = {
  id: "1001",
  username: "test_account",
  firstName: "Test",
  lastName: null,
  phone: null,
  bot: false,
  verified: false,
  premium: false,
};

describe("mcp tools", () => {
  let container: AppContainer;
  let client: Client;

  beforeEach(async () => {
    container = testContainer();
    const server = buildMcpServer(container);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    vi.restoreAllMocks();
  });

  test("lists every tool with annotations", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(TOOL_NAMES);
    const byName = new Map(tools.map((tool) => [tool.name, tool]));
    expect(byName.get("get_chats")?.annotations?.readOnlyHint).toBe(true);
    expect(byName.get("send_message")?.annotations?.readOnlyHint).toBe(false);
    expect(byName.get("delete_message")?.annotations?.destructiveHint).toBe(true);
  });

  test("applies argument defaults before calling the service", async () => {
    const getChats = vi.spyOn(container.chatsService, "getChats").mockResolvedValue({
      page: 1,
      pageSize: 20,
      totalFetched: 0,
      chats: [],
    });

    const result = await client.callTool({ name: "get_chats", arguments: {} });

    expect(getChats).toHaveBeenCalledWith({ page: 1, pageSize: 20 });
    expect(isErrorResult(result)).toBe(false);
    expect(resultJson(result)).toEqual({ page: 1, pageSize: 20, totalFetched: 0, chats: [] });
  });

  test("passes entity references through unchanged", async () => {
    const sendMessage = vi.spyOn(container.messagesService, "sendMessage").mockResolvedValue({
      ok: true,
      message: {
        id: 7,
        date: null,
        senderId: "1001",
        text: "hello",
        out: true,
        media: null,
        replyToMessageId: null,
      },
    });

    const result = await client.callTool({
      name: "send_message",
      arguments: { chatId: -1001234567890, message: "hello", parseMode: "markdown" },
    });

    expect(sendMessage).toHaveBeenCalledWith({
      chatId: -1001234567890,
      message: "hello",
      parseMode: "markdown",
    });
    expect(resultJson(result)).toEqual({
      ok: true,
      message: {
        id: 7,
        date: null,
        senderId: "1001",
        text: "hello",
        out: true,
        media: null,
        replyToMessageId: null,
      },
    });
  });

  test("returns Telegram failures as classified tool errors", async () => {
    vi.spyOn(container.profileService, "getMe").mockRejectedValue(
      operationError("invalid_session", "Telegram session is not authorized"),
    );

    const result = await client.callTool({ name: "get_me", arguments: {} });

    expect(isErrorResult(result)).toBe(true);
    expect(resultJson(result)).toEqual({
      ok: false,
      tool: "get_me",
      error: {
        kind: "invalid_session",
        message: "Telegram session is not authorized",
        hint: "The session string is expired, revoked or corrupted. Generate a new one and update TELEGRAM_SESSION_STRING.",
      },
    });
    const exposition = await container.metrics?.registry.metrics();
    expect(exposition).toContain('telegram_mcp_tool_calls_total{tool="get_me",status="error"} 1');
  });

  test("rejects a bad username without contacting Telegram", async () => {
    const result = await client.callTool({
      name: "resolve_username",
      arguments: { username: "me" },
    });

    expect(isErrorResult(result)).toBe(true);
    expect(resultJson(result)).toMatchObject({
      ok: false,
      tool: "resolve_username",
      error: { kind: "invalid_input", message: "Not a username: me" },
    });
    expect(container.telegram.status()).toEqual({ connected: false, authorized: null });
  });

  test("keeps serving after a failed call", async () => {
    vi.spyOn(container.profileService, "getMe")
      .mockRejectedValueOnce(new Error("Request timed out"))
      .mockResolvedValueOnce(me);

    const failed = await client.callTool({ name: "get_me", arguments: {} });
    const succeeded = await client.callTool({ name: "get_me", arguments: {} });

    expect(resultJson(failed)).toMatchObject({ error: { kind: "connection" } });
    expect(isErrorResult(succeeded)).toBe(false);
    expect(resultJson(succeeded)).toEqual(me);
  });
});
