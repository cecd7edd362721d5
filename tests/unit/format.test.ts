import { describe, expect, test } from "vitest";
import {
  entityKind,
  formatDialog,
  formatEntity,
  formatMessage,
  formatUser,
  formatUserStatus,
  matchesChatType,
  matchesContactQuery,
  pageSlice,
  toId,
  type ChatTypeFilter,
  type DialogLike,
  type EntityLike,
} from "../../src/telegram/format.js";
import { withinDateRange } from "../../src/telegram/services/messages.service.js";

const alice: EntityLike = {
  className: "User",
  id: 1001,
  firstName: "Alice",
  lastName: "Liddell",
  username: "alice_wonder",
  phone: "15550001111",
};

const supergroup: EntityLike = {
  className: "Channel",
  id: 2002,
  title: "Tea Party",
  megagroup: true,
  participantsCount: 12,
};

describe("entity formatting", () => {
  test("ids become decimal strings", () => {
    expect(toId(BigInt("9007199254740993"))).toBe("9007199254740993");
    expect(toId(undefined)).toBeNull();
  });

  test.each([
    [{ className: "User", id: 1 }, "user"],
    [{ className: "User", id: 1, bot: true }, "bot"],
    [{ className: "Chat", id: 1 }, "group"],
    [{ className: "Channel", id: 1, megagroup: true }, "supergroup"],
    [{ className: "Channel", id: 1, broadcast: true }, "channel"],
    [{ className: "UserEmpty", id: 1 }, "unknown"],
  ])("classifies %o as %s", (entity, kind) => {
    expect(entityKind(entity)).toBe(kind);
  });

  test("formats users", () => {
    expect(formatUser(alice)).toEqual({
      id: "1001",
      username: "alice_wonder",
      firstName: "Alice",
      lastName: "Liddell",
      phone: "15550001111",
      bot: false,
      verified: false,
      premium: false,
    });
  });

  test("formats chats with their title and members", () => {
    expect(formatEntity(supergroup)).toEqual({
      id: "2002",
      kind: "supergroup",
      name: "Tea Party",
      username: null,
      participantsCount: 12,
    });
  });

  test("falls back to the username, then the id, for a display name", () => {
    expect(formatEntity({ className: "User", id: 7, username: "ghost_user" }).name).toBe(
      "@ghost_user",
    );
    expect(formatEntity({ className: "User", id: 7 }).name).toBe("7");
  });
});

describe("message formatting", () => {
  test("renders dates as ISO strings and reply targets as ids", () => {
    expect(
      formatMessage({
        id: 10,
        date: 1_700_000_000,
        message: "hello",
        out: true,
        senderId: 1001,
        replyTo: { className: "MessageReplyHeader", replyToMsgId: 9 },
      }),
    ).toEqual({
      id: 10,
      date: "2023-11-14T22:13:20.000Z",
      senderId: "1001",
      text: "hello",
      out: true,
      media: null,
      replyToMessageId: 9,
    });
  });

  test("reports media by class name and tolerates missing fields", () => {
    expect(formatMessage({ id: 11, media: { className: "MessageMediaPhoto" } })).toEqual({
      id: 11,
      date: null,
      senderId: null,
      text: "",
      out: false,
      media: "MessageMediaPhoto",
      replyToMessageId: null,
    });
  });

  test("keeps only messages inside the date range", () => {
    const messages = [
      { id: 1, date: 100 },
      { id: 2, date: 200 },
      { id: 3, date: 300 },
      { id: 4 },
    ];

    expect(withinDateRange(messages, 150, 300).map((message) => message.id)).toEqual([2, 3, 4]);
    expect(withinDateRange(messages, null, 150).map((message) => message.id)).toEqual([1, 4]);
    expect(withinDateRange(messages, null, null)).toHaveLength(4);
  });
});

describe("dialogs", () => {
  const dialogs: DialogLike[] = [
    { id: 1001, name: "Alice Liddell", entity: alice, unreadCount: 2 },
    { id: -2002, name: "Tea Party", entity: supergroup, pinned: true },
    { id: -3003, name: "News", entity: { className: "Channel", id: 3003, broadcast: true } },
    { id: -4004, name: "Old group", isGroup: true },
  ];

  test("formats a dialog with its last message", () => {
    expect(
      formatDialog({
        id: 1001,
        name: "Alice Liddell",
        entity: alice,
        unreadCount: 2,
        archived: true,
        message: { id: 5, message: "see you" },
      }),
    ).toEqual({
      id: "1001",
      name: "Alice Liddell",
      kind: "user",
      unreadCount: 2,
      pinned: false,
      archived: true,
      lastMessage: {
        id: 5,
        date: null,
        senderId: null,
        text: "see you",
        out: false,
        media: null,
        replyToMessageId: null,
      },
    });
  });

  const filterCases: Array<[ChatTypeFilter, string[]]> = [
    ["all", ["Alice Liddell", "Tea Party", "News", "Old group"]],
    ["private", ["Alice Liddell"]],
    ["group", ["Tea Party", "Old group"]],
    ["channel", ["News"]],
  ];

  test.each(filterCases)("filters %s chats", (chatType, names) => {
    expect(
      dialogs.filter((dialog) => matchesChatType(dialog, chatType)).map((dialog) => dialog.name),
    ).toEqual(names);
  });

  test("pages are 1-based and out-of-range pages are empty", () => {
    const items = [1, 2, 3, 4, 5];

    expect(pageSlice(items, 1, 2)).toEqual([1, 2]);
    expect(pageSlice(items, 3, 2)).toEqual([5]);
    expect(pageSlice(items, 4, 2)).toEqual([]);
  });
});

describe("contacts and status", () => {
  test.each([
    ["alice", true],
    ["LIDDELL", true],
    ["alice liddell", true],
    ["@alice_w", true],
    ["+1555000", true],
    ["0001111", true],
    ["bob", false],
    ["555-000", false],
  ])("query %s matches: %s", (query, expected) => {
    expect(matchesContactQuery(alice, query)).toBe(expected);
  });

  test("describes user status", () => {
    expect(formatUserStatus({ className: "UserStatusOnline", expires: 1_700_000_000 })).toEqual({
      status: "online",
      until: "2023-11-14T22:13:20.000Z",
    });
    expect(formatUserStatus({ className: "UserStatusOffline", wasOnline: 1_700_000_000 })).toEqual({
      status: "offline",
      lastSeen: "2023-11-14T22:13:20.000Z",
    });
    expect(formatUserStatus({ className: "UserStatusLastWeek" })).toEqual({ status: "last_week" });
    expect(formatUserStatus(undefined)).toEqual({ status: "hidden" });
  });
});
