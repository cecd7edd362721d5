// Structural views of the client library's objects. Library classes satisfy
// them as-is, and tests can pass plain objects.

export interface IdLike {
  toString(): string;
}

export interface EntityLike {
  className: string;
  id: IdLike;
  title?: string;
  username?: string;
  firstName?: string;
  lastName?: string;
  phone?: string;
  bot?: boolean;
  verified?: boolean;
  premium?: boolean;
  megagroup?: boolean;
  broadcast?: boolean;
  participantsCount?: number;
}

export interface MessageLike {
  id: number;
  date?: number;
  message?: string;
  out?: boolean;
  senderId?: IdLike;
  media?: { className: string };
  replyTo?: { className: string; replyToMsgId?: number };
}

export interface DialogLike {
  id?: IdLike;
  name?: string;
  title?: string;
  unreadCount?: number;
  pinned?: boolean;
  archived?: boolean;
  isUser?: boolean;
  isGroup?: boolean;
  isChannel?: boolean;
  entity?: EntityLike;
  message?: MessageLike;
}

export type EntityKind =
  | "user"
  | "bot"
  | "group"
  | "supergroup"
  | "channel"
  | "unknown";

export function toId(value: IdLike | undefined | null): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  return value.toString();
}

export function entityKind(entity: EntityLike): EntityKind {
  switch (entity.className) {
    case "User":
      return entity.bot ? "bot" : "user";
    case "Chat":
    case "ChatForbidden":
      return "group";
    case "Channel":
    case "ChannelForbidden":
      return entity.megagroup ? "supergroup" : "channel";
    default:
      return "unknown";
  }
}

export function displayName(entity: EntityLike): string {
  if (entity.title) {
    return entity.title;
  }
  const fullName = [entity.firstName, entity.lastName]
    .filter((part): part is string => Boolean(part))
    .join(" ");
  if (fullName) {
    return fullName;
  }
  return entity.username ? `@${entity.username}` : toId(entity.id) ?? "";
}

export function formatUser(user: EntityLike) {
  return {
    id: toId(user.id),
    username: user.username ?? null,
    firstName: user.firstName ?? null,
    lastName: user.lastName ?? null,
    phone: user.phone ?? null,
    bot: Boolean(user.bot),
    verified: Boolean(user.verified),
    premium: Boolean(user.premium),
  };
}

export type UserSummary = ReturnType<typeof formatUser>;

export function formatEntity(entity: EntityLike) {
  return {
    id: toId(entity.id),
    kind: entityKind(entity),
    name: displayName(entity),
    username: entity.username ?? null,
    participantsCount: entity.participantsCount ?? null,
  };
}

export type EntitySummary = ReturnType<typeof formatEntity>;

function toIsoDate(unixSeconds: number | undefined): string | null {
  if (unixSeconds === undefined || unixSeconds <= 0) {
    return null;
  }
  return new Date(unixSeconds * 1000).toISOString();
}

export function formatMessage(message: MessageLike) {
  return {
    id: message.id,
    date: toIsoDate(message.date),
    senderId: toId(message.senderId),
    text: message.message ?? "",
    out: Boolean(message.out),
    media: message.media ? message.media.className : null,
    replyToMessageId: message.replyTo?.replyToMsgId ?? null,
  };
}

export type MessageSummary = ReturnType<typeof formatMessage>;

export function dialogKind(dialog: DialogLike): EntityKind {
  if (dialog.entity) {
    return entityKind(dialog.entity);
  }
  if (dialog.isUser) {
    return "user";
  }
  if (dialog.isChannel) {
    return dialog.isGroup ? "supergroup" : "channel";
  }
  return dialog.isGroup ? "group" : "unknown";
}

export function formatDialog(dialog: DialogLike) {
  return {
    id: toId(dialog.id),
    name: dialog.name ?? dialog.title ?? "",
    kind: dialogKind(dialog),
    unreadCount: dialog.unreadCount ?? 0,
    pinned: Boolean(dialog.pinned),
    archived: Boolean(dialog.archived),
    lastMessage: dialog.message ? formatMessage(dialog.message) : null,
  };
}

export type DialogSummary = ReturnType<typeof formatDialog>;

export type ChatTypeFilter = "all" | "private" | "group" | "channel";

export function matchesChatType(dialog: DialogLike, chatType: ChatTypeFilter): boolean {
  const kind = dialogKind(dialog);
  switch (chatType) {
    case "all":
      return true;
    case "private":
      return kind === "user" || kind === "bot";
    case "group":
      return kind === "group" || kind === "supergroup";
    case "channel":
      return kind === "channel";
  }
}

/** 1-based page slice; an out-of-range page yields an empty list. */
export function pageSlice<T>(items: readonly T[], page: number, pageSize: number): T[] {
  const start = (page - 1) * pageSize;
  return items.slice(start, start + pageSize);
}

export interface UserStatusLike {
  className: string;
  expires?: number;
  wasOnline?: number;
}

export function formatUserStatus(status: UserStatusLike | undefined) {
  switch (status?.className) {
    case "UserStatusOnline":
      return { status: "online", until: toIsoDate(status.expires) };
    case "UserStatusOffline":
      return { status: "offline", lastSeen: toIsoDate(status.wasOnline) };
    case "UserStatusRecently":
      return { status: "recently" };
    case "UserStatusLastWeek":
      return { status: "last_week" };
    case "UserStatusLastMonth":
      return { status: "last_month" };
    default:
      return { status: "hidden" };
  }
}

/** Case-insensitive match on name and username; phone matches by substring. */
export function matchesContactQuery(user: EntityLike, query: string): boolean {
  const normalized = query.trim().toLowerCase();
  if (!normalized) {
    return true;
  }
  const fullName = [user.firstName, user.lastName]
    .filter((part): part is string => Boolean(part))
    .join(" ")
    .toLowerCase();
  const username = (user.username ?? "").toLowerCase();
  const phone = user.phone ?? "";
  const digits = normalized.replace(/^\+/, "");
  return (
    fullName.includes(normalized) ||
    username.includes(normalized.replace(/^@/, "")) ||
    (digits.length > 0 && /^\d+$/.test(digits) && phone.includes(digits))
  );
}
