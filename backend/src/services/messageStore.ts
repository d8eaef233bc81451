export type MessageType = "TEXT" | "IMAGE" | "VIDEO" | "AUDIO" | "DOCUMENT" | "LOCATION" | "CONTACT" | "STICKER";

export type MessageStatus = "SENT" | "DELIVERED" | "READ" | "FAILED";

export type ConversationType = "INDIVIDUAL" | "GROUP";

const MESSAGE_TYPES: ReadonlySet<string> = new Set([
  "TEXT",
  "IMAGE",
  "VIDEO",
  "AUDIO",
  "DOCUMENT",
  "LOCATION",
  "CONTACT",
  "STICKER"
]);

const MESSAGE_STATUSES: ReadonlySet<string> = new Set(["SENT", "DELIVERED", "READ", "FAILED"]);

export function isMessageType(value: unknown): value is MessageType {
  return typeof value === "string" && MESSAGE_TYPES.has(value);
}

export function isMessageStatus(value: unknown): value is MessageStatus {
  return typeof value === "string" && MESSAGE_STATUSES.has(value);
}

export type SendMessageCommand = Readonly<{
  recipientId?: number;
  groupId?: string;
  content: string;
  type: MessageType;
  replyToMessageId?: string;
}>;

export type MessageRecord = Readonly<{
  id: string;
  senderId: number;
  recipientId: number | null;
  groupId: string | null;
  content: string;
  type: MessageType;
  status: MessageStatus;
  replyToMessageId: string | null;
  isPinned: boolean;
  createdAtMs: number;
  deliveredAtMs: number | null;
  readAtMs: number | null;
}>;

/**
 * One row of a user's conversation list. For direct chats `userId` is the other participant;
 * for group chats it is null and `groupId` identifies the thread.
 */
export type Conversation = Readonly<{
  userId: number | null;
  groupId: string | null;
  conversationType: ConversationType;
  latestMessageId: string;
  latestMessageContent: string;
  latestMessageType: MessageType;
  latestMessageSenderId: number;
  latestMessageTime: number;
  latestMessageStatus: MessageStatus;
  unreadCount: number;
}>;

export type StatusUpdate = Extract<MessageStatus, "DELIVERED" | "READ">;

/**
 * Durable message storage. Implementations assign message ids and timestamps; the realtime core
 * never stores messages itself.
 */
export type MessageStore = Readonly<{
  createMessage(senderId: number, command: SendMessageCommand): Promise<MessageRecord>;
  listConversations(userId: number): Promise<ReadonlyArray<Conversation>>;
  totalUnreadCount(userId: number): Promise<number>;
  /**
   * Advances a message addressed to `actorId`. Returns null when the message does not exist or
   * was not addressed to the actor. Status never moves backwards (READ stays READ).
   */
  updateStatus(messageId: string, actorId: number, status: StatusUpdate): Promise<MessageRecord | null>;
  /**
   * Pins or unpins a message for its thread. Pinning unpins whatever else was pinned in the same
   * thread. Returns null when the message does not exist or the actor is not a participant.
   */
  pinMessage(messageId: string, actorId: number, isPinned: boolean): Promise<MessageRecord | null>;
  listGroupMemberIds(groupId: string): Promise<ReadonlyArray<number>>;
}>;

export type OfflineNotifier = Readonly<{
  notifyOffline(recipientId: number, record: MessageRecord): void;
}>;

const STATUS_RANK: Readonly<Record<MessageStatus, number>> = {
  FAILED: 0,
  SENT: 1,
  DELIVERED: 2,
  READ: 3
};

export function advanceStatus(current: MessageStatus, next: StatusUpdate): MessageStatus {
  return STATUS_RANK[next] > STATUS_RANK[current] ? next : current;
}

/** A store plus the operations the HTTP surface and tests use to manage it. */
export type MessageRepository = MessageStore &
  Readonly<{
    getMessage(messageId: string): Promise<MessageRecord | null>;
    addGroupMembers(groupId: string, userIds: ReadonlyArray<number>): Promise<void>;
  }>;

export function conversationFromRecord(viewerId: number, record: MessageRecord, unreadCount: number): Conversation {
  const isGroup = record.groupId !== null;
  return {
    userId: isGroup ? null : record.senderId === viewerId ? record.recipientId : record.senderId,
    groupId: record.groupId,
    conversationType: isGroup ? "GROUP" : "INDIVIDUAL",
    latestMessageId: record.id,
    latestMessageContent: record.content,
    latestMessageType: record.type,
    latestMessageSenderId: record.senderId,
    latestMessageTime: record.createdAtMs,
    latestMessageStatus: record.status,
    unreadCount
  };
}

// Newest first.
export function sortConversations(conversations: Conversation[]): Conversation[] {
  return conversations.sort((a, b) => b.latestMessageTime - a.latestMessageTime);
}
