import type { Conversation, MessageRecord, MessageStatus, MessageType } from "../services/messageStore";
import { parseUserId } from "./identityResolver";
import { err, ok, type ErrorCode, type Result } from "./result";

export type UserStatus = "ONLINE" | "OFFLINE" | "AWAY" | "BUSY";

export type PresenceState = Extract<UserStatus, "ONLINE" | "OFFLINE">;

export function isUserStatus(value: unknown): value is UserStatus {
  return value === "ONLINE" || value === "OFFLINE" || value === "AWAY" || value === "BUSY";
}

// ---------------------------------------------------------------------------
// Outbound
// ---------------------------------------------------------------------------

export type NewMessageData = Readonly<{
  messageId: string;
  senderId: number;
  receiverId: number | null;
  groupId?: string;
  content: string;
  type: MessageType;
  timestamp: number;
  status: MessageStatus;
  replyToMessageId?: string;
}>;

export type OutboundFrame =
  | Readonly<{
      type: "CONNECTION";
      userId: number;
      status: "connected";
      message: string;
      activeConnections: number;
      heartbeatInterval: number;
      timestamp: number;
    }>
  | Readonly<{ type: "AUTH_REQUEST"; message: string; timestamp: number }>
  | Readonly<{
      type: "AUTH_SUCCESS";
      userId: number;
      status: "authenticated";
      message: string;
      activeConnections: number;
      heartbeatInterval: number;
      timestamp: number;
    }>
  | Readonly<{ type: "PONG"; timestamp: number }>
  | Readonly<{ type: "NEW_MESSAGE"; data: NewMessageData; timestamp: number }>
  | Readonly<{
      type: "SEND_MESSAGE_RESPONSE";
      messageId: string;
      recipientId: number | null;
      groupId: string | null;
      status: MessageStatus;
      timestamp: number;
    }>
  | Readonly<{ type: "MESSAGE_STATUS"; messageId: string; status: MessageStatus; timestamp: number }>
  | Readonly<{ type: "PIN_MESSAGE_RESPONSE"; messageId: string; isPinned: boolean; message: string; timestamp: number }>
  | Readonly<{
      type: "MESSAGE_PINNED";
      messageId: string;
      isPinned: boolean;
      pinnedBy: number;
      senderId: number;
      recipientId: number | null;
      groupId: string | null;
      timestamp: number;
    }>
  | Readonly<{ type: "TYPING"; senderId: number; senderName: string; isTyping: boolean; timestamp: number }>
  | Readonly<{ type: "TYPING_RESPONSE"; recipientId: number; isTyping: boolean; message: string; timestamp: number }>
  | Readonly<{ type: "USER_STATUS_RESPONSE"; userId: number; status: UserStatus; message: string; timestamp: number }>
  | Readonly<{ type: "USER_STATUS_BROADCAST"; userId: number; status: UserStatus; timestamp: number }>
  | Readonly<{
      type: "CONVERSATION_LIST";
      conversations: ReadonlyArray<Conversation>;
      count: number;
      totalUnreadCount: number;
      timestamp: number;
    }>
  | Readonly<{ type: "UNREAD_COUNT"; totalUnreadCount: number; timestamp: number }>
  | Readonly<{ type: "ERROR"; code: ErrorCode; message: string; timestamp: number }>;

export type OutboundFrameType = OutboundFrame["type"];

export type SessionInfo = Readonly<{
  userId: number;
  activeConnections: number;
  heartbeatIntervalMs: number;
}>;

export function connectionFrame(info: SessionInfo, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "CONNECTION",
    userId: info.userId,
    status: "connected",
    message: "WebSocket connection established",
    activeConnections: info.activeConnections,
    heartbeatInterval: info.heartbeatIntervalMs,
    timestamp
  });
}

export function authRequestFrame(timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "AUTH_REQUEST",
    message: "Please provide userId or token for authentication",
    timestamp
  });
}

export function authSuccessFrame(info: SessionInfo, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "AUTH_SUCCESS",
    userId: info.userId,
    status: "authenticated",
    message: "Authentication successful",
    activeConnections: info.activeConnections,
    heartbeatInterval: info.heartbeatIntervalMs,
    timestamp
  });
}

export function pongFrame(timestamp: number): OutboundFrame {
  return Object.freeze({ type: "PONG", timestamp });
}

export function newMessageFrame(record: MessageRecord, timestamp: number): OutboundFrame {
  const data: NewMessageData = {
    messageId: record.id,
    senderId: record.senderId,
    receiverId: record.recipientId,
    ...(record.groupId !== null ? { groupId: record.groupId } : {}),
    content: record.content,
    type: record.type,
    timestamp: record.createdAtMs,
    status: record.status,
    ...(record.replyToMessageId !== null ? { replyToMessageId: record.replyToMessageId } : {})
  };
  return Object.freeze({ type: "NEW_MESSAGE", data: Object.freeze(data), timestamp });
}

export function sendMessageResponseFrame(record: MessageRecord, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "SEND_MESSAGE_RESPONSE",
    messageId: record.id,
    recipientId: record.recipientId,
    groupId: record.groupId,
    status: record.status,
    timestamp
  });
}

export function messageStatusFrame(messageId: string, status: MessageStatus, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "MESSAGE_STATUS", messageId, status, timestamp });
}

export function pinMessageResponseFrame(messageId: string, isPinned: boolean, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "PIN_MESSAGE_RESPONSE",
    messageId,
    isPinned,
    message: `Message ${isPinned ? "pinned" : "unpinned"} successfully`,
    timestamp
  });
}

export function messagePinnedFrame(record: MessageRecord, pinnedBy: number, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "MESSAGE_PINNED",
    messageId: record.id,
    isPinned: record.isPinned,
    pinnedBy,
    senderId: record.senderId,
    recipientId: record.recipientId,
    groupId: record.groupId,
    timestamp
  });
}

export function typingFrame(senderId: number, senderName: string, isTyping: boolean, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "TYPING", senderId, senderName, isTyping, timestamp });
}

export function typingResponseFrame(recipientId: number, isTyping: boolean, timestamp: number): OutboundFrame {
  return Object.freeze({
    type: "TYPING_RESPONSE",
    recipientId,
    isTyping,
    message: "Typing indicator sent",
    timestamp
  });
}

export function userStatusResponseFrame(userId: number, status: UserStatus, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "USER_STATUS_RESPONSE", userId, status, message: "Status updated", timestamp });
}

export function userStatusBroadcastFrame(userId: number, status: UserStatus, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "USER_STATUS_BROADCAST", userId, status, timestamp });
}

/** `totalUnreadCount` defaults to the sum over `conversations`; pass it when the list was cut short. */
export function conversationListFrame(
  conversations: ReadonlyArray<Conversation>,
  timestamp: number,
  totalUnreadCount = conversations.reduce((sum, conversation) => sum + conversation.unreadCount, 0)
): OutboundFrame {
  return Object.freeze({
    type: "CONVERSATION_LIST",
    conversations: Object.freeze([...conversations]),
    count: conversations.length,
    totalUnreadCount,
    timestamp
  });
}

export function unreadCountFrame(totalUnreadCount: number, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "UNREAD_COUNT", totalUnreadCount, timestamp });
}

export function errorFrame(code: ErrorCode, message: string, timestamp: number): OutboundFrame {
  return Object.freeze({ type: "ERROR", code, message, timestamp });
}

// ---------------------------------------------------------------------------
// Inbound
// ---------------------------------------------------------------------------

export type SendMessageData = Readonly<{
  recipientId?: number;
  groupId?: string;
  content?: string;
  /** Raw as received; validated against the message types by the dispatcher. */
  type?: unknown;
  replyToMessageId?: string;
}>;

export type PinData = Readonly<{
  messageId?: string;
  isPinned?: boolean;
}>;

export type TypingData = Readonly<{
  recipientId?: number;
  isTyping?: boolean;
  senderName?: string;
}>;

/**
 * Every inbound frame decodes to exactly one of these. Field presence is not enforced here;
 * the handler for each kind decides what is required.
 */
export type InboundFrame =
  | Readonly<{ kind: "AUTH"; userId: unknown }>
  | Readonly<{ kind: "PING" }>
  | Readonly<{ kind: "SEND_MESSAGE"; data: SendMessageData }>
  | Readonly<{ kind: "TYPING"; data: TypingData }>
  | Readonly<{ kind: "PIN_MESSAGE"; data: PinData }>
  | Readonly<{ kind: "USER_STATUS"; status: unknown }>
  | Readonly<{ kind: "GET_CONVERSATIONS" }>
  | Readonly<{ kind: "UNKNOWN"; type: string }>;

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? (value as Record<string, unknown>) : {};
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

export function decodeFrame(text: string): Result<InboundFrame> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return err("VALIDATION_ERROR", "Invalid message envelope.");
  }
  const envelope = asRecord(parsed);
  const type = envelope.type;
  if (typeof type !== "string" || type.trim() === "") {
    return err("VALIDATION_ERROR", "Invalid message envelope.");
  }

  switch (type) {
    case "AUTH":
      return ok({ kind: "AUTH", userId: envelope.userId });
    case "PING":
    case "ping":
      return ok({ kind: "PING" });
    case "SEND_MESSAGE": {
      const data = asRecord(envelope.data);
      return ok({
        kind: "SEND_MESSAGE",
        data: {
          recipientId: parseUserId(data.recipientId),
          groupId: optionalNonEmptyString(data.groupId),
          content: optionalString(data.content),
          type: data.type,
          replyToMessageId: optionalNonEmptyString(data.replyToMessageId)
        }
      });
    }
    case "TYPING": {
      const data = asRecord(envelope.data);
      return ok({
        kind: "TYPING",
        data: {
          recipientId: parseUserId(data.recipientId),
          isTyping: typeof data.isTyping === "boolean" ? data.isTyping : undefined,
          senderName: optionalNonEmptyString(data.senderName)
        }
      });
    }
    case "PIN_MESSAGE": {
      const data = asRecord(envelope.data);
      return ok({
        kind: "PIN_MESSAGE",
        data: {
          messageId: optionalNonEmptyString(data.messageId),
          isPinned: typeof data.isPinned === "boolean" ? data.isPinned : undefined
        }
      });
    }
    case "USER_STATUS":
      return ok({ kind: "USER_STATUS", status: asRecord(envelope.data).status });
    case "GET_CONVERSATIONS":
      return ok({ kind: "GET_CONVERSATIONS" });
    default:
      return ok({ kind: "UNKNOWN", type });
  }
}
