import { silentLogger, type Logger } from "../logger";
import {
  isMessageType,
  type MessageRecord,
  type MessageStore,
  type OfflineNotifier,
  type SendMessageCommand,
  type StatusUpdate
} from "../services/messageStore";
import type { Connection } from "./connection";
import { DEFAULT_PERSISTENCE_TIMEOUT_MS, type ConversationSync } from "./conversationSync";
import {
  messagePinnedFrame,
  messageStatusFrame,
  newMessageFrame,
  pinMessageResponseFrame,
  sendMessageResponseFrame,
  type SendMessageData
} from "./frames";
import { describeError, err, ok, withTimeout, type Result } from "./result";
import type { SessionRegistry } from "./sessionRegistry";

export const MAX_CONTENT_LENGTH = 4000;

export type MessageDispatchDeps = Readonly<{
  registry: SessionRegistry<Connection>;
  store: Pick<MessageStore, "createMessage" | "updateStatus" | "pinMessage" | "listGroupMemberIds">;
  sync: ConversationSync;
  notifier?: OfflineNotifier;
  persistenceTimeoutMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type MessageDispatch = Readonly<{
  send(connection: Connection, data: SendMessageData): Promise<Result<MessageRecord>>;
  updateStatus(actorId: number, messageId: string, status: StatusUpdate): Promise<Result<MessageRecord>>;
  /** Replies PIN_MESSAGE_RESPONSE to the actor and tells every live participant with MESSAGE_PINNED. */
  pin(connection: Connection, messageId: string, isPinned: boolean): Promise<Result<MessageRecord>>;
}>;

type Validated = Readonly<{ senderId: number; command: SendMessageCommand }>;

function validate(connection: Connection, data: SendMessageData): Result<Validated> {
  const senderId = connection.userId;
  if (connection.state !== "ACTIVE" || senderId === null) {
    return err("UNAUTHENTICATED", "User not authenticated");
  }

  const content = data.content;
  if ((data.recipientId === undefined && data.groupId === undefined) || content === undefined || content.trim() === "") {
    return err("VALIDATION_ERROR", "Missing recipientId or content");
  }

  const type = data.type === undefined ? "TEXT" : data.type;
  if (!isMessageType(type)) {
    return err("VALIDATION_ERROR", "Invalid message type", { type });
  }
  if (content.length > MAX_CONTENT_LENGTH) {
    return err("VALIDATION_ERROR", "Message content too long", { maxLength: MAX_CONTENT_LENGTH });
  }

  // A group id wins over a recipient id; the message then belongs to the group thread only.
  if (data.groupId !== undefined) {
    return ok({
      senderId,
      command: { groupId: data.groupId, content, type, replyToMessageId: data.replyToMessageId }
    });
  }
  if (data.recipientId === senderId) {
    return err("VALIDATION_ERROR", "Invalid recipient");
  }
  return ok({
    senderId,
    command: { recipientId: data.recipientId, content, type, replyToMessageId: data.replyToMessageId }
  });
}

export function createMessageDispatch(deps: MessageDispatchDeps): MessageDispatch {
  const registry = deps.registry;
  const store = deps.store;
  const sync = deps.sync;
  const notifier = deps.notifier;
  const persistenceTimeoutMs = deps.persistenceTimeoutMs ?? DEFAULT_PERSISTENCE_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  if (!Number.isFinite(persistenceTimeoutMs) || persistenceTimeoutMs <= 0) {
    throw new Error("messageDispatch requires a positive persistenceTimeoutMs.");
  }

  async function resolveRecipients(record: MessageRecord): Promise<ReadonlyArray<number>> {
    if (record.groupId === null) {
      return record.recipientId === null ? [] : [record.recipientId];
    }
    try {
      const members = await withTimeout(
        store.listGroupMemberIds(record.groupId),
        persistenceTimeoutMs,
        "listGroupMemberIds"
      );
      return Array.from(new Set(members)).filter((memberId) => memberId !== record.senderId);
    } catch (e: unknown) {
      logger.error("Failed to load group members", { groupId: record.groupId, error: describeError(e) });
      return [];
    }
  }

  async function deliver(recipientId: number, record: MessageRecord): Promise<boolean> {
    const connection = registry.lookup(recipientId);
    if (!connection || connection.state !== "ACTIVE") {
      try {
        notifier?.notifyOffline(recipientId, record);
      } catch (e: unknown) {
        logger.error("Offline notification failed", { recipientId, messageId: record.id, error: describeError(e) });
      }
      return false;
    }
    // A failed write has already aborted the recipient's socket; its close path evicts it.
    const sent = await connection.send(newMessageFrame(record, nowMs()));
    if (!sent.ok) {
      logger.warn("Message not delivered", { messageId: record.id, recipientId, code: sent.error.code });
    }
    return sent.ok;
  }

  async function syncAfterSend(senderId: number, recipientIds: ReadonlyArray<number>): Promise<void> {
    const tasks = recipientIds.map(async (recipientId) => {
      logSyncFailure(recipientId, await sync.pushConversations(recipientId));
      logSyncFailure(recipientId, await sync.pushUnreadCount(recipientId));
    });
    tasks.push(
      (async () => {
        logSyncFailure(senderId, await sync.pushConversations(senderId));
      })()
    );
    await Promise.all(tasks);
  }

  function logSyncFailure(userId: number, result: Result<unknown>): void {
    if (!result.ok) {
      logger.warn("Conversation sync failed", { userId, code: result.error.code, message: result.error.message });
    }
  }

  return {
    async send(connection: Connection, data: SendMessageData): Promise<Result<MessageRecord>> {
      const validated = validate(connection, data);
      if (!validated.ok) return validated;
      const { senderId, command } = validated.value;

      let record: MessageRecord;
      try {
        record = await withTimeout(store.createMessage(senderId, command), persistenceTimeoutMs, "createMessage");
      } catch (e: unknown) {
        logger.error("Failed to save message", { senderId, error: describeError(e) });
        return err("PERSISTENCE_FAILURE", "Failed to save message");
      }

      const recipientIds = await resolveRecipients(record);
      const delivered = await Promise.all(recipientIds.map((recipientId) => deliver(recipientId, record)));

      const acknowledged = await connection.send(sendMessageResponseFrame(record, nowMs()));
      if (!acknowledged.ok) {
        logger.warn("Send acknowledgement not delivered", { messageId: record.id, senderId });
      }

      logger.debug("Message dispatched", {
        messageId: record.id,
        senderId,
        recipients: recipientIds.length,
        delivered: delivered.filter(Boolean).length
      });

      await syncAfterSend(senderId, recipientIds);
      return ok(record);
    },

    async updateStatus(actorId: number, messageId: string, status: StatusUpdate): Promise<Result<MessageRecord>> {
      let record: MessageRecord | null;
      try {
        record = await withTimeout(store.updateStatus(messageId, actorId, status), persistenceTimeoutMs, "updateStatus");
      } catch (e: unknown) {
        logger.error("Failed to update message status", { messageId, actorId, error: describeError(e) });
        return err("PERSISTENCE_FAILURE", "Failed to update message status");
      }
      if (!record) {
        return err("MESSAGE_NOT_FOUND", "Message not found", { messageId });
      }

      const sender = registry.lookup(record.senderId);
      if (sender && sender.state === "ACTIVE") {
        const sent = await sender.send(messageStatusFrame(record.id, record.status, nowMs()));
        if (!sent.ok) {
          logger.warn("Status notification not delivered", { messageId, senderId: record.senderId });
        }
      }

      logSyncFailure(actorId, await sync.pushUnreadCount(actorId));
      logSyncFailure(actorId, await sync.pushConversations(actorId));
      return ok(record);
    },

    async pin(connection: Connection, messageId: string, isPinned: boolean): Promise<Result<MessageRecord>> {
      const actorId = connection.userId;
      if (connection.state !== "ACTIVE" || actorId === null) {
        return err("UNAUTHENTICATED", "User not authenticated");
      }

      let record: MessageRecord | null;
      try {
        record = await withTimeout(store.pinMessage(messageId, actorId, isPinned), persistenceTimeoutMs, "pinMessage");
      } catch (e: unknown) {
        logger.error("Failed to pin message", { messageId, actorId, error: describeError(e) });
        return err("PERSISTENCE_FAILURE", "Failed to pin message");
      }
      if (!record) {
        return err("MESSAGE_NOT_FOUND", "Message not found", { messageId });
      }

      const replied = await connection.send(pinMessageResponseFrame(record.id, record.isPinned, nowMs()));
      if (!replied.ok) {
        logger.warn("Pin response not delivered", { messageId, actorId });
      }

      const participants = new Set<number>([record.senderId, ...(await resolveRecipients(record))]);
      const pinned = messagePinnedFrame(record, actorId, nowMs());
      await Promise.all(
        Array.from(participants).map(async (userId) => {
          const target = registry.lookup(userId);
          if (!target || target.state !== "ACTIVE") return;
          const sent = await target.send(pinned);
          if (!sent.ok) logger.warn("Pin notification not delivered", { messageId, userId });
        })
      );
      return ok(record);
    }
  };
}
