import { silentLogger, type Logger } from "../logger";
import type { Conversation, MessageStore } from "../services/messageStore";
import type { Connection } from "./connection";
import { conversationListFrame, unreadCountFrame, type OutboundFrame } from "./frames";
import { describeError, err, ok, withTimeout, type Result } from "./result";
import type { SessionRegistry } from "./sessionRegistry";

export type SyncOutcome = Readonly<{ pushed: boolean }>;

export type ConversationSyncDeps = Readonly<{
  registry: SessionRegistry<Connection>;
  store: Pick<MessageStore, "listConversations" | "totalUnreadCount">;
  persistenceTimeoutMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

/**
 * Pushes full-replacement views (never deltas), so a lost or reordered push is corrected by the
 * next one. Users without a live session are skipped; they reload over REST on reconnect.
 */
export type ConversationSync = Readonly<{
  pushConversations(userId: number): Promise<Result<SyncOutcome>>;
  pushUnreadCount(userId: number): Promise<Result<SyncOutcome>>;
}>;

export const DEFAULT_PERSISTENCE_TIMEOUT_MS = 5_000;

/** Longest `latestMessageContent` carried in a pushed list; clients open the thread for the rest. */
export const CONVERSATION_PREVIEW_LENGTH = 200;

function preview(conversation: Conversation): Conversation {
  if (conversation.latestMessageContent.length <= CONVERSATION_PREVIEW_LENGTH) return conversation;
  return { ...conversation, latestMessageContent: conversation.latestMessageContent.slice(0, CONVERSATION_PREVIEW_LENGTH) };
}

/**
 * Builds the largest list frame that fits in `maxBytes`, dropping the oldest conversations first.
 * `totalUnreadCount` always covers the whole list.
 */
export function fitConversationList(
  conversations: ReadonlyArray<Conversation>,
  maxBytes: number,
  timestamp: number
): OutboundFrame {
  const totalUnreadCount = conversations.reduce((sum, conversation) => sum + conversation.unreadCount, 0);
  const kept = conversations.map(preview);
  let frame = conversationListFrame(kept, timestamp, totalUnreadCount);
  while (kept.length > 0 && Buffer.byteLength(JSON.stringify(frame), "utf8") > maxBytes) {
    kept.pop();
    frame = conversationListFrame(kept, timestamp, totalUnreadCount);
  }
  return frame;
}

export function createConversationSync(deps: ConversationSyncDeps): ConversationSync {
  const registry = deps.registry;
  const store = deps.store;
  const persistenceTimeoutMs = deps.persistenceTimeoutMs ?? DEFAULT_PERSISTENCE_TIMEOUT_MS;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  if (!Number.isFinite(persistenceTimeoutMs) || persistenceTimeoutMs <= 0) {
    throw new Error("conversationSync requires a positive persistenceTimeoutMs.");
  }

  function liveConnection(userId: number): Connection | undefined {
    const connection = registry.lookup(userId);
    return connection && connection.state === "ACTIVE" ? connection : undefined;
  }

  return {
    async pushConversations(userId: number): Promise<Result<SyncOutcome>> {
      if (!liveConnection(userId)) return ok({ pushed: false });

      let conversations;
      try {
        conversations = await withTimeout(store.listConversations(userId), persistenceTimeoutMs, "listConversations");
      } catch (e: unknown) {
        logger.error("Failed to load conversations", { userId, error: describeError(e) });
        return err("PERSISTENCE_FAILURE", "Failed to get conversations");
      }

      // Re-resolve after the query: the session may have been replaced while it ran.
      const connection = liveConnection(userId);
      if (!connection) return ok({ pushed: false });
      const frame = fitConversationList(conversations, connection.maxFrameBytes, nowMs());
      const sent = await connection.send(frame);
      if (!sent.ok) return sent;
      return ok({ pushed: true });
    },

    async pushUnreadCount(userId: number): Promise<Result<SyncOutcome>> {
      if (!liveConnection(userId)) return ok({ pushed: false });

      let totalUnreadCount: number;
      try {
        totalUnreadCount = await withTimeout(store.totalUnreadCount(userId), persistenceTimeoutMs, "totalUnreadCount");
      } catch (e: unknown) {
        logger.error("Failed to load unread count", { userId, error: describeError(e) });
        return err("PERSISTENCE_FAILURE", "Failed to get unread count");
      }

      const connection = liveConnection(userId);
      if (!connection) return ok({ pushed: false });
      const sent = await connection.send(unreadCountFrame(totalUnreadCount, nowMs()));
      if (!sent.ok) return sent;
      return ok({ pushed: true });
    }
  };
}
