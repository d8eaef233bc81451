import { randomUUID } from "node:crypto";

import {
  advanceStatus,
  conversationFromRecord,
  sortConversations,
  type Conversation,
  type MessageRecord,
  type MessageRepository,
  type SendMessageCommand,
  type StatusUpdate
} from "../services/messageStore";

type InMemoryMessageRepositoryOptions = Readonly<{
  nowMs?: () => number;
  newId?: () => string;
}>;

function directThreadKey(a: number, b: number): string {
  const [x, y] = a < b ? [a, b] : [b, a];
  return `direct::${x}::${y}`;
}

function groupThreadKey(groupId: string): string {
  return `group::${groupId}`;
}

function cursorKey(groupId: string, userId: number): string {
  return `${groupId}::${userId}`;
}

function isUnreadDirect(record: MessageRecord, viewerId: number): boolean {
  return record.groupId === null && record.recipientId === viewerId && (record.status === "SENT" || record.status === "DELIVERED");
}

export function createInMemoryMessageRepository(options: InMemoryMessageRepositoryOptions = {}): MessageRepository {
  const nowMs = options.nowMs ?? (() => Date.now());
  const newId = options.newId ?? (() => randomUUID());

  const byId = new Map<string, MessageRecord>();
  // Messages per thread in insertion order; the last entry is the thread's latest message.
  const messagesByThread = new Map<string, string[]>();
  const membersByGroup = new Map<string, Set<number>>();
  const readCursorByGroupUser = new Map<string, number>();

  function threadKeyOf(record: MessageRecord): string {
    if (record.groupId !== null) return groupThreadKey(record.groupId);
    return directThreadKey(record.senderId, record.recipientId ?? record.senderId);
  }

  function threadMessages(threadKey: string): MessageRecord[] {
    const ids = messagesByThread.get(threadKey) ?? [];
    return ids.map((id) => byId.get(id)).filter((m): m is MessageRecord => m !== undefined);
  }

  function isMember(groupId: string, userId: number): boolean {
    return membersByGroup.get(groupId)?.has(userId) === true;
  }

  function groupUnread(groupId: string, viewerId: number): number {
    const cursor = readCursorByGroupUser.get(cursorKey(groupId, viewerId)) ?? 0;
    return threadMessages(groupThreadKey(groupId)).filter((m) => m.senderId !== viewerId && m.createdAtMs > cursor).length;
  }

  function directConversations(viewerId: number): Conversation[] {
    const result: Conversation[] = [];
    for (const [threadKey] of messagesByThread) {
      if (!threadKey.startsWith("direct::")) continue;
      const messages = threadMessages(threadKey);
      const latest = messages[messages.length - 1];
      if (!latest || (latest.senderId !== viewerId && latest.recipientId !== viewerId)) continue;
      const unread = messages.filter((m) => isUnreadDirect(m, viewerId)).length;
      result.push(conversationFromRecord(viewerId, latest, unread));
    }
    return result;
  }

  function groupConversations(viewerId: number): Conversation[] {
    const result: Conversation[] = [];
    for (const [groupId, members] of membersByGroup) {
      if (!members.has(viewerId)) continue;
      const messages = threadMessages(groupThreadKey(groupId));
      const latest = messages[messages.length - 1];
      if (!latest) continue;
      result.push(conversationFromRecord(viewerId, latest, groupUnread(groupId, viewerId)));
    }
    return result;
  }

  function canUpdate(record: MessageRecord, actorId: number): boolean {
    if (record.groupId !== null) return record.senderId !== actorId && isMember(record.groupId, actorId);
    return record.recipientId === actorId;
  }

  function isParticipant(record: MessageRecord, actorId: number): boolean {
    if (record.groupId !== null) return isMember(record.groupId, actorId);
    return record.senderId === actorId || record.recipientId === actorId;
  }

  return {
    async createMessage(senderId: number, command: SendMessageCommand): Promise<MessageRecord> {
      if (command.groupId === undefined && command.recipientId === undefined) {
        throw new Error("A message needs a recipientId or a groupId.");
      }
      const record: MessageRecord = {
        id: newId(),
        senderId,
        recipientId: command.groupId !== undefined ? null : command.recipientId ?? null,
        groupId: command.groupId ?? null,
        content: command.content,
        type: command.type,
        status: "SENT",
        replyToMessageId: command.replyToMessageId ?? null,
        isPinned: false,
        createdAtMs: nowMs(),
        deliveredAtMs: null,
        readAtMs: null
      };
      byId.set(record.id, record);
      const threadKey = threadKeyOf(record);
      const list = messagesByThread.get(threadKey) ?? [];
      list.push(record.id);
      messagesByThread.set(threadKey, list);
      return record;
    },

    async listConversations(userId: number): Promise<ReadonlyArray<Conversation>> {
      return sortConversations([...directConversations(userId), ...groupConversations(userId)]);
    },

    async totalUnreadCount(userId: number): Promise<number> {
      let total = 0;
      for (const record of byId.values()) {
        if (isUnreadDirect(record, userId)) total += 1;
      }
      for (const [groupId, members] of membersByGroup) {
        if (members.has(userId)) total += groupUnread(groupId, userId);
      }
      return total;
    },

    async updateStatus(messageId: string, actorId: number, status: StatusUpdate): Promise<MessageRecord | null> {
      const current = byId.get(messageId);
      if (!current || !canUpdate(current, actorId)) return null;

      const now = nowMs();
      const next: MessageRecord = {
        ...current,
        status: advanceStatus(current.status, status),
        deliveredAtMs: current.deliveredAtMs ?? now,
        readAtMs: status === "READ" ? current.readAtMs ?? now : current.readAtMs
      };
      byId.set(messageId, next);

      if (next.groupId !== null && status === "READ") {
        const key = cursorKey(next.groupId, actorId);
        readCursorByGroupUser.set(key, Math.max(readCursorByGroupUser.get(key) ?? 0, next.createdAtMs));
      }
      return next;
    },

    async pinMessage(messageId: string, actorId: number, isPinned: boolean): Promise<MessageRecord | null> {
      const current = byId.get(messageId);
      if (!current || !isParticipant(current, actorId)) return null;

      if (isPinned) {
        for (const other of threadMessages(threadKeyOf(current))) {
          if (other.isPinned && other.id !== messageId) byId.set(other.id, { ...other, isPinned: false });
        }
      }
      const next: MessageRecord = { ...current, isPinned };
      byId.set(messageId, next);
      return next;
    },

    async listGroupMemberIds(groupId: string): Promise<ReadonlyArray<number>> {
      return Array.from(membersByGroup.get(groupId) ?? []);
    },

    async getMessage(messageId: string): Promise<MessageRecord | null> {
      return byId.get(messageId) ?? null;
    },

    async addGroupMembers(groupId: string, userIds: ReadonlyArray<number>): Promise<void> {
      const members = membersByGroup.get(groupId) ?? new Set<number>();
      for (const userId of userIds) members.add(userId);
      membersByGroup.set(groupId, members);
    }
  };
}
