import { randomUUID } from "node:crypto";
import type { Pool } from "pg";

import {
  advanceStatus,
  conversationFromRecord,
  isMessageStatus,
  isMessageType,
  sortConversations,
  type Conversation,
  type MessageRecord,
  type MessageRepository,
  type SendMessageCommand,
  type StatusUpdate
} from "../services/messageStore";

type PostgresMessageRepositoryOptions = Readonly<{
  nowMs?: () => number;
  newId?: () => string;
}>;

const MESSAGE_COLUMN_NAMES = [
  "message_id",
  "sender_id",
  "recipient_id",
  "group_id",
  "content",
  "message_type",
  "status",
  "reply_to_message_id",
  "is_pinned",
  "created_at_ms",
  "delivered_at_ms",
  "read_at_ms"
] as const;

const MESSAGE_COLUMNS = MESSAGE_COLUMN_NAMES.join(", ");
const ALIASED_MESSAGE_COLUMNS = MESSAGE_COLUMN_NAMES.map((column) => `m.${column}`).join(", ");

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// BIGINT and COUNT(*) come back from pg as strings.
function asNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function asNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const parsed = asNumber(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function asNullableString(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

function parseMessage(row: Record<string, unknown>): MessageRecord | null {
  const id = asString(row.message_id);
  const senderId = asNumber(row.sender_id);
  const type = row.message_type;
  const status = row.status;
  const createdAtMs = asNumber(row.created_at_ms);
  if (!id || !Number.isFinite(senderId) || !Number.isFinite(createdAtMs)) return null;
  if (!isMessageType(type) || !isMessageStatus(status)) return null;

  return {
    id,
    senderId,
    recipientId: asNullableNumber(row.recipient_id),
    groupId: asNullableString(row.group_id),
    content: asString(row.content),
    type,
    status,
    replyToMessageId: asNullableString(row.reply_to_message_id),
    isPinned: row.is_pinned === true,
    createdAtMs,
    deliveredAtMs: asNullableNumber(row.delivered_at_ms),
    readAtMs: asNullableNumber(row.read_at_ms)
  };
}

function parseMessages(rows: ReadonlyArray<unknown>): MessageRecord[] {
  return rows
    .map((row) => parseMessage(row as Record<string, unknown>))
    .filter((m): m is MessageRecord => m !== null);
}

function countsByKey(rows: ReadonlyArray<unknown>, keyColumn: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const raw = row as Record<string, unknown>;
    const count = asNumber(raw.unread_count);
    if (!Number.isFinite(count)) continue;
    counts.set(String(raw[keyColumn]), count);
  }
  return counts;
}

export function createPostgresMessageRepository(pool: Pool, options: PostgresMessageRepositoryOptions = {}): MessageRepository {
  const nowMs = options.nowMs ?? (() => Date.now());
  const newId = options.newId ?? (() => randomUUID());

  async function getMessage(messageId: string): Promise<MessageRecord | null> {
    const res = await pool.query(`SELECT ${MESSAGE_COLUMNS} FROM chat_messages WHERE message_id = $1`, [messageId]);
    if (res.rowCount !== 1) return null;
    return parseMessage(res.rows[0] as Record<string, unknown>);
  }

  async function isMember(groupId: string, userId: number): Promise<boolean> {
    const res = await pool.query("SELECT 1 FROM chat_group_members WHERE group_id = $1 AND user_id = $2", [groupId, userId]);
    return res.rowCount === 1;
  }

  return {
    async createMessage(senderId: number, command: SendMessageCommand): Promise<MessageRecord> {
      if (command.groupId === undefined && command.recipientId === undefined) {
        throw new Error("A message needs a recipientId or a groupId.");
      }
      const res = await pool.query(
        `INSERT INTO chat_messages (
          message_id, sender_id, recipient_id, group_id, content, message_type, status, reply_to_message_id, created_at_ms
        ) VALUES ($1, $2, $3, $4, $5, $6, 'SENT', $7, $8)
        RETURNING ${MESSAGE_COLUMNS}`,
        [
          newId(),
          senderId,
          command.groupId !== undefined ? null : command.recipientId ?? null,
          command.groupId ?? null,
          command.content,
          command.type,
          command.replyToMessageId ?? null,
          nowMs()
        ]
      );
      const record = parseMessage(res.rows[0] as Record<string, unknown>);
      if (!record) throw new Error("Inserted message could not be read back.");
      return record;
    },

    async listConversations(userId: number): Promise<ReadonlyArray<Conversation>> {
      const [directRes, directUnreadRes, groupRes, groupUnreadRes] = await Promise.all([
        pool.query(
          `SELECT DISTINCT ON (partner_id) ${MESSAGE_COLUMNS}
           FROM (
             SELECT CASE WHEN sender_id = $1 THEN recipient_id ELSE sender_id END AS partner_id, *
             FROM chat_messages
             WHERE group_id IS NULL AND (sender_id = $1 OR recipient_id = $1)
           ) m
           ORDER BY partner_id, created_at_ms DESC, message_id DESC`,
          [userId]
        ),
        pool.query(
          `SELECT sender_id, COUNT(*) AS unread_count
           FROM chat_messages
           WHERE group_id IS NULL AND recipient_id = $1 AND status IN ('SENT', 'DELIVERED')
           GROUP BY sender_id`,
          [userId]
        ),
        pool.query(
          `SELECT DISTINCT ON (m.group_id) ${ALIASED_MESSAGE_COLUMNS}
           FROM chat_messages m
           JOIN chat_group_members g ON g.group_id = m.group_id AND g.user_id = $1
           ORDER BY m.group_id, m.created_at_ms DESC, m.message_id DESC`,
          [userId]
        ),
        pool.query(
          `SELECT m.group_id, COUNT(*) AS unread_count
           FROM chat_messages m
           JOIN chat_group_members g ON g.group_id = m.group_id AND g.user_id = $1
           LEFT JOIN chat_read_cursors c ON c.group_id = m.group_id AND c.user_id = $1
           WHERE m.sender_id <> $1 AND m.created_at_ms > COALESCE(c.read_at_ms, 0)
           GROUP BY m.group_id`,
          [userId]
        )
      ]);

      const directUnread = countsByKey(directUnreadRes.rows, "sender_id");
      const groupUnread = countsByKey(groupUnreadRes.rows, "group_id");

      const direct = parseMessages(directRes.rows).map((record) => {
        const partnerId = record.senderId === userId ? record.recipientId : record.senderId;
        return conversationFromRecord(userId, record, directUnread.get(String(partnerId)) ?? 0);
      });
      const groups = parseMessages(groupRes.rows).map((record) =>
        conversationFromRecord(userId, record, groupUnread.get(record.groupId ?? "") ?? 0)
      );
      return sortConversations([...direct, ...groups]);
    },

    async totalUnreadCount(userId: number): Promise<number> {
      const res = await pool.query(
        `SELECT
           (SELECT COUNT(*) FROM chat_messages
            WHERE group_id IS NULL AND recipient_id = $1 AND status IN ('SENT', 'DELIVERED'))
           +
           (SELECT COUNT(*) FROM chat_messages m
            JOIN chat_group_members g ON g.group_id = m.group_id AND g.user_id = $1
            LEFT JOIN chat_read_cursors c ON c.group_id = m.group_id AND c.user_id = $1
            WHERE m.sender_id <> $1 AND m.created_at_ms > COALESCE(c.read_at_ms, 0))
           AS unread_count`,
        [userId]
      );
      const count = asNumber((res.rows[0] as Record<string, unknown> | undefined)?.unread_count);
      return Number.isFinite(count) ? count : 0;
    },

    async updateStatus(messageId: string, actorId: number, status: StatusUpdate): Promise<MessageRecord | null> {
      const current = await getMessage(messageId);
      if (!current) return null;
      if (current.groupId !== null) {
        if (current.senderId === actorId || !(await isMember(current.groupId, actorId))) return null;
      } else if (current.recipientId !== actorId) {
        return null;
      }

      const now = nowMs();
      // Guarded on the status we read, so a concurrent update never moves the status backwards.
      const res = await pool.query(
        `UPDATE chat_messages SET
           status = $2,
           delivered_at_ms = COALESCE(delivered_at_ms, $3),
           read_at_ms = CASE WHEN $4 THEN COALESCE(read_at_ms, $3) ELSE read_at_ms END
         WHERE message_id = $1 AND status = $5
         RETURNING ${MESSAGE_COLUMNS}`,
        [messageId, advanceStatus(current.status, status), now, status === "READ", current.status]
      );

      if (current.groupId !== null && status === "READ") {
        await pool.query(
          `INSERT INTO chat_read_cursors (group_id, user_id, read_at_ms) VALUES ($1, $2, $3)
           ON CONFLICT (group_id, user_id) DO UPDATE SET
             read_at_ms = GREATEST(chat_read_cursors.read_at_ms, EXCLUDED.read_at_ms)`,
          [current.groupId, actorId, current.createdAtMs]
        );
      }

      if (res.rowCount === 1) return parseMessage(res.rows[0] as Record<string, unknown>);
      return getMessage(messageId);
    },

    async pinMessage(messageId: string, actorId: number, isPinned: boolean): Promise<MessageRecord | null> {
      const current = await getMessage(messageId);
      if (!current) return null;
      if (current.groupId !== null) {
        if (!(await isMember(current.groupId, actorId))) return null;
      } else if (current.senderId !== actorId && current.recipientId !== actorId) {
        return null;
      }

      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        if (isPinned) {
          if (current.groupId !== null) {
            await client.query(
              "UPDATE chat_messages SET is_pinned = FALSE WHERE group_id = $1 AND is_pinned AND message_id <> $2",
              [current.groupId, messageId]
            );
          } else {
            await client.query(
              `UPDATE chat_messages SET is_pinned = FALSE
               WHERE group_id IS NULL AND is_pinned AND message_id <> $3
                 AND ((sender_id = $1 AND recipient_id = $2) OR (sender_id = $2 AND recipient_id = $1))`,
              [current.senderId, current.recipientId, messageId]
            );
          }
        }
        const res = await client.query(
          `UPDATE chat_messages SET is_pinned = $2 WHERE message_id = $1 RETURNING ${MESSAGE_COLUMNS}`,
          [messageId, isPinned]
        );
        await client.query("COMMIT");
        return res.rowCount === 1 ? parseMessage(res.rows[0] as Record<string, unknown>) : null;
      } catch (e) {
        await client.query("ROLLBACK");
        throw e;
      } finally {
        client.release();
      }
    },

    async listGroupMemberIds(groupId: string): Promise<ReadonlyArray<number>> {
      const res = await pool.query("SELECT user_id FROM chat_group_members WHERE group_id = $1 ORDER BY user_id", [groupId]);
      return res.rows
        .map((row) => asNumber((row as Record<string, unknown>).user_id))
        .filter((userId) => Number.isSafeInteger(userId) && userId > 0);
    },

    getMessage,

    async addGroupMembers(groupId: string, userIds: ReadonlyArray<number>): Promise<void> {
      if (userIds.length === 0) return;
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        for (const userId of userIds) {
          await client.query(
            "INSERT INTO chat_group_members (group_id, user_id) VALUES ($1, $2) ON CONFLICT DO NOTHING",
            [groupId, userId]
          );
        }
        await client.query("COMMIT");
      } catch (e) {
        await client.query("ROLLBACK");
        throw e;
      } finally {
        client.release();
      }
    }
  };
}
