import { Pool } from "pg";

export type PostgresSettings = Readonly<{
  connectionString: string;
  ssl?: boolean;
  maxConnections: number;
}>;

const DEFAULT_MAX_CONNECTIONS = 20;

function asBoolean(value: string | undefined): boolean {
  return typeof value === "string" && value.trim().toLowerCase() === "true";
}

function asPositiveInt(value: string | undefined, fallback: number): number {
  if (typeof value !== "string" || !/^[0-9]+$/.test(value.trim())) return fallback;
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function resolvePostgresSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): PostgresSettings | null {
  const connectionString = typeof env.DATABASE_URL === "string" ? env.DATABASE_URL.trim() : "";
  if (connectionString === "") {
    return null;
  }
  return {
    connectionString,
    ssl: asBoolean(env.DATABASE_SSL),
    maxConnections: asPositiveInt(env.DATABASE_POOL_MAX, DEFAULT_MAX_CONNECTIONS)
  };
}

export function createPostgresPool(settings: PostgresSettings): Pool {
  return new Pool({
    connectionString: settings.connectionString,
    max: settings.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
    ssl: settings.ssl === true ? { rejectUnauthorized: false } : undefined
  });
}

export async function ensurePostgresSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_messages (
      message_id TEXT PRIMARY KEY,
      sender_id BIGINT NOT NULL,
      recipient_id BIGINT,
      group_id TEXT,
      content TEXT NOT NULL,
      message_type TEXT NOT NULL,
      status TEXT NOT NULL,
      reply_to_message_id TEXT,
      is_pinned BOOLEAN NOT NULL DEFAULT FALSE,
      created_at_ms BIGINT NOT NULL,
      delivered_at_ms BIGINT,
      read_at_ms BIGINT
    )
  `);
  await pool.query("ALTER TABLE chat_messages ADD COLUMN IF NOT EXISTS is_pinned BOOLEAN NOT NULL DEFAULT FALSE");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_messages_sender_id ON chat_messages(sender_id)");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_messages_recipient_status ON chat_messages(recipient_id, status)");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_messages_group_id ON chat_messages(group_id)");
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_messages_created_at_ms ON chat_messages(created_at_ms)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_group_members (
      group_id TEXT NOT NULL,
      user_id BIGINT NOT NULL,
      PRIMARY KEY (group_id, user_id)
    )
  `);
  await pool.query("CREATE INDEX IF NOT EXISTS idx_chat_group_members_user_id ON chat_group_members(user_id)");

  await pool.query(`
    CREATE TABLE IF NOT EXISTS chat_read_cursors (
      group_id TEXT NOT NULL,
      user_id BIGINT NOT NULL,
      read_at_ms BIGINT NOT NULL,
      PRIMARY KEY (group_id, user_id)
    )
  `);
}
