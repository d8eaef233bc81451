import { silentLogger, type Logger } from "../logger";
import { CLOSE_NORMAL } from "./connection";

/**
 * What the registry needs from a connection: its owner and a way to close it. Kept narrow so the
 * registry can be exercised without sockets.
 */
export type RegisteredConnection = {
  readonly id: string;
  readonly userId: number | null;
  close(code: number, reason: string): void;
};

export type SessionEntry<C extends RegisteredConnection> = Readonly<{
  userId: number;
  connection: C;
}>;

export type SessionRegistry<C extends RegisteredConnection> = Readonly<{
  /** Installs `connection` for `userId`, closing and returning any connection it replaced. */
  register(userId: number, connection: C): C | undefined;
  /** Removes the entry only while it still points at `connection`. */
  unregister(connection: C): number | undefined;
  lookup(userId: number): C | undefined;
  count(): number;
  /** A copy of the current entries; safe to iterate while entries come and go. */
  snapshot(): ReadonlyArray<SessionEntry<C>>;
  closeAll(code: number, reason: string): number;
}>;

export type SessionRegistryDeps = Readonly<{
  logger?: Logger;
}>;

// Every method below runs to completion without awaiting, so each one is atomic with respect to
// every other caller on the event loop. Callers do their I/O on what these return, never inside.
export function createSessionRegistry<C extends RegisteredConnection>(
  deps: SessionRegistryDeps = {}
): SessionRegistry<C> {
  const logger = deps.logger ?? silentLogger;
  const byUserId = new Map<number, C>();

  return {
    register(userId: number, connection: C): C | undefined {
      if (!Number.isSafeInteger(userId) || userId <= 0) {
        throw new Error("sessionRegistry requires a positive integer userId.");
      }
      const previous = byUserId.get(userId);
      if (previous === connection) return undefined;

      if (previous) {
        byUserId.delete(userId);
        previous.close(CLOSE_NORMAL, "Session superseded");
        logger.info("Evicted superseded session", { userId, connectionId: previous.id });
      }
      byUserId.set(userId, connection);
      return previous;
    },

    unregister(connection: C): number | undefined {
      const userId = connection.userId;
      if (userId === null) return undefined;
      if (byUserId.get(userId) !== connection) return undefined;
      byUserId.delete(userId);
      return userId;
    },

    lookup(userId: number): C | undefined {
      return byUserId.get(userId);
    },

    count(): number {
      return byUserId.size;
    },

    snapshot(): ReadonlyArray<SessionEntry<C>> {
      return Array.from(byUserId.entries()).map(([userId, connection]) => ({ userId, connection }));
    },

    closeAll(code: number, reason: string): number {
      const entries = Array.from(byUserId.values());
      byUserId.clear();
      for (const connection of entries) {
        connection.close(code, reason);
      }
      return entries.length;
    }
  };
}
