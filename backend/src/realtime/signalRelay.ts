import { silentLogger, type Logger } from "../logger";
import type { Connection } from "./connection";
import { typingFrame, userStatusBroadcastFrame, type UserStatus } from "./frames";
import type { SessionRegistry } from "./sessionRegistry";

export type SignalRelayDeps = Readonly<{
  registry: SessionRegistry<Connection>;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type SignalRelay = Readonly<{
  /** Unicast; resolves false when the recipient is not connected or the write failed. */
  typing(senderId: number, recipientId: number, senderName: string, isTyping: boolean): Promise<boolean>;
  /** Broadcast to every active session except the subject's own. Resolves the delivered count. */
  presence(userId: number, status: UserStatus): Promise<number>;
}>;

export function createSignalRelay(deps: SignalRelayDeps): SignalRelay {
  const registry = deps.registry;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;

  return {
    async typing(senderId: number, recipientId: number, senderName: string, isTyping: boolean): Promise<boolean> {
      const recipient = registry.lookup(recipientId);
      if (!recipient || recipient.state !== "ACTIVE") {
        logger.debug("Typing indicator dropped; recipient offline", { senderId, recipientId });
        return false;
      }
      const sent = await recipient.send(typingFrame(senderId, senderName, isTyping, nowMs()));
      if (!sent.ok) {
        logger.warn("Typing indicator not delivered", { senderId, recipientId, code: sent.error.code });
      }
      return sent.ok;
    },

    async presence(userId: number, status: UserStatus): Promise<number> {
      const frame = userStatusBroadcastFrame(userId, status, nowMs());
      const targets = registry
        .snapshot()
        .filter((entry) => entry.userId !== userId && entry.connection.state === "ACTIVE");

      const results = await Promise.all(
        targets.map(async (entry) => {
          const sent = await entry.connection.send(frame);
          if (!sent.ok) {
            logger.warn("Presence broadcast not delivered", { userId, recipientId: entry.userId, code: sent.error.code });
          }
          return sent.ok;
        })
      );
      const delivered = results.filter(Boolean).length;
      logger.debug("Presence broadcast", { userId, status, delivered, targets: targets.length });
      return delivered;
    }
  };
}
