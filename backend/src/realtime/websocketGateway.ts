import type { IncomingMessage } from "node:http";
import type { WebSocket, WebSocketServer } from "ws";

import { silentLogger, type Logger } from "../logger";
import type { MessageRecord, MessageStore, OfflineNotifier, StatusUpdate } from "../services/messageStore";
import type { Connection } from "./connection";
import {
  createConnectionLifecycle,
  type ConnectionLifecycle,
  type InboundRouter,
  type SweepReport
} from "./connectionLifecycle";
import { createConversationSync } from "./conversationSync";
import { createDeliveryMetrics, type DeliveryMetricsSnapshot } from "./deliveryMetrics";
import {
  errorFrame,
  isUserStatus,
  typingResponseFrame,
  userStatusResponseFrame,
  type PinData,
  type SendMessageData,
  type TypingData
} from "./frames";
import { createIdentityResolver } from "./identityResolver";
import { createMessageDispatch } from "./messageDispatch";
import type { ErrorCode, Result } from "./result";
import { createSessionRegistry } from "./sessionRegistry";
import { createSignalRelay } from "./signalRelay";

export type WebsocketGatewayDeps = Readonly<{
  wss: WebSocketServer;
  store: MessageStore;
  notifier?: OfflineNotifier;
  jwtSecret?: string;
  userIdHeader?: string;

  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  authTimeoutMs?: number;
  sweepIntervalMs?: number;
  maxFrameBytes?: number;
  writeTimeoutMs?: number;
  persistenceTimeoutMs?: number;
  /** How often the delivery counters are logged. */
  metricsIntervalMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}>;

export type GatewayStats = DeliveryMetricsSnapshot &
  Readonly<{
    connections: number;
    sessions: number;
  }>;

export const DEFAULT_METRICS_INTERVAL_MS = 60_000;

export type WebsocketGateway = Readonly<{
  close(): Promise<void>;
  stats(): GatewayStats;
  isOnline(userId: number): boolean;
  /** Status changes that arrive over HTTP rather than the socket. */
  updateStatus(actorId: number, messageId: string, status: StatusUpdate): Promise<Result<MessageRecord>>;
  sweep(): Promise<SweepReport>;
}>;

export function createWebsocketGateway(deps: WebsocketGatewayDeps): WebsocketGateway {
  const nowMs = deps.nowMs ?? (() => Date.now());
  const logger = deps.logger ?? silentLogger;
  const metricsIntervalMs = deps.metricsIntervalMs ?? DEFAULT_METRICS_INTERVAL_MS;

  if (!Number.isFinite(metricsIntervalMs) || metricsIntervalMs <= 0) {
    throw new Error("websocketGateway requires a positive metricsIntervalMs.");
  }

  const metrics = createDeliveryMetrics();
  const registry = createSessionRegistry<Connection>({ logger });
  const identity = createIdentityResolver({ jwtSecret: deps.jwtSecret, userIdHeader: deps.userIdHeader });
  const relay = createSignalRelay({ registry, nowMs, logger });
  const sync = createConversationSync({
    registry,
    store: deps.store,
    persistenceTimeoutMs: deps.persistenceTimeoutMs,
    nowMs,
    logger
  });
  const dispatch = createMessageDispatch({
    registry,
    store: deps.store,
    sync,
    notifier: deps.notifier,
    persistenceTimeoutMs: deps.persistenceTimeoutMs,
    nowMs,
    logger
  });

  async function reply(connection: Connection, code: ErrorCode, message: string): Promise<void> {
    await connection.send(errorFrame(code, message, nowMs()));
  }

  async function handleTyping(connection: Connection, senderId: number, data: TypingData): Promise<void> {
    if (data.recipientId === undefined) {
      await reply(connection, "VALIDATION_ERROR", "Missing recipientId");
      return;
    }
    if (data.recipientId === senderId) {
      await reply(connection, "VALIDATION_ERROR", "Invalid recipient");
      return;
    }
    const isTyping = data.isTyping ?? false;
    await relay.typing(senderId, data.recipientId, data.senderName ?? `User ${senderId}`, isTyping);
    await connection.send(typingResponseFrame(data.recipientId, isTyping, nowMs()));
  }

  async function handleUserStatus(connection: Connection, userId: number, status: unknown): Promise<void> {
    if (!isUserStatus(status)) {
      await reply(connection, "VALIDATION_ERROR", "Invalid status");
      return;
    }
    await connection.send(userStatusResponseFrame(userId, status, nowMs()));
    await relay.presence(userId, status);
  }

  async function handleSendMessage(connection: Connection, data: SendMessageData): Promise<void> {
    const sent = await dispatch.send(connection, data);
    if (!sent.ok) await reply(connection, sent.error.code, sent.error.message);
  }

  async function handlePin(connection: Connection, data: PinData): Promise<void> {
    if (data.messageId === undefined || data.isPinned === undefined) {
      await reply(connection, "VALIDATION_ERROR", "Missing messageId or isPinned");
      return;
    }
    const pinned = await dispatch.pin(connection, data.messageId, data.isPinned);
    if (!pinned.ok) await reply(connection, pinned.error.code, pinned.error.message);
  }

  const route: InboundRouter = async (connection, frame) => {
    const userId = connection.userId;
    if (userId === null) return;

    switch (frame.kind) {
      case "SEND_MESSAGE":
        await handleSendMessage(connection, frame.data);
        return;
      case "TYPING":
        await handleTyping(connection, userId, frame.data);
        return;
      case "PIN_MESSAGE":
        await handlePin(connection, frame.data);
        return;
      case "USER_STATUS":
        await handleUserStatus(connection, userId, frame.status);
        return;
      case "GET_CONVERSATIONS": {
        const pushed = await sync.pushConversations(userId);
        if (!pushed.ok) await reply(connection, pushed.error.code, pushed.error.message);
        return;
      }
      case "UNKNOWN":
        logger.debug("Unknown frame type", { userId, type: frame.type });
        await reply(connection, "UNKNOWN_FRAME_TYPE", "Unknown message type");
        return;
      case "AUTH":
      case "PING":
        return;
    }
  };

  const lifecycle: ConnectionLifecycle = createConnectionLifecycle({
    registry,
    identity,
    relay,
    route,
    nowMs,
    heartbeatIntervalMs: deps.heartbeatIntervalMs,
    heartbeatTimeoutMs: deps.heartbeatTimeoutMs,
    authTimeoutMs: deps.authTimeoutMs,
    sweepIntervalMs: deps.sweepIntervalMs,
    maxInboundFrameBytes: deps.maxFrameBytes,
    maxFrameBytes: deps.maxFrameBytes,
    writeTimeoutMs: deps.writeTimeoutMs,
    metrics,
    logger
  });

  deps.wss.on("connection", (ws: WebSocket, request: IncomingMessage) => {
    lifecycle.attach(ws, request);
  });
  lifecycle.start();

  function stats(): GatewayStats {
    return { connections: lifecycle.connectionCount(), sessions: registry.count(), ...metrics.snapshot() };
  }

  const metricsTimer = setInterval(() => logger.info("Delivery metrics", stats()), metricsIntervalMs);
  metricsTimer.unref();

  return {
    async close(): Promise<void> {
      clearInterval(metricsTimer);
      await lifecycle.close();
      await new Promise<void>((resolve) => deps.wss.close(() => resolve()));
    },

    stats,

    isOnline(userId: number): boolean {
      return registry.lookup(userId) !== undefined;
    },

    updateStatus(actorId: number, messageId: string, status: StatusUpdate): Promise<Result<MessageRecord>> {
      return dispatch.updateStatus(actorId, messageId, status);
    },

    sweep(): Promise<SweepReport> {
      return lifecycle.sweep();
    }
  };
}
