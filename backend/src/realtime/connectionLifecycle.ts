import type { IncomingMessage } from "node:http";
import type { RawData, WebSocket } from "ws";

import { silentLogger, type Logger } from "../logger";
import {
  CLOSE_GOING_AWAY,
  CLOSE_MESSAGE_TOO_BIG,
  CLOSE_POLICY_VIOLATION,
  DEFAULT_MAX_FRAME_BYTES,
  DEFAULT_WRITE_TIMEOUT_MS,
  createConnection,
  type Connection,
  type SocketLike
} from "./connection";
import type { DeliveryMetrics } from "./deliveryMetrics";
import {
  authRequestFrame,
  authSuccessFrame,
  connectionFrame,
  decodeFrame,
  errorFrame,
  pongFrame,
  type InboundFrame
} from "./frames";
import type { HandshakeRequest, IdentityResolver, ResolvedIdentity } from "./identityResolver";
import { describeError, type ErrorCode } from "./result";
import type { SessionRegistry } from "./sessionRegistry";
import type { SignalRelay } from "./signalRelay";

/** Handles a decoded frame from an ACTIVE connection. AUTH and PING never reach it. */
export type InboundRouter = (connection: Connection, frame: InboundFrame) => Promise<void>;

export type ConnectionLifecycleDeps = Readonly<{
  registry: SessionRegistry<Connection>;
  identity: IdentityResolver;
  relay: Pick<SignalRelay, "presence">;
  route: InboundRouter;
  nowMs?: () => number;
  heartbeatIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  authTimeoutMs?: number;
  sweepIntervalMs?: number;
  maxInboundFrameBytes?: number;
  maxFrameBytes?: number;
  writeTimeoutMs?: number;
  metrics?: DeliveryMetrics;
  logger?: Logger;
}>;

export type SweepReport = Readonly<{
  retired: number;
  authTimeouts: number;
  heartbeatTimeouts: number;
}>;

export type ConnectionLifecycle = Readonly<{
  /** Wires a `ws` socket's events to this manager. */
  attach(socket: WebSocket, request: IncomingMessage): void;
  accept(socket: SocketLike, request: HandshakeRequest): Promise<Connection>;
  handleData(connection: Connection, payload: Buffer): Promise<void>;
  /** Idempotent. Broadcasts OFFLINE only when the connection still owned its user's session. */
  retire(connection: Connection): Promise<boolean>;
  sweep(): Promise<SweepReport>;
  start(): void;
  connectionCount(): number;
  close(): Promise<void>;
}>;

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 90_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 30_000;
export const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`connectionLifecycle requires a positive ${name}.`);
  }
}

function toBuffer(data: RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (Buffer.isBuffer(data)) return data;
  return Buffer.from(data);
}

export function createConnectionLifecycle(deps: ConnectionLifecycleDeps): ConnectionLifecycle {
  const registry = deps.registry;
  const identity = deps.identity;
  const relay = deps.relay;
  const route = deps.route;
  const nowMs = deps.nowMs ?? (() => Date.now());
  const heartbeatIntervalMs = deps.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
  const heartbeatTimeoutMs = deps.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const authTimeoutMs = deps.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
  const sweepIntervalMs = deps.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  const maxInboundFrameBytes = deps.maxInboundFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  const maxFrameBytes = deps.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  const writeTimeoutMs = deps.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  const metrics = deps.metrics;
  const logger = deps.logger ?? silentLogger;

  requirePositive("heartbeatIntervalMs", heartbeatIntervalMs);
  requirePositive("heartbeatTimeoutMs", heartbeatTimeoutMs);
  requirePositive("authTimeoutMs", authTimeoutMs);
  requirePositive("sweepIntervalMs", sweepIntervalMs);
  requirePositive("maxInboundFrameBytes", maxInboundFrameBytes);

  const connections = new Set<Connection>();
  // Frames from one connection are handled strictly in arrival order.
  const inboundChains = new WeakMap<Connection, Promise<void>>();
  let sweepTimer: NodeJS.Timeout | undefined;
  let closed = false;

  function runDetached(task: Promise<unknown>, label: string): void {
    task.catch((e: unknown) => {
      logger.error("Unhandled failure in connection task", { task: label, error: describeError(e) });
    });
  }

  async function rejectAndClose(connection: Connection, code: ErrorCode, message: string, closeCode: number): Promise<void> {
    await connection.send(errorFrame(code, message, nowMs()));
    connection.close(closeCode, message);
  }

  async function sendError(connection: Connection, code: ErrorCode, message: string): Promise<void> {
    await connection.send(errorFrame(code, message, nowMs()));
  }

  async function admit(connection: Connection, resolved: ResolvedIdentity): Promise<void> {
    const userId = resolved.userId;
    // Registration and activation happen before the first await so frames that follow see ACTIVE.
    connection.authenticate(userId);
    registry.register(userId, connection);
    connection.activate();

    const info = { userId, activeConnections: registry.count(), heartbeatIntervalMs };
    const welcome = resolved.source === "auth_frame" ? authSuccessFrame(info, nowMs()) : connectionFrame(info, nowMs());
    await connection.send(welcome);
    logger.info("User connected", { userId, source: resolved.source, connectionId: connection.id });

    await relay.presence(userId, "ONLINE");
  }

  async function handleAuth(connection: Connection, userId: unknown): Promise<void> {
    if (connection.state !== "CONNECTING") {
      await sendError(connection, "VALIDATION_ERROR", "Already authenticated");
      return;
    }
    const resolved = identity.resolveAuthFrame(userId);
    if (!resolved.ok) {
      await sendError(connection, resolved.error.code, resolved.error.message);
      return;
    }
    await admit(connection, resolved.value);
  }

  async function handleFrame(connection: Connection, payload: Buffer): Promise<void> {
    if (!connection.isOpen()) return;
    connection.touch();

    if (payload.byteLength > maxInboundFrameBytes) {
      logger.warn("Inbound frame too large", { connectionId: connection.id, bytes: payload.byteLength });
      await rejectAndClose(connection, "FRAME_TOO_LARGE", "Payload too large.", CLOSE_MESSAGE_TOO_BIG);
      return;
    }

    const decoded = decodeFrame(payload.toString("utf8"));
    if (!decoded.ok) {
      await sendError(connection, decoded.error.code, decoded.error.message);
      return;
    }

    const frame = decoded.value;
    switch (frame.kind) {
      case "PING":
        await connection.send(pongFrame(nowMs()));
        return;
      case "AUTH":
        await handleAuth(connection, frame.userId);
        return;
      default:
        if (connection.state !== "ACTIVE") {
          await sendError(connection, "UNAUTHENTICATED", "User not authenticated");
          return;
        }
        await route(connection, frame);
    }
  }

  async function retire(connection: Connection): Promise<boolean> {
    if (!connections.delete(connection)) return false;
    connection.markClosed();

    const userId = registry.unregister(connection);
    if (userId === undefined) {
      logger.debug("Connection closed", { connectionId: connection.id });
      return true;
    }
    logger.info("User disconnected", { userId, connectionId: connection.id });
    await relay.presence(userId, "OFFLINE");
    return true;
  }

  async function accept(socket: SocketLike, request: HandshakeRequest): Promise<Connection> {
    const connection = createConnection({ socket, nowMs, maxFrameBytes, writeTimeoutMs, metrics, logger });
    connections.add(connection);
    metrics?.connectionOpened();

    const resolved = identity.resolveHandshake(request);
    if (resolved.ok) {
      await admit(connection, resolved.value);
    } else {
      logger.debug("Awaiting AUTH frame", { connectionId: connection.id });
      await connection.send(authRequestFrame(nowMs()));
    }
    return connection;
  }

  function handleData(connection: Connection, payload: Buffer): Promise<void> {
    const previous = inboundChains.get(connection) ?? Promise.resolve();
    const next = previous.then(() => handleFrame(connection, payload));
    inboundChains.set(
      connection,
      next.catch((e: unknown) => {
        logger.error("Inbound frame handling failed", { connectionId: connection.id, error: describeError(e) });
      })
    );
    return next;
  }

  async function sweep(): Promise<SweepReport> {
    const now = nowMs();
    let retired = 0;
    let authTimeouts = 0;
    let heartbeatTimeouts = 0;

    const tasks: Array<Promise<void>> = [];
    for (const connection of Array.from(connections)) {
      if (!connection.isOpen()) {
        retired += 1;
        tasks.push(retire(connection).then(() => undefined));
      } else if (connection.state === "CONNECTING" && now - connection.openedAtMs > authTimeoutMs) {
        authTimeouts += 1;
        tasks.push(rejectAndClose(connection, "UNAUTHENTICATED", "Authentication timeout.", CLOSE_POLICY_VIOLATION));
      } else if (connection.state === "ACTIVE" && now - connection.lastActivityMs > heartbeatTimeoutMs) {
        heartbeatTimeouts += 1;
        tasks.push(rejectAndClose(connection, "TRANSPORT_FAILURE", "Heartbeat timeout.", CLOSE_POLICY_VIOLATION));
      }
    }
    await Promise.all(tasks);

    if (retired + authTimeouts + heartbeatTimeouts > 0) {
      logger.info("Connection sweep", { retired, authTimeouts, heartbeatTimeouts, remaining: connections.size });
    }
    return { retired, authTimeouts, heartbeatTimeouts };
  }

  return {
    attach(socket: WebSocket, request: IncomingMessage): void {
      if (closed) {
        socket.close(CLOSE_GOING_AWAY, "Server shutting down");
        return;
      }
      const accepted = accept(socket, { url: request.url, headers: request.headers });
      runDetached(accepted, "accept");

      socket.on("message", (data: RawData) => {
        runDetached(
          accepted.then((connection) => handleData(connection, toBuffer(data))),
          "message"
        );
      });
      socket.on("close", () => {
        runDetached(
          accepted.then((connection) => retire(connection)),
          "close"
        );
      });
      socket.on("error", (error: Error) => {
        logger.warn("Socket error", { error: error.message });
      });
    },

    accept,
    handleData,
    retire,
    sweep,

    start(): void {
      if (sweepTimer || closed) return;
      sweepTimer = setInterval(() => runDetached(sweep(), "sweep"), sweepIntervalMs);
      sweepTimer.unref();
    },

    connectionCount(): number {
      return connections.size;
    },

    async close(): Promise<void> {
      closed = true;
      if (sweepTimer) {
        clearInterval(sweepTimer);
        sweepTimer = undefined;
      }
      const remaining = Array.from(connections);
      registry.closeAll(CLOSE_GOING_AWAY, "Server shutting down");
      for (const connection of remaining) {
        connection.close(CLOSE_GOING_AWAY, "Server shutting down");
      }
      await Promise.all(remaining.map((connection) => retire(connection)));
    }
  };
}
