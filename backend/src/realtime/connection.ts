import { randomUUID } from "node:crypto";

import { silentLogger, type Logger } from "../logger";
import type { DeliveryMetrics } from "./deliveryMetrics";
import type { OutboundFrame } from "./frames";
import { describeError, err, ok, type Result } from "./result";

export type ConnectionState = "CONNECTING" | "AUTHENTICATED" | "ACTIVE" | "CLOSING" | "CLOSED";

/**
 * The subset of a `ws` WebSocket the core writes through. Tests substitute an in-process fake.
 */
export type SocketLike = {
  readonly readyState: number;
  send(data: string, cb?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
};

export const SOCKET_OPEN = 1;

export const CLOSE_NORMAL = 1000;
export const CLOSE_POLICY_VIOLATION = 1008;
export const CLOSE_MESSAGE_TOO_BIG = 1009;
export const CLOSE_GOING_AWAY = 1001;

export type Connection = {
  readonly id: string;
  readonly userId: number | null;
  readonly state: ConnectionState;
  readonly openedAtMs: number;
  readonly lastActivityMs: number;
  readonly maxFrameBytes: number;
  isOpen(): boolean;
  touch(): void;
  authenticate(userId: number): void;
  activate(): void;
  send(frame: OutboundFrame): Promise<Result<void>>;
  close(code: number, reason: string): void;
  abort(reason: string): void;
  markClosed(): void;
};

export type ConnectionDeps = Readonly<{
  socket: SocketLike;
  id?: string;
  nowMs?: () => number;
  maxFrameBytes?: number;
  writeTimeoutMs?: number;
  /** Counts every outbound frame as sent or failed. */
  metrics?: DeliveryMetrics;
  logger?: Logger;
}>;

export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024;
export const DEFAULT_WRITE_TIMEOUT_MS = 5_000;

const TRANSITIONS: Readonly<Record<ConnectionState, ReadonlyArray<ConnectionState>>> = {
  CONNECTING: ["AUTHENTICATED", "CLOSING", "CLOSED"],
  AUTHENTICATED: ["ACTIVE", "CLOSING", "CLOSED"],
  ACTIVE: ["CLOSING", "CLOSED"],
  CLOSING: ["CLOSED"],
  CLOSED: []
};

export function createConnection(deps: ConnectionDeps): Connection {
  const socket = deps.socket;
  const id = deps.id ?? randomUUID();
  const nowMs = deps.nowMs ?? (() => Date.now());
  const maxFrameBytes = deps.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
  const writeTimeoutMs = deps.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;
  const metrics = deps.metrics;
  const logger = deps.logger ?? silentLogger;

  if (!Number.isFinite(maxFrameBytes) || maxFrameBytes <= 0) {
    throw new Error("connection requires a positive maxFrameBytes.");
  }
  if (!Number.isFinite(writeTimeoutMs) || writeTimeoutMs <= 0) {
    throw new Error("connection requires a positive writeTimeoutMs.");
  }

  let state: ConnectionState = "CONNECTING";
  let userId: number | null = null;
  const openedAtMs = nowMs();
  let lastActivityMs = openedAtMs;
  // Writes to one socket never interleave: each send waits for the previous one to settle.
  let writeChain: Promise<void> = Promise.resolve();

  function transition(next: ConnectionState): void {
    if (!TRANSITIONS[state].includes(next)) {
      throw new Error(`Invalid connection transition ${state} -> ${next}.`);
    }
    state = next;
  }

  function isClosingOrClosed(): boolean {
    return state === "CLOSING" || state === "CLOSED";
  }

  function isOpen(): boolean {
    return socket.readyState === SOCKET_OPEN && !isClosingOrClosed();
  }

  function abort(reason: string): void {
    if (isClosingOrClosed()) return;
    transition("CLOSING");
    logger.warn("Aborting connection", { connectionId: id, userId, reason });
    try {
      socket.terminate();
    } catch (e: unknown) {
      logger.debug("Terminate failed on an already closed socket", { connectionId: id, error: describeError(e) });
    }
  }

  function write(text: string): Promise<Result<void>> {
    if (!isOpen()) {
      return Promise.resolve(err("DELIVERY_FAILURE", "Connection is not open.", { connectionId: id }));
    }

    return new Promise<Result<void>>((resolve) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finish = (result: Result<void>): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      const fail = (reason: string): void => {
        abort(reason);
        finish(err("DELIVERY_FAILURE", reason, { connectionId: id }));
      };

      timer = setTimeout(() => fail(`Write timed out after ${writeTimeoutMs}ms.`), writeTimeoutMs);

      try {
        socket.send(text, (error?: Error) => {
          if (error) {
            fail(error.message);
            return;
          }
          finish(ok(undefined));
        });
      } catch (e: unknown) {
        fail(describeError(e));
      }
    });
  }

  return {
    id,
    get userId(): number | null {
      return userId;
    },
    get state(): ConnectionState {
      return state;
    },
    openedAtMs,
    get lastActivityMs(): number {
      return lastActivityMs;
    },
    maxFrameBytes,

    isOpen,

    touch(): void {
      lastActivityMs = nowMs();
    },

    authenticate(resolvedUserId: number): void {
      transition("AUTHENTICATED");
      userId = resolvedUserId;
    },

    activate(): void {
      transition("ACTIVE");
    },

    send(frame: OutboundFrame): Promise<Result<void>> {
      const text = JSON.stringify(frame);
      const bytes = Buffer.byteLength(text, "utf8");
      if (bytes > maxFrameBytes) {
        logger.error("Dropping oversized outbound frame", { connectionId: id, type: frame.type, bytes, maxFrameBytes });
        metrics?.recordWrite(false);
        return Promise.resolve(
          err("FRAME_TOO_LARGE", "Outbound frame exceeds the size limit.", { type: frame.type, bytes, maxBytes: maxFrameBytes })
        );
      }
      const result = writeChain
        .then(() => write(text))
        .then((written) => {
          metrics?.recordWrite(written.ok);
          return written;
        });
      writeChain = result.then(() => undefined);
      return result;
    },

    close(code: number, reason: string): void {
      if (isClosingOrClosed()) return;
      transition("CLOSING");
      try {
        socket.close(code, reason);
      } catch (e: unknown) {
        logger.debug("Close failed on an already closed socket", { connectionId: id, error: describeError(e) });
      }
    },

    abort,

    markClosed(): void {
      if (state === "CLOSED") return;
      transition("CLOSED");
    }
  };
}
