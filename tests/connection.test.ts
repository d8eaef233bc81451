import { createConnection } from "../backend/src/realtime/connection";
import { createDeliveryMetrics } from "../backend/src/realtime/deliveryMetrics";
import { errorFrame, pongFrame } from "../backend/src/realtime/frames";
import { createFakeSocket } from "./support/fakeSocket";

describe("connection", () => {
  it("Given invalid connection options When createConnection is called Then it throws deterministically", () => {
    const socket = createFakeSocket();
    expect(() => createConnection({ socket, maxFrameBytes: 0 })).toThrow("connection requires a positive maxFrameBytes.");
    expect(() => createConnection({ socket, writeTimeoutMs: -1 })).toThrow("connection requires a positive writeTimeoutMs.");
  });

  it("Given a new connection When it is authenticated and activated Then it moves through the lifecycle in order", () => {
    const connection = createConnection({ socket: createFakeSocket(), id: "c1" });
    expect(connection.state).toBe("CONNECTING");
    expect(connection.userId).toBeNull();

    connection.authenticate(5);
    expect(connection.state).toBe("AUTHENTICATED");
    expect(connection.userId).toBe(5);

    connection.activate();
    expect(connection.state).toBe("ACTIVE");
    expect(() => connection.authenticate(6)).toThrow("Invalid connection transition ACTIVE -> AUTHENTICATED.");
  });

  it("Given a connecting connection When it is activated directly Then the transition is rejected", () => {
    const connection = createConnection({ socket: createFakeSocket() });
    expect(() => connection.activate()).toThrow("Invalid connection transition CONNECTING -> ACTIVE.");
  });

  it("Given several frames sent without waiting When the writes settle Then they reach the socket in call order", async () => {
    const socket = createFakeSocket();
    const connection = createConnection({ socket });

    const results = await Promise.all([
      connection.send(pongFrame(1)),
      connection.send(pongFrame(2)),
      connection.send(pongFrame(3))
    ]);

    expect(results.every((r) => r.ok)).toBe(true);
    expect(socket.sent).toEqual([
      JSON.stringify({ type: "PONG", timestamp: 1 }),
      JSON.stringify({ type: "PONG", timestamp: 2 }),
      JSON.stringify({ type: "PONG", timestamp: 3 })
    ]);
  });

  it("Given a frame over the size limit When it is sent Then it is dropped and the connection survives", async () => {
    const socket = createFakeSocket();
    const connection = createConnection({ socket, maxFrameBytes: 64 });

    const result = await connection.send(errorFrame("VALIDATION_ERROR", "x".repeat(100), 1));

    expect(result.ok).toBe(false);
    if (result.ok) throw new Error("unreachable");
    expect(result.error.code).toBe("FRAME_TOO_LARGE");
    expect(result.error.message).toBe("Outbound frame exceeds the size limit.");
    expect(socket.sent).toEqual([]);
    expect(socket.terminated).toBe(false);
    expect(connection.state).toBe("CONNECTING");
  });

  it("Given a socket whose write fails When a frame is sent Then the connection is aborted", async () => {
    const socket = createFakeSocket("error");
    const connection = createConnection({ socket });

    const result = await connection.send(pongFrame(1));

    expect(result).toEqual({
      ok: false,
      error: { code: "DELIVERY_FAILURE", message: "socket write failed", context: { connectionId: connection.id } }
    });
    expect(connection.state).toBe("CLOSING");
    expect(socket.terminated).toBe(true);
  });

  it("Given a socket that never acknowledges When the write timeout passes Then the connection is aborted", async () => {
    const socket = createFakeSocket("hang");
    const connection = createConnection({ socket, writeTimeoutMs: 20 });

    const result = await connection.send(pongFrame(1));

    expect(result.ok).toBe(false);
    if (result.ok) throw new Error("unreachable");
    expect(result.error.code).toBe("DELIVERY_FAILURE");
    expect(result.error.message).toBe("Write timed out after 20ms.");
    expect(socket.terminated).toBe(true);
  });

  it("Given a closed connection When it is closed again or written to Then nothing reaches the socket", async () => {
    const socket = createFakeSocket();
    const connection = createConnection({ socket });

    connection.close(1000, "bye");
    connection.close(1000, "again");

    expect(connection.state).toBe("CLOSING");
    expect(socket.closeCalls).toBe(1);
    expect(socket.closed).toEqual({ code: 1000, reason: "bye" });

    const result = await connection.send(pongFrame(1));
    expect(result.ok).toBe(false);
    if (result.ok) throw new Error("unreachable");
    expect(result.error.message).toBe("Connection is not open.");

    connection.markClosed();
    connection.markClosed();
    expect(connection.state).toBe("CLOSED");
  });

  it("Given an injected clock When the connection is touched Then last activity follows the clock", () => {
    let now = 1_000;
    const connection = createConnection({ socket: createFakeSocket(), nowMs: () => now });
    expect(connection.openedAtMs).toBe(1_000);

    now = 4_000;
    connection.touch();

    expect(connection.lastActivityMs).toBe(4_000);
    expect(connection.openedAtMs).toBe(1_000);
  });

  it("Given shared delivery metrics When frames are written, dropped and failed Then each outcome is counted", async () => {
    const metrics = createDeliveryMetrics();
    const healthy = createConnection({ socket: createFakeSocket(), maxFrameBytes: 64, metrics });
    const broken = createConnection({ socket: createFakeSocket("error"), metrics });

    await healthy.send(pongFrame(1));
    await healthy.send(errorFrame("VALIDATION_ERROR", "x".repeat(100), 1));
    await broken.send(pongFrame(1));

    expect(metrics.snapshot()).toEqual({ totalConnections: 0, messagesSent: 1, messagesFailed: 2 });
  });
});
