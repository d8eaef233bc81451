import http from "node:http";
import jwt from "jsonwebtoken";
import { WebSocket, WebSocketServer } from "ws";

import { createWebsocketGateway, type WebsocketGateway } from "../backend/src/realtime/websocketGateway";
import { createInMemoryMessageRepository } from "../backend/src/repositories/inMemoryMessageRepository";
import type { MessageRepository } from "../backend/src/services/messageStore";

const T = 1_700_000_000_000;

type Frame = Record<string, unknown>;

type Inbox = Readonly<{
  next(type: string): Promise<Frame>;
  types(): string[];
}>;

function waitForOpen(ws: WebSocket): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", (e) => reject(e));
  });
}

function waitForClose(ws: WebSocket): Promise<void> {
  return new Promise((resolve) => {
    if (ws.readyState === WebSocket.CLOSED) {
      resolve();
      return;
    }
    ws.once("close", () => resolve());
  });
}

// Buffers every frame so a test can wait for one that arrived before it started listening.
function createInbox(ws: WebSocket): Inbox {
  const received: Frame[] = [];
  const seen: string[] = [];
  const waiters: Array<{ type: string; resolve: (frame: Frame) => void }> = [];

  ws.on("message", (data) => {
    const text = Buffer.isBuffer(data) ? data.toString("utf8") : String(data);
    const frame: Frame = JSON.parse(text);
    seen.push(String(frame.type));
    const index = waiters.findIndex((w) => w.type === frame.type);
    const waiter = index === -1 ? undefined : waiters.splice(index, 1)[0];
    if (waiter) waiter.resolve(frame);
    else received.push(frame);
  });

  return {
    next(type: string): Promise<Frame> {
      const index = received.findIndex((frame) => frame.type === type);
      const buffered = index === -1 ? undefined : received.splice(index, 1)[0];
      if (buffered) return Promise.resolve(buffered);
      return new Promise((resolve) => waiters.push({ type, resolve }));
    },
    types(): string[] {
      return [...seen];
    }
  };
}

async function createServer(): Promise<{
  url: string;
  wss: WebSocketServer;
  closeHttp(): Promise<void>;
}> {
  const server = http.createServer((_req, res) => {
    res.writeHead(200);
    res.end("ok");
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("unexpected address");
  const url = `ws://127.0.0.1:${address.port}`;
  const wss = new WebSocketServer({ server });
  return {
    url,
    wss,
    async closeHttp() {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  };
}

describe("websocketGateway", () => {
  let server: Awaited<ReturnType<typeof createServer>>;
  let gateway: WebsocketGateway;
  let store: MessageRepository;
  const clients: WebSocket[] = [];

  async function connect(query: string): Promise<{ ws: WebSocket; inbox: Inbox }> {
    const ws = new WebSocket(`${server.url}/${query}`);
    const inbox = createInbox(ws);
    clients.push(ws);
    await waitForOpen(ws);
    return { ws, inbox };
  }

  beforeEach(async () => {
    server = await createServer();
    store = createInMemoryMessageRepository({ nowMs: () => T });
    gateway = createWebsocketGateway({
      wss: server.wss,
      store,
      jwtSecret: "test-secret",
      nowMs: () => T
    });
  });

  afterEach(async () => {
    for (const ws of clients.splice(0)) {
      ws.close();
      await waitForClose(ws);
    }
    await gateway.close();
    await server.closeHttp();
  });

  it("Given a userId in the query When a client connects Then it is welcomed and others see it come online", async () => {
    const alice = await connect("?userId=1");
    await expect(alice.inbox.next("CONNECTION")).resolves.toEqual({
      type: "CONNECTION",
      userId: 1,
      status: "connected",
      message: "WebSocket connection established",
      activeConnections: 1,
      heartbeatInterval: 30_000,
      timestamp: T
    });

    const bob = await connect("?userId=2");
    await expect(bob.inbox.next("CONNECTION")).resolves.toMatchObject({ userId: 2, activeConnections: 2 });
    await expect(alice.inbox.next("USER_STATUS_BROADCAST")).resolves.toEqual({
      type: "USER_STATUS_BROADCAST",
      userId: 2,
      status: "ONLINE",
      timestamp: T
    });
    expect(gateway.isOnline(2)).toBe(true);
  });

  it("Given two connected users When one sends a message Then the other receives it and the sender is acknowledged", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");
    const bob = await connect("?userId=2");
    await bob.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "SEND_MESSAGE", data: { recipientId: 2, content: "hi", type: "TEXT" } }));

    const incoming = await bob.inbox.next("NEW_MESSAGE");
    expect(incoming.data).toMatchObject({ senderId: 1, receiverId: 2, content: "hi", type: "TEXT", status: "SENT" });
    await expect(alice.inbox.next("SEND_MESSAGE_RESPONSE")).resolves.toMatchObject({ recipientId: 2, status: "SENT" });
    await expect(bob.inbox.next("UNREAD_COUNT")).resolves.toEqual({ type: "UNREAD_COUNT", totalUnreadCount: 1, timestamp: T });
  });

  it("Given a connected user When an unknown frame type arrives Then an error is returned and the connection stays usable", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "DANCE" }));
    await expect(alice.inbox.next("ERROR")).resolves.toEqual({
      type: "ERROR",
      code: "UNKNOWN_FRAME_TYPE",
      message: "Unknown message type",
      timestamp: T
    });

    alice.ws.send(JSON.stringify({ type: "PING" }));
    await expect(alice.inbox.next("PONG")).resolves.toEqual({ type: "PONG", timestamp: T });
  });

  it("Given no handshake identity When the client sends AUTH Then it is authenticated", async () => {
    const guest = await connect("");
    await expect(guest.inbox.next("AUTH_REQUEST")).resolves.toMatchObject({
      message: "Please provide userId or token for authentication"
    });

    guest.ws.send(JSON.stringify({ type: "AUTH", userId: 5 }));

    await expect(guest.inbox.next("AUTH_SUCCESS")).resolves.toMatchObject({ userId: 5, status: "authenticated" });
    expect(gateway.isOnline(5)).toBe(true);
  });

  it("Given a signed token in the query When the client connects Then the token's userId is used", async () => {
    const token = jwt.sign({ userId: 42 }, "test-secret", { algorithm: "HS256" });
    const client = await connect(`?token=${encodeURIComponent(token)}`);

    await expect(client.inbox.next("CONNECTION")).resolves.toMatchObject({ userId: 42 });
  });

  it("Given two connected users When one types Then the other sees the indicator and the sender gets a response", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");
    const bob = await connect("?userId=2");
    await bob.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "TYPING", data: { recipientId: 2, isTyping: true } }));

    await expect(bob.inbox.next("TYPING")).resolves.toEqual({
      type: "TYPING",
      senderId: 1,
      senderName: "User 1",
      isTyping: true,
      timestamp: T
    });
    await expect(alice.inbox.next("TYPING_RESPONSE")).resolves.toEqual({
      type: "TYPING_RESPONSE",
      recipientId: 2,
      isTyping: true,
      message: "Typing indicator sent",
      timestamp: T
    });
  });

  it("Given two connected users When one disconnects Then the other is told it went offline", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");
    const bob = await connect("?userId=2");
    await bob.inbox.next("CONNECTION");
    await alice.inbox.next("USER_STATUS_BROADCAST");

    bob.ws.close();
    await waitForClose(bob.ws);

    await expect(alice.inbox.next("USER_STATUS_BROADCAST")).resolves.toEqual({
      type: "USER_STATUS_BROADCAST",
      userId: 2,
      status: "OFFLINE",
      timestamp: T
    });
    expect(gateway.isOnline(2)).toBe(false);
  });

  it("Given a non-positive metrics interval When the gateway is created Then it throws deterministically", () => {
    expect(() => createWebsocketGateway({ wss: server.wss, store, metricsIntervalMs: 0 })).toThrow(
      "websocketGateway requires a positive metricsIntervalMs."
    );
  });

  it("Given a connected user When stats are read Then live counts and delivery counters are reported", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");

    expect(gateway.stats()).toMatchObject({ connections: 1, sessions: 1, totalConnections: 1, messagesFailed: 0 });
  });

  it("Given conversations with long latest messages When the user asks for conversations Then the whole list arrives", async () => {
    for (const senderId of [2, 3, 4, 5, 6]) {
      await store.createMessage(senderId, { recipientId: 1, content: "x".repeat(3_900), type: "TEXT" });
    }
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "GET_CONVERSATIONS" }));

    const list = await alice.inbox.next("CONVERSATION_LIST");
    expect(list).toMatchObject({ count: 5, totalUnreadCount: 5 });
    const [latest] = await store.listConversations(1);
    expect(list.conversations).toEqual(
      (await store.listConversations(1)).map((c) => ({ ...c, latestMessageContent: "x".repeat(200) }))
    );
    expect(latest?.latestMessageContent).toHaveLength(3_900);
  });

  it("Given a recipient who is not connected When the user types Then the typing response still arrives and no error is sent", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "TYPING", data: { recipientId: 2, isTyping: true } }));
    alice.ws.send(JSON.stringify({ type: "PING" }));

    await expect(alice.inbox.next("TYPING_RESPONSE")).resolves.toMatchObject({ recipientId: 2, isTyping: true });
    await alice.inbox.next("PONG");
    expect(alice.inbox.types()).toEqual(["CONNECTION", "TYPING_RESPONSE", "PONG"]);
  });

  it("Given a connected user When they send a typing indicator to themselves Then it is rejected", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "TYPING", data: { recipientId: 1, isTyping: true } }));

    await expect(alice.inbox.next("ERROR")).resolves.toEqual({
      type: "ERROR",
      code: "VALIDATION_ERROR",
      message: "Invalid recipient",
      timestamp: T
    });
  });

  it("Given a delivered message When the recipient pins it Then they are answered and the sender sees the pin", async () => {
    const alice = await connect("?userId=1");
    await alice.inbox.next("CONNECTION");
    const bob = await connect("?userId=2");
    await bob.inbox.next("CONNECTION");

    alice.ws.send(JSON.stringify({ type: "SEND_MESSAGE", data: { recipientId: 2, content: "pin me" } }));
    await bob.inbox.next("NEW_MESSAGE");
    const [conversation] = await store.listConversations(2);
    const messageId = conversation?.latestMessageId ?? "";

    bob.ws.send(JSON.stringify({ type: "PIN_MESSAGE", data: { messageId } }));
    await expect(bob.inbox.next("ERROR")).resolves.toMatchObject({
      code: "VALIDATION_ERROR",
      message: "Missing messageId or isPinned"
    });

    bob.ws.send(JSON.stringify({ type: "PIN_MESSAGE", data: { messageId, isPinned: true } }));
    await expect(bob.inbox.next("PIN_MESSAGE_RESPONSE")).resolves.toEqual({
      type: "PIN_MESSAGE_RESPONSE",
      messageId,
      isPinned: true,
      message: "Message pinned successfully",
      timestamp: T
    });
    await expect(alice.inbox.next("MESSAGE_PINNED")).resolves.toMatchObject({ messageId, isPinned: true, pinnedBy: 2 });
  });
});
