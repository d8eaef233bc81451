import http from "node:http";

import { createHttpApp, type HttpApiDeps } from "../backend/src/httpApi";
import { err, ok, type Result } from "../backend/src/realtime/result";
import { createInMemoryMessageRepository } from "../backend/src/repositories/inMemoryMessageRepository";
import type { MessageRecord, MessageRepository, StatusUpdate } from "../backend/src/services/messageStore";

const record: MessageRecord = {
  id: "m1",
  senderId: 1,
  recipientId: 2,
  groupId: null,
  content: "hi",
  type: "TEXT",
  status: "READ",
  replyToMessageId: null,
  isPinned: false,
  createdAtMs: 1_000,
  deliveredAtMs: 2_000,
  readAtMs: 2_000
};

async function listen(deps: HttpApiDeps): Promise<{ baseUrl: string; close(): Promise<void> }> {
  const server = http.createServer(createHttpApp(deps));
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("unexpected address");
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => server.close((e) => (e ? reject(e) : resolve())))
  };
}

function setup(repository: MessageRepository = createInMemoryMessageRepository()) {
  const updateStatus = jest.fn(
    async (actorId: number, messageId: string, _status: StatusUpdate): Promise<Result<MessageRecord>> =>
      actorId === 2 && messageId === "m1" ? ok(record) : err("MESSAGE_NOT_FOUND", "Message not found", { messageId })
  );
  const gateway = {
    stats: () => ({ connections: 3, sessions: 2, totalConnections: 5, messagesSent: 12, messagesFailed: 1 }),
    updateStatus
  };
  return { gateway, updateStatus, repository };
}

describe("httpApi", () => {
  let closeServer: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await closeServer?.();
    closeServer = undefined;
  });

  async function start(deps: HttpApiDeps): Promise<string> {
    const server = await listen(deps);
    closeServer = server.close;
    return server.baseUrl;
  }

  it("Given a running app When health is requested Then gateway stats are returned", async () => {
    const baseUrl = await start(setup());

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({
      ok: true,
      connections: 3,
      sessions: 2,
      totalConnections: 5,
      messagesSent: 12,
      messagesFailed: 1
    });
  });

  it("Given a recipient When they mark a message read over HTTP Then the updated record is returned", async () => {
    const deps = setup();
    const baseUrl = await start(deps);

    const res = await fetch(`${baseUrl}/messages/m1/read`, { method: "POST", headers: { "x-user-id": "2" } });

    expect(res.status).toBe(200);
    await expect(res.json()).resolves.toEqual({ message: record });
    expect(deps.updateStatus).toHaveBeenCalledWith(2, "m1", "READ");
  });

  it("Given a status update for someone else's message When it is posted Then 404 is returned", async () => {
    const baseUrl = await start(setup());

    const res = await fetch(`${baseUrl}/messages/m1/delivered`, { method: "POST", headers: { "x-user-id": "3" } });

    expect(res.status).toBe(404);
    await expect(res.json()).resolves.toEqual({
      code: "MESSAGE_NOT_FOUND",
      message: "Message not found",
      context: { messageId: "m1" }
    });
  });

  it("Given no identity header When a status update is posted Then 401 is returned", async () => {
    const deps = setup();
    const baseUrl = await start(deps);

    const res = await fetch(`${baseUrl}/messages/m1/read`, { method: "POST" });

    expect(res.status).toBe(401);
    await expect(res.json()).resolves.toEqual({ code: "UNAUTHENTICATED", message: "Missing user identity." });
    expect(deps.updateStatus).not.toHaveBeenCalled();
  });

  it("Given stored messages When conversations and unread count are requested Then both reflect the store", async () => {
    const repository = createInMemoryMessageRepository({ nowMs: () => 5_000, newId: () => "m9" });
    await repository.createMessage(1, { recipientId: 2, content: "hello", type: "TEXT" });
    const baseUrl = await start(setup(repository));

    const list = await fetch(`${baseUrl}/conversations`, { headers: { "x-user-id": "2" } });
    expect(list.status).toBe(200);
    await expect(list.json()).resolves.toEqual({
      conversations: [
        {
          userId: 1,
          groupId: null,
          conversationType: "INDIVIDUAL",
          latestMessageId: "m9",
          latestMessageContent: "hello",
          latestMessageType: "TEXT",
          latestMessageSenderId: 1,
          latestMessageTime: 5_000,
          latestMessageStatus: "SENT",
          unreadCount: 1
        }
      ],
      count: 1,
      totalUnreadCount: 1
    });

    const unread = await fetch(`${baseUrl}/messages/unread-count`, { headers: { "x-user-id": "2" } });
    expect(unread.status).toBe(200);
    await expect(unread.json()).resolves.toEqual({ totalUnreadCount: 1 });
  });

  it("Given a failing store When conversations are requested Then 503 is returned", async () => {
    const base = createInMemoryMessageRepository();
    const repository: MessageRepository = {
      ...base,
      async listConversations() {
        throw new Error("connection refused");
      }
    };
    const baseUrl = await start(setup(repository));

    const res = await fetch(`${baseUrl}/conversations`, { headers: { "x-user-id": "2" } });

    expect(res.status).toBe(503);
    await expect(res.json()).resolves.toEqual({ code: "PERSISTENCE_FAILURE", message: "Failed to get conversations" });
  });

  it("Given a group membership request When it is valid or not Then members are added or 400 is returned", async () => {
    const repository = createInMemoryMessageRepository();
    const baseUrl = await start(setup(repository));

    const added = await fetch(`${baseUrl}/groups/g1/members`, {
      method: "PUT",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ userIds: [1, "2"] })
    });
    expect(added.status).toBe(204);
    await expect(repository.listGroupMemberIds("g1")).resolves.toEqual([1, 2]);

    const rejected = await fetch(`${baseUrl}/groups/g1/members`, {
      method: "PUT",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ userIds: [1, "bob"] })
    });
    expect(rejected.status).toBe(400);
    await expect(rejected.json()).resolves.toEqual({
      code: "VALIDATION_ERROR",
      message: "userIds must be a non-empty list of user ids."
    });
  });
});
