import express, { type NextFunction, type Request, type Response } from "express";

import { silentLogger, type Logger } from "./logger";
import { parseUserId } from "./realtime/identityResolver";
import { describeError, type ServiceError } from "./realtime/result";
import type { WebsocketGateway } from "./realtime/websocketGateway";
import type { MessageRepository, StatusUpdate } from "./services/messageStore";

export type HttpApiDeps = Readonly<{
  gateway: Pick<WebsocketGateway, "stats" | "updateStatus">;
  repository: Pick<MessageRepository, "listConversations" | "totalUnreadCount" | "addGroupMembers">;
  userIdHeader?: string;
  logger?: Logger;
}>;

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

function sendError(res: Response, error: ServiceError): void {
  const code = error.code;
  const status =
    code === "UNAUTHENTICATED"
      ? 401
      : code === "MESSAGE_NOT_FOUND"
        ? 404
      : code === "PERSISTENCE_FAILURE"
        ? 503
      : 400;
  res.status(status).json(error);
}

// Express 4 does not forward rejected promises to the error boundary on its own.
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createHttpApp(deps: HttpApiDeps): express.Express {
  const gateway = deps.gateway;
  const repository = deps.repository;
  const userIdHeader = (deps.userIdHeader ?? "x-user-id").toLowerCase();
  const logger = deps.logger ?? silentLogger;

  function actorOf(req: Request): number | undefined {
    return parseUserId(req.header(userIdHeader));
  }

  function statusRoute(status: StatusUpdate): AsyncHandler {
    return async (req, res) => {
      const actorId = actorOf(req);
      if (actorId === undefined) {
        return sendError(res, { code: "UNAUTHENTICATED", message: "Missing user identity." });
      }
      const result = await gateway.updateStatus(actorId, req.params.messageId ?? "", status);
      if (!result.ok) return sendError(res, result.error);
      return res.status(200).json({ message: result.value });
    };
  }

  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "8kb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true, ...gateway.stats() });
  });

  app.post("/messages/:messageId/delivered", asyncRoute(statusRoute("DELIVERED")));
  app.post("/messages/:messageId/read", asyncRoute(statusRoute("READ")));

  app.get(
    "/conversations",
    asyncRoute(async (req, res) => {
      const userId = actorOf(req);
      if (userId === undefined) {
        return sendError(res, { code: "UNAUTHENTICATED", message: "Missing user identity." });
      }
      try {
        const conversations = await repository.listConversations(userId);
        const totalUnreadCount = conversations.reduce((sum, c) => sum + c.unreadCount, 0);
        return res.status(200).json({ conversations, count: conversations.length, totalUnreadCount });
      } catch (e: unknown) {
        logger.error("Failed to list conversations", { userId, error: describeError(e) });
        return sendError(res, { code: "PERSISTENCE_FAILURE", message: "Failed to get conversations" });
      }
    })
  );

  app.get(
    "/messages/unread-count",
    asyncRoute(async (req, res) => {
      const userId = actorOf(req);
      if (userId === undefined) {
        return sendError(res, { code: "UNAUTHENTICATED", message: "Missing user identity." });
      }
      try {
        return res.status(200).json({ totalUnreadCount: await repository.totalUnreadCount(userId) });
      } catch (e: unknown) {
        logger.error("Failed to count unread messages", { userId, error: describeError(e) });
        return sendError(res, { code: "PERSISTENCE_FAILURE", message: "Failed to get unread count" });
      }
    })
  );

  app.put(
    "/groups/:groupId/members",
    asyncRoute(async (req, res) => {
      const groupId = (req.params.groupId ?? "").trim();
      const body: unknown = req.body;
      const rawIds = typeof body === "object" && body !== null ? (body as Record<string, unknown>).userIds : undefined;
      const userIds = Array.isArray(rawIds) ? rawIds.map((id) => parseUserId(id)) : [];
      if (groupId === "" || userIds.length === 0 || userIds.some((id) => id === undefined)) {
        return sendError(res, { code: "VALIDATION_ERROR", message: "userIds must be a non-empty list of user ids." });
      }
      const members = userIds.filter((id): id is number => id !== undefined);
      try {
        await repository.addGroupMembers(groupId, members);
      } catch (e: unknown) {
        logger.error("Failed to add group members", { groupId, error: describeError(e) });
        return sendError(res, { code: "PERSISTENCE_FAILURE", message: "Failed to add group members" });
      }
      return res.status(204).end();
    })
  );

  // Final error boundary.
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled request failure", { error: describeError(error) });
    res.status(500).json({ code: "TRANSPORT_FAILURE", message: "Internal error." });
  });

  return app;
}
