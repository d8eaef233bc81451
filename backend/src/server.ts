import http from "node:http";

import { WebSocketServer } from "ws";

import { resolveServerSettingsFromEnv } from "./config";
import { createHttpApp } from "./httpApi";
import { createConsoleLogger } from "./logger";
import { describeError } from "./realtime/result";
import { createWebsocketGateway } from "./realtime/websocketGateway";
import { createInMemoryMessageRepository } from "./repositories/inMemoryMessageRepository";
import { createPostgresPool, ensurePostgresSchema, resolvePostgresSettingsFromEnv } from "./repositories/postgresCore";
import { createPostgresMessageRepository } from "./repositories/postgresMessageRepository";
import type { MessageRecord, OfflineNotifier } from "./services/messageStore";

async function main(): Promise<void> {
  const settings = resolveServerSettingsFromEnv();
  const logger = createConsoleLogger("[ChatRelay]", settings.logLevel);

  const postgresSettings = resolvePostgresSettingsFromEnv();
  if (settings.requireDatabase && !postgresSettings) {
    throw new Error("REQUIRE_DATABASE=true but no PostgreSQL URL was found. Set DATABASE_URL.");
  }
  const postgresPool = postgresSettings ? createPostgresPool(postgresSettings) : null;
  if (postgresPool) {
    await ensurePostgresSchema(postgresPool);
    logger.info("Persistence mode: PostgreSQL");
  } else {
    logger.warn("Persistence mode: in-memory (messages are lost on restart)");
  }
  const repository = postgresPool ? createPostgresMessageRepository(postgresPool) : createInMemoryMessageRepository();

  if (!settings.jwtSecret) {
    logger.warn("JWT_SECRET is not set; tokens are decoded without signature verification");
  }

  // Push delivery lives outside this service; offline recipients are only logged here.
  const notifier: OfflineNotifier = {
    notifyOffline(recipientId: number, record: MessageRecord): void {
      logger.debug("Recipient offline", { recipientId, messageId: record.id });
    }
  };

  const server = http.createServer();
  const wss = new WebSocketServer({ server, path: settings.wsPath, maxPayload: settings.maxFrameBytes * 4 });
  const gateway = createWebsocketGateway({
    wss,
    store: repository,
    notifier,
    jwtSecret: settings.jwtSecret,
    heartbeatIntervalMs: settings.heartbeatIntervalMs,
    heartbeatTimeoutMs: settings.heartbeatTimeoutMs,
    authTimeoutMs: settings.authTimeoutMs,
    sweepIntervalMs: settings.sweepIntervalMs,
    writeTimeoutMs: settings.writeTimeoutMs,
    maxFrameBytes: settings.maxFrameBytes,
    persistenceTimeoutMs: settings.persistenceTimeoutMs,
    metricsIntervalMs: settings.metricsIntervalMs,
    logger
  });

  const app = createHttpApp({ gateway, repository, logger });
  server.on("request", app);

  server.listen(settings.port, () => {
    logger.info(`Chat relay listening on http://localhost:${settings.port} (websocket path ${settings.wsPath})`);
  });

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await gateway.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (postgresPool) {
      await postgresPool.end();
    }
  };

  process.on("SIGINT", () => {
    void shutdown().finally(() => process.exit(0));
  });
  process.on("SIGTERM", () => {
    void shutdown().finally(() => process.exit(0));
  });
}

main().catch((e: unknown) => {
  console.error(`[ChatRelay] Failed to start: ${describeError(e)}`);
  process.exit(1);
});
