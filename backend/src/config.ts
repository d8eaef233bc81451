import { isLogLevel, type LogLevel } from "./logger";
import { DEFAULT_MAX_FRAME_BYTES, DEFAULT_WRITE_TIMEOUT_MS } from "./realtime/connection";
import {
  DEFAULT_AUTH_TIMEOUT_MS,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_HEARTBEAT_TIMEOUT_MS,
  DEFAULT_SWEEP_INTERVAL_MS
} from "./realtime/connectionLifecycle";
import { DEFAULT_PERSISTENCE_TIMEOUT_MS } from "./realtime/conversationSync";
import { DEFAULT_METRICS_INTERVAL_MS } from "./realtime/websocketGateway";

export type ServerSettings = Readonly<{
  port: number;
  /** Absent means tokens are decoded without signature checks. */
  jwtSecret?: string;
  wsPath: string;
  heartbeatIntervalMs: number;
  heartbeatTimeoutMs: number;
  authTimeoutMs: number;
  sweepIntervalMs: number;
  writeTimeoutMs: number;
  maxFrameBytes: number;
  persistenceTimeoutMs: number;
  metricsIntervalMs: number;
  logLevel: LogLevel;
  requireDatabase: boolean;
}>;

const DEFAULT_PORT = 3000;
const DEFAULT_WS_PATH = "/ws/messages";

function positiveInt(raw: string | undefined, fallback: number): number {
  if (typeof raw !== "string" || raw.trim() === "") return fallback;
  const n = Number(raw.trim());
  return Number.isSafeInteger(n) && n > 0 ? n : fallback;
}

export function resolveServerSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const jwtSecret = typeof env.JWT_SECRET === "string" && env.JWT_SECRET.trim() !== "" ? env.JWT_SECRET.trim() : undefined;
  const wsPathRaw = typeof env.WS_PATH === "string" ? env.WS_PATH.trim() : "";
  const logLevelRaw = typeof env.LOG_LEVEL === "string" ? env.LOG_LEVEL.trim().toLowerCase() : "";

  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    jwtSecret,
    wsPath: wsPathRaw.startsWith("/") ? wsPathRaw : DEFAULT_WS_PATH,
    heartbeatIntervalMs: positiveInt(env.HEARTBEAT_INTERVAL_MS, DEFAULT_HEARTBEAT_INTERVAL_MS),
    heartbeatTimeoutMs: positiveInt(env.HEARTBEAT_TIMEOUT_MS, DEFAULT_HEARTBEAT_TIMEOUT_MS),
    authTimeoutMs: positiveInt(env.AUTH_TIMEOUT_MS, DEFAULT_AUTH_TIMEOUT_MS),
    sweepIntervalMs: positiveInt(env.SWEEP_INTERVAL_MS, DEFAULT_SWEEP_INTERVAL_MS),
    writeTimeoutMs: positiveInt(env.WRITE_TIMEOUT_MS, DEFAULT_WRITE_TIMEOUT_MS),
    maxFrameBytes: positiveInt(env.MAX_FRAME_BYTES, DEFAULT_MAX_FRAME_BYTES),
    persistenceTimeoutMs: positiveInt(env.PERSISTENCE_TIMEOUT_MS, DEFAULT_PERSISTENCE_TIMEOUT_MS),
    metricsIntervalMs: positiveInt(env.METRICS_INTERVAL_MS, DEFAULT_METRICS_INTERVAL_MS),
    logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : "info",
    requireDatabase: env.REQUIRE_DATABASE === "true"
  };
}
