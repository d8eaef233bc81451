import { resolveServerSettingsFromEnv } from "../backend/src/config";

describe("config", () => {
  it("Given an empty environment When settings are resolved Then every default applies", () => {
    expect(resolveServerSettingsFromEnv({})).toEqual({
      port: 3000,
      jwtSecret: undefined,
      wsPath: "/ws/messages",
      heartbeatIntervalMs: 30_000,
      heartbeatTimeoutMs: 90_000,
      authTimeoutMs: 30_000,
      sweepIntervalMs: 30_000,
      writeTimeoutMs: 5_000,
      maxFrameBytes: 16_384,
      persistenceTimeoutMs: 5_000,
      metricsIntervalMs: 60_000,
      logLevel: "info",
      requireDatabase: false
    });
  });

  it("Given explicit values When settings are resolved Then they are parsed and trimmed", () => {
    const settings = resolveServerSettingsFromEnv({
      PORT: "8080",
      JWT_SECRET: "  test-secret  ",
      WS_PATH: " /chat ",
      HEARTBEAT_TIMEOUT_MS: "120000",
      MAX_FRAME_BYTES: "4096",
      METRICS_INTERVAL_MS: "15000",
      LOG_LEVEL: "DEBUG",
      REQUIRE_DATABASE: "true"
    });

    expect(settings).toMatchObject({
      port: 8080,
      jwtSecret: "test-secret",
      wsPath: "/chat",
      heartbeatTimeoutMs: 120_000,
      maxFrameBytes: 4096,
      metricsIntervalMs: 15_000,
      logLevel: "debug",
      requireDatabase: true
    });
  });

  it("Given malformed values When settings are resolved Then each falls back to its default", () => {
    const settings = resolveServerSettingsFromEnv({
      PORT: "-1",
      JWT_SECRET: "   ",
      WS_PATH: "chat",
      AUTH_TIMEOUT_MS: "1.5",
      WRITE_TIMEOUT_MS: "soon",
      LOG_LEVEL: "verbose",
      REQUIRE_DATABASE: "yes"
    });

    expect(settings).toMatchObject({
      port: 3000,
      jwtSecret: undefined,
      wsPath: "/ws/messages",
      authTimeoutMs: 30_000,
      writeTimeoutMs: 5_000,
      logLevel: "info",
      requireDatabase: false
    });
  });
});
