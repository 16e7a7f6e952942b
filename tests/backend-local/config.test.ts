import { describe, expect, it } from "vitest";

import {
  DEFAULT_SECRET_KEY,
  isProduction,
  loadBackendSettings,
} from "../../packages/backend-local/src/config.js";

describe("loadBackendSettings", () => {
  it("uses development defaults for an empty environment", () => {
    const settings = loadBackendSettings({});

    expect(settings).toMatchObject({
      env: "development",
      port: 8787,
      secretKey: DEFAULT_SECRET_KEY,
      tokenTtlMinutes: 720,
      corsOrigin: "*",
      httpRequestsPerMinute: 60,
      wsMessagesPerMinute: 120,
      keepaliveMs: 45_000,
      wordsFile: undefined,
      logLevel: "info",
      oracle: { enabled: false, url: "", apiKey: "" },
    });
    expect(settings.duel).toMatchObject({
      turnTimeoutSeconds: 30,
      roomCodeLength: 8,
      defaultTargetScore: 10,
      kFactor: 32,
      adminDisplayNames: ["admin"],
    });
  });

  it("refuses the default secret in production", () => {
    expect(() => loadBackendSettings({ NODE_ENV: "production" })).toThrow(
      "SECRET_KEY must be explicitly set in production",
    );
    expect(loadBackendSettings({ NODE_ENV: "production", SECRET_KEY: "test-secret" }).env).toBe(
      "production",
    );
  });

  it("clamps values below their minimum", () => {
    const { duel } = loadBackendSettings({
      TURN_TIMEOUT_SECONDS: "0",
      ROOM_CODE_LENGTH: "2",
      ROOM_CODE_ATTEMPTS: "1",
      ORACLE_TIMEOUT_MS: "10",
    });

    expect(duel.turnTimeoutSeconds).toBe(1);
    expect(duel.roomCodeLength).toBe(4);
    expect(duel.roomCodeAttempts).toBe(3);
    expect(duel.oracleTimeoutMs).toBe(300);
  });

  it("falls back on unparsable numbers", () => {
    expect(loadBackendSettings({ PORT: "eighty", K_FACTOR: "1.5" })).toMatchObject({
      port: 8787,
      duel: { kFactor: 32 },
    });
  });

  it("enables the oracle only when a url is configured", () => {
    expect(loadBackendSettings({ ENABLE_ORACLE: "true" }).oracle.enabled).toBe(false);
    expect(loadBackendSettings({ ORACLE_URL: "http://oracle.test" }).oracle.enabled).toBe(true);
    expect(
      loadBackendSettings({ ORACLE_URL: "http://oracle.test", ENABLE_ORACLE: "off" }).oracle.enabled,
    ).toBe(false);
  });

  it("lower-cases admin display names", () => {
    const { duel } = loadBackendSettings({ ADMIN_DISPLAY_NAMES: " Root , Ops ,," });

    expect(duel.adminDisplayNames).toEqual(["root", "ops"]);
  });
});

describe("isProduction", () => {
  it("treats unknown environments as production", () => {
    expect(isProduction("Test")).toBe(false);
    expect(isProduction("dev")).toBe(false);
    expect(isProduction("staging")).toBe(true);
  });
});
