import { afterEach, describe, expect, it } from "vitest";

import { loadConfig } from "../src/config";

const managedKeys = [
  "SINK_MODE",
  "API_PAGE_LIMIT",
  "SYNC_LOCATIONS",
  "SYNC_CURSOR_POLICY",
  "SYNC_CONCURRENCY",
  "OAUTH_TOKEN_URL",
  "OAUTH_CLIENT_ID",
  "OAUTH_CLIENT_SECRET",
  "OAUTH_REFRESH_TOKEN"
] as const;

const originalEnv = new Map(managedKeys.map((key) => [key, process.env[key]]));

afterEach(() => {
  for (const [key, value] of originalEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

function clearManagedKeys(): void {
  for (const key of managedKeys) {
    delete process.env[key];
  }
}

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    clearManagedKeys();

    const config = loadConfig();

    expect(config.sinkMode).toBe("postgres");
    expect(config.apiPageLimit).toBe(500);
    expect(config.locations).toEqual(["berlin"]);
    expect(config.cursorPolicy).toBe("max-observed");
    expect(config.syncConcurrency).toBe(4);
    expect(config.windowHours).toBe(168);
    expect(config.lookbackDays).toBe(730);
    expect(config.oauth).toBeNull();
  });

  it("parses location lists and enumerations", () => {
    clearManagedKeys();
    process.env.SYNC_LOCATIONS = " oslo, ,lima ";
    process.env.SINK_MODE = "memory";
    process.env.SYNC_CURSOR_POLICY = "upstream-watermark";

    const config = loadConfig();

    expect(config.locations).toEqual(["oslo", "lima"]);
    expect(config.sinkMode).toBe("memory");
    expect(config.cursorPolicy).toBe("upstream-watermark");
  });

  it("enables refresh-token auth only when every OAuth setting is present", () => {
    clearManagedKeys();
    process.env.OAUTH_TOKEN_URL = "http://auth.test/token";
    process.env.OAUTH_CLIENT_ID = "test-client";
    process.env.OAUTH_CLIENT_SECRET = "test-secret";

    expect(loadConfig().oauth).toBeNull();

    process.env.OAUTH_REFRESH_TOKEN = "test-refresh-token";

    expect(loadConfig().oauth).toEqual({
      tokenUrl: "http://auth.test/token",
      clientId: "test-client",
      clientSecret: "test-secret",
      refreshToken: "test-refresh-token"
    });
  });

  it("rejects invalid values", () => {
    clearManagedKeys();
    process.env.API_PAGE_LIMIT = "lots";
    expect(() => loadConfig()).toThrow("Invalid integer for API_PAGE_LIMIT: lots");

    process.env.API_PAGE_LIMIT = "0";
    expect(() => loadConfig()).toThrow("Invalid positive integer for API_PAGE_LIMIT: 0");

    delete process.env.API_PAGE_LIMIT;
    process.env.SINK_MODE = "sqlite";
    expect(() => loadConfig()).toThrow("Invalid SINK_MODE: sqlite");
  });
});
