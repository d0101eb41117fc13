import { describe, expect, it } from "vitest";

import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ DATA_STORE: "memory" });

    expect(config).toMatchObject({
      port: 4000,
      isProd: false,
      dataStore: "memory",
      corsOrigins: [],
      logLevel: "info",
      mongoRetryMs: 5000,
      obsolescence: { windowsMinVersion: "10.0.19041", ramMinGb: 8, diskMinFreePercent: 10 },
    });
    expect(config.agentApiKey).toBeUndefined();
  });

  it("reads overrides and falls back on bad numbers", () => {
    const config = loadConfig({
      DATA_STORE: "memory",
      PORT: "8080",
      NODE_ENV: "production",
      CORS_ORIGIN: "https://a.example, https://b.example,",
      AGENT_API_KEY: " test-agent-key ",
      LOG_LEVEL: "WARN",
      OBSOLESCENCE_RAM_MIN_GB: "lots",
      OBSOLESCENCE_DISK_MIN_FREE_PERCENT: "15",
    });

    expect(config).toMatchObject({
      port: 8080,
      isProd: true,
      corsOrigins: ["https://a.example", "https://b.example"],
      agentApiKey: "test-agent-key",
      logLevel: "warn",
      obsolescence: { windowsMinVersion: "10.0.19041", ramMinGb: 8, diskMinFreePercent: 15 },
    });
  });

  it("rejects an unknown store and a mongo store without a URI", () => {
    expect(() => loadConfig({ DATA_STORE: "sqlite" })).toThrow("DATA_STORE must be one of mongo, memory");
    expect(() => loadConfig({})).toThrow("MONGODB_URI is required when DATA_STORE=mongo");
  });
});
