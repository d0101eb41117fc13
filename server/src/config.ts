import dotenv from "dotenv";

import { logLevels, type LogLevel } from "./utils/log.js";

export const dataStores = ["mongo", "memory"] as const;
export type DataStoreKind = (typeof dataStores)[number];

export type ObsolescenceDefaults = {
  windowsMinVersion: string;
  ramMinGb: number;
  diskMinFreePercent: number;
};

export type AppConfig = {
  port: number;
  isProd: boolean;
  trustProxy: boolean;
  dataStore: DataStoreKind;
  mongoUri?: string;
  mongoRetryMs: number;
  requireDb: boolean;
  jwtSecret?: string;
  corsOrigins: string[];
  agentApiKey?: string;
  logLevel: LogLevel;
  obsolescence: ObsolescenceDefaults;
};

function num(raw: string | undefined, fallback: number): number {
  if (raw === undefined || !raw.trim()) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function str(raw: string | undefined): string | undefined {
  const v = (raw ?? "").trim();
  return v || undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storeRaw = (env.DATA_STORE ?? "mongo").trim().toLowerCase();
  const dataStore = dataStores.find((s) => s === storeRaw);
  if (!dataStore) {
    throw new Error(`DATA_STORE must be one of ${dataStores.join(", ")}`);
  }

  const levelRaw = (env.LOG_LEVEL ?? "info").trim().toLowerCase();

  const config: AppConfig = {
    port: num(env.PORT, 4000),
    isProd: String(env.NODE_ENV ?? "").toLowerCase() === "production",
    trustProxy: Boolean(str(env.TRUST_PROXY)),
    dataStore,
    mongoUri: str(env.MONGODB_URI),
    mongoRetryMs: num(env.MONGODB_RETRY_MS, 5000),
    requireDb: String(env.REQUIRE_DB ?? "").toLowerCase() === "true",
    jwtSecret: str(env.JWT_SECRET),
    corsOrigins: (env.CORS_ORIGIN ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    agentApiKey: str(env.AGENT_API_KEY),
    logLevel: logLevels.find((l) => l === levelRaw) ?? "info",
    obsolescence: {
      windowsMinVersion: str(env.OBSOLESCENCE_WINDOWS_MIN_VERSION) ?? "10.0.19041",
      ramMinGb: num(env.OBSOLESCENCE_RAM_MIN_GB, 8),
      diskMinFreePercent: num(env.OBSOLESCENCE_DISK_MIN_FREE_PERCENT, 10),
    },
  };

  if (config.dataStore === "mongo" && !config.mongoUri) {
    throw new Error("MONGODB_URI is required when DATA_STORE=mongo");
  }

  return config;
}

/** Production or REQUIRE_DB: an unreachable database stops startup instead of being retried. */
export function dbFailFast(config: AppConfig): boolean {
  return config.isProd || config.requireDb;
}

export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig();
}
