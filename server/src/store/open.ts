import mongoose from "mongoose";

import { dbFailFast, type AppConfig } from "../config.js";
import { errorFields, log } from "../utils/log.js";
import { MemoryStore } from "./memory.js";
import { createMongoStore } from "./mongo.js";
import type { Store } from "./types.js";

let closing = false;

/**
 * Keeps a mongoose connection up. In production, or with REQUIRE_DB, the first
 * failed attempt is fatal; otherwise attempts repeat every `mongoRetryMs`.
 */
async function connectMongo(uri: string, config: AppConfig): Promise<void> {
  const failFast = dbFailFast(config);
  let connecting = false;

  function retryLater(): void {
    setTimeout(() => {
      ensureConnected().catch((err: unknown) => log.error("mongodb reconnect failed", errorFields(err)));
    }, config.mongoRetryMs);
  }

  async function ensureConnected(): Promise<void> {
    if (mongoose.connection.readyState === 1 || connecting) return;
    connecting = true;
    try {
      await mongoose.connect(uri, { serverSelectionTimeoutMS: 10_000 });
      log.info("mongodb connected");
    } catch (err) {
      log.error("mongodb connect failed", errorFields(err));
      if (failFast) throw err;
      retryLater();
    } finally {
      connecting = false;
    }
  }

  await ensureConnected();

  mongoose.connection.on("disconnected", () => {
    if (closing) return;
    log.warn("mongodb disconnected");
    if (!failFast) retryLater();
  });
}

/** The unaudited base store selected by DATA_STORE. */
export async function openStore(config: AppConfig): Promise<Store> {
  if (config.dataStore === "memory") {
    log.warn("using the in-memory store; data is lost on restart");
    return new MemoryStore();
  }

  if (!config.mongoUri) throw new Error("MONGODB_URI is required when DATA_STORE=mongo");
  await connectMongo(config.mongoUri, config);
  return createMongoStore();
}

export async function closeStore(): Promise<void> {
  closing = true;
  if (mongoose.connection.readyState !== 0) await mongoose.disconnect();
}
