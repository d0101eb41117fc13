import { createApp } from "./app.js";
import { AuditRecorder } from "./audit/recorder.js";
import { RequestContext } from "./audit/requestContext.js";
import { createTrackedStore } from "./audit/trackedStore.js";
import { dbFailFast, loadConfigFromDotenv } from "./config.js";
import type { AppContext } from "./context.js";
import { prepareRules } from "./services/rules.js";
import { openStore } from "./store/open.js";
import { errorFields, log, setLogLevel } from "./utils/log.js";

async function start(): Promise<void> {
  const config = loadConfigFromDotenv();
  setLogLevel(config.logLevel);

  if (!config.jwtSecret) {
    log.warn("JWT_SECRET is not set; logins will fail");
  }

  const requestContext = new RequestContext();
  const base = await openStore(config);
  const ctx: AppContext = {
    store: createTrackedStore(base, new AuditRecorder(requestContext)),
    config,
    requestContext,
  };

  // with a retrying connection, queries wait for the database; serve meanwhile
  if (dbFailFast(config)) await prepareRules(ctx.store, config);

  createApp(ctx).listen(config.port, () => {
    log.info("sigat-server listening", { port: config.port, dataStore: config.dataStore });
  });

  if (!dbFailFast(config)) {
    prepareRules(ctx.store, config).catch((err: unknown) => log.error("obsolescence rules setup failed", errorFields(err)));
  }
}

start().catch((err: unknown) => {
  log.error("startup failed", errorFields(err));
  process.exit(1);
});
