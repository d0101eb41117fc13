import type { RequestContext } from "./audit/requestContext.js";
import type { AppConfig } from "./config.js";
import type { Store } from "./store/types.js";

/** Everything a router needs; built once in `createApp`. */
export type AppContext = {
  /** Audited store: writes to tracked collections produce audit entries. */
  store: Store;
  config: AppConfig;
  requestContext: RequestContext;
};
