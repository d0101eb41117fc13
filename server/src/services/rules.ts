import { dbFailFast, type AppConfig, type ObsolescenceDefaults } from "../config.js";
import { obsolescenceRulesKey, type ObsolescenceRules, type ObsolescenceRulesData } from "../models/ObsolescenceRules.js";
import type { Store } from "../store/types.js";
import { DuplicateKeyError } from "../utils/errors.js";
import { errorFields, log } from "../utils/log.js";

export type RulesPatch = Partial<Pick<ObsolescenceRulesData, "windowsMinVersion" | "ramMinGb" | "diskMinFreePercent" | "enabled">>;

/** Returns the singleton rules record, creating it from `defaults` the first time. */
export async function ensureRules(store: Store, defaults: ObsolescenceDefaults): Promise<ObsolescenceRules> {
  const existing = await store.obsolescenceRules.findOne({ key: obsolescenceRulesKey });
  if (existing) return existing;

  try {
    const created = await store.obsolescenceRules.insert({
      key: obsolescenceRulesKey,
      windowsMinVersion: defaults.windowsMinVersion,
      ramMinGb: defaults.ramMinGb,
      diskMinFreePercent: defaults.diskMinFreePercent,
      enabled: true,
      updatedById: null,
    });
    log.info("obsolescence rules created", { rulesId: created.id, ...defaults });
    return created;
  } catch (err) {
    // another process created it first
    if (!(err instanceof DuplicateKeyError)) throw err;
    const winner = await store.obsolescenceRules.findOne({ key: obsolescenceRulesKey });
    if (!winner) throw err;
    return winner;
  }
}

/**
 * Startup step. When the database may still come up later, a failure is only
 * logged and the record is created by the first `getRules` call instead.
 */
export async function prepareRules(store: Store, config: AppConfig): Promise<void> {
  try {
    await ensureRules(store, config.obsolescence);
  } catch (err) {
    if (dbFailFast(config)) throw err;
    log.warn("obsolescence rules not created yet; deferred to first use", errorFields(err));
  }
}

export function getRules(store: Store, defaults: ObsolescenceDefaults): Promise<ObsolescenceRules> {
  return ensureRules(store, defaults);
}

export async function updateRules(
  store: Store,
  defaults: ObsolescenceDefaults,
  patch: RulesPatch,
  actorId: string | null
): Promise<ObsolescenceRules> {
  const current = await ensureRules(store, defaults);
  const updated = await store.obsolescenceRules.update(current.id, { ...patch, updatedById: actorId });
  if (!updated) throw new Error("Obsolescence rules disappeared during update");
  log.info("obsolescence rules updated", { rulesId: updated.id, updatedById: actorId, fields: Object.keys(patch) });
  return updated;
}
