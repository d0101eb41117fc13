import type { AuditAction, AuditLogData } from "../models/AuditLog.js";
import type { Repositories, Repository, Stored } from "../store/types.js";
import type { JsonObject } from "../utils/json.js";
import { errorFields, log } from "../utils/log.js";
import { diffEntities, hasChanges } from "./diff.js";
import type { ActorSource } from "./requestContext.js";
import type { EntityTracking } from "./trackedEntities.js";

/**
 * Turns tracked mutations into audit entries. Mutations without an
 * authenticated actor are not recorded, and nothing here ever throws into the
 * mutation that triggered it.
 */
export class AuditRecorder {
  constructor(private readonly actors: ActorSource) {}

  isActive(): boolean {
    return this.actors.get() !== null;
  }

  /** The entry for one mutation, or null when it is not audited. */
  record(action: AuditAction, table: string, targetId: string, details: JsonObject): AuditLogData | null {
    const actor = this.actors.get();
    if (!actor) {
      log.debug("audit skipped: no authenticated actor", { action, table, targetId });
      return null;
    }

    return {
      systemUserId: actor.id,
      actorName: actor.username,
      action,
      targetTable: table,
      targetId,
      details,
    };
  }

  async created<D>(tracking: EntityTracking<D>, entity: Stored<D>, store: Repositories): Promise<AuditLogData | null> {
    if (!this.isActive()) return this.record("CREATE", tracking.table, entity.id, {});
    return this.safely(tracking, entity.id, async () =>
      this.record("CREATE", tracking.table, entity.id, await tracking.summarize(entity, store))
    );
  }

  async updated<D>(
    tracking: EntityTracking<D>,
    previous: Stored<D>,
    current: Stored<D>,
    store: Repositories
  ): Promise<AuditLogData | null> {
    const changes = diffEntities(previous, current, { fields: tracking.fields, redact: tracking.redact });
    if (!hasChanges(changes)) {
      log.debug("audit skipped: no changes", { table: tracking.table, targetId: current.id });
      return null;
    }
    if (!this.isActive()) return this.record("UPDATE", tracking.table, current.id, {});

    return this.safely(tracking, current.id, async () => {
      const key = await tracking.identify(current, store);
      return this.record("UPDATE", tracking.table, current.id, { ...key, changes });
    });
  }

  async deleted<D>(tracking: EntityTracking<D>, entity: Stored<D>, store: Repositories): Promise<AuditLogData | null> {
    if (!this.isActive()) return this.record("DELETE", tracking.table, entity.id, {});
    return this.safely(tracking, entity.id, async () =>
      this.record("DELETE", tracking.table, entity.id, await tracking.summarize(entity, store))
    );
  }

  /** Writes entries one by one; a failed write is logged and the rest continue. */
  async persist(sink: Repository<AuditLogData>, entries: readonly AuditLogData[]): Promise<void> {
    for (const entry of entries) {
      try {
        const saved = await sink.insert(entry);
        log.info("audit recorded", {
          auditLogId: saved.id,
          action: entry.action,
          table: entry.targetTable,
          targetId: entry.targetId,
          userId: entry.systemUserId,
        });
      } catch (err) {
        log.error("audit write failed", {
          action: entry.action,
          table: entry.targetTable,
          targetId: entry.targetId,
          ...errorFields(err),
        });
      }
    }
  }

  private async safely<D>(
    tracking: EntityTracking<D>,
    targetId: string,
    build: () => Promise<AuditLogData | null>
  ): Promise<AuditLogData | null> {
    try {
      return await build();
    } catch (err) {
      log.error("audit details failed", { table: tracking.table, targetId, ...errorFields(err) });
      return null;
    }
  }
}
