import type { AuditLogData } from "../models/AuditLog.js";
import type { Repositories, Repository, Store, Stored } from "../store/types.js";
import type { AuditRecorder } from "./recorder.js";
import { trackedEntities, type EntityTracking } from "./trackedEntities.js";

type Emit = (entry: AuditLogData | null) => Promise<void>;

function trackRepository<D>(
  repo: Repository<D>,
  tracking: EntityTracking<D>,
  recorder: AuditRecorder,
  lookup: Repositories,
  emit: Emit
): Repository<D> {
  async function remove(existing: Stored<D>): Promise<Stored<D> | null> {
    const entry = await recorder.deleted(tracking, existing, lookup);
    const removed = await repo.delete(existing.id);
    if (removed) await emit(entry);
    return removed;
  }

  return {
    collection: repo.collection,
    findById: (id) => repo.findById(id),
    findOne: (filter) => repo.findOne(filter),
    find: (filter, opts) => repo.find(filter, opts),
    count: (filter) => repo.count(filter),

    async insert(data) {
      const created = await repo.insert(data);
      await emit(await recorder.created(tracking, created, lookup));
      return created;
    },

    async update(id, patch) {
      if (!recorder.isActive()) return repo.update(id, patch);

      const previous = await repo.findById(id);
      const current = await repo.update(id, patch);
      if (previous && current) {
        await emit(await recorder.updated(tracking, previous, current, lookup));
      }
      return current;
    },

    async delete(id) {
      const existing = await repo.findById(id);
      return existing ? remove(existing) : null;
    },

    async deleteMany(filter) {
      let n = 0;
      for (const existing of await repo.find(filter)) {
        if (await remove(existing)) n += 1;
      }
      return n;
    },
  };
}

function wrap(inner: Store, root: Store, recorder: AuditRecorder, emit: Emit, inTransaction: boolean): Store {
  const track = <D>(repo: Repository<D>, tracking: EntityTracking<D>) =>
    trackRepository(repo, tracking, recorder, inner, emit);

  const store: Store = {
    departments: track(inner.departments, trackedEntities.departments),
    employees: track(inner.employees, trackedEntities.employees),
    users: track(inner.users, trackedEntities.users),
    assets: track(inner.assets, trackedEntities.assets),
    computerDetails: track(inner.computerDetails, trackedEntities.computerDetails),
    storageDevices: inner.storageDevices,
    graphicsCards: inner.graphicsCards,
    software: track(inner.software, trackedEntities.software),
    licenses: track(inner.licenses, trackedEntities.licenses),
    installations: track(inner.installations, trackedEntities.installations),
    vulnerabilities: inner.vulnerabilities,
    warnings: track(inner.warnings, trackedEntities.warnings),
    auditLogs: inner.auditLogs,
    checkins: track(inner.checkins, trackedEntities.checkins),
    obsolescenceRules: inner.obsolescenceRules,

    async withTransaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
      if (inTransaction) return fn(store);

      let pending: AuditLogData[] = [];
      const result = await inner.withTransaction((tx) => {
        // reset per attempt: the driver reruns the callback on transient errors
        pending = [];
        const buffer: Emit = async (entry) => {
          if (entry) pending.push(entry);
        };
        return fn(wrap(tx, root, recorder, buffer, true));
      });
      await recorder.persist(root.auditLogs, pending);
      return result;
    },

    nextSequence: (key, floor) => inner.nextSequence(key, floor),
  };
  return store;
}

/**
 * Store whose tracked collections report every create, update and delete to
 * the recorder. Entries produced inside a transaction are written only after
 * it commits.
 */
export function createTrackedStore(base: Store, recorder: AuditRecorder): Store {
  const direct: Emit = async (entry) => {
    if (entry) await recorder.persist(base.auditLogs, [entry]);
  };
  return wrap(base, base, recorder, direct, false);
}
