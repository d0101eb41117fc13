import { AsyncLocalStorage } from "node:async_hooks";

import { Types } from "mongoose";

import type { AssetCheckinData } from "../models/AssetCheckin.js";
import type { AssetData } from "../models/Asset.js";
import type { AuditLogData } from "../models/AuditLog.js";
import type { ComplianceWarningData } from "../models/ComplianceWarning.js";
import type { ComputerDetailData } from "../models/ComputerDetail.js";
import type { DepartmentData } from "../models/Department.js";
import type { EmployeeData } from "../models/Employee.js";
import type { GraphicsCardData } from "../models/GraphicsCard.js";
import type { InstalledSoftwareData } from "../models/InstalledSoftware.js";
import type { LicenseData } from "../models/License.js";
import type { ObsolescenceRulesData } from "../models/ObsolescenceRules.js";
import type { SoftwareCatalogData } from "../models/SoftwareCatalog.js";
import type { SoftwareVulnerabilityData } from "../models/SoftwareVulnerability.js";
import type { StorageDeviceData } from "../models/StorageDevice.js";
import type { UserData } from "../models/User.js";
import { DuplicateKeyError } from "../utils/errors.js";
import type { Filter, FindOptions, Repository, SortOrder, Store, Stored } from "./types.js";

type UniqueKey<D> = readonly (keyof D & string)[];

const autoFields = new Set(["id", "createdAt", "updatedAt"]);

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

function field(row: object, key: string): unknown {
  return Reflect.get(row, key);
}

function matches(row: object, filter: object | undefined): boolean {
  const entries: [string, unknown][] = Object.entries(filter ?? {});
  return entries.every(([key, expected]) => {
    if (expected === undefined) return true;
    const actual = field(row, key);
    if (Array.isArray(expected)) return expected.some((e) => sameValue(actual, e));
    return sameValue(actual, expected);
  });
}

function compareField(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === "number" && typeof right === "number") return left - right;
  return String(left).localeCompare(String(right));
}

function isEmptyKeyPart(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}

/** State of one open transaction: working copies of the collections it touched. */
class Transaction {
  readonly touched = new Set<Committable>();
  counters: Map<string, number> | null = null;
  closed = false;
}

interface Committable {
  commit(tx: Transaction): void;
}

/**
 * Shared by a store and its repositories. Work inside a transaction sees that
 * transaction's copies; everything else sees committed rows, and writes made
 * outside wait for the open transaction to finish.
 */
class TransactionScope {
  private readonly storage = new AsyncLocalStorage<Transaction>();
  private tail: Promise<void> = Promise.resolve();

  current(): Transaction | null {
    const tx = this.storage.getStore();
    return tx && !tx.closed ? tx : null;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  write<T>(fn: () => Promise<T>): Promise<T> {
    return this.current() ? fn() : this.exclusive(fn);
  }

  transaction<T>(fn: () => Promise<T>, commitCounters: (counters: Map<string, number>) => void): Promise<T> {
    return this.exclusive(() => {
      const tx = new Transaction();
      return this.storage.run(tx, async () => {
        try {
          const result = await fn();
          for (const repo of tx.touched) repo.commit(tx);
          if (tx.counters) commitCounters(tx.counters);
          return result;
        } finally {
          tx.closed = true;
        }
      });
    });
  }
}

export class MemoryRepository<D extends object> implements Repository<D>, Committable {
  private committed = new Map<string, Stored<D>>();
  private readonly working = new WeakMap<Transaction, Map<string, Stored<D>>>();

  constructor(
    readonly collection: string,
    private readonly scope: TransactionScope,
    private readonly uniqueKeys: readonly UniqueKey<D>[] = []
  ) {}

  private rows(): Map<string, Stored<D>> {
    const tx = this.scope.current();
    if (!tx) return this.committed;

    let rows = this.working.get(tx);
    if (!rows) {
      rows = structuredClone(this.committed);
      this.working.set(tx, rows);
      tx.touched.add(this);
    }
    return rows;
  }

  commit(tx: Transaction): void {
    const rows = this.working.get(tx);
    if (rows) this.committed = rows;
    this.working.delete(tx);
  }

  private assertUnique(rows: Map<string, Stored<D>>, candidate: Stored<D>): void {
    for (const key of this.uniqueKeys) {
      const values = key.map((k) => field(candidate, k));
      if (values.some(isEmptyKeyPart)) continue;

      for (const row of rows.values()) {
        if (row.id === candidate.id) continue;
        if (key.every((k, i) => sameValue(field(row, k), values[i]))) {
          throw new DuplicateKeyError(this.collection, [...key]);
        }
      }
    }
  }

  async findById(id: string): Promise<Stored<D> | null> {
    const row = this.rows().get(id);
    return row ? structuredClone(row) : null;
  }

  async findOne(filter: Filter<D>): Promise<Stored<D> | null> {
    for (const row of this.rows().values()) {
      if (matches(row, filter)) return structuredClone(row);
    }
    return null;
  }

  async find(filter?: Filter<D>, opts?: FindOptions<D>): Promise<Stored<D>[]> {
    let out = [...this.rows().values()].filter((row) => matches(row, filter));

    if (opts?.sort) {
      const order: [string, SortOrder][] = [];
      const entries: [string, unknown][] = Object.entries(opts.sort);
      for (const [key, dir] of entries) {
        if (dir === 1 || dir === -1) order.push([key, dir]);
      }
      out.sort((a, b) => {
        for (const [key, dir] of order) {
          const c = compareField(field(a, key), field(b, key));
          if (c !== 0) return c * dir;
        }
        return 0;
      });
    }

    const skip = opts?.skip ?? 0;
    out = opts?.limit ? out.slice(skip, skip + opts.limit) : out.slice(skip);
    return out.map((row) => structuredClone(row));
  }

  async count(filter?: Filter<D>): Promise<number> {
    let n = 0;
    for (const row of this.rows().values()) {
      if (matches(row, filter)) n += 1;
    }
    return n;
  }

  insert(data: D): Promise<Stored<D>> {
    return this.scope.write(async () => {
      const rows = this.rows();
      const now = new Date();
      const row: Stored<D> = {
        ...structuredClone(data),
        id: new Types.ObjectId().toHexString(),
        createdAt: now,
        updatedAt: now,
      };
      this.assertUnique(rows, row);
      rows.set(row.id, row);
      return structuredClone(row);
    });
  }

  update(id: string, patch: Partial<D>): Promise<Stored<D> | null> {
    return this.scope.write(async () => {
      const rows = this.rows();
      const current = rows.get(id);
      if (!current) return null;

      const next = structuredClone(current);
      const entries: [string, unknown][] = Object.entries(patch);
      for (const [key, value] of entries) {
        if (value === undefined || autoFields.has(key)) continue;
        Reflect.set(next, key, structuredClone(value));
      }
      next.updatedAt = new Date();

      this.assertUnique(rows, next);
      rows.set(id, next);
      return structuredClone(next);
    });
  }

  delete(id: string): Promise<Stored<D> | null> {
    return this.scope.write(async () => {
      const rows = this.rows();
      const row = rows.get(id);
      if (!row) return null;
      rows.delete(id);
      return row;
    });
  }

  deleteMany(filter: Filter<D>): Promise<number> {
    return this.scope.write(async () => {
      const rows = this.rows();
      let n = 0;
      for (const [id, row] of [...rows.entries()]) {
        if (!matches(row, filter)) continue;
        rows.delete(id);
        n += 1;
      }
      return n;
    });
  }
}

/**
 * In-process `Store` with the same unique constraints as the mongoose schemas.
 * Transactions run one at a time on copies of the collections they touch; the
 * copies replace the committed rows only when the callback succeeds.
 */
export class MemoryStore implements Store {
  private readonly scope = new TransactionScope();
  private counters = new Map<string, number>();

  readonly departments = new MemoryRepository<DepartmentData>("departments", this.scope, [["name"]]);
  readonly employees = new MemoryRepository<EmployeeData>("employees", this.scope, [["rut"], ["email"]]);
  readonly users = new MemoryRepository<UserData>("users", this.scope, [["username"], ["email"]]);
  readonly assets = new MemoryRepository<AssetData>("assets", this.scope, [["inventoryCode"], ["serialNumber"]]);
  readonly computerDetails = new MemoryRepository<ComputerDetailData>("computerDetails", this.scope, [
    ["assetId"],
    ["uniqueIdentifier"],
  ]);
  readonly storageDevices = new MemoryRepository<StorageDeviceData>("storageDevices", this.scope);
  readonly graphicsCards = new MemoryRepository<GraphicsCardData>("graphicsCards", this.scope);
  readonly software = new MemoryRepository<SoftwareCatalogData>("software", this.scope, [["name", "developer"]]);
  readonly licenses = new MemoryRepository<LicenseData>("licenses", this.scope);
  readonly installations = new MemoryRepository<InstalledSoftwareData>("installations", this.scope, [
    ["assetId", "softwareId"],
  ]);
  readonly vulnerabilities = new MemoryRepository<SoftwareVulnerabilityData>("vulnerabilities", this.scope);
  readonly warnings = new MemoryRepository<ComplianceWarningData>("warnings", this.scope);
  readonly auditLogs = new MemoryRepository<AuditLogData>("auditLogs", this.scope);
  readonly checkins = new MemoryRepository<AssetCheckinData>("checkins", this.scope);
  readonly obsolescenceRules = new MemoryRepository<ObsolescenceRulesData>("obsolescenceRules", this.scope, [
    ["key"],
  ]);

  /** The callback gets this same store; inside it, reads and writes go to the transaction's copies. */
  withTransaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.scope.current()) return fn(this);
    return this.scope.transaction(
      () => fn(this),
      (counters) => {
        this.counters = counters;
      }
    );
  }

  nextSequence(key: string, floor: number): Promise<number> {
    return this.scope.write(async () => {
      const tx = this.scope.current();
      if (tx && !tx.counters) tx.counters = new Map(this.counters);
      const counters = tx?.counters ?? this.counters;

      const next = Math.max(counters.get(key) ?? 0, floor) + 1;
      counters.set(key, next);
      return next;
    });
  }
}
