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

export type Stored<D> = D & {
  id: string;
  createdAt: Date;
  updatedAt: Date;
};

/** Field equality; an array value matches any of its members. */
export type Filter<D> = {
  [K in keyof Stored<D>]?: Stored<D>[K] | readonly Stored<D>[K][];
};

export type SortOrder = 1 | -1;

export type FindOptions<D> = {
  sort?: { [K in keyof Stored<D>]?: SortOrder };
  skip?: number;
  limit?: number;
};

export interface Repository<D> {
  readonly collection: string;
  findById(id: string): Promise<Stored<D> | null>;
  findOne(filter: Filter<D>): Promise<Stored<D> | null>;
  find(filter?: Filter<D>, opts?: FindOptions<D>): Promise<Stored<D>[]>;
  count(filter?: Filter<D>): Promise<number>;
  insert(data: D): Promise<Stored<D>>;
  update(id: string, patch: Partial<D>): Promise<Stored<D> | null>;
  delete(id: string): Promise<Stored<D> | null>;
  deleteMany(filter: Filter<D>): Promise<number>;
}

export type Repositories = {
  departments: Repository<DepartmentData>;
  employees: Repository<EmployeeData>;
  users: Repository<UserData>;
  assets: Repository<AssetData>;
  computerDetails: Repository<ComputerDetailData>;
  storageDevices: Repository<StorageDeviceData>;
  graphicsCards: Repository<GraphicsCardData>;
  software: Repository<SoftwareCatalogData>;
  licenses: Repository<LicenseData>;
  installations: Repository<InstalledSoftwareData>;
  vulnerabilities: Repository<SoftwareVulnerabilityData>;
  warnings: Repository<ComplianceWarningData>;
  auditLogs: Repository<AuditLogData>;
  checkins: Repository<AssetCheckinData>;
  obsolescenceRules: Repository<ObsolescenceRulesData>;
};

export interface Store extends Repositories {
  /**
   * Runs `fn` as one unit of work. Every write made through the `tx` store is
   * committed together or not at all. Calling it on a `tx` store joins the
   * enclosing transaction.
   */
  withTransaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
  /** Atomically allocates the next value of a named counter, never below `floor + 1`. */
  nextSequence(key: string, floor: number): Promise<number>;
}
