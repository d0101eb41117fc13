import mongoose, { type ClientSession, type HydratedDocument, type Model } from "mongoose";

import { toAssetCheckin, AssetCheckinModel } from "../models/AssetCheckin.js";
import { toAsset, AssetModel } from "../models/Asset.js";
import { toAuditLog, AuditLogModel } from "../models/AuditLog.js";
import { toComplianceWarning, ComplianceWarningModel } from "../models/ComplianceWarning.js";
import { toComputerDetail, ComputerDetailModel } from "../models/ComputerDetail.js";
import { CounterModel } from "../models/Counter.js";
import { toDepartment, DepartmentModel } from "../models/Department.js";
import { toEmployee, EmployeeModel } from "../models/Employee.js";
import { toGraphicsCard, GraphicsCardModel } from "../models/GraphicsCard.js";
import { toInstalledSoftware, InstalledSoftwareModel } from "../models/InstalledSoftware.js";
import { toLicense, LicenseModel } from "../models/License.js";
import { toObsolescenceRules, ObsolescenceRulesModel } from "../models/ObsolescenceRules.js";
import { toSoftwareCatalog, SoftwareCatalogModel } from "../models/SoftwareCatalog.js";
import { toSoftwareVulnerability, SoftwareVulnerabilityModel } from "../models/SoftwareVulnerability.js";
import { toStorageDevice, StorageDeviceModel } from "../models/StorageDevice.js";
import { toUser, UserModel } from "../models/User.js";
import { DuplicateKeyError } from "../utils/errors.js";
import type { Filter, FindOptions, Repositories, Repository, Store, Stored } from "./types.js";

type Conditions = {
  where(path: string, val?: unknown): Conditions;
  in(path: string, val: unknown[]): Conditions;
};

const autoFields = new Set(["id", "_id", "createdAt", "updatedAt"]);

function fieldPath(key: string): string {
  return key === "id" ? "_id" : key;
}

function applyFilter(query: Conditions, filter: object | undefined): void {
  const entries: [string, unknown][] = Object.entries(filter ?? {});
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      query.in(fieldPath(key), value);
    } else {
      query.where(fieldPath(key), value);
    }
  }
}

function duplicateFields(err: unknown): string[] | null {
  if (!(err instanceof mongoose.mongo.MongoServerError) || err.code !== 11000) return null;
  const pattern: unknown = err.keyPattern;
  return pattern && typeof pattern === "object" ? Object.keys(pattern) : [];
}

class MongoRepository<D extends object, R> implements Repository<D> {
  constructor(
    readonly collection: string,
    private readonly model: Model<R>,
    private readonly toEntity: (doc: HydratedDocument<R>) => Stored<D>,
    private readonly session: ClientSession | null
  ) {}

  private async guard<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      const fields = duplicateFields(err);
      if (fields) throw new DuplicateKeyError(this.collection, fields);
      throw err;
    }
  }

  async findById(id: string): Promise<Stored<D> | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await this.model.findById(id).session(this.session).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async findOne(filter: Filter<D>): Promise<Stored<D> | null> {
    const query = this.model.findOne().session(this.session);
    applyFilter(query, filter);
    const doc = await query.exec();
    return doc ? this.toEntity(doc) : null;
  }

  async find(filter?: Filter<D>, opts?: FindOptions<D>): Promise<Stored<D>[]> {
    const query = this.model.find().session(this.session);
    applyFilter(query, filter);

    if (opts?.sort) {
      const sort: Record<string, 1 | -1> = {};
      const entries: [string, unknown][] = Object.entries(opts.sort);
      for (const [key, order] of entries) {
        if (order === 1 || order === -1) sort[fieldPath(key)] = order;
      }
      query.sort(sort);
    }
    if (opts?.skip) query.skip(opts.skip);
    if (opts?.limit) query.limit(opts.limit);

    const docs = await query.exec();
    return docs.map((doc) => this.toEntity(doc));
  }

  async count(filter?: Filter<D>): Promise<number> {
    const query = this.model.countDocuments().session(this.session);
    applyFilter(query, filter);
    return query.exec();
  }

  insert(data: D): Promise<Stored<D>> {
    return this.guard(async () => {
      const [doc] = await this.model.create([data], { session: this.session });
      if (!doc) throw new Error(`Insert into ${this.collection} returned nothing`);
      return this.toEntity(doc);
    });
  }

  update(id: string, patch: Partial<D>): Promise<Stored<D> | null> {
    return this.guard(async () => {
      if (!mongoose.isValidObjectId(id)) return null;
      const doc = await this.model.findById(id).session(this.session).exec();
      if (!doc) return null;

      const entries: [string, unknown][] = Object.entries(patch);
      for (const [key, value] of entries) {
        if (value === undefined || autoFields.has(key)) continue;
        doc.set(key, value);
      }
      await doc.save();
      return this.toEntity(doc);
    });
  }

  async delete(id: string): Promise<Stored<D> | null> {
    if (!mongoose.isValidObjectId(id)) return null;
    const doc = await this.model.findByIdAndDelete(id).session(this.session).exec();
    return doc ? this.toEntity(doc) : null;
  }

  async deleteMany(filter: Filter<D>): Promise<number> {
    const query = this.model.deleteMany().session(this.session);
    applyFilter(query, filter);
    const result = await query.exec();
    return result.deletedCount;
  }
}

function createRepositories(session: ClientSession | null): Repositories {
  return {
    departments: new MongoRepository("departments", DepartmentModel, toDepartment, session),
    employees: new MongoRepository("employees", EmployeeModel, toEmployee, session),
    users: new MongoRepository("users", UserModel, toUser, session),
    assets: new MongoRepository("assets", AssetModel, toAsset, session),
    computerDetails: new MongoRepository("computerDetails", ComputerDetailModel, toComputerDetail, session),
    storageDevices: new MongoRepository("storageDevices", StorageDeviceModel, toStorageDevice, session),
    graphicsCards: new MongoRepository("graphicsCards", GraphicsCardModel, toGraphicsCard, session),
    software: new MongoRepository("software", SoftwareCatalogModel, toSoftwareCatalog, session),
    licenses: new MongoRepository("licenses", LicenseModel, toLicense, session),
    installations: new MongoRepository("installations", InstalledSoftwareModel, toInstalledSoftware, session),
    vulnerabilities: new MongoRepository(
      "vulnerabilities",
      SoftwareVulnerabilityModel,
      toSoftwareVulnerability,
      session
    ),
    warnings: new MongoRepository("warnings", ComplianceWarningModel, toComplianceWarning, session),
    auditLogs: new MongoRepository("auditLogs", AuditLogModel, toAuditLog, session),
    checkins: new MongoRepository("checkins", AssetCheckinModel, toAssetCheckin, session),
    obsolescenceRules: new MongoRepository(
      "obsolescenceRules",
      ObsolescenceRulesModel,
      toObsolescenceRules,
      session
    ),
  };
}

async function nextSequence(key: string, floor: number, session: ClientSession | null): Promise<number> {
  await CounterModel.updateOne({ _id: key }, { $max: { seq: floor } }, { upsert: true }).session(session).exec();
  const counter = await CounterModel.findOneAndUpdate({ _id: key }, { $inc: { seq: 1 } }, { new: true, upsert: true })
    .session(session)
    .exec();
  if (!counter) throw new Error(`Counter ${key} could not be allocated`);
  return counter.seq;
}

/** Store backed by the mongoose models; requires a replica set for transactions. */
export function createMongoStore(session: ClientSession | null = null): Store {
  return {
    ...createRepositories(session),

    async withTransaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
      if (session) return fn(createMongoStore(session));

      const txSession = await mongoose.startSession();
      try {
        return await txSession.withTransaction(() => fn(createMongoStore(txSession)));
      } finally {
        await txSession.endSession();
      }
    },

    nextSequence(key: string, floor: number): Promise<number> {
      return nextSequence(key, floor, session);
    },
  };
}
