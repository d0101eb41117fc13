import type { Repositories, Repository, Stored } from "../store/types.js";
import type { JsonObject } from "../utils/json.js";

type DataOf<R> = R extends Repository<infer D> ? D : never;

export type EntityTracking<D> = {
  /** Value written to `AuditLog.targetTable`. */
  table: string;
  /** Persisted fields compared on UPDATE. */
  fields: readonly (keyof D & string)[];
  /** Hidden from diffs in addition to the global sensitive fields. */
  redact?: readonly (keyof D & string)[];
  /** Snapshot stored for CREATE and DELETE. */
  summarize(entity: Stored<D>, store: Repositories): Promise<JsonObject>;
  /** Identifying key stored next to the changes of an UPDATE. */
  identify(entity: Stored<D>, store: Repositories): Promise<JsonObject>;
};

export const trackedCollections = [
  "assets",
  "computerDetails",
  "employees",
  "departments",
  "users",
  "software",
  "licenses",
  "installations",
  "warnings",
  "checkins",
] as const;
export type TrackedCollection = (typeof trackedCollections)[number];

export type TrackedEntities = {
  [K in TrackedCollection]: EntityTracking<DataOf<Repositories[K]>>;
};

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

async function inventoryCodeOf(store: Repositories, assetId: string | null): Promise<string | null> {
  if (!assetId) return null;
  const asset = await store.assets.findById(assetId);
  return asset?.inventoryCode ?? null;
}

async function softwareNameOf(store: Repositories, softwareId: string | null): Promise<string | null> {
  if (!softwareId) return null;
  const software = await store.software.findById(softwareId);
  return software?.name ?? null;
}

export const trackedEntities: TrackedEntities = {
  assets: {
    table: "asset",
    fields: [
      "inventoryCode",
      "serialNumber",
      "assetType",
      "status",
      "brand",
      "model",
      "acquisitionDate",
      "employeeId",
      "departmentId",
    ],
    async summarize(a) {
      return {
        inventoryCode: a.inventoryCode,
        assetType: a.assetType,
        brand: a.brand,
        model: a.model,
        status: a.status,
      };
    },
    async identify(a) {
      return { inventoryCode: a.inventoryCode };
    },
  },

  computerDetails: {
    table: "computer_detail",
    fields: [
      "assetId",
      "uniqueIdentifier",
      "osName",
      "osVersion",
      "osArch",
      "cpuModel",
      "ramGb",
      "motherboardManufacturer",
      "motherboardModel",
      "lastUpdatedByAgent",
    ],
    async summarize(d, store) {
      return {
        assetInventoryCode: await inventoryCodeOf(store, d.assetId),
        cpuModel: d.cpuModel,
        ramGb: d.ramGb,
      };
    },
    async identify(d, store) {
      return { assetInventoryCode: await inventoryCodeOf(store, d.assetId) };
    },
  },

  employees: {
    table: "employee",
    fields: ["rut", "firstName", "lastName", "email", "position", "departmentId"],
    async summarize(e, store) {
      const department = e.departmentId ? await store.departments.findById(e.departmentId) : null;
      return {
        rut: e.rut,
        firstName: e.firstName,
        lastName: e.lastName,
        email: e.email,
        department: department?.name ?? null,
      };
    },
    async identify(e) {
      return { rut: e.rut };
    },
  },

  departments: {
    table: "department",
    fields: ["name"],
    async summarize(d) {
      return { name: d.name };
    },
    async identify(d) {
      return { name: d.name };
    },
  },

  users: {
    table: "user",
    fields: ["username", "email", "firstName", "lastName", "role", "isActive", "passwordHash"],
    redact: ["passwordHash"],
    async summarize(u) {
      return { username: u.username, email: u.email, role: u.role, isActive: u.isActive };
    },
    async identify(u) {
      return { username: u.username };
    },
  },

  software: {
    table: "software_catalog",
    fields: ["name", "developer"],
    async summarize(s) {
      return { name: s.name, developer: s.developer };
    },
    async identify(s) {
      return { name: s.name, developer: s.developer };
    },
  },

  licenses: {
    table: "license",
    fields: ["softwareId", "licenseKey", "purchaseDate", "expirationDate", "quantity"],
    redact: ["licenseKey"],
    async summarize(l, store) {
      return {
        software: await softwareNameOf(store, l.softwareId),
        quantity: l.quantity,
        purchaseDate: iso(l.purchaseDate),
        expirationDate: iso(l.expirationDate),
        hasLicenseKey: Boolean(l.licenseKey),
      };
    },
    async identify(l, store) {
      return {
        software: await softwareNameOf(store, l.softwareId),
        hasLicenseKey: Boolean(l.licenseKey),
      };
    },
  },

  installations: {
    table: "installed_software",
    fields: ["assetId", "softwareId", "version", "installDate", "licenseId"],
    async summarize(i, store) {
      return {
        asset: await inventoryCodeOf(store, i.assetId),
        software: await softwareNameOf(store, i.softwareId),
        version: i.version,
        licenseId: i.licenseId,
      };
    },
    async identify(i, store) {
      return {
        asset: await inventoryCodeOf(store, i.assetId),
        software: await softwareNameOf(store, i.softwareId),
      };
    },
  },

  warnings: {
    table: "compliance_warning",
    fields: ["assetId", "category", "description", "evidence", "status", "resolvedById", "resolutionNotes", "source"],
    async summarize(w, store) {
      return {
        asset: await inventoryCodeOf(store, w.assetId),
        category: w.category,
        status: w.status,
        description: w.description,
      };
    },
    async identify(w, store) {
      return {
        asset: await inventoryCodeOf(store, w.assetId),
        category: w.category,
      };
    },
  },

  checkins: {
    table: "asset_checkin",
    fields: ["assetId", "employeeId", "physicalState", "performanceSatisfaction", "notes"],
    async summarize(c, store) {
      const employee = await store.employees.findById(c.employeeId);
      return {
        asset: await inventoryCodeOf(store, c.assetId),
        employee: employee?.rut ?? null,
        physicalState: c.physicalState,
      };
    },
    async identify(c, store) {
      return { asset: await inventoryCodeOf(store, c.assetId) };
    },
  },
};
