import type { AssetStatus, AssetType } from "../models/Asset.js";
import { openWarningStatuses, type WarningSource, type WarningStatus } from "../models/ComplianceWarning.js";
import { employeeFullName } from "../models/Employee.js";
import { maskLicenseKey } from "../models/License.js";
import type { Repositories } from "../store/types.js";
import { getLicenseUsage, type LicenseUsage } from "./licenses.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP = 10;

export type Bucket = { key: string; label: string; count: number };

export type EmployeeAssetsFilter = { departmentId?: string; hasAssets?: boolean };

export type EmployeeAssets = {
  employeeId: string;
  rut: string;
  name: string;
  email: string;
  position: string;
  department: string | null;
  assetsCount: number;
  assets: { assetId: string; inventoryCode: string; assetType: AssetType; brand: string; model: string; status: AssetStatus }[];
};

export type AssetSpecsFilter = {
  assetType?: AssetType;
  status?: AssetStatus;
  departmentId?: string;
  hasEmployee?: boolean;
  ramMin?: number;
  ramMax?: number;
};

export type AssetSpecs = {
  assetId: string;
  inventoryCode: string;
  serialNumber: string;
  assetType: AssetType;
  brand: string;
  model: string;
  status: AssetStatus;
  acquisitionDate: Date | null;
  employee: string | null;
  employeeEmail: string | null;
  department: string | null;
  ramGb: number | null;
  cpuModel: string | null;
  osName: string | null;
  osVersion: string | null;
};

export type SoftwareInstallationFilter = { softwareId?: string; hasLicense?: boolean; departmentId?: string };

export type SoftwareInstallationRow = {
  installationId: string;
  softwareId: string;
  softwareName: string;
  developer: string;
  version: string;
  installDate: Date | null;
  assetId: string;
  inventoryCode: string;
  assetType: AssetType | null;
  employee: string | null;
  department: string | null;
  hasLicense: boolean;
  licenseKey: string | null;
};

export const licenseUsageStates = ["available", "full", "exceeded"] as const;
export type LicenseUsageState = (typeof licenseUsageStates)[number];

export type LicenseUsageRow = LicenseUsage & { usagePercent: number; state: LicenseUsageState };

export type WarningsFilter = {
  status?: WarningStatus;
  category?: string;
  source?: WarningSource;
  departmentId?: string;
  from?: Date;
  to?: Date;
};

export type WarningRow = {
  warningId: string;
  assetId: string;
  inventoryCode: string | null;
  employee: string | null;
  department: string | null;
  category: string;
  description: string;
  status: WarningStatus;
  source: WarningSource;
  detectedAt: Date;
  resolvedBy: string | null;
  resolutionNotes: string;
};

export type SummaryMetrics = {
  assets: { total: number; assigned: number; inStorage: number; inRepair: number };
  employees: { total: number };
  departments: { total: number };
  warnings: { active: number };
  software: { total: number; licenses: number; installations: number };
  hardware: { avgRamGb: number };
};

function countBy<T>(items: T[], key: (item: T) => string | null): Map<string, number> {
  const out = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    if (k !== null) out.set(k, (out.get(k) ?? 0) + 1);
  }
  return out;
}

/** Largest first; ties by key so output is stable. */
function buckets(counts: Map<string, number>, label: (key: string) => string = (k) => k, top?: number): Bucket[] {
  const list = [...counts].map(([key, count]) => ({ key, label: label(key), count }));
  list.sort((a, b) => b.count - a.count || a.key.localeCompare(b.key));
  return top === undefined ? list : list.slice(0, top);
}

function inRange(value: Date, from?: Date, to?: Date): boolean {
  if (from && value.getTime() < from.getTime()) return false;
  if (to && value.getTime() > to.getTime()) return false;
  return true;
}

function round(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

async function lookups(store: Repositories) {
  const [departments, employees] = await Promise.all([store.departments.find(), store.employees.find()]);
  return {
    departments: new Map(departments.map((d) => [d.id, d.name])),
    employees: new Map(employees.map((e) => [e.id, e])),
  };
}

export async function employeesWithAssets(
  store: Repositories,
  filter: EmployeeAssetsFilter = {}
): Promise<EmployeeAssets[]> {
  const [employees, assets, { departments }] = await Promise.all([
    store.employees.find({ departmentId: filter.departmentId }, { sort: { lastName: 1, firstName: 1 } }),
    store.assets.find({}, { sort: { inventoryCode: 1 } }),
    lookups(store),
  ]);

  const held = new Map<string, EmployeeAssets["assets"]>();
  for (const a of assets) {
    if (!a.employeeId) continue;
    const list = held.get(a.employeeId) ?? [];
    list.push({
      assetId: a.id,
      inventoryCode: a.inventoryCode,
      assetType: a.assetType,
      brand: a.brand,
      model: a.model,
      status: a.status,
    });
    held.set(a.employeeId, list);
  }

  const rows: EmployeeAssets[] = [];
  for (const e of employees) {
    const own = held.get(e.id) ?? [];
    if (filter.hasAssets !== undefined && filter.hasAssets !== own.length > 0) continue;
    rows.push({
      employeeId: e.id,
      rut: e.rut,
      name: employeeFullName(e),
      email: e.email,
      position: e.position,
      department: e.departmentId ? departments.get(e.departmentId) ?? null : null,
      assetsCount: own.length,
      assets: own,
    });
  }
  return rows;
}

/** RAM bounds only match computers with a hardware snapshot that reports RAM. */
export async function assetsBySpecs(store: Repositories, filter: AssetSpecsFilter = {}): Promise<AssetSpecs[]> {
  const [assets, details, { departments, employees }] = await Promise.all([
    store.assets.find(
      { assetType: filter.assetType, status: filter.status, departmentId: filter.departmentId },
      { sort: { inventoryCode: 1 } }
    ),
    store.computerDetails.find(),
    lookups(store),
  ]);
  const byAsset = new Map(details.map((d) => [d.assetId, d]));
  const ramBounded = filter.ramMin !== undefined || filter.ramMax !== undefined;

  const rows: AssetSpecs[] = [];
  for (const a of assets) {
    if (filter.hasEmployee !== undefined && filter.hasEmployee !== (a.employeeId !== null)) continue;

    const detail = byAsset.get(a.id) ?? null;
    const ram = detail?.ramGb ?? null;
    if (ramBounded) {
      if (ram === null) continue;
      if (filter.ramMin !== undefined && ram < filter.ramMin) continue;
      if (filter.ramMax !== undefined && ram > filter.ramMax) continue;
    }

    const employee = a.employeeId ? employees.get(a.employeeId) ?? null : null;
    rows.push({
      assetId: a.id,
      inventoryCode: a.inventoryCode,
      serialNumber: a.serialNumber,
      assetType: a.assetType,
      brand: a.brand,
      model: a.model,
      status: a.status,
      acquisitionDate: a.acquisitionDate,
      employee: employee ? employeeFullName(employee) : null,
      employeeEmail: employee ? employee.email : null,
      department: a.departmentId ? departments.get(a.departmentId) ?? null : null,
      ramGb: ram,
      cpuModel: detail ? detail.cpuModel : null,
      osName: detail ? detail.osName : null,
      osVersion: detail ? detail.osVersion : null,
    });
  }
  return rows;
}

/** License keys are always masked here, whatever the caller's role. */
export async function softwareInstallations(
  store: Repositories,
  filter: SoftwareInstallationFilter = {}
): Promise<SoftwareInstallationRow[]> {
  const [installations, catalog, assets, licenses, { departments, employees }] = await Promise.all([
    store.installations.find({ softwareId: filter.softwareId }),
    store.software.find(),
    store.assets.find(),
    store.licenses.find(),
    lookups(store),
  ]);
  const software = new Map(catalog.map((s) => [s.id, s]));
  const assetsById = new Map(assets.map((a) => [a.id, a]));
  const keys = new Map(licenses.map((l) => [l.id, l.licenseKey]));

  const rows: SoftwareInstallationRow[] = [];
  for (const i of installations) {
    const hasLicense = i.licenseId !== null;
    if (filter.hasLicense !== undefined && filter.hasLicense !== hasLicense) continue;

    const asset = assetsById.get(i.assetId);
    if (filter.departmentId !== undefined && asset?.departmentId !== filter.departmentId) continue;

    const sw = software.get(i.softwareId);
    const employee = asset?.employeeId ? employees.get(asset.employeeId) ?? null : null;
    const key = i.licenseId ? keys.get(i.licenseId) : undefined;
    rows.push({
      installationId: i.id,
      softwareId: i.softwareId,
      softwareName: sw ? sw.name : "",
      developer: sw ? sw.developer : "",
      version: i.version || "N/A",
      installDate: i.installDate,
      assetId: i.assetId,
      inventoryCode: asset ? asset.inventoryCode : "",
      assetType: asset ? asset.assetType : null,
      employee: employee ? employeeFullName(employee) : null,
      department: asset?.departmentId ? departments.get(asset.departmentId) ?? null : null,
      hasLicense,
      licenseKey: key === undefined ? null : maskLicenseKey(key),
    });
  }
  rows.sort((a, b) => a.softwareName.localeCompare(b.softwareName) || a.inventoryCode.localeCompare(b.inventoryCode));
  return rows;
}

export function usageState(usage: Pick<LicenseUsage, "quantity" | "used">): LicenseUsageState {
  if (usage.used > usage.quantity) return "exceeded";
  return usage.used === usage.quantity ? "full" : "available";
}

export async function licenseUsageReport(
  store: Repositories,
  filter: { softwareId?: string; state?: LicenseUsageState } = {},
  now: Date = new Date()
): Promise<LicenseUsageRow[]> {
  const usage = await getLicenseUsage(store, now);
  return usage
    .filter((u) => filter.softwareId === undefined || u.softwareId === filter.softwareId)
    .map((u) => ({
      ...u,
      usagePercent: u.quantity > 0 ? round((u.used / u.quantity) * 100, 1) : 0,
      state: usageState(u),
    }))
    .filter((u) => filter.state === undefined || u.state === filter.state);
}

export async function warningsReport(store: Repositories, filter: WarningsFilter = {}): Promise<WarningRow[]> {
  const [warnings, assets, users, { departments, employees }] = await Promise.all([
    store.warnings.find(
      { status: filter.status, category: filter.category, source: filter.source },
      { sort: { createdAt: -1 } }
    ),
    store.assets.find(),
    store.users.find(),
    lookups(store),
  ]);
  const assetsById = new Map(assets.map((a) => [a.id, a]));
  const usernames = new Map(users.map((u) => [u.id, u.username]));

  const rows: WarningRow[] = [];
  for (const w of warnings) {
    if (!inRange(w.createdAt, filter.from, filter.to)) continue;
    const asset = assetsById.get(w.assetId);
    if (filter.departmentId !== undefined && asset?.departmentId !== filter.departmentId) continue;

    const employee = asset?.employeeId ? employees.get(asset.employeeId) ?? null : null;
    rows.push({
      warningId: w.id,
      assetId: w.assetId,
      inventoryCode: asset ? asset.inventoryCode : null,
      employee: employee ? employeeFullName(employee) : null,
      department: asset?.departmentId ? departments.get(asset.departmentId) ?? null : null,
      category: w.category,
      description: w.description,
      status: w.status,
      source: w.source,
      detectedAt: w.createdAt,
      resolvedBy: w.resolvedById ? usernames.get(w.resolvedById) ?? null : null,
      resolutionNotes: w.resolutionNotes,
    });
  }
  return rows;
}

export async function summaryMetrics(store: Repositories): Promise<SummaryMetrics> {
  const [assets, employees, departments, active, software, licenses, installations, details] = await Promise.all([
    store.assets.find(),
    store.employees.count(),
    store.departments.count(),
    store.warnings.count({ status: openWarningStatuses }),
    store.software.count(),
    store.licenses.count(),
    store.installations.count(),
    store.computerDetails.find(),
  ]);

  const ram = details.flatMap((d) => (d.ramGb === null ? [] : [d.ramGb]));
  const byStatus = countBy(assets, (a) => a.status);

  return {
    assets: {
      total: assets.length,
      assigned: byStatus.get("ASSIGNED") ?? 0,
      inStorage: byStatus.get("IN_STORAGE") ?? 0,
      inRepair: byStatus.get("IN_REPAIR") ?? 0,
    },
    employees: { total: employees },
    departments: { total: departments },
    warnings: { active },
    software: { total: software, licenses, installations },
    hardware: { avgRamGb: ram.length ? round(ram.reduce((s, v) => s + v, 0) / ram.length, 2) : 0 },
  };
}

const ramRanges = [
  { label: "< 4 GB", max: 4 },
  { label: "4-8 GB", max: 8 },
  { label: "8-16 GB", max: 16 },
  { label: "16-32 GB", max: 32 },
  { label: ">= 32 GB", max: Infinity },
] as const;

export async function assetsDistribution(store: Repositories) {
  const [assets, details, { departments }] = await Promise.all([
    store.assets.find(),
    store.computerDetails.find(),
    lookups(store),
  ]);

  const ram = ramRanges.map((r) => ({ key: r.label, label: r.label, count: 0 }));
  for (const d of details) {
    const gb = d.ramGb;
    if (gb === null) continue;
    const slot = ramRanges.findIndex((r) => gb < r.max);
    ram[slot].count += 1;
  }

  return {
    byType: buckets(countBy(assets, (a) => a.assetType)),
    byStatus: buckets(countBy(assets, (a) => a.status)),
    byDepartment: buckets(
      countBy(assets, (a) => a.departmentId),
      (id) => departments.get(id) ?? id,
      TOP
    ),
    byRam: ram,
  };
}

export async function employeesDistribution(store: Repositories) {
  const [employees, assets, { departments }] = await Promise.all([
    store.employees.find(),
    store.assets.find(),
    lookups(store),
  ]);

  const held = countBy(assets, (a) => a.employeeId);
  const perEmployee = countBy(employees, (e) => String(held.get(e.id) ?? 0));

  return {
    byDepartment: buckets(
      countBy(employees, (e) => e.departmentId),
      (id) => departments.get(id) ?? id,
      TOP
    ),
    assetsPerEmployee: [...perEmployee]
      .map(([key, count]) => ({ key, label: `${key} activos`, count }))
      .sort((a, b) => Number(a.key) - Number(b.key)),
  };
}

/** Status and category totals, plus daily counts for the last 30 days (UTC days, zero-filled). */
export async function warningsAnalytics(store: Repositories, now: Date = new Date()) {
  const warnings = await store.warnings.find();

  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const start = today - 30 * DAY_MS;
  const daily = new Map<string, number>();
  for (let t = start; t <= today; t += DAY_MS) daily.set(new Date(t).toISOString().slice(0, 10), 0);
  for (const w of warnings) {
    const day = w.createdAt.toISOString().slice(0, 10);
    const seen = daily.get(day);
    if (seen !== undefined) daily.set(day, seen + 1);
  }

  return {
    byStatus: buckets(countBy(warnings, (w) => w.status)),
    byCategory: buckets(countBy(warnings, (w) => w.category)),
    bySource: buckets(countBy(warnings, (w) => w.source)),
    trend: [...daily].map(([date, count]) => ({ date, count })),
  };
}

export async function softwareAnalytics(store: Repositories) {
  const [catalog, installations, licenses] = await Promise.all([
    store.software.find(),
    store.installations.find(),
    store.licenses.find(),
  ]);
  const label = new Map(catalog.map((s) => [s.id, s.developer ? `${s.name} (${s.developer})` : s.name]));
  const name = (id: string) => label.get(id) ?? id;

  const seatsInUse = countBy(installations, (i) => i.licenseId);
  const seats = new Map<string, { total: number; inUse: number }>();
  for (const l of licenses) {
    const entry = seats.get(l.softwareId) ?? { total: 0, inUse: 0 };
    entry.total += l.quantity;
    entry.inUse += seatsInUse.get(l.id) ?? 0;
    seats.set(l.softwareId, entry);
  }
  const licenseUsage = [...seats]
    .map(([softwareId, s]) => ({
      softwareId,
      label: name(softwareId),
      total: s.total,
      inUse: s.inUse,
      available: Math.max(0, s.total - s.inUse),
    }))
    .sort((a, b) => b.total - a.total || a.label.localeCompare(b.label))
    .slice(0, TOP);

  return {
    topInstalled: buckets(
      countBy(installations, (i) => i.softwareId),
      name,
      TOP
    ),
    licenseUsage,
    withoutLicense: buckets(
      countBy(installations, (i) => (i.licenseId === null ? i.softwareId : null)),
      name,
      TOP
    ),
  };
}
