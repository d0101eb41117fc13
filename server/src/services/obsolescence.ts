import { employeeFullName } from "../models/Employee.js";
import { computerAssetTypes, isComputer, type Asset, type AssetType } from "../models/Asset.js";
import type { ComputerDetail } from "../models/ComputerDetail.js";
import type { ObsolescenceRulesData } from "../models/ObsolescenceRules.js";
import type { StorageDevice } from "../models/StorageDevice.js";
import type { Repositories } from "../store/types.js";

export type LowDiskDrive = {
  model: string;
  freePercent: number;
  minRequired: number;
};

export type ObsolescenceDetails = {
  osVersion?: string;
  osMinRequired?: string;
  ramGb?: number;
  ramMinRequired?: number;
  lowDiskDrives?: LowDiskDrive[];
};

export type ObsolescenceResult = {
  isObsolete: boolean;
  reasons: string[];
  details: ObsolescenceDetails;
};

export type HardwareSnapshot = {
  detail: ComputerDetail | null;
  storageDevices: StorageDevice[];
};

export type EvaluationRules = Pick<ObsolescenceRulesData, "windowsMinVersion" | "ramMinGb" | "diskMinFreePercent" | "enabled">;

export type ObsoleteAsset = {
  assetId: string;
  inventoryCode: string;
  assetType: AssetType;
  brand: string;
  model: string;
  department: string | null;
  employee: string | null;
  reasons: string[];
  details: ObsolescenceDetails;
};

/** Dotted OS build as three integers; non-numeric or missing segments count as 0. */
export function parseOsBuild(raw: string): [number, number, number] {
  const parts = raw.trim() ? raw.trim().split(".") : [];
  const nums = parts.map((p) => (/^\d+$/.test(p.trim()) ? Number(p.trim()) : 0));
  return [nums[0] ?? 0, nums[1] ?? 0, nums[2] ?? 0];
}

function tupleLess(a: readonly number[], b: readonly number[]): boolean {
  for (let i = 0; i < Math.max(a.length, b.length); i += 1) {
    const l = a[i] ?? 0;
    const r = b[i] ?? 0;
    if (l !== r) return l < r;
  }
  return false;
}

const notObsolete = (): ObsolescenceResult => ({ isObsolete: false, reasons: [], details: {} });

export function evaluateAsset(
  asset: Pick<Asset, "assetType">,
  hardware: HardwareSnapshot,
  rules: EvaluationRules
): ObsolescenceResult {
  if (!rules.enabled || !isComputer(asset)) return notObsolete();

  const detail = hardware.detail;
  if (!detail) return notObsolete();

  const reasons: string[] = [];
  const details: ObsolescenceDetails = {};
  const lowDisk: LowDiskDrive[] = [];

  if (detail.osName.includes("Windows")) {
    if (tupleLess(parseOsBuild(detail.osVersion), parseOsBuild(rules.windowsMinVersion))) {
      reasons.push(
        `Sistema operativo obsoleto: ${detail.osName} ${detail.osVersion} (mínimo: ${rules.windowsMinVersion})`
      );
      details.osVersion = detail.osVersion;
      details.osMinRequired = rules.windowsMinVersion;
    }
  }

  if (detail.ramGb !== null && detail.ramGb < rules.ramMinGb) {
    reasons.push(`RAM insuficiente: ${detail.ramGb} GB (mínimo: ${rules.ramMinGb} GB)`);
    details.ramGb = detail.ramGb;
    details.ramMinRequired = rules.ramMinGb;
  }

  for (const disk of hardware.storageDevices) {
    if (!disk.capacityGb || disk.freeSpaceGb === null) continue;

    const freePercent = (disk.freeSpaceGb / disk.capacityGb) * 100;
    if (freePercent >= rules.diskMinFreePercent) continue;

    reasons.push(
      `Disco con poco espacio: ${disk.model || "Disco"} - ${freePercent.toFixed(1)}% libre (mínimo: ${rules.diskMinFreePercent}%)`
    );
    lowDisk.push({
      model: disk.model,
      freePercent: Math.round(freePercent * 100) / 100,
      minRequired: rules.diskMinFreePercent,
    });
  }

  if (lowDisk.length) details.lowDiskDrives = lowDisk;

  return { isObsolete: reasons.length > 0, reasons, details };
}

export async function loadHardware(store: Repositories, assetId: string): Promise<HardwareSnapshot> {
  const [detail, storageDevices] = await Promise.all([
    store.computerDetails.findOne({ assetId }),
    store.storageDevices.find({ assetId }),
  ]);
  return { detail, storageDevices };
}

/** Every computer asset failing at least one rule. Read-only: no warnings are raised. */
export async function getObsoleteAssets(store: Repositories, rules: EvaluationRules): Promise<ObsoleteAsset[]> {
  if (!rules.enabled) return [];

  const assets = await store.assets.find({ assetType: computerAssetTypes }, { sort: { inventoryCode: 1 } });
  const out: ObsoleteAsset[] = [];

  for (const asset of assets) {
    const result = evaluateAsset(asset, await loadHardware(store, asset.id), rules);
    if (!result.isObsolete) continue;

    const [department, employee] = await Promise.all([
      asset.departmentId ? store.departments.findById(asset.departmentId) : null,
      asset.employeeId ? store.employees.findById(asset.employeeId) : null,
    ]);

    out.push({
      assetId: asset.id,
      inventoryCode: asset.inventoryCode,
      assetType: asset.assetType,
      brand: asset.brand,
      model: asset.model,
      department: department?.name ?? null,
      employee: employee ? employeeFullName(employee) : null,
      reasons: result.reasons,
      details: result.details,
    });
  }
  return out;
}
