import type { AgentReport, AgentSoftware } from "../agent/payload.js";
import type { Asset } from "../models/Asset.js";
import { warningCategories } from "../models/ComplianceWarning.js";
import type { ComputerDetail } from "../models/ComputerDetail.js";
import type { SoftwareCatalog } from "../models/SoftwareCatalog.js";
import type { Repositories, Store } from "../store/types.js";
import { AppError, DuplicateKeyError, ProcessingError } from "../utils/errors.js";
import { errorFields, log } from "../utils/log.js";
import { createWarning } from "./warnings.js";

export type ComputerType = "NOTEBOOK" | "DESKTOP";

export type IngestResult = {
  assetCreated: boolean;
  assetId: string;
  inventoryCode: string;
  warningsGenerated: number;
  changesDetected: string[];
};

/** SMBIOS chassis codes for portable machines. */
export const laptopChassisCodes: ReadonlySet<number> = new Set([8, 9, 10, 11, 12, 14, 18, 21, 30, 31, 32]);
export const desktopChassisCodes: ReadonlySet<number> = new Set([3, 4, 5, 6, 7, 13, 15, 16, 24, 35, 36]);

export const inventoryPrefixes: Record<ComputerType, string> = {
  NOTEBOOK: "NB-",
  DESKTOP: "PC-",
};

export function classifyChassis(code: number | null): ComputerType {
  if (code !== null && laptopChassisCodes.has(code)) return "NOTEBOOK";
  return "DESKTOP";
}

export function serialFromIdentifier(uniqueIdentifier: string): string {
  return uniqueIdentifier.slice(-12);
}

/**
 * Next free inventory code for a computer type, e.g. NB-0007. The counter is
 * seeded from the highest existing code with the same prefix.
 */
export async function nextInventoryCode(store: Store, type: ComputerType): Promise<string> {
  const prefix = inventoryPrefixes[type];
  const assets = await store.assets.find({ assetType: type });

  let seen = 0;
  let highest = 0;
  for (const asset of assets) {
    if (!asset.inventoryCode.startsWith(prefix)) continue;
    seen += 1;
    const n = Number(asset.inventoryCode.slice(prefix.length));
    if (Number.isInteger(n) && n > highest) highest = n;
  }

  const seq = await store.nextSequence(`inventory:${prefix}`, Math.max(seen, highest));
  return `${prefix}${String(seq).padStart(4, "0")}`;
}

/** CPU, RAM and OS name differences between the stored snapshot and a new report. */
export function detectHardwareChanges(previous: ComputerDetail, report: AgentReport): string[] {
  const changes: string[] = [];
  const hw = report.hardware;

  if (previous.cpuModel && previous.cpuModel !== hw.cpuModel) {
    changes.push(`CPU cambió de ${previous.cpuModel} a ${hw.cpuModel}`);
  }
  if (previous.ramGb !== null && previous.ramGb !== hw.ramGb) {
    changes.push(`RAM cambió de ${previous.ramGb} GB a ${hw.ramGb} GB`);
  }
  if (previous.osName && previous.osName !== report.os.name) {
    changes.push(`Sistema operativo cambió de ${previous.osName} a ${report.os.name}`);
  }
  return changes;
}

async function findOrCreateSoftware(store: Repositories, name: string, developer: string): Promise<SoftwareCatalog> {
  const existing = await store.software.findOne({ name, developer });
  if (existing) return existing;
  return store.software.insert({ name, developer });
}

async function createComputer(tx: Store, report: AgentReport): Promise<{ asset: Asset; detail: ComputerDetail }> {
  const type = classifyChassis(report.hardware.chassisType);
  const inventoryCode = await nextInventoryCode(tx, type);

  const asset = await tx.assets.insert({
    inventoryCode,
    serialNumber: serialFromIdentifier(report.hardware.uniqueIdentifier),
    assetType: type,
    status: "IN_STORAGE",
    brand: report.hardware.motherboardManufacturer,
    model: report.hardware.motherboardModel,
    acquisitionDate: null,
    employeeId: null,
    departmentId: null,
  });

  const detail = await tx.computerDetails.insert({
    assetId: asset.id,
    uniqueIdentifier: "",
    osName: "",
    osVersion: "",
    osArch: "",
    cpuModel: "",
    ramGb: null,
    motherboardManufacturer: "",
    motherboardModel: "",
    lastUpdatedByAgent: null,
  });

  return { asset, detail };
}

async function replaceHardware(tx: Store, assetId: string, report: AgentReport): Promise<void> {
  await tx.storageDevices.deleteMany({ assetId });
  for (const disk of report.hardware.disks) {
    await tx.storageDevices.insert({ assetId, ...disk });
  }

  await tx.graphicsCards.deleteMany({ assetId });
  for (const modelName of report.hardware.gpus) {
    await tx.graphicsCards.insert({ assetId, modelName });
  }
}

async function replaceSoftware(tx: Store, assetId: string, installed: AgentSoftware[]): Promise<void> {
  await tx.installations.deleteMany({ assetId });

  const seen = new Set<string>();
  for (const item of installed) {
    const software = await findOrCreateSoftware(tx, item.name, item.developer);
    if (seen.has(software.id)) continue;
    seen.add(software.id);

    await tx.installations.insert({
      assetId,
      softwareId: software.id,
      version: item.version,
      installDate: item.installDate,
      licenseId: null,
    });
  }
}

async function raiseWarnings(tx: Store, assetId: string, report: AgentReport, changes: string[]): Promise<number> {
  let raised = 0;

  for (const s of report.suspiciousSoftware) {
    const description = s.reason
      ? `Software sospechoso detectado: ${s.name} (${s.reason})`
      : `Software sospechoso detectado: ${s.name}`;
    await createWarning(tx, {
      assetId,
      category: warningCategories.unauthorizedSoftware,
      description,
      evidence: {
        name: s.name,
        path: s.path,
        reason: s.reason,
        developer: s.developer,
        version: s.version,
        extra: s.evidence,
      },
      source: "agent",
    });
    raised += 1;
  }

  for (const change of changes) {
    await createWarning(tx, {
      assetId,
      category: warningCategories.hardwareChange,
      description: `Cambio de hardware detectado: ${change}`,
      evidence: { change },
      source: "agent",
    });
    raised += 1;
  }

  return raised;
}

async function ingestOnce(store: Store, report: AgentReport): Promise<IngestResult> {
  return store.withTransaction(async (tx) => {
    const hw = report.hardware;
    const existing = await tx.computerDetails.findOne({ uniqueIdentifier: hw.uniqueIdentifier });

    let asset: Asset;
    let detail: ComputerDetail;
    let changes: string[] = [];
    if (existing) {
      const found = await tx.assets.findById(existing.assetId);
      if (!found) throw new Error(`Computer detail ${existing.id} points to a missing asset`);
      asset = found;
      detail = existing;
      changes = detectHardwareChanges(existing, report);
    } else {
      ({ asset, detail } = await createComputer(tx, report));
    }

    await tx.computerDetails.update(detail.id, {
      uniqueIdentifier: hw.uniqueIdentifier,
      osName: report.os.name,
      osVersion: report.os.version,
      osArch: report.os.arch,
      cpuModel: hw.cpuModel,
      ramGb: hw.ramGb,
      motherboardManufacturer: hw.motherboardManufacturer,
      motherboardModel: hw.motherboardModel,
      lastUpdatedByAgent: new Date(),
    });

    await replaceHardware(tx, asset.id, report);
    if (report.installedSoftware !== null) {
      await replaceSoftware(tx, asset.id, report.installedSoftware);
    }

    const warningsGenerated = await raiseWarnings(tx, asset.id, report, changes);

    return {
      assetCreated: !existing,
      assetId: asset.id,
      inventoryCode: asset.inventoryCode,
      warningsGenerated,
      changesDetected: changes,
    };
  });
}

/**
 * Applies one agent report as a single transaction. A first report that loses
 * a unique-key race against a concurrent one is replayed once, at which point
 * it finds the machine the other report created.
 */
export async function ingestHardwareReport(store: Store, report: AgentReport): Promise<IngestResult> {
  const identifier = report.hardware.uniqueIdentifier;
  try {
    let result: IngestResult;
    try {
      result = await ingestOnce(store, report);
    } catch (err) {
      if (!(err instanceof DuplicateKeyError)) throw err;
      log.warn("agent report hit a unique key, retrying", { identifier, collection: err.collection, fields: err.fields });
      result = await ingestOnce(store, report);
    }

    log.info("agent report ingested", {
      identifier,
      assetId: result.assetId,
      inventoryCode: result.inventoryCode,
      assetCreated: result.assetCreated,
      warningsGenerated: result.warningsGenerated,
      changes: result.changesDetected.length,
    });
    return result;
  } catch (err) {
    if (err instanceof AppError) throw err;
    log.error("agent report failed", { identifier, ...errorFields(err) });
    throw new ProcessingError("Error al procesar el reporte de hardware", err);
  }
}
