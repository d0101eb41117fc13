import { AuditRecorder } from "../audit/recorder.js";
import { RequestContext, type Actor } from "../audit/requestContext.js";
import { createTrackedStore } from "../audit/trackedStore.js";
import type { AssetData } from "../models/Asset.js";
import type { ComputerDetailData } from "../models/ComputerDetail.js";
import { MemoryStore } from "../store/memory.js";
import type { Repositories, Store } from "../store/types.js";

export const adminActor: Actor = { id: "64b000000000000000000001", username: "admin", role: "admin" };
export const techActor: Actor = { id: "64b000000000000000000002", username: "tecnico", role: "technician" };

export type AuditedStore = {
  base: MemoryStore;
  context: RequestContext;
  store: Store;
};

export function auditedStore(): AuditedStore {
  const base = new MemoryStore();
  const context = new RequestContext();
  const store = createTrackedStore(base, new AuditRecorder(context));
  return { base, context, store };
}

/** Runs `fn` inside a request scope acting as `actor`. */
export function actingAs<T>(context: RequestContext, actor: Actor, fn: () => Promise<T>): Promise<T> {
  return context.run(() => {
    context.set(actor);
    return fn();
  });
}

export function assetData(overrides: Partial<AssetData> = {}): AssetData {
  return {
    inventoryCode: "PC-0001",
    serialNumber: "SN-0001",
    assetType: "DESKTOP",
    status: "IN_STORAGE",
    brand: "Dell",
    model: "OptiPlex 7090",
    acquisitionDate: null,
    employeeId: null,
    departmentId: null,
    ...overrides,
  };
}

export function detailData(assetId: string, overrides: Partial<ComputerDetailData> = {}): ComputerDetailData {
  return {
    assetId,
    uniqueIdentifier: "4C4C4544-0042-3510-8052-B4C04F565731",
    osName: "Microsoft Windows 11 Pro",
    osVersion: "10.0.22631",
    osArch: "64 bits",
    cpuModel: "Intel(R) Core(TM) i5-10500 CPU @ 3.10GHz",
    ramGb: 16,
    motherboardManufacturer: "Dell Inc.",
    motherboardModel: "0K6CP7",
    lastUpdatedByAgent: null,
    ...overrides,
  };
}

/** Software catalog entry, one installation of it on `assetId` and one vulnerability. */
export async function seedVulnerableInstall(
  store: Repositories,
  assetId: string,
  opts: { version?: string; safeVersionFrom?: string; cveId?: string } = {}
) {
  const software = await store.software.insert({ name: "7-Zip", developer: "Igor Pavlov" });
  const installation = await store.installations.insert({
    assetId,
    softwareId: software.id,
    version: opts.version ?? "19.00",
    installDate: null,
    licenseId: null,
  });
  const vulnerability = await store.vulnerabilities.insert({
    softwareId: software.id,
    cveId: opts.cveId ?? "CVE-2023-31102",
    title: "Integer underflow in 7z archive handling",
    description: "Crafted archives can corrupt memory.",
    severity: "HIGH",
    affectedVersions: "< 23.01",
    safeVersionFrom: opts.safeVersionFrom ?? "23.01",
    linkToDetails: "",
    discoveredDate: null,
  });
  return { software, installation, vulnerability };
}

type ReportOverrides = {
  os?: Record<string, unknown>;
  hardware?: Record<string, unknown>;
  installed?: unknown[];
  suspicious?: unknown[];
};

/** Agent wire payload for a Lenovo notebook. */
export function reportBody(overrides: ReportOverrides = {}): Record<string, unknown> {
  const body: Record<string, unknown> = {
    sistema_operativo: {
      nombre: "Microsoft Windows 11 Pro",
      version: "10.0.22631",
      arquitectura: "64 bits",
      ...overrides.os,
    },
    hardware: {
      identificador_unico: "4C4C4544-0042-3510-8052-B4C04F565731",
      cpu_modelo: "11th Gen Intel(R) Core(TM) i7-1165G7 @ 2.80GHz",
      memoria_ram_gb: 16,
      placa_base_fabricante: "LENOVO",
      placa_base_modelo: "20XW0026CL",
      tipo_chasis: 10,
      discos: [{ modelo: "SAMSUNG MZVL2512", numero_serie: "S6XNNX0R", capacidad_gb: 512, espacio_libre_gb: 200 }],
      gpus: ["Intel(R) Iris(R) Xe Graphics"],
      ...overrides.hardware,
    },
  };
  if (overrides.installed) body.software_instalado = overrides.installed;
  if (overrides.suspicious) body.software_sospechoso = overrides.suspicious;
  return body;
}
