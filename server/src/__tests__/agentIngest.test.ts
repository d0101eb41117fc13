import { beforeEach, describe, expect, it, vi } from "vitest";

import { parseAgentReport } from "../agent/payload.js";
import {
  classifyChassis,
  detectHardwareChanges,
  ingestHardwareReport,
  nextInventoryCode,
  serialFromIdentifier,
} from "../services/agentIngest.js";
import { MemoryStore } from "../store/memory.js";
import { ProcessingError } from "../utils/errors.js";
import { assetData, detailData, reportBody } from "./fixtures.js";

function ingest(store: MemoryStore, body: Record<string, unknown>) {
  return ingestHardwareReport(store, parseAgentReport(body));
}

describe("chassis and identifiers", () => {
  it("classifies portable chassis codes as notebooks", () => {
    expect(classifyChassis(10)).toBe("NOTEBOOK");
    expect(classifyChassis(31)).toBe("NOTEBOOK");
    expect(classifyChassis(3)).toBe("DESKTOP");
    expect(classifyChassis(99)).toBe("DESKTOP");
    expect(classifyChassis(null)).toBe("DESKTOP");
  });

  it("derives the serial from the last 12 characters", () => {
    expect(serialFromIdentifier("4C4C4544-0042-3510-8052-B4C04F565731")).toBe("B4C04F565731");
    expect(serialFromIdentifier("SHORT")).toBe("SHORT");
  });

  it("continues after the highest existing code", async () => {
    const store = new MemoryStore();
    await store.assets.insert(assetData({ inventoryCode: "PC-0007", serialNumber: "A" }));
    await store.assets.insert(assetData({ inventoryCode: "LEGACY-1", serialNumber: "B" }));

    expect(await nextInventoryCode(store, "DESKTOP")).toBe("PC-0008");
    expect(await nextInventoryCode(store, "DESKTOP")).toBe("PC-0009");
    expect(await nextInventoryCode(store, "NOTEBOOK")).toBe("NB-0001");
  });
});

describe("detectHardwareChanges", () => {
  it("reports CPU, RAM and OS name changes", () => {
    const previous = { ...detailData("a1", { cpuModel: "Intel i5", ramGb: 8, osName: "Windows 10 Pro" }), id: "d1", createdAt: new Date(0), updatedAt: new Date(0) };
    const report = parseAgentReport(
      reportBody({ os: { nombre: "Windows 11 Pro" }, hardware: { cpu_modelo: "Intel i7", memoria_ram_gb: 16 } })
    );

    expect(detectHardwareChanges(previous, report)).toEqual([
      "CPU cambió de Intel i5 a Intel i7",
      "RAM cambió de 8 GB a 16 GB",
      "Sistema operativo cambió de Windows 10 Pro a Windows 11 Pro",
    ]);
  });

  it("ignores fields that were never recorded", () => {
    const previous = { ...detailData("a1", { cpuModel: "", ramGb: null, osName: "" }), id: "d1", createdAt: new Date(0), updatedAt: new Date(0) };
    expect(detectHardwareChanges(previous, parseAgentReport(reportBody()))).toEqual([]);
  });
});

describe("ingestHardwareReport", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it("registers a new notebook with its hardware and software", async () => {
    const result = await ingest(
      store,
      reportBody({
        installed: [
          { nombre: "7-Zip", desarrollador: "Igor Pavlov", version: "19.00", fecha_instalacion: "20230115" },
          { nombre: "7-Zip", desarrollador: "Igor Pavlov", version: "23.01" },
          { nombre: "Google Chrome", desarrollador: "Google LLC", version: "126.0.6478.127" },
        ],
      })
    );

    expect(result).toEqual({
      assetCreated: true,
      assetId: result.assetId,
      inventoryCode: "NB-0001",
      warningsGenerated: 0,
      changesDetected: [],
    });

    expect(await store.assets.findById(result.assetId)).toMatchObject({
      inventoryCode: "NB-0001",
      serialNumber: "B4C04F565731",
      assetType: "NOTEBOOK",
      status: "IN_STORAGE",
      brand: "LENOVO",
      model: "20XW0026CL",
    });
    expect(await store.computerDetails.findOne({ assetId: result.assetId })).toMatchObject({
      uniqueIdentifier: "4C4C4544-0042-3510-8052-B4C04F565731",
      osName: "Microsoft Windows 11 Pro",
      ramGb: 16,
    });
    expect(await store.storageDevices.count({ assetId: result.assetId })).toBe(1);
    expect((await store.graphicsCards.find({ assetId: result.assetId })).map((g) => g.modelName)).toEqual([
      "Intel(R) Iris(R) Xe Graphics",
    ]);

    const installs = await store.installations.find({ assetId: result.assetId }, { sort: { version: 1 } });
    expect(installs.map((i) => i.version)).toEqual(["126.0.6478.127", "19.00"]);
    expect(await store.software.count()).toBe(2);
  });

  it("updates a known machine and raises a warning per hardware change", async () => {
    const first = await ingest(store, reportBody({ installed: [{ nombre: "7-Zip", version: "19.00" }] }));
    const second = await ingest(store, reportBody({ hardware: { memoria_ram_gb: 32 } }));

    expect(second).toEqual({
      assetCreated: false,
      assetId: first.assetId,
      inventoryCode: "NB-0001",
      warningsGenerated: 1,
      changesDetected: ["RAM cambió de 16 GB a 32 GB"],
    });
    expect(await store.assets.count()).toBe(1);
    expect((await store.computerDetails.findOne({ assetId: first.assetId }))?.ramGb).toBe(32);

    const [warning] = await store.warnings.find();
    expect(warning).toMatchObject({
      assetId: first.assetId,
      category: "Hardware Change",
      description: "Cambio de hardware detectado: RAM cambió de 16 GB a 32 GB",
      evidence: { change: "RAM cambió de 16 GB a 32 GB" },
      status: "NEW",
      source: "agent",
    });

    // no software list in the second report: the first one stays
    expect(await store.installations.count({ assetId: first.assetId })).toBe(1);
  });

  it("clears installed software when the list is empty", async () => {
    const first = await ingest(store, reportBody({ installed: [{ nombre: "7-Zip", version: "19.00" }] }));
    await ingest(store, reportBody({ installed: [] }));
    expect(await store.installations.count({ assetId: first.assetId })).toBe(0);
  });

  it("raises a warning per suspicious program", async () => {
    const result = await ingest(
      store,
      reportBody({
        suspicious: [
          { nombre: "KMSpico", ruta: "C:\\Tools\\KMSpico.exe", razon: "Activador no autorizado" },
          { nombre: "keygen.exe" },
        ],
      })
    );

    expect(result.warningsGenerated).toBe(2);
    const descriptions = (await store.warnings.find()).map((w) => w.description);
    expect(descriptions).toEqual([
      "Software sospechoso detectado: KMSpico (Activador no autorizado)",
      "Software sospechoso detectado: keygen.exe",
    ]);
    expect((await store.warnings.find())[0]?.evidence).toEqual({
      name: "KMSpico",
      path: "C:\\Tools\\KMSpico.exe",
      reason: "Activador no autorizado",
      developer: "",
      version: "",
      extra: null,
    });
  });

  it("registers desktops under the PC- prefix", async () => {
    const result = await ingest(store, reportBody({ hardware: { tipo_chasis: "3" } }));
    expect(result.inventoryCode).toBe("PC-0001");
  });

  it("rolls everything back when a step fails", async () => {
    vi.spyOn(store.warnings, "insert").mockRejectedValue(new Error("write failed"));

    const failed = ingest(store, reportBody({ suspicious: [{ nombre: "keygen.exe" }] }));
    await expect(failed).rejects.toBeInstanceOf(ProcessingError);
    await expect(failed).rejects.toThrow("Error al procesar el reporte de hardware");

    expect(await store.assets.count()).toBe(0);
    expect(await store.computerDetails.count()).toBe(0);
    expect(await store.storageDevices.count()).toBe(0);

    vi.restoreAllMocks();
    const retried = await ingest(store, reportBody());
    expect(retried.inventoryCode).toBe("NB-0001");
  });

  it("replays a first report that lost the race to a concurrent one", async () => {
    const first = await ingest(store, reportBody());
    vi.spyOn(store.computerDetails, "findOne").mockResolvedValueOnce(null);

    const second = await ingest(store, reportBody({ hardware: { memoria_ram_gb: 8 } }));

    expect(second.assetCreated).toBe(false);
    expect(second.assetId).toBe(first.assetId);
    expect(second.changesDetected).toEqual(["RAM cambió de 16 GB a 8 GB"]);
    expect(await store.assets.count()).toBe(1);
  });
});
