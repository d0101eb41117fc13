import { beforeEach, describe, expect, it } from "vitest";

import { getVulnerableInstallations, generateVulnerabilityWarnings } from "../services/vulnerabilities.js";
import { MemoryStore } from "../store/memory.js";
import { assetData, seedVulnerableInstall } from "./fixtures.js";

describe("vulnerability scanner", () => {
  let store: MemoryStore;
  let assetId: string;

  beforeEach(async () => {
    store = new MemoryStore();
    assetId = (await store.assets.insert(assetData())).id;
  });

  it("lists installations below the safe version", async () => {
    const { installation, vulnerability, software } = await seedVulnerableInstall(store, assetId);

    expect(await getVulnerableInstallations(store)).toEqual([
      {
        installationId: installation.id,
        assetId,
        inventoryCode: "PC-0001",
        softwareId: software.id,
        softwareName: "7-Zip",
        installedVersion: "19.00",
        vulnerabilityId: vulnerability.id,
        vulnerabilityTitle: "Integer underflow in 7z archive handling",
        description: "Crafted archives can corrupt memory.",
        safeVersion: "23.01",
        severity: "HIGH",
        cveId: "CVE-2023-31102",
      },
    ]);
  });

  it("skips installations without a version", async () => {
    await seedVulnerableInstall(store, assetId, { version: "" });
    expect(await getVulnerableInstallations(store)).toEqual([]);
  });

  it("raises one scanner warning per vulnerable pair and is idempotent", async () => {
    const { vulnerability, software } = await seedVulnerableInstall(store, assetId);

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 1, warningsCleaned: 0 });
    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 0, warningsCleaned: 0 });

    const warnings = await store.warnings.find();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      assetId,
      category: "SOFTWARE_VULNERABLE",
      status: "NEW",
      source: "scanner",
      resolvedById: null,
      description:
        "Se detectó software vulnerable: 7-Zip versión 19.00. Actualizar a versión 23.01 o superior. (CVE: CVE-2023-31102)",
      evidence: {
        vulnerabilityId: vulnerability.id,
        softwareId: software.id,
        softwareName: "7-Zip",
        installedVersion: "19.00",
        safeVersion: "23.01",
        severity: "HIGH",
        cveId: "CVE-2023-31102",
        vulnerabilityTitle: "Integer underflow in 7z archive handling",
      },
    });
  });

  it("leaves the CVE out of the description when there is none", async () => {
    await seedVulnerableInstall(store, assetId, { cveId: "" });
    await generateVulnerabilityWarnings(store);

    const [warning] = await store.warnings.find();
    expect(warning?.description).toBe(
      "Se detectó software vulnerable: 7-Zip versión 19.00. Actualizar a versión 23.01 o superior."
    );
    expect(warning?.evidence?.cveId).toBe("N/A");
  });

  it("does not duplicate a warning that is under review", async () => {
    await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    const [warning] = await store.warnings.find();
    await store.warnings.update(warning?.id ?? "", { status: "IN_REVIEW" });

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 0, warningsCleaned: 0 });
  });

  it("resolves the warning once the software is updated", async () => {
    const { installation } = await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    await store.installations.update(installation.id, { version: "23.01" });

    const actorId = "64b000000000000000000001";
    expect(await generateVulnerabilityWarnings(store, actorId)).toEqual({ warningsCreated: 0, warningsCleaned: 1 });

    const [warning] = await store.warnings.find();
    expect(warning).toMatchObject({
      status: "RESOLVED",
      resolutionNotes: "Software actualizado a versión 23.01",
      resolvedById: actorId,
    });
  });

  it("resolves the warning once the software is uninstalled", async () => {
    const { installation } = await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    await store.installations.delete(installation.id);

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 0, warningsCleaned: 1 });
    const [warning] = await store.warnings.find();
    expect(warning).toMatchObject({ status: "RESOLVED", resolutionNotes: "Software desinstalado del equipo" });
  });

  it("marks the warning a false positive when the vulnerability is deleted", async () => {
    const { vulnerability } = await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    await store.vulnerabilities.delete(vulnerability.id);

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 0, warningsCleaned: 1 });
    const [warning] = await store.warnings.find();
    expect(warning).toMatchObject({ status: "FALSE_POSITIVE", resolutionNotes: "Vulnerabilidad eliminada del sistema" });
  });

  it("re-checks against a raised safe version", async () => {
    const { vulnerability, installation } = await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    await store.installations.update(installation.id, { version: "23.01" });
    await store.vulnerabilities.update(vulnerability.id, { safeVersionFrom: "24.0" });

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 0, warningsCleaned: 0 });
    const [warning] = await store.warnings.find();
    expect(warning?.status).toBe("NEW");
  });

  it("raises a new warning after a resolved one becomes vulnerable again", async () => {
    const { installation } = await seedVulnerableInstall(store, assetId);
    await generateVulnerabilityWarnings(store);
    await store.installations.update(installation.id, { version: "23.01" });
    await generateVulnerabilityWarnings(store);
    await store.installations.update(installation.id, { version: "22.00" });

    expect(await generateVulnerabilityWarnings(store)).toEqual({ warningsCreated: 1, warningsCleaned: 0 });
    const statuses = (await store.warnings.find()).map((w) => w.status).sort();
    expect(statuses).toEqual(["NEW", "RESOLVED"]);
  });
});
