import { openWarningStatuses, warningCategories, type ComplianceWarning } from "../models/ComplianceWarning.js";
import type { InstalledSoftware } from "../models/InstalledSoftware.js";
import type { SoftwareVulnerability, VulnerabilitySeverity } from "../models/SoftwareVulnerability.js";
import type { Repositories } from "../store/types.js";
import { jsonString, type JsonObject } from "../utils/json.js";
import { log } from "../utils/log.js";
import { isVersionVulnerable } from "./versions.js";
import { closeWarning, createWarning } from "./warnings.js";

export type VulnerableInstallation = {
  installationId: string;
  assetId: string;
  inventoryCode: string;
  softwareId: string;
  softwareName: string;
  installedVersion: string;
  vulnerabilityId: string;
  vulnerabilityTitle: string;
  description: string;
  safeVersion: string;
  severity: VulnerabilitySeverity;
  cveId: string;
};

export type ReconciliationResult = {
  warningsCreated: number;
  warningsCleaned: number;
};

function groupBySoftware(vulns: SoftwareVulnerability[]): Map<string, SoftwareVulnerability[]> {
  const out = new Map<string, SoftwareVulnerability[]>();
  for (const v of vulns) {
    const list = out.get(v.softwareId) ?? [];
    list.push(v);
    out.set(v.softwareId, list);
  }
  return out;
}

/** One entry per (installation, vulnerability) pair whose installed version predates the safe version. */
export async function getVulnerableInstallations(store: Repositories): Promise<VulnerableInstallation[]> {
  const [installations, vulnerabilities, catalog, assets] = await Promise.all([
    store.installations.find(),
    store.vulnerabilities.find(),
    store.software.find(),
    store.assets.find(),
  ]);

  const bySoftware = groupBySoftware(vulnerabilities);
  const names = new Map(catalog.map((s) => [s.id, s.name]));
  const codes = new Map(assets.map((a) => [a.id, a.inventoryCode]));

  const out: VulnerableInstallation[] = [];
  for (const installation of installations) {
    if (!installation.version.trim()) continue;

    for (const vuln of bySoftware.get(installation.softwareId) ?? []) {
      if (!isVersionVulnerable(installation.version, vuln.safeVersionFrom)) continue;
      out.push({
        installationId: installation.id,
        assetId: installation.assetId,
        inventoryCode: codes.get(installation.assetId) ?? "",
        softwareId: installation.softwareId,
        softwareName: names.get(installation.softwareId) ?? "",
        installedVersion: installation.version,
        vulnerabilityId: vuln.id,
        vulnerabilityTitle: vuln.title,
        description: vuln.description,
        safeVersion: vuln.safeVersionFrom,
        severity: vuln.severity,
        cveId: vuln.cveId || "N/A",
      });
    }
  }
  return out;
}

async function currentInstallation(
  store: Repositories,
  warning: ComplianceWarning,
  vuln: SoftwareVulnerability
): Promise<InstalledSoftware | null> {
  const softwareId = jsonString(warning.evidence, "softwareId") ?? vuln.softwareId;
  return store.installations.findOne({ assetId: warning.assetId, softwareId });
}

async function cleanup(store: Repositories, actorId: string | null): Promise<number> {
  const open = await store.warnings.find({
    category: warningCategories.softwareVulnerable,
    status: openWarningStatuses,
  });

  let cleaned = 0;
  for (const warning of open) {
    const vulnerabilityId = jsonString(warning.evidence, "vulnerabilityId");
    if (!vulnerabilityId) continue;

    const vuln = await store.vulnerabilities.findById(vulnerabilityId);
    if (!vuln) {
      if (await closeWarning(store, warning, "FALSE_POSITIVE", "Vulnerabilidad eliminada del sistema", actorId)) {
        cleaned += 1;
      }
      continue;
    }

    const installation = await currentInstallation(store, warning, vuln);
    if (!installation) {
      if (await closeWarning(store, warning, "RESOLVED", "Software desinstalado del equipo", actorId)) {
        cleaned += 1;
      }
      continue;
    }

    if (!isVersionVulnerable(installation.version, vuln.safeVersionFrom)) {
      const note = `Software actualizado a versión ${installation.version}`;
      if (await closeWarning(store, warning, "RESOLVED", note, actorId)) cleaned += 1;
    }
  }
  return cleaned;
}

function evidenceFor(found: VulnerableInstallation): JsonObject {
  return {
    vulnerabilityId: found.vulnerabilityId,
    softwareId: found.softwareId,
    softwareName: found.softwareName,
    installedVersion: found.installedVersion,
    safeVersion: found.safeVersion,
    severity: found.severity,
    cveId: found.cveId,
    vulnerabilityTitle: found.vulnerabilityTitle,
  };
}

function describe(found: VulnerableInstallation): string {
  const base =
    `Se detectó software vulnerable: ${found.softwareName} versión ${found.installedVersion}. ` +
    `Actualizar a versión ${found.safeVersion} o superior.`;
  return found.cveId !== "N/A" ? `${base} (CVE: ${found.cveId})` : base;
}

async function detect(store: Repositories): Promise<number> {
  const open = await store.warnings.find({
    category: warningCategories.softwareVulnerable,
    status: openWarningStatuses,
  });
  const warned = new Set(open.map((w) => `${w.assetId}:${jsonString(w.evidence, "vulnerabilityId") ?? ""}`));

  let created = 0;
  for (const found of await getVulnerableInstallations(store)) {
    const key = `${found.assetId}:${found.vulnerabilityId}`;
    if (warned.has(key)) continue;

    await createWarning(store, {
      assetId: found.assetId,
      category: warningCategories.softwareVulnerable,
      description: describe(found),
      evidence: evidenceFor(found),
      source: "scanner",
    });
    warned.add(key);
    created += 1;
  }
  return created;
}

/**
 * Closes vulnerability warnings that no longer apply, then raises one warning
 * per vulnerable (asset, vulnerability) pair without an open one. Running it
 * twice in a row creates nothing the second time.
 */
export async function generateVulnerabilityWarnings(
  store: Repositories,
  actorId: string | null = null
): Promise<ReconciliationResult> {
  const warningsCleaned = await cleanup(store, actorId);
  const warningsCreated = await detect(store);
  log.info("vulnerability reconciliation finished", { warningsCreated, warningsCleaned });
  return { warningsCreated, warningsCleaned };
}
