import type { InstalledSoftware } from "../models/InstalledSoftware.js";
import type { Repositories, Store } from "../store/types.js";
import { ConflictError, NotFoundError } from "../utils/errors.js";
import { log } from "../utils/log.js";

export type LicenseUsage = {
  licenseId: string;
  softwareId: string;
  software: string | null;
  quantity: number;
  used: number;
  available: number;
  expirationDate: Date | null;
  expired: boolean;
};

/**
 * Sets or clears the license of an installation. Ownership, per-asset
 * duplication and seat count are checked inside the same transaction as the
 * write.
 */
export async function assignLicense(
  store: Store,
  installationId: string,
  licenseId: string | null
): Promise<InstalledSoftware> {
  const result = await store.withTransaction(async (tx) => {
    const installation = await tx.installations.findById(installationId);
    if (!installation) throw new NotFoundError("Installation not found");

    if (licenseId === null) {
      const cleared = await tx.installations.update(installation.id, { licenseId: null });
      if (!cleared) throw new NotFoundError("Installation not found");
      return cleared;
    }

    if (installation.licenseId === licenseId) return installation;

    const license = await tx.licenses.findById(licenseId);
    if (!license) throw new NotFoundError("License not found");

    if (license.softwareId !== installation.softwareId) {
      throw new ConflictError("License belongs to a different software");
    }

    const holders = await tx.installations.find({ licenseId: license.id });
    if (holders.some((h) => h.assetId === installation.assetId && h.id !== installation.id)) {
      throw new ConflictError("Asset already uses this license");
    }
    if (holders.length + 1 > license.quantity) {
      throw new ConflictError(`License has no free seats (${holders.length}/${license.quantity} in use)`);
    }

    const updated = await tx.installations.update(installation.id, { licenseId: license.id });
    if (!updated) throw new NotFoundError("Installation not found");
    return updated;
  });

  log.info("license assignment changed", { installationId, licenseId });
  return result;
}

export async function getLicenseUsage(store: Repositories, now: Date = new Date()): Promise<LicenseUsage[]> {
  const [licenses, installations, catalog] = await Promise.all([
    store.licenses.find({}, { sort: { expirationDate: 1 } }),
    store.installations.find(),
    store.software.find(),
  ]);

  const used = new Map<string, number>();
  for (const i of installations) {
    if (i.licenseId) used.set(i.licenseId, (used.get(i.licenseId) ?? 0) + 1);
  }
  const names = new Map(catalog.map((s) => [s.id, s.name]));

  return licenses.map((l) => {
    const inUse = used.get(l.id) ?? 0;
    return {
      licenseId: l.id,
      softwareId: l.softwareId,
      software: names.get(l.softwareId) ?? null,
      quantity: l.quantity,
      used: inUse,
      available: Math.max(0, l.quantity - inUse),
      expirationDate: l.expirationDate,
      expired: l.expirationDate !== null && l.expirationDate.getTime() < now.getTime(),
    };
  });
}
