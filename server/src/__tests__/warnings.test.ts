import { beforeEach, describe, expect, it } from "vitest";

import type { ComplianceWarning, WarningStatus } from "../models/ComplianceWarning.js";
import { canTransition, changeWarningStatus, closeWarning, createWarning } from "../services/warnings.js";
import { MemoryStore } from "../store/memory.js";
import { NotFoundError, ValidationError } from "../utils/errors.js";
import { adminActor, assetData, techActor } from "./fixtures.js";

describe("canTransition", () => {
  const cases: [WarningStatus, WarningStatus, boolean][] = [
    ["NEW", "IN_REVIEW", true],
    ["NEW", "RESOLVED", false],
    ["NEW", "FALSE_POSITIVE", false],
    ["IN_REVIEW", "RESOLVED", true],
    ["IN_REVIEW", "FALSE_POSITIVE", true],
    ["IN_REVIEW", "NEW", true],
    ["RESOLVED", "NEW", true],
    ["RESOLVED", "IN_REVIEW", false],
    ["FALSE_POSITIVE", "NEW", true],
    ["FALSE_POSITIVE", "RESOLVED", false],
  ];

  it.each(cases)("%s -> %s is %s", (from, to, allowed) => {
    expect(canTransition(from, to)).toBe(allowed);
  });
});

describe("warning status changes", () => {
  let store: MemoryStore;
  let warning: ComplianceWarning;

  beforeEach(async () => {
    store = new MemoryStore();
    const asset = await store.assets.insert(assetData());
    warning = await createWarning(store, {
      assetId: asset.id,
      category: "Software Ilegal/No Autorizado",
      description: "Software sospechoso detectado: keygen.exe",
      source: "manual",
    });
  });

  it("starts as NEW without a resolver", () => {
    expect(warning).toMatchObject({ status: "NEW", resolvedById: null, resolutionNotes: "", evidence: null });
  });

  it("walks NEW -> IN_REVIEW -> RESOLVED recording the actor", async () => {
    const reviewing = await changeWarningStatus(store, warning.id, "IN_REVIEW", techActor.id);
    expect(reviewing).toMatchObject({ status: "IN_REVIEW", resolvedById: techActor.id });

    const resolved = await changeWarningStatus(store, warning.id, "RESOLVED", adminActor.id, "Desinstalado");
    expect(resolved).toMatchObject({ status: "RESOLVED", resolvedById: adminActor.id, resolutionNotes: "Desinstalado" });
  });

  it("clears the resolver when reopened", async () => {
    await changeWarningStatus(store, warning.id, "IN_REVIEW", techActor.id);
    await changeWarningStatus(store, warning.id, "FALSE_POSITIVE", techActor.id);

    const reopened = await changeWarningStatus(store, warning.id, "NEW", adminActor.id);
    expect(reopened).toMatchObject({ status: "NEW", resolvedById: null });
  });

  it("rejects skipping the review step", async () => {
    await expect(changeWarningStatus(store, warning.id, "RESOLVED", adminActor.id)).rejects.toBeInstanceOf(ValidationError);
    expect((await store.warnings.findById(warning.id))?.status).toBe("NEW");
  });

  it("fails for an unknown warning", async () => {
    await expect(
      changeWarningStatus(store, "64b0000000000000000000ff", "IN_REVIEW", adminActor.id)
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lets the system close open warnings directly, but not closed ones", async () => {
    expect(await closeWarning(store, warning, "RESOLVED", "Software actualizado a versión 2.0", null)).toBe(true);

    const closed = await store.warnings.findById(warning.id);
    expect(closed).toMatchObject({ status: "RESOLVED", resolvedById: null, resolutionNotes: "Software actualizado a versión 2.0" });
    if (!closed) throw new Error("warning vanished");
    expect(await closeWarning(store, closed, "FALSE_POSITIVE", "otra", null)).toBe(false);
  });
});
