import {
  isOpenWarning,
  type ComplianceWarning,
  type ComplianceWarningData,
  type WarningSource,
  type WarningStatus,
} from "../models/ComplianceWarning.js";
import type { Repositories } from "../store/types.js";
import { NotFoundError, ValidationError } from "../utils/errors.js";
import type { JsonObject } from "../utils/json.js";
import { log } from "../utils/log.js";

/** Staff transitions. Any status may go back to NEW. */
const transitions: Record<WarningStatus, readonly WarningStatus[]> = {
  NEW: ["NEW", "IN_REVIEW"],
  IN_REVIEW: ["NEW", "RESOLVED", "FALSE_POSITIVE"],
  RESOLVED: ["NEW"],
  FALSE_POSITIVE: ["NEW"],
};

export type ClosedStatus = Extract<WarningStatus, "RESOLVED" | "FALSE_POSITIVE">;

export function canTransition(from: WarningStatus, to: WarningStatus): boolean {
  return transitions[from].includes(to);
}

/** Status change plus its side effect on `resolvedById`. */
export function statusPatch(to: WarningStatus, actorId: string | null): Pick<ComplianceWarningData, "status" | "resolvedById"> {
  return { status: to, resolvedById: to === "NEW" ? null : actorId };
}

export type NewWarning = {
  assetId: string;
  category: string;
  description: string;
  evidence?: JsonObject | null;
  source: WarningSource;
};

export async function createWarning(store: Repositories, input: NewWarning): Promise<ComplianceWarning> {
  const warning = await store.warnings.insert({
    assetId: input.assetId,
    category: input.category,
    description: input.description,
    evidence: input.evidence ?? null,
    status: "NEW",
    resolvedById: null,
    resolutionNotes: "",
    source: input.source,
  });
  log.info("compliance warning raised", {
    warningId: warning.id,
    assetId: warning.assetId,
    category: warning.category,
    source: warning.source,
  });
  return warning;
}

/** Staff-driven status change; rejects targets the state machine does not allow. */
export async function changeWarningStatus(
  store: Repositories,
  warningId: string,
  to: WarningStatus,
  actorId: string | null,
  resolutionNotes?: string
): Promise<ComplianceWarning> {
  const warning = await store.warnings.findById(warningId);
  if (!warning) throw new NotFoundError("Warning not found");

  if (!canTransition(warning.status, to)) {
    throw new ValidationError(`Invalid status transition ${warning.status} -> ${to}`, {
      status: `allowed from ${warning.status}: ${transitions[warning.status].join(", ")}`,
    });
  }

  const patch: Partial<ComplianceWarningData> = statusPatch(to, actorId);
  if (resolutionNotes !== undefined) patch.resolutionNotes = resolutionNotes;

  const updated = await store.warnings.update(warning.id, patch);
  if (!updated) throw new NotFoundError("Warning not found");
  return updated;
}

/**
 * Closes an open warning on behalf of the system, bypassing the review step.
 * Returns false when the warning is no longer open.
 */
export async function closeWarning(
  store: Repositories,
  warning: ComplianceWarning,
  to: ClosedStatus,
  resolutionNotes: string,
  actorId: string | null
): Promise<boolean> {
  if (!isOpenWarning(warning)) return false;
  const updated = await store.warnings.update(warning.id, { ...statusPatch(to, actorId), resolutionNotes });
  return updated !== null;
}
