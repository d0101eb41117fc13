import { stableStringify } from "../utils/json.js";

export type FieldChange = { old: string | null; new: string | null };
export type ChangeSet = Record<string, FieldChange>;

/** Never compared: assigned by the store, not by the caller. */
export const generatedFields: readonly string[] = ["id", "createdAt", "updatedAt"];

/** Stripped from every diff regardless of entity type. */
export const sensitiveFields: readonly string[] = ["password", "passwordHash", "licenseKey"];

export function canonical(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") return stableStringify(value);
  return String(value);
}

export type DiffOptions = {
  fields: readonly string[];
  redact?: readonly string[];
};

/**
 * Field-level changes between two snapshots of one entity. Values are compared
 * in canonical string form; a missing previous snapshot yields no changes.
 */
export function diffEntities(previous: object | null | undefined, current: object, opts: DiffOptions): ChangeSet {
  const changes: ChangeSet = {};
  if (!previous) return changes;

  const hidden = new Set([...generatedFields, ...sensitiveFields, ...(opts.redact ?? [])]);
  for (const field of opts.fields) {
    if (hidden.has(field)) continue;

    const before = canonical(Reflect.get(previous, field));
    const after = canonical(Reflect.get(current, field));
    if (before !== after) {
      changes[field] = { old: before, new: after };
    }
  }
  return changes;
}

export function hasChanges(changes: ChangeSet): boolean {
  return Object.keys(changes).length > 0;
}
