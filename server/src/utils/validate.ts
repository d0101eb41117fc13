import type { JsonObject, JsonValue } from "./json.js";
import { ValidationError } from "./errors.js";

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

function fail<T>(error: string): ValidationResult<T> {
  return { ok: false, error };
}

type StringOpts = {
  field?: string;
  required?: boolean;
  trim?: boolean;
  minLen?: number;
  maxLen?: number;
  lower?: boolean;
};

export function asString(raw: unknown, opts: StringOpts & { required: true }): ValidationResult<string>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;
  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") {
    return fail(`${field} must be a string`);
  }

  let s = raw;
  if (opts?.trim) s = s.trim();
  if (opts?.lower) s = s.toLowerCase();

  if (required && !s) return fail(`${field} is required`);
  if (opts?.minLen !== undefined && s.length < opts.minLen) return fail(`${field} is too short`);
  if (opts?.maxLen !== undefined && s.length > opts.maxLen) return fail(`${field} is too long`);

  return { ok: true, value: s };
}

type NumberOpts = {
  field?: string;
  required?: boolean;
  integer?: boolean;
  min?: number;
  max?: number;
};

export function asNumber(raw: unknown, opts: NumberOpts & { required: true }): ValidationResult<number>;
export function asNumber(raw: unknown, opts?: NumberOpts): ValidationResult<number | undefined>;
export function asNumber(raw: unknown, opts?: NumberOpts): ValidationResult<number | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    return fail(`${field} must be a number`);
  }

  if (opts?.integer && !Number.isInteger(raw)) return fail(`${field} must be an integer`);
  if (opts?.min !== undefined && raw < opts.min) return fail(`${field} must be >= ${opts.min}`);
  if (opts?.max !== undefined && raw > opts.max) return fail(`${field} must be <= ${opts.max}`);

  return { ok: true, value: raw };
}

export function asBoolean(
  raw: unknown,
  opts?: {
    field?: string;
    required?: boolean;
  }
): ValidationResult<boolean | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "boolean") return fail(`${field} must be a boolean`);
  return { ok: true, value: raw };
}

type EnumOpts = { field?: string; required?: boolean };

export function asEnum<T extends readonly string[]>(
  raw: unknown,
  allowed: T,
  opts: EnumOpts & { required: true }
): ValidationResult<T[number]>;
export function asEnum<T extends readonly string[]>(
  raw: unknown,
  allowed: T,
  opts?: EnumOpts
): ValidationResult<T[number] | undefined>;
export function asEnum<T extends readonly string[]>(
  raw: unknown,
  allowed: T,
  opts?: EnumOpts
): ValidationResult<T[number] | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") return fail(`${field} must be a string`);
  const value = allowed.find((a) => a === raw);
  if (value === undefined) return fail(`${field} is invalid`);
  return { ok: true, value };
}

type ObjectIdOpts = { field?: string; required?: boolean };

export function asObjectId(raw: unknown, opts: ObjectIdOpts & { required: true }): ValidationResult<string>;
export function asObjectId(raw: unknown, opts?: ObjectIdOpts): ValidationResult<string | undefined>;
export function asObjectId(raw: unknown, opts?: ObjectIdOpts): ValidationResult<string | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") return fail(`${field} must be a string`);
  const v = raw.trim();
  if (!v) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (!/^[a-fA-F0-9]{24}$/.test(v)) return fail(`${field} is invalid`);
  return { ok: true, value: v };
}

type DateOpts = { field?: string; required?: boolean };

export function asDateFromString(raw: unknown, opts: DateOpts & { required: true }): ValidationResult<Date>;
export function asDateFromString(raw: unknown, opts?: DateOpts): ValidationResult<Date | undefined>;
export function asDateFromString(raw: unknown, opts?: DateOpts): ValidationResult<Date | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") return fail(`${field} must be a string`);
  const v = raw.trim();
  if (!v) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  const d = new Date(v);
  if (Number.isNaN(d.getTime())) return fail(`${field} is invalid`);
  return { ok: true, value: d };
}

function toJson(raw: unknown): JsonValue | undefined {
  if (raw === null) return null;
  if (typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (Array.isArray(raw)) {
    const out: JsonValue[] = [];
    for (const item of raw) {
      const v = toJson(item);
      if (v === undefined) return undefined;
      out.push(v);
    }
    return out;
  }
  if (typeof raw === "object") {
    const out: JsonObject = {};
    for (const [k, item] of Object.entries(raw)) {
      const v = toJson(item);
      if (v === undefined) return undefined;
      out[k] = v;
    }
    return out;
  }
  return undefined;
}

type RecordOpts = { field?: string; required?: boolean };

export function asRecord(raw: unknown, opts: RecordOpts & { required: true }): ValidationResult<Record<string, unknown>>;
export function asRecord(raw: unknown, opts?: RecordOpts): ValidationResult<Record<string, unknown> | undefined>;
export function asRecord(raw: unknown, opts?: RecordOpts): ValidationResult<Record<string, unknown> | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "object" || Array.isArray(raw)) return fail(`${field} must be an object`);
  return { ok: true, value: Object.fromEntries(Object.entries(raw)) };
}

export function asJsonObject(raw: unknown, opts?: RecordOpts): ValidationResult<JsonObject | undefined> {
  const recordR = asRecord(raw, opts);
  if (!recordR.ok) return recordR;
  if (recordR.value === undefined) return { ok: true, value: undefined };

  const json = toJson(recordR.value);
  if (json === undefined || json === null || typeof json !== "object" || Array.isArray(json)) {
    return fail(`${opts?.field ?? "value"} must be plain JSON`);
  }
  return { ok: true, value: json };
}

type ArrayOpts = { field?: string; required?: boolean; maxItems?: number };

export function asArray(raw: unknown, opts: ArrayOpts & { required: true }): ValidationResult<unknown[]>;
export function asArray(raw: unknown, opts?: ArrayOpts): ValidationResult<unknown[] | undefined>;
export function asArray(raw: unknown, opts?: ArrayOpts): ValidationResult<unknown[] | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (!Array.isArray(raw)) return fail(`${field} must be an array`);
  if (opts?.maxItems !== undefined && raw.length > opts.maxItems) return fail(`${field} has too many items`);
  return { ok: true, value: raw };
}

/** Unwraps a result, turning a failure into a 400. */
export function check<T>(r: ValidationResult<T>): T {
  if (!r.ok) throw new ValidationError(r.error);
  return r.value;
}

export function idParam(raw: unknown, field = "id"): string {
  return check(asObjectId(raw, { field, required: true }));
}

/** Single string query parameter; repeated or nested values are ignored. */
export function queryString(raw: unknown, maxLen = 120): string | undefined {
  if (typeof raw !== "string") return undefined;
  const v = raw.trim();
  if (!v) return undefined;
  if (v.length > maxLen) throw new ValidationError("Query parameter is too long");
  return v;
}

/** "true" or "false"; absent means no preference. */
export function queryFlag(raw: unknown, field: string): boolean | undefined {
  const v = queryString(raw);
  if (v === undefined) return undefined;
  if (v === "true" || v === "false") return v === "true";
  throw new ValidationError(`${field} must be true or false`);
}

export function queryNumber(raw: unknown, field: string, min = 0): number | undefined {
  const v = queryString(raw);
  return check(asNumber(v === undefined ? undefined : Number(v), { field, min }));
}

export function asBody(raw: unknown): Record<string, unknown> {
  return check(asRecord(raw ?? {}, { field: "body", required: true }));
}
