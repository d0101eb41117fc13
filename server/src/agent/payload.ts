import { ValidationError } from "../utils/errors.js";
import type { JsonObject } from "../utils/json.js";
import {
  asArray,
  asJsonObject,
  asNumber,
  asRecord,
  asString,
  type ValidationResult,
} from "../utils/validate.js";

export type AgentDisk = {
  model: string;
  serialNumber: string;
  capacityGb: number | null;
  freeSpaceGb: number | null;
};

export type AgentSoftware = {
  name: string;
  developer: string;
  version: string;
  installDate: Date | null;
};

export type AgentSuspiciousSoftware = {
  name: string;
  path: string;
  reason: string;
  developer: string;
  version: string;
  evidence: JsonObject | null;
};

export type AgentReport = {
  os: {
    name: string;
    version: string;
    arch: string;
  };
  hardware: {
    uniqueIdentifier: string;
    cpuModel: string;
    ramGb: number;
    motherboardManufacturer: string;
    motherboardModel: string;
    chassisType: number | null;
    disks: AgentDisk[];
    gpus: string[];
  };
  /** Null when the agent did not collect the list, which is not the same as an empty list. */
  installedSoftware: AgentSoftware[] | null;
  suspiciousSoftware: AgentSuspiciousSoftware[];
};

const maxListItems = 5000;

class FieldErrors {
  readonly errors: Record<string, string> = {};

  take<T>(path: string, r: ValidationResult<T>, fallback: T): T {
    if (r.ok) return r.value;
    if (!(path in this.errors)) this.errors[path] = r.error;
    return fallback;
  }

  get empty(): boolean {
    return Object.keys(this.errors).length === 0;
  }
}

function text(f: FieldErrors, obj: Record<string, unknown>, key: string, path: string, required = false): string {
  const field = `${path}.${key}`;
  if (required) {
    return f.take(field, asString(obj[key], { field, required: true, trim: true, maxLen: 500 }), "");
  }
  return f.take(field, asString(obj[key], { field, trim: true, maxLen: 500 }), undefined) ?? "";
}

function gigabytes(f: FieldErrors, obj: Record<string, unknown>, key: string, path: string): number | null {
  const field = `${path}.${key}`;
  return f.take(field, asNumber(obj[key], { field, min: 0 }), undefined) ?? null;
}

/** SMBIOS chassis code; agents send it either as a number or as a numeric string. */
function chassisCode(f: FieldErrors, raw: unknown): number | null {
  if (raw === undefined || raw === null || raw === "") return null;
  const value = typeof raw === "string" && /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : raw;
  return f.take("hardware.tipo_chasis", asNumber(value, { field: "hardware.tipo_chasis", integer: true, min: 0 }), undefined) ?? null;
}

/** Accepts ISO dates and the compact yyyymmdd form; anything unreadable becomes null. */
export function parseInstallDate(raw: string): Date | null {
  const s = raw.trim();
  if (!s) return null;
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(s);
  const d = compact ? new Date(`${compact[1]}-${compact[2]}-${compact[3]}T00:00:00Z`) : new Date(s);
  return Number.isNaN(d.getTime()) ? null : d;
}

function items(f: FieldErrors, raw: unknown, path: string, required: boolean): Record<string, unknown>[] | null {
  const list = required
    ? f.take(path, asArray(raw, { field: path, required: true, maxItems: maxListItems }), [])
    : f.take(path, asArray(raw, { field: path, maxItems: maxListItems }), undefined);
  if (list === undefined) return null;

  const out: Record<string, unknown>[] = [];
  list.forEach((item, i) => {
    const field = `${path}[${i}]`;
    const obj = f.take(field, asRecord(item, { field, required: true }), undefined);
    if (obj) out.push(obj);
  });
  return out;
}

function parseDisks(f: FieldErrors, raw: unknown): AgentDisk[] {
  return (items(f, raw, "hardware.discos", true) ?? []).map((d, i) => {
    const path = `hardware.discos[${i}]`;
    return {
      model: text(f, d, "modelo", path),
      serialNumber: text(f, d, "numero_serie", path),
      capacityGb: gigabytes(f, d, "capacidad_gb", path),
      freeSpaceGb: gigabytes(f, d, "espacio_libre_gb", path),
    };
  });
}

function parseGpus(f: FieldErrors, raw: unknown): string[] {
  const list = f.take("hardware.gpus", asArray(raw, { field: "hardware.gpus", required: true, maxItems: 64 }), []);
  const out: string[] = [];
  list.forEach((gpu, i) => {
    const field = `hardware.gpus[${i}]`;
    const name = f.take(field, asString(gpu, { field, trim: true, maxLen: 200 }), undefined);
    if (name) out.push(name);
  });
  return out;
}

function parseInstalled(f: FieldErrors, raw: unknown): AgentSoftware[] | null {
  const list = items(f, raw, "software_instalado", false);
  if (!list) return null;

  return list.map((s, i) => {
    const path = `software_instalado[${i}]`;
    return {
      name: text(f, s, "nombre", path, true),
      developer: text(f, s, "desarrollador", path),
      version: text(f, s, "version", path),
      installDate: parseInstallDate(text(f, s, "fecha_instalacion", path)),
    };
  });
}

function parseSuspicious(f: FieldErrors, raw: unknown): AgentSuspiciousSoftware[] {
  return (items(f, raw, "software_sospechoso", false) ?? []).map((s, i) => {
    const path = `software_sospechoso[${i}]`;
    const evidenceField = `${path}.evidencia`;
    return {
      name: text(f, s, "nombre", path, true),
      path: text(f, s, "ruta", path),
      reason: text(f, s, "razon", path),
      developer: text(f, s, "desarrollador", path),
      version: text(f, s, "version", path),
      evidence: f.take(evidenceField, asJsonObject(s.evidencia, { field: evidenceField }), undefined) ?? null,
    };
  });
}

/**
 * Validates an agent hardware report. Every problem is collected before
 * failing, keyed by the payload path it was found at.
 */
export function parseAgentReport(body: unknown): AgentReport {
  const f = new FieldErrors();
  const root = f.take("body", asRecord(body, { field: "body", required: true }), {});

  const os = f.take("sistema_operativo", asRecord(root.sistema_operativo, { field: "sistema_operativo", required: true }), {});
  const hw = f.take("hardware", asRecord(root.hardware, { field: "hardware", required: true }), {});

  const report: AgentReport = {
    os: {
      name: text(f, os, "nombre", "sistema_operativo", true),
      version: text(f, os, "version", "sistema_operativo", true),
      arch: text(f, os, "arquitectura", "sistema_operativo", true),
    },
    hardware: {
      uniqueIdentifier: text(f, hw, "identificador_unico", "hardware", true),
      cpuModel: text(f, hw, "cpu_modelo", "hardware", true),
      ramGb: f.take(
        "hardware.memoria_ram_gb",
        asNumber(hw.memoria_ram_gb, { field: "hardware.memoria_ram_gb", required: true, min: 0 }),
        0
      ),
      motherboardManufacturer: text(f, hw, "placa_base_fabricante", "hardware"),
      motherboardModel: text(f, hw, "placa_base_modelo", "hardware"),
      chassisType: chassisCode(f, hw.tipo_chasis),
      disks: parseDisks(f, hw.discos),
      gpus: parseGpus(f, hw.gpus),
    },
    installedSoftware: parseInstalled(f, root.software_instalado),
    suspiciousSoftware: parseSuspicious(f, root.software_sospechoso),
  };

  if (!f.empty) {
    throw new ValidationError("Invalid hardware report", f.errors);
  }
  return report;
}
