import type { AngleUnit, LengthUnit, Unit } from "./ir.js";
import { CompileError } from "./errors.js";

/** A parameter as written in a parameter file: a bare number or a value with a unit. */
export type ParamEntry = number | { value: number; unit: Unit };

export type ParamSection = Record<string, ParamEntry>;

export type ParamDocument = {
  common: ParamSection;
  slot: ParamSection;
};

export type ParamOverrides = Record<string, ParamEntry>;

/** Flat parameter values; lengths in millimetres, angles in radians. */
export type ParamTable = ReadonlyMap<string, number>;

const LENGTH_TO_MM: Record<LengthUnit, number> = {
  mm: 1,
  cm: 10,
  m: 1000,
  in: 25.4,
};

const ANGLE_TO_RAD: Record<AngleUnit, number> = {
  rad: 1,
  deg: Math.PI / 180,
};

/**
 * Flatten both sections into one table. Overrides must name a key from the
 * document unless it is listed in `optionalKeys`.
 */
export function buildParamTable(
  doc: ParamDocument,
  overrides?: ParamOverrides,
  optionalKeys: ReadonlySet<string> = new Set()
): ParamTable {
  const values = new Map<string, number>();
  for (const section of [doc.common, doc.slot]) {
    for (const [key, entry] of Object.entries(section)) {
      if (values.has(key)) {
        throw new CompileError("param_duplicate", `Duplicate param id ${key}`);
      }
      values.set(key, normalizeEntry(key, entry));
    }
  }

  for (const [key, entry] of Object.entries(overrides ?? {})) {
    if (!values.has(key) && !optionalKeys.has(key)) {
      throw new CompileError("param_override_missing", `Unknown param override ${key}`);
    }
    values.set(key, normalizeEntry(key, entry));
  }

  return values;
}

export function normalizeEntry(key: string, entry: ParamEntry): number {
  const value = typeof entry === "number" ? entry : entry.value * unitScale(key, entry.unit);
  if (!Number.isFinite(value)) {
    throw new CompileError("param_invalid", `Param ${key} must be a finite number`, {
      key,
    });
  }
  return value;
}

function unitScale(key: string, unit: string): number {
  if (isLengthUnit(unit)) return LENGTH_TO_MM[unit];
  if (isAngleUnit(unit)) return ANGLE_TO_RAD[unit];
  throw new CompileError("param_unit_unknown", `Param ${key} has unknown unit ${unit}`, {
    key,
    unit,
  });
}

function isLengthUnit(unit: string): unit is LengthUnit {
  return Object.prototype.hasOwnProperty.call(LENGTH_TO_MM, unit);
}

function isAngleUnit(unit: string): unit is AngleUnit {
  return Object.prototype.hasOwnProperty.call(ANGLE_TO_RAD, unit);
}

/** Validate the shape of a parsed parameter file. */
export function parseParamDocument(raw: unknown, source = "parameters"): ParamDocument {
  if (!isRecord(raw)) {
    throw new CompileError("param_document_invalid", `${source} must be a JSON object`);
  }
  return {
    common: parseSection(raw["common"], `${source}.common`),
    slot: parseSection(raw["slot"], `${source}.slot`),
  };
}

function parseSection(raw: unknown, label: string): ParamSection {
  if (raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new CompileError("param_document_invalid", `${label} must be an object`);
  }
  const section: ParamSection = {};
  for (const [key, value] of Object.entries(raw)) {
    section[key] = parseEntry(value, `${label}.${key}`);
  }
  return section;
}

function parseEntry(raw: unknown, label: string): ParamEntry {
  if (typeof raw === "number") return raw;
  if (isRecord(raw)) {
    const value = raw["value"];
    const unit = raw["unit"];
    if (typeof value === "number" && typeof unit === "string") {
      if (!isLengthUnit(unit) && !isAngleUnit(unit)) {
        throw new CompileError("param_unit_unknown", `${label} has unknown unit ${unit}`);
      }
      return { value, unit };
    }
  }
  throw new CompileError(
    "param_invalid",
    `${label} must be a number or { "value": number, "unit": string }`
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
