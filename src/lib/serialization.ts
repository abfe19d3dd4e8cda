// Tabular and structured forms of canonical shafts. Column names and enum
// spellings are the canonical ones; a row read back is re-validated.

import { NormalizationError } from "./errors";
import {
  isClubType,
  isFlex,
  isProfileLevel,
  isTipStiffness,
  SHAFT_FIELDS,
  validateShaftSpec,
} from "./schema";
import { ShaftField, ShaftSpec } from "./types";

export type ShaftRow = Record<ShaftField, string>;

export type ExportFormat = "csv" | "json";

// ===== Row Form =====

function cellText(value: ShaftSpec[ShaftField]): string {
  if (value === null) return "";
  return Object.is(value, -0) ? "-0" : String(value);
}

export function serializeShaft(spec: ShaftSpec): ShaftRow {
  return {
    manufacturer: spec.manufacturer,
    model: spec.model,
    generation: cellText(spec.generation),
    club_type: spec.club_type,
    flex: spec.flex,
    weight_grams: cellText(spec.weight_grams),
    length_inches: cellText(spec.length_inches),
    torque_degrees: cellText(spec.torque_degrees),
    launch: cellText(spec.launch),
    spin: cellText(spec.spin),
    butt_diameter_inches: cellText(spec.butt_diameter_inches),
    tip_diameter_inches: cellText(spec.tip_diameter_inches),
    tip_stiff: cellText(spec.tip_stiff),
    kickpoint: cellText(spec.kickpoint),
    material: cellText(spec.material),
    msrp_usd: cellText(spec.msrp_usd),
  };
}

/**
 * Read a row written by {@link serializeShaft}. Empty cells are absent values.
 * Throws NormalizationError when a cell breaks the schema.
 */
export function deserializeShaft(row: Readonly<Record<string, string | undefined>>): ShaftSpec {
  const cell = (field: ShaftField): string => row[field] ?? "";
  const text = (field: ShaftField): string | null => (cell(field) === "" ? null : cell(field));
  const num = (field: ShaftField): number | null => (cell(field) === "" ? null : Number(cell(field)));

  function enumCell<T>(field: ShaftField, guard: (v: unknown) => v is T): T | null {
    const value = text(field);
    if (value === null) return null;
    if (!guard(value)) {
      throw new NormalizationError(field, "UnmappedVocabularyValue", `"${value}" is not a canonical value`, value);
    }
    return value;
  }

  function required<T>(field: ShaftField, value: T | null): T {
    if (value === null) throw new NormalizationError(field, "MissingRequiredField", "empty cell");
    return value;
  }

  const spec: ShaftSpec = {
    manufacturer: cell("manufacturer"),
    model: cell("model"),
    generation: text("generation"),
    club_type: required("club_type", enumCell("club_type", isClubType)),
    flex: required("flex", enumCell("flex", isFlex)),
    weight_grams: required("weight_grams", num("weight_grams")),
    length_inches: num("length_inches"),
    torque_degrees: num("torque_degrees"),
    launch: enumCell("launch", isProfileLevel),
    spin: enumCell("spin", isProfileLevel),
    butt_diameter_inches: num("butt_diameter_inches"),
    tip_diameter_inches: num("tip_diameter_inches"),
    tip_stiff: enumCell("tip_stiff", isTipStiffness),
    kickpoint: enumCell("kickpoint", isProfileLevel),
    material: text("material"),
    msrp_usd: num("msrp_usd"),
  };

  validateShaftSpec(spec);
  return spec;
}

// ===== CSV =====

/** Quote if the cell contains a comma, quote or newline; double inner quotes */
function csvEscape(raw: string): string {
  if (!/[",\r\n]/.test(raw)) return raw;
  return `"${raw.replace(/"/g, '""')}"`;
}

export function toCSV(specs: readonly ShaftSpec[]): string {
  const lines = [SHAFT_FIELDS.join(",")];
  for (const spec of specs) {
    const row = serializeShaft(spec);
    lines.push(SHAFT_FIELDS.map((f) => csvEscape(row[f])).join(","));
  }
  return lines.join("\n") + "\n";
}

/** Split CSV text into rows of cells. Blank lines are skipped. */
export function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let inQuotes = false;

  const endRow = () => {
    row.push(cell);
    if (row.length > 1 || row[0] !== "") rows.push(row);
    row = [];
    cell = "";
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRow();
    } else {
      cell += ch;
    }
  }
  if (cell !== "" || row.length > 0) endRow();

  return rows;
}

/** CSV text with a header line → one record per data line, keyed by header */
export function parseCSVRecords(text: string): Record<string, string>[] {
  const [header, ...body] = parseCSV(text);
  if (!header) return [];
  return body.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((name, i) => {
      record[name] = cells[i] ?? "";
    });
    return record;
  });
}

export function shaftsFromCSV(text: string): ShaftSpec[] {
  return parseCSVRecords(text).map(deserializeShaft);
}

// ===== JSON =====

export function toJSON(specs: readonly ShaftSpec[]): string {
  const ordered = specs.map((spec) => {
    const out: Record<string, ShaftSpec[ShaftField]> = {};
    for (const field of SHAFT_FIELDS) out[field] = spec[field];
    return out;
  });
  return JSON.stringify(ordered, null, 2);
}

/**
 * Read a plain object whose properties are canonical field names, such as a
 * parsed JSON item or a database row. Strings and numbers are accepted.
 */
export function shaftFromObject(item: object): ShaftSpec {
  const row: Record<string, string> = {};
  for (const field of SHAFT_FIELDS) {
    const value: unknown = Reflect.get(item, field);
    if (value === null || value === undefined) continue;
    if (typeof value !== "string" && typeof value !== "number") {
      throw new NormalizationError(field, "OutOfRangeValue", `unexpected ${typeof value}`, value);
    }
    row[field] = String(value);
  }
  return deserializeShaft(row);
}

export function shaftsFromJSON(text: string): ShaftSpec[] {
  const data: unknown = JSON.parse(text);
  if (!Array.isArray(data)) {
    throw new TypeError("Expected a JSON array of shafts");
  }
  return data.map((item: unknown, index) => {
    if (typeof item !== "object" || item === null) {
      throw new TypeError(`Expected shaft object at index ${index}`);
    }
    return shaftFromObject(item);
  });
}

export function exportShafts(specs: readonly ShaftSpec[], format: ExportFormat): string {
  return format === "csv" ? toCSV(specs) : toJSON(specs);
}
