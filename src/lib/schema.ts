import { NormalizationError } from "./errors";
import { TIP_DIAMETERS_INCHES } from "./normalization-maps";
import {
  ClubType,
  Flex,
  NumericShaftField,
  ProfileLevel,
  ShaftField,
  ShaftKey,
  ShaftSpec,
  TipStiffness,
} from "./types";

// Column order for tables, exports and comparison rows
export const SHAFT_FIELDS: readonly ShaftField[] = [
  "manufacturer",
  "model",
  "generation",
  "club_type",
  "flex",
  "weight_grams",
  "length_inches",
  "torque_degrees",
  "launch",
  "spin",
  "butt_diameter_inches",
  "tip_diameter_inches",
  "tip_stiff",
  "kickpoint",
  "material",
  "msrp_usd",
];

export const NUMERIC_FIELDS: readonly NumericShaftField[] = [
  "weight_grams",
  "length_inches",
  "torque_degrees",
  "butt_diameter_inches",
  "tip_diameter_inches",
  "msrp_usd",
];

const NUMERIC_FIELD_SET: ReadonlySet<string> = new Set(NUMERIC_FIELDS);

export function isNumericField(field: string): field is NumericShaftField {
  return NUMERIC_FIELD_SET.has(field);
}

// ===== Flex Ordering =====
// One ordinal scale for every brand; vendor labels map onto it via vocabularies.

export const FLEX_ORDER: Record<Flex, number> = {
  [Flex.LADIES]: 0,
  [Flex.SENIOR]: 1,
  [Flex.REGULAR]: 2,
  [Flex.STIFF]: 3,
  [Flex.X_STIFF]: 4,
  [Flex.TX]: 5,
};

export function flexRank(flex: Flex): number {
  return FLEX_ORDER[flex];
}

// ===== Enum Guards =====

const CLUB_TYPES: ReadonlySet<string> = new Set(Object.values(ClubType));
const FLEXES: ReadonlySet<string> = new Set(Object.values(Flex));
const PROFILE_LEVELS: ReadonlySet<string> = new Set(Object.values(ProfileLevel));
const TIP_STIFFNESSES: ReadonlySet<string> = new Set(Object.values(TipStiffness));

export function isClubType(value: unknown): value is ClubType {
  return typeof value === "string" && CLUB_TYPES.has(value);
}

export function isFlex(value: unknown): value is Flex {
  return typeof value === "string" && FLEXES.has(value);
}

export function isProfileLevel(value: unknown): value is ProfileLevel {
  return typeof value === "string" && PROFILE_LEVELS.has(value);
}

export function isTipStiffness(value: unknown): value is TipStiffness {
  return typeof value === "string" && TIP_STIFFNESSES.has(value);
}

export function round4(value: number): number {
  return Math.round(value * 1e4) / 1e4;
}

// ===== Identity =====

export function shaftKey(spec: ShaftKey): ShaftKey {
  return {
    manufacturer: spec.manufacturer,
    model: spec.model,
    generation: spec.generation,
    club_type: spec.club_type,
    flex: spec.flex,
  };
}

function keyPart(text: string): string {
  return text.trim().toLowerCase().replace(/[\\|]/g, "\\$&");
}

/**
 * Storage key: "fujikura|ventus blue|tr|woods|Stiff".
 * Absent generation takes part as the empty string. A `|` or `\` inside a
 * name is backslash-escaped, so distinct keys never share a string.
 */
export function keyString(key: ShaftKey): string {
  return [
    keyPart(key.manufacturer),
    keyPart(key.model),
    keyPart(key.generation ?? ""),
    key.club_type,
    key.flex,
  ].join("|");
}

export function displayName(spec: ShaftKey): string {
  const gen = spec.generation ? ` ${spec.generation}` : "";
  return `${spec.manufacturer} ${spec.model}${gen} ${spec.flex}`;
}

// ===== Validation =====

function outOfRange(field: ShaftField, value: unknown, rule: string): NormalizationError {
  return new NormalizationError(field, "OutOfRangeValue", `${String(value)} ${rule}`, value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function checkNumber(
  spec: ShaftSpec,
  field: NumericShaftField,
  bounds: { gt?: number; ge?: number; lt?: number },
  required = false
): void {
  const value = spec[field];
  if (value === null) {
    if (required) {
      throw new NormalizationError(field, "MissingRequiredField", "value is required", value);
    }
    return;
  }
  if (!isFiniteNumber(value)) throw outOfRange(field, value, "is not a finite number");
  if (bounds.gt !== undefined && !(value > bounds.gt)) throw outOfRange(field, value, `must be > ${bounds.gt}`);
  if (bounds.ge !== undefined && !(value >= bounds.ge)) throw outOfRange(field, value, `must be >= ${bounds.ge}`);
  if (bounds.lt !== undefined && !(value < bounds.lt)) throw outOfRange(field, value, `must be < ${bounds.lt}`);
}

function checkText(spec: ShaftSpec, field: "manufacturer" | "model"): void {
  const value = spec[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new NormalizationError(field, "MissingRequiredField", "value is required", value);
  }
}

function checkOptionalText(spec: ShaftSpec, field: "generation" | "material"): void {
  const value = spec[field];
  if (value !== null && (typeof value !== "string" || value.trim() === "")) {
    throw outOfRange(field, value, "must be a non-empty string or absent");
  }
}

function checkEnum(
  spec: ShaftSpec,
  field: "club_type" | "flex" | "launch" | "spin" | "tip_stiff" | "kickpoint",
  guard: (value: unknown) => boolean,
  required = false
): void {
  const value = spec[field];
  if (value === null) {
    if (required) {
      throw new NormalizationError(field, "MissingRequiredField", "value is required", value);
    }
    return;
  }
  if (!guard(value)) {
    throw new NormalizationError(field, "UnmappedVocabularyValue", `"${String(value)}" is not a canonical value`, value);
  }
}

/**
 * Check every field-level rule of the canonical schema.
 * Throws NormalizationError naming the first offending field.
 */
export function validateShaftSpec(spec: ShaftSpec): void {
  checkText(spec, "manufacturer");
  checkText(spec, "model");
  checkOptionalText(spec, "generation");
  checkEnum(spec, "club_type", isClubType, true);
  checkEnum(spec, "flex", isFlex, true);
  checkNumber(spec, "weight_grams", { gt: 0, lt: 300 }, true);
  checkNumber(spec, "length_inches", { gt: 0, lt: 60 });
  checkNumber(spec, "torque_degrees", { ge: 0, lt: 15 });
  checkEnum(spec, "launch", isProfileLevel);
  checkEnum(spec, "spin", isProfileLevel);
  checkNumber(spec, "butt_diameter_inches", { gt: 0 });
  checkNumber(spec, "tip_diameter_inches", { gt: 0 });
  if (spec.tip_diameter_inches !== null && !TIP_DIAMETERS_INCHES.includes(spec.tip_diameter_inches)) {
    throw outOfRange(
      "tip_diameter_inches",
      spec.tip_diameter_inches,
      `is not a standard tip size (${TIP_DIAMETERS_INCHES.join(", ")})`
    );
  }
  checkEnum(spec, "tip_stiff", isTipStiffness);
  checkEnum(spec, "kickpoint", isProfileLevel);
  checkOptionalText(spec, "material");
  checkNumber(spec, "msrp_usd", { ge: 0 });
}
