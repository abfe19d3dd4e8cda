import { NormalizationError } from "./errors";
import {
  CLUB_TYPE_MAP,
  FIELD_ALIASES,
  FIELD_DIMENSIONS,
  TIP_DIAMETERS_INCHES,
  TIP_DIAMETER_TOLERANCE,
  UNIT_FACTORS,
  UNIT_KEYS,
} from "./normalization-maps";
import { round4, validateShaftSpec } from "./schema";
import { ClubType, RawShaftRecord, RawValue, ShaftField, ShaftSpec } from "./types";
import {
  cleanLabel,
  ManufacturerVocabulary,
  VocabularyRegistry,
  VocabularyTableName,
} from "./vocabulary";

export interface NormalizeOptions {
  /** Club type for rows that don't carry one (a sheet per club type) */
  clubType?: ClubType;
}

export interface NormalizationFailure {
  index: number;
  error: NormalizationError;
}

export interface NormalizationBatch {
  specs: ShaftSpec[];
  failures: NormalizationFailure[];
}

type MeasuredField = keyof typeof FIELD_DIMENSIONS;
type PresentValue = string | number;
type RawFields = ReadonlyMap<string, PresentValue>;

const CLUB_TYPES = new Map<string, ClubType>(Object.entries(CLUB_TYPE_MAP));

const UNIT_TABLES = {
  weight: new Map(Object.entries(UNIT_FACTORS.weight)),
  length: new Map(Object.entries(UNIT_FACTORS.length)),
  diameter: new Map(Object.entries(UNIT_FACTORS.diameter)),
  torque: new Map(Object.entries(UNIT_FACTORS.torque)),
  price: new Map(Object.entries(UNIT_FACTORS.price)),
};

// "65g", "2.3 oz", "$350", 45.5"
const MEASUREMENT = /^(\$)?\s*([-+]?(?:\d+(?:\.\d*)?|\.\d+))\s*(.*)$/;

// ===== Raw Field Access =====

/** "Kick Point" → "kick_point", "Tip-Dia" → "tip_dia" */
export function standardizeKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function isPresent(value: RawValue): value is PresentValue {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return value.trim() !== "";
  return true;
}

function standardizeFields(raw: RawShaftRecord): RawFields {
  const fields = new Map<string, PresentValue>();
  for (const [key, value] of Object.entries(raw)) {
    const k = standardizeKey(key);
    if (isPresent(value) && !fields.has(k)) fields.set(k, value);
  }
  return fields;
}

function pick(fields: RawFields, field: ShaftField): PresentValue | undefined {
  for (const alias of FIELD_ALIASES[field]) {
    const value = fields.get(alias);
    if (value !== undefined) return value;
  }
  return undefined;
}

function requireText(fields: RawFields, field: ShaftField): string {
  const value = pick(fields, field);
  if (value === undefined) {
    throw new NormalizationError(field, "MissingRequiredField", "no value in raw record");
  }
  return String(value).trim();
}

function optionalText(fields: RawFields, field: ShaftField): string | null {
  const value = pick(fields, field);
  return value === undefined ? null : String(value).trim();
}

// ===== Vocabulary Lookups =====

function lookup<T>(
  vocabulary: ManufacturerVocabulary,
  table: VocabularyTableName,
  labels: ReadonlyMap<string, T>,
  field: ShaftField,
  raw: PresentValue
): T {
  // A number typed into a sheet as "6.0" arrives as 6
  const candidates = typeof raw === "number" ? [String(raw), raw.toFixed(1)] : [raw];
  const value = candidates.map((c) => labels.get(cleanLabel(c))).find((v) => v !== undefined);
  if (value === undefined) {
    throw new NormalizationError(
      field,
      "UnmappedVocabularyValue",
      `"${raw}" is not in the ${vocabulary.manufacturer} ${table} vocabulary`,
      raw
    );
  }
  return value;
}

function resolveManufacturer(fields: RawFields, vocabulary: ManufacturerVocabulary): string {
  const raw = pick(fields, "manufacturer");
  if (raw === undefined) return vocabulary.manufacturer;

  const name = cleanLabel(String(raw));
  const known = [vocabulary.manufacturer, ...vocabulary.aliases].map(cleanLabel);
  if (!known.includes(name)) {
    throw new NormalizationError(
      "manufacturer",
      "UnmappedVocabularyValue",
      `"${raw}" does not belong to the ${vocabulary.manufacturer} vocabulary`,
      raw
    );
  }
  return vocabulary.manufacturer;
}

function normalizeClubType(fields: RawFields, fallback?: ClubType): ClubType {
  const raw = pick(fields, "club_type");
  if (raw === undefined) {
    if (fallback !== undefined) return fallback;
    throw new NormalizationError("club_type", "MissingRequiredField", "no club type in record or batch");
  }
  const clubType = CLUB_TYPES.get(cleanLabel(String(raw)));
  if (clubType === undefined) {
    throw new NormalizationError("club_type", "UnmappedVocabularyValue", `"${raw}" is not a known club type`, raw);
  }
  return clubType;
}

// ===== Units =====

function declaredUnit(fields: RawFields, field: MeasuredField): string | undefined {
  for (const key of UNIT_KEYS[field]) {
    const value = fields.get(key);
    if (value !== undefined) return cleanLabel(String(value));
  }
  return undefined;
}

/**
 * Convert a raw measurement to the canonical unit. A bare number with no
 * declared unit is taken as already canonical.
 */
export function parseMeasurement(field: MeasuredField, raw: PresentValue, declared?: string): number {
  const dimension = FIELD_DIMENSIONS[field];
  const factors = UNIT_TABLES[dimension];

  let amount: number;
  const inline: string[] = [];
  if (typeof raw === "number") {
    amount = raw;
  } else {
    const match = MEASUREMENT.exec(raw.trim());
    if (!match) {
      throw new NormalizationError(field, "OutOfRangeValue", `"${raw}" is not a number`, raw);
    }
    amount = parseFloat(match[2]);
    if (match[1]) inline.push("$");
    const suffix = cleanLabel(match[3]);
    if (suffix) inline.push(suffix);
  }

  if (!Number.isFinite(amount)) {
    throw new NormalizationError(field, "OutOfRangeValue", `${amount} is not a finite number`, raw);
  }

  const units = declared !== undefined ? [...inline, declared] : inline;
  for (const unit of units) {
    if (!factors.has(unit)) {
      throw new NormalizationError(field, "UnitMismatch", `"${unit}" is not a ${dimension} unit`, raw);
    }
  }

  const factor = units.length > 0 ? factors.get(units[0]) : 1;
  if (factor === undefined || units.some((unit) => factors.get(unit) !== factor)) {
    throw new NormalizationError(
      field,
      "UnitMismatch",
      `inline and declared units disagree (${units.join(" vs ")})`,
      raw
    );
  }

  const value = factor === 1 ? amount : round4(amount * factor);
  // -0 would come back as 0 from a written cell
  return value === 0 ? 0 : value;
}

function snapTipDiameter(value: number): number {
  const size = TIP_DIAMETERS_INCHES.find((s) => Math.abs(s - value) <= TIP_DIAMETER_TOLERANCE);
  return size ?? value;
}

function measurement(fields: RawFields, field: MeasuredField): number | null {
  const raw = pick(fields, field);
  if (raw === undefined) return null;
  return parseMeasurement(field, raw, declaredUnit(fields, field));
}

// ===== Normalizer =====

/**
 * Normalize one raw manufacturer record into a canonical shaft.
 * Every enum value must be in the manufacturer's vocabulary; nothing is
 * inferred. Throws NormalizationError naming the offending field.
 */
export function normalizeShaft(
  raw: RawShaftRecord,
  vocabulary: ManufacturerVocabulary,
  options: NormalizeOptions = {}
): ShaftSpec {
  const fields = standardizeFields(raw);

  const manufacturer = resolveManufacturer(fields, vocabulary);
  const model = requireText(fields, "model");
  const generation = optionalText(fields, "generation");
  const clubType = normalizeClubType(fields, options.clubType);

  const flexRaw = pick(fields, "flex");
  if (flexRaw === undefined) {
    throw new NormalizationError("flex", "MissingRequiredField", "no value in raw record");
  }

  const weight = measurement(fields, "weight_grams");
  if (weight === null) {
    throw new NormalizationError("weight_grams", "MissingRequiredField", "no value in raw record");
  }

  const optionalEnum = <T>(table: VocabularyTableName, labels: ReadonlyMap<string, T>): T | null => {
    const value = pick(fields, table);
    return value === undefined ? null : lookup(vocabulary, table, labels, table, value);
  };

  const tipDiameter = measurement(fields, "tip_diameter_inches");
  const material = optionalText(fields, "material");

  const spec: ShaftSpec = {
    manufacturer,
    model,
    generation,
    club_type: clubType,
    flex: lookup(vocabulary, "flex", vocabulary.flex, "flex", flexRaw),
    weight_grams: weight,
    length_inches: measurement(fields, "length_inches"),
    torque_degrees: measurement(fields, "torque_degrees"),
    launch: optionalEnum("launch", vocabulary.launch),
    spin: optionalEnum("spin", vocabulary.spin),
    butt_diameter_inches: measurement(fields, "butt_diameter_inches"),
    tip_diameter_inches: tipDiameter === null ? null : snapTipDiameter(tipDiameter),
    tip_stiff: optionalEnum("tip_stiff", vocabulary.tip_stiff),
    kickpoint: optionalEnum("kickpoint", vocabulary.kickpoint),
    material: material === null ? null : material.toLowerCase(),
    msrp_usd: measurement(fields, "msrp_usd"),
  };

  validateShaftSpec(spec);
  return spec;
}

/**
 * Normalize a record whose manufacturer decides the vocabulary.
 */
export function normalizeRecord(
  raw: RawShaftRecord,
  registry: VocabularyRegistry,
  options: NormalizeOptions = {}
): ShaftSpec {
  const manufacturer = pick(standardizeFields(raw), "manufacturer");
  if (manufacturer === undefined) {
    throw new NormalizationError("manufacturer", "MissingRequiredField", "no value in raw record");
  }
  const vocabulary = registry.get(String(manufacturer));
  if (!vocabulary) {
    throw new NormalizationError(
      "manufacturer",
      "UnmappedVocabularyValue",
      `no vocabulary registered for "${manufacturer}"`,
      manufacturer
    );
  }
  return normalizeShaft(raw, vocabulary, options);
}

/**
 * Normalize a batch. Each row fails on its own; failures carry the row index.
 */
export function normalizeRecords(
  raws: readonly RawShaftRecord[],
  registry: VocabularyRegistry,
  options: NormalizeOptions = {}
): NormalizationBatch {
  const batch: NormalizationBatch = { specs: [], failures: [] };

  raws.forEach((raw, index) => {
    try {
      batch.specs.push(normalizeRecord(raw, registry, options));
    } catch (err) {
      if (!(err instanceof NormalizationError)) throw err;
      batch.failures.push({ index, error: err });
    }
  });

  return batch;
}
