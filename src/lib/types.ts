// ===== Enums =====

export enum ClubType {
  WOODS = "woods",
  FAIRWAY = "fairway",
  HYBRID = "hybrid",
  IRON = "iron",
  WEDGE = "wedge",
  PUTTER = "putter",
}

export enum Flex {
  LADIES = "Ladies",
  SENIOR = "Senior",
  REGULAR = "Regular",
  STIFF = "Stiff",
  X_STIFF = "X-Stiff",
  TX = "TX",
}

// Shared scale for launch, spin and kickpoint
export enum ProfileLevel {
  LOW = "Low",
  LOW_MID = "Low-Mid",
  MID = "Mid",
  MID_HIGH = "Mid-High",
  HIGH = "High",
}

export enum TipStiffness {
  SOFT = "Soft",
  MEDIUM = "Medium",
  FIRM = "Firm",
  VERY_FIRM = "Very Firm",
}

// ===== Raw Shaft (manufacturer output, messy) =====

export type RawValue = string | number | null | undefined;

// e.g. { manufacturer: "Project X", model: "HZRDUS Black", flex_raw: "6.0", weight: "65g" }
export type RawShaftRecord = Record<string, RawValue>;

// ===== Canonical Shaft (normalized, validated, store-ready) =====
// Property names are the public field names: tabular columns, export keys
// and filter keys all use them verbatim.

export interface ShaftSpec {
  manufacturer: string;
  model: string;
  generation: string | null;
  club_type: ClubType;
  flex: Flex;
  weight_grams: number;
  length_inches: number | null;
  torque_degrees: number | null;
  launch: ProfileLevel | null;
  spin: ProfileLevel | null;
  butt_diameter_inches: number | null;
  tip_diameter_inches: number | null;
  tip_stiff: TipStiffness | null;
  kickpoint: ProfileLevel | null;
  material: string | null;
  msrp_usd: number | null;
}

export type ShaftField = keyof ShaftSpec;

export type NumericShaftField =
  | "weight_grams"
  | "length_inches"
  | "torque_degrees"
  | "butt_diameter_inches"
  | "tip_diameter_inches"
  | "msrp_usd";

export interface ShaftKey {
  manufacturer: string;
  model: string;
  generation: string | null;
  club_type: ClubType;
  flex: Flex;
}

// ===== Filter Types =====

export interface ExactConstraint<T> {
  eq: T;
}

export interface SetConstraint<T> {
  in: readonly T[];
}

export interface RangeConstraint {
  min?: number;
  max?: number;
  allowMissing?: boolean; // absent values fail a range unless this is set
}

export type FieldConstraint<T> = [T] extends [number]
  ? ExactConstraint<T> | SetConstraint<T> | RangeConstraint
  : ExactConstraint<T> | SetConstraint<T>;

export type FilterSpec = {
  [F in ShaftField]?: FieldConstraint<NonNullable<ShaftSpec[F]>>;
};

export interface PageOptions {
  limit?: number;
  offset?: number;
}

// ===== Comparison Types =====

export type ShaftValue = ShaftSpec[ShaftField];

export interface ComparisonRow {
  field: ShaftField;
  values: ShaftValue[]; // aligned with ComparisonResult.shafts
  delta: number | null; // max - min for numeric fields, null otherwise
}

export interface ComparisonResult {
  keys: ShaftKey[];
  shafts: ShaftSpec[];
  labels: string[];
  rows: ComparisonRow[];
  flexRanks: number[];
  flexRankDelta: number;
  weightDelta: number;
}

// ===== Statistics =====

export interface CatalogStats {
  totalShafts: number;
  manufacturers: number;
  models: number;
  clubTypes: Partial<Record<ClubType, number>>;
  flexDistribution: Partial<Record<Flex, number>>;
  weightRange: { min: number; max: number; mean: number } | null;
}
