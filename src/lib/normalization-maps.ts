import { ClubType, ShaftField } from "./types";

// ===== Column Aliases =====
// Spec sheets name the same column differently; first alias present wins.

export const FIELD_ALIASES: Record<ShaftField, readonly string[]> = {
  manufacturer: ["manufacturer", "brand", "oem"],
  model: ["model", "shaft", "name", "product"],
  generation: ["generation", "gen", "version"],
  club_type: ["club_type", "club"],
  flex: ["flex", "flex_raw", "stiffness"],
  weight_grams: ["weight_grams", "weight", "wt"],
  length_inches: ["length_inches", "length", "raw_length"],
  torque_degrees: ["torque_degrees", "torque"],
  launch: ["launch", "launch_profile", "trajectory"],
  spin: ["spin", "spin_profile"],
  kickpoint: ["kickpoint", "kick_point", "bend_point"],
  tip_stiff: ["tip_stiff", "tip_stiffness"],
  butt_diameter_inches: ["butt_diameter_inches", "butt_diameter", "butt"],
  tip_diameter_inches: ["tip_diameter_inches", "tip_diameter", "tip_dia"],
  material: ["material"],
  msrp_usd: ["msrp_usd", "msrp", "price"],
};

// ===== Club Type Map =====
// Not vendor specific, so one shared table.

export const CLUB_TYPE_MAP: Record<string, ClubType> = {
  woods: ClubType.WOODS,
  wood: ClubType.WOODS,
  driver: ClubType.WOODS,

  fairway: ClubType.FAIRWAY,
  "fairway wood": ClubType.FAIRWAY,
  "fairway woods": ClubType.FAIRWAY,

  hybrid: ClubType.HYBRID,
  hybrids: ClubType.HYBRID,
  rescue: ClubType.HYBRID,
  utility: ClubType.HYBRID,

  iron: ClubType.IRON,
  irons: ClubType.IRON,

  wedge: ClubType.WEDGE,
  wedges: ClubType.WEDGE,

  putter: ClubType.PUTTER,
};

// ===== Units =====

export type UnitDimension = "weight" | "length" | "diameter" | "torque" | "price";

// Multiply a value in the given unit to get the canonical unit
export const UNIT_FACTORS: Record<UnitDimension, Record<string, number>> = {
  weight: { g: 1, gram: 1, grams: 1, oz: 28.349523125, ounce: 28.349523125, ounces: 28.349523125 },
  length: { in: 1, inch: 1, inches: 1, '"': 1, cm: 1 / 2.54, mm: 1 / 25.4 },
  diameter: { in: 1, inch: 1, inches: 1, '"': 1, mm: 1 / 25.4 },
  torque: { deg: 1, degree: 1, degrees: 1, "°": 1 },
  price: { usd: 1, $: 1 },
};

export const FIELD_DIMENSIONS = {
  weight_grams: "weight",
  length_inches: "length",
  torque_degrees: "torque",
  butt_diameter_inches: "diameter",
  tip_diameter_inches: "diameter",
  msrp_usd: "price",
} as const satisfies Record<string, UnitDimension>;

// Declared-unit columns, most specific first
export const UNIT_KEYS: Record<keyof typeof FIELD_DIMENSIONS, readonly string[]> = {
  weight_grams: ["weight_unit"],
  length_inches: ["length_unit"],
  torque_degrees: ["torque_unit"],
  butt_diameter_inches: ["butt_diameter_unit", "diameter_unit"],
  tip_diameter_inches: ["tip_diameter_unit", "diameter_unit"],
  msrp_usd: ["currency"],
};

// ===== Tip Sizes =====

export const TIP_DIAMETERS_INCHES: readonly number[] = [0.335, 0.35, 0.355, 0.37];

// Metric tips (8.5mm, 9.0mm, 9.4mm) land within this of an inch size
export const TIP_DIAMETER_TOLERANCE = 0.0015;
