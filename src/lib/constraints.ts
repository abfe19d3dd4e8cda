import { config } from "./config";
import { InvalidFilterError } from "./errors";
import { flexRank, isClubType, isFlex, isProfileLevel, SHAFT_FIELDS } from "./schema";
import {
  ExactConstraint,
  FilterSpec,
  NumericShaftField,
  PageOptions,
  RangeConstraint,
  SetConstraint,
  ShaftSpec,
  ShaftValue,
} from "./types";

type AnyConstraint = ExactConstraint<unknown> | SetConstraint<unknown> | RangeConstraint;

// ===== Ordering =====

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Catalog order: manufacturer, model, generation (absent first), club type,
 * then flex rank so that the order is total over identity keys.
 */
export function catalogOrder(a: ShaftSpec, b: ShaftSpec): number {
  return (
    compareText(a.manufacturer, b.manufacturer) ||
    compareText(a.model, b.model) ||
    compareText(a.generation ?? "", b.generation ?? "") ||
    compareText(a.club_type, b.club_type) ||
    flexRank(a.flex) - flexRank(b.flex)
  );
}

export function sortShafts(specs: readonly ShaftSpec[]): ShaftSpec[] {
  return [...specs].sort(catalogOrder);
}

// ===== Filtering =====

function matchesConstraint(value: ShaftValue, constraint: AnyConstraint): boolean {
  if ("eq" in constraint) return value !== null && value === constraint.eq;
  if ("in" in constraint) return value !== null && constraint.in.includes(value);

  // A NaN bound admits nothing
  if (Number.isNaN(constraint.min) || Number.isNaN(constraint.max)) return false;
  // Absence never satisfies a range unless the caller opts in
  if (value === null) return constraint.allowMissing === true;
  if (typeof value !== "number") return false;
  if (constraint.min !== undefined && value < constraint.min) return false;
  if (constraint.max !== undefined && value > constraint.max) return false;
  return true;
}

/** AND across every constrained field */
export function matchesFilter(spec: ShaftSpec, filter: FilterSpec): boolean {
  for (const field of SHAFT_FIELDS) {
    const constraint = filter[field];
    if (constraint === undefined) continue;
    if (!matchesConstraint(spec[field], constraint)) return false;
  }
  return true;
}

/** Keeps input order; pass catalog-ordered input for a stable result */
export function filterShafts(specs: readonly ShaftSpec[], filter: FilterSpec): ShaftSpec[] {
  return specs.filter((spec) => matchesFilter(spec, filter));
}

export function paginate<T>(results: readonly T[], options: PageOptions = {}): T[] {
  const limit = Math.min(Math.max(Math.floor(options.limit ?? config.defaultPageSize), 1), config.maxPageSize);
  const offset = Math.max(Math.floor(options.offset ?? 0), 0);
  return results.slice(offset, offset + limit);
}

/** Case-insensitive substring match on manufacturer or model */
export function searchShafts(specs: readonly ShaftSpec[], query: string): ShaftSpec[] {
  const q = query.trim().toLowerCase();
  if (!q) return [];
  return specs.filter(
    (s) => s.manufacturer.toLowerCase().includes(q) || s.model.toLowerCase().includes(q)
  );
}

// ===== Query-string Filters =====

const RANGE_PARAMS: Record<string, { field: NumericShaftField; bound: "min" | "max" }> = {
  weight_min: { field: "weight_grams", bound: "min" },
  weight_max: { field: "weight_grams", bound: "max" },
  torque_min: { field: "torque_degrees", bound: "min" },
  torque_max: { field: "torque_degrees", bound: "max" },
  length_min: { field: "length_inches", bound: "min" },
  length_max: { field: "length_inches", bound: "max" },
  price_min: { field: "msrp_usd", bound: "min" },
  price_max: { field: "msrp_usd", bound: "max" },
};

function listParam(params: URLSearchParams, name: string): string[] {
  return params
    .getAll(name)
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v !== "");
}

function enumParam<T>(params: URLSearchParams, name: string, guard: (v: unknown) => v is T): T[] {
  return listParam(params, name).map((value) => {
    if (!guard(value)) throw new InvalidFilterError(name, value);
    return value;
  });
}

/**
 * Build a filter from API query parameters, e.g.
 * `?club_type=iron,wedge&flex=Stiff&weight_min=110&weight_max=125`.
 */
export function filterFromSearchParams(params: URLSearchParams): FilterSpec {
  const filter: FilterSpec = {};

  const manufacturers = listParam(params, "manufacturer");
  if (manufacturers.length > 0) filter.manufacturer = { in: manufacturers };

  const clubTypes = enumParam(params, "club_type", isClubType);
  if (clubTypes.length > 0) filter.club_type = { in: clubTypes };

  const flexes = enumParam(params, "flex", isFlex);
  if (flexes.length > 0) filter.flex = { in: flexes };

  const launches = enumParam(params, "launch", isProfileLevel);
  if (launches.length > 0) filter.launch = { in: launches };

  const spins = enumParam(params, "spin", isProfileLevel);
  if (spins.length > 0) filter.spin = { in: spins };

  const ranges = new Map<NumericShaftField, RangeConstraint>();
  for (const [param, { field, bound }] of Object.entries(RANGE_PARAMS)) {
    const raw = params.get(param);
    if (raw === null) continue;
    const value = Number(raw);
    if (raw.trim() === "" || !Number.isFinite(value)) throw new InvalidFilterError(param, raw);
    const range = ranges.get(field) ?? {};
    if (bound === "min") range.min = value;
    else range.max = value;
    ranges.set(field, range);
  }
  for (const [field, range] of ranges) filter[field] = range;

  return filter;
}
