import type { CatalogStore } from "./catalog";
import { InvalidComparisonSizeError } from "./errors";
import {
  displayName,
  flexRank,
  isNumericField,
  round4,
  SHAFT_FIELDS,
  shaftKey,
} from "./schema";
import { ComparisonResult, ComparisonRow, ShaftKey, ShaftSpec, ShaftValue } from "./types";

export const MIN_COMPARE = 2;
export const MAX_COMPARE = 4;

function spread(values: readonly number[]): number {
  return round4(Math.max(...values) - Math.min(...values));
}

/** max − min over the records that have a value; null below two values */
function numericDelta(values: readonly ShaftValue[]): number | null {
  const present = values.filter((v): v is number => typeof v === "number");
  return present.length < 2 ? null : spread(present);
}

/**
 * Side-by-side comparison of 2–4 catalog shafts, in the order given.
 * A key given twice is listed twice.
 */
export function compareShafts(store: CatalogStore, keys: readonly ShaftKey[]): ComparisonResult {
  if (keys.length < MIN_COMPARE || keys.length > MAX_COMPARE) {
    throw new InvalidComparisonSizeError(keys.length);
  }

  const shafts = keys.map((key) => store.get(key));

  const rows: ComparisonRow[] = SHAFT_FIELDS.map((field) => {
    const values = shafts.map((s) => s[field]);
    return { field, values, delta: isNumericField(field) ? numericDelta(values) : null };
  });

  const flexRanks = shafts.map((s) => flexRank(s.flex));

  return {
    keys: shafts.map(shaftKey),
    shafts,
    labels: shafts.map(displayName),
    rows,
    flexRanks,
    flexRankDelta: Math.max(...flexRanks) - Math.min(...flexRanks),
    weightDelta: spread(shafts.map((s) => s.weight_grams)),
  };
}

/**
 * How one model's weight moves through its flexes, lightest flex first.
 */
export function weightProgression(
  specs: readonly ShaftSpec[],
  manufacturer: string,
  model: string
): ShaftSpec[] {
  return specs
    .filter((s) => s.manufacturer === manufacturer && s.model === model)
    .sort(
      (a, b) =>
        flexRank(a.flex) - flexRank(b.flex) ||
        a.club_type.localeCompare(b.club_type) ||
        (a.generation ?? "").localeCompare(b.generation ?? "")
    );
}
