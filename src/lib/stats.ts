import { CatalogStats, ClubType, Flex, ShaftSpec } from "./types";

function countBy<K extends string>(specs: readonly ShaftSpec[], pick: (s: ShaftSpec) => K): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const spec of specs) {
    const k = pick(spec);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

/** Catalog summary: sizes, distributions and the weight range */
export function catalogStats(specs: readonly ShaftSpec[]): CatalogStats {
  if (specs.length === 0) {
    return { totalShafts: 0, manufacturers: 0, models: 0, clubTypes: {}, flexDistribution: {}, weightRange: null };
  }

  const weights = specs.map((s) => s.weight_grams);
  const mean = weights.reduce((sum, w) => sum + w, 0) / weights.length;

  return {
    totalShafts: specs.length,
    manufacturers: new Set(specs.map((s) => s.manufacturer)).size,
    // A model name is only unique within its manufacturer
    models: new Set(specs.map((s) => `${s.manufacturer}|${s.model}`)).size,
    clubTypes: countBy<ClubType>(specs, (s) => s.club_type),
    flexDistribution: countBy<Flex>(specs, (s) => s.flex),
    weightRange: {
      min: Math.min(...weights),
      max: Math.max(...weights),
      mean: Math.round(mean * 10) / 10,
    },
  };
}
