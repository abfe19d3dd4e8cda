import { describe, it, expect } from "vitest";
import { CatalogStore } from "../lib/catalog";
import { compareShafts, MAX_COMPARE, weightProgression } from "../lib/compare";
import { InvalidComparisonSizeError, NotFoundError } from "../lib/errors";
import { shaftKey } from "../lib/schema";
import { ClubType, Flex, ProfileLevel, ShaftKey, ShaftSpec } from "../lib/types";

function makeShaft(overrides: Partial<ShaftSpec> = {}): ShaftSpec {
  return {
    manufacturer: "Project X",
    model: "HZRDUS Black",
    generation: null,
    club_type: ClubType.WOODS,
    flex: Flex.STIFF,
    weight_grams: 65,
    length_inches: 46,
    torque_degrees: 3.6,
    launch: ProfileLevel.LOW,
    spin: ProfileLevel.LOW,
    butt_diameter_inches: null,
    tip_diameter_inches: 0.335,
    tip_stiff: null,
    kickpoint: null,
    material: null,
    msrp_usd: 300,
    ...overrides,
  };
}

const stiff = makeShaft();
const xStiff = makeShaft({ flex: Flex.X_STIFF, weight_grams: 70, torque_degrees: 3.4 });
const tx = makeShaft({ flex: Flex.TX, weight_grams: 80, torque_degrees: null });
const ventus = makeShaft({
  manufacturer: "Fujikura",
  model: "Ventus Blue",
  generation: "TR",
  weight_grams: 65,
  torque_degrees: null,
  msrp_usd: 350,
});
const lz = makeShaft({
  model: "LZ",
  club_type: ClubType.IRON,
  flex: Flex.REGULAR,
  weight_grams: 120,
  tip_diameter_inches: 0.37,
});

function makeStore(): CatalogStore {
  return CatalogStore.from([stiff, xStiff, tx, ventus, lz]);
}

function sizeError(store: CatalogStore, keys: ShaftKey[]): InvalidComparisonSizeError {
  try {
    compareShafts(store, keys);
  } catch (err) {
    if (err instanceof InvalidComparisonSizeError) return err;
    throw err;
  }
  throw new Error("expected an InvalidComparisonSizeError");
}

describe("compareShafts", () => {
  it("gives a weight delta of 5 for 65 g and 70 g", () => {
    const result = compareShafts(makeStore(), [shaftKey(stiff), shaftKey(xStiff)]);
    expect(result.weightDelta).toBe(5);
    expect(result.rows.find((r) => r.field === "weight_grams")).toEqual({
      field: "weight_grams",
      values: [65, 70],
      delta: 5,
    });
  });

  it("aligns one row per canonical field in column order", () => {
    const result = compareShafts(makeStore(), [shaftKey(stiff), shaftKey(xStiff)]);
    expect(result.rows.map((r) => r.field)).toEqual([
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
    ]);
    expect(result.rows.find((r) => r.field === "flex")).toEqual({
      field: "flex",
      values: [Flex.STIFF, Flex.X_STIFF],
      delta: null,
    });
  });

  it("reports flex ranks and their spread", () => {
    const result = compareShafts(makeStore(), [shaftKey(tx), shaftKey(stiff)]);
    expect(result.flexRanks).toEqual([5, 3]);
    expect(result.flexRankDelta).toBe(2);
  });

  it("keeps the caller's key order", () => {
    const result = compareShafts(makeStore(), [shaftKey(xStiff), shaftKey(ventus), shaftKey(stiff)]);
    expect(result.labels).toEqual([
      "Project X HZRDUS Black X-Stiff",
      "Fujikura Ventus Blue TR Stiff",
      "Project X HZRDUS Black Stiff",
    ]);
    expect(result.keys).toEqual([shaftKey(xStiff), shaftKey(ventus), shaftKey(stiff)]);
  });

  it("computes deltas over present values only", () => {
    const result = compareShafts(makeStore(), [shaftKey(stiff), shaftKey(xStiff), shaftKey(tx)]);
    const torque = result.rows.find((r) => r.field === "torque_degrees");
    expect(torque?.values).toEqual([3.6, 3.4, null]);
    expect(torque?.delta).toBe(0.2);
  });

  it("gives a null delta when fewer than two records have the value", () => {
    const result = compareShafts(makeStore(), [shaftKey(tx), shaftKey(ventus)]);
    expect(result.rows.find((r) => r.field === "torque_degrees")?.delta).toBeNull();
    expect(result.rows.find((r) => r.field === "butt_diameter_inches")?.delta).toBeNull();
  });

  it("rounds deltas to four decimals", () => {
    const result = compareShafts(makeStore(), [shaftKey(stiff), shaftKey(lz)]);
    expect(result.rows.find((r) => r.field === "tip_diameter_inches")?.delta).toBe(0.035);
  });

  it("lists records with identical specs under different keys", () => {
    const twin = makeShaft({ generation: "2" });
    const store = CatalogStore.from([stiff, twin]);
    const result = compareShafts(store, [shaftKey(stiff), shaftKey(twin)]);
    expect(result.shafts).toHaveLength(2);
    expect(result.weightDelta).toBe(0);
    expect(result.rows.find((r) => r.field === "generation")?.values).toEqual([null, "2"]);
  });

  it("succeeds with 2, 3 and 4 keys", () => {
    const keys = [stiff, xStiff, tx, ventus].map(shaftKey);
    for (let n = 2; n <= MAX_COMPARE; n++) {
      const result = compareShafts(makeStore(), keys.slice(0, n));
      expect(result.shafts).toHaveLength(n);
      for (const row of result.rows) expect(row.values).toHaveLength(n);
    }
  });

  it("rejects a single key", () => {
    expect(sizeError(makeStore(), [shaftKey(stiff)]).count).toBe(1);
  });

  it("rejects five keys", () => {
    const keys = [stiff, xStiff, tx, ventus, lz].map(shaftKey);
    const err = sizeError(makeStore(), keys);
    expect(err.count).toBe(5);
    expect(err.message).toBe("Comparison needs 2 to 4 shafts, got 5");
  });

  it("lists a repeated key twice", () => {
    const result = compareShafts(makeStore(), [shaftKey(stiff), { ...shaftKey(stiff), model: "hzrdus black" }]);
    expect(result.shafts).toEqual([stiff, stiff]);
    expect(result.labels).toEqual(["Project X HZRDUS Black Stiff", "Project X HZRDUS Black Stiff"]);
    expect(result.rows.find((r) => r.field === "weight_grams")).toEqual({
      field: "weight_grams",
      values: [65, 65],
      delta: 0,
    });
    expect(result.flexRankDelta).toBe(0);
    expect(result.weightDelta).toBe(0);
  });

  it("fails on an unknown key", () => {
    const missing = shaftKey(makeShaft({ flex: Flex.SENIOR }));
    expect(() => compareShafts(makeStore(), [shaftKey(stiff), missing])).toThrow(NotFoundError);
  });
});

describe("weightProgression", () => {
  it("orders one model's records by flex", () => {
    const specs = [tx, lz, stiff, ventus, xStiff];
    expect(weightProgression(specs, "Project X", "HZRDUS Black").map((s) => [s.flex, s.weight_grams])).toEqual([
      [Flex.STIFF, 65],
      [Flex.X_STIFF, 70],
      [Flex.TX, 80],
    ]);
  });

  it("returns nothing for an unknown model", () => {
    expect(weightProgression([stiff], "Project X", "Cypher")).toEqual([]);
  });
});
