import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CatalogDb, deleteShaft, loadCatalog, loadShafts, openCatalogDb, saveShafts, upsertShaft } from "../lib/db";
import { NormalizationError } from "../lib/errors";
import { SHAFT_FIELDS, shaftKey } from "../lib/schema";
import { ClubType, Flex, ProfileLevel, ShaftSpec, TipStiffness } from "../lib/types";

function makeShaft(overrides: Partial<ShaftSpec> = {}): ShaftSpec {
  return {
    manufacturer: "Mitsubishi Chemical",
    model: "Tensei 1K Pro White",
    generation: null,
    club_type: ClubType.WOODS,
    flex: Flex.STIFF,
    weight_grams: 65.2039,
    length_inches: 46.063,
    torque_degrees: 3.4,
    launch: ProfileLevel.LOW,
    spin: ProfileLevel.LOW,
    butt_diameter_inches: 0.6,
    tip_diameter_inches: 0.335,
    tip_stiff: TipStiffness.VERY_FIRM,
    kickpoint: ProfileLevel.MID_HIGH,
    material: "graphite",
    msrp_usd: 375,
    ...overrides,
  };
}

function makeMinimalShaft(overrides: Partial<ShaftSpec> = {}): ShaftSpec {
  return {
    manufacturer: "True Temper",
    model: "Dynamic Gold",
    generation: "Tour Issue",
    club_type: ClubType.IRON,
    flex: Flex.X_STIFF,
    weight_grams: 130,
    length_inches: null,
    torque_degrees: null,
    launch: null,
    spin: null,
    butt_diameter_inches: null,
    tip_diameter_inches: null,
    tip_stiff: null,
    kickpoint: null,
    material: null,
    msrp_usd: null,
    ...overrides,
  };
}

describe("catalog database", () => {
  let db: CatalogDb;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    db = openCatalogDb(":memory:");
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it("creates a table whose columns are the canonical fields", () => {
    const cols = db.prepare("SELECT name FROM pragma_table_info('shafts')").pluck().all();
    expect(cols).toEqual([...SHAFT_FIELDS]);
  });

  it("reads back exactly what was saved", () => {
    const specs = [makeShaft(), makeMinimalShaft()];
    saveShafts(db, specs);
    expect(loadShafts(db)).toEqual([makeShaft(), makeMinimalShaft()]);
  });

  it("returns rows in catalog order", () => {
    saveShafts(db, [makeMinimalShaft(), makeShaft({ flex: Flex.REGULAR }), makeShaft()]);
    expect(loadShafts(db).map((s) => `${s.manufacturer} ${s.flex}`)).toEqual([
      "Mitsubishi Chemical Regular",
      "Mitsubishi Chemical Stiff",
      "True Temper X-Stiff",
    ]);
  });

  it("replaces the previous contents on save", () => {
    saveShafts(db, [makeShaft(), makeMinimalShaft()]);
    saveShafts(db, [makeMinimalShaft()]);
    expect(loadShafts(db)).toEqual([makeMinimalShaft()]);
  });

  it("logs the number of rows saved", () => {
    saveShafts(db, [makeShaft()]);
    expect(console.log).toHaveBeenCalledWith("[db] Saved 1 shafts");
  });

  it("rejects duplicate keys within one save and keeps the old contents", () => {
    saveShafts(db, [makeMinimalShaft()]);
    expect(() => saveShafts(db, [makeShaft(), makeShaft({ weight_grams: 70 })])).toThrow();
    expect(loadShafts(db)).toEqual([makeMinimalShaft()]);
  });

  describe("upsertShaft", () => {
    it("inserts a new row", () => {
      upsertShaft(db, makeShaft());
      expect(loadShafts(db)).toEqual([makeShaft()]);
    });

    it("overwrites a row with the same key", () => {
      upsertShaft(db, makeShaft());
      upsertShaft(db, makeShaft({ weight_grams: 66 }));
      expect(loadShafts(db).map((s) => s.weight_grams)).toEqual([66]);
    });

    it("matches keys case-insensitively", () => {
      upsertShaft(db, makeShaft());
      upsertShaft(db, makeShaft({ model: "TENSEI 1K PRO WHITE" }));
      expect(loadShafts(db).map((s) => s.model)).toEqual(["TENSEI 1K PRO WHITE"]);
    });
  });

  describe("deleteShaft", () => {
    it("removes the row with the key", () => {
      saveShafts(db, [makeShaft(), makeMinimalShaft()]);
      expect(deleteShaft(db, shaftKey(makeShaft()))).toBe(true);
      expect(loadShafts(db)).toEqual([makeMinimalShaft()]);
    });

    it("finds a row stored without a generation", () => {
      saveShafts(db, [makeShaft()]);
      expect(deleteShaft(db, shaftKey(makeShaft({ generation: null })))).toBe(true);
    });

    it("returns false when nothing matched", () => {
      expect(deleteShaft(db, shaftKey(makeShaft()))).toBe(false);
    });
  });

  it("loads a catalog store", () => {
    saveShafts(db, [makeShaft(), makeMinimalShaft()]);
    const store = loadCatalog(db);
    expect(store.size).toBe(2);
    expect(store.get(shaftKey(makeMinimalShaft()))).toEqual(makeMinimalShaft());
  });

  it("rejects a row that breaks the schema", () => {
    db.prepare(
      "INSERT INTO shafts (manufacturer, model, club_type, flex, weight_grams) VALUES ('KBS', 'Tour', 'iron', 'stiff', 120)"
    ).run();
    expect(() => loadShafts(db)).toThrow(NormalizationError);
  });
});
