import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { CatalogStore } from "./catalog";
import { config } from "./config";
import { sortShafts } from "./constraints";
import { shaftFromObject } from "./serialization";
import { SHAFT_FIELDS } from "./schema";
import { ShaftKey, ShaftSpec } from "./types";

export type CatalogDb = Database.Database;

/**
 * Open (or create) the catalog database and make sure the `shafts` table
 * exists. Pass ":memory:" for a throwaway database.
 */
export function openCatalogDb(dbPath: string = config.dbPath): CatalogDb {
  if (dbPath === ":memory:") {
    const db = new Database(dbPath);
    initSchema(db);
    return db;
  }

  const resolved = path.resolve(process.cwd(), dbPath);
  const dir = path.dirname(resolved);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(resolved);
  db.pragma("journal_mode = WAL");

  initSchema(db);
  return db;
}

function initSchema(db: CatalogDb): void {
  // Key columns compare case-insensitively, like store keys.
  // Absent generation is stored as '' so that it can take part in the key.
  db.exec(`
    CREATE TABLE IF NOT EXISTS shafts (
      manufacturer         TEXT NOT NULL COLLATE NOCASE,
      model                TEXT NOT NULL COLLATE NOCASE,
      generation           TEXT NOT NULL DEFAULT '' COLLATE NOCASE,
      club_type            TEXT NOT NULL,
      flex                 TEXT NOT NULL,
      weight_grams         REAL NOT NULL,
      length_inches        REAL,
      torque_degrees       REAL,
      launch               TEXT,
      spin                 TEXT,
      butt_diameter_inches REAL,
      tip_diameter_inches  REAL,
      tip_stiff            TEXT,
      kickpoint            TEXT,
      material             TEXT,
      msrp_usd             REAL,
      PRIMARY KEY (manufacturer, model, generation, club_type, flex)
    );
  `);
}

const COLUMNS = SHAFT_FIELDS.join(", ");
const PLACEHOLDERS = SHAFT_FIELDS.map((f) => `@${f}`).join(", ");

function toParams(spec: ShaftSpec): Record<string, string | number | null> {
  return { ...spec, generation: spec.generation ?? "" };
}

function keyParams(key: ShaftKey): Record<string, string> {
  return {
    manufacturer: key.manufacturer,
    model: key.model,
    generation: key.generation ?? "",
    club_type: key.club_type,
    flex: key.flex,
  };
}

/** Replace the whole table with `specs` in one transaction */
export function saveShafts(db: CatalogDb, specs: readonly ShaftSpec[]): void {
  const insert = db.prepare(`INSERT INTO shafts (${COLUMNS}) VALUES (${PLACEHOLDERS})`);
  const write = db.transaction((rows: readonly ShaftSpec[]) => {
    db.prepare("DELETE FROM shafts").run();
    for (const spec of rows) insert.run(toParams(spec));
  });
  write(specs);
  console.log(`[db] Saved ${specs.length} shafts`);
}

export function upsertShaft(db: CatalogDb, spec: ShaftSpec): void {
  db.prepare(`INSERT OR REPLACE INTO shafts (${COLUMNS}) VALUES (${PLACEHOLDERS})`).run(toParams(spec));
}

/** Returns false when no row had the key */
export function deleteShaft(db: CatalogDb, key: ShaftKey): boolean {
  const result = db
    .prepare(
      `DELETE FROM shafts
       WHERE manufacturer = @manufacturer AND model = @model AND generation = @generation
         AND club_type = @club_type AND flex = @flex`
    )
    .run(keyParams(key));
  return result.changes > 0;
}

/**
 * Every stored shaft in catalog order. Rows are re-validated on the way out,
 * so a hand-edited table that breaks the schema throws NormalizationError.
 */
export function loadShafts(db: CatalogDb): ShaftSpec[] {
  const rows: unknown[] = db.prepare(`SELECT ${COLUMNS} FROM shafts`).all();
  const specs = rows.map((row, i) => {
    if (typeof row !== "object" || row === null) {
      throw new TypeError(`Unexpected row ${i} from shafts table`);
    }
    return shaftFromObject(row);
  });
  return sortShafts(specs);
}

export function loadCatalog(db: CatalogDb): CatalogStore {
  return CatalogStore.from(loadShafts(db));
}
