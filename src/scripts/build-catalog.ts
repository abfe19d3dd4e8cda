import fs from "fs";
import path from "path";
import { CatalogStore } from "../lib/catalog";
import { config } from "../lib/config";
import { openCatalogDb, saveShafts } from "../lib/db";
import { ingestRawRecords } from "../lib/ingest";
import { CLUB_TYPE_MAP } from "../lib/normalization-maps";
import { exportShafts, parseCSVRecords } from "../lib/serialization";
import { catalogStats } from "../lib/stats";
import { ClubType } from "../lib/types";
import { loadVocabularyRegistry } from "../lib/vocabulary";

interface CliArgs {
  dir: string;
  db: string;
  vocabulary: string;
  clubType?: ClubType;
  exportPath?: string;
  replace: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    dir: config.rawDataDir,
    db: config.dbPath,
    vocabulary: config.vocabularyPath,
    replace: false,
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    switch (args[i]) {
      case "--dir":
        if (next) parsed.dir = next;
        i++;
        break;
      case "--db":
        if (next) parsed.db = next;
        i++;
        break;
      case "--vocabulary":
        if (next) parsed.vocabulary = next;
        i++;
        break;
      case "--club-type": {
        const clubType: ClubType | undefined = next ? CLUB_TYPE_MAP[next.trim().toLowerCase()] : undefined;
        if (!clubType) throw new Error(`Unknown club type: ${next ?? "(missing)"}`);
        parsed.clubType = clubType;
        i++;
        break;
      }
      case "--export":
        if (next) parsed.exportPath = next;
        i++;
        break;
      case "--replace":
        parsed.replace = true;
        break;
      default:
        throw new Error(`Unknown argument: ${args[i]}`);
    }
  }
  return parsed;
}

function main() {
  const args = parseArgs(process.argv.slice(2));

  const registry = loadVocabularyRegistry(args.vocabulary);
  console.log(`[build-catalog] Vocabularies: ${registry.manufacturers().join(", ")}`);

  const files = fs
    .readdirSync(args.dir)
    .filter((f) => f.toLowerCase().endsWith(".csv"))
    .sort();
  if (files.length === 0) {
    console.error(`[build-catalog] No CSV files in ${args.dir}`);
    process.exit(1);
  }

  const store = new CatalogStore();
  let totalFailed = 0;

  for (const file of files) {
    const text = fs.readFileSync(path.join(args.dir, file), "utf-8");
    const report = ingestRawRecords(store, parseCSVRecords(text), registry, {
      clubType: args.clubType,
      replaceExisting: args.replace,
      source: file,
    });
    totalFailed += report.failed;
  }

  const db = openCatalogDb(args.db);
  try {
    saveShafts(db, store.all());
  } finally {
    db.close();
  }

  if (args.exportPath) {
    const format = args.exportPath.toLowerCase().endsWith(".json") ? "json" : "csv";
    fs.writeFileSync(args.exportPath, exportShafts(store.all(), format));
    console.log(`[build-catalog] Exported ${store.size} shafts to ${args.exportPath}`);
  }

  const stats = catalogStats(store.all());
  console.log(`\n=== Summary ===`);
  console.log(`Shafts: ${stats.totalShafts}`);
  console.log(`Manufacturers: ${stats.manufacturers}`);
  console.log(`Models: ${stats.models}`);
  console.log(`Club types: ${JSON.stringify(stats.clubTypes)}`);
  console.log(`Flex: ${JSON.stringify(stats.flexDistribution)}`);
  if (stats.weightRange) {
    const { min, max, mean } = stats.weightRange;
    console.log(`Weight: ${min}–${max} g (mean ${mean})`);
  }
  console.log(`Failed rows: ${totalFailed}`);

  process.exit(totalFailed > 0 ? 2 : 0);
}

try {
  main();
} catch (err) {
  console.error("[build-catalog] Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
}
