import { CatalogStore } from "./catalog";
import { DuplicateKeyError, NormalizationError } from "./errors";
import { normalizeRecord, NormalizeOptions } from "./normalization";
import { keyString } from "./schema";
import { RawShaftRecord } from "./types";
import { VocabularyRegistry } from "./vocabulary";

export interface IngestOptions extends NormalizeOptions {
  /** Overwrite a stored shaft with the same key instead of failing the row */
  replaceExisting?: boolean;
  /** Log label, usually the source file */
  source?: string;
}

export interface IngestFailure {
  index: number;
  error: NormalizationError | DuplicateKeyError;
}

export interface IngestReport {
  inserted: number;
  replaced: number;
  failed: number;
  failures: IngestFailure[];
}

/**
 * Normalize raw rows and add them to the store. A row that fails to
 * normalize, or whose key is already taken, is reported and skipped.
 */
export function ingestRawRecords(
  store: CatalogStore,
  raws: readonly RawShaftRecord[],
  registry: VocabularyRegistry,
  options: IngestOptions = {}
): IngestReport {
  const report: IngestReport = { inserted: 0, replaced: 0, failed: 0, failures: [] };
  const label = options.source ? `[ingest] ${options.source}:` : "[ingest]";

  raws.forEach((raw, index) => {
    try {
      const spec = normalizeRecord(raw, registry, options);
      if (store.has(spec)) {
        if (!options.replaceExisting) throw new DuplicateKeyError(keyString(spec));
        store.replace(spec, spec);
        report.replaced++;
      } else {
        store.insert(spec);
        report.inserted++;
      }
    } catch (err) {
      if (!(err instanceof NormalizationError || err instanceof DuplicateKeyError)) throw err;
      report.failures.push({ index, error: err });
      report.failed++;
      console.warn(`${label} row ${index} skipped: ${err.message}`);
    }
  });

  console.log(
    `${label} ${raws.length} rows: ${report.inserted} inserted, ${report.replaced} replaced, ${report.failed} failed`
  );
  return report;
}
