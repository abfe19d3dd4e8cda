import { filterShafts, sortShafts } from "./constraints";
import { DuplicateKeyError, NotFoundError } from "./errors";
import { keyString, validateShaftSpec } from "./schema";
import { FilterSpec, ShaftKey, ShaftSpec } from "./types";

/**
 * In-memory shaft catalog.
 *
 * Writes never touch the current map: each one builds a new map and swaps a
 * single reference, so a reader holding a snapshot sees either the state
 * before a write or after it. Stored records are frozen.
 */
export class CatalogStore {
  private records: ReadonlyMap<string, ShaftSpec> = new Map();
  private sorted: readonly ShaftSpec[] | null = null;

  static from(specs: Iterable<ShaftSpec>): CatalogStore {
    const store = new CatalogStore();
    for (const spec of specs) store.insert(spec);
    return store;
  }

  get size(): number {
    return this.records.size;
  }

  /** Throws NormalizationError for a record that breaks the schema */
  insert(spec: ShaftSpec): void {
    validateShaftSpec(spec);
    const key = keyString(spec);
    if (this.records.has(key)) throw new DuplicateKeyError(key);

    const next = new Map(this.records);
    next.set(key, freeze(spec));
    this.swap(next);
  }

  /** Swap the record at `key` for `spec`; the new record may carry a new key */
  replace(key: ShaftKey, spec: ShaftSpec): void {
    const oldKey = keyString(key);
    if (!this.records.has(oldKey)) throw new NotFoundError(oldKey);

    validateShaftSpec(spec);
    const newKey = keyString(spec);
    if (newKey !== oldKey && this.records.has(newKey)) throw new DuplicateKeyError(newKey);

    const next = new Map(this.records);
    next.delete(oldKey);
    next.set(newKey, freeze(spec));
    this.swap(next);
  }

  remove(key: ShaftKey): ShaftSpec {
    const k = keyString(key);
    const existing = this.records.get(k);
    if (!existing) throw new NotFoundError(k);

    const next = new Map(this.records);
    next.delete(k);
    this.swap(next);
    return existing;
  }

  get(key: ShaftKey): ShaftSpec {
    const k = keyString(key);
    const spec = this.records.get(k);
    if (!spec) throw new NotFoundError(k);
    return spec;
  }

  has(key: ShaftKey): boolean {
    return this.records.has(keyString(key));
  }

  /** Every record, in catalog order */
  all(): readonly ShaftSpec[] {
    if (this.sorted === null) {
      this.sorted = Object.freeze(sortShafts([...this.records.values()]));
    }
    return this.sorted;
  }

  /** Records matching every constraint, in catalog order. Never throws on no match. */
  query(filter: FilterSpec = {}): ShaftSpec[] {
    return filterShafts(this.all(), filter);
  }

  manufacturers(): string[] {
    return [...new Set(this.all().map((s) => s.manufacturer))].sort();
  }

  private swap(next: ReadonlyMap<string, ShaftSpec>): void {
    this.records = next;
    this.sorted = null;
  }
}

function freeze(spec: ShaftSpec): ShaftSpec {
  return Object.isFrozen(spec) ? spec : Object.freeze({ ...spec });
}
