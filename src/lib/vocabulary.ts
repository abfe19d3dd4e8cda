import fs from "fs";
import path from "path";
import { z } from "zod";
import { config } from "./config";
import { VocabularyError } from "./errors";
import { Flex, ProfileLevel, TipStiffness } from "./types";

// ===== File Schema =====

const flexTable = z.record(z.string(), z.nativeEnum(Flex));
const profileTable = z.record(z.string(), z.nativeEnum(ProfileLevel));
const tipStiffTable = z.record(z.string(), z.nativeEnum(TipStiffness));

const sharedSchema = z
  .object({
    launch: profileTable.optional(),
    spin: profileTable.optional(),
    kickpoint: profileTable.optional(),
    tip_stiff: tipStiffTable.optional(),
  })
  .strict();

const vocabularySchema = z
  .object({
    manufacturer: z.string().trim().min(1),
    aliases: z.array(z.string().trim().min(1)).optional(),
    flex: flexTable,
    launch: profileTable.optional(),
    spin: profileTable.optional(),
    kickpoint: profileTable.optional(),
    tip_stiff: tipStiffTable.optional(),
  })
  .strict();

const vocabularyFileSchema = z
  .object({
    shared: sharedSchema.optional(),
    manufacturers: z.array(vocabularySchema),
  })
  .strict();

export type VocabularyInput = z.input<typeof vocabularySchema>;
export type SharedVocabularyInput = z.input<typeof sharedSchema>;

/**
 * A manufacturer's complete label tables. Lookup keys are cleaned labels
 * (see {@link cleanLabel}); anything not in a table is unmapped.
 */
export interface ManufacturerVocabulary {
  readonly manufacturer: string;
  readonly aliases: readonly string[];
  readonly flex: ReadonlyMap<string, Flex>;
  readonly launch: ReadonlyMap<string, ProfileLevel>;
  readonly spin: ReadonlyMap<string, ProfileLevel>;
  readonly kickpoint: ReadonlyMap<string, ProfileLevel>;
  readonly tip_stiff: ReadonlyMap<string, TipStiffness>;
}

export type VocabularyTableName = "flex" | "launch" | "spin" | "kickpoint" | "tip_stiff";

/** "  Mid / High " and "mid /  high" clean to the same key */
export function cleanLabel(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, " ");
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function buildTable<T>(
  label: string,
  issues: string[],
  ...tables: (Record<string, T> | undefined)[]
): ReadonlyMap<string, T> {
  const merged = new Map<string, T>();
  tables.forEach((table, layer) => {
    if (!table) return;
    const seen = new Map<string, string>();
    for (const [rawKey, value] of Object.entries(table)) {
      const key = cleanLabel(rawKey);
      const previous = seen.get(key);
      if (previous !== undefined && merged.get(key) !== value) {
        issues.push(`${label}: "${rawKey}" and "${previous}" clean to the same label with different values`);
        continue;
      }
      if (key === "") {
        issues.push(`${label}: empty label (layer ${layer})`);
        continue;
      }
      seen.set(key, rawKey);
      merged.set(key, value);
    }
  });
  return merged;
}

/**
 * Validate and freeze one manufacturer's vocabulary. Shared profile tables
 * sit underneath the manufacturer's own entries, which win on conflict.
 */
export function defineVocabulary(
  input: VocabularyInput,
  shared: SharedVocabularyInput = {}
): ManufacturerVocabulary {
  const parsedInput = vocabularySchema.safeParse(input);
  if (!parsedInput.success) throw new VocabularyError(formatIssues(parsedInput.error));
  const parsedShared = sharedSchema.safeParse(shared);
  if (!parsedShared.success) throw new VocabularyError(formatIssues(parsedShared.error));

  const v = parsedInput.data;
  const s = parsedShared.data;
  const issues: string[] = [];
  const prefix = v.manufacturer;

  const vocabulary: ManufacturerVocabulary = {
    manufacturer: v.manufacturer,
    aliases: Object.freeze([...(v.aliases ?? [])]),
    flex: buildTable(`${prefix}.flex`, issues, v.flex),
    launch: buildTable(`${prefix}.launch`, issues, s.launch, v.launch),
    spin: buildTable(`${prefix}.spin`, issues, s.spin, v.spin),
    kickpoint: buildTable(`${prefix}.kickpoint`, issues, s.kickpoint, v.kickpoint),
    tip_stiff: buildTable(`${prefix}.tip_stiff`, issues, s.tip_stiff, v.tip_stiff),
  };

  if (vocabulary.flex.size === 0) issues.push(`${prefix}.flex: table is empty`);
  if (issues.length > 0) throw new VocabularyError(issues);

  return Object.freeze(vocabulary);
}

// ===== Registry =====

export class VocabularyRegistry {
  private readonly byName = new Map<string, ManufacturerVocabulary>();
  private readonly entries: ManufacturerVocabulary[] = [];

  constructor(vocabularies: Iterable<ManufacturerVocabulary> = []) {
    for (const vocabulary of vocabularies) {
      this.register(vocabulary);
    }
  }

  register(vocabulary: ManufacturerVocabulary): void {
    const names = [vocabulary.manufacturer, ...vocabulary.aliases].map(cleanLabel);
    const conflicts = names
      .filter((name) => {
        const owner = this.byName.get(name);
        return owner !== undefined && owner !== vocabulary;
      })
      .map((name) => `"${name}" is already registered to ${this.byName.get(name)?.manufacturer}`);
    if (conflicts.length > 0) throw new VocabularyError(conflicts);

    for (const name of names) this.byName.set(name, vocabulary);
    if (!this.entries.includes(vocabulary)) this.entries.push(vocabulary);
  }

  /** Resolve by canonical name or alias, case-insensitively */
  get(manufacturer: string): ManufacturerVocabulary | undefined {
    return this.byName.get(cleanLabel(manufacturer));
  }

  manufacturers(): string[] {
    return this.entries.map((v) => v.manufacturer).sort();
  }

  all(): readonly ManufacturerVocabulary[] {
    return this.entries;
  }
}

/** Build a registry from the parsed contents of a vocabulary file */
export function parseVocabularyFile(data: unknown): VocabularyRegistry {
  const parsed = vocabularyFileSchema.safeParse(data);
  if (!parsed.success) throw new VocabularyError(formatIssues(parsed.error));

  const shared = parsed.data.shared ?? {};
  return new VocabularyRegistry(parsed.data.manufacturers.map((m) => defineVocabulary(m, shared)));
}

export function loadVocabularyRegistry(filePath: string = config.vocabularyPath): VocabularyRegistry {
  const resolved = path.resolve(process.cwd(), filePath);
  const text = fs.readFileSync(resolved, "utf8");

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new VocabularyError([`${resolved}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseVocabularyFile(data);
}
