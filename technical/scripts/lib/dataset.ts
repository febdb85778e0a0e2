import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { SchemaError } from './errors.js';
import { listFiles, stableJson, toPosixRelative } from './io.js';
import { isRecord } from './schema.js';
import { type LineageMode, loadTaxonomy, mergeTaxonomies, type Taxonomy } from './taxonomy.js';
import {
  COMMON_FIELD_ORDER,
  isTaxonomyKind,
  KIND_FIELD_ORDER,
  TAXONOMY_KINDS,
  type TaxonomyEntry,
  type TaxonomyEntryByKind,
  type TaxonomyKind
} from './types.js';

export type RawTaxonomyRecords = Partial<Record<TaxonomyKind, unknown[]>>;

export type TaxonomySet = {
  [K in TaxonomyKind]?: Taxonomy<TaxonomyEntryByKind[K]>;
};

export interface DirectoryLoadOptions {
  lineage?: LineageMode;
  /** Loaded taxonomies the directory extends, kind by kind. */
  base?: TaxonomySet;
}

const TAXONOMY_FILE_PATTERNS = ['*.yml', '*.yaml'];

function findPackageRoot(startDir: string): string {
  let current = startDir;
  while (!fs.pathExistsSync(path.join(current, 'library', 'taxonomy'))) {
    const parent = path.dirname(current);
    if (parent === current) {
      return startDir;
    }
    current = parent;
  }
  return current;
}

export const DEFAULT_TAXONOMY_DIR = path.join(
  findPackageRoot(path.dirname(fileURLToPath(import.meta.url))),
  'library',
  'taxonomy'
);

/**
 * Parses one dataset document: a mapping from taxonomy kind to a list of records.
 */
export function parseTaxonomyDocument(text: string, source: string): RawTaxonomyRecords {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${source}: invalid YAML: ${reason}`, { cause: error });
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (!isRecord(document)) {
    throw new SchemaError(source, [
      { index: 0, field: 'document', message: 'must be a mapping of taxonomy kinds to records' }
    ]);
  }

  const records: RawTaxonomyRecords = {};
  for (const [key, value] of Object.entries(document)) {
    if (!isTaxonomyKind(key)) {
      throw new SchemaError(source, [
        {
          index: 0,
          field: key,
          message: `is not a taxonomy kind; expected one of ${TAXONOMY_KINDS.join(', ')}`
        }
      ]);
    }
    if (value === null) {
      records[key] = [];
      continue;
    }
    if (!Array.isArray(value)) {
      throw new SchemaError(source, [{ index: 0, field: key, message: 'must be a list of records' }]);
    }
    records[key] = value;
  }

  return records;
}

export async function readTaxonomyFile(filePath: string): Promise<RawTaxonomyRecords> {
  const raw = await fs.readFile(filePath, 'utf8');
  return parseTaxonomyDocument(raw, toPosixRelative(filePath));
}

export interface TaxonomyDirectoryRecords {
  records: RawTaxonomyRecords;
  sources: Partial<Record<TaxonomyKind, string[]>>;
}

/**
 * Reads every top-level YAML file of `dir` in name order and concatenates the
 * records of each kind.
 */
export async function readTaxonomyDirectory(dir: string): Promise<TaxonomyDirectoryRecords> {
  const files = await listFiles(dir, TAXONOMY_FILE_PATTERNS);
  const records: RawTaxonomyRecords = {};
  const sources: Partial<Record<TaxonomyKind, string[]>> = {};

  for (const file of files) {
    const filePath = path.join(dir, file);
    const document = await readTaxonomyFile(filePath);

    for (const kind of TAXONOMY_KINDS) {
      const kindRecords = document[kind];
      if (!kindRecords) {
        continue;
      }
      records[kind] = [...(records[kind] ?? []), ...kindRecords];
      sources[kind] = [...(sources[kind] ?? []), toPosixRelative(filePath)];
    }
  }

  return { records, sources };
}

function loadKindInto<K extends TaxonomyKind>(
  set: { [P in K]?: Taxonomy<TaxonomyEntryByKind[P]> },
  kind: K,
  records: readonly unknown[],
  source: string,
  options: DirectoryLoadOptions
): void {
  set[kind] = loadTaxonomy(records, kind, {
    source,
    lineage: options.lineage,
    base: options.base?.[kind]
  });
}

function copyKindInto<K extends TaxonomyKind>(
  set: TaxonomySet,
  kind: K,
  base: TaxonomySet | undefined
): void {
  const taxonomy = base?.[kind];
  if (taxonomy) {
    set[kind] = taxonomy;
  }
}

export function loadTaxonomyRecords(
  records: RawTaxonomyRecords,
  options: DirectoryLoadOptions & { sources?: Partial<Record<TaxonomyKind, string[]>> } = {}
): TaxonomySet {
  const set: TaxonomySet = {};

  for (const kind of TAXONOMY_KINDS) {
    const kindRecords = records[kind];
    if (!kindRecords) {
      copyKindInto(set, kind, options.base);
      continue;
    }
    const source = options.sources?.[kind]?.join(', ') ?? kind;
    loadKindInto(set, kind, kindRecords, source, options);
  }

  return set;
}

export async function loadTaxonomyDirectory(
  dir: string,
  options: DirectoryLoadOptions = {}
): Promise<TaxonomySet> {
  const { records, sources } = await readTaxonomyDirectory(dir);
  return loadTaxonomyRecords(records, { ...options, sources });
}

export async function loadDefaultTaxonomy(options: DirectoryLoadOptions = {}): Promise<TaxonomySet> {
  return loadTaxonomyDirectory(DEFAULT_TAXONOMY_DIR, options);
}

function mergeKindInto<K extends TaxonomyKind>(
  merged: { [P in K]?: Taxonomy<TaxonomyEntryByKind[P]> },
  kind: K,
  base: TaxonomySet,
  extension: TaxonomySet,
  lineage: LineageMode | undefined
): void {
  const baseTaxonomy = base[kind];
  const extensionTaxonomy = extension[kind];

  if (baseTaxonomy && extensionTaxonomy) {
    merged[kind] = mergeTaxonomies(baseTaxonomy, extensionTaxonomy, { lineage });
  } else {
    merged[kind] = baseTaxonomy ?? extensionTaxonomy;
  }
}

/**
 * Kind-by-kind `mergeTaxonomies` for sets that are each complete on their own.
 */
export function mergeTaxonomySets(
  base: TaxonomySet,
  extension: TaxonomySet,
  options: DirectoryLoadOptions = {}
): TaxonomySet {
  const merged: TaxonomySet = {};
  for (const kind of TAXONOMY_KINDS) {
    if (base[kind] || extension[kind]) {
      mergeKindInto(merged, kind, base, extension, options.lineage);
    }
  }
  return merged;
}

/**
 * Plain record with fields in dataset order. Data subjects carry no parent_key.
 */
export function toOrderedRecord(entry: TaxonomyEntry, kind: TaxonomyKind): Record<string, unknown> {
  const values = new Map<string, unknown>(Object.entries(entry));
  const fields = [...COMMON_FIELD_ORDER, ...KIND_FIELD_ORDER[kind]].filter(
    (field) => kind !== 'data_subject' || field !== 'parent_key'
  );
  const ordered: Record<string, unknown> = {};

  for (const field of fields) {
    if (values.has(field)) {
      ordered[field] = values.get(field);
    }
  }

  return ordered;
}

function toDocument(taxonomy: Taxonomy<TaxonomyEntry>): Record<string, unknown> {
  return {
    [taxonomy.kind]: taxonomy.toRecords().map((entry) => toOrderedRecord(entry, taxonomy.kind))
  };
}

export function renderTaxonomyYaml(taxonomy: Taxonomy<TaxonomyEntry>): string {
  return stringifyYaml(toDocument(taxonomy), { indentSeq: false });
}

export function renderTaxonomyJson(taxonomy: Taxonomy<TaxonomyEntry>): string {
  return stableJson(toDocument(taxonomy));
}
