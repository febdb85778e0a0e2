import {
  CycleError,
  DanglingReferenceError,
  DuplicateKeyError,
  LineageError,
  NotFoundError
} from './errors.js';
import { findLineageMismatches } from './lineage.js';
import { parseTaxonomyEntries } from './schema.js';
import type {
  AnyTaxonomyEntry,
  TaxonomyEntry,
  TaxonomyEntryByKind,
  TaxonomyKind
} from './types.js';

export type LineageMode = 'off' | 'strict';

export interface BuildOptions {
  kind: TaxonomyKind;
  /** `strict` rejects entries whose parent_key differs from their dotted fides_key prefix. */
  lineage?: LineageMode;
}

export interface LoadOptions<E extends TaxonomyEntry = TaxonomyEntry> {
  lineage?: LineageMode;
  source?: string;
  /**
   * Taxonomy the records extend. Its entries are part of the result, so the
   * new records may use them as parents.
   */
  base?: Taxonomy<E>;
}

function byKey(a: TaxonomyEntry, b: TaxonomyEntry): number {
  return a.fides_key.localeCompare(b.fides_key);
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null) {
    return;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
}

/** Detached copy with every nested list and mapping frozen. */
function freezeEntry<E extends TaxonomyEntry>(entry: E): E {
  const copy = structuredClone(entry);
  deepFreeze(copy);
  return copy;
}

function assertUniqueKeys(entries: readonly TaxonomyEntry[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const entry of entries) {
    if (seen.has(entry.fides_key)) {
      duplicates.add(entry.fides_key);
    }
    seen.add(entry.fides_key);
  }

  if (duplicates.size > 0) {
    throw new DuplicateKeyError(Array.from(duplicates).sort((a, b) => a.localeCompare(b)));
  }
}

function assertParentsExist(entries: readonly TaxonomyEntry[], byFidesKey: Map<string, TaxonomyEntry>): void {
  for (const entry of entries) {
    if (entry.parent_key !== null && !byFidesKey.has(entry.parent_key)) {
      throw new DanglingReferenceError(entry.parent_key, entry.fides_key);
    }
  }
}

/**
 * Walks each parent chain once. Keys already proven to reach a root are
 * skipped, so the whole pass is linear in the number of entries.
 */
function assertAcyclic(entries: readonly TaxonomyEntry[], byFidesKey: Map<string, TaxonomyEntry>): void {
  const terminated = new Set<string>();

  for (const entry of entries) {
    const visited = new Set<string>();
    const trail: string[] = [];
    let current: TaxonomyEntry | undefined = entry;

    while (current && !terminated.has(current.fides_key)) {
      if (visited.has(current.fides_key)) {
        throw new CycleError(trail.slice(trail.indexOf(current.fides_key)));
      }
      visited.add(current.fides_key);
      trail.push(current.fides_key);
      current = current.parent_key === null ? undefined : byFidesKey.get(current.parent_key);
    }

    for (const key of trail) {
      terminated.add(key);
    }
  }
}

/**
 * Immutable, validated set of taxonomy entries of one kind with a precomputed
 * parent -> children index. Only `buildTaxonomy` constructs it; the class is
 * exported as a type.
 */
class Taxonomy<E extends TaxonomyEntry = TaxonomyEntry> {
  readonly kind: TaxonomyKind;
  readonly size: number;
  private readonly byFidesKey: ReadonlyMap<string, E>;
  private readonly childIndex: ReadonlyMap<string, readonly E[]>;
  private readonly sorted: readonly E[];

  constructor(kind: TaxonomyKind, entries: readonly E[]) {
    const sorted = entries.map((entry) => freezeEntry(entry)).sort(byKey);
    const byFidesKey = new Map<string, E>();
    const childIndex = new Map<string, E[]>();

    for (const entry of sorted) {
      byFidesKey.set(entry.fides_key, entry);
    }
    for (const entry of sorted) {
      if (entry.parent_key === null) {
        continue;
      }
      const siblings = childIndex.get(entry.parent_key);
      if (siblings) {
        siblings.push(entry);
      } else {
        childIndex.set(entry.parent_key, [entry]);
      }
    }

    this.kind = kind;
    this.size = sorted.length;
    this.byFidesKey = byFidesKey;
    this.childIndex = childIndex;
    this.sorted = Object.freeze(sorted);
    Object.freeze(this);
  }

  has(key: string): boolean {
    return this.byFidesKey.has(key);
  }

  get(key: string): E {
    const entry = this.byFidesKey.get(key);
    if (!entry) {
      throw new NotFoundError(key);
    }
    return entry;
  }

  entries(): readonly E[] {
    return this.sorted;
  }

  keys(): string[] {
    return this.sorted.map((entry) => entry.fides_key);
  }

  roots(): E[] {
    return this.sorted.filter((entry) => entry.parent_key === null);
  }

  childrenOf(key: string): ReadonlySet<E> {
    this.get(key);
    return new Set(this.childIndex.get(key) ?? []);
  }

  /**
   * Lineage of `key` from its root down to its direct parent. Empty for roots.
   */
  ancestorsOf(key: string): E[] {
    const ancestors: E[] = [];
    let parentKey = this.get(key).parent_key;

    while (parentKey !== null) {
      const parent = this.get(parentKey);
      ancestors.push(parent);
      parentKey = parent.parent_key;
    }

    return ancestors.reverse();
  }

  pathOf(key: string): E[] {
    return [...this.ancestorsOf(key), this.get(key)];
  }

  depthOf(key: string): number {
    return this.ancestorsOf(key).length;
  }

  descendantsOf(key: string): ReadonlySet<E> {
    this.get(key);
    const descendants = new Set<E>();
    const stack = [...(this.childIndex.get(key) ?? [])];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      descendants.add(entry);
      stack.push(...(this.childIndex.get(entry.fides_key) ?? []));
    }

    return descendants;
  }

  /**
   * True when `ancestorKey` is a strict ancestor of `candidateKey`.
   */
  isDescendant(candidateKey: string, ancestorKey: string): boolean {
    this.get(ancestorKey);
    return this.ancestorsOf(candidateKey).some((entry) => entry.fides_key === ancestorKey);
  }

  defaults(): E[] {
    return this.sorted.filter((entry) => entry.is_default);
  }

  custom(): E[] {
    return this.sorted.filter((entry) => !entry.is_default);
  }

  toRecords(): E[] {
    return this.sorted.map((entry) => structuredClone(entry));
  }
}

export type { Taxonomy };

/**
 * Checks the global invariants of schema-valid entries: unique keys, parents
 * that exist, no cycles and, when requested, dotted-key lineage.
 */
export function buildTaxonomy<E extends TaxonomyEntry>(
  entries: readonly E[],
  options: BuildOptions
): Taxonomy<E> {
  assertUniqueKeys(entries);

  const byFidesKey = new Map<string, TaxonomyEntry>(entries.map((entry) => [entry.fides_key, entry]));
  assertParentsExist(entries, byFidesKey);
  assertAcyclic(entries, byFidesKey);

  if (options.lineage === 'strict') {
    const mismatches = findLineageMismatches(entries);
    if (mismatches.length > 0) {
      throw new LineageError(mismatches);
    }
  }

  return new Taxonomy(options.kind, entries);
}

export function loadTaxonomy(records: readonly unknown[]): Taxonomy<TaxonomyEntry>;
export function loadTaxonomy<K extends TaxonomyKind>(
  records: readonly unknown[],
  kind: K,
  options?: LoadOptions<TaxonomyEntryByKind[K]>
): Taxonomy<TaxonomyEntryByKind[K]>;
export function loadTaxonomy(
  records: readonly unknown[],
  kind: TaxonomyKind = 'data_category',
  options: LoadOptions<AnyTaxonomyEntry> = {}
): Taxonomy<AnyTaxonomyEntry> {
  const { base } = options;
  if (base && base.kind !== kind) {
    throw new Error(`Cannot extend a ${base.kind} taxonomy with ${kind} records`);
  }

  const entries = parseTaxonomyEntries(records, kind, options.source ?? kind);
  return buildTaxonomy([...(base ? base.entries() : []), ...entries], {
    kind,
    lineage: options.lineage
  });
}

/**
 * Combines a base taxonomy (typically the shipped defaults) with an extension.
 * Extension entries may hang off base entries; shared keys are rejected.
 */
export function mergeTaxonomies<E extends TaxonomyEntry>(
  base: Taxonomy<E>,
  extension: Taxonomy<E>,
  options: Pick<BuildOptions, 'lineage'> = {}
): Taxonomy<E> {
  if (base.kind !== extension.kind) {
    throw new Error(`Cannot merge a ${extension.kind} taxonomy into a ${base.kind} taxonomy`);
  }

  return buildTaxonomy([...base.entries(), ...extension.entries()], {
    kind: base.kind,
    lineage: options.lineage
  });
}
