import { SchemaError, type SchemaIssue } from './errors.js';
import { DEFAULT_ORGANIZATION_KEY, FIDES_KEY_PATTERN } from './fides_key.js';
import {
  DATA_SUBJECT_RIGHTS,
  LEGAL_BASES,
  RIGHTS_STRATEGIES,
  SPECIAL_CATEGORIES,
  type DataSubjectEntry,
  type DataSubjectRight,
  type DataSubjectRights,
  type DataUseEntry,
  type TaxonomyEntry,
  type TaxonomyEntryByKind,
  type TaxonomyKind
} from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function uniqueStrings(values: string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * Reads typed fields off one raw record. Every problem is reported to the shared
 * issue list; the returned placeholder is never used once an issue exists.
 */
class RecordReader {
  constructor(
    private readonly record: Record<string, unknown>,
    private readonly index: number,
    private readonly issues: SchemaIssue[]
  ) {}

  get fidesKey(): string | undefined {
    const value = this.record.fides_key;
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }

  raw(field: string): unknown {
    return this.record[field];
  }

  addIssue(field: string, message: string): void {
    this.issues.push({ index: this.index, fidesKey: this.fidesKey, field, message });
  }

  requiredString(field: string): string {
    const value = this.record[field];
    if (isAbsent(value)) {
      this.addIssue(field, 'is required');
      return '';
    }
    if (typeof value !== 'string') {
      this.addIssue(field, `must be a string, got ${typeof value}`);
      return '';
    }
    if (value.trim().length === 0) {
      this.addIssue(field, 'must not be empty');
      return '';
    }
    return value;
  }

  optionalString(field: string): string | null {
    const value = this.record[field];
    if (isAbsent(value)) {
      return null;
    }
    if (typeof value !== 'string') {
      this.addIssue(field, `must be a string, got ${typeof value}`);
      return null;
    }
    return value;
  }

  key(field: string, value: string | null): string | null {
    if (value !== null && value.length > 0 && !FIDES_KEY_PATTERN.test(value)) {
      this.addIssue(field, `'${value}' is not a valid fides_key`);
    }
    return value;
  }

  boolean(field: string, fallback: boolean): boolean {
    return this.optionalBoolean(field) ?? fallback;
  }

  optionalBoolean(field: string): boolean | null {
    const value = this.record[field];
    if (isAbsent(value)) {
      return null;
    }
    if (typeof value !== 'boolean') {
      this.addIssue(field, `must be a boolean, got ${typeof value}`);
      return null;
    }
    return value;
  }

  stringList(field: string): string[] | null {
    const value = this.record[field];
    if (isAbsent(value)) {
      return null;
    }
    if (!Array.isArray(value)) {
      this.addIssue(field, 'must be a list of strings');
      return null;
    }
    const strings = value.filter((item): item is string => typeof item === 'string');
    if (strings.length !== value.length) {
      this.addIssue(field, 'must contain only strings');
      return null;
    }
    return uniqueStrings(strings);
  }

  oneOf<T extends string>(field: string, value: unknown, allowed: readonly T[]): T | null {
    if (isAbsent(value)) {
      return null;
    }
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.addIssue(field, `must be one of ${allowed.join(', ')}, got '${String(value)}'`);
      return null;
    }
    return match;
  }
}

function readBaseEntry(reader: RecordReader, hierarchical = true): TaxonomyEntry {
  const fidesKey = reader.key('fides_key', reader.requiredString('fides_key')) ?? '';
  const organization =
    reader.key('organization_fides_key', reader.optionalString('organization_fides_key')) ??
    DEFAULT_ORGANIZATION_KEY;
  const parentKey = hierarchical
    ? reader.key('parent_key', reader.optionalString('parent_key'))
    : null;

  if (parentKey !== null && parentKey === fidesKey) {
    reader.addIssue('parent_key', 'must not reference the entry itself');
  }

  return {
    fides_key: fidesKey,
    organization_fides_key: organization,
    name: reader.requiredString('name'),
    description: reader.requiredString('description'),
    parent_key: parentKey,
    is_default: reader.boolean('is_default', false),
    tags: reader.stringList('tags')
  };
}

function readDataUse(reader: RecordReader): DataUseEntry {
  const base = readBaseEntry(reader);
  const legalBasis = reader.oneOf('legal_basis', reader.raw('legal_basis'), LEGAL_BASES);
  const legitimateInterest =
    legalBasis === 'Legitimate Interests' || reader.boolean('legitimate_interest', false);
  const assessment = reader.optionalString('legitimate_interest_impact_assessment');

  if (assessment !== null && !URL.canParse(assessment)) {
    reader.addIssue('legitimate_interest_impact_assessment', `'${assessment}' is not a valid URL`);
  }
  if (legitimateInterest && assessment === null) {
    reader.addIssue(
      'legitimate_interest_impact_assessment',
      'is required when the legal basis is a legitimate interest'
    );
  }

  return {
    ...base,
    legal_basis: legalBasis,
    special_category: reader.oneOf(
      'special_category',
      reader.raw('special_category'),
      SPECIAL_CATEGORIES
    ),
    recipients: reader.stringList('recipients'),
    legitimate_interest: legitimateInterest,
    legitimate_interest_impact_assessment: assessment
  };
}

function readRights(reader: RecordReader): DataSubjectRights | null {
  const value = reader.raw('rights');
  if (isAbsent(value)) {
    return null;
  }
  if (!isRecord(value)) {
    reader.addIssue('rights', 'must be a mapping with a strategy');
    return null;
  }

  const strategy = reader.oneOf('rights.strategy', value.strategy, RIGHTS_STRATEGIES);
  if (strategy === null) {
    if (isAbsent(value.strategy)) {
      reader.addIssue('rights.strategy', 'is required');
    }
    return null;
  }

  let rights: DataSubjectRight[] | null = null;
  if (Array.isArray(value.values)) {
    rights = [];
    for (const item of value.values) {
      const right = reader.oneOf('rights.values', item, DATA_SUBJECT_RIGHTS);
      if (right !== null && !rights.includes(right)) {
        rights.push(right);
      }
    }
  } else if (!isAbsent(value.values)) {
    reader.addIssue('rights.values', 'must be a list of rights');
  }

  if ((strategy === 'INCLUDE' || strategy === 'EXCLUDE') && (rights === null || rights.length === 0)) {
    reader.addIssue('rights.values', `must list at least one right when strategy is ${strategy}`);
  }

  return { strategy, values: rights };
}

function readDataSubject(reader: RecordReader): DataSubjectEntry {
  // Data subjects are flat; a parent_key is dropped like any unknown field.
  const base = readBaseEntry(reader, false);

  return {
    ...base,
    rights: readRights(reader),
    automated_decisions_or_profiling: reader.optionalBoolean('automated_decisions_or_profiling')
  };
}

type EntryReaders = {
  [K in TaxonomyKind]: (reader: RecordReader) => TaxonomyEntryByKind[K];
};

const ENTRY_READERS: EntryReaders = {
  data_category: (reader) => readBaseEntry(reader),
  data_use: readDataUse,
  data_subject: readDataSubject,
  data_qualifier: (reader) => readBaseEntry(reader)
};

function readEntry<K extends TaxonomyKind>(
  record: unknown,
  index: number,
  kind: K,
  issues: SchemaIssue[]
): TaxonomyEntryByKind[K] | null {
  if (!isRecord(record)) {
    issues.push({ index, field: 'record', message: 'must be a mapping of fields' });
    return null;
  }

  return ENTRY_READERS[kind](new RecordReader(record, index, issues));
}

/**
 * Validates a single raw record against the field schema of `kind`.
 */
export function parseTaxonomyEntry<K extends TaxonomyKind>(
  record: unknown,
  kind: K,
  source: string = kind
): TaxonomyEntryByKind[K] {
  const issues: SchemaIssue[] = [];
  const entry = readEntry(record, 0, kind, issues);
  if (entry === null || issues.length > 0) {
    throw new SchemaError(source, issues);
  }
  return entry;
}

/**
 * Validates a batch of raw records. All issues across the batch are reported
 * together in one SchemaError.
 */
export function parseTaxonomyEntries<K extends TaxonomyKind>(
  records: readonly unknown[],
  kind: K,
  source: string = kind
): Array<TaxonomyEntryByKind[K]> {
  const issues: SchemaIssue[] = [];
  const entries: Array<TaxonomyEntryByKind[K]> = [];

  records.forEach((record, index) => {
    const entry = readEntry(record, index, kind, issues);
    if (entry !== null) {
      entries.push(entry);
    }
  });

  if (issues.length > 0) {
    throw new SchemaError(source, issues);
  }
  return entries;
}
