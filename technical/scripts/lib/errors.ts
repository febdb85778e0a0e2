export type TaxonomyErrorCode =
  | 'schema'
  | 'duplicate_key'
  | 'dangling_reference'
  | 'cycle'
  | 'lineage'
  | 'not_found';

/**
 * Base class for every failure raised while loading or querying a taxonomy.
 * `keys` always names the offending fides_key(s) so callers can filter or report.
 */
export class TaxonomyError extends Error {
  readonly code: TaxonomyErrorCode;
  readonly keys: readonly string[];

  constructor(code: TaxonomyErrorCode, message: string, keys: readonly string[]) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.keys = Object.freeze([...keys]);
  }
}

export interface SchemaIssue {
  index: number;
  fidesKey?: string;
  field: string;
  message: string;
}

function formatIssue(issue: SchemaIssue): string {
  const subject = issue.fidesKey ? `'${issue.fidesKey}'` : `#${issue.index}`;
  return `record ${subject}: ${issue.field} ${issue.message}`;
}

export class SchemaError extends TaxonomyError {
  readonly source: string;
  readonly issues: readonly SchemaIssue[];

  constructor(source: string, issues: readonly SchemaIssue[]) {
    const lines = issues.map((issue) => `- ${formatIssue(issue)}`);
    super(
      'schema',
      `${source}: ${issues.length} invalid field(s)\n${lines.join('\n')}`,
      Array.from(
        new Set(
          issues
            .map((issue) => issue.fidesKey)
            .filter((key): key is string => typeof key === 'string')
        )
      )
    );
    this.source = source;
    this.issues = Object.freeze([...issues]);
  }
}

export class DuplicateKeyError extends TaxonomyError {
  constructor(keys: readonly string[]) {
    super(
      'duplicate_key',
      `duplicate fides_key(s): ${keys.map((key) => `'${key}'`).join(', ')}`,
      keys
    );
  }
}

export class DanglingReferenceError extends TaxonomyError {
  readonly parentKey: string;
  readonly childKey: string;

  constructor(parentKey: string, childKey: string) {
    super(
      'dangling_reference',
      `'${childKey}' references missing parent_key '${parentKey}'`,
      [parentKey]
    );
    this.parentKey = parentKey;
    this.childKey = childKey;
  }
}

export class CycleError extends TaxonomyError {
  constructor(cycle: readonly string[]) {
    super('cycle', `parent_key cycle: ${[...cycle, cycle[0]].join(' -> ')}`, cycle);
  }
}

export class LineageError extends TaxonomyError {
  constructor(mismatches: ReadonlyArray<{ fidesKey: string; expected: string | null }>) {
    const lines = mismatches.map(
      ({ fidesKey, expected }) =>
        `- '${fidesKey}' should have parent_key ${expected === null ? 'null' : `'${expected}'`}`
    );
    super(
      'lineage',
      `parent_key does not match the dotted fides_key for ${mismatches.length} entr${
        mismatches.length === 1 ? 'y' : 'ies'
      }\n${lines.join('\n')}`,
      mismatches.map((mismatch) => mismatch.fidesKey)
    );
  }
}

export class NotFoundError extends TaxonomyError {
  constructor(key: string) {
    super('not_found', `unknown fides_key '${key}'`, [key]);
  }
}

export type ValidationError =
  | SchemaError
  | DuplicateKeyError
  | DanglingReferenceError
  | CycleError
  | LineageError;

export function isTaxonomyError(value: unknown): value is TaxonomyError {
  return value instanceof TaxonomyError;
}
