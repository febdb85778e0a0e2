export {
  CycleError,
  DanglingReferenceError,
  DuplicateKeyError,
  isTaxonomyError,
  LineageError,
  NotFoundError,
  SchemaError,
  TaxonomyError
} from './errors.js';
export type { SchemaIssue, TaxonomyErrorCode, ValidationError } from './errors.js';
export {
  DEFAULT_ORGANIZATION_KEY,
  FIDES_KEY_PATTERN,
  isFidesKey,
  joinFidesKey,
  lastKeySegment,
  normalizeAndValidateKeySegment,
  normalizeKeySegment,
  parentKeyFromFidesKey
} from './fides_key.js';
export { findLineageMismatches } from './lineage.js';
export type { LineageMismatch } from './lineage.js';
export { parseTaxonomyEntries, parseTaxonomyEntry } from './schema.js';
export { buildTaxonomy, loadTaxonomy, mergeTaxonomies } from './taxonomy.js';
export type { BuildOptions, LineageMode, LoadOptions, Taxonomy } from './taxonomy.js';
export {
  DEFAULT_TAXONOMY_DIR,
  loadDefaultTaxonomy,
  loadTaxonomyDirectory,
  loadTaxonomyRecords,
  mergeTaxonomySets,
  parseTaxonomyDocument,
  readTaxonomyDirectory,
  readTaxonomyFile,
  renderTaxonomyJson,
  renderTaxonomyYaml,
  toOrderedRecord
} from './dataset.js';
export type {
  DirectoryLoadOptions,
  RawTaxonomyRecords,
  TaxonomyDirectoryRecords,
  TaxonomySet
} from './dataset.js';
export {
  DATA_SUBJECT_RIGHTS,
  isTaxonomyKind,
  LEGAL_BASES,
  RIGHTS_STRATEGIES,
  SPECIAL_CATEGORIES,
  TAXONOMY_FILE_NAMES,
  TAXONOMY_KINDS
} from './types.js';
export type {
  AnyTaxonomyEntry,
  DataSubjectEntry,
  DataSubjectRight,
  DataSubjectRights,
  DataUseEntry,
  LegalBasis,
  RightsStrategy,
  SpecialCategory,
  TaxonomyEntry,
  TaxonomyEntryByKind,
  TaxonomyKind
} from './types.js';
