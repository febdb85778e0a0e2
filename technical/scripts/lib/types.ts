export const TAXONOMY_KINDS = [
  'data_category',
  'data_use',
  'data_subject',
  'data_qualifier'
] as const;

export type TaxonomyKind = (typeof TAXONOMY_KINDS)[number];

export const TAXONOMY_FILE_NAMES: Record<TaxonomyKind, string> = {
  data_category: 'data_categories.yml',
  data_use: 'data_uses.yml',
  data_subject: 'data_subjects.yml',
  data_qualifier: 'data_qualifiers.yml'
};

export function isTaxonomyKind(value: unknown): value is TaxonomyKind {
  return typeof value === 'string' && (TAXONOMY_KINDS as readonly string[]).includes(value);
}

export interface TaxonomyEntry {
  fides_key: string;
  organization_fides_key: string;
  name: string;
  description: string;
  parent_key: string | null;
  is_default: boolean;
  tags: string[] | null;
}

export const LEGAL_BASES = [
  'Consent',
  'Contract',
  'Legal Obligation',
  'Vital Interest',
  'Public Interest',
  'Legitimate Interests'
] as const;

export type LegalBasis = (typeof LEGAL_BASES)[number];

export const SPECIAL_CATEGORIES = [
  'Consent',
  'Employment',
  'Vital Interests',
  'Non-profit Bodies',
  'Public by Data Subject',
  'Legal Claims',
  'Substantial Public Interest',
  'Medical',
  'Public Health Interest'
] as const;

export type SpecialCategory = (typeof SPECIAL_CATEGORIES)[number];

export interface DataUseEntry extends TaxonomyEntry {
  legal_basis: LegalBasis | null;
  special_category: SpecialCategory | null;
  recipients: string[] | null;
  legitimate_interest: boolean;
  legitimate_interest_impact_assessment: string | null;
}

export const RIGHTS_STRATEGIES = ['ALL', 'EXCLUDE', 'INCLUDE', 'NONE'] as const;

export type RightsStrategy = (typeof RIGHTS_STRATEGIES)[number];

export const DATA_SUBJECT_RIGHTS = [
  'Informed',
  'Access',
  'Rectification',
  'Erasure',
  'Portability',
  'Restrict Processing',
  'Withdraw Consent',
  'Object',
  'Object to Automated Processing'
] as const;

export type DataSubjectRight = (typeof DATA_SUBJECT_RIGHTS)[number];

export interface DataSubjectRights {
  strategy: RightsStrategy;
  values: DataSubjectRight[] | null;
}

export interface DataSubjectEntry extends TaxonomyEntry {
  rights: DataSubjectRights | null;
  automated_decisions_or_profiling: boolean | null;
}

export interface TaxonomyEntryByKind {
  data_category: TaxonomyEntry;
  data_use: DataUseEntry;
  data_subject: DataSubjectEntry;
  data_qualifier: TaxonomyEntry;
}

export type AnyTaxonomyEntry = TaxonomyEntryByKind[TaxonomyKind];

/**
 * Field order used whenever entries are written back out.
 */
export const COMMON_FIELD_ORDER = [
  'fides_key',
  'organization_fides_key',
  'tags',
  'name',
  'description',
  'parent_key',
  'is_default'
] as const;

export const KIND_FIELD_ORDER: Record<TaxonomyKind, readonly string[]> = {
  data_category: [],
  data_use: [
    'legal_basis',
    'special_category',
    'recipients',
    'legitimate_interest',
    'legitimate_interest_impact_assessment'
  ],
  data_subject: ['rights', 'automated_decisions_or_profiling'],
  data_qualifier: []
};
