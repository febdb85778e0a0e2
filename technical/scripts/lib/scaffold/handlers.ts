import fs from 'fs-extra';
import path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';

import { inputValidated, type PromptAdapter, type SelectChoice } from '../cli_prompts.js';
import {
  DEFAULT_TAXONOMY_DIR,
  loadTaxonomyDirectory,
  parseTaxonomyDocument,
  type RawTaxonomyRecords
} from '../dataset.js';
import {
  DEFAULT_ORGANIZATION_KEY,
  joinFidesKey,
  normalizeKeySegment
} from '../fides_key.js';
import { toPosixRelative, writeTextFile } from '../io.js';
import { loadTaxonomy } from '../taxonomy.js';
import { TAXONOMY_FILE_NAMES, TAXONOMY_KINDS, type TaxonomyKind } from '../types.js';

export interface ScaffoldEntryOptions {
  taxonomyDir?: string;
  customDir?: string;
  organizationKey?: string;
}

export interface ScaffoldEntryResult {
  kind: TaxonomyKind;
  fidesKey: string;
  filePath: string;
}

const ROOT_PARENT = '__root__' as const;

export function customTaxonomyDir(taxonomyDir: string): string {
  return path.join(taxonomyDir, 'custom');
}

async function readCustomDocument(filePath: string): Promise<RawTaxonomyRecords> {
  if (!(await fs.pathExists(filePath))) {
    return {};
  }
  return parseTaxonomyDocument(await fs.readFile(filePath, 'utf8'), toPosixRelative(filePath));
}

/** Appends `record` to its kind and keeps every other kind of the file. */
function appendRecord(
  document: RawTaxonomyRecords,
  kind: TaxonomyKind,
  record: Record<string, unknown>
): Record<string, unknown[]> {
  const updated: Record<string, unknown[]> = {};
  for (const candidate of TAXONOMY_KINDS) {
    const records = document[candidate];
    if (candidate === kind) {
      updated[candidate] = [...(records ?? []), record];
    } else if (records) {
      updated[candidate] = records;
    }
  }
  return updated;
}

/**
 * Interactively defines one custom (non-default) entry and appends it to the
 * organization's custom dataset file for its kind. Returns undefined when the
 * user declines the write.
 */
export async function scaffoldEntry(
  prompt: PromptAdapter,
  options: ScaffoldEntryOptions = {}
): Promise<ScaffoldEntryResult | undefined> {
  const taxonomyDir = options.taxonomyDir ?? DEFAULT_TAXONOMY_DIR;
  const customDir = options.customDir ?? customTaxonomyDir(taxonomyDir);
  const known = await loadTaxonomyDirectory(customDir, {
    base: await loadTaxonomyDirectory(taxonomyDir)
  });

  const kind = await prompt.select<TaxonomyKind>({
    message: 'Taxonomy kind:',
    choices: TAXONOMY_KINDS.map((value) => ({ name: value, value }))
  });
  const existing = known[kind];
  const existingKeys = existing ? existing.keys() : [];

  let parentKey: string | null = null;
  if (kind !== 'data_subject') {
    const parentChoices: Array<SelectChoice<string>> = [
      { name: '(root)', value: ROOT_PARENT },
      ...existingKeys.map((key) => ({ name: key, value: key }))
    ];
    const selected = await prompt.select({
      message: 'Parent entry:',
      choices: parentChoices,
      pageSize: 15
    });
    parentKey = selected === ROOT_PARENT ? null : selected;
  }

  const segment = await inputValidated(prompt, {
    message: parentKey ? `Key segment under '${parentKey}':` : 'Root key segment:',
    normalize: normalizeKeySegment,
    validate: (value) => {
      if (!value) {
        return 'Key segment is required';
      }
      const candidate = joinFidesKey(parentKey, value);
      return existingKeys.includes(candidate) ? `'${candidate}' already exists` : undefined;
    }
  });
  const fidesKey = joinFidesKey(parentKey, segment);

  const required = (label: string) => (value: string) =>
    value.length === 0 ? `${label} is required` : undefined;
  const name = await inputValidated(prompt, { message: 'Name:', validate: required('Name') });
  const description = await inputValidated(prompt, {
    message: 'Description:',
    validate: required('Description')
  });

  const record: Record<string, unknown> = {
    fides_key: fidesKey,
    organization_fides_key: options.organizationKey ?? DEFAULT_ORGANIZATION_KEY,
    tags: null,
    name,
    description
  };
  if (kind !== 'data_subject') {
    record.parent_key = parentKey;
  }
  record.is_default = false;

  const filePath = path.join(customDir, TAXONOMY_FILE_NAMES[kind]);
  const document = appendRecord(await readCustomDocument(filePath), kind, record);

  // The custom file must still build on top of everything already known.
  loadTaxonomy([record], kind, { base: existing });

  const confirmed = await prompt.confirm({
    message: `Append '${fidesKey}' to ${toPosixRelative(filePath)}?`,
    defaultValue: true
  });
  if (!confirmed) {
    return undefined;
  }

  await writeTextFile(filePath, stringifyYaml(document, { indentSeq: false }), {
    check: false
  });

  return { kind, fidesKey, filePath };
}
