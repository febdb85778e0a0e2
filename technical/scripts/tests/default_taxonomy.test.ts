import assert from 'node:assert/strict';
import test from 'node:test';

import { findLineageMismatches, loadDefaultTaxonomy, TAXONOMY_KINDS } from '../lib/index.js';

test('the shipped taxonomy loads every kind with strict lineage', async () => {
  const taxonomies = await loadDefaultTaxonomy({ lineage: 'strict' });

  assert.equal(taxonomies.data_category?.size, 46);
  assert.equal(taxonomies.data_use?.size, 25);
  assert.equal(taxonomies.data_subject?.size, 15);
  assert.equal(taxonomies.data_qualifier?.size, 5);

  for (const kind of TAXONOMY_KINDS) {
    const taxonomy = taxonomies[kind];
    assert.ok(taxonomy, `missing ${kind}`);
    assert.equal(taxonomy.kind, kind);
    assert.equal(taxonomy.custom().length, 0, `${kind} ships custom entries`);
    assert.deepEqual(findLineageMismatches(taxonomy.entries()), []);
  }
});

test('data category and data use roots', async () => {
  const taxonomies = await loadDefaultTaxonomy();

  assert.deepEqual(
    taxonomies.data_category?.roots().map((entry) => entry.fides_key),
    ['account', 'system', 'user']
  );
  assert.deepEqual(
    taxonomies.data_use?.roots().map((entry) => entry.fides_key),
    [
      'advertising',
      'collect',
      'employment',
      'essential',
      'functional',
      'marketing',
      'personalize',
      'train_ai_system'
    ]
  );
  assert.equal(taxonomies.data_subject?.roots().length, 15);
});

test('qualifiers form a single chain', async () => {
  const qualifiers = (await loadDefaultTaxonomy()).data_qualifier;
  assert.ok(qualifiers);

  assert.deepEqual(
    qualifiers
      .ancestorsOf('aggregated.anonymized.unlinked_pseudonymized')
      .map((entry) => entry.fides_key),
    ['aggregated', 'aggregated.anonymized']
  );
  assert.equal(qualifiers.depthOf('aggregated.anonymized.unlinked_pseudonymized.pseudonymized.identified'), 4);
  assert.equal(qualifiers.descendantsOf('aggregated').size, 4);
});

test('category queries resolve through nested contact entries', async () => {
  const categories = (await loadDefaultTaxonomy()).data_category;
  assert.ok(categories);

  assert.equal(categories.isDescendant('user.provided.identifiable.contact.email', 'user'), true);
  assert.equal(categories.isDescendant('account.contact.email', 'user'), false);
  assert.deepEqual(
    Array.from(categories.childrenOf('account.contact'), (entry) => entry.fides_key),
    [
      'account.contact.city',
      'account.contact.country',
      'account.contact.email',
      'account.contact.phone_number',
      'account.contact.postal_code',
      'account.contact.state',
      'account.contact.street'
    ]
  );
});
