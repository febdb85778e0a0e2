import assert from 'node:assert/strict';
import test from 'node:test';

import { parseTaxonomyDocument, renderTaxonomyJson, renderTaxonomyYaml } from '../lib/dataset.js';
import { loadTaxonomy } from '../lib/taxonomy.js';
import { entryRecord } from './test_fs.js';

// mulberry32: small deterministic generator so failures reproduce.
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomForest(seed: number, size: number): Array<Record<string, unknown>> {
  const random = seededRandom(seed);
  const keys: string[] = [];
  const records: Array<Record<string, unknown>> = [];

  for (let index = 0; index < size; index += 1) {
    const parentKey = keys.length === 0 || random() < 0.25 ? null : keys[Math.floor(random() * keys.length)];
    const fidesKey = parentKey === null ? `n${index}` : `${parentKey}.n${index}`;
    keys.push(fidesKey);
    records.push(entryRecord(fidesKey, parentKey, { is_default: random() < 0.5 }));
  }

  return records;
}

function shuffled<T>(items: readonly T[], seed: number): T[] {
  const random = seededRandom(seed);
  const copy = [...items];
  for (let index = copy.length - 1; index > 0; index -= 1) {
    const swap = Math.floor(random() * (index + 1));
    [copy[index], copy[swap]] = [copy[swap], copy[index]];
  }
  return copy;
}

const SEEDS = [1, 7, 42, 1337, 2024];

test('every parent chain ends at a root and matches path and depth', () => {
  for (const seed of SEEDS) {
    const taxonomy = loadTaxonomy(randomForest(seed, 40), 'data_category', { lineage: 'strict' });

    for (const key of taxonomy.keys()) {
      const ancestors = taxonomy.ancestorsOf(key);
      const path = taxonomy.pathOf(key);
      const top = path[0];

      assert.equal(top.parent_key, null, `seed ${seed}: ${key} does not reach a root`);
      assert.deepEqual(
        path.map((entry) => entry.fides_key),
        [...ancestors.map((entry) => entry.fides_key), key]
      );
      assert.equal(path.length, taxonomy.depthOf(key) + 1);
      assert.equal(taxonomy.depthOf(key), key.split('.').length - 1);
    }
  }
});

test('descendantsOf and isDescendant agree with ancestorsOf', () => {
  for (const seed of SEEDS) {
    const taxonomy = loadTaxonomy(randomForest(seed, 30));

    for (const key of taxonomy.keys()) {
      const descendantKeys = new Set(Array.from(taxonomy.descendantsOf(key), (entry) => entry.fides_key));

      for (const other of taxonomy.keys()) {
        const below = taxonomy.isDescendant(other, key);
        assert.equal(below, descendantKeys.has(other), `seed ${seed}: ${other} under ${key}`);
        assert.equal(
          below,
          taxonomy.ancestorsOf(other).some((entry) => entry.fides_key === key)
        );
      }
      assert.equal(descendantKeys.has(key), false);
    }
  }
});

test('children and defaults partition the entries', () => {
  for (const seed of SEEDS) {
    const taxonomy = loadTaxonomy(randomForest(seed, 30));
    const childCount = taxonomy
      .keys()
      .reduce((total, key) => total + taxonomy.childrenOf(key).size, 0);

    assert.equal(childCount + taxonomy.roots().length, taxonomy.size);
    assert.equal(taxonomy.defaults().length + taxonomy.custom().length, taxonomy.size);
  }
});

test('input order does not change the built taxonomy', () => {
  for (const seed of SEEDS) {
    const records = randomForest(seed, 25);
    const ordered = loadTaxonomy(records);
    const reordered = loadTaxonomy(shuffled(records, seed + 1));

    assert.deepEqual(reordered.toRecords(), ordered.toRecords());
    assert.equal(renderTaxonomyJson(reordered), renderTaxonomyJson(ordered));
  }
});

test('rendered YAML loads back into an equal taxonomy', () => {
  for (const seed of SEEDS) {
    const taxonomy = loadTaxonomy(randomForest(seed, 25));
    const document = parseTaxonomyDocument(renderTaxonomyYaml(taxonomy), 'rendered.yml');
    const reloaded = loadTaxonomy(document.data_category ?? []);

    assert.deepEqual(reloaded.toRecords(), taxonomy.toRecords());
  }
});
