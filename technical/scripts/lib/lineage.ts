import { parentKeyFromFidesKey } from './fides_key.js';
import type { TaxonomyEntry } from './types.js';

export interface LineageMismatch {
  fidesKey: string;
  parentKey: string | null;
  expected: string | null;
}

/**
 * Entries whose parent_key is not the dotted prefix of their fides_key,
 * e.g. `user.contact.email` declared under `user.name`.
 */
export function findLineageMismatches(entries: readonly TaxonomyEntry[]): LineageMismatch[] {
  const mismatches: LineageMismatch[] = [];

  for (const entry of entries) {
    const expected = parentKeyFromFidesKey(entry.fides_key);
    if (expected !== entry.parent_key) {
      mismatches.push({ fidesKey: entry.fides_key, parentKey: entry.parent_key, expected });
    }
  }

  return mismatches.sort((a, b) => a.fidesKey.localeCompare(b.fidesKey));
}
