import path from 'node:path';

import { parseCliArgs, rejectUnknownOptions } from './lib/cli_args.js';
import { DEFAULT_TAXONOMY_DIR, loadTaxonomyDirectory } from './lib/dataset.js';
import { findLineageMismatches } from './lib/lineage.js';
import { toPosixRelative } from './lib/io.js';
import { TAXONOMY_KINDS } from './lib/types.js';

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2), ['strict-lineage']);
  rejectUnknownOptions(parsed, ['dir', 'custom-dir']);

  const dirOption = parsed.options.get('dir');
  const customOption = parsed.options.get('custom-dir');
  const dir = dirOption ? path.resolve(dirOption) : DEFAULT_TAXONOMY_DIR;
  const strict = parsed.flags.has('strict-lineage');
  const lineage = strict ? 'strict' : 'off';

  let set = await loadTaxonomyDirectory(dir, { lineage });
  const checked = [toPosixRelative(dir) || '.'];
  if (customOption) {
    const customDir = path.resolve(customOption);
    set = await loadTaxonomyDirectory(customDir, { lineage, base: set });
    checked.push(toPosixRelative(customDir) || '.');
  }

  console.log(`taxonomy validation passed (${checked.join(' + ')}).`);
  for (const kind of TAXONOMY_KINDS) {
    const taxonomy = set[kind];
    if (!taxonomy) {
      continue;
    }

    console.log(
      `${kind}: entries=${taxonomy.size} roots=${taxonomy.roots().length} default=${taxonomy.defaults().length} custom=${taxonomy.custom().length}`
    );

    if (!strict) {
      for (const mismatch of findLineageMismatches(taxonomy.entries())) {
        console.log(
          `  note: '${mismatch.fidesKey}' has parent_key ${mismatch.parentKey ?? 'null'}, dotted key implies ${mismatch.expected ?? 'null'}`
        );
      }
    }
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
