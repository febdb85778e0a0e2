import { DEFAULT_TAXONOMY_DIR, loadTaxonomyDirectory, renderTaxonomyJson } from './lib/dataset.js';
import { getRunOptions, repoPath, toPosixRelative, writeTextFile } from './lib/io.js';
import { TAXONOMY_KINDS } from './lib/types.js';

async function main(): Promise<void> {
  const options = getRunOptions(process.argv.slice(2));
  const set = await loadTaxonomyDirectory(DEFAULT_TAXONOMY_DIR);
  let pending = 0;

  for (const kind of TAXONOMY_KINDS) {
    const taxonomy = set[kind];
    if (!taxonomy) {
      continue;
    }

    const outFile = repoPath('technical', 'artifacts', 'taxonomy', `${kind}.json`);
    const result = await writeTextFile(outFile, renderTaxonomyJson(taxonomy), options);

    if (options.check) {
      if (result.changed) {
        console.error(`Would update ${toPosixRelative(outFile)} (${taxonomy.size} entries)`);
        pending += 1;
      }
      continue;
    }

    const status = result.changed ? 'Updated' : 'No changes';
    console.log(`${status} ${toPosixRelative(outFile)} (${taxonomy.size} entries)`);
  }

  if (options.check) {
    if (pending > 0) {
      process.exit(1);
    }
    console.log('export_taxonomy.ts check passed.');
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
