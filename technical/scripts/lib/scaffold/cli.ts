import path from 'node:path';

import { parseCliArgs, rejectUnknownOptions } from '../cli_args.js';
import { interactivePromptAdapter, type PromptAdapter } from '../cli_prompts.js';
import { toPosixRelative } from '../io.js';
import { scaffoldEntry } from './handlers.js';

const SCAFFOLD_OPTIONS = ['taxonomy-dir', 'custom-dir', 'organization'] as const;

export async function runScaffoldCli(
  argv: string[] = process.argv.slice(2),
  prompt: PromptAdapter = interactivePromptAdapter
): Promise<void> {
  const parsed = parseCliArgs(argv);
  rejectUnknownOptions(parsed, SCAFFOLD_OPTIONS);

  const taxonomyDir = parsed.options.get('taxonomy-dir');
  const customDir = parsed.options.get('custom-dir');

  const result = await scaffoldEntry(prompt, {
    taxonomyDir: taxonomyDir ? path.resolve(taxonomyDir) : undefined,
    customDir: customDir ? path.resolve(customDir) : undefined,
    organizationKey: parsed.options.get('organization')
  });

  if (!result) {
    console.log('scaffold: no changes');
    return;
  }

  console.log(`Added ${result.kind} '${result.fidesKey}' to ${toPosixRelative(result.filePath)}`);
}
