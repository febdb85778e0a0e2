export interface ParsedCliArgs {
  options: Map<string, string>;
  flags: Set<string>;
}

/**
 * Parses `--key value` pairs. Names listed in `flags` take no value.
 */
export function parseCliArgs(args: string[], flags: readonly string[] = []): ParsedCliArgs {
  const options = new Map<string, string>();
  const seenFlags = new Set<string>();

  for (let index = 0; index < args.length; index += 1) {
    const keyToken = args[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    if (flags.includes(key)) {
      seenFlags.add(key);
      continue;
    }

    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return { options, flags: seenFlags };
}

export function rejectUnknownOptions(parsed: ParsedCliArgs, known: readonly string[]): void {
  const unknown = Array.from(parsed.options.keys()).filter((key) => !known.includes(key));
  if (unknown.length > 0) {
    throw new Error(
      `Unknown option(s) ${unknown.map((key) => `'--${key}'`).join(', ')}. Expected ${known
        .map((key) => `--${key}`)
        .join('|')}`
    );
  }
}
