/**
 * Minimal argument parser. dbnav takes no options, so anything that looks
 * like one is collected for the caller to reject.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  /** Option-like arguments (`-x`, `--flag`), in order */
  readonly options: readonly string[];
}

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("-") && arg.length > 1) {
      options.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, options };
}
