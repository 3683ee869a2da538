/**
 * Minimal argument parser.
 *
 * Flags take one or two dashes (`-c 5`, `--c 5`) and `--flag=value`.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  concurrency: "c",
  rate: "r",
  duration: "d",
  verbose: "v",
  help: "h",
};

const BOOLEAN_FLAGS = new Set(["v", "h"]);

/** Values may be negative numbers, which otherwise look like flags */
function isValue(next: string | undefined): next is string {
  return next !== undefined && (!next.startsWith("-") || /^-\d/.test(next));
}

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("-") && arg.length > 1 && !/^-\d/.test(arg)) {
      const body = arg.replace(/^--?/, "");
      const eq = body.indexOf("=");
      const name = eq === -1 ? body : body.slice(0, eq);
      const key = ALIASES[name] ?? name;

      if (eq !== -1) {
        flags[key] = body.slice(eq + 1);
      } else if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
      } else {
        const next = argv[i + 1];
        if (isValue(next)) {
          flags[key] = next;
          i++;
        } else {
          flags[key] = true;
        }
      }
    } else {
      positionals.push(arg);
    }

    i++;
  }

  return { positionals, flags };
}
