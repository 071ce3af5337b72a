/**
 * Flag Preprocessor
 * Rewrites raw argv so clustered single-letter flags reach commander as
 * separate tokens, with --force ahead of the destructive flag it modifies.
 *
 * commander reads "-df" as "-d" with the value "f", so both passes run
 * before parsing.
 */

const FORCE = 'f';
/** Flags whose confirmation --force suppresses */
const DESTRUCTIVE = new Set(['d', 'c']);

const FORCE_PAIRS: Record<string, string[]> = {
  '-df': ['-f', '-d'],
  '-fd': ['-f', '-d'],
  '-cf': ['-f', '-c'],
  '-fc': ['-f', '-c'],
};

/**
 * Pass 1: exact two-letter force pairs become "-f" followed by the
 * destructive flag. The output tokens are two characters long, so pass 2
 * never splits them again.
 */
export function reorderForceFlags(argv: string[]): string[] {
  return argv.flatMap((arg) => FORCE_PAIRS[arg] ?? [arg]);
}

function isCluster(arg: string): boolean {
  return arg.startsWith('-') && !arg.startsWith('--') && arg.length > 2 && !/^-\d/.test(arg);
}

/**
 * Pass 2: "-bm" becomes "-b", "-m". Long options, single flags and
 * negative numbers pass through. A longer cluster that pairs force with a
 * destructive flag ("-bdf") gets its "-f" hoisted to the front.
 */
export function expandFlags(argv: string[]): string[] {
  const out: string[] = [];
  for (const arg of argv) {
    if (!isCluster(arg)) {
      out.push(arg);
      continue;
    }

    const letters = [...arg.slice(1)];
    const hoist = letters.includes(FORCE) && letters.some((ch) => DESTRUCTIVE.has(ch));
    const ordered = hoist ? [FORCE, ...letters.filter((ch) => ch !== FORCE)] : letters;
    for (const ch of ordered) {
      out.push(`-${ch}`);
    }
  }
  return out;
}

export function preprocessArgv(argv: string[]): string[] {
  return expandFlags(reorderForceFlags(argv));
}
