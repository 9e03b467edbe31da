/**
 * Git output parsing - converts git CLI output to plain values.
 *
 * Git-specific: parses the NUL-separated output of `-z` commands.
 * This is a client-layer concern, not domain logic.
 */

/**
 * Parse a NUL-separated path list (`git diff --name-only -z`).
 */
export function parseNameList(output: string): string[] {
  return output.split('\0').filter((path) => path !== '');
}

/**
 * Parse `git status --porcelain -z` output into the changed paths.
 *
 * Each entry is `XY path`; renames and copies carry the original path
 * as an extra entry, which is skipped.
 */
export function parseStatusPaths(output: string): string[] {
  const entries = output.split('\0');
  const paths: string[] = [];

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry.length < 4) continue;

    const status = entry.slice(0, 2);
    paths.push(entry.slice(3));
    if (status[0] === 'R' || status[0] === 'C') i++;
  }

  return paths;
}

/**
 * Parse `git rev-list --count` output.
 */
export function parseCount(output: string): number {
  const count = parseInt(output.trim(), 10);
  return Number.isNaN(count) ? 0 : count;
}
