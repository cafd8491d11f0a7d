import fg from 'fast-glob';
import path from 'node:path';

export type TableScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
};

export const TABLE_GLOB = '**/*.flags.json';

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.cache/**',
  '**/coverage/**',
  '**/.git/**',
  '**/out/**',
];

export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Finds every flag table under sourceRoot.
 * Returns a stable, sorted list of relative paths (posix-style).
 */
export async function scanFlagTables(opts: TableScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const matches = await fg(TABLE_GLOB, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  const rel = matches.map(toPosix);
  rel.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return rel;
}
