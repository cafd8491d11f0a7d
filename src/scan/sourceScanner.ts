import fg from 'fast-glob';
import path from 'node:path';

import { toPosix } from './tableScanner';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** When false, common test locations/patterns are excluded. */
  includeTests?: boolean;
};

const DEFAULT_EXCLUDES = ['**/node_modules/**', '**/dist/**', '**/build/**', '**/coverage/**', '**/.git/**', '**/*.d.ts'];

const DEFAULT_TEST_EXCLUDES = ['**/__tests__/**', '**/*.test.*', '**/*.spec.*'];

/**
 * Finds the TypeScript sources that may declare `@flags` interfaces.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanTypeScriptSources(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  if (!opts.includeTests) exclude.push(...DEFAULT_TEST_EXCLUDES);

  const matches = await fg(['**/*.ts', '**/*.mts', '**/*.cts'], {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: false,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  const rel = matches.map(toPosix);
  rel.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return rel;
}
