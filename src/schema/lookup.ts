import { compareKeys } from './names';
import type { Entry } from './types';

/** Binary search over a table sorted by `compareKeys`. */
export function bisect(table: readonly Entry[], key: string): Entry | undefined {
  let lo = 0;
  let hi = table.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const cmp = compareKeys(table[mid].key, key);
    if (cmp === 0) return table[mid];
    if (cmp < 0) lo = mid + 1;
    else hi = mid;
  }
  return undefined;
}

export function sortEntries(table: Entry[]): void {
  table.sort((a, b) => compareKeys(a.key, b.key));
}
