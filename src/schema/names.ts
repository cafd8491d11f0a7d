import { ConfigurationError } from '../errors';
import { VISIBILITIES, type Visibility } from './types';

export const RESERVED_NAMES: ReadonlySet<string> = new Set(['help', 'help-hidden', 'version']);
export const RESERVED_LETTERS: ReadonlySet<string> = new Set(['h']);

// `.` joins a group's name to its members' names.
function isReservedRune(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code < 0x20 || code === 0x7f || /\s/u.test(ch) || ch === '#' || ch === '=' || ch === '.';
}

/**
 * Validates a flag, subcommand or group name and canonicalizes `_` to `-`.
 * `origin` names the offending field in the error, e.g. `Toy.foo`.
 */
export function normalizeName(name: string, origin: string): string {
  if (name === '') {
    throw new ConfigurationError(`field ${origin} has an empty name`);
  }
  const edges = ['-', '_'];
  if (edges.includes(name[0]) || edges.includes(name[name.length - 1]) || [...name].some(isReservedRune)) {
    throw new ConfigurationError(`field ${origin}'s name (${JSON.stringify(name)}) contains reserved runes`);
  }
  return name.replace(/_/g, '-');
}

export function normalizeLetter(letter: string, origin: string): string {
  if ([...letter].length !== 1) {
    throw new ConfigurationError(`field ${origin}'s letter (${JSON.stringify(letter)}) must be a single rune`);
  }
  const normalized = normalizeName(letter, origin);
  if (RESERVED_LETTERS.has(normalized)) {
    throw new ConfigurationError(`field ${origin}'s letter (${JSON.stringify(letter)}) is reserved and may not be used`);
  }
  return normalized;
}

export function checkNotReserved(name: string, origin: string): string {
  if (RESERVED_NAMES.has(name)) {
    throw new ConfigurationError(`field ${origin}'s name (${JSON.stringify(name)}) is reserved and may not be used`);
  }
  return name;
}

/** `subFlag` -> `sub-flag`, `useHTTPProxy` -> `use-http-proxy`. */
export function kebabCase(field: string): string {
  return field
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1-$2')
    .toLowerCase();
}

export function mergeVisibility(a: Visibility, b: Visibility): Visibility {
  return VISIBILITIES[Math.max(VISIBILITIES.indexOf(a), VISIBILITIES.indexOf(b))];
}

export function isVisible(v: Visibility, hidden: boolean): boolean {
  return v === 'PUBLIC' || (hidden && v === 'HIDDEN');
}

/** Code-unit ordering, shared by table sorting and bisection. */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
