import type { ArgValue } from '../schema/types';
import { err, ok, type Result } from '../util/result';

const INTEGER = /^[+-]?(?:0x[0-9a-f]+|0o[0-7]+|0b[01]+|\d+)$/i;

const TRUTHY: ReadonlySet<string> = new Set(['', 'true', 't', 'yes', 'y', 'on']);
const FALSY: ReadonlySet<string> = new Set(['false', 'f', 'no', 'n', 'off']);

/** Decimal, `0x`, `0o` or `0b` integer with an optional sign; undefined when out of the safe range. */
export function parseInteger(raw: string): number | undefined {
  if (!INTEGER.test(raw)) return undefined;
  const negative = raw.startsWith('-');
  const magnitude = Number(raw.replace(/^[+-]/, ''));
  if (!Number.isSafeInteger(magnitude)) return undefined;
  return negative && magnitude !== 0 ? -magnitude : magnitude;
}

/** A switch. Takes no argument; `--flag=off` still works. */
export function bool(): ArgValue<boolean> {
  return {
    wantsArgument: false,
    defaultCount: 'OPTIONAL',
    parse(raw: string): Result<boolean, string> {
      const lowered = raw.toLowerCase();
      if (TRUTHY.has(lowered)) return ok(true);
      if (FALSY.has(lowered)) return ok(false);
      const n = parseInteger(lowered);
      if (n === 0) return ok(false);
      if (n === 1) return ok(true);
      return err(`invalid bool: ${JSON.stringify(raw)}`);
    },
  };
}

export function int(): ArgValue<number> {
  return {
    wantsArgument: true,
    defaultCount: 'OPTIONAL',
    parse(raw: string): Result<number, string> {
      const n = parseInteger(raw);
      return n === undefined ? err(`invalid integer: ${JSON.stringify(raw)}`) : ok(n);
    },
  };
}

export function str(): ArgValue<string> {
  return {
    wantsArgument: true,
    defaultCount: 'OPTIONAL',
    parse: (raw: string) => ok(raw),
  };
}

/** Exactly one code point. */
export function rune(): ArgValue<string> {
  return {
    wantsArgument: true,
    defaultCount: 'OPTIONAL',
    parse(raw: string): Result<string, string> {
      return [...raw].length === 1 ? ok(raw) : err(`invalid rune: ${JSON.stringify(raw)}`);
    },
  };
}

/** `null` until the flag is given. */
export function optional<V>(inner: ArgValue<V>): ArgValue<V | null> {
  return {
    wantsArgument: inner.wantsArgument,
    defaultCount: 'OPTIONAL',
    parse(raw: string, previous?: V | null): Result<V | null, string> {
      return inner.parse(raw, previous ?? undefined);
    },
  };
}

/** Collects every occurrence, in order. */
export function list<V>(inner: ArgValue<V>): ArgValue<V[]> {
  return {
    wantsArgument: inner.wantsArgument,
    defaultCount: 'REPEATED',
    parse(raw: string, previous?: V[]): Result<V[], string> {
      const parsed = inner.parse(raw);
      if (!parsed.ok) return parsed;
      return ok([...(previous ?? []), parsed.value]);
    },
  };
}
