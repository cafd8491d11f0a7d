import type { Result } from '../util/result';

/**
 * Visibility of a flag, alias, subcommand or group, in increasing severity:
 * - PUBLIC: shown in `--help`
 * - HIDDEN: shown only in `--help-hidden`
 * - INVISIBLE: parsed but never shown
 * - DELETE: not parsed at all; reported as an unknown flag
 */
export type Visibility = 'PUBLIC' | 'HIDDEN' | 'INVISIBLE' | 'DELETE';

export const VISIBILITIES: readonly Visibility[] = ['PUBLIC', 'HIDDEN', 'INVISIBLE', 'DELETE'];

/** How many times a flag or positional may occur on the command line. */
export type Count = 'OPTIONAL' | 'REQUIRED' | 'REPEATED';

export const COUNTS: readonly Count[] = ['OPTIONAL', 'REQUIRED', 'REPEATED'];

export type FieldRole = 'FLAG' | 'POSITIONAL' | 'SUBCOMMAND' | 'GROUP';

/** Top-level program information, rendered at the end of every usage message. */
export type AppInfo = {
  /** Program name for the version line. The usage line always uses the executable name. */
  name?: string;
  authors?: string;
  /** Help text for the root node. */
  about?: string;
  version?: string;
  url?: string;
  /** Only shown when `authors` is set. */
  copyrightYear?: number;
  /** Ideally an SPDX identifier. Only shown when `authors` is set. */
  license?: string;
};

export type AliasTag = {
  name: string;
  /** Defaults to the visibility of the item the alias belongs to. */
  visibility?: Visibility;
};

export type FlagTag = {
  /** Long name. Defaults to the field name in kebab-case. */
  name?: string;
  /** Single-rune short name: `-x`, and clusters such as `-xyz`. */
  letter?: string;
  visibility?: Visibility;
  /** Argument label for help output, e.g. `INT`. */
  arg?: string;
  /** Defaults to the value type's default count. */
  count?: Count;
  help?: string;
  aliases?: AliasTag[];
};

export type PositionalTag = {
  /** Help label; unnamed positionals render as ARG1, ARG2, ... */
  name?: string;
  count?: Count;
  help?: string;
};

export type SubcommandTag = {
  /** Defaults to the field name in kebab-case. */
  name?: string;
  visibility?: Visibility;
  /** One-line help shown in the parent's subcommand list. */
  help?: string;
  /** Longer text shown by `<sub> --help`; falls back to `help`. */
  about?: string;
  aliases?: AliasTag[];
};

/**
 * A group with neither `name` nor `letter` is flattened into its parent as is.
 * A named group exposes its flags as `--name.flag`; a lettered one as `-Xflag`.
 */
export type GroupTag = {
  name?: string;
  letter?: string;
  visibility?: Visibility;
  help?: string;
  aliases?: AliasTag[];
};

/**
 * Per-type parsing plugin. `parse` receives the raw token (empty for flags that take
 * no argument) and the field's current value, and returns the new value.
 */
export interface ArgValue<V> {
  /** False for switch-like types such as booleans. */
  readonly wantsArgument: boolean;
  readonly defaultCount: Count;
  parse(raw: string, previous?: V): Result<V, string>;
}

/** A value parser bound to one field of a struct of type T. */
export type ArgBinding<T> = {
  wantsArgument: boolean;
  defaultCount: Count;
  apply: (target: T, raw: string) => Result<void, string>;
};

export type NamedVisibility = {
  name: string;
  visibility: Visibility;
};

/** Where a node hangs in the tree; used only to print usage ancestry. */
export type ParentLink =
  | { kind: 'SUBCOMMAND'; parent: number; name: string; help: string; about: string }
  | { kind: 'GROUP'; parent: number; name: string; letter: string; help: string };

/** R is the type of the storage object handed to the root parse call. */
export type FlagRecord<R> = {
  /** Identity shared by every copy of this flag made while flattening groups. */
  id: number;
  /** `Struct.field`, for diagnostics. */
  origin: string;
  names: NamedVisibility[];
  hasLetter: boolean;
  count: Count;
  wantsArgument: boolean;
  arg: string;
  help: string;
  apply: (root: R, raw: string) => Result<void, string>;
};

export type PositionalRecord<R> = {
  origin: string;
  name: string;
  count: Count;
  help: string;
  apply: (root: R, raw: string) => Result<void, string>;
};

export type SubcommandRecord = {
  origin: string;
  names: NamedVisibility[];
  help: string;
  child: number;
};

export type GroupRecord = {
  origin: string;
  names: NamedVisibility[];
  hasLetter: boolean;
  isFlatten: boolean;
  visibility: Visibility;
  help: string;
  child: number;
};

/** An element of a node's sorted lookup tables. Keys carry no leading dashes. */
export type Entry = {
  key: string;
  /** Index into the node's flags, groups (when isGroup) or subcommands. */
  index: number;
  isGroup: boolean;
  isLetter: boolean;
  isAlias: boolean;
  /** Reached through a named group prefix, e.g. `--group.flag`. */
  isCopy: boolean;
  visibility: Visibility;
};

export type SchemaNode<R> = {
  index: number;
  /** Flag struct this node was built from, for diagnostics. */
  structName: string;
  link: ParentLink | null;
  app: AppInfo;
  flags: FlagRecord<R>[];
  positionals: PositionalRecord<R>[];
  subcommands: SubcommandRecord[];
  groups: GroupRecord[];
  sortedFlags: Entry[];
  sortedSubs: Entry[];
  /** Flag identity -> long name, for the end-of-parse check. */
  required: Map<number, string>;
};
