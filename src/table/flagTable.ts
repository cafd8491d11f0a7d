import { defineFlags, type FlagStruct } from '../schema/flagStruct';
import type { AliasTag, AppInfo, ArgValue, Count, FieldRole, Visibility } from '../schema/types';
import { bool, int, list, optional, rune, str } from '../values/argValues';

export type ValueType = 'bool' | 'int' | 'string' | 'rune';

/** One field of a flag table, as written in a `*.flags.json` file. */
export type FieldSpec = {
  field: string;
  role: FieldRole;
  /** Value type of a flag or positional. Defaults to `string`. */
  type?: ValueType;
  /** Storage starts as `null` instead of the type's zero value. */
  optional?: boolean;
  /** Storage is a list; every occurrence appends. */
  multiple?: boolean;
  name?: string;
  letter?: string;
  aliases?: AliasTag[];
  visibility?: Visibility;
  count?: Count;
  arg?: string;
  help?: string;
  about?: string;
  /** Struct name of a subcommand or group, for diagnostics. */
  struct?: string;
  fields?: FieldSpec[];
};

export type FlagTable = {
  schema: 'flag-table-v1';
  name: string;
  app?: AppInfo;
  fields: FieldSpec[];
};

export type DynamicValue = boolean | number | string | null | DynamicValue[] | DynamicFlags;
export type DynamicFlags = { [field: string]: DynamicValue };

export function isDynamicFlags(v: DynamicValue | undefined): v is DynamicFlags {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function zeroValue(type: ValueType): DynamicValue {
  switch (type) {
    case 'bool':
      return false;
    case 'int':
      return 0;
    case 'string':
    case 'rune':
      return '';
  }
}

function scalarValue(type: ValueType): ArgValue<DynamicValue> {
  switch (type) {
    case 'bool':
      return bool();
    case 'int':
      return int();
    case 'string':
      return str();
    case 'rune':
      return rune();
  }
}

function valueOf(spec: FieldSpec): ArgValue<DynamicValue> {
  const scalar = scalarValue(spec.type ?? 'string');
  if (spec.multiple) return list(scalar);
  if (spec.optional) return optional(scalar);
  return scalar;
}

/** Fresh storage for a list of fields: zero values, `null` for optionals, `[]` for lists. */
export function tableDefaults(fields: readonly FieldSpec[]): DynamicFlags {
  const out: DynamicFlags = {};
  for (const spec of fields) {
    if (spec.role === 'SUBCOMMAND' || spec.role === 'GROUP') {
      out[spec.field] = tableDefaults(spec.fields ?? []);
    } else if (spec.multiple) {
      out[spec.field] = [];
    } else if (spec.optional) {
      out[spec.field] = null;
    } else {
      out[spec.field] = zeroValue(spec.type ?? 'string');
    }
  }
  return out;
}

function childStorage(parent: DynamicFlags, field: string, fields: readonly FieldSpec[]): DynamicFlags {
  const existing = parent[field];
  if (isDynamicFlags(existing)) return existing;
  const fresh = tableDefaults(fields);
  parent[field] = fresh;
  return fresh;
}

function buildStruct(name: string, fields: readonly FieldSpec[], app?: AppInfo): FlagStruct<DynamicFlags> {
  const def = defineFlags(name, () => tableDefaults(fields), app);
  for (const spec of fields) {
    switch (spec.role) {
      case 'FLAG':
        def.flag(spec.field, valueOf(spec), {
          name: spec.name,
          letter: spec.letter,
          visibility: spec.visibility,
          arg: spec.arg,
          count: spec.count,
          help: spec.help,
          aliases: spec.aliases,
        });
        break;
      case 'POSITIONAL':
        def.positional(spec.field, valueOf(spec), { name: spec.name, count: spec.count, help: spec.help });
        break;
      case 'SUBCOMMAND':
      case 'GROUP': {
        const nested = spec.fields ?? [];
        const child = buildStruct(spec.struct ?? `${name}.${spec.field}`, nested);
        const select = (parent: DynamicFlags) => childStorage(parent, spec.field, nested);
        if (spec.role === 'SUBCOMMAND') {
          def.nested(spec.field, child, select, {
            role: 'SUBCOMMAND',
            tag: {
              name: spec.name,
              visibility: spec.visibility,
              help: spec.help,
              about: spec.about,
              aliases: spec.aliases,
            },
          });
        } else {
          def.nested(spec.field, child, select, {
            role: 'GROUP',
            tag: {
              name: spec.name,
              letter: spec.letter,
              visibility: spec.visibility,
              help: spec.help,
              aliases: spec.aliases,
            },
          });
        }
        break;
      }
    }
  }
  return def;
}

/**
 * Turns a validated flag table into a flag struct over plain JSON storage.
 * Configuration errors surface when the result is first compiled.
 */
export function flagStructFromTable(table: FlagTable): FlagStruct<DynamicFlags> {
  return buildStruct(table.name, table.fields, table.app);
}
