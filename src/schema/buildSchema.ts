import { ConfigurationError } from '../errors';
import type { FlagStruct } from './flagStruct';
import { flattenNode } from './flatten';
import { checkNotReserved, kebabCase, normalizeLetter, normalizeName } from './names';
import { Schema } from './schema';
import type {
  AliasTag,
  ArgBinding,
  FlagRecord,
  FlagTag,
  GroupTag,
  NamedVisibility,
  ParentLink,
  PositionalRecord,
  PositionalTag,
  SchemaNode,
  SubcommandTag,
  Visibility,
} from './types';

function longName(name: string, origin: string): string {
  return checkNotReserved(normalizeName(name, origin), origin);
}

function pushAliases(names: NamedVisibility[], aliases: AliasTag[] | undefined, fallback: Visibility, origin: string): void {
  for (const alias of aliases ?? []) {
    names.push({ name: longName(alias.name, origin), visibility: alias.visibility ?? fallback });
  }
}

export function flagNames(tag: FlagTag, field: string, origin: string): NamedVisibility[] {
  const visibility = tag.visibility ?? 'PUBLIC';
  const names: NamedVisibility[] = [];
  if (tag.letter) names.push({ name: normalizeLetter(tag.letter, origin), visibility });
  names.push({ name: longName(tag.name ?? kebabCase(field), origin), visibility });
  pushAliases(names, tag.aliases, visibility, origin);
  return names;
}

export function subcommandNames(tag: SubcommandTag, field: string, origin: string): NamedVisibility[] {
  const visibility = tag.visibility ?? 'PUBLIC';
  const names: NamedVisibility[] = [{ name: longName(tag.name ?? kebabCase(field), origin), visibility }];
  pushAliases(names, tag.aliases, visibility, origin);
  return names;
}

/** Group names are never derived from the field: a group without name or letter is flattened. */
export function groupNames(tag: GroupTag, origin: string): NamedVisibility[] {
  const visibility = tag.visibility ?? 'PUBLIC';
  const names: NamedVisibility[] = [];
  if (tag.letter) names.push({ name: normalizeLetter(tag.letter, origin), visibility });
  if (tag.name !== undefined) names.push({ name: longName(tag.name, origin), visibility });
  if (names.length === 0 && tag.aliases && tag.aliases.length > 0) {
    throw new ConfigurationError(`field ${origin} is a flattened group and cannot have aliases`);
  }
  pushAliases(names, tag.aliases, visibility, origin);
  return names;
}

function checkPositionalOrder<R>(positionals: readonly PositionalRecord<R>[]): void {
  let sawOptional = false;
  let repeated: string | undefined;
  for (const p of positionals) {
    if (repeated) {
      throw new ConfigurationError(`positional ${p.origin} follows repeated positional ${repeated}`);
    }
    if (p.count === 'REQUIRED' && sawOptional) {
      throw new ConfigurationError(`required positional ${p.origin} follows an optional positional`);
    }
    if (p.count === 'OPTIONAL') sawOptional = true;
    if (p.count === 'REPEATED') repeated = p.origin;
  }
}

/**
 * Builds one arena node per flag struct use site. R is the root storage type;
 * every parse callback is bound through the downcast from the root to its own struct.
 */
export class SchemaBuilder<R> {
  readonly nodes: SchemaNode<R>[] = [];
  private nextFlagId = 0;

  build<T>(def: FlagStruct<T>, downcast: (root: R) => T, link: ParentLink | null): number {
    const index = this.nodes.length;
    const node: SchemaNode<R> = {
      index,
      structName: def.name,
      link,
      app: link ? {} : def.app,
      flags: [],
      positionals: [],
      subcommands: [],
      groups: [],
      sortedFlags: [],
      sortedSubs: [],
      required: new Map(),
    };
    this.nodes.push(node);

    for (const d of def.descriptors()) {
      const origin = `${def.name}.${d.field}`;
      switch (d.role) {
        case 'FLAG':
          node.flags.push(this.flagRecord(d.tag, d.field, origin, d.binding, downcast));
          break;
        case 'POSITIONAL': {
          const binding = d.binding;
          node.positionals.push({
            origin,
            name: d.tag.name ?? '',
            count: d.tag.count ?? binding.defaultCount,
            help: d.tag.help ?? '',
            apply: (root, raw) => binding.apply(downcast(root), raw),
          });
          break;
        }
        case 'SUBCOMMAND': {
          const names = subcommandNames(d.tag, d.field, origin);
          const help = d.tag.help ?? '';
          const child = d.child.buildInto(this, downcast, {
            kind: 'SUBCOMMAND',
            parent: index,
            name: names[0].name,
            help,
            about: d.tag.about ?? '',
          });
          node.subcommands.push({ origin, names, help, child });
          break;
        }
        case 'GROUP': {
          const names = groupNames(d.tag, origin);
          const help = d.tag.help ?? '';
          const child = d.child.buildInto(this, downcast, {
            kind: 'GROUP',
            parent: index,
            name: d.tag.name === undefined ? '' : longName(d.tag.name, origin),
            letter: d.tag.letter ?? '',
            help,
          });
          if (this.nodes[child].positionals.length > 0) {
            throw new ConfigurationError(`group ${origin} (${d.child.structName}) cannot contain positionals`);
          }
          node.groups.push({
            origin,
            names,
            hasLetter: Boolean(d.tag.letter),
            isFlatten: names.length === 0,
            visibility: d.tag.visibility ?? 'PUBLIC',
            help,
            child,
          });
          break;
        }
      }
    }

    checkPositionalOrder(node.positionals);
    flattenNode(this.nodes, index);
    return index;
  }

  private flagRecord<T>(
    tag: FlagTag,
    field: string,
    origin: string,
    binding: ArgBinding<T>,
    downcast: (root: R) => T,
  ): FlagRecord<R> {
    return {
      id: this.nextFlagId++,
      origin,
      names: flagNames(tag, field, origin),
      hasLetter: Boolean(tag.letter),
      count: tag.count ?? binding.defaultCount,
      wantsArgument: binding.wantsArgument,
      arg: tag.arg ?? '',
      help: tag.help ?? '',
      apply: (root, raw) => binding.apply(downcast(root), raw),
    };
  }
}

export function compileSchema<T>(def: FlagStruct<T>): Schema<T> {
  const builder = new SchemaBuilder<T>();
  builder.build(def, (root) => root, null);
  return new Schema(builder.nodes);
}
