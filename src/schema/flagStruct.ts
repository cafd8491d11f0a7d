import { CliError, ConfigurationError } from '../errors';
import { ok, OK_VOID, type Result } from '../util/result';
import type { SchemaBuilder } from './buildSchema';
import { compileSchema } from './buildSchema';
import type { Schema } from './schema';
import type {
  AppInfo,
  ArgBinding,
  ArgValue,
  FlagTag,
  GroupTag,
  ParentLink,
  PositionalTag,
  SubcommandTag,
} from './types';

export type FieldKey<T> = Extract<keyof T, string>;

/** A nested flag struct whose storage is reached from a T. */
export interface ChildBinding<T> {
  readonly structName: string;
  buildInto<R>(builder: SchemaBuilder<R>, downcast: (root: R) => T, link: ParentLink): number;
}

/** One field of a flag struct, in declaration order. */
export type FieldDescriptor<T> =
  | { role: 'FLAG'; field: string; tag: FlagTag; binding: ArgBinding<T> }
  | { role: 'POSITIONAL'; field: string; tag: PositionalTag; binding: ArgBinding<T> }
  | { role: 'SUBCOMMAND'; field: string; tag: SubcommandTag; child: ChildBinding<T> }
  | { role: 'GROUP'; field: string; tag: GroupTag; child: ChildBinding<T> };

export type NestedSpec = { role: 'SUBCOMMAND'; tag: SubcommandTag } | { role: 'GROUP'; tag: GroupTag };

function bind<T, K extends FieldKey<T>>(field: K, value: ArgValue<T[K]>): ArgBinding<T> {
  return {
    wantsArgument: value.wantsArgument,
    defaultCount: value.defaultCount,
    apply: (target, raw) => {
      const parsed = value.parse(raw, target[field]);
      if (!parsed.ok) return parsed;
      target[field] = parsed.value;
      return OK_VOID;
    },
  };
}

/**
 * Describes the command-line interface of a storage type T as an ordered list of
 * field descriptors. The compiled schema is cached on first use.
 *
 * ```ts
 * const Flags = defineFlags('Flags', () => ({ foo: 0, args: [] as string[] }))
 *   .flag('foo', int(), { letter: 'f', arg: 'INT', count: 'REQUIRED' })
 *   .positional('args', list(str()));
 * ```
 */
export class FlagStruct<T> {
  private readonly fields: FieldDescriptor<T>[] = [];
  private compiled: Schema<T> | undefined;

  constructor(
    readonly name: string,
    private readonly create: () => T,
    readonly app: AppInfo = {},
  ) {}

  /** A freshly initialized storage value. */
  defaults(): T {
    return this.create();
  }

  flag<K extends FieldKey<T>>(field: K, value: ArgValue<T[K]>, tag: FlagTag = {}): this {
    return this.push({ role: 'FLAG', field, tag, binding: bind(field, value) });
  }

  positional<K extends FieldKey<T>>(field: K, value: ArgValue<T[K]>, tag: PositionalTag = {}): this {
    return this.push({ role: 'POSITIONAL', field, tag, binding: bind(field, value) });
  }

  subcommand<K extends FieldKey<T>>(field: K, child: FlagStruct<T[K]>, tag: SubcommandTag = {}): this {
    return this.nested(field, child, (parent) => parent[field], { role: 'SUBCOMMAND', tag });
  }

  group<K extends FieldKey<T>>(field: K, child: FlagStruct<T[K]>, tag: GroupTag = {}): this {
    return this.nested(field, child, (parent) => parent[field], { role: 'GROUP', tag });
  }

  /**
   * Registers a subcommand or group whose storage is obtained with `select`. Useful
   * when T is not statically known, as for flag tables loaded at run time.
   */
  nested<C>(field: string, child: FlagStruct<C>, select: (parent: T) => C, spec: NestedSpec): this {
    const binding: ChildBinding<T> = {
      structName: child.name,
      buildInto<R>(builder: SchemaBuilder<R>, downcast: (root: R) => T, link: ParentLink): number {
        return builder.build(child, (root) => select(downcast(root)), link);
      },
    };
    if (spec.role === 'SUBCOMMAND') return this.push({ role: 'SUBCOMMAND', field, tag: spec.tag, child: binding });
    return this.push({ role: 'GROUP', field, tag: spec.tag, child: binding });
  }

  descriptors(): readonly FieldDescriptor<T>[] {
    return this.fields;
  }

  schema(): Schema<T> {
    if (!this.compiled) this.compiled = compileSchema(this);
    return this.compiled;
  }

  /** Parses argv (without the executable) into fresh storage. */
  parse(exe: string, argv: readonly string[]): Result<T, CliError> {
    const storage = this.create();
    const result = this.schema().parse(storage, exe, argv);
    return result.ok ? ok(storage) : result;
  }

  usage(exe: string, hidden = false): string {
    return this.schema().usage(exe, hidden);
  }

  private push(descriptor: FieldDescriptor<T>): this {
    if (this.compiled) {
      throw new ConfigurationError(`cannot add field ${this.name}.${descriptor.field} after ${this.name} was compiled`);
    }
    if (this.fields.some((f) => f.field === descriptor.field)) {
      throw new ConfigurationError(`field ${this.name}.${descriptor.field} has more than one role`);
    }
    this.fields.push(descriptor);
    return this;
  }
}

export function defineFlags<T>(name: string, create: () => T, app?: AppInfo): FlagStruct<T> {
  return new FlagStruct(name, create, app);
}
