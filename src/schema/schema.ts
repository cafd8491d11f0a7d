import type { CliError } from '../errors';
import { parseTokens } from '../parse/tokenParser';
import { renderUsage } from '../usage/renderUsage';
import type { Result } from '../util/result';
import type { SchemaNode } from './types';

/** `/usr/local/bin/toy` -> `toy`. */
export function exeName(exe: string): string {
  return exe.split('/').pop() ?? exe;
}

/** A finalized, flattened schema tree. Node 0 is the root. */
export class Schema<R> {
  constructor(readonly nodes: readonly SchemaNode<R>[]) {}

  get root(): SchemaNode<R> {
    return this.nodes[0];
  }

  /**
   * Parses argv into `storage`. Help requests come back as non-fatal errors whose
   * message is the rendered usage.
   */
  parse(storage: R, exe: string, argv: readonly string[]): Result<void, CliError> {
    return parseTokens(this.nodes, storage, exeName(exe), argv);
  }

  usage(exe: string, hidden = false, node = 0): string {
    return renderUsage(this.nodes, node, exeName(exe), hidden);
  }
}
