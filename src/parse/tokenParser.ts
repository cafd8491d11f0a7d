import { CliError } from '../errors';
import { bisect } from '../schema/lookup';
import type { FlagRecord, SchemaNode } from '../schema/types';
import { renderUsage } from '../usage/renderUsage';
import { err, ok, OK_VOID, type Result } from '../util/result';

type Step = Result<void, CliError>;

/** A flag token after its dashes and `=value` have been split off. */
type FlagText = {
  text: string;
  arg: string | undefined;
  /** Consumed prefix for diagnostics: `--`, `-X`, `--group `. */
  lead: string;
  /** Resolve `text` rune by rune before trying it as a long name. */
  peel: boolean;
};

function splitValue(text: string): { text: string; arg: string | undefined } {
  const eq = text.indexOf('=');
  return eq < 0 ? { text, arg: undefined } : { text: text.slice(0, eq), arg: text.slice(eq + 1) };
}

/**
 * One parse call. `sub` is the subcommand currently in effect; `cur` is where
 * flag names are looked up and is transiently a group's node while a group
 * selector is being resolved.
 */
class TokenParser<R> {
  private sub = 0;
  private cur = 0;
  private nextPositional = 0;
  private doneWithFlags = false;
  private pos = 0;
  private readonly seen = new Set<number>();
  private readonly entered: number[] = [0];

  constructor(
    private readonly nodes: readonly SchemaNode<R>[],
    private readonly storage: R,
    private readonly exe: string,
    private readonly argv: readonly string[],
  ) {}

  run(): Step {
    while (this.pos < this.argv.length) {
      const token = this.argv[this.pos++];
      this.cur = this.sub;

      if (!this.doneWithFlags) {
        if (token === '--') {
          this.doneWithFlags = true;
          continue;
        }
        if (token.startsWith('-') && token !== '-') {
          const step = this.flag(token);
          if (!step.ok) return step;
          continue;
        }
      }

      const step = this.operand(token);
      if (!step.ok) return step;
    }
    return this.checkRequired();
  }

  private fatal(message: string): Result<never, CliError> {
    return err(CliError.fatal(`${this.exe}: fatal: ${message}`));
  }

  private help(hidden: boolean): Step {
    return err(CliError.info(renderUsage(this.nodes, this.cur, this.exe, hidden)));
  }

  private next(): string | undefined {
    return this.pos < this.argv.length ? this.argv[this.pos++] : undefined;
  }

  private flag(token: string): Step {
    const isLetter = !token.startsWith('--');
    const { text, arg } = splitValue(token.slice(isLetter ? 1 : 2));
    let state: FlagText = { text, arg, lead: isLetter ? '-' : '--', peel: isLetter };
    let subFlag = false;

    for (;;) {
      if (state.peel) {
        const peeled = this.peel(token, state);
        if (peeled.kind === 'DONE') return peeled.step;
        if (peeled.kind === 'DESCEND') {
          state = peeled.state;
          subFlag = true;
          continue;
        }
        state = peeled.state;
      }

      const { text: name, arg: value, lead } = state;
      if (name === 'help' || (subFlag && name === 'h')) return this.help(false);
      if (name === 'help-hidden') return this.help(true);

      const entry = bisect(this.node().sortedFlags, name);
      if (!entry) {
        return this.fatal(
          `unknown flag ${JSON.stringify(token)}\n${this.exe}: you can use \`--\` if you meant to pass this as a positional argument`,
        );
      }

      const display = `${lead}${name}`;
      if (entry.isGroup) {
        const selected = this.selectSubFlag(token, value, entry.index, `${display} `);
        if (!selected.ok) return selected;
        state = selected.value;
        subFlag = true;
        continue;
      }

      const f = this.node().flags[entry.index];
      const seen = this.markSeen(f, display);
      if (!seen.ok) return seen;

      let raw = value;
      if (raw === undefined && f.wantsArgument) {
        raw = this.next();
        if (raw === undefined) return this.fatal(`expected argument after ${display}`);
      }
      return this.apply(f, display, raw ?? '');
    }
  }

  /**
   * Peels a letter cluster: `-xyz`, `-cbf42`, `-Xname`. Stops at the first rune that
   * is not a letter entry, leaving the rest to be resolved as a long name.
   */
  private peel(
    token: string,
    state: FlagText,
  ): { kind: 'DONE'; step: Step } | { kind: 'DESCEND'; state: FlagText } | { kind: 'LONG'; state: FlagText } {
    const runes = [...state.text];
    let lead = state.lead;

    for (let k = 0; k < runes.length; k++) {
      const r = runes[k];
      const rest = runes.slice(k + 1).join('');
      if (r === 'h') return { kind: 'DONE', step: this.help(false) };

      const entry = bisect(this.node().sortedFlags, r);
      if (!entry || !entry.isLetter) {
        return { kind: 'LONG', state: { text: runes.slice(k).join(''), arg: state.arg, lead, peel: false } };
      }

      if (entry.isGroup) {
        if (rest === '') {
          const selected = this.selectSubFlag(token, state.arg, entry.index, `-${r} `);
          return selected.ok ? { kind: 'DESCEND', state: selected.value } : { kind: 'DONE', step: selected };
        }
        this.cur = this.node().groups[entry.index].child;
        lead = `-${r}`;
        continue;
      }

      const f = this.node().flags[entry.index];
      const display = `-${r}`;
      const seen = this.markSeen(f, display);
      if (!seen.ok) return { kind: 'DONE', step: seen };

      if (f.wantsArgument) {
        let raw = rest === '' ? state.arg : state.arg === undefined ? rest : `${rest}=${state.arg}`;
        if (raw === undefined) {
          raw = this.next();
          if (raw === undefined) return { kind: 'DONE', step: this.fatal(`expected argument after ${display}`) };
        }
        return { kind: 'DONE', step: this.apply(f, display, raw) };
      }

      if (rest === '') return { kind: 'DONE', step: this.apply(f, display, state.arg ?? '') };
      const step = this.apply(f, display, '');
      if (!step.ok) return { kind: 'DONE', step };
    }

    return { kind: 'LONG', state: { text: '', arg: state.arg, lead, peel: false } };
  }

  /** A group selector ending its token takes the next argv element as its sub-flag. */
  private selectSubFlag(token: string, arg: string | undefined, group: number, lead: string): Result<FlagText, CliError> {
    if (arg !== undefined) return this.fatal(`unexpected argument after ${token}`);
    const next = this.next();
    if (next === undefined) return this.fatal(`expected sub-flag after ${token}`);
    this.cur = this.node().groups[group].child;
    const split = splitValue(next);
    return ok({ text: split.text, arg: split.arg, lead, peel: false });
  }

  private markSeen(f: FlagRecord<R>, display: string): Step {
    if (this.seen.has(f.id) && f.count !== 'REPEATED') {
      return this.fatal(`flag ${display} appeared more than once`);
    }
    this.seen.add(f.id);
    return OK_VOID;
  }

  private apply(f: FlagRecord<R>, display: string, raw: string): Step {
    const applied = f.apply(this.storage, raw);
    if (!applied.ok) return this.fatal(`could not parse argument for ${display}: ${applied.error}`);
    return OK_VOID;
  }

  private operand(token: string): Step {
    const sub = this.nodes[this.sub];
    const entry = bisect(sub.sortedSubs, token);
    if (entry) {
      this.sub = sub.subcommands[entry.index].child;
      this.cur = this.sub;
      this.nextPositional = 0;
      this.entered.push(this.sub);
      return OK_VOID;
    }

    const p = sub.positionals[this.nextPositional];
    if (!p) return this.fatal(`unexpected extra argument ${JSON.stringify(token)}`);
    const applied = p.apply(this.storage, token);
    if (!applied.ok) return this.fatal(`could not parse argument ${JSON.stringify(token)}: ${applied.error}`);
    if (p.count !== 'REPEATED') this.nextPositional++;
    return OK_VOID;
  }

  private checkRequired(): Step {
    for (const index of this.entered) {
      for (const [id, name] of this.nodes[index].required) {
        if (!this.seen.has(id)) return this.fatal(`missing flag --${name}`);
      }
    }
    return OK_VOID;
  }

  private node(): SchemaNode<R> {
    return this.nodes[this.cur];
  }
}

/** Walks argv against a finalized schema, writing values into `storage` as it goes. */
export function parseTokens<R>(
  nodes: readonly SchemaNode<R>[],
  storage: R,
  exe: string,
  argv: readonly string[],
): Result<void, CliError> {
  return new TokenParser(nodes, storage, exe, argv).run();
}
