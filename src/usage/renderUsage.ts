import { compareKeys, isVisible } from '../schema/names';
import type { AppInfo, Entry, NamedVisibility, SchemaNode } from '../schema/types';

/** Help text starts at column WIDTH + 2. */
const WIDTH = 28;
const SUB_INDENT = 6;

function spaces(n: number): string {
  return ' '.repeat(n);
}

/** Dotted leader: blank first and last columns, dots on alternating columns in between. */
export function leaderDots(n: number): string {
  let out = '';
  for (let i = 0; i < n; i++) {
    out += i === 0 || i === n - 1 || i % 2 !== n % 2 ? ' ' : '.';
  }
  return out;
}

function width(s: string): number {
  return [...s].length;
}

type FlagRow = {
  entry: Entry;
  names: NamedVisibility[];
  hasLetter: boolean;
  arg: string;
  help: string;
};

function usageLine<R>(nodes: readonly SchemaNode<R>[], node: SchemaNode<R>, exe: string, hidden: boolean): string {
  const ancestry: string[] = [];
  // Letters and positionals come from the nearest enclosing subcommand, not a group.
  let cmd: SchemaNode<R> | undefined = node.link?.kind === 'GROUP' ? undefined : node;
  let n = node;
  while (n.link) {
    const link = n.link;
    if (link.kind === 'SUBCOMMAND') {
      ancestry.push(link.name);
    } else if (link.letter) {
      ancestry.push(`-${link.letter}`);
    } else if (link.name) {
      ancestry.push(`--${link.name}`);
    }
    const parent = nodes[link.parent];
    if (!cmd && parent.link?.kind !== 'GROUP') cmd = parent;
    n = parent;
  }
  const command = cmd ?? node;

  let line = `Usage: ${exe}`;
  for (const part of ancestry.reverse()) line += ` ${part}`;
  if (node.link?.kind === 'GROUP') line += ' [SUBOPTION]';

  const letters = command.sortedFlags.filter((e) => e.isLetter && isVisible(e.visibility, hidden)).map((e) => e.key);
  letters.push('h');
  letters.sort(compareKeys);
  line += ` -${letters.join('')}`;

  if (command.sortedFlags.length > 0) line += ' [OPTIONS]';

  const subs = command.sortedSubs.filter((e) => !e.isCopy && isVisible(e.visibility, hidden)).map((e) => e.key);
  if (subs.length > 0) line += ` [${subs.join('|')}]`;

  command.positionals.forEach((p, idx) => {
    const name = p.name || `ARG${idx + 1}`;
    if (p.count === 'REQUIRED') line += ` <${name}>`;
    else if (p.count === 'OPTIONAL') line += ` [${name}]`;
    else line += ` [${name}]...`;
  });
  return `${line}\n`;
}

function nodeText<R>(node: SchemaNode<R>): string {
  const link = node.link;
  if (!link) return node.app.about ?? '';
  if (link.kind === 'GROUP') return link.help;
  return link.about || link.help;
}

function renderSubcommands<R>(node: SchemaNode<R>, hidden: boolean): string {
  let out = '';
  for (const e of node.sortedSubs) {
    if (!isVisible(e.visibility, hidden)) continue;
    if (out === '') out += '# Subcommands\n';

    out += spaces(SUB_INDENT) + e.key;
    const extra = WIDTH - width(e.key) - SUB_INDENT;
    out += extra >= 0 ? leaderDots(extra + 2) : `\n${spaces(WIDTH + 2)}`;

    node.subcommands[e.index].help.split('\n').forEach((line, i) => {
      if (i > 0) out += spaces(WIDTH + 2);
      out += `${line}\n`;
    });
  }
  return out === '' ? '' : `${out}\n`;
}

/**
 * Ordinary flags come first, keyed by letter when they have one; then group
 * selectors and copied flags, keyed by name.
 */
function flagRows<R>(node: SchemaNode<R>): FlagRow[] {
  const rows: FlagRow[] = [];
  const row = (entry: Entry): FlagRow => {
    if (entry.isGroup) {
      const g = node.groups[entry.index];
      return { entry, names: g.names, hasLetter: g.hasLetter, arg: 'FLAG', help: g.help };
    }
    const f = node.flags[entry.index];
    return { entry, names: f.names, hasLetter: f.hasLetter, arg: f.wantsArgument ? f.arg || 'ARG' : '', help: f.help };
  };

  for (const e of node.sortedFlags) {
    if (e.isAlias || e.isGroup || e.isCopy) continue;
    const r = row(e);
    if (r.hasLetter && !e.isLetter) continue;
    rows.push(r);
  }
  for (const e of node.sortedFlags) {
    if (e.isAlias || !(e.isGroup || e.isCopy)) continue;
    const r = row(e);
    // A letter-only group is listed under its letter.
    if (r.hasLetter && e.isLetter && r.names.length > 1) continue;
    rows.push(r);
  }
  return rows;
}

function renderFlagRow(r: FlagRow, hidden: boolean): string {
  const { entry, names, hasLetter, arg } = r;
  const letterShown = hasLetter && !entry.isCopy && isVisible(names[0].visibility, hidden);
  const dot = entry.key.lastIndexOf('.');
  const prefix = entry.isCopy && dot >= 0 ? entry.key.slice(0, dot + 1) : '';
  const withArg = (s: string) => (arg ? `${s} ${arg}` : s);

  const longs = names.slice(hasLetter ? 1 : 0).filter((n) => isVisible(n.visibility, hidden));
  const labels = longs.map((n, i) => withArg(`--${prefix}${n.name}`) + (i < longs.length - 1 ? ',' : ''));
  let lead = letterShown ? `  -${names[0].name}, ` : spaces(SUB_INDENT);
  if (labels.length === 0) {
    if (!letterShown) return '';
    labels.push(withArg(`-${names[0].name}`));
    lead = '  ';
  }

  const helps = r.help.split('\n');
  let out = '';
  labels.forEach((label, i) => {
    const text = (i === 0 ? lead : spaces(SUB_INDENT)) + label;
    const help = helps.shift() ?? '';
    const extra = WIDTH - width(text);
    out += text;
    if (extra >= 0) {
      out += (i === 0 ? leaderDots(extra + 2) : spaces(extra + 2)) + help;
    } else if (help !== '') {
      out += `\n${spaces(WIDTH + 2)}${help}`;
    }
    out += '\n';
  });
  for (const help of helps) out += `${spaces(WIDTH + 2)}${help}\n`;
  return out;
}

function renderFlags<R>(node: SchemaNode<R>, hidden: boolean): string {
  let out = '';
  let firstGroup = true;
  for (const r of flagRows(node)) {
    if (!isVisible(r.entry.visibility, hidden)) continue;
    const text = renderFlagRow(r, hidden);
    if (text === '') continue;
    if ((r.entry.isGroup || r.entry.isCopy) && firstGroup) {
      firstGroup = false;
      out += '\n';
    }
    out += text;
  }
  return out === '' ? '' : `# Flags\n${out}`;
}

function trailer(label: string, help: string): string {
  return label + leaderDots(WIDTH - width(label) + 2) + help + '\n';
}

function footer(app: AppInfo): string {
  let out = '';
  let about = '';
  if (app.version) about += `Version: ${app.name ? `${app.name} ` : ''}v${app.version}\n`;
  else if (app.name) about += `Version: ${app.name}\n`;
  if (app.url) about += `Website: <${app.url}>\n`;
  if (about) out += `\n${about}`;

  if (app.authors) {
    const year = app.copyrightYear === undefined ? '' : `${app.copyrightYear} `;
    const license = app.license ? `, licensed ${app.license}` : '';
    out += `\n(c) ${year}${app.authors}${license}\n`;
  }
  return out;
}

/** Help text for one node of a schema tree. */
export function renderUsage<R>(nodes: readonly SchemaNode<R>[], index: number, exe: string, hidden: boolean): string {
  const node = nodes[index];
  let out = usageLine(nodes, node, exe, hidden);

  const text = nodeText(node);
  if (text) out += `${text}\n\n`;

  out += renderSubcommands(node, hidden);
  out += renderFlags(node, hidden);

  out += '\n';
  out += trailer('  -h, --help', 'show usage and exit');
  if (hidden) out += trailer('      --help-hidden', 'show extended usage and exit');

  return out + footer(nodes[0].app);
}
