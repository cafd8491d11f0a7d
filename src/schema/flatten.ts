import { ConfigurationError } from '../errors';
import { sortEntries } from './lookup';
import { mergeVisibility } from './names';
import type { Entry, NamedVisibility, SchemaNode, Visibility } from './types';

function mergeNames(names: NamedVisibility[], visibility: Visibility): NamedVisibility[] {
  return names.map((n) => ({ name: n.name, visibility: mergeVisibility(n.visibility, visibility) }));
}

/**
 * Finalizes one node whose children are already final: builds the lookup tables,
 * inlines every group's flags and subcommands, collects required flags, sorts
 * and rejects duplicate keys.
 */
export function flattenNode<R>(nodes: readonly SchemaNode<R>[], index: number): void {
  const node = nodes[index];

  node.flags.forEach((f, idx) => {
    f.names.forEach(({ name, visibility }, nameIdx) => {
      if (visibility === 'DELETE') return;
      node.sortedFlags.push({
        key: name,
        index: idx,
        isGroup: false,
        isLetter: nameIdx === 0 && f.hasLetter,
        isAlias: nameIdx > (f.hasLetter ? 1 : 0),
        isCopy: false,
        visibility,
      });
    });
  });

  node.subcommands.forEach((s, idx) => {
    s.names.forEach(({ name, visibility }, nameIdx) => {
      if (visibility === 'DELETE') return;
      node.sortedSubs.push({
        key: name,
        index: idx,
        isGroup: false,
        isLetter: false,
        isAlias: nameIdx > 0,
        isCopy: false,
        visibility,
      });
    });
  });

  // Groups appended below come from already-flattened children; they are only
  // targets for the copied selector entries, so the loop bound is fixed here.
  const ownGroups = node.groups.length;
  for (let idx = 0; idx < ownGroups; idx++) {
    const group = node.groups[idx];
    const child = nodes[group.child];
    const mergeVis: Visibility = group.isFlatten ? 'PUBLIC' : group.visibility;

    const flagOffset = node.flags.length;
    const subOffset = node.subcommands.length;
    const groupOffset = node.groups.length;

    for (const f of child.flags) node.flags.push({ ...f, names: mergeNames(f.names, mergeVis) });
    for (const s of child.subcommands) node.subcommands.push({ ...s, names: mergeNames(s.names, mergeVis) });
    for (const g of child.groups) node.groups.push({ ...g, names: mergeNames(g.names, mergeVis) });

    const copyEntries = (prefix: string, visibility: Visibility, isCopy: boolean) => {
      for (const e of child.sortedFlags) {
        if (isCopy && e.isLetter) continue;
        node.sortedFlags.push({
          ...e,
          key: prefix ? `${prefix}.${e.key}` : e.key,
          index: e.index + (e.isGroup ? groupOffset : flagOffset),
          visibility: mergeVisibility(e.visibility, visibility),
          isCopy,
        });
      }
      for (const e of child.sortedSubs) {
        node.sortedSubs.push({
          ...e,
          key: prefix ? `${prefix}.${e.key}` : e.key,
          index: e.index + subOffset,
          visibility: mergeVisibility(e.visibility, visibility),
          isCopy,
        });
      }
    };

    if (group.isFlatten) {
      copyEntries('', mergeVis, false);
      continue;
    }

    group.names.forEach(({ name, visibility }, nameIdx) => {
      if (visibility === 'DELETE') return;
      const isLetter = nameIdx === 0 && group.hasLetter;
      node.sortedFlags.push({
        key: name,
        index: idx,
        isGroup: true,
        isLetter,
        isAlias: nameIdx > (group.hasLetter ? 1 : 0),
        isCopy: false,
        visibility,
      });
      // Letter-selected members are reached as `-Xname`, never through a dotted key.
      if (isLetter) return;
      copyEntries(name, mergeVisibility(visibility, mergeVis), true);
    });
  }

  for (const f of node.flags) {
    if (f.count !== 'REQUIRED') continue;
    if (f.names.every((n) => n.visibility === 'DELETE')) continue;
    node.required.set(f.id, f.names[f.hasLetter ? 1 : 0].name);
  }

  sortEntries(node.sortedFlags);
  sortEntries(node.sortedSubs);
  checkDuplicates(node.sortedFlags, (a, b) => `detected duplicate flag: ${flagForms(a, b)}`);
  checkDuplicates(node.sortedSubs, (e) => `detected duplicate subcommand: ${e.key}`);
}

/** `-k` or `--key`; `-a/--a` when a letter collides with a long name. */
function flagForms(a: Entry, b: Entry): string {
  if (a.isLetter === b.isLetter) return `${b.isLetter ? '-' : '--'}${b.key}`;
  return `-${b.key}/--${b.key}`;
}

function checkDuplicates(table: readonly Entry[], message: (a: Entry, b: Entry) => string): void {
  for (let i = 1; i < table.length; i++) {
    if (table[i].key === table[i - 1].key) throw new ConfigurationError(message(table[i - 1], table[i]));
  }
}
