import path from 'node:path';

import { ConfigurationError } from '../errors';
import { createEmptyReport, finalizeReport, type CheckReport, type TableSummary } from '../report/checkReport';
import { addFileFindings } from '../report/reportBuilder';
import { scanFlagTables } from '../scan/tableScanner';
import { flagStructFromTable, type FieldSpec, type FlagTable } from '../table/flagTable';
import { loadFlagTableFile } from '../table/loadFlagTable';

export type CheckTablesOptions = {
  sourceRoot: string;
  excludeGlobs?: string[];
  toolName: string;
  toolVersion: string;
};

type FieldCounts = Pick<TableSummary, 'flags' | 'positionals' | 'subcommands' | 'groups'>;

function countFields(fields: readonly FieldSpec[], into: FieldCounts): FieldCounts {
  for (const f of fields) {
    if (f.role === 'FLAG') into.flags++;
    else if (f.role === 'POSITIONAL') into.positionals++;
    else if (f.role === 'SUBCOMMAND') into.subcommands++;
    else into.groups++;
    countFields(f.fields ?? [], into);
  }
  return into;
}

/** Compiles a valid table; configuration mistakes come back as messages. */
export function compileTable(table: FlagTable): string[] {
  try {
    flagStructFromTable(table).schema();
    return [];
  } catch (e: unknown) {
    if (e instanceof ConfigurationError) return [e.message];
    throw e;
  }
}

/**
 * Validates and compiles every `*.flags.json` under sourceRoot. Errors are
 * recorded as findings; only I/O failures throw.
 */
export async function checkFlagTables(opts: CheckTablesOptions): Promise<CheckReport> {
  const report = createEmptyReport({
    toolName: opts.toolName,
    toolVersion: opts.toolVersion,
    projectRoot: opts.sourceRoot,
  });

  const files = await scanFlagTables({ sourceRoot: opts.sourceRoot, excludeGlobs: opts.excludeGlobs });
  report.filesScanned = files.length;

  for (const file of files) {
    const empty: TableSummary = { file, name: '', status: 'invalid', flags: 0, positionals: 0, subcommands: 0, groups: 0 };
    const loaded = await loadFlagTableFile(path.join(opts.sourceRoot, file));
    if (!loaded.ok) {
      addFileFindings(report, file, 'invalidTable', 'error', loaded.error);
      report.tables.push(empty);
      continue;
    }

    const table = loaded.value;
    const problems = compileTable(table);
    addFileFindings(report, file, 'configurationError', 'error', problems);
    report.tables.push({
      ...countFields(table.fields, { flags: 0, positionals: 0, subcommands: 0, groups: 0 }),
      file,
      name: table.name,
      status: problems.length === 0 ? 'ok' : 'rejected',
    });
  }

  if (files.length === 0) {
    report.findings.push({ kind: 'note', severity: 'info', message: 'no *.flags.json tables found' });
  }
  return finalizeReport(report);
}
