import type { CheckReport, ReportFinding } from './checkReport';
import { incCount } from './reportBuilder';

function fmtLoc(f: ReportFinding): string {
  if (!f.location) return '';
  const { file, line, column } = f.location;
  if (line && column) return `${file}:${line}:${column}`;
  if (line) return `${file}:${line}`;
  return file;
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, '<br>');
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function reportToMarkdown(report: CheckReport): string {
  const lines: string[] = [];
  const errors = report.findings.filter((f) => f.severity === 'error');
  const byKind: Record<string, number> = {};
  for (const f of report.findings) incCount(byKind, f.kind);

  lines.push(`# Flag table check report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Project root: \`${report.projectRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- Findings: **${report.findings.length}** (errors: **${errors.length}**)`);
  lines.push('');

  lines.push(`## Tables`);
  lines.push('');
  lines.push(`| File | Struct | Status | Flags | Positionals | Subcommands | Groups |`);
  lines.push(`|---|---|---|---:|---:|---:|---:|`);
  for (const t of report.tables) {
    lines.push(
      `| ${cell(t.file)} | ${cell(t.name)} | ${t.status} | ${t.flags} | ${t.positionals} | ${t.subcommands} | ${t.groups} |`,
    );
  }
  if (report.tables.length === 0) lines.push(`| (none) |  |  | 0 | 0 | 0 | 0 |`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const kinds = Object.keys(byKind).sort(compare);
  for (const k of kinds) lines.push(`| ${k} | ${byKind[k]} |`);
  if (kinds.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => compare(a.kind, b.kind) || compare(fmtLoc(a), fmtLoc(b)) || compare(a.message, b.message));
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${cell(fmtLoc(f))} | ${cell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
