import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Relative file path (posix) within the scanned project root. */
  file: string;
  /** 1-based line number. */
  line?: number;
  /** 1-based column number. */
  column?: number;
};

export type ReportFindingKind = 'invalidTable' | 'configurationError' | 'extractProblem' | 'note';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
};

export type TableStatus = 'ok' | 'invalid' | 'rejected';

export type TableSummary = {
  file: string;
  /** Root struct name; empty when the table did not validate. */
  name: string;
  status: TableStatus;
  flags: number;
  positionals: number;
  subcommands: number;
  groups: number;
};

export type CheckReport = {
  schema: 'check-report-v1';
  tool: { name: string; version: string };
  projectRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  tables: TableSummary[];
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  projectRoot: string;
  startedAtIso?: string;
}): CheckReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'check-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    projectRoot: args.projectRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    tables: [],
    findings: [],
  };
}

export function finalizeReport(report: CheckReport, finishedAtIso?: string): CheckReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  report.tables.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0));
  return report;
}

export function hasErrors(report: CheckReport): boolean {
  return report.findings.some((f) => f.severity === 'error');
}

export function serializeReport(report: CheckReport): string {
  return stableStringify(report);
}
