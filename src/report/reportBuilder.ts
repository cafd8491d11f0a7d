import type { CheckReport, ReportFinding, ReportFindingKind, ReportSeverity } from './checkReport';

export function addFinding(report: CheckReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

/** Records one finding per message, all located in `file`. */
export function addFileFindings(
  report: CheckReport,
  file: string,
  kind: ReportFindingKind,
  severity: ReportSeverity,
  messages: readonly string[],
): void {
  for (const message of messages) addFinding(report, { kind, severity, message, location: { file } });
}

export function incCount(map: Record<string, number>, key: string, amount = 1): void {
  map[key] = (map[key] ?? 0) + amount;
}
