#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { compileTable, checkFlagTables } from './check/checkTables';
import { processIo, type ProcessIo } from './errors';
import { extractFlagTables } from './extract/extractFlagTables';
import { VERSION } from './index';
import { hasErrors } from './report/checkReport';
import { type ReportFormat, writeReportFile } from './report/writeReport';
import { flagStructFromTable, type FlagTable } from './table/flagTable';
import { loadFlagTableFile, validateFlagTable } from './table/loadFlagTable';
import { stableStringify } from './util/deterministicJson';

const TOOL_NAME = 'flagstruct';

type RawOptions = Record<string, unknown>;

export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function optString(v: unknown): string | undefined {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  return v;
}

function optStrings(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
}

function parseFormat(v: unknown): ReportFormat {
  const s = String(v ?? 'md').trim().toLowerCase();
  if (s === 'md' || s === 'json') return s;
  throw new Error(`Unknown report format: ${s} (expected md|json)`);
}

export type CheckOptions = {
  source: string;
  exclude: string[];
  report?: string;
  format: ReportFormat;
  verbose: boolean;
};

/** Exit 0 when every table validates and compiles, 3 otherwise. */
export async function runCheck(opts: CheckOptions, io: ProcessIo = processIo): Promise<number> {
  const report = await checkFlagTables({
    sourceRoot: opts.source,
    excludeGlobs: opts.exclude,
    toolName: TOOL_NAME,
    toolVersion: VERSION,
  });
  if (opts.report) await writeReportFile(opts.report, report, opts.format);

  const errors = report.findings.filter((f) => f.severity === 'error');
  for (const f of errors) io.stderr(`${f.location?.file ?? opts.source}: ${f.message}`);
  if (opts.verbose) {
    io.stdout(`Checked ${report.tables.length} table(s), ${errors.length} error(s).`);
    if (opts.report) io.stdout(`Wrote report: ${opts.report}`);
  }
  return hasErrors(report) ? 3 : 0;
}

async function loadTableOrReport(file: string, io: ProcessIo): Promise<FlagTable | undefined> {
  const loaded = await loadFlagTableFile(file);
  if (loaded.ok) return loaded.value;
  for (const message of loaded.error) io.stderr(`${file}: ${message}`);
  return undefined;
}

export type UsageOptions = {
  table: string;
  exe?: string;
  hidden: boolean;
};

export async function runUsage(opts: UsageOptions, io: ProcessIo = processIo): Promise<number> {
  const table = await loadTableOrReport(opts.table, io);
  if (!table) return 2;
  const text = flagStructFromTable(table).usage(opts.exe ?? table.app?.name ?? table.name, opts.hidden);
  io.stdout(text.replace(/\n$/, ''));
  return 0;
}

export type ParseOptions = {
  table: string;
  exe?: string;
  args: string[];
};

/** Prints the parsed storage as JSON; help exits 0 and parse errors exit 128. */
export async function runParse(opts: ParseOptions, io: ProcessIo = processIo): Promise<number> {
  const table = await loadTableOrReport(opts.table, io);
  if (!table) return 2;
  const parsed = flagStructFromTable(table).parse(opts.exe ?? table.app?.name ?? table.name, opts.args);
  if (!parsed.ok) return parsed.error.report(io);
  io.stdout(stableStringify(parsed.value).replace(/\n$/, ''));
  return 0;
}

export type ExtractCommandOptions = {
  source: string;
  out: string;
  tsconfig?: string;
  exclude: string[];
  verbose: boolean;
};

/** Writes one `<Name>.flags.json` per `@flags` interface. Exit 3 when any finding is an error. */
export async function runExtract(opts: ExtractCommandOptions, io: ProcessIo = processIo): Promise<number> {
  const result = await extractFlagTables({
    projectRoot: opts.source,
    tsconfigPath: opts.tsconfig,
    excludeGlobs: opts.exclude,
  });
  const findings = [...result.findings];

  await fs.mkdir(opts.out, { recursive: true });
  for (const { file, table } of result.tables) {
    const valid = validateFlagTable(table);
    const problems = valid.ok ? compileTable(table) : valid.error;
    for (const message of problems) {
      findings.push({ kind: 'configurationError', severity: 'error', message: `${table.name}: ${message}`, location: { file } });
    }
    await fs.writeFile(path.join(opts.out, `${table.name}.flags.json`), stableStringify(table), 'utf8');
  }

  for (const f of findings) {
    const loc = f.location ? `${f.location.file}${f.location.line ? `:${f.location.line}` : ''}` : opts.source;
    io.stderr(`${loc}: ${f.severity}: ${f.message}`);
  }
  if (opts.verbose) {
    io.stdout(`Scanned ${result.filesScanned} file(s), extracted ${result.tables.length} table(s). Wrote: ${opts.out}`);
  }
  return findings.some((f) => f.severity === 'error') ? 3 : 0;
}

export async function main(argv: string[], io: ProcessIo = processIo): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description('Check, render and try out command-line flag tables')
    .version(VERSION)
    .exitOverride();

  program
    .command('check')
    .description('Validate and compile every *.flags.json under a directory.')
    .requiredOption('--source <path>', 'Root directory to scan')
    .option('--exclude <glob...>', 'Additional exclude glob(s), relative to --source', [])
    .option('--report <file>', 'Optional report path', '')
    .option('--format <fmt>', 'Report format: md|json', 'md')
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawOptions) => {
      exitCode = await runCheck(
        {
          source: String(raw.source),
          exclude: optStrings(raw.exclude),
          report: optString(raw.report),
          format: parseFormat(raw.format),
          verbose: parseBoolish(raw.verbose, false),
        },
        io,
      );
    });

  program
    .command('usage')
    .description('Print the help text of a flag table.')
    .argument('<table>', 'Path to a *.flags.json file')
    .option('--exe <name>', 'Executable name for the usage line')
    .option('--hidden', 'Include hidden flags', false)
    .action(async (table: string, raw: RawOptions) => {
      exitCode = await runUsage({ table, exe: optString(raw.exe), hidden: parseBoolish(raw.hidden, false) }, io);
    });

  program
    .command('parse')
    .description('Parse arguments against a flag table and print the result as JSON.')
    .argument('<table>', 'Path to a *.flags.json file')
    .argument('[args...]', 'Arguments to parse; put them after --')
    .option('--exe <name>', 'Executable name for messages')
    .action(async (table: string, args: string[], raw: RawOptions) => {
      exitCode = await runParse({ table, exe: optString(raw.exe), args }, io);
    });

  program
    .command('extract')
    .description('Write a flag table for every interface tagged @flags.')
    .requiredOption('--source <path>', 'Root directory to analyze')
    .requiredOption('--out <dir>', 'Output directory')
    .option('--tsconfig <path>', 'Explicit tsconfig.json selection (overrides auto)', '')
    .option('--exclude <glob...>', 'Additional exclude glob(s), relative to --source', [])
    .option('-v, --verbose', 'Verbose logging', false)
    .action(async (raw: RawOptions) => {
      exitCode = await runExtract(
        {
          source: String(raw.source),
          out: String(raw.out),
          tsconfig: optString(raw.tsconfig),
          exclude: optStrings(raw.exclude),
          verbose: parseBoolish(raw.verbose, false),
        },
        io,
      );
    });

  try {
    await program.parseAsync(argv);
    return exitCode;
  } catch (e: unknown) {
    // Commander has already printed its own message.
    if (e instanceof CommanderError) return e.exitCode;
    io.stderr(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      processIo.stderr(String(e));
      process.exitCode = 2;
    },
  );
}
