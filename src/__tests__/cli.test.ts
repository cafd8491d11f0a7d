import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pc from 'picocolors';

import { main, parseBoolish, runCheck, runExtract, runParse, runUsage } from '../cli';
import type { ProcessIo } from '../errors';
import type { FlagTable } from '../table/flagTable';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function captureIo() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: ProcessIo = {
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    exit: (code) => {
      throw new Error(`exit ${code}`);
    },
  };
  return { io, stdout, stderr };
}

const miniTable: FlagTable = {
  schema: 'flag-table-v1',
  name: 'Mini',
  app: { name: 'mini' },
  fields: [
    { field: 'level', role: 'FLAG', type: 'int', letter: 'l', help: 'how loud' },
    { field: 'files', role: 'POSITIONAL', multiple: true },
  ],
};

const MINI_USAGE = [
  'Usage: mini -hl [OPTIONS] [ARG1]...',
  '# Flags',
  '  -l, --level ARG . . . . . . how loud',
  '',
  '  -h, --help  . . . . . . . . show usage and exit',
  '',
  'Version: mini',
].join('\n');

function tableFile(table: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagstruct-cli-'));
  const file = path.join(dir, 'mini.flags.json');
  writeFile(file, JSON.stringify(table));
  return file;
}

describe('flagstruct CLI', () => {
  test('parseBoolish', () => {
    expect(parseBoolish(undefined, true)).toBe(true);
    expect(parseBoolish('off', true)).toBe(false);
    expect(parseBoolish('', false)).toBe(true);
    expect(parseBoolish('perhaps', false)).toBe(false);
  });

  test('usage prints the help text of a table', async () => {
    const { io, stdout, stderr } = captureIo();
    expect(await runUsage({ table: tableFile(miniTable), hidden: false }, io)).toBe(0);
    expect(stdout).toEqual([MINI_USAGE]);
    expect(stderr).toEqual([]);
  });

  test('usage rejects an invalid table', async () => {
    const { io, stdout, stderr } = captureIo();
    const file = tableFile({ schema: 'flag-table-v1', fields: [] });
    expect(await runUsage({ table: file, hidden: false }, io)).toBe(2);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([`${file}: /: must have required property 'name'`]);
  });

  test('parse prints storage as JSON', async () => {
    const { io, stdout } = captureIo();
    expect(await runParse({ table: tableFile(miniTable), args: ['-l', '3', 'a'] }, io)).toBe(0);
    expect(stdout).toEqual(['{\n  "files": [\n    "a"\n  ],\n  "level": 3\n}']);
  });

  test('parse reports help and errors with their exit codes', async () => {
    const file = tableFile(miniTable);

    const help = captureIo();
    expect(await runParse({ table: file, args: ['--help'] }, help.io)).toBe(0);
    expect(help.stdout).toEqual([MINI_USAGE]);

    const bad = captureIo();
    expect(await runParse({ table: file, exe: '/opt/bin/other', args: ['--nope'] }, bad.io)).toBe(128);
    expect(bad.stderr).toEqual([
      pc.red('other: fatal: unknown flag "--nope"\nother: you can use `--` if you meant to pass this as a positional argument'),
    ]);
  });

  test('check exits 3 on configuration errors and writes the report', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagstruct-cli-check-'));
    writeFile(path.join(dir, 'mini.flags.json'), JSON.stringify(miniTable));
    writeFile(
      path.join(dir, 'dup.flags.json'),
      JSON.stringify({
        schema: 'flag-table-v1',
        name: 'Dup',
        fields: [
          { field: 'a', role: 'FLAG', letter: 'k' },
          { field: 'b', role: 'FLAG', letter: 'k' },
        ],
      }),
    );
    const report = path.join(dir, 'out', 'report.json');

    const { io, stderr } = captureIo();
    const code = await runCheck({ source: dir, exclude: [], report, format: 'json', verbose: false }, io);

    expect(code).toBe(3);
    expect(stderr).toEqual(['dup.flags.json: detected duplicate flag: -k']);
    const written = JSON.parse(fs.readFileSync(report, 'utf8'));
    expect(written.tables.map((t: { file: string; status: string }) => `${t.file}:${t.status}`)).toEqual([
      'dup.flags.json:rejected',
      'mini.flags.json:ok',
    ]);
  });

  test('extract writes one table per @flags interface', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagstruct-cli-extract-'));
    writeFile(path.join(dir, 'tsconfig.json'), JSON.stringify({ compilerOptions: { strict: true } }));
    writeFile(
      path.join(dir, 'src/flags.ts'),
      `/** @flags */
export interface Mini {
  /**
   * how loud
   * @flag
   * @letter l
   */
  level: number;
  files: string[];
}
`,
    );
    const out = path.join(dir, 'tables');

    const { io, stderr } = captureIo();
    expect(await runExtract({ source: dir, out, exclude: [], verbose: false }, io)).toBe(0);
    expect(stderr).toEqual([]);
    expect(JSON.parse(fs.readFileSync(path.join(out, 'Mini.flags.json'), 'utf8'))).toEqual({
      schema: 'flag-table-v1',
      name: 'Mini',
      fields: [
        { field: 'level', role: 'FLAG', type: 'int', letter: 'l', help: 'how loud' },
        { field: 'files', role: 'POSITIONAL', type: 'string', multiple: true },
      ],
    });
  });

  test('extract exits 3 when a table does not compile', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagstruct-cli-extract-bad-'));
    writeFile(path.join(dir, 'tsconfig.json'), JSON.stringify({ compilerOptions: { strict: true } }));
    writeFile(
      path.join(dir, 'src/flags.ts'),
      `/** @flags */
export interface Clash {
  /**
   * @flag
   * @letter k
   */
  a: number;
  /**
   * @flag
   * @letter k
   */
  b: number;
}
`,
    );

    const { io, stderr } = captureIo();
    expect(await runExtract({ source: dir, out: path.join(dir, 'tables'), exclude: [], verbose: false }, io)).toBe(3);
    expect(stderr).toEqual(['src/flags.ts: error: Clash: detected duplicate flag: -k']);
    expect(fs.existsSync(path.join(dir, 'tables', 'Clash.flags.json'))).toBe(true);
  });

  test('main wires the commands and maps thrown errors to exit code 2', async () => {
    const file = tableFile(miniTable);

    const ok = captureIo();
    expect(await main(['node', 'flagstruct', 'parse', '--exe', 'mini', file, '--', '--level', '7'], ok.io)).toBe(0);
    expect(ok.stdout).toEqual(['{\n  "files": [],\n  "level": 7\n}']);

    const bad = captureIo();
    const dir = path.dirname(file);
    expect(await main(['node', 'flagstruct', 'check', '--source', dir, '--format', 'xml'], bad.io)).toBe(2);
    expect(bad.stderr).toEqual(['Unknown report format: xml (expected md|json)']);
  });
});
