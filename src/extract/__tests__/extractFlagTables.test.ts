import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { flagStructFromTable } from '../../table/flagTable';
import { validateFlagTable } from '../../table/loadFlagTable';
import { extractFlagTables } from '../extractFlagTables';

function writeFile(p: string, content: string) {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

function mkProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagstruct-extract-'));
  writeFile(
    path.join(dir, 'tsconfig.json'),
    JSON.stringify({ compilerOptions: { target: 'ES2020', module: 'commonjs', strict: true }, include: ['src/**/*'] }),
  );
  for (const [rel, content] of Object.entries(files)) writeFile(path.join(dir, rel), content);
  return dir;
}

const TOOL_SOURCE = `/**
 * @flags
 * @app tool
 * @version 1.2.3
 * @authors someone
 * @copyright 2024
 * @license MIT
 */
export interface ToolFlags {
  /**
   * an integer
   * @flag
   * @letter f
   * @arg INT
   * @count REQUIRED
   */
  foo: number;
  /**
   * talk more
   * @flag
   * @letter v
   * @alias loud
   * @alias noisy HIDDEN
   */
  verbose?: boolean;
  /** @flag */
  tags: string[];
  /**
   * @flag
   * @rune
   */
  sep: string;
  /** @flag */
  level: number | null;
  /**
   * build things
   * @subcommand
   * @about builds the project
   */
  build: BuildFlags;
  /**
   * @group
   * @name net
   * @letter N
   */
  net: NetFlags;
  /** input files */
  files: Array<string>;
}

export interface BuildFlags {
  /**
   * @flag
   * @letter j
   */
  jobs: number;
  target: string;
}

interface NetFlags {
  /**
   * port to use
   * @flag
   */
  port: number;
}
`;

const BROKEN_SOURCE = `/** @flags */
export interface Broken {
  /**
   * @flag
   * @positional
   */
  both: number;
  /** @flag */
  nested: Broken;
  pick: 'a' | 'b';
  cb: () => void;
}
`;

describe('extractFlagTables', () => {
  test('turns @flags interfaces into flag tables', async () => {
    const projectRoot = mkProject({ 'src/flags.ts': TOOL_SOURCE });
    const result = await extractFlagTables({ projectRoot });

    expect(result.filesScanned).toBe(1);
    expect(result.findings).toEqual([]);
    expect(result.tables).toHaveLength(1);
    expect(result.tables[0].file).toBe('src/flags.ts');
    expect(result.tables[0].table).toEqual({
      schema: 'flag-table-v1',
      name: 'ToolFlags',
      app: { name: 'tool', version: '1.2.3', authors: 'someone', copyrightYear: 2024, license: 'MIT' },
      fields: [
        { field: 'foo', role: 'FLAG', help: 'an integer', type: 'int', count: 'REQUIRED', letter: 'f', arg: 'INT' },
        {
          field: 'verbose',
          role: 'FLAG',
          help: 'talk more',
          type: 'bool',
          optional: true,
          letter: 'v',
          aliases: [{ name: 'loud' }, { name: 'noisy', visibility: 'HIDDEN' }],
        },
        { field: 'tags', role: 'FLAG', type: 'string', multiple: true },
        { field: 'sep', role: 'FLAG', type: 'rune' },
        { field: 'level', role: 'FLAG', type: 'int', optional: true },
        {
          field: 'build',
          role: 'SUBCOMMAND',
          help: 'build things',
          struct: 'BuildFlags',
          about: 'builds the project',
          fields: [
            { field: 'jobs', role: 'FLAG', type: 'int', letter: 'j' },
            { field: 'target', role: 'POSITIONAL', type: 'string' },
          ],
        },
        {
          field: 'net',
          role: 'GROUP',
          name: 'net',
          struct: 'NetFlags',
          letter: 'N',
          fields: [{ field: 'port', role: 'FLAG', help: 'port to use', type: 'int' }],
        },
        { field: 'files', role: 'POSITIONAL', help: 'input files', type: 'string', multiple: true },
      ],
    });
  });

  test('extracted tables validate and parse', async () => {
    const projectRoot = mkProject({ 'src/flags.ts': TOOL_SOURCE });
    const { tables } = await extractFlagTables({ projectRoot });
    const valid = validateFlagTable(tables[0].table);
    if (!valid.ok) throw new Error(valid.error.join('\n'));

    const parsed = flagStructFromTable(valid.value).parse('tool', ['-f', '2', '-Nport', '8080', 'build', '-j', '3']);
    expect(parsed.ok).toBe(true);
    if (parsed.ok) {
      expect(parsed.value.foo).toBe(2);
      expect(parsed.value.net).toEqual({ port: 8080 });
      expect(parsed.value.build).toEqual({ jobs: 3, target: '' });
    }
  });

  test('reports problems as findings', async () => {
    const projectRoot = mkProject({ 'src/bad.ts': BROKEN_SOURCE });
    const result = await extractFlagTables({ projectRoot });

    expect(result.findings.map((f) => `${f.severity}: ${f.message}`)).toEqual([
      'error: Broken.both has more than one role (@flag, @positional)',
      'error: Broken.nested: @flag does not fit its type',
      'error: Broken.pick: union types are not supported',
      'error: Broken.cb: unsupported type () => void',
    ]);
    expect(result.findings[0].location).toEqual({ file: 'src/bad.ts', line: 7, column: 3 });
    expect(result.tables[0].table.fields).toEqual([]);
  });

  test('a struct that contains itself is reported once per cycle', async () => {
    const projectRoot = mkProject({
      'src/loop.ts': `/** @flags */
export interface Loop {
  /** @group */
  again: Loop;
}
`,
    });
    const result = await extractFlagTables({ projectRoot });

    expect(result.findings).toEqual([
      {
        kind: 'extractProblem',
        severity: 'error',
        message: 'Loop contains itself',
        location: { file: 'src/loop.ts', line: 2, column: 1 },
      },
    ]);
    expect(result.tables[0].table.fields).toEqual([
      { field: 'again', role: 'GROUP', struct: 'Loop', fields: [] },
    ]);
  });

  test('test files and excluded globs are skipped', async () => {
    const projectRoot = mkProject({
      'src/flags.ts': TOOL_SOURCE,
      'src/__tests__/flags.test.ts': BROKEN_SOURCE,
      'src/gen/other.ts': BROKEN_SOURCE,
    });
    const result = await extractFlagTables({ projectRoot, excludeGlobs: ['**/gen/**'] });
    expect(result.filesScanned).toBe(1);
    expect(result.tables.map((t) => t.table.name)).toEqual(['ToolFlags']);
  });
});
