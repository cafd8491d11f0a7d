import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { scanTypeScriptSources } from '../sourceScanner';

async function mkFile(p: string, content = 'x'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), 'flagstruct-scan-'));
}

describe('scanTypeScriptSources', () => {
  test('returns sorted TypeScript sources without declaration files', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'src/b.ts'));
    await mkFile(path.join(dir, 'src/a.mts'));
    await mkFile(path.join(dir, 'src/c.cts'));
    await mkFile(path.join(dir, 'src/d.js'));
    await mkFile(path.join(dir, 'src/ignore.d.ts'), 'declare const x: number;');

    const r1 = await scanTypeScriptSources({ sourceRoot: dir });
    const r2 = await scanTypeScriptSources({ sourceRoot: dir });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['src/a.mts', 'src/b.ts', 'src/c.cts']);
  });

  test('default excludes remove node_modules and tests unless includeTests=true', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'src/app.ts'));
    await mkFile(path.join(dir, 'node_modules/pkg/index.ts'));
    await mkFile(path.join(dir, 'src/__tests__/app.test.ts'));
    await mkFile(path.join(dir, 'src/foo.spec.ts'));

    expect(await scanTypeScriptSources({ sourceRoot: dir, includeTests: false })).toEqual(['src/app.ts']);
    expect(await scanTypeScriptSources({ sourceRoot: dir, includeTests: true })).toEqual([
      'src/__tests__/app.test.ts',
      'src/app.ts',
      'src/foo.spec.ts',
    ]);
  });

  test('additional excludes are applied', async () => {
    const dir = await mkTempDir();
    await mkFile(path.join(dir, 'src/app.ts'));
    await mkFile(path.join(dir, 'src/generated/gen.ts'));

    const res = await scanTypeScriptSources({ sourceRoot: dir, excludeGlobs: ['**/generated/**'] });
    expect(res).toEqual(['src/app.ts']);
  });
});
