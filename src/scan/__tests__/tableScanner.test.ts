import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { scanFlagTables } from '../tableScanner';

async function mkFile(p: string, content = '{}'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

describe('scanFlagTables', () => {
  test('finds *.flags.json outside the default excludes', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flagstruct-tables-'));
    await mkFile(path.join(dir, 'tools/b.flags.json'));
    await mkFile(path.join(dir, 'a.flags.json'));
    await mkFile(path.join(dir, '.config/c.flags.json'));
    await mkFile(path.join(dir, 'tools/other.json'));
    await mkFile(path.join(dir, 'dist/d.flags.json'));
    await mkFile(path.join(dir, 'node_modules/pkg/e.flags.json'));

    expect(await scanFlagTables({ sourceRoot: dir })).toEqual([
      '.config/c.flags.json',
      'a.flags.json',
      'tools/b.flags.json',
    ]);
    expect(await scanFlagTables({ sourceRoot: dir, excludeGlobs: ['tools/**'] })).toEqual([
      '.config/c.flags.json',
      'a.flags.json',
    ]);
  });
});
