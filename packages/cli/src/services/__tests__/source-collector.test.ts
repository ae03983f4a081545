import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { collectSourceUnits } from '../source-collector.js';

describe('collectSourceUnits', () => {
  let root: string;

  async function write(relative: string, content: string): Promise<string> {
    const filePath = path.join(root, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'gradekit-sources-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('walks directories for python files in name order', async () => {
    await write('b.py', 'b = 2');
    await write('a.py', 'a = 1');
    await write('sub/c.py', 'c = 3');
    await write('notes.txt', 'ignore me');
    await write('__pycache__/d.py', 'cached');
    await write('.hidden/e.py', 'hidden');

    const { units, skipped } = await collectSourceUnits([root]);

    expect(units).toEqual([
      { name: 'a.py', text: 'a = 1' },
      { name: 'b.py', text: 'b = 2' },
      { name: 'sub/c.py', text: 'c = 3' },
    ]);
    expect(skipped).toEqual([]);
  });

  it('takes explicit files by base name and reports non-python ones', async () => {
    const source = await write('work/solution.py', 'x = 1');
    const readme = await write('work/README.md', '# notes');

    const { units, skipped } = await collectSourceUnits([source, readme]);

    expect(units).toEqual([{ name: 'solution.py', text: 'x = 1' }]);
    expect(skipped).toEqual([readme]);
  });

  it('reads each file once and drops a byte order mark', async () => {
    const source = await write('bom.py', '\uFEFFprint(1)');

    const { units } = await collectSourceUnits([source, root]);

    expect(units).toEqual([{ name: 'bom.py', text: 'print(1)' }]);
  });

  it('rejects a missing path', async () => {
    await expect(collectSourceUnits([path.join(root, 'missing')])).rejects.toThrow(/does not exist/);
  });
});
