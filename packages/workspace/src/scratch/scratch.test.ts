import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import fse from 'fs-extra';
import { createScratchWorkspace, type ScratchWorkspace } from './scratch';

describe('createScratchWorkspace', () => {
  const created: ScratchWorkspace[] = [];

  afterEach(async () => {
    await Promise.all(created.map((ws) => ws.dispose()));
    created.length = 0;
  });

  it('creates an empty, uniquely named directory under the OS temp dir', async () => {
    const a = await createScratchWorkspace();
    const b = await createScratchWorkspace();
    created.push(a, b);

    expect(a.path).not.toBe(b.path);
    expect(path.basename(a.path).startsWith('examplecheck-')).toBe(true);
    expect(path.dirname(a.path)).toBe(path.resolve(os.tmpdir()));
    expect(await fs.readdir(a.path)).toEqual([]);
  });

  it('removes the whole tree on dispose and tolerates a second dispose', async () => {
    const ws = await createScratchWorkspace('examplecheck-test-');
    await fs.mkdir(path.join(ws.path, 'src'));
    await fs.writeFile(path.join(ws.path, 'src', 'main.rs'), 'fn main() {}');

    await ws.dispose();
    await ws.dispose();

    expect(await fse.pathExists(ws.path)).toBe(false);
  });
});
