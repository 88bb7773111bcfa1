import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PreconditionError } from '@examplecheck/shared';
import { DirectoryExampleSet, exampleName } from './example-set';
import { writeTree } from '../test-utils/fixtures';

describe('exampleName', () => {
  it.each([
    ['blink.rs', 'blink'],
    ['uart', 'uart'],
    ['archive.tar.gz', 'archive.tar'],
  ])('%s -> %s', (fileName, name) => {
    expect(exampleName(fileName)).toBe(name);
  });
});

describe('DirectoryExampleSet', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'examplecheck-examples-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists top-level entries in lexicographic order with extensions stripped', async () => {
    await writeTree(dir, {
      'uart.rs': '',
      'blink.rs': '',
      'Zeta.rs': '',
      'multi/main.rs': '',
    });

    const units = await new DirectoryExampleSet(dir).list();

    expect(units.map((u) => u.name)).toEqual(['Zeta', 'blink', 'multi', 'uart']);
    expect(units[1]).toEqual({ name: 'blink', fileName: 'blink.rs', path: path.join(dir, 'blink.rs') });
  });

  it('does not recurse, skips hidden entries and drops duplicate names', async () => {
    await writeTree(dir, {
      '.gitkeep': '',
      'blink.rs': '',
      'blink.md': '',
      'nested/inner.rs': '',
    });

    const units = await new DirectoryExampleSet(dir).list();

    expect(units.map((u) => u.fileName)).toEqual(['blink.md', 'nested']);
  });

  it('keeps directory order when asked to', async () => {
    await writeTree(dir, { 'b.rs': '', 'a.rs': '' });
    const raw = (await fs.readdir(dir)).map((entry) => entry.replace(/\.rs$/, ''));

    const units = await new DirectoryExampleSet(dir, 'directory').list();

    expect(units.map((u) => u.name)).toEqual(raw);
  });

  it('reads through a symlinked directory', async () => {
    const real = path.join(dir, 'real');
    await writeTree(real, { 'blink.rs': '' });
    const link = path.join(dir, 'link');
    await fs.symlink(real, link, 'dir');

    const units = await new DirectoryExampleSet(link).list();

    expect(units).toEqual([{ name: 'blink', fileName: 'blink.rs', path: path.join(link, 'blink.rs') }]);
  });

  it('fails with PreconditionError when the directory is missing', async () => {
    await expect(new DirectoryExampleSet(path.join(dir, 'none')).list()).rejects.toBeInstanceOf(
      PreconditionError,
    );
  });
});
