import { afterEach, describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { grantOwnerAccess, walkTree } from '../../../src/utils/tree-walk';
import { makeTempDir, removeTempDirs, writeFile } from '../../helpers/temp-dirs';

afterEach(removeTempDirs);

function mode(target: string): number {
  return fs.statSync(target).mode & 0o777;
}

describe('walkTree', () => {
  it('visits parents first by default', async () => {
    const root = makeTempDir();
    writeFile(root, 'top.txt');
    writeFile(root, 'a/b/deep.txt');
    const levels = await walkTree(root);
    expect(levels.map((level) => level.relative)).toEqual(['', 'a', path.join('a', 'b')]);
    expect(levels[0]?.files).toEqual(['top.txt']);
    expect(levels[2]?.files).toEqual(['deep.txt']);
  });

  it('visits children first when asked', async () => {
    const root = makeTempDir();
    writeFile(root, 'a/b/deep.txt');
    const levels = await walkTree(root, { bottomUp: true });
    expect(levels.map((level) => level.relative)).toEqual([path.join('a', 'b'), 'a', '']);
  });

  it('reports symbolic links as files without following them', async () => {
    const root = makeTempDir();
    fs.mkdirSync(path.join(root, 'real'));
    fs.symlinkSync(path.join(root, 'real'), path.join(root, 'link'));
    const [top] = await walkTree(root);
    expect(top?.directories).toEqual(['real']);
    expect(top?.files).toEqual(['link']);
  });
});

describe('grantOwnerAccess', () => {
  it('opens up directories and files for their owner', async () => {
    const root = makeTempDir();
    const locked = path.join(root, 'locked');
    const file = writeFile(root, 'locked/data.bin');
    const script = writeFile(root, 'locked/run.sh');
    fs.chmodSync(file, 0o400);
    fs.chmodSync(script, 0o411);
    fs.chmodSync(locked, 0o500);

    await grantOwnerAccess(locked);

    expect(mode(locked)).toBe(0o700);
    expect(mode(file)).toBe(0o600);
    expect(mode(script)).toBe(0o711);
  });
});
