import { afterEach, describe, expect, it } from '@jest/globals';
import { extractionTree } from '../../../src/placement/extraction-report';
import { makeTempDir, removeTempDirs, writeFile } from '../../helpers/temp-dirs';

afterEach(removeTempDirs);

describe('extractionTree', () => {
  it('walks the target depth first in name order', async () => {
    const cwd = makeTempDir();
    writeFile(cwd, 'site/b.txt');
    writeFile(cwd, 'site/a/z.txt');
    writeFile(cwd, 'site/a/y.txt');
    expect(await extractionTree(cwd, 'site', ['a', 'b.txt'])).toEqual([
      'site/',
      'site/a/',
      'site/a/y.txt',
      'site/a/z.txt',
      'site/b.txt',
    ]);
  });

  it('starts from the extracted entries when they went into the working directory', async () => {
    const cwd = makeTempDir();
    writeFile(cwd, 'unrelated.txt');
    writeFile(cwd, 'lib/util.js');
    writeFile(cwd, 'index.js');
    expect(await extractionTree(cwd, '.', ['lib', 'index.js'])).toEqual(['index.js', 'lib/', 'lib/util.js']);
  });

  it('prints a single stream as its target', async () => {
    expect(await extractionTree('/anywhere', 'notes.txt', null)).toEqual(['notes.txt']);
  });

  it('prints nothing when nothing was placed', async () => {
    expect(await extractionTree('/anywhere', '', [])).toEqual([]);
  });
});
