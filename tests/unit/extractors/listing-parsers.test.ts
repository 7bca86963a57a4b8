import { describe, expect, it } from '@jest/globals';
import {
  arjListing,
  borderLineFileIndex,
  cabListing,
  lhaListing,
  lsarListing,
  sevenZipListing,
  shieldListing,
  unrarListing,
  zstdListing,
  type ListingParser,
} from '../../../src/extractors/listing-parsers';

async function* feed(lines: readonly string[]): AsyncGenerator<string, void, undefined> {
  yield* lines;
}

async function parse(parser: ListingParser, lines: readonly string[]): Promise<string[]> {
  const names: string[] = [];
  for await (const name of parser(feed(lines))) names.push(name);
  return names;
}

describe('borderLineFileIndex', () => {
  it('points just past the last space of a border', () => {
    expect(borderLineFileIndex('---- ---- ----')).toBe(10);
  });

  it('rejects lines with anything but dashes and spaces', () => {
    expect(borderLineFileIndex('---- name')).toBeNull();
  });

  it('rejects a border without spaces', () => {
    expect(borderLineFileIndex('-----')).toBeNull();
  });
});

describe('lhaListing', () => {
  it('reads the last column between the borders', async () => {
    const lines = ['PERM  NAME', '----- -----', 'rw-r- a.txt', 'rw-r- dir/b.txt', '----- -----', 'total'];
    expect(await parse(lhaListing, lines)).toEqual(['a.txt', 'dir/b.txt']);
  });
});

describe('sevenZipListing', () => {
  it('takes the text after the last space', async () => {
    const lines = ['2024-01-02 10:00:00 ....A           12           20  docs/readme.md'];
    expect(await parse(sevenZipListing, lines)).toEqual(['docs/readme.md']);
  });
});

describe('zstdListing', () => {
  it('reads names under the first border', async () => {
    const lines = ['Frames Name', '------ -----', '     1 dump.sql.zst', '------ -----', 'trailer'];
    expect(await parse(zstdListing, lines)).toEqual(['dump.sql.zst']);
  });
});

describe('cabListing', () => {
  it('reads the name column after the header border', async () => {
    const lines = [
      'Viewing cabinet: setup.cab',
      ' File size | Date       Time     | Name',
      '-----------+---------------------+-------------',
      '       12 | 01.01.2024 10:00:00 | a.txt',
      '       34 | 01.01.2024 10:00:00 | lib/b.dll',
      '',
      'All done, no errors.',
    ];
    expect(await parse(cabListing, lines)).toEqual(['a.txt', 'lib/b.dll']);
  });
});

describe('shieldListing', () => {
  it('strips the size column and stops at the summary border', async () => {
    const lines = ['  1024  data/file.txt', '    17  data/other.txt', ' --------  -------', '  2  files'];
    expect(await parse(shieldListing, lines)).toEqual(['data/file.txt', 'data/other.txt']);
  });
});

describe('unrarListing', () => {
  it('yields every other line between the borders', async () => {
    const lines = [
      'UNRAR 6.00',
      '-----------',
      ' a.txt',
      '  12  10  83%  01-01-24 10:00',
      ' sub/b.txt',
      '  34  30  88%  01-01-24 10:00',
      '-----------',
      ' ignored',
    ];
    expect(await parse(unrarListing, lines)).toEqual(['a.txt', 'sub/b.txt']);
  });
});

describe('lsarListing', () => {
  it('skips the header and the details in parentheses', async () => {
    const lines = ['photos.rar: RAR', 'a.jpg  (1024 B)', 'trip/b.jpg  (3 B)', 'plain'];
    expect(await parse(lsarListing, lines)).toEqual(['a.jpg', 'trip/b.jpg', 'plain']);
  });
});

describe('arjListing', () => {
  it('keeps only numbered member lines', async () => {
    const lines = ['ARJ32 v 3.10', '001) a.txt', '  11  1.000', '002) docs/c.txt'];
    expect(await parse(arjListing, lines)).toEqual(['a.txt', 'docs/c.txt']);
  });
});
