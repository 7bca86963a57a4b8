import { describe, expect, it } from '@jest/globals';
import {
  compressionBasename,
  debBasename,
  genericBasename,
  metadataBasename,
  rpmBasename,
} from '../../../src/extractors/basename-rules';
import { outputFileName } from '../../../src/extractors/variant-registry';

describe('genericBasename', () => {
  it.each([
    ['foo.tar.gz', 'foo'],
    ['foo.tgz', 'foo'],
    ['/tmp/downloads/foo-1.2.zip', 'foo-1.2'],
    ['backup.tar', 'backup'],
    ['data.v1', 'data'],
    ['archive', 'archive'],
    ['notes.abcdefg', 'notes.abcdefg'],
  ])('%s -> %s', (filename, expected) => {
    expect(genericBasename(filename)).toBe(expected);
  });

  it('keeps the name when stripping would leave nothing', () => {
    expect(genericBasename('.zip')).toBe('.zip');
  });
});

describe('compressionBasename', () => {
  it('strips only the encoding suffix', () => {
    expect(compressionBasename('report.txt.gz')).toBe('report.txt');
    expect(compressionBasename('image.xz')).toBe('image');
  });

  it('leaves other names alone', () => {
    expect(compressionBasename('payload.bin')).toBe('payload.bin');
  });
});

describe('rpmBasename', () => {
  it('drops the extension and a short architecture', () => {
    expect(rpmBasename('foo-1.0-1.x86_64.rpm')).toBe('foo-1.0-1');
    expect(rpmBasename('foo-1.0-1.noarch.rpm')).toBe('foo-1.0-1');
  });

  it('keeps a long last piece', () => {
    expect(rpmBasename('foo-1.0.1-verylongrelease.rpm')).toBe('foo-1.0.1-verylongrelease');
  });

  it('returns a name without dots unchanged', () => {
    expect(rpmBasename('foo')).toBe('foo');
  });
});

describe('debBasename', () => {
  it('drops the architecture part', () => {
    expect(debBasename('foo_1.0-2_amd64.deb')).toBe('foo_1.0-2');
  });

  it('returns a name without underscores unchanged', () => {
    expect(debBasename('foo.deb')).toBe('foo.deb');
  });

  it('falls back to the generic rule for an unexpected last piece', () => {
    expect(debBasename('foo_bar.zip')).toBe('foo_bar');
  });
});

describe('metadataBasename', () => {
  it('names the metadata file after the archive', () => {
    expect(metadataBasename('/srv/gems/rake-13.0.gem')).toBe('rake-13.0.gem-metadata.txt');
  });
});

describe('outputFileName', () => {
  it('drops the last extension', () => {
    expect(outputFileName('/data/dump.sql.zst')).toBe('dump.sql');
  });
});
