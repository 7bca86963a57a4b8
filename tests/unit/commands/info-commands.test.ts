import { describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { helpText } from '../../../src/commands/help-command';
import { recognizedExtensions } from '../../../src/commands/list-extensions-command';
import { getVersion } from '../../../src/commands/version-command';
import { FLAGS } from '../../../src/commands/option-parser';

describe('helpText', () => {
  const text = helpText();

  it('starts with the usage line', () => {
    expect(text.split('\n')[0]).toBe('Usage: unpackit [options] archive [archive2 ...]');
  });

  it('describes every flag', () => {
    for (const flag of FLAGS) {
      expect(text).toContain(flag.description);
    }
  });

  it('shows value placeholders', () => {
    expect(text).toContain('  -p PASSWORD, --password=PASSWORD  provide a password for password-protected archives');
  });
});

describe('recognizedExtensions', () => {
  const extensions = recognizedExtensions();

  it('includes table, encoding and MIME-derived extensions', () => {
    expect(extensions).toEqual(expect.arrayContaining(['tar.gz', 'tgz', 'zip', 'deb', 'gz', 'zst', 'gem']));
  });

  it('is sorted, without dots in front and without duplicates', () => {
    expect([...extensions].sort()).toEqual(extensions);
    expect(new Set(extensions).size).toBe(extensions.length);
    expect(extensions.some((extension) => extension.startsWith('.'))).toBe(false);
  });

  it('leaves out formats nothing can extract', () => {
    expect(extensions).not.toContain('txt');
    expect(extensions).not.toContain('pdf');
  });
});

describe('getVersion', () => {
  it('reports the package version', () => {
    const manifest: { version: string } = JSON.parse(
      fs.readFileSync(path.join(__dirname, '../../../package.json'), 'utf8')
    );
    expect(getVersion()).toBe(manifest.version);
  });
});
