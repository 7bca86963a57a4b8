/**
 * Filename-based type guessing.
 *
 * Mirrors the classic "type + content encoding" guess: suffix aliases such
 * as .tgz expand first, a trailing encoding suffix (.gz, .xz, ...) is peeled
 * off, and the remaining extension is looked up in the MIME database.
 */

import * as path from 'path';
import * as mime from 'mime-types';
import type { Encoding } from '../types/archive';

const ENCODING_SUFFIXES: ReadonlyMap<string, Encoding> = new Map<string, Encoding>([
  ['.gz', 'gzip'],
  ['.Z', 'compress'],
  ['.bz2', 'bzip2'],
  ['.xz', 'xz'],
  ['.br', 'br'],
  ['.lzma', 'lzma'],
  ['.lz', 'lzip'],
  ['.lrz', 'lrzip'],
  ['.zst', 'zstd'],
  ['.zstd', 'zstd'],
]);

const SUFFIX_ALIASES: ReadonlyMap<string, string> = new Map([
  ['.svgz', '.svg.gz'],
  ['.tgz', '.tar.gz'],
  ['.taz', '.tar.gz'],
  ['.tz', '.tar.gz'],
  ['.tbz2', '.tar.bz2'],
  ['.txz', '.tar.xz'],
]);

// Types the MIME database does not carry
const EXTRA_TYPES: ReadonlyMap<string, string> = new Map([['.gem', 'application/x-ruby-gem']]);

export interface TypeGuess {
  mimetype: string | null;
  encoding: Encoding | null;
}

function splitExtension(name: string): [string, string] {
  const extension = path.extname(name);
  return [name.slice(0, name.length - extension.length), extension];
}

export function encodingForSuffix(extension: string): Encoding | undefined {
  return ENCODING_SUFFIXES.get(extension);
}

export function encodingSuffixes(): string[] {
  return Array.from(ENCODING_SUFFIXES.keys());
}

export function mimetypeForExtension(extension: string): string | null {
  const extra = EXTRA_TYPES.get(extension) ?? EXTRA_TYPES.get(extension.toLowerCase());
  if (extra) return extra;
  if (extension.length < 2) return null;
  return mime.lookup(extension) || null;
}

/**
 * True when the suffix names a known file type (or a suffix alias);
 * basename rules use this to decide what is safe to strip.
 */
export function isKnownTypeSuffix(extension: string): boolean {
  return SUFFIX_ALIASES.has(extension) || mimetypeForExtension(extension) !== null;
}

export function guessType(filename: string): TypeGuess {
  let [base, extension] = splitExtension(path.basename(filename));

  let alias = SUFFIX_ALIASES.get(extension);
  while (alias !== undefined) {
    [base, extension] = splitExtension(base + alias);
    alias = SUFFIX_ALIASES.get(extension);
  }

  let encoding: Encoding | null = null;
  const suffixEncoding = ENCODING_SUFFIXES.get(extension);
  if (suffixEncoding !== undefined) {
    encoding = suffixEncoding;
    [base, extension] = splitExtension(base);
  }

  return { mimetype: mimetypeForExtension(extension), encoding };
}

/** Every [extension, mimetype] pair known to the database, extensions without the dot */
export function knownExtensionTypes(): Array<[string, string]> {
  const extra = Array.from(EXTRA_TYPES.entries()).map(
    ([extension, type]): [string, string] => [extension.slice(1), type]
  );
  return [...Object.entries(mime.types), ...extra];
}
