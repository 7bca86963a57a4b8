/**
 * Basename rules: the name an archive's contents should be placed under.
 *
 * All rules work on the final path component only.
 */

import * as path from 'path';
import { encodingForSuffix, isKnownTypeSuffix } from '../detection/mimetype-guess';

export type BasenameRule = (filename: string) => string;

/**
 * Strip an encoding suffix, then a known type suffix. If neither applied,
 * drop a short trailing piece (".v1", ".pkg") when there is one.
 */
export const genericBasename: BasenameRule = (filename) => {
  const name = path.basename(filename);
  const pieces = name.split('.');
  const originalLength = pieces.length;

  let extension = `.${pieces[pieces.length - 1] ?? ''}`;
  if (encodingForSuffix(extension) !== undefined) {
    pieces.pop();
    extension = `.${pieces[pieces.length - 1] ?? ''}`;
  }
  if (pieces.length > 0 && isKnownTypeSuffix(extension)) {
    pieces.pop();
  }
  const last = pieces[pieces.length - 1];
  if (originalLength === pieces.length && originalLength > 1 && last !== undefined && last.length < 5) {
    pieces.pop();
  }

  const result = pieces.join('.');
  return result === '' ? name : result;
};

/** Single compressed stream: only the encoding suffix goes */
export const compressionBasename: BasenameRule = (filename) => {
  const name = path.basename(filename);
  const extension = path.extname(name);
  if (extension !== '' && encodingForSuffix(extension) !== undefined) {
    return name.slice(0, -extension.length);
  }
  return name;
};

/** foo-1.0-1.x86_64.rpm -> foo-1.0-1 */
export const rpmBasename: BasenameRule = (filename) => {
  const pieces = path.basename(filename).split('.');
  if (pieces.length === 1) return pieces[0] ?? '';
  if (pieces[pieces.length - 1] !== 'rpm') return genericBasename(filename);
  pieces.pop();
  if (pieces.length === 1) return pieces[0] ?? '';
  const arch = pieces[pieces.length - 1];
  if (arch !== undefined && arch.length < 8) pieces.pop();
  return pieces.join('.');
};

/** foo_1.0-2_amd64.deb -> foo_1.0-2 */
export const debBasename: BasenameRule = (filename) => {
  const pieces = path.basename(filename).split('_');
  if (pieces.length === 1) return pieces[0] ?? '';
  const last = pieces.pop();
  if (last === undefined || last.length > 10 || !last.endsWith('.deb')) {
    return genericBasename(filename);
  }
  return pieces.join('_');
};

export const shieldBasename: BasenameRule = (filename) => {
  const result = genericBasename(filename);
  return result.endsWith('.hdr') ? result.slice(0, -'.hdr'.length) : result;
};

export const metadataBasename: BasenameRule = (filename) =>
  `${path.basename(filename)}-metadata.txt`;
