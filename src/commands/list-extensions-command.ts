import { isSupportedMimetype, tableExtensions } from '../detection/format-table';
import { encodingSuffixes, knownExtensionTypes } from '../detection/mimetype-guess';

/**
 * Every extension the classifier recognizes: the extension table, the
 * compression suffixes and MIME-database entries that map to a
 * supported type. Sorted, without dots, no duplicates.
 */
export function recognizedExtensions(): string[] {
  const found = new Set<string>(tableExtensions());
  for (const suffix of encodingSuffixes()) found.add(suffix.replace(/^\./, ''));
  for (const [extension, mimetype] of knownExtensionTypes()) {
    if (isSupportedMimetype(mimetype)) found.add(extension);
  }
  return Array.from(found).sort();
}

export function handleListExtensionsCommand(): void {
  process.stdout.write(`${recognizedExtensions().join('\n')}\n`);
}
