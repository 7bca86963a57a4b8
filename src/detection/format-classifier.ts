/**
 * Format Classifier
 *
 * Three-tier cascade, cheapest first:
 * 1. MIME guess from the filename (with content encoding)
 * 2. Suffix table (.tgz, .tbz2 and friends)
 * 3. Magic probe via `file`
 *
 * The probe is authoritative but runs last: it reports gems as plain tar.
 */

import * as path from 'path';
import type { ArchiveDescriptor, DetectionTier } from '../types/archive';
import { descriptorsForExtension, kindForMimetype } from './format-table';
import { guessType } from './mimetype-guess';
import { probeMagic, type ProbeEnvironment } from './magic-probe';

export interface Candidate {
  descriptor: ArchiveDescriptor;
  tier: DetectionTier;
}

export function guessByMimetype(filename: string): ArchiveDescriptor[] {
  const { mimetype, encoding } = guessType(filename);
  const kind = mimetype ? kindForMimetype(mimetype) : undefined;
  if (kind) return [{ kind, encoding }];
  if (encoding) return [{ kind: 'compress', encoding }];
  return [];
}

/**
 * Look up the last two dot-separated suffixes, longest combination first.
 */
export function guessByExtension(filename: string): ArchiveDescriptor[] {
  const parts = path.basename(filename).split('.').slice(-2);
  if (parts.length === 1) return [];

  const results: ArchiveDescriptor[] = [];
  while (parts.length > 0) {
    results.push(...descriptorsForExtension(parts.join('.')));
    parts.shift();
  }
  return results;
}

/** Name-only check used when scanning extracted trees for nested archives */
export function looksLikeArchive(filename: string): boolean {
  return guessByMimetype(filename).length > 0 || guessByExtension(filename).length > 0;
}

export function descriptorKey(descriptor: ArchiveDescriptor): string {
  return `${descriptor.kind}:${descriptor.encoding ?? 'none'}`;
}

/**
 * Lazily yield de-duplicated candidates, most likely first.
 * Single pass: the magic probe only runs if the caller keeps pulling.
 */
export async function* classify(
  filename: string,
  probeEnv: ProbeEnvironment
): AsyncGenerator<Candidate, void, undefined> {
  const tried = new Set<string>();
  const tiers: ReadonlyArray<[DetectionTier, () => Promise<ArchiveDescriptor[]>]> = [
    ['mimetype', async () => guessByMimetype(filename)],
    ['extension', async () => guessByExtension(filename)],
    ['magic', () => probeMagic(filename, probeEnv)],
  ];

  for (const [tier, guess] of tiers) {
    probeEnv.logger.debug(`getting extractors by ${tier}`);
    const descriptors = await guess();
    for (const descriptor of descriptors) {
      const key = descriptorKey(descriptor);
      if (tried.has(key)) continue;
      tried.add(key);
      probeEnv.logger.debug(`trying ${key} extractor from ${tier}`);
      yield { descriptor, tier };
    }
  }
}
