/**
 * Content Classifier
 *
 * Describes what an extraction produced: its layout, the sole entry's name,
 * how many files came out and which of them look like archives themselves.
 */

import * as path from 'path';
import type { ContentType } from '../types/archive';
import { looksLikeArchive } from '../detection/format-classifier';
import { isDirectory } from '../utils/fs-helpers';
import { walkTree } from '../utils/tree-walk';

export interface ContentLayout {
  contentType: ContentType;
  /** Sole top-level entry, with a trailing '/' for directories */
  contentName: string | null;
}

export interface IncludedArchives {
  /** Directory, relative to the extraction root, the archive paths are relative to */
  includedRoot: string;
  fileCount: number;
  includedArchives: string[];
}

/**
 * @param root - extraction directory
 * @param contents - its top-level entries
 * @param basename - the name the archive's contents should end up under
 */
export async function classifyContents(
  root: string,
  contents: readonly string[],
  basename: string
): Promise<ContentLayout> {
  const [only] = contents;
  if (only === undefined) return { contentType: 'EMPTY', contentName: null };
  if (contents.length > 1) return { contentType: 'BOMB', contentName: null };

  const directory = await isDirectory(path.join(root, only));
  let contentType: ContentType;
  if (only === basename) {
    contentType = 'MATCHING_DIRECTORY';
  } else {
    contentType = directory ? 'ONE_ENTRY_DIRECTORY' : 'ONE_ENTRY_FILE';
  }
  return { contentType, contentName: directory ? `${only}/` : only };
}

/** Nested archives are looked for below the sole directory, if there is one */
export function includedRootFor(contentName: string | null): string {
  return contentName !== null && contentName.endsWith('/') ? contentName : './';
}

export async function scanIncludedArchives(root: string, includedRoot: string): Promise<IncludedArchives> {
  let fileCount = 0;
  const includedArchives: string[] = [];

  for (const level of await walkTree(path.join(root, includedRoot))) {
    fileCount += level.files.length;
    for (const name of level.files) {
      if (looksLikeArchive(name)) includedArchives.push(path.join(level.relative, name));
    }
  }
  return { includedRoot, fileCount, includedArchives };
}
