/**
 * Archive Type Definitions
 * Shared vocabulary for detection, extraction and placement.
 */

/** Archive families the variant table knows how to extract, in table order */
export const ARCHIVE_KINDS = [
  'tar',
  'zip',
  'lzh',
  'rpm',
  'deb',
  'cpio',
  'gem',
  '7z',
  'cab',
  'rar',
  'arj',
  'shield',
  'msi',
  'dmg',
  'zst',
  'brotli',
  'compress',
] as const;

export type ArchiveKind = (typeof ARCHIVE_KINDS)[number];

/** Stream encodings that get a decode stage in front of the extractor */
export type Encoding =
  | 'gzip'
  | 'bzip2'
  | 'compress'
  | 'lzma'
  | 'xz'
  | 'lzip'
  | 'lrzip'
  | 'zstd'
  | 'br';

/** A classifier candidate. Immutable once produced. */
export interface ArchiveDescriptor {
  readonly kind: ArchiveKind;
  readonly encoding: Encoding | null;
}

/** Where a candidate came from in the detection cascade */
export type DetectionTier = 'mimetype' | 'extension' | 'magic';

/**
 * Layout of what an extraction produced.
 * ONE_ENTRY_KNOWN is the single decompressed stream of a compression-only variant.
 */
export type ContentType =
  | 'EMPTY'
  | 'ONE_ENTRY_KNOWN'
  | 'ONE_ENTRY_FILE'
  | 'ONE_ENTRY_DIRECTORY'
  | 'MATCHING_DIRECTORY'
  | 'BOMB';

export const ONE_ENTRY_UNKNOWN: readonly ContentType[] = ['ONE_ENTRY_FILE', 'ONE_ENTRY_DIRECTORY'];

/** Classified result of one successful extraction */
export interface ExtractionResult {
  /** Absolute path of the temporary directory (or file) holding the output */
  target: string;
  /** Top-level entries; null for single-stream output */
  contents: string[] | null;
  contentType: ContentType;
  /** Sole top-level entry name; directories carry a trailing '/' */
  contentName: string | null;
  /** Recursive count of regular files */
  fileCount: number;
  /** Nested archive paths relative to includedRoot */
  includedArchives: string[];
  /** Directory the nested paths are relative to ('./' for the extraction root) */
  includedRoot: string;
  exitCodes: number[];
  stderr: string;
  passwordPrompted: boolean;
}
