/**
 * Extractor Variant Table
 *
 * Every archive kind maps to an ordered list of variants; the first one
 * whose tools work wins. A variant is plain data plus a few functions;
 * the engine in extractor.ts does the running.
 */

import * as path from 'path';
import { ExtractionError } from '../errors';
import { probeMagic } from '../detection/magic-probe';
import type { ArchiveKind, ContentType } from '../types/archive';
import type { PipelineEnvironment, PipelineStage } from '../pipeline/pipeline-types';
import {
  compressionBasename,
  debBasename,
  genericBasename,
  metadataBasename,
  rpmBasename,
  shieldBasename,
  type BasenameRule,
} from './basename-rules';
import {
  arjListing,
  cabListing,
  lhaListing,
  lsarListing,
  plainListing,
  sevenZipListing,
  shieldListing,
  unrarListing,
  zstdListing,
  type ListingParser,
} from './listing-parsers';
import { arMemberStages, DEB_CONTROL_MEMBER, DEB_DATA_MEMBER } from './package-unwrap';

export interface VariantContext {
  /** Absolute path of the archive */
  filename: string;
  password: string | null;
  pipeline: PipelineEnvironment;
}

export interface ExtractorVariant {
  readonly id: string;
  /** Human description used in failure reports ("tar file", "Zip file") */
  readonly fileType: string;
  /**
   * piped: the archive is fed on stdin after any decoder stage.
   * no-pipe: the tool gets the filename as its last argument.
   */
  readonly discipline: 'piped' | 'no-pipe';
  /** 'file' variants decompress a single stream into one output file */
  readonly output: 'directory' | 'file';
  readonly basename: BasenameRule;
  /** Stages between the decoder and the final command */
  prepare(ctx: VariantContext): Promise<PipelineStage[]>;
  /** Final extraction command, or null when the prepared stages already produce the output */
  extractCommand(ctx: VariantContext): string[] | null;
  readonly listCommand: readonly string[] | null;
  readonly parseListing: ListingParser;
  /** Replaces command-based listing entirely */
  listMembers?(ctx: VariantContext): AsyncGenerator<string, void, undefined>;
  /** Layout forced regardless of what came out */
  readonly forcedContentType: ContentType | null;
  /** Where the tool asks for a password, if it ever does */
  readonly promptStream: 'stderr' | 'stdout' | null;
  /** Keep the tool's stdout (it prints prompts there) instead of discarding it */
  readonly captureStdout: boolean;
  isFatalExitCode(code: number): boolean;
}

type VariantSpec = Pick<ExtractorVariant, 'id' | 'fileType'> & Partial<ExtractorVariant>;

const noStages = async (): Promise<PipelineStage[]> => [];

function defineVariant(spec: VariantSpec): ExtractorVariant {
  return Object.freeze({
    discipline: 'piped',
    output: 'directory',
    basename: genericBasename,
    prepare: noStages,
    extractCommand: () => null,
    listCommand: null,
    parseListing: plainListing,
    forcedContentType: null,
    promptStream: null,
    captureStdout: false,
    isFatalExitCode: () => false,
    ...spec,
  });
}

function withPassword(base: readonly string[], password: string | null, flag: (pw: string) => string[]): string[] {
  return password ? [...base, ...flag(password)] : [...base];
}

const TAR = defineVariant({
  id: 'tar',
  fileType: 'tar file',
  extractCommand: () => ['tar', '-x'],
  listCommand: ['tar', '-t'],
});

const CPIO = defineVariant({
  id: 'cpio',
  fileType: 'cpio file',
  extractCommand: () => ['cpio', '-i', '--make-directories', '--quiet', '--no-absolute-filenames'],
  listCommand: ['cpio', '-t', '--quiet'],
});

const RPM = defineVariant({
  ...CPIO,
  id: 'rpm',
  fileType: 'RPM',
  basename: rpmBasename,
  prepare: async () => [{ command: ['rpm2cpio', '-'], purpose: 'rpm2cpio' }],
  forcedContentType: 'BOMB',
});

const DEB = defineVariant({
  ...TAR,
  id: 'deb',
  fileType: 'Debian package',
  basename: debBasename,
  prepare: (ctx) => arMemberStages(ctx.filename, DEB_DATA_MEMBER, ctx.pipeline),
  forcedContentType: 'BOMB',
});

const DEB_METADATA = defineVariant({
  ...DEB,
  id: 'deb-metadata',
  prepare: (ctx) => arMemberStages(ctx.filename, DEB_CONTROL_MEMBER, ctx.pipeline),
});

const GEM = defineVariant({
  ...TAR,
  id: 'gem',
  fileType: 'Ruby gem',
  prepare: async () => [
    { command: ['tar', '-xO', 'data.tar.gz'], purpose: 'data.tar.gz extraction' },
    { command: ['zcat'], purpose: 'data.tar.gz decompression' },
  ],
  forcedContentType: 'BOMB',
});

async function* compressedStreamMembers(ctx: VariantContext): AsyncGenerator<string, void, undefined> {
  // A name like foo.gz proves nothing; make sure the content agrees
  const descriptors = await probeMagic(ctx.filename, ctx.pipeline);
  if (!descriptors.some((descriptor) => descriptor.kind === 'compress')) {
    throw new ExtractionError("doesn't look like a compressed file", 'EXTRACTION_FAILED');
  }
  yield compressionBasename(ctx.filename);
}

const COMPRESSION = defineVariant({
  id: 'compress',
  fileType: 'compressed file',
  output: 'file',
  basename: compressionBasename,
  listMembers: compressedStreamMembers,
  forcedContentType: 'ONE_ENTRY_KNOWN',
});

const GEM_METADATA = defineVariant({
  ...COMPRESSION,
  id: 'gem-metadata',
  fileType: 'Ruby gem',
  basename: metadataBasename,
  listMembers: async function* (ctx) {
    yield metadataBasename(ctx.filename);
  },
  prepare: async () => [
    { command: ['tar', '-xO', 'metadata.gz'], purpose: 'metadata.gz extraction' },
    { command: ['zcat'], purpose: 'metadata.gz decompression' },
  ],
});

const ZIP = defineVariant({
  id: 'zip',
  fileType: 'Zip file',
  discipline: 'no-pipe',
  extractCommand: (ctx) => withPassword(['unzip', '-q'], ctx.password, (pw) => ['-P', pw]),
  listCommand: ['zipinfo', '-1'],
  promptStream: 'stderr',
  // 1 means warnings only
  isFatalExitCode: (code) => code > 1,
});

const LZH = defineVariant({
  ...ZIP,
  id: 'lzh',
  fileType: 'LZH file',
  extractCommand: () => ['lha', 'xq'],
  listCommand: ['lha', 'l'],
  parseListing: lhaListing,
});

const SEVEN_ZIP = defineVariant({
  id: '7z',
  fileType: '7z file',
  discipline: 'no-pipe',
  extractCommand: (ctx) => withPassword(['7z', 'x'], ctx.password, (pw) => [`-p${pw}`]),
  listCommand: ['7z', 'l', '-ba'],
  parseListing: sevenZipListing,
  promptStream: 'stdout',
  captureStdout: true,
});

const ZSTD = defineVariant({
  id: 'zst',
  fileType: 'zstd file',
  discipline: 'no-pipe',
  basename: compressionBasename,
  extractCommand: (ctx) => ['zstd', '-d', '-o', outputFileName(ctx.filename)],
  listCommand: ['zstd', '-l'],
  parseListing: zstdListing,
});

async function* unsupportedListing(): AsyncGenerator<string, void, undefined> {
  throw new ExtractionError('brotli cannot list its contents', 'EXTRACTION_FAILED');
}

const BROTLI = defineVariant({
  id: 'brotli',
  fileType: 'brotli file',
  discipline: 'no-pipe',
  basename: compressionBasename,
  extractCommand: (ctx) => ['brotli', '--decompress', `--output=${outputFileName(ctx.filename)}`],
  listMembers: unsupportedListing,
});

const CAB = defineVariant({
  id: 'cab',
  fileType: 'CAB archive',
  discipline: 'no-pipe',
  extractCommand: () => ['cabextract', '-q'],
  listCommand: ['cabextract', '-l'],
  parseListing: cabListing,
});

const SHIELD = defineVariant({
  id: 'shield',
  fileType: 'InstallShield archive',
  discipline: 'no-pipe',
  basename: shieldBasename,
  extractCommand: () => ['unshield', 'x'],
  listCommand: ['unshield', 'l'],
  parseListing: shieldListing,
});

const UNRAR = defineVariant({
  id: 'unrar',
  fileType: 'RAR archive',
  discipline: 'no-pipe',
  extractCommand: (ctx) => withPassword(['unrar', 'x'], ctx.password, (pw) => [`-p${pw}`]),
  listCommand: ['unrar', 'v'],
  parseListing: unrarListing,
  promptStream: 'stderr',
});

const UNAR = defineVariant({
  id: 'unar',
  fileType: 'RAR archive',
  discipline: 'no-pipe',
  extractCommand: (ctx) => withPassword(['unar', '-D'], ctx.password, (pw) => ['-p', pw]),
  listCommand: ['lsar'],
  parseListing: lsarListing,
});

const ARJ = defineVariant({
  id: 'arj',
  fileType: 'ARJ archive',
  discipline: 'no-pipe',
  extractCommand: (ctx) => withPassword(['arj', 'x', '-y'], ctx.password, (pw) => [`-g${pw}`]),
  listCommand: ['arj', 'v'],
  parseListing: arjListing,
});

/** Output name for tools that need one: the archive's name minus its last extension */
export function outputFileName(filename: string): string {
  return path.parse(path.basename(filename)).name;
}

const VARIANTS: Readonly<Record<ArchiveKind, readonly ExtractorVariant[]>> = {
  tar: [TAR],
  zip: [ZIP, SEVEN_ZIP],
  lzh: [LZH],
  rpm: [RPM],
  deb: [DEB],
  cpio: [CPIO],
  gem: [GEM],
  '7z': [SEVEN_ZIP],
  cab: [CAB],
  rar: [UNRAR, UNAR],
  arj: [ARJ],
  shield: [SHIELD],
  msi: [SEVEN_ZIP],
  dmg: [SEVEN_ZIP],
  zst: [ZSTD],
  brotli: [BROTLI],
  compress: [COMPRESSION],
};

const METADATA_VARIANTS: Partial<Record<ArchiveKind, readonly ExtractorVariant[]>> = {
  deb: [DEB_METADATA],
  gem: [GEM_METADATA],
};

export function variantsFor(kind: ArchiveKind, metadata: boolean): readonly ExtractorVariant[] {
  if (metadata) {
    const override = METADATA_VARIANTS[kind];
    if (override) return override;
  }
  return VARIANTS[kind];
}
