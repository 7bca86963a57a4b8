/**
 * Format Tables
 *
 * Static lookup data for the detection cascade. Built once at module load
 * and frozen; callers get lookup functions, never the mutable maps.
 */

import { ARCHIVE_KINDS } from '../types/archive';
import type { ArchiveDescriptor, ArchiveKind, Encoding } from '../types/archive';

interface KindSignature {
  /** MIME subtypes under application/ unless they carry their own '/' */
  mimetypes: readonly string[];
  extensions: readonly string[];
  /** Patterns matched against `file` output */
  magic: readonly RegExp[];
}

const KIND_SIGNATURES: Readonly<Record<ArchiveKind, KindSignature>> = {
  tar: { mimetypes: ['x-tar'], extensions: ['tar'], magic: [/POSIX tar archive/] },
  zip: {
    mimetypes: ['zip'],
    extensions: ['zip', 'jar', 'epub', 'xpi', 'crx'],
    magic: [/(Zip|ZIP self-extracting) archive/],
  },
  lzh: {
    mimetypes: ['x-lzh', 'x-lzh-compressed'],
    extensions: ['lzh', 'lha'],
    magic: [/LHa [\d.?]+ archive/],
  },
  rpm: {
    mimetypes: ['x-redhat-package-manager', 'x-rpm'],
    extensions: ['rpm'],
    magic: [/RPM/],
  },
  deb: {
    mimetypes: ['x-debian-package', 'vnd.debian.binary-package'],
    extensions: ['deb'],
    magic: [/Debian binary package/],
  },
  cpio: { mimetypes: ['x-cpio'], extensions: ['cpio'], magic: [/cpio archive/] },
  // `file` reports gems as plain tar
  gem: { mimetypes: ['x-ruby-gem'], extensions: ['gem'], magic: [] },
  '7z': { mimetypes: ['x-7z-compressed'], extensions: ['7z'], magic: [/7-zip archive/] },
  cab: {
    mimetypes: ['vnd.ms-cab-compressed'],
    extensions: ['cab'],
    magic: [/Microsoft Cabinet Archive/],
  },
  rar: {
    mimetypes: ['rar', 'vnd.rar', 'x-rar-compressed'],
    extensions: ['rar'],
    magic: [/RAR archive/],
  },
  arj: { mimetypes: ['arj', 'x-arj'], extensions: ['arj'], magic: [/ARJ archive/] },
  shield: { mimetypes: ['x-cab'], extensions: ['cab', 'hdr'], magic: [/InstallShield CAB/] },
  msi: {
    mimetypes: ['x-msi', 'x-ole-storage'],
    extensions: ['msi'],
    magic: [/Application: Windows Installer/],
  },
  dmg: {
    mimetypes: ['x-apple-diskimage'],
    extensions: ['dmg'],
    magic: [/ISO 9660 CD-ROM filesystem data/, /zlib compressed data/],
  },
  zst: {
    mimetypes: ['zstd'],
    extensions: ['zst', 'zstd'],
    magic: [/Zstandard compressed data/],
  },
  brotli: { mimetypes: [], extensions: ['br'], magic: [] },
  compress: { mimetypes: [], extensions: [], magic: [] },
};

// [kind, encoding, ...extensions] for suffixes that imply a decode stage
const ENCODED_EXTENSIONS: ReadonlyArray<readonly [ArchiveKind, Encoding, ...string[]]> = [
  ['tar', 'bzip2', 'tar.bz2', 'tbz2', 'tb2', 'tbz'],
  ['tar', 'gzip', 'tar.gz', 'tgz'],
  ['tar', 'lzma', 'tar.lzma', 'tlz'],
  ['tar', 'xz', 'tar.xz', 'txz'],
  ['tar', 'lzip', 'tar.lz'],
  ['tar', 'compress', 'tar.Z', 'taz'],
  ['tar', 'lrzip', 'tar.lrz'],
  ['tar', 'zstd', 'tar.zst'],
  ['compress', 'gzip', 'gz'],
  ['compress', 'compress', 'Z'],
  ['compress', 'bzip2', 'bz2'],
  ['compress', 'lzma', 'lzma'],
  ['compress', 'xz', 'xz'],
  ['compress', 'lrzip', 'lrz'],
];

const ENCODING_MAGIC: ReadonlyArray<readonly [Encoding, RegExp]> = [
  ['bzip2', /bzip2 compressed/],
  ['gzip', /gzip compressed/],
  ['lzma', /LZMA compressed/],
  ['lzip', /lzip compressed/],
  ['lrzip', /LRZIP compressed/],
  ['zstd', /Zstandard compressed/],
  ['xz', /xz compressed/],
];

function buildMimetypeMap(): ReadonlyMap<string, ArchiveKind> {
  const map = new Map<string, ArchiveKind>();
  for (const kind of ARCHIVE_KINDS) {
    for (const mimetype of KIND_SIGNATURES[kind].mimetypes) {
      map.set(mimetype.includes('/') ? mimetype : `application/${mimetype}`, kind);
    }
  }
  return map;
}

function buildExtensionMap(): ReadonlyMap<string, readonly ArchiveDescriptor[]> {
  const map = new Map<string, ArchiveDescriptor[]>();
  const add = (extension: string, descriptor: ArchiveDescriptor): void => {
    const existing = map.get(extension) ?? [];
    existing.push(Object.freeze(descriptor));
    map.set(extension, existing);
  };

  for (const kind of ARCHIVE_KINDS) {
    for (const extension of KIND_SIGNATURES[kind].extensions) {
      add(extension, { kind, encoding: null });
    }
  }
  for (const [kind, encoding, ...extensions] of ENCODED_EXTENSIONS) {
    for (const extension of extensions) {
      add(extension, { kind, encoding });
    }
  }
  return map;
}

const MIMETYPE_MAP = buildMimetypeMap();
const EXTENSION_MAP = buildExtensionMap();
const MAGIC_KINDS: ReadonlyArray<readonly [ArchiveKind, RegExp]> = ARCHIVE_KINDS.flatMap((kind) =>
  KIND_SIGNATURES[kind].magic.map((pattern) => [kind, pattern] as const)
);

export function kindForMimetype(mimetype: string): ArchiveKind | undefined {
  return MIMETYPE_MAP.get(mimetype);
}

export function descriptorsForExtension(extension: string): readonly ArchiveDescriptor[] {
  return EXTENSION_MAP.get(extension) ?? [];
}

export function isSupportedMimetype(mimetype: string): boolean {
  return MIMETYPE_MAP.has(mimetype);
}

/** Distinct kinds whose magic pattern appears in `file` output, in table order */
export function kindsInMagic(output: string): ArchiveKind[] {
  const kinds: ArchiveKind[] = [];
  for (const [kind, pattern] of MAGIC_KINDS) {
    if (pattern.test(output) && !kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
}

export function encodingsInMagic(output: string): Encoding[] {
  return ENCODING_MAGIC.filter(([, pattern]) => pattern.test(output)).map(([encoding]) => encoding);
}

/** Every extension the extension table or a kind signature names */
export function tableExtensions(): string[] {
  return Array.from(EXTENSION_MAP.keys());
}
