/**
 * Listing parsers: turn a lister's raw output lines into member paths.
 *
 * Each parser consumes the line stream lazily; stopping early (a closing
 * border line) stops the lister too.
 */

export type ListingParser = (lines: AsyncIterable<string>) => AsyncGenerator<string, void, undefined>;

/** Plain listers already print one member per line */
export async function* plainListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  yield* lines;
}

/**
 * For a border like "---------- ----- -------": the column after the last
 * space. null when the line is not a border.
 */
export function borderLineFileIndex(line: string): number | null {
  let lastSpace: number | null = null;
  for (const [index, char] of Array.from(line).entries()) {
    if (char === ' ') {
      lastSpace = index;
    } else if (char !== '-') {
      return null;
    }
  }
  return lastSpace === null ? null : lastSpace + 1;
}

/** lha l: names sit in the last column between two border lines */
export async function* lhaListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  let column: number | null = null;
  for await (const line of lines) {
    const border = borderLineFileIndex(line);
    if (column === null) {
      column = border;
      continue;
    }
    if (border !== null) return;
    yield line.slice(column);
  }
}

/** 7z l -ba: name follows the last space */
export async function* sevenZipListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  for await (const line of lines) {
    const lastSpace = line.lastIndexOf(' ');
    if (lastSpace >= 0) yield line.slice(lastSpace + 1);
  }
}

const ZSTD_BORDER = /^[- ]+$/;

export async function* zstdListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  let column: number | null = null;
  for await (const line of lines) {
    if (ZSTD_BORDER.test(line)) {
      if (column !== null) return;
      column = line.lastIndexOf(' ') + 1;
    } else if (column !== null) {
      yield line.slice(column);
    }
  }
}

const CAB_BORDER = /^[-+]+$/;

/** cabextract -l: "size | date | name" rows after a +---+ border */
export async function* cabListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  let inside = false;
  for await (const line of lines) {
    if (!inside) {
      inside = CAB_BORDER.test(line);
      continue;
    }
    const columns = line.split(' | ');
    if (columns.length < 3) return;
    yield columns.slice(2).join(' | ');
  }
}

const SHIELD_PREFIX = /^\s+\d+\s+/;
const SHIELD_END = /^\s+-+\s+-+\s*$/;

export async function* shieldListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  for await (const line of lines) {
    if (SHIELD_END.test(line)) return;
    const match = SHIELD_PREFIX.exec(line);
    if (match) yield line.slice(match[0].length);
  }
}

const RAR_BORDER = /^-+$/;

/** unrar v: two lines per member between dashed borders, name first */
export async function* unrarListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  let inside = false;
  let isName = true;
  for await (const line of lines) {
    if (RAR_BORDER.test(line)) {
      if (inside) return;
      inside = true;
    } else if (inside) {
      if (isName) yield line.trim();
      isName = !isName;
    }
  }
}

/** lsar: a header line, then "name (details)" */
export async function* lsarListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  let header = true;
  for await (const line of lines) {
    if (header) {
      header = false;
      continue;
    }
    const details = line.lastIndexOf('(');
    yield (details < 0 ? line : line.slice(0, details)).trim();
  }
}

const ARJ_PREFIX = /^\d+\)\s+/;

export async function* arjListing(lines: AsyncIterable<string>): AsyncGenerator<string, void, undefined> {
  for await (const line of lines) {
    const match = ARJ_PREFIX.exec(line);
    if (match) yield line.slice(match[0].length);
  }
}
