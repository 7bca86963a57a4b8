import { afterEach, describe, expect, it } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { ExtractionError, StageFailedError } from '../../../src/errors';
import { Extractor, type ExtractorSettings } from '../../../src/extractors/extractor';
import { variantsFor } from '../../../src/extractors/variant-registry';
import type { ArchiveDescriptor } from '../../../src/types/archive';
import { LogLevel, silentLogger, type Logger } from '../../../src/utils/logger';
import { CleanupScope } from '../../../src/utils/owned-path';
import { FakeToolbox, recordingLogger } from '../../helpers/fake-tools';
import { listTree, makeTempDir, removeTempDirs, writeFile } from '../../helpers/temp-dirs';

afterEach(removeTempDirs);

const SETTINGS: ExtractorSettings = {
  password: null,
  batch: true,
  pollIntervalMs: 20,
  passwordKillAfterPolls: 1,
  showPrompt: () => {},
};

function extractorFor(
  tools: FakeToolbox,
  archive: string,
  descriptor: ArchiveDescriptor,
  logger: Logger = silentLogger
): Extractor {
  const [variant] = variantsFor(descriptor.kind, false);
  if (variant === undefined) throw new Error(`no variant for ${descriptor.kind}`);
  const pipeline = tools.pipeline(path.dirname(archive), new AbortController().signal, logger);
  return new Extractor(variant, descriptor, archive, pipeline, SETTINGS);
}

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const found: string[] = [];
  for await (const line of lines) found.push(line);
  return found;
}

describe('Extractor with a compressed stream', () => {
  const GZIP: ArchiveDescriptor = { kind: 'compress', encoding: 'gzip' };

  it('decodes into a temporary file named after the stream', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'readme.txt.gz', 'hello\n');
    const tools = new FakeToolbox().add('zcat', 'exec cat');
    const extractor = extractorFor(tools, archive, GZIP);
    const scope = new CleanupScope(silentLogger);

    const result = await extractor.extract(scope);

    expect(extractor.basename()).toBe('readme.txt');
    expect(result.contentType).toBe('ONE_ENTRY_KNOWN');
    expect(result.contentName).toBe('readme.txt');
    expect(result.contents).toBeNull();
    expect(result.fileCount).toBe(1);
    expect(path.dirname(result.target)).toBe(cwd);
    expect(fs.readFileSync(result.target, 'utf8')).toBe('hello\n');

    await scope.dispose();
    expect(listTree(cwd)).toEqual(['readme.txt.gz']);
  });

  it('fails when the decoder produced nothing and exited non-zero', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'readme.txt.gz', 'not gzip');
    const tools = new FakeToolbox().add('zcat', 'cat > /dev/null\nexit 1');
    const scope = new CleanupScope(silentLogger);

    const extraction = extractorFor(tools, archive, GZIP).extract(scope);

    await expect(extraction).rejects.toThrow(StageFailedError);
    await expect(extraction).rejects.toThrow("decoding error: 'zcat' returned status code 1");
    await scope.dispose();
    expect(listTree(cwd)).toEqual(['readme.txt.gz']);
  });

  it('lists the stream name once file agrees it is compressed', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'readme.txt.gz');
    const tools = new FakeToolbox().add('file', 'echo "$2: gzip compressed data, from Unix"');

    expect(await collect(extractorFor(tools, archive, GZIP).list())).toEqual(['readme.txt']);
  });

  it('refuses to list a stream file does not recognize', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'readme.txt.gz');
    const tools = new FakeToolbox().add('file', 'echo "$2: ASCII text"');

    const listing = collect(extractorFor(tools, archive, GZIP).list());

    await expect(listing).rejects.toThrow(ExtractionError);
    await expect(listing).rejects.toThrow("doesn't look like a compressed file");
  });
});

describe('Extractor exit status rules', () => {
  const ZIP: ArchiveDescriptor = { kind: 'zip', encoding: null };

  it('accepts unzip warnings when files came out', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'site.zip', 'PK');
    const tools = new FakeToolbox().add('unzip', 'touch index.html\necho "warning: extra bytes" >&2\nexit 1');
    const extractor = extractorFor(tools, archive, ZIP);
    const scope = new CleanupScope(silentLogger);

    const result = await extractor.extract(scope);

    expect(result.contents).toEqual(['index.html']);
    expect(result.exitCodes).toEqual([1]);
    expect(extractor.stderr).toBe('warning: extra bytes\n');
    await scope.dispose();
  });

  it('rejects unzip warnings when nothing came out', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'site.zip', 'PK');
    const tools = new FakeToolbox().add('unzip', 'exit 1');
    const scope = new CleanupScope(silentLogger);

    await expect(extractorFor(tools, archive, ZIP).extract(scope)).rejects.toThrow(
      `extraction error: 'unzip -q ${archive}' returned status code 1`
    );
    await scope.dispose();
    expect(listTree(cwd)).toEqual(['site.zip']);
  });

  it('treats a fatal unzip status as failure even with files present', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'site.zip', 'PK');
    const tools = new FakeToolbox().add('unzip', 'touch index.html\nexit 3');
    const scope = new CleanupScope(silentLogger);

    await expect(extractorFor(tools, archive, ZIP).extract(scope)).rejects.toThrow(
      `extraction error: 'unzip -q ${archive}' returned status code 3`
    );
    await scope.dispose();
    expect(listTree(cwd)).toEqual(['site.zip']);
  });
});

describe('Extractor with a slow tool', () => {
  it('keeps waiting past many poll intervals when no prompt shows up', async () => {
    const cwd = makeTempDir();
    const archive = writeFile(cwd, 'big.tar', 'tar');
    const tools = new FakeToolbox().add('tar', 'cat > /dev/null\nsleep 0.3\ntouch done.txt');
    const { logger, lines } = recordingLogger(LogLevel.DEBUG);
    const scope = new CleanupScope(silentLogger);

    const result = await extractorFor(tools, archive, { kind: 'tar', encoding: null }, logger).extract(scope);

    expect(result.contents).toEqual(['done.txt']);
    expect(result.exitCodes).toEqual([0]);
    expect(lines.filter((line) => line === '[debug] timeout hit...').length).toBeGreaterThan(2);
    await scope.dispose();
  });
});
