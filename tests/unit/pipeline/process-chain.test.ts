import { afterEach, describe, expect, it, jest } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { CancelledError, PasswordRequiredError, ToolUnusableError } from '../../../src/errors';
import { PipelineLineReader } from '../../../src/pipeline/line-reader';
import type { PipelineEnvironment, PipelineStage, Supervision } from '../../../src/pipeline/pipeline-types';
import { runPipeline } from '../../../src/pipeline/process-chain';
import { silentLogger } from '../../../src/utils/logger';
import { makeTempDir, removeTempDirs } from '../../helpers/temp-dirs';

afterEach(removeTempDirs);

function shell(script: string, purpose = 'test'): PipelineStage {
  return { command: ['sh', '-c', script], purpose };
}

function environment(signal: AbortSignal = new AbortController().signal): PipelineEnvironment {
  return { cwd: makeTempDir(), env: process.env, signal, logger: silentLogger };
}

function supervision(overrides: Partial<Supervision> = {}): Supervision {
  return { pollIntervalMs: 20, watch: null, killAfterPromptPolls: null, archive: 'test.zip', ...overrides };
}

describe('runPipeline', () => {
  it('connects each stage to the next', async () => {
    const env = environment();
    const outputPath = path.join(env.cwd, 'out.txt');
    const handle = await fs.promises.open(outputPath, 'w');
    try {
      const outcome = await runPipeline(
        [shell("printf 'alpha\\nbeta\\n'"), shell('tr a-z A-Z')],
        { type: 'none' },
        { type: 'fd', fd: handle.fd },
        env,
        supervision()
      );
      expect(outcome.exitCodes).toEqual([0, 0]);
    } finally {
      await handle.close();
    }
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('ALPHA\nBETA\n');
  });

  it('feeds a file to the first stage', async () => {
    const env = environment();
    const inputPath = path.join(env.cwd, 'in.txt');
    fs.writeFileSync(inputPath, 'one\ntwo\nthree\n');
    const marker = path.join(env.cwd, 'count.txt');
    const outcome = await runPipeline(
      [shell(`wc -l > '${marker}'`)],
      { type: 'file', path: inputPath },
      { type: 'discard' },
      env,
      supervision()
    );
    expect(outcome.exitCodes).toEqual([0]);
    expect(fs.readFileSync(marker, 'utf8').trim()).toBe('3');
  });

  it('reports exit statuses in stage order with the collected stderr', async () => {
    const outcome = await runPipeline(
      [shell('echo warming up >&2; exit 0'), shell('cat > /dev/null; exit 3')],
      { type: 'none' },
      { type: 'discard' },
      environment(),
      supervision()
    );
    expect(outcome.exitCodes).toEqual([0, 3]);
    expect(outcome.stderr).toBe('warming up\n');
    expect(outcome.passwordPrompted).toBe(false);
  });

  it('runs nothing for an empty chain', async () => {
    const outcome = await runPipeline([], { type: 'none' }, { type: 'discard' }, environment(), supervision());
    expect(outcome).toEqual({ exitCodes: [], stderr: '', passwordPrompted: false });
  });

  it('turns a missing program into an unusable tool', async () => {
    const stages: PipelineStage[] = [{ command: ['unpackit-no-such-tool'], purpose: 'extraction' }];
    await expect(
      runPipeline(stages, { type: 'none' }, { type: 'discard' }, environment(), supervision())
    ).rejects.toBeInstanceOf(ToolUnusableError);
  });

  it('kills a tool left waiting at a password prompt in batch mode', async () => {
    const onPrompt = jest.fn<(line: string) => void>();
    const outcome = runPipeline(
      [shell("echo 'Enter password: ' >&2; exec sleep 5")],
      { type: 'none' },
      { type: 'discard' },
      environment(),
      supervision({ watch: { stream: 'stderr', onPrompt }, killAfterPromptPolls: 1 })
    );
    await expect(outcome).rejects.toBeInstanceOf(PasswordRequiredError);
    expect(onPrompt).toHaveBeenCalledWith('\nEnter password: ');
  });

  it('stops the chain when the run is cancelled', async () => {
    const controller = new AbortController();
    const outcome = runPipeline(
      [shell('exec sleep 5')],
      { type: 'none' },
      { type: 'discard' },
      environment(controller.signal),
      supervision()
    );
    setTimeout(() => controller.abort(), 50);
    await expect(outcome).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('PipelineLineReader', () => {
  it('yields the last stage output line by line', async () => {
    const reader = new PipelineLineReader(
      [shell("printf 'b\\na\\n'"), shell('sort')],
      { type: 'none' },
      environment()
    );
    const lines: string[] = [];
    for await (const line of reader.lines()) lines.push(line);
    expect(lines).toEqual(['a', 'b']);
    expect(reader.exitCodes).toEqual([0, 0]);
  });

  it('stops the lister when the reader leaves early', async () => {
    const reader = new PipelineLineReader([shell('while :; do echo y; done')], { type: 'none' }, environment());
    for await (const line of reader.lines()) {
      expect(line).toBe('y');
      break;
    }
    expect(reader.exitCodes).toEqual([]);
  });

  it('can only be read once', async () => {
    const reader = new PipelineLineReader([shell('true')], { type: 'none' }, environment());
    expect(await reader.lines().next()).toEqual({ done: true, value: undefined });
    await expect(reader.lines().next()).rejects.toThrow('pipeline output can only be read once');
  });
});
