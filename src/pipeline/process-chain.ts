/**
 * Process Chain
 *
 * Runs pipeline stages as connected processes, the way a shell pipe would:
 * stage i's stdout is stage i+1's stdin. While waiting, the chain is polled
 * at a fixed interval so a tool stuck at a password prompt can be noticed
 * (and, in batch mode, killed).
 */

import { spawn, type ChildProcess, type StdioOptions } from 'child_process';
import * as fs from 'fs';
import type { Readable } from 'stream';
import {
  CancelledError,
  PasswordRequiredError,
  ToolUnusableError,
} from '../errors';
import { exitStatus, killWithEscalation, restoreTerminalEcho } from '../utils/process-utils';
import {
  PASSWORD_PROMPT_PATTERN,
  type PipelineEnvironment,
  type PipelineOutcome,
  type PipelineStage,
  type StageInput,
  type StageOutput,
  type Supervision,
} from './pipeline-types';

/** Accumulates a stream's text; drain() hands over what arrived since the last drain */
class TextCollector {
  private pending = '';

  constructor(stream: Readable | null) {
    if (!stream) return;
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      this.pending += chunk;
    });
  }

  drain(): string {
    const text = this.pending;
    this.pending = '';
    return text;
  }
}

export interface RunningStage {
  stage: PipelineStage;
  child: ChildProcess;
  stderr: TextCollector;
  stdout: TextCollector | null;
  /** Resolves with the shell-style exit status once the process and its pipes close */
  closed: Promise<number>;
  exited: boolean;
}

export function ensureNotCancelled(signal: AbortSignal): void {
  if (signal.aborted) throw new CancelledError();
}

function outputStdio(output: StageOutput): 'ignore' | 'pipe' | number {
  switch (output.type) {
    case 'discard':
      return 'ignore';
    case 'capture':
    case 'stream':
      return 'pipe';
    case 'fd':
      return output.fd;
  }
}

function startStage(
  stage: PipelineStage,
  stdio: StdioOptions,
  env: PipelineEnvironment,
  captureStdout: boolean
): Promise<RunningStage> {
  const [program, ...args] = stage.command;
  if (program === undefined) {
    return Promise.reject(new Error(`empty command for ${stage.purpose}`));
  }
  env.logger.debug(`running command: ${stage.command.join(' ')}`);

  return new Promise((resolve, reject) => {
    const child = spawn(program, args, { cwd: env.cwd, env: env.env, stdio });

    const onError = (err: NodeJS.ErrnoException): void => {
      child.removeListener('spawn', onSpawn);
      reject(err.code === 'ENOENT' ? new ToolUnusableError(program) : err);
    };

    const onSpawn = (): void => {
      child.removeListener('error', onError);
      child.on('error', (err) => {
        env.logger.debug(`${program}: ${err.message}`);
      });

      const running: RunningStage = {
        stage,
        child,
        stderr: new TextCollector(child.stderr),
        stdout: captureStdout ? new TextCollector(child.stdout) : null,
        closed: new Promise((resolveClosed) => {
          child.once('close', (code, signal) => {
            running.exited = true;
            resolveClosed(exitStatus(code, signal));
          });
        }),
        exited: false,
      };
      resolve(running);
    };

    child.once('error', onError);
    child.once('spawn', onSpawn);
  });
}

/** Stop every stage that is still running and wait until they are all gone */
export async function terminateChain(running: readonly RunningStage[]): Promise<void> {
  for (const entry of running) {
    if (!entry.exited) killWithEscalation(entry.child);
  }
  await Promise.all(running.map((entry) => entry.closed));
}

/**
 * Spawn every stage, wiring stdout to the next stdin.
 * If any stage cannot start, the ones already running are stopped.
 */
export async function startChain(
  stages: readonly PipelineStage[],
  input: StageInput,
  output: StageOutput,
  env: PipelineEnvironment
): Promise<RunningStage[]> {
  const inputFd = input.type === 'file' ? fs.openSync(input.path, 'r') : null;
  const running: RunningStage[] = [];

  try {
    for (const [index, stage] of stages.entries()) {
      ensureNotCancelled(env.signal);
      const isLast = index === stages.length - 1;
      const previous = running[running.length - 1];
      let stdin: 'ignore' | number | Readable = inputFd ?? 'ignore';
      if (previous) {
        if (!previous.child.stdout) throw new Error(`${previous.stage.purpose} has no output`);
        stdin = previous.child.stdout;
      }
      const stdout = isLast ? outputStdio(output) : 'pipe';

      running.push(
        await startStage(stage, [stdin, stdout, 'pipe'], env, isLast && output.type === 'capture')
      );

      // The child holds its own copy; dropping ours lets the producer see EPIPE
      if (previous?.child.stdout) previous.child.stdout.destroy();
    }
  } catch (error) {
    await terminateChain(running);
    throw error;
  } finally {
    if (inputFd !== null) fs.closeSync(inputFd);
  }

  return running;
}

/**
 * Wait for every stage, polling for prompts every `pollIntervalMs`.
 * Exit statuses come back in stage order.
 */
export function superviseChain(
  running: readonly RunningStage[],
  env: PipelineEnvironment,
  supervision: Supervision
): Promise<PipelineOutcome> {
  return new Promise((resolve, reject) => {
    let stderr = '';
    let passwordPrompted = false;
    let promptPolls = 0;
    let settled = false;

    const watchedText = (entry: RunningStage): string => {
      if (!supervision.watch) return '';
      if (supervision.watch.stream === 'stdout') return entry.stdout?.drain() ?? '';
      return entry.stderr.drain();
    };

    const stop = (): void => {
      clearInterval(timer);
      env.signal.removeEventListener('abort', onAbort);
    };

    const fail = (error: Error): void => {
      if (settled) return;
      settled = true;
      stop();
      terminateChain(running).then(
        () => reject(error),
        () => reject(error)
      );
    };

    const poll = (): void => {
      env.logger.debug('timeout hit...');
      for (const entry of running) {
        if (entry.exited) continue;
        const text = watchedText(entry);
        if (!text) continue;
        stderr += text;
        const lines = text.split('\n').filter((line) => line.trim() !== '');
        const lastLine = lines[lines.length - 1];
        if (supervision.watch && lastLine !== undefined && PASSWORD_PROMPT_PATTERN.test(lastLine)) {
          supervision.watch.onPrompt(`\n${lastLine}`);
          passwordPrompted = true;
        }
      }

      if (passwordPrompted && supervision.killAfterPromptPolls !== null) {
        promptPolls += 1;
        if (promptPolls >= supervision.killAfterPromptPolls) {
          restoreTerminalEcho();
          stderr = '';
          fail(new PasswordRequiredError(supervision.archive));
        }
      }
    };

    const onAbort = (): void => fail(new CancelledError());

    const timer = setInterval(poll, supervision.pollIntervalMs);
    env.signal.addEventListener('abort', onAbort, { once: true });
    if (env.signal.aborted) {
      onAbort();
      return;
    }

    Promise.all(running.map((entry) => entry.closed)).then((exitCodes) => {
      if (settled) return;
      settled = true;
      stop();
      for (const entry of running) {
        stderr += entry.stderr.drain();
      }
      resolve({ exitCodes, stderr, passwordPrompted });
    }, fail);
  });
}

export async function runPipeline(
  stages: readonly PipelineStage[],
  input: StageInput,
  output: StageOutput,
  env: PipelineEnvironment,
  supervision: Supervision
): Promise<PipelineOutcome> {
  if (stages.length === 0) {
    return { exitCodes: [], stderr: '', passwordPrompted: false };
  }
  const running = await startChain(stages, input, output, env);
  return superviseChain(running, env, supervision);
}
