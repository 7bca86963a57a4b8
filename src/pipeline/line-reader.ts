/**
 * Line-by-line output of a pipeline's last stage.
 *
 * Single pass: lines() may be iterated once. Exit statuses are available
 * after the iteration finishes; breaking out early stops the chain.
 */

import * as readline from 'readline';
import type { PipelineEnvironment, PipelineStage, StageInput } from './pipeline-types';
import { ensureNotCancelled, startChain, terminateChain, type RunningStage } from './process-chain';

export class PipelineLineReader {
  private consumed = false;
  private codes: number[] | null = null;
  private errorText = '';

  constructor(
    private readonly stages: readonly PipelineStage[],
    private readonly input: StageInput,
    private readonly env: PipelineEnvironment
  ) {}

  /** Exit statuses in stage order; empty until lines() completes */
  get exitCodes(): number[] {
    return this.codes ?? [];
  }

  get stderr(): string {
    return this.errorText;
  }

  async *lines(): AsyncGenerator<string, void, undefined> {
    if (this.consumed) throw new Error('pipeline output can only be read once');
    this.consumed = true;

    const running: RunningStage[] = await startChain(
      this.stages,
      this.input,
      { type: 'stream' },
      this.env
    );
    const last = running[running.length - 1];
    if (!last?.child.stdout) {
      await terminateChain(running);
      return;
    }

    const reader = readline.createInterface({ input: last.child.stdout, crlfDelay: Infinity });
    let completed = false;
    // A silent lister would otherwise keep the loop waiting after an interrupt
    const onAbort = (): void => {
      terminateChain(running).then(undefined, (error: Error) => {
        this.env.logger.debug(`could not stop lister: ${error.message}`);
      });
    };
    this.env.signal.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const line of reader) {
        ensureNotCancelled(this.env.signal);
        yield line;
      }
      ensureNotCancelled(this.env.signal);
      this.codes = await Promise.all(running.map((entry) => entry.closed));
      completed = true;
    } finally {
      this.env.signal.removeEventListener('abort', onAbort);
      reader.close();
      if (!completed) await terminateChain(running);
      this.errorText = running.map((entry) => entry.stderr.drain()).join('');
    }
  }
}
