import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { CancelledError } from '../errors';

/**
 * Interactive Prompt
 *
 * One readline interface per run, created on first use, so answers piped in
 * on stdin are consumed line by line across several questions. End of input
 * answers null (callers fall back to their default).
 */

export interface Prompter {
  /** Show text to the user */
  say(text: string): void;
  /** Ask a question and wait for one line; null at end of input */
  ask(question: string): Promise<string | null>;
  close(): void;
}

interface PromptOptions {
  input?: Readable;
  output?: Writable;
  /** Pending questions reject with CancelledError once aborted */
  signal?: AbortSignal;
}

interface Waiter {
  resolve(line: string | null): void;
  reject(error: Error): void;
}

export class InteractivePrompt implements Prompter {
  private rl: readline.Interface | null = null;
  private readonly buffered: string[] = [];
  private readonly waiting: Waiter[] = [];
  private ended = false;
  private terminal = false;
  private readonly input: Readable;
  private readonly output: Writable;

  constructor(private readonly options: PromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    options.signal?.addEventListener('abort', () => this.cancelPending(), { once: true });
  }

  say(text: string): void {
    this.output.write(text);
  }

  ask(question: string): Promise<string | null> {
    if (this.options.signal?.aborted) return Promise.reject(new CancelledError());
    const rl = this.open();
    if (this.terminal) {
      rl.setPrompt(question);
      rl.prompt();
    } else {
      this.output.write(question);
    }

    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.ended) return Promise.resolve(null);
    rl.resume();
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private open(): readline.Interface {
    if (this.rl) return this.rl;

    const terminal = process.stdin.isTTY === true && this.input === process.stdin;
    this.terminal = terminal;
    const rl = readline.createInterface({
      input: this.input,
      output: terminal ? this.output : undefined,
      terminal,
    });
    rl.on('line', (line) => {
      const waiter = this.waiting.shift();
      if (waiter) {
        waiter.resolve(line);
      } else {
        this.buffered.push(line);
        rl.pause();
      }
    });
    rl.on('close', () => {
      this.ended = true;
      for (const waiter of this.waiting.splice(0)) waiter.resolve(null);
    });
    // Raw-mode terminals deliver Ctrl+C here instead of as a signal
    rl.on('SIGINT', () => {
      process.kill(process.pid, 'SIGINT');
    });
    this.rl = rl;
    return rl;
  }

  private cancelPending(): void {
    for (const waiter of this.waiting.splice(0)) waiter.reject(new CancelledError());
    this.close();
  }
}
