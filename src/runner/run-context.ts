/**
 * Everything one run shares: options, logger, policies, the prompter,
 * the cancellation signal and the environment the tools run in.
 */

import type { RunOptions } from '../types/options';
import type { Logger } from '../utils/logger';
import { InteractivePrompt, type Prompter } from '../utils/prompt';
import { OneEntryPolicy } from '../policy/one-entry-policy';
import { RecursionPolicy } from '../policy/recursion-policy';
import { terminalWidth } from '../policy/base-policy';

export interface RunContext {
  readonly options: RunOptions;
  readonly logger: Logger;
  readonly oneEntry: OneEntryPolicy;
  readonly recursion: RecursionPolicy;
  readonly prompter: Prompter;
  readonly signal: AbortSignal;
  /** Environment for every external tool; its PATH decides which tools are found */
  readonly env: NodeJS.ProcessEnv;
  /** Standard output: listings and extraction trees */
  out(text: string): void;
}

export interface RunContextInit {
  options: RunOptions;
  logger: Logger;
  signal: AbortSignal;
  prompter?: Prompter;
  env?: NodeJS.ProcessEnv;
  out?: (text: string) => void;
  width?: number;
}

/** Throws UsageError when the one-entry default is not recognized */
export function createRunContext(init: RunContextInit): RunContext {
  const prompter = init.prompter ?? new InteractivePrompt({ signal: init.signal });
  const width = init.width ?? terminalWidth();

  return {
    options: init.options,
    logger: init.logger,
    oneEntry: new OneEntryPolicy(init.options, prompter, width),
    recursion: new RecursionPolicy(init.options, prompter, width),
    prompter,
    signal: init.signal,
    env: init.env ?? process.env,
    out:
      init.out ??
      ((text: string) => {
        process.stdout.write(text);
      }),
  };
}
