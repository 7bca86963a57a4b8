/**
 * Pipeline Type Definitions
 */

import type { Logger } from '../utils/logger';

/** One process in a chain; its stdout feeds the next stage's stdin */
export interface PipelineStage {
  readonly command: readonly string[];
  /** Human label used in failure messages ("decoding", "extraction", ...) */
  readonly purpose: string;
}

/**
 * Standard input of the first stage: the archive bytes (piped discipline)
 * or an empty placeholder (no-pipe discipline, filename passed as argument).
 */
export type StageInput = { type: 'file'; path: string } | { type: 'none' };

/**
 * Standard output of the last stage: thrown away, collected as text,
 * left as a stream for the caller to read, or written to an open file.
 */
export type StageOutput =
  | { type: 'discard' }
  | { type: 'capture' }
  | { type: 'stream' }
  | { type: 'fd'; fd: number };

/** Process-level context every pipeline runs in */
export interface PipelineEnvironment {
  /** Working directory for every stage */
  cwd: string;
  /** Environment for every stage; its PATH decides where tools are found */
  env: NodeJS.ProcessEnv;
  /** Aborted when the run is interrupted */
  signal: AbortSignal;
  logger: Logger;
}

/** Watch a stream of the running tools for a password prompt */
export interface PromptWatch {
  stream: 'stderr' | 'stdout';
  /** Called with the prompt line so the user sees what the tool is asking */
  onPrompt(line: string): void;
}

export interface Supervision {
  pollIntervalMs: number;
  watch: PromptWatch | null;
  /**
   * Batch mode: number of polls a prompt may stay unanswered before the
   * chain is killed. null waits for the user instead.
   */
  killAfterPromptPolls: number | null;
  /** Archive named in the password error */
  archive: string;
}

export interface PipelineOutcome {
  /** Exit statuses in stage order */
  exitCodes: number[];
  stderr: string;
  passwordPrompted: boolean;
}

export const PASSWORD_PROMPT_PATTERN = /password/i;
