/**
 * Run options: what the command line and the configuration file decide.
 */

export interface RunOptions {
  batch: boolean;
  flat: boolean;
  overwrite: boolean;
  metadata: boolean;
  recursive: boolean;
  showList: boolean;
  password: string | null;
  /** inside / rename / here, or any prefix of them */
  oneEntryDefault: string | null;
  /** Numeric log threshold, see utils/logger */
  logLevel: number;
  /** How often a running pipeline is polled for prompts (ms) */
  pollIntervalMs: number;
  /** Prompting polls tolerated in batch mode before the pipeline is killed */
  passwordKillAfterPolls: number;
  /** Nested archives must exceed this share of extracted files before asking to recurse */
  recursionRatio: number;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_PASSWORD_KILL_AFTER_POLLS = 1;
export const DEFAULT_RECURSION_RATIO = 0.1;
