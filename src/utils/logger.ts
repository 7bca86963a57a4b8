/**
 * Leveled diagnostics on stderr.
 *
 * Levels follow the usual debug < info < warning < error ladder; the
 * threshold starts at warning and moves one step per -v / -q.
 */

import { dim, fail, info, warn } from './ui';

export const LogLevel = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
} as const;

export type LogSink = (line: string) => void;

export interface Logger {
  readonly level: number;
  isEnabled(level: number): boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Translate -v / -q counts into a threshold. Never below DEBUG.
 */
export function levelFromVerbosity(verbose: number, quiet: number): number {
  return Math.max(LogLevel.DEBUG, LogLevel.WARNING + 10 * (quiet - verbose));
}

export function createLogger(level: number, sink: LogSink = stderrSink): Logger {
  const isEnabled = (candidate: number): boolean => candidate >= level;

  return {
    level,
    isEnabled,
    debug(message) {
      if (isEnabled(LogLevel.DEBUG)) sink(dim(`[debug] ${message}`));
    },
    info(message) {
      if (isEnabled(LogLevel.INFO)) sink(info(message));
    },
    warn(message) {
      if (isEnabled(LogLevel.WARNING)) sink(warn(message));
    },
    error(message) {
      if (isEnabled(LogLevel.ERROR)) sink(fail(message));
    },
  };
}

/** Logger that drops everything; handy default for library-style callers */
export const silentLogger: Logger = createLogger(Number.POSITIVE_INFINITY, () => {});
