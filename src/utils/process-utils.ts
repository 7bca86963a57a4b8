/**
 * Process management utilities
 */

import { ChildProcess, spawnSync } from 'child_process';
import * as os from 'os';

/**
 * Kill process with SIGTERM, escalating to SIGKILL if it doesn't exit.
 * Uses exitCode === null (not proc.killed) to check if process is still running,
 * since proc.killed only indicates a signal was sent, not that the process exited.
 */
export function killWithEscalation(proc: ChildProcess, gracePeriodMs = 3000): void {
  proc.kill('SIGTERM');
  const timer = setTimeout(() => {
    if (proc.exitCode === null) {
      proc.kill('SIGKILL');
    }
  }, gracePeriodMs);
  timer.unref(); // Don't keep event loop alive just for escalation
  proc.once('exit', () => clearTimeout(timer));
}

/**
 * Shell-style status for a closed child: its exit code, or 128 + signal number
 * when a signal ended it.
 */
export function exitStatus(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (os.constants.signals[signal] ?? 0);
  return 1;
}

/**
 * Archivers that prompt for a password switch terminal echo off; when one is
 * killed mid-prompt the terminal stays silent. Only meaningful on a TTY.
 */
export function restoreTerminalEcho(): void {
  if (!process.stdin.isTTY || process.platform === 'win32') return;
  spawnSync('stty', ['echo'], { stdio: 'inherit' });
}
