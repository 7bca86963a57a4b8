/**
 * Terminal UI helpers
 *
 * Semantic, TTY-aware styling for diagnostics written to stderr.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - Plain text in pipes/CI
 * - Respects NO_COLOR and FORCE_COLOR
 *
 * @module utils/ui
 */

import type { SemanticColor } from '../types/utils';

type ChalkInstance = typeof import('chalk');

let chalkModule: ChalkInstance | null = null;
let initialized = false;

/**
 * Load chalk once at startup.
 * Output falls back to plain text when it cannot be loaded.
 */
export async function initUI(): Promise<void> {
  if (initialized) return;

  try {
    const chalkImport = await import('chalk');
    chalkModule = chalkImport.default;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[!] UI initialization failed, using plain text mode: ${message}\n`);
  }
  initialized = true;
}

/**
 * Diagnostics go to stderr, so that is the stream whose TTY state matters.
 */
function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stderr.isTTY;
}

export function color(text: string, semantic: SemanticColor): string {
  if (!chalkModule || !useColors()) return text;

  switch (semantic) {
    case 'error':
      return chalkModule.red.bold(text);
    case 'warning':
      return chalkModule.yellow(text);
    case 'info':
      return chalkModule.cyan(text);
    default:
      return text;
  }
}

export function bold(text: string): string {
  if (!chalkModule || !useColors()) return text;
  return chalkModule.bold(text);
}

export function dim(text: string): string {
  if (!chalkModule || !useColors()) return text;
  return chalkModule.dim(text);
}

// =============================================================================
// STATUS INDICATORS (ASCII only - NO EMOJIS)
// =============================================================================

/** Error indicator: [X] */
export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

/** Warning indicator: [!] */
export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

/** Info indicator: [i] */
export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}
