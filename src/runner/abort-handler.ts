/**
 * Abort Handler
 *
 * Turns SIGINT/SIGTERM into an aborted AbortSignal. Work in progress sees
 * the abort, stops its tools and removes what it owns; the caller exits
 * with a failure status afterwards. Only the first signal counts.
 */

import type { Logger } from '../utils/logger';

const HANDLED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Returns a cleanup function that removes the handlers.
 */
export function installAbortHandlers(
  controller: AbortController,
  logger: Logger,
  write: (text: string) => void = (text) => {
    process.stderr.write(text);
  }
): () => void {
  let acknowledged = false;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (acknowledged) {
      logger.debug(`ignoring repeated ${signal}`);
      return;
    }
    acknowledged = true;
    write('\n');
    logger.debug(`got signal ${signal}`);
    controller.abort();
  };

  for (const signal of HANDLED_SIGNALS) process.on(signal, onSignal);

  return () => {
    for (const signal of HANDLED_SIGNALS) process.removeListener(signal, onSignal);
  };
}
