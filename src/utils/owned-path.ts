/**
 * Ownership of temporary extraction artifacts.
 *
 * A path is tracked by a CleanupScope the moment it is created. Whoever
 * moves it into its final place calls release(); anything still owned when
 * the scope is disposed is removed.
 */

import type { Logger } from './logger';
import { removePath } from './fs-helpers';

export class OwnedPath {
  private owned = true;

  constructor(readonly path: string) {}

  get isOwned(): boolean {
    return this.owned;
  }

  /** Hand the path over; the scope will no longer remove it */
  release(): void {
    this.owned = false;
  }
}

export class CleanupScope {
  private readonly tracked: OwnedPath[] = [];

  constructor(private readonly logger: Logger) {}

  track(target: string): OwnedPath {
    const owned = new OwnedPath(target);
    this.tracked.push(owned);
    return owned;
  }

  /** Paths still owned, newest first */
  pending(): string[] {
    return this.tracked
      .filter((entry) => entry.isOwned)
      .map((entry) => entry.path)
      .reverse();
  }

  /** Everything tracked so far has found its final place */
  releaseAll(): void {
    for (const entry of this.tracked) entry.release();
  }

  /**
   * Remove every path still owned. Best effort: a failure is logged and the
   * remaining paths are still attempted.
   */
  async dispose(): Promise<void> {
    for (const target of this.pending()) {
      this.logger.debug(`cleaning up ${target}`);
      try {
        await removePath(target);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`could not remove ${target}: ${message}`);
      }
    }
    this.releaseAll();
  }
}
