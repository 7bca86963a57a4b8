/**
 * Archive Runner
 *
 * Works through a queue of directory -> archive names. Each archive's
 * candidates are tried in classifier order until one succeeds; nested
 * archives the recursion policy accepts are queued under the directory
 * they ended up in. One archive failing never stops the others.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  CancelledError,
  FilesystemError,
  UnknownFormatError,
  errorMessage,
  isRecoverableError,
  type FailedAttempt,
} from '../errors';
import { classify } from '../detection/format-classifier';
import { Extractor, type ExtractorSettings } from '../extractors/extractor';
import { variantsFor } from '../extractors/variant-registry';
import type { PipelineEnvironment } from '../pipeline/pipeline-types';
import { ensureNotCancelled } from '../pipeline/process-chain';
import { describeFsError, isDirectory } from '../utils/fs-helpers';
import type { ActionOutcome, ArchiveAction } from './actions';
import type { RunContext } from './run-context';
import { fetchArchive, isRemoteArchive } from './url-fetcher';

export interface RunSummary {
  successes: string[];
  failures: string[];
  exitCode: 0 | 1;
}

function trimStderr(stderr: string): string {
  return stderr.replace(/\n+$/, '');
}

export class ArchiveRunner {
  private readonly queue = new Map<string, string[]>();
  private readonly successes: string[] = [];
  private readonly failures: string[] = [];

  constructor(
    private readonly ctx: RunContext,
    private readonly action: ArchiveAction
  ) {}

  /**
   * @param archives - names or URLs, relative to `cwd`
   * @param cwd - absolute starting directory
   */
  async run(archives: readonly string[], cwd: string): Promise<RunSummary> {
    this.queue.set(cwd, [...archives]);

    for (let next = this.popDirectory(); next !== null; next = this.popDirectory()) {
      const [directory, filenames] = next;
      for (const filename of filenames) {
        await this.handleArchive(filename, directory);
      }
      this.ctx.oneEntry.wrapFromNowOn();
    }

    return {
      successes: [...this.successes],
      failures: [...this.failures],
      exitCode: this.failures.length > 0 ? 1 : 0,
    };
  }

  /** Most recently queued directory first */
  private popDirectory(): [string, string[]] | null {
    const directory = Array.from(this.queue.keys()).pop();
    if (directory === undefined) return null;
    const filenames = this.queue.get(directory) ?? [];
    this.queue.delete(directory);
    return [directory, filenames];
  }

  private enqueue(directory: string, filename: string): void {
    const pending = this.queue.get(directory);
    if (pending) {
      pending.push(filename);
    } else {
      this.queue.set(directory, [filename]);
    }
  }

  private async handleArchive(argument: string, directory: string): Promise<void> {
    const { logger, signal } = this.ctx;
    ensureNotCancelled(signal);
    let filename = argument;
    try {
      if (isRemoteArchive(argument)) {
        filename = await fetchArchive(argument, directory, { logger, signal });
      }
      await this.checkFile(path.resolve(directory, filename));
      await this.tryExtractors(filename, directory);
      this.successes.push(filename);
    } catch (error) {
      if (error instanceof CancelledError || !isRecoverableError(error)) throw error;
      if (error instanceof UnknownFormatError) {
        this.reportUnknownFormat(error);
      } else {
        logger.error(`${filename}: ${errorMessage(error)}`);
      }
      this.failures.push(filename);
    }
  }

  private async checkFile(target: string): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(target);
    } catch (error) {
      throw new FilesystemError(describeFsError(error));
    }
    if (stat.isDirectory()) throw new FilesystemError('cannot work with a directory');
  }

  private settings(): ExtractorSettings {
    const { options, prompter } = this.ctx;
    return {
      password: options.password,
      batch: options.batch,
      pollIntervalMs: options.pollIntervalMs,
      passwordKillAfterPolls: options.passwordKillAfterPolls,
      showPrompt: (line) => prompter.say(line),
    };
  }

  private async tryExtractors(filename: string, directory: string): Promise<void> {
    const { ctx } = this;
    const absolute = path.resolve(directory, filename);
    const pipeline: PipelineEnvironment = {
      cwd: directory,
      env: ctx.env,
      signal: ctx.signal,
      logger: ctx.logger,
    };
    const attempts: FailedAttempt[] = [];

    for await (const candidate of classify(absolute, pipeline)) {
      for (const variant of variantsFor(candidate.descriptor.kind, ctx.options.metadata)) {
        ensureNotCancelled(ctx.signal);
        const extractor = new Extractor(variant, candidate.descriptor, absolute, pipeline, this.settings());
        let outcome: ActionOutcome;
        try {
          outcome = await this.action.run(filename, extractor, directory);
        } catch (error) {
          if (!isRecoverableError(error)) throw error;
          ctx.logger.debug(error.stack ?? error.message);
          attempts.push({
            kind: candidate.descriptor.kind,
            fileType: extractor.fileType,
            encoding: extractor.encoding,
            message: error.message,
            stderr: extractor.stderr,
          });
          continue;
        }
        this.showStderr(extractor);
        await this.recurseOrReport(filename, directory, outcome);
        return;
      }
    }
    throw new UnknownFormatError(filename, attempts);
  }

  /** The archive itself is done; a failure from here on belongs to what it contained */
  private async recurseOrReport(
    filename: string,
    directory: string,
    outcome: ActionOutcome
  ): Promise<void> {
    try {
      await this.recurse(filename, directory, outcome);
    } catch (error) {
      if (error instanceof CancelledError || !isRecoverableError(error)) throw error;
      const { result, placement } = outcome;
      if (result === null || placement === null) throw error;
      for (const nested of result.includedArchives) {
        const name = path.join(placement.target, placement.includedRoot, nested);
        this.ctx.logger.error(`${name}: ${error.message}`);
        this.failures.push(name);
      }
    }
  }

  /** Tool chatter of a successful run; only interesting when no password prompt caused it */
  private showStderr(extractor: Extractor): void {
    if (!extractor.stderr) return;
    const message = `Error output from this process:\n${trimStderr(extractor.stderr)}`;
    if (extractor.passwordPrompted) {
      this.ctx.logger.debug(message);
    } else {
      this.ctx.logger.warn(message);
    }
  }

  private reportUnknownFormat(error: UnknownFormatError): void {
    const { logger } = this.ctx;
    logger.error(`could not handle ${error.archive}`);
    if (error.attempts.length === 0) {
      logger.error('not a known archive type');
      return;
    }
    for (const attempt of error.attempts) {
      const encoded = attempt.encoding ? `${attempt.encoding}-encoded ` : '';
      logger.error(`treating as ${encoded}${attempt.fileType} failed: ${attempt.message}`);
      if (attempt.stderr) {
        logger.error(`Error output from this process:\n${trimStderr(attempt.stderr)}`);
      }
    }
  }

  private async recurse(filename: string, directory: string, outcome: ActionOutcome): Promise<void> {
    const { result, placement } = outcome;
    if (result === null || placement === null) return;
    const { recursion, logger } = this.ctx;

    await recursion.prep(filename, {
      target: placement.target,
      includedRoot: placement.includedRoot,
      includedArchives: result.includedArchives,
      fileCount: result.fileCount,
    });
    if (!recursion.okToRecurse()) return;

    const targetIsDirectory =
      placement.target !== '' && (await isDirectory(path.join(directory, placement.target)));
    for (const nested of result.includedArchives) {
      logger.debug(`recursing with ${result.contentType} archive`);
      const parts = [directory];
      if (targetIsDirectory) parts.push(placement.target);
      parts.push(placement.includedRoot, path.dirname(nested));
      this.enqueue(path.join(...parts), path.basename(nested));
    }
  }
}
