/**
 * Actions: what the runner does with each extractor it tries.
 * Extraction places the contents on disk; listing prints member paths.
 */

import * as path from 'path';
import { ONE_ENTRY_UNKNOWN, type ExtractionResult } from '../types/archive';
import type { Extractor } from '../extractors/extractor';
import { extractionTree } from '../placement/extraction-report';
import { placeExtraction, type Placement } from '../placement/placement-handlers';
import { LogLevel } from '../utils/logger';
import { CleanupScope } from '../utils/owned-path';
import type { RunContext } from './run-context';

export interface ActionOutcome {
  result: ExtractionResult | null;
  placement: Placement | null;
}

export interface ArchiveAction {
  /**
   * @param filename - archive name as given, relative to `directory`
   * @param directory - absolute working directory for this archive
   */
  run(filename: string, extractor: Extractor, directory: string): Promise<ActionOutcome>;
}

abstract class BaseAction implements ArchiveAction {
  private printedHeader = false;

  /**
   * @param showHeaders - precede each archive's output with "<archive>:"
   */
  constructor(
    protected readonly ctx: RunContext,
    private readonly showHeaders: boolean
  ) {}

  abstract run(filename: string, extractor: Extractor, directory: string): Promise<ActionOutcome>;

  protected showFilename(filename: string): void {
    if (!this.showHeaders) return;
    if (this.printedHeader) this.ctx.out('\n');
    this.printedHeader = true;
    this.ctx.out(`${filename}:\n`);
  }
}

export class ExtractAction extends BaseAction {
  async run(filename: string, extractor: Extractor, directory: string): Promise<ActionOutcome> {
    const { ctx } = this;
    const scope = new CleanupScope(ctx.logger);
    try {
      const result = await extractor.extract(scope);
      const basename = extractor.basename();
      if (ONE_ENTRY_UNKNOWN.includes(result.contentType) && result.contentName !== null) {
        await ctx.oneEntry.prep(filename, result.contentType, basename, result.contentName);
      }
      const placement = await placeExtraction(
        result,
        {
          filename,
          path: path.resolve(directory, filename),
          basename,
          output: extractor.variant.output,
        },
        {
          cwd: directory,
          options: ctx.options,
          oneEntry: ctx.oneEntry,
          scope,
          logger: ctx.logger,
        }
      );
      await this.showExtraction(filename, directory, placement.target, result.contents);
      return { result, placement };
    } finally {
      await scope.dispose();
    }
  }

  private async showExtraction(
    filename: string,
    directory: string,
    target: string,
    contents: readonly string[] | null
  ): Promise<void> {
    if (!this.ctx.logger.isEnabled(LogLevel.INFO)) return;
    this.showFilename(filename);
    for (const line of await extractionTree(directory, target, contents)) {
      this.ctx.out(`${line}\n`);
    }
  }
}

export class ListAction extends BaseAction {
  async run(filename: string, extractor: Extractor): Promise<ActionOutcome> {
    // Fetch a line before the header so a lister that fails outright prints nothing
    const lister = extractor.list();
    let listed = false;
    try {
      const first = await lister.next();
      this.showFilename(filename);
      if (!first.done) {
        listed = true;
        this.ctx.out(`${first.value}\n`);
      }
      for (;;) {
        const next = await lister.next();
        if (next.done) break;
        this.ctx.out(`${next.value}\n`);
      }
    } catch (error) {
      if (listed) this.ctx.logger.error(`lister failed: ignore above listing for ${filename}`);
      throw error;
    }
    return { result: null, placement: null };
  }
}
