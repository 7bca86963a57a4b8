/**
 * Extraction Engine
 *
 * Runs one variant against one archive: builds the stage list, runs it in a
 * fresh temporary directory (or into a fresh temporary file), classifies the
 * result and decides whether the exit statuses amount to a failure.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExtractionError, FilesystemError, StageFailedError } from '../errors';
import type { ArchiveDescriptor, Encoding, ExtractionResult } from '../types/archive';
import type {
  PipelineEnvironment,
  PipelineOutcome,
  PipelineStage,
  StageInput,
  StageOutput,
  Supervision,
} from '../pipeline/pipeline-types';
import { runPipeline } from '../pipeline/process-chain';
import { PipelineLineReader } from '../pipeline/line-reader';
import {
  classifyContents,
  includedRootFor,
  scanIncludedArchives,
} from '../placement/content-classifier';
import { createUniqueFile, describeFsError } from '../utils/fs-helpers';
import type { CleanupScope } from '../utils/owned-path';
import { decoderStage } from './decoders';
import type { ExtractorVariant, VariantContext } from './variant-registry';

export const TEMP_PREFIX = '.unpackit-';

export interface ExtractorSettings {
  password: string | null;
  /** Never wait on a password prompt */
  batch: boolean;
  pollIntervalMs: number;
  passwordKillAfterPolls: number;
  /** Shows a tool's password prompt to the user */
  showPrompt(line: string): void;
}

export class Extractor {
  /** Tool stderr of the last run */
  stderr = '';
  exitCodes: number[] = [];
  passwordPrompted = false;
  private stages: PipelineStage[] = [];

  /**
   * @param filename - absolute archive path
   * @param pipeline - environment whose cwd is the directory results are placed in
   */
  constructor(
    readonly variant: ExtractorVariant,
    readonly descriptor: ArchiveDescriptor,
    readonly filename: string,
    private readonly pipeline: PipelineEnvironment,
    private readonly settings: ExtractorSettings
  ) {}

  get fileType(): string {
    return this.variant.fileType;
  }

  /** Tools that open the file themselves never get a decode stage */
  get encoding(): Encoding | null {
    return this.variant.discipline === 'piped' ? this.descriptor.encoding : null;
  }

  basename(): string {
    return this.variant.basename(this.filename);
  }

  async extract(scope: CleanupScope): Promise<ExtractionResult> {
    await this.ensureReadable();
    return this.variant.output === 'file' ? this.extractToFile(scope) : this.extractToDirectory(scope);
  }

  /**
   * Member paths as the variant's lister reports them.
   * Exit statuses are checked once the listing is exhausted.
   */
  async *list(): AsyncGenerator<string, void, undefined> {
    await this.ensureReadable();
    const context = this.context(this.pipeline);
    if (this.variant.listMembers) {
      yield* this.variant.listMembers(context);
      return;
    }
    if (!this.variant.listCommand) {
      throw new ExtractionError(`cannot list ${this.fileType} contents`, 'EXTRACTION_FAILED');
    }

    this.stages = await this.buildStages(context, [...this.variant.listCommand], 'listing');
    const reader = new PipelineLineReader(this.stages, this.stageInput(), this.pipeline);
    try {
      yield* this.variant.parseListing(reader.lines());
    } finally {
      this.exitCodes = reader.exitCodes;
      this.stderr = reader.stderr;
    }
    this.checkSuccess(false);
  }

  /**
   * Fail on the first non-zero status when nothing came out, or when the
   * variant treats that status as fatal regardless of output.
   */
  checkSuccess(gotFiles: boolean): void {
    const index = this.exitCodes.findIndex((code) => code > 0);
    this.pipeline.logger.debug(
      `success results: ${String(gotFiles)} ${index < 0 ? 'none' : index} [${this.exitCodes.join(', ')}]`
    );
    const code = this.exitCodes[index];
    const stage = this.stages[index];
    if (code === undefined || stage === undefined) return;
    if (this.variant.isFatalExitCode(code) || !gotFiles) {
      throw new StageFailedError(stage.purpose, stage.command, code);
    }
  }

  private async ensureReadable(): Promise<void> {
    try {
      await fs.promises.access(this.filename, fs.constants.R_OK);
    } catch (error) {
      throw new FilesystemError(`could not open ${this.filename}: ${describeFsError(error)}`);
    }
  }

  private context(pipeline: PipelineEnvironment): VariantContext {
    return { filename: this.filename, password: this.settings.password, pipeline };
  }

  private stageInput(): StageInput {
    return this.variant.discipline === 'piped'
      ? { type: 'file', path: this.filename }
      : { type: 'none' };
  }

  private async buildStages(
    context: VariantContext,
    finalCommand: string[] | null,
    purpose: string
  ): Promise<PipelineStage[]> {
    const stages: PipelineStage[] = [];
    if (this.encoding !== null) stages.push(decoderStage(this.encoding, context.pipeline.env));
    stages.push(...(await this.variant.prepare(context)));
    if (finalCommand !== null) {
      const command =
        this.variant.discipline === 'no-pipe' ? [...finalCommand, this.filename] : finalCommand;
      stages.push({ command, purpose });
    }
    if (stages.length === 0) {
      throw new ExtractionError(`nothing to run for ${this.fileType}`, 'EXTRACTION_FAILED');
    }
    return stages;
  }

  private supervision(): Supervision {
    const { promptStream } = this.variant;
    return {
      pollIntervalMs: this.settings.pollIntervalMs,
      watch:
        promptStream === null ? null : { stream: promptStream, onPrompt: this.settings.showPrompt },
      killAfterPromptPolls: this.settings.batch ? this.settings.passwordKillAfterPolls : null,
      archive: this.filename,
    };
  }

  private async run(pipeline: PipelineEnvironment, output: StageOutput): Promise<void> {
    const context = this.context(pipeline);
    this.stages = await this.buildStages(context, this.variant.extractCommand(context), 'extraction');
    const outcome: PipelineOutcome = await runPipeline(
      this.stages,
      this.stageInput(),
      output,
      pipeline,
      this.supervision()
    );
    this.exitCodes = outcome.exitCodes;
    this.stderr = outcome.stderr;
    this.passwordPrompted = outcome.passwordPrompted;
  }

  private async extractToDirectory(scope: CleanupScope): Promise<ExtractionResult> {
    let target: string;
    try {
      target = await fs.promises.mkdtemp(path.join(this.pipeline.cwd, TEMP_PREFIX));
    } catch (error) {
      throw new FilesystemError(`cannot extract here: ${describeFsError(error)}`);
    }
    scope.track(target);

    await this.run(
      { ...this.pipeline, cwd: target },
      this.variant.captureStdout ? { type: 'capture' } : { type: 'discard' }
    );

    const contents = await fs.promises.readdir(target);
    const layout =
      this.variant.forcedContentType === null
        ? await classifyContents(target, contents, this.basename())
        : { contentType: this.variant.forcedContentType, contentName: null };
    const included = await scanIncludedArchives(target, includedRootFor(layout.contentName));
    this.checkSuccess(contents.length > 0);

    return {
      target,
      contents,
      ...layout,
      ...included,
      exitCodes: this.exitCodes,
      stderr: this.stderr,
      passwordPrompted: this.passwordPrompted,
    };
  }

  private async extractToFile(scope: CleanupScope): Promise<ExtractionResult> {
    let created: Awaited<ReturnType<typeof createUniqueFile>>;
    try {
      created = await createUniqueFile(this.pipeline.cwd, TEMP_PREFIX);
    } catch (error) {
      throw new FilesystemError(`cannot extract here: ${describeFsError(error)}`);
    }
    scope.track(created.path);

    try {
      await this.run(this.pipeline, { type: 'fd', fd: created.handle.fd });
    } finally {
      await created.handle.close();
    }

    const { size } = await fs.promises.stat(created.path);
    this.checkSuccess(size > 0);

    return {
      target: created.path,
      contents: null,
      contentType: 'ONE_ENTRY_KNOWN',
      contentName: this.basename(),
      fileCount: 1,
      includedArchives: [],
      includedRoot: './',
      exitCodes: this.exitCodes,
      stderr: this.stderr,
      passwordPrompted: this.passwordPrompted,
    };
  }
}
