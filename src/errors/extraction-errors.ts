/**
 * Extraction Error Taxonomy
 *
 * Every failure while handling one archive maps to one of these codes.
 * Candidate-level failures (TOOL_UNUSABLE, EXTRACTION_FAILED, PASSWORD_REQUIRED)
 * are recovered by trying the next candidate; only UNKNOWN_FORMAT and
 * FILESYSTEM reach the user as the archive's outcome.
 */

import type { ArchiveKind, Encoding } from '../types/archive';

export type ExtractionErrorCode =
  | 'UNKNOWN_FORMAT'
  | 'TOOL_UNUSABLE'
  | 'EXTRACTION_FAILED'
  | 'PASSWORD_REQUIRED'
  | 'FILESYSTEM'
  | 'CANCELLED';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/** A stage's executable could not be located */
export class ToolUnusableError extends ExtractionError {
  constructor(public readonly tool: string) {
    super(`could not run ${tool}`, 'TOOL_UNUSABLE');
    this.name = 'ToolUnusableError';
  }
}

/** A stage exited with a code the variant does not tolerate */
export class StageFailedError extends ExtractionError {
  constructor(
    public readonly purpose: string,
    public readonly command: readonly string[],
    public readonly exitCode: number
  ) {
    super(
      `${purpose} error: '${command.join(' ')}' returned status code ${exitCode}`,
      'EXTRACTION_FAILED'
    );
    this.name = 'StageFailedError';
  }
}

export class PasswordRequiredError extends ExtractionError {
  constructor(public readonly archive: string) {
    super(
      `cannot extract encrypted archive '${archive}' in non-interactive mode without a password`,
      'PASSWORD_REQUIRED'
    );
    this.name = 'PasswordRequiredError';
  }
}

export class FilesystemError extends ExtractionError {
  constructor(message: string) {
    super(message, 'FILESYSTEM');
    this.name = 'FilesystemError';
  }
}

export class CancelledError extends ExtractionError {
  constructor(message = 'interrupted') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/** One failed candidate, kept for the final report */
export interface FailedAttempt {
  kind: ArchiveKind;
  fileType: string;
  encoding: Encoding | null;
  message: string;
  stderr: string;
}

export class UnknownFormatError extends ExtractionError {
  constructor(
    public readonly archive: string,
    public readonly attempts: readonly FailedAttempt[]
  ) {
    super(
      attempts.length === 0
        ? `${archive}: not a known archive type`
        : `${archive}: every candidate format failed`,
      'UNKNOWN_FORMAT'
    );
    this.name = 'UnknownFormatError';
  }
}

/** Usage and configuration problems; reported before any archive is touched */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Errors that mean "this candidate did not work" rather than "the program is broken".
 * Node's own filesystem errors count too: they carry an errno code.
 */
export function isRecoverableError(error: unknown): error is Error {
  if (error instanceof CancelledError) return false;
  if (error instanceof ExtractionError) return true;
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
