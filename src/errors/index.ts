export {
  ExtractionError,
  ToolUnusableError,
  StageFailedError,
  PasswordRequiredError,
  FilesystemError,
  CancelledError,
  UnknownFormatError,
  UsageError,
  isRecoverableError,
  errorMessage,
} from './extraction-errors';
export type { ExtractionErrorCode, FailedAttempt } from './extraction-errors';
