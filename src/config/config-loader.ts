/**
 * Configuration
 *
 * Optional YAML file with default settings. Command-line flags win over the
 * file; the file wins over built-in defaults. Passwords never come from it.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { UsageError } from '../errors';
import {
  DEFAULT_PASSWORD_KILL_AFTER_POLLS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_RECURSION_RATIO,
  type RunOptions,
} from '../types/options';
import { isErrno } from '../utils/fs-helpers';
import { levelFromVerbosity, type Logger } from '../utils/logger';

export interface FileSettings {
  batch?: boolean;
  flat?: boolean;
  overwrite?: boolean;
  metadata?: boolean;
  recursive?: boolean;
  oneEntry?: string;
  pollIntervalMs?: number;
  passwordKillAfterPolls?: number;
  recursionRatio?: number;
}

/** What the command line decided; absent flags are undefined */
export interface CliSettings {
  batch?: boolean;
  flat?: boolean;
  overwrite?: boolean;
  metadata?: boolean;
  recursive?: boolean;
  showList?: boolean;
  password?: string;
  oneEntry?: string;
  verbose: number;
  quiet: number;
}

type BooleanKey = 'batch' | 'flat' | 'overwrite' | 'metadata' | 'recursive';

const BOOLEAN_KEYS: ReadonlyMap<string, BooleanKey> = new Map<string, BooleanKey>([
  ['batch', 'batch'],
  ['flat', 'flat'],
  ['overwrite', 'overwrite'],
  ['metadata', 'metadata'],
  ['recursive', 'recursive'],
]);

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.UNPACKIT_CONFIG || path.join(os.homedir(), '.config', 'unpackit', 'config.yaml');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectNumber(key: string, value: unknown, valid: (n: number) => boolean, what: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || !valid(value)) {
    throw new UsageError(`configuration key '${key}' must be ${what}`);
  }
  return value;
}

/** Validate parsed YAML; unknown keys are reported and skipped */
export function parseFileSettings(raw: unknown, logger: Logger): FileSettings {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new UsageError('configuration file must contain a mapping');

  const settings: FileSettings = {};
  for (const [key, value] of Object.entries(raw)) {
    const booleanKey = BOOLEAN_KEYS.get(key);
    if (booleanKey !== undefined) {
      if (typeof value !== 'boolean') {
        throw new UsageError(`configuration key '${key}' must be true or false`);
      }
      settings[booleanKey] = value;
      continue;
    }

    switch (key) {
      case 'one_entry':
        if (typeof value !== 'string') {
          throw new UsageError(`configuration key '${key}' must be a string`);
        }
        settings.oneEntry = value;
        break;
      case 'poll_interval_ms':
        settings.pollIntervalMs = expectNumber(key, value, (n) => n > 0, 'a positive number');
        break;
      case 'password_kill_after_polls':
        settings.passwordKillAfterPolls = expectNumber(
          key,
          value,
          (n) => Number.isInteger(n) && n >= 1,
          'a whole number of at least 1'
        );
        break;
      case 'recursion_ratio':
        settings.recursionRatio = expectNumber(key, value, (n) => n >= 0, 'a non-negative number');
        break;
      case 'password':
        logger.warn('passwords are not read from the configuration file');
        break;
      default:
        logger.warn(`ignoring unknown configuration key '${key}'`);
    }
  }
  return settings;
}

/** A missing file means no settings; an unreadable or malformed one is an error */
export async function loadConfigFile(file: string, logger: Logger): Promise<FileSettings> {
  let content: string;
  try {
    content = await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return {};
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`cannot read configuration file ${file}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new UsageError(`invalid configuration file ${file}: ${message}`);
  }
  logger.debug(`loaded configuration from ${file}`);
  return parseFileSettings(raw, logger);
}

export function resolveRunOptions(cli: CliSettings, file: FileSettings = {}): RunOptions {
  return {
    batch: cli.batch ?? file.batch ?? false,
    flat: cli.flat ?? file.flat ?? false,
    overwrite: cli.overwrite ?? file.overwrite ?? false,
    metadata: cli.metadata ?? file.metadata ?? false,
    recursive: cli.recursive ?? file.recursive ?? false,
    showList: cli.showList ?? false,
    password: cli.password ?? null,
    oneEntryDefault: cli.oneEntry ?? file.oneEntry ?? null,
    logLevel: levelFromVerbosity(cli.verbose, cli.quiet),
    pollIntervalMs: file.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    passwordKillAfterPolls: file.passwordKillAfterPolls ?? DEFAULT_PASSWORD_KILL_AFTER_POLLS,
    recursionRatio: file.recursionRatio ?? DEFAULT_RECURSION_RATIO,
  };
}
