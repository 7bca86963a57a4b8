/**
 * Filesystem helpers shared by extraction and placement.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

const ERRNO_TEXT: Readonly<Record<string, string>> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EISDIR: 'Is a directory',
  ENOTDIR: 'Not a directory',
  EEXIST: 'File exists',
  ENOSPC: 'No space left on device',
  EROFS: 'Read-only file system',
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isErrno(error: unknown, code: string): boolean {
  return errnoCode(error) === code;
}

/** strerror-style text for a Node filesystem error */
export function describeFsError(error: unknown): string {
  const code = errnoCode(error);
  if (code && ERRNO_TEXT[code]) return ERRNO_TEXT[code];
  return error instanceof Error ? error.message : String(error);
}

/** stat-based directory test; a dangling or vanished path is not a directory */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return false;
    throw error;
  }
}

function randomSuffix(): string {
  return crypto.randomBytes(6).toString('base64url').replace(/[-_]/g, 'x').slice(0, 8);
}

/**
 * Create a new, empty file named `<prefix><random>` in `directory`.
 * The caller owns (and must close) the returned handle.
 */
export async function createUniqueFile(
  directory: string,
  prefix: string
): Promise<{ path: string; handle: fs.promises.FileHandle }> {
  for (;;) {
    const candidate = path.join(directory, `${prefix}${randomSuffix()}`);
    try {
      const handle = await fs.promises.open(candidate, 'wx', 0o600);
      return { path: candidate, handle };
    } catch (error) {
      if (!isErrno(error, 'EEXIST')) throw error;
    }
  }
}

/** Remove a file or a whole tree; missing paths are fine */
export async function removePath(target: string): Promise<void> {
  await fs.promises.rm(target, { recursive: true, force: true });
}
