/**
 * Directory tree traversal over fs.promises.
 * Symbolic links are reported as files and never followed.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface TreeLevel {
  /** Absolute directory path */
  directory: string;
  /** Directory path relative to the walk root ('' for the root itself) */
  relative: string;
  directories: string[];
  files: string[];
}

export interface WalkOptions {
  /** Children before parents */
  bottomUp?: boolean;
}

export async function walkTree(root: string, options: WalkOptions = {}): Promise<TreeLevel[]> {
  const levels: TreeLevel[] = [];

  const visit = async (directory: string, relative: string): Promise<void> => {
    const entries = await fs.promises.readdir(directory, { withFileTypes: true });
    const level: TreeLevel = {
      directory,
      relative,
      directories: entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name),
      files: entries.filter((entry) => !entry.isDirectory()).map((entry) => entry.name),
    };

    if (!options.bottomUp) levels.push(level);
    for (const child of level.directories) {
      await visit(path.join(directory, child), relative === '' ? child : path.join(relative, child));
    }
    if (options.bottomUp) levels.push(level);
  };

  await visit(root, '');
  return levels;
}

/**
 * Give the owner full access to every directory and read/write access to
 * every file (execute too, where anybody could execute it). Directories are
 * opened up before they are read.
 */
export async function grantOwnerAccess(target: string): Promise<void> {
  const stat = await fs.promises.lstat(target);
  if (stat.isSymbolicLink()) return;
  if (!stat.isDirectory()) {
    await fs.promises.chmod(target, ownerFileMode(stat.mode));
    return;
  }

  await fs.promises.chmod(target, (stat.mode & 0o7777) | 0o700);
  for (const name of await fs.promises.readdir(target)) {
    await grantOwnerAccess(path.join(target, name));
  }
}

function ownerFileMode(mode: number): number {
  const executable = (mode & 0o111) !== 0 ? 0o100 : 0;
  return (mode & 0o7777) | 0o600 | executable;
}
