/**
 * Placement Strategies
 *
 * Move a finished extraction from its temporary location to where it
 * belongs. Strategies are consulted in table order; the first that can
 * handle the content layout (given the flat/overwrite options and the
 * one-entry answer) wins. Bomb accepts everything.
 *
 *            flat        overwrite    neither
 *   file     basename    basename     collision-checked file
 *   match    .           .            collision-checked entry
 *   bomb     .           basename     collision-checked directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { ONE_ENTRY_UNKNOWN, type ContentType, type ExtractionResult } from '../types/archive';
import type { Logger } from '../utils/logger';
import type { OneEntryPolicy } from '../policy/one-entry-policy';
import type { CleanupScope } from '../utils/owned-path';
import { isDirectory, isErrno, removePath } from '../utils/fs-helpers';
import { grantOwnerAccess, walkTree } from '../utils/tree-walk';
import { claimName, type NameKind } from './name-checker';

export interface PlacementOptions {
  flat: boolean;
  overwrite: boolean;
}

export interface PlacementContext {
  /** Directory the archive is being extracted into */
  cwd: string;
  options: PlacementOptions;
  oneEntry: OneEntryPolicy;
  /** Claimed names are tracked here until the move succeeds */
  scope: CleanupScope;
  logger: Logger;
}

/** What the archive is and what its contents should be called */
export interface PlacedArchive {
  filename: string;
  /** Absolute path of the archive itself; never removed or replaced */
  path: string;
  basename: string;
  output: 'directory' | 'file';
}

export interface Placement {
  /** Final location relative to cwd: '.' for the directory itself, '' when nothing was placed */
  target: string;
  /** Where nested archives now live, relative to target */
  includedRoot: string;
}

export interface PlacementStrategy {
  readonly name: string;
  canHandle(contentType: ContentType, ctx: PlacementContext): boolean;
  place(result: ExtractionResult, archive: PlacedArchive, ctx: PlacementContext): Promise<Placement>;
}

/** Claim a collision-free name for `desired` and say so when it had to change */
async function claimTarget(
  desired: string,
  kind: NameKind,
  archive: PlacedArchive,
  ctx: PlacementContext
): Promise<string> {
  const claimed = await claimName(path.join(ctx.cwd, desired), kind);
  ctx.scope.track(claimed);
  const target = path.relative(ctx.cwd, claimed);
  if (target !== desired) {
    ctx.logger.warn(`extracting ${archive.filename} to ${target}`);
  }
  return target;
}

type Occupant = 'none' | 'directory' | 'file' | 'archive';

/** What already sits at `target`; a symlink to a directory counts as a directory */
async function occupant(target: string, archivePath?: string): Promise<Occupant> {
  if (target === archivePath) return 'archive';
  try {
    await fs.promises.lstat(target);
  } catch (error) {
    if (isErrno(error, 'ENOENT')) return 'none';
    throw error;
  }
  return (await isDirectory(target)) ? 'directory' : 'file';
}

const flatStrategy: PlacementStrategy = {
  name: 'flat',
  canHandle: (contentType, ctx) =>
    (ctx.options.flat && contentType !== 'ONE_ENTRY_KNOWN') ||
    (ctx.options.overwrite && contentType === 'MATCHING_DIRECTORY'),
  async place(result, archive, ctx) {
    for (const level of await walkTree(result.target, { bottomUp: true })) {
      const destination = path.join(ctx.cwd, level.relative);
      await fs.promises.mkdir(destination, { recursive: true });
      for (const name of level.files) {
        let moved = path.join(destination, name);
        if (moved === archive.path) {
          moved = path.join(ctx.cwd, await claimTarget(path.relative(ctx.cwd, moved), 'file', archive, ctx));
        }
        await fs.promises.rename(path.join(level.directory, name), moved);
      }
      await fs.promises.rmdir(level.directory);
    }
    return { target: '.', includedRoot: result.includedRoot };
  },
};

const overwriteStrategy: PlacementStrategy = {
  name: 'overwrite',
  canHandle: (contentType, ctx) =>
    (ctx.options.flat && contentType === 'ONE_ENTRY_KNOWN') ||
    (ctx.options.overwrite && contentType !== 'MATCHING_DIRECTORY'),
  async place(result, archive, ctx) {
    const destination = path.join(ctx.cwd, archive.basename);
    const inTheWay = await occupant(destination, archive.path);
    if (inTheWay === 'directory') {
      ctx.logger.debug(`removing ${destination} to overwrite it`);
      await removePath(destination);
    } else if (inTheWay === 'archive' || (inTheWay === 'file' && archive.output === 'directory')) {
      const target = await claimTarget(archive.basename, archive.output, archive, ctx);
      await fs.promises.rename(result.target, path.join(ctx.cwd, target));
      return { target, includedRoot: result.includedRoot };
    }
    // A plain file is replaced by the rename itself
    await fs.promises.rename(result.target, destination);
    return { target: archive.basename, includedRoot: result.includedRoot };
  },
};

const matchStrategy: PlacementStrategy = {
  name: 'match',
  canHandle: (contentType, ctx) =>
    contentType === 'MATCHING_DIRECTORY' ||
    (ONE_ENTRY_UNKNOWN.includes(contentType) && ctx.oneEntry.okForMatch()),
  async place(result, archive, ctx) {
    const [entry] = result.contents ?? [];
    const source = entry === undefined ? result.target : path.join(result.target, entry);
    const kind: NameKind = (await isDirectory(source)) ? 'directory' : 'file';
    const destination =
      ctx.oneEntry.currentAnswer === 'HERE' && result.contentName !== null
        ? result.contentName.replace(/\/$/, '')
        : archive.basename;

    const target = await claimTarget(destination, kind, archive, ctx);
    await fs.promises.rename(source, path.join(ctx.cwd, target));
    if (source !== result.target) await fs.promises.rmdir(result.target);
    return { target, includedRoot: './' };
  },
};

const emptyStrategy: PlacementStrategy = {
  name: 'empty',
  canHandle: (contentType) => contentType === 'EMPTY',
  async place(result) {
    await fs.promises.rmdir(result.target);
    return { target: '', includedRoot: result.includedRoot };
  },
};

const bombStrategy: PlacementStrategy = {
  name: 'bomb',
  canHandle: () => true,
  async place(result, archive, ctx) {
    const target = await claimTarget(archive.basename, archive.output, archive, ctx);
    await fs.promises.rename(result.target, path.join(ctx.cwd, target));
    return { target, includedRoot: result.includedRoot };
  },
};

export const PLACEMENT_STRATEGIES: readonly PlacementStrategy[] = [
  flatStrategy,
  overwriteStrategy,
  matchStrategy,
  emptyStrategy,
  bombStrategy,
];

export function selectStrategy(contentType: ContentType, ctx: PlacementContext): PlacementStrategy {
  return PLACEMENT_STRATEGIES.find((strategy) => strategy.canHandle(contentType, ctx)) ?? bombStrategy;
}

/** Pick a strategy and run it; extracted files are made owner-accessible first */
export async function placeExtraction(
  result: ExtractionResult,
  archive: PlacedArchive,
  ctx: PlacementContext
): Promise<Placement> {
  const strategy = selectStrategy(result.contentType, ctx);
  ctx.logger.debug(`using ${strategy.name} handler`);
  if (strategy !== emptyStrategy) await grantOwnerAccess(result.target);
  const placement = await strategy.place(result, archive, ctx);
  ctx.scope.releaseAll();
  return placement;
}
