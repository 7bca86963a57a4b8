/**
 * Collision-free naming. A name is claimed by creating it (mkdir, or an
 * exclusive open), so two runs can never settle on the same one.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createUniqueFile, isErrno } from '../utils/fs-helpers';

export type NameKind = 'directory' | 'file';

async function tryClaim(candidate: string, kind: NameKind): Promise<boolean> {
  try {
    if (kind === 'directory') {
      await fs.promises.mkdir(candidate);
    } else {
      const handle = await fs.promises.open(candidate, 'wx');
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isErrno(error, 'EEXIST')) return false;
    throw error;
  }
}

/**
 * Claim `desired`, else `desired.1` through `desired.9`, else a fresh
 * `desired.<random>`. Returns the path actually claimed.
 */
export async function claimName(desired: string, kind: NameKind): Promise<string> {
  for (const suffix of ['', '.1', '.2', '.3', '.4', '.5', '.6', '.7', '.8', '.9']) {
    const candidate = `${desired}${suffix}`;
    if (await tryClaim(candidate, kind)) return candidate;
  }
  const prefix = `${path.basename(desired)}.`;
  if (kind === 'directory') {
    return fs.promises.mkdtemp(path.join(path.dirname(desired), prefix));
  }
  const created = await createUniqueFile(path.dirname(desired), prefix);
  await created.handle.close();
  return created.path;
}
