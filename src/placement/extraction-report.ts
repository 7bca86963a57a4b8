/**
 * The tree an extraction produced, as printed after a successful run:
 * depth first, sorted, directories with a trailing '/'.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isDirectory } from '../utils/fs-helpers';

/**
 * @param cwd - directory the target is relative to
 * @param target - placement target ('.' when the contents went straight into cwd)
 * @param contents - top-level entries of the extraction; null for a single stream
 */
export async function extractionTree(
  cwd: string,
  target: string,
  contents: readonly string[] | null
): Promise<string[]> {
  if (target === '') return [];
  if (contents === null) return [target];

  const lines: string[] = [];
  const pending = target === '.' ? [...contents].sort().reverse() : [target];
  for (;;) {
    const name = pending.pop();
    if (name === undefined) break;
    const absolute = path.join(cwd, name);
    if (!(await isDirectory(absolute))) {
      lines.push(name);
      continue;
    }
    lines.push(`${name}/`);
    const children = (await fs.promises.readdir(absolute)).sort().reverse();
    pending.push(...children.map((child) => path.join(name, child)));
  }
  return lines;
}
