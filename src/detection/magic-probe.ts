/**
 * Content-based identification through `file -zL`.
 */

import { spawn } from 'child_process';
import type { ArchiveDescriptor, ArchiveKind, Encoding } from '../types/archive';
import type { Logger } from '../utils/logger';
import { encodingsInMagic, kindsInMagic } from './format-table';

export interface ProbeEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

/**
 * First line of `file -zL <filename>` with the "<filename>: " prefix removed.
 * Resolves null when the tool is missing or fails.
 */
export function readMagic(filename: string, probeEnv: ProbeEnvironment): Promise<string | null> {
  return new Promise((resolve, reject) => {
    const child = spawn('file', ['-zL', filename], {
      cwd: probeEnv.cwd,
      env: probeEnv.env,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
    let output = '';

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      output += chunk;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        probeEnv.logger.error("'file' command not found, skipping magic test");
        resolve(null);
        return;
      }
      reject(err);
    });

    child.on('close', (code) => {
      if (code !== 0) {
        probeEnv.logger.debug(`file exited with status ${code}`);
        resolve(null);
        return;
      }
      let line = output.split('\n')[0] ?? '';
      const prefix = `${filename}: `;
      if (line.startsWith(prefix)) line = line.slice(prefix.length);
      resolve(line);
    });
  });
}

/**
 * Cross every recognized kind with every recognized encoding.
 * An encoding with no kind means a bare compressed stream; a kind with no
 * encoding means the archive is stored as-is.
 */
export function descriptorsFromMagic(output: string): ArchiveDescriptor[] {
  const kinds = kindsInMagic(output);
  const encodings = encodingsInMagic(output);

  if (kinds.length === 0 && encodings.length === 0) return [];
  const effectiveKinds: readonly ArchiveKind[] = kinds.length > 0 ? kinds : ['compress'];
  const effectiveEncodings: ReadonlyArray<Encoding | null> =
    encodings.length > 0 ? encodings : [null];

  return effectiveKinds.flatMap((kind) =>
    effectiveEncodings.map((encoding) => ({ kind, encoding }))
  );
}

export async function probeMagic(
  filename: string,
  probeEnv: ProbeEnvironment
): Promise<ArchiveDescriptor[]> {
  const output = await readMagic(filename, probeEnv);
  if (output === null) return [];
  probeEnv.logger.debug(`file says: ${output}`);
  return descriptorsFromMagic(output);
}
