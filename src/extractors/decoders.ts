/**
 * Stream decoders: one stage that turns an encoded stream back into raw bytes.
 */

import { spawnSync } from 'child_process';
import type { Encoding } from '../types/archive';
import type { PipelineStage } from '../pipeline/pipeline-types';

const DECODER_COMMANDS: Readonly<Record<Exclude<Encoding, 'lrzip'>, readonly string[]>> = {
  gzip: ['zcat'],
  compress: ['zcat'],
  bzip2: ['bzcat'],
  lzma: ['lzcat'],
  xz: ['xzcat'],
  lzip: ['lzip', '-cd'],
  zstd: ['zstd', '-d', '-c'],
  br: ['brotli', '--decompress', '--stdout'],
};

// Probe results keyed by PATH
const quietFlags = new Map<string, string>();

/**
 * lrzcat spells "quiet" as -Q in some releases and -q in others;
 * ask the installed lrzip which one it understands.
 */
export function lrzipQuietFlag(env: NodeJS.ProcessEnv): string {
  const key = env.PATH ?? '';
  const cached = quietFlags.get(key);
  if (cached !== undefined) return cached;

  const probe = spawnSync('lrzip', ['--help'], { env, encoding: 'utf8' });
  const flag = !probe.error && `${probe.stdout}${probe.stderr}`.includes('-Q') ? '-Q' : '-q';
  quietFlags.set(key, flag);
  return flag;
}

export function decoderCommand(encoding: Encoding, env: NodeJS.ProcessEnv): string[] {
  if (encoding === 'lrzip') return ['lrzcat', lrzipQuietFlag(env)];
  return [...DECODER_COMMANDS[encoding]];
}

export function decoderStage(encoding: Encoding, env: NodeJS.ProcessEnv): PipelineStage {
  return { command: decoderCommand(encoding, env), purpose: 'decoding' };
}
