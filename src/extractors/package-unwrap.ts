/**
 * Debian packages are `ar` archives wrapping tarballs. Find the wanted
 * member with `ar t`, then stream it out with `ar p` and decode it.
 */

import { ExtractionError } from '../errors';
import { guessType } from '../detection/mimetype-guess';
import { PipelineLineReader } from '../pipeline/line-reader';
import type { PipelineEnvironment, PipelineStage } from '../pipeline/pipeline-types';
import { decoderStage } from './decoders';

export interface PackageMember {
  /** e.g. "data" or "control" */
  label: string;
  pattern: RegExp;
}

export const DEB_DATA_MEMBER: PackageMember = { label: 'data', pattern: /^data\.tar(\.[a-z0-9]+)?$/ };
export const DEB_CONTROL_MEMBER: PackageMember = {
  label: 'control',
  pattern: /^control\.tar(\.[a-z0-9]+)?$/,
};

export async function findArMember(
  filename: string,
  member: PackageMember,
  env: PipelineEnvironment
): Promise<string> {
  const reader = new PipelineLineReader(
    [{ command: ['ar', 't', filename], purpose: `finding package ${member.label} file` }],
    { type: 'none' },
    env
  );
  for await (const line of reader.lines()) {
    if (member.pattern.test(line)) return line;
  }
  throw new ExtractionError(`.deb contains no ${member.label}.tar file`, 'EXTRACTION_FAILED');
}

/** Stages that write the member's plain tar stream to stdout */
export async function arMemberStages(
  filename: string,
  member: PackageMember,
  env: PipelineEnvironment
): Promise<PipelineStage[]> {
  const name = await findArMember(filename, member, env);
  const stages: PipelineStage[] = [
    { command: ['ar', 'p', filename, name], purpose: `extracting ${name} from .deb` },
  ];
  const { encoding } = guessType(name);
  if (encoding !== null) {
    stages.push({ ...decoderStage(encoding, env.env), purpose: `decoding ${name}` });
  }
  return stages;
}
