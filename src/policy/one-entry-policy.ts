/**
 * What to do with an archive holding one entry whose name doesn't match
 * the archive's: wrap it in a new directory, rename it, or leave it as is.
 */

import { UsageError } from '../errors';
import type { ContentType } from '../types/archive';
import type { Prompter } from '../utils/prompt';
import { BasePolicy, terminalWidth, wrapQuestion, type PolicyOptions } from './base-policy';

export type OneEntryAnswer = 'HERE' | 'WRAP' | 'RENAME';

const ANSWERS: ReadonlyMap<string, OneEntryAnswer> = new Map<string, OneEntryAnswer>([
  ['h', 'HERE'],
  ['i', 'WRAP'],
  ['r', 'RENAME'],
  ['', 'WRAP'],
]);

// Checked in this order, so "r" means rename and "i" inside
const NAMED_DEFAULTS: ReadonlyArray<readonly [string, OneEntryAnswer]> = [
  ['here', 'HERE'],
  ['rename', 'RENAME'],
  ['inside', 'WRAP'],
];

const PROMPT = 'What do you want to do?  (I/r/h) ';

export interface OneEntryOptions extends PolicyOptions {
  flat: boolean;
  oneEntryDefault: string | null;
}

/** Resolve an abbreviated --one-entry value; throws on anything else */
export function parseOneEntryDefault(value: string): OneEntryAnswer {
  const wanted = value.toLowerCase();
  if (wanted !== '') {
    for (const [name, answer] of NAMED_DEFAULTS) {
      if (name.startsWith(wanted)) return answer;
    }
  }
  throw new UsageError('invalid value for --one-entry option');
}

function describeEntry(contentType: ContentType): string {
  return contentType === 'ONE_ENTRY_DIRECTORY' ? 'directory' : 'file';
}

export class OneEntryPolicy extends BasePolicy<OneEntryAnswer> {
  constructor(options: OneEntryOptions, prompter: Prompter, width = terminalWidth()) {
    super(ANSWERS, 'WRAP', options, prompter, width);
    if (options.flat) {
      this.permanent = 'HERE';
    } else if (options.oneEntryDefault !== null) {
      this.permanent = parseOneEntryDefault(options.oneEntryDefault);
    }
  }

  async prep(
    archive: string,
    contentType: ContentType,
    basename: string,
    contentName: string
  ): Promise<void> {
    if (this.permanent !== null) {
      this.current = this.permanent;
      return;
    }
    const entry = describeEntry(contentType);
    const question = wrapQuestion("%s contains one %s but its name doesn't match.", [archive, entry], this.width);
    question.push(` Expected: ${basename}`, `   Actual: ${contentName}`);
    const choices = [
      `extract the ${entry} _I_nside a new directory named ${basename}`,
      `extract the ${entry} and _R_ename it ${basename}`,
      `extract the ${entry} _H_ere`,
    ];
    this.current = await this.askQuestion(question, choices, PROMPT);
  }

  /** The single entry goes straight into place, renamed or not */
  okForMatch(): boolean {
    return this.current === 'RENAME' || this.current === 'HERE';
  }

  /** Archives found by recursion are always wrapped */
  wrapFromNowOn(): void {
    this.permanent = 'WRAP';
  }
}
