/**
 * Whether to extract archives found inside an extracted archive.
 */

import * as path from 'path';
import { DEFAULT_RECURSION_RATIO } from '../types/options';
import type { Prompter } from '../utils/prompt';
import { BasePolicy, terminalWidth, wrapQuestion, type PolicyOptions } from './base-policy';

export type RecursionAnswer = 'NOT_NOW' | 'ONCE' | 'ALWAYS' | 'NEVER' | 'LIST';

const ANSWERS: ReadonlyMap<string, RecursionAnswer> = new Map<string, RecursionAnswer>([
  ['o', 'ONCE'],
  ['a', 'ALWAYS'],
  ['n', 'NOT_NOW'],
  ['v', 'NEVER'],
  ['l', 'LIST'],
  ['', 'NOT_NOW'],
]);

const CHOICES = [
  '_A_lways extract included archives during this session',
  'extract included archives this _O_nce',
  'choose _N_ot to extract included archives this once',
  'ne_V_er extract included archives during this session',
  '_L_ist included archives',
];

const PROMPT = 'What do you want to do?  (a/o/N/v/l) ';

export interface RecursionOptions extends PolicyOptions {
  showList: boolean;
  recursive: boolean;
  /** Nested archives at or below this share of all files never trigger a question */
  recursionRatio?: number;
}

export interface NestedArchives {
  /** Where the archive's contents were placed ('.' for the working directory) */
  target: string;
  includedRoot: string;
  includedArchives: readonly string[];
  fileCount: number;
}

export class RecursionPolicy extends BasePolicy<RecursionAnswer> {
  private readonly ratio: number;

  constructor(options: RecursionOptions, prompter: Prompter, width = terminalWidth()) {
    super(ANSWERS, 'NOT_NOW', options, prompter, width);
    this.ratio = options.recursionRatio ?? DEFAULT_RECURSION_RATIO;
    if (options.showList) {
      this.permanent = 'NEVER';
    } else if (options.recursive) {
      this.permanent = 'ALWAYS';
    }
  }

  async prep(archive: string, nested: NestedArchives): Promise<void> {
    const archiveCount = nested.includedArchives.length;
    if (this.permanent !== null || archiveCount <= nested.fileCount * this.ratio) {
      this.current = this.permanent ?? 'NOT_NOW';
      return;
    }

    const question = wrapQuestion(
      '%s contains %s other archive file(s), out of %s file(s) total.',
      [archive, archiveCount, nested.fileCount],
      this.width
    );
    const target = nested.target === '.' ? '' : nested.target;
    const includedRoot = nested.includedRoot === './' ? '' : nested.includedRoot;

    for (;;) {
      this.current = await this.askQuestion(question, CHOICES, PROMPT);
      if (this.current !== 'LIST') break;
      const listing = nested.includedArchives.map((name) => path.join(target, includedRoot, name));
      this.prompter.say(`\n${listing.join('\n')}\n\n`);
    }
    if (this.current === 'ALWAYS' || this.current === 'NEVER') {
      this.permanent = this.current;
    }
  }

  okToRecurse(): boolean {
    return this.current === 'ALWAYS' || this.current === 'ONCE';
  }
}
