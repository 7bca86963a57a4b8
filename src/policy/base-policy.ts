/**
 * Base Policy
 *
 * A policy answers one recurring question. Batch mode (or a command-line
 * default) fixes a permanent answer up front; otherwise the user is asked
 * and some answers stick for the rest of the run.
 */

import type { Prompter } from '../utils/prompt';

export interface PolicyOptions {
  batch: boolean;
}

/** Greedy word wrap; words longer than the width get a line of their own */
export function wrapWords(words: readonly string[], width: number): string[] {
  const lines: string[] = [];
  for (const word of words) {
    const last = lines[lines.length - 1];
    if (last !== undefined && `${last} ${word}`.length <= width) {
      lines[lines.length - 1] = `${last} ${word}`;
    } else {
      lines.push(word);
    }
  }
  return lines;
}

/** Fill each '%s' placeholder in turn, then wrap */
export function wrapQuestion(template: string, args: readonly (string | number)[], width: number): string[] {
  const words = template.split(/\s+/).filter((word) => word !== '');
  for (const arg of args) {
    const index = words.indexOf('%s');
    if (index >= 0) words[index] = String(arg);
  }
  return wrapWords(words, width);
}

/** Bulleted choice: " * first line", continuation lines indented to match */
export function wrapChoice(choice: string, width: number): string[] {
  const words = choice.split(/\s+/).filter((word) => word !== '');
  const lines: string[] = [];
  for (const word of words) {
    const last = lines[lines.length - 1];
    if (last !== undefined && `${last} ${word}`.length <= width) {
      lines[lines.length - 1] = `${last} ${word}`;
    } else {
      lines.push(`${last === undefined ? ' *' : '  '} ${word}`);
    }
  }
  return lines;
}

export function terminalWidth(): number {
  return (process.stdout.columns ?? 80) - 1;
}

export abstract class BasePolicy<Answer extends string> {
  protected permanent: Answer | null;
  protected current: Answer | null = null;

  protected constructor(
    private readonly answers: ReadonlyMap<string, Answer>,
    private readonly defaultAnswer: Answer,
    options: PolicyOptions,
    protected readonly prompter: Prompter,
    protected readonly width: number
  ) {
    this.permanent = options.batch ? defaultAnswer : null;
  }

  /** Answer for the archive being handled */
  get currentAnswer(): Answer | null {
    return this.current;
  }

  get permanentAnswer(): Answer | null {
    return this.permanent;
  }

  protected async askQuestion(
    question: readonly string[],
    choices: readonly string[],
    prompt: string
  ): Promise<Answer> {
    const lines = [...question, 'You can:', ...choices.flatMap((choice) => wrapChoice(choice, this.width))];
    for (;;) {
      this.prompter.say(`${lines.join('\n')}\n`);
      const reply = await this.prompter.ask(prompt);
      if (reply === null) return this.defaultAnswer;
      const answer = this.answers.get(reply.trim().toLowerCase());
      if (answer !== undefined) return answer;
      this.prompter.say('\n');
    }
  }
}
