/**
 * Command-line option parsing.
 *
 * Short flags cluster (`-nrv`); a value flag takes the rest of its cluster
 * or the next argument. Long flags take `--flag value` or `--flag=value`.
 * `--` ends option processing.
 */

import { UsageError } from '../errors';
import type { CliSettings } from '../config/config-loader';

type SwitchKey = 'showList' | 'metadata' | 'recursive' | 'batch' | 'overwrite' | 'flat';
type ValueKey = 'password' | 'oneEntry';
type CountKey = 'verbose' | 'quiet';
export type InfoCommand = 'help' | 'version' | 'list-extensions';

type FlagTarget =
  | { type: 'switch'; key: SwitchKey }
  | { type: 'value'; key: ValueKey; valueName: string }
  | { type: 'count'; key: CountKey }
  | { type: 'command'; command: InfoCommand };

export interface FlagSpec {
  names: readonly string[];
  target: FlagTarget;
  description: string;
}

export const FLAGS: readonly FlagSpec[] = [
  {
    names: ['-l', '-t', '--list', '--table'],
    target: { type: 'switch', key: 'showList' },
    description: 'list contents of archives on standard output',
  },
  {
    names: ['-m', '--metadata'],
    target: { type: 'switch', key: 'metadata' },
    description: 'extract metadata from a .deb/.gem',
  },
  {
    names: ['-r', '--recursive'],
    target: { type: 'switch', key: 'recursive' },
    description: 'extract archives contained in the ones listed',
  },
  {
    names: ['--one', '--one-entry'],
    target: { type: 'value', key: 'oneEntry', valueName: 'POLICY' },
    description: 'specify extraction policy for one-entry archives: inside/rename/here',
  },
  {
    names: ['-n', '--noninteractive'],
    target: { type: 'switch', key: 'batch' },
    description: "don't ask how to handle special cases",
  },
  {
    names: ['-p', '--password'],
    target: { type: 'value', key: 'password', valueName: 'PASSWORD' },
    description: 'provide a password for password-protected archives',
  },
  {
    names: ['-o', '--overwrite'],
    target: { type: 'switch', key: 'overwrite' },
    description: 'overwrite any existing target output',
  },
  {
    names: ['-f', '--flat', '--no-directory'],
    target: { type: 'switch', key: 'flat' },
    description: 'extract everything to the current directory',
  },
  {
    names: ['--list-extensions'],
    target: { type: 'command', command: 'list-extensions' },
    description: 'list the recognized file extensions and exit',
  },
  {
    names: ['-v', '--verbose'],
    target: { type: 'count', key: 'verbose' },
    description: 'be verbose/print debugging information',
  },
  {
    names: ['-q', '--quiet'],
    target: { type: 'count', key: 'quiet' },
    description: 'suppress warning/error messages',
  },
  {
    names: ['--version'],
    target: { type: 'command', command: 'version' },
    description: "show program's version number and exit",
  },
  {
    names: ['-h', '--help'],
    target: { type: 'command', command: 'help' },
    description: 'show this help message and exit',
  },
];

export type ParsedArguments =
  | { command: 'run'; cli: CliSettings; archives: string[] }
  | { command: InfoCommand };

function findFlag(name: string): FlagSpec {
  const spec = FLAGS.find((flag) => flag.names.includes(name));
  if (!spec) throw new UsageError(`no such option: ${name}`);
  return spec;
}

export function parseArguments(argv: readonly string[]): ParsedArguments {
  const cli: CliSettings = { verbose: 0, quiet: 0 };
  const archives: string[] = [];
  let index = 0;

  const takeValue = (name: string, inline: string | undefined): string => {
    if (inline !== undefined) return inline;
    const next = argv[index + 1];
    if (next === undefined) throw new UsageError(`${name} option requires an argument`);
    index += 1;
    return next;
  };

  /** Apply one flag; returns a command that ends parsing, if any */
  const apply = (name: string, inline: string | undefined): InfoCommand | null => {
    const { target } = findFlag(name);
    switch (target.type) {
      case 'switch':
        if (inline !== undefined) throw new UsageError(`${name} option does not take a value`);
        cli[target.key] = true;
        return null;
      case 'value':
        cli[target.key] = takeValue(name, inline);
        return null;
      case 'count':
        if (inline !== undefined) throw new UsageError(`${name} option does not take a value`);
        cli[target.key] += 1;
        return null;
      case 'command':
        return target.command;
    }
  };

  for (; index < argv.length; index++) {
    const token = argv[index] ?? '';

    if (token === '--') {
      archives.push(...argv.slice(index + 1));
      break;
    }

    if (token.startsWith('--')) {
      const equals = token.indexOf('=');
      const name = equals < 0 ? token : token.slice(0, equals);
      const inline = equals < 0 ? undefined : token.slice(equals + 1);
      const command = apply(name, inline);
      if (command) return { command };
      continue;
    }

    if (token.startsWith('-') && token.length > 1) {
      for (let position = 1; position < token.length; position++) {
        const name = `-${token.charAt(position)}`;
        const rest = token.slice(position + 1);
        if (findFlag(name).target.type === 'value') {
          const command = apply(name, rest === '' ? undefined : rest);
          if (command) return { command };
          break;
        }
        const command = apply(name, undefined);
        if (command) return { command };
      }
      continue;
    }

    archives.push(token);
  }

  if (archives.length === 0) throw new UsageError('you did not list any archives');
  return { command: 'run', cli, archives };
}
