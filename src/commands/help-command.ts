import { bold, color, dim } from '../utils/ui';
import { FLAGS, type FlagSpec } from './option-parser';

/** `-p PASSWORD, --password=PASSWORD` */
function flagLabel(spec: FlagSpec): string {
  const valueName = spec.target.type === 'value' ? spec.target.valueName : null;
  return spec.names
    .map((name) => {
      if (!valueName) return name;
      return name.startsWith('--') ? `${name}=${valueName}` : `${name} ${valueName}`;
    })
    .join(', ');
}

export function helpText(): string {
  const labels = FLAGS.map(flagLabel);
  const width = Math.max(...labels.map((label) => label.length)) + 2;

  const lines = [
    `${bold('Usage:')} unpackit [options] archive [archive2 ...]`,
    '',
    dim('Intelligent archive extractor'),
    '',
    bold('Options:'),
    ...FLAGS.map((spec, index) => {
      const label = labels[index] ?? '';
      return `  ${color(label.padEnd(width), 'info')}${spec.description}`;
    }),
    '',
  ];
  return lines.join('\n');
}

export function handleHelpCommand(): void {
  process.stdout.write(`${helpText()}\n`);
}
