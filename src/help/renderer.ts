import { KIND_LABELS, type OptionSpec } from '../parser/types.js';

export interface HelpOptions {
  width?: number;
}

export const DEFAULT_HELP_WIDTH = 60;
const HELP_INDENT = '      ';

function placeholder(spec: OptionSpec): string {
  switch (spec.kind.type) {
    case 'value':
      return spec.name.toUpperCase();
    case 'multi':
      return `${spec.name.toUpperCase()}...`;
    case 'keyValue':
      return 'k:v k2:v2...';
    default:
      return '';
  }
}

export function usageLine(program: string, specs: readonly OptionSpec[]): string {
  const parts = specs.map((spec) => {
    const hint = placeholder(spec);
    return hint ? `[--${spec.name} ${hint}]` : `[--${spec.name}]`;
  });
  return [`Usage: ./${program}`, ...parts].join(' ');
}

/**
 * Greedy word wrap. Words are never split, so a word longer than `width`
 * ends up alone on an overlong line.
 */
export function wrapText(text: string, width: number = DEFAULT_HELP_WIDTH): string[] {
  const lines: string[] = [];
  let line = '';

  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }

  if (line) lines.push(line);
  return lines;
}

function optionBlock(spec: OptionSpec, width: number): string {
  const header = `  --${spec.name} (-${spec.flag})  Required: ${spec.required}  Type: ${KIND_LABELS[spec.kind.type]}`;
  const body = wrapText(spec.help, width).map((line) => HELP_INDENT + line);
  return [header, ...body].join('\n');
}

export function renderHelp(program: string, specs: readonly OptionSpec[], options: HelpOptions = {}): string {
  const width = options.width ?? DEFAULT_HELP_WIDTH;
  const blocks = specs.map((spec) => optionBlock(spec, width));
  return [usageLine(program, specs), '', 'Options:', '', blocks.join('\n\n')].join('\n');
}
