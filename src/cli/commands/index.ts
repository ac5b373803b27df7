import type { ArgsiftConfig } from '../../config/schema.js';
import type { ParseOutcome } from '../../parser/outcome.js';
import type { Output } from '../output.js';

export interface CommandContext {
  // The CLI's own options, parsed from everything before `--`
  args: ParseOutcome;
  // Tokens after `--`, handed to the command untouched
  payload: string[];
  output: Output;
  config: ArgsiftConfig;
  cwd: string;
}

export interface Command {
  name: string;
  description: string;
  run(ctx: CommandContext): Promise<number>;
}

export const commands: Map<string, Command> = new Map();

export function registerCommand(cmd: Command): void {
  commands.set(cmd.name, cmd);
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}
