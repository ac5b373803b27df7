import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { openParser } from '../option-file.js';

const helpCommand: Command = {
  name: 'help',
  description: 'Render the help text for an option file',
  async run(ctx: CommandContext): Promise<number> {
    const specPath = ctx.args.get('spec');
    if (specPath === undefined) {
      ctx.output.error('The help command needs --spec <file>');
      return 1;
    }

    try {
      const parser = openParser(specPath, ctx.cwd);
      const text = parser.help({ width: ctx.config.helpWidth });

      if (ctx.output.isJson) {
        ctx.output.json({ program: parser.program, help: text });
      } else {
        ctx.output.log(text);
      }
      return 0;
    } catch (error) {
      ctx.output.error(`Failed to load option file: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

registerCommand(helpCommand);
