import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { separateFlags } from '../../parser/flags.js';

const normalizeCommand: Command = {
  name: 'normalize',
  description: 'Print the token stream after short-flag bundles are split',
  async run(ctx: CommandContext): Promise<number> {
    const tokens = separateFlags(ctx.payload);

    if (ctx.output.isJson) {
      ctx.output.json(tokens);
    } else {
      tokens.forEach(token => ctx.output.log(token));
    }

    return 0;
  },
};

registerCommand(normalizeCommand);
