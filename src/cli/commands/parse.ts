import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import { openParser } from '../option-file.js';
import { getLogger } from '../../observability/logger.js';
import type { ParseOutcome } from '../../parser/outcome.js';
import type { Output } from '../output.js';

const parseCommand: Command = {
  name: 'parse',
  description: 'Parse the tokens after -- against an option file',
  async run(ctx: CommandContext): Promise<number> {
    const specPath = ctx.args.get('spec');
    if (specPath === undefined) {
      ctx.output.error('The parse command needs --spec <file>');
      return 1;
    }

    const logger = getLogger().child({ command: 'parse', spec: specPath });

    try {
      const parser = openParser(specPath, ctx.cwd, logger);
      const result = parser.tryParse([parser.program, ...ctx.payload]);

      if (!result.ok) {
        logger.debug('Parse rejected', { code: result.error.code });
        ctx.output.error(result.error.message, { code: result.error.code });
        return 1;
      }

      if (result.outcome.get('help', 'boolean') === true) {
        ctx.output.log(parser.help({ width: ctx.config.helpWidth }));
        return 0;
      }

      if (ctx.output.isJson) {
        ctx.output.json(result.outcome);
      } else {
        printOutcome(result.outcome, ctx.output);
      }
      return 0;
    } catch (error) {
      logger.error('Parse command failed', { error: String(error) });
      ctx.output.error(`Failed to parse: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

function printOutcome(outcome: ParseOutcome, output: Output): void {
  const rows = outcome.names().map(name => [
    name,
    outcome.get(name) ?? '-',
    String(outcome.count(name)),
  ]);
  output.log(output.table(['option', 'value', 'count'], rows));
}

registerCommand(parseCommand);
