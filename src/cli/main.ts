import { loadConfig, setConfig } from '../config/loader.js';
import type { ArgsiftConfig, PartialConfig } from '../config/schema.js';
import { VERSION } from '../version.js';
import { createLogger, isLogLevel } from '../observability/logger.js';
import { ArgParser } from '../parser/registry.js';
import { Kind } from '../parser/types.js';
import { commands, getCommand } from './commands/index.js';
import { createOutput, type Output } from './output.js';

// Import commands to register them
import './commands/normalize.js';
import './commands/parse.js';
import './commands/help.js';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export function createCliParser(): ArgParser {
  return new ArgParser('argsift')
    .declare('command', { flag: 'C', kind: Kind.positional(0), help: 'Command to run' })
    .declare('version', { flag: 'v', kind: Kind.switch, default: 'false', help: 'Show version' })
    .declare('json', { flag: 'j', kind: Kind.switch, default: 'false', help: 'Output as JSON' })
    .declare('log-level', { flag: 'l', kind: Kind.value, help: 'Set log level (debug, info, warn, error, silent)' })
    .declare('config', { flag: 'c', kind: Kind.value, help: 'Path to config file' })
    .declare('spec', { flag: 's', kind: Kind.value, help: 'Path to a JSON option file' });
}

// Everything after the first `--` belongs to the command, not to argsift
export function splitPayload(argv: readonly string[]): { own: string[]; payload: string[] } {
  const separator = argv.indexOf('--');
  if (separator === -1) {
    return { own: [...argv], payload: [] };
  }
  return { own: argv.slice(0, separator), payload: argv.slice(separator + 1) };
}

/**
 * Runs the CLI against `argv` (without node and script path) and resolves to
 * the exit code.
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const cwd = options.cwd ?? process.cwd();
  const io = { stdout: options.stdout, stderr: options.stderr };
  const { own, payload } = splitPayload(argv);

  const cli = createCliParser();
  const parsed = cli.tryParse([cli.program, ...own]);
  if (!parsed.ok) {
    createOutput(definedIo(io)).error(parsed.error.message, { code: parsed.error.code });
    return 1;
  }
  const args = parsed.outcome;

  const cliFlags: PartialConfig = {};
  if (args.count('json') > 0) {
    cliFlags.json = true;
  }
  const level = args.get('log-level');
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      createOutput(definedIo(io)).error(`Invalid --log-level '${level}'`);
      return 1;
    }
    cliFlags.logLevel = level;
  }

  let config: ArgsiftConfig;
  try {
    config = await loadConfig({ cliFlags, configPath: args.get('config'), cwd, env: options.env });
  } catch (error) {
    createOutput(definedIo(io)).error(error instanceof Error ? error.message : String(error));
    return 1;
  }
  setConfig(config);

  createLogger({ level: config.logLevel, json: config.json });
  const output = createOutput({ ...definedIo(io), json: config.json, color: config.color });

  if (args.get('version', 'boolean') === true) {
    output.log(`argsift v${VERSION}`);
    return 0;
  }

  const commandName = args.get('command');
  if (args.get('help', 'boolean') === true || commandName === undefined) {
    printHelp(output, cli, config.helpWidth);
    return 0;
  }

  const cmd = getCommand(commandName);
  if (!cmd) {
    output.error(`Unknown command: ${commandName}`);
    output.log(`Run 'argsift --help' for usage.`);
    return 1;
  }

  return cmd.run({ args, payload, output, config, cwd });
}

function definedIo(io: { stdout?: (line: string) => void; stderr?: (line: string) => void }) {
  return {
    ...(io.stdout ? { stdout: io.stdout } : {}),
    ...(io.stderr ? { stderr: io.stderr } : {}),
  };
}

function printHelp(output: Output, cli: ArgParser, width: number): void {
  output.log(`argsift v${VERSION} - Declarative command-line argument parsing`);
  output.log('');
  output.log('Usage: argsift <command> [options] -- <tokens...>');
  output.log('');
  output.log('Commands:');
  for (const [name, cmd] of commands) {
    output.log(`  ${name.padEnd(12)} ${cmd.description}`);
  }
  output.log('');
  output.log(cli.help({ width }));
}
