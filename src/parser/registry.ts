import { logger, type LogTarget } from '../observability/logger.js';
import { renderHelp, type HelpOptions } from '../help/renderer.js';
import { resolve } from './engine.js';
import { InvalidDeclarationError, UnknownOptionError, isArgParseError, type ArgParseError } from './errors.js';
import type { ParseOutcome } from './outcome.js';
import { Kind, type DeclareOptions, type OptionSpec } from './types.js';

export interface ArgParserOptions {
  logger?: LogTarget;
}

export type ParseResult = { ok: true; outcome: ParseOutcome } | { ok: false; error: ArgParseError };

/**
 * Holds option declarations for one program and parses token streams against them.
 *
 * Parsing does not touch the declarations: the same parser can be used for any
 * number of token streams, and each call returns a fresh outcome.
 *
 * @example
 * ```ts
 * const parser = new ArgParser('runner');
 * parser.declare('verbose', { flag: 'v', kind: Kind.switch, default: 'false' });
 *
 * const outcome = parser.parse(['./runner', '-v']);
 * outcome.get('verbose', 'boolean'); // true
 * ```
 */
export class ArgParser {
  private readonly declarations = new Map<string, OptionSpec>();
  private readonly logger: LogTarget;

  constructor(
    readonly program: string,
    options: ArgParserOptions = {}
  ) {
    // Resolved on every call, so a later createLogger still applies
    this.logger = options.logger ?? logger;
    this.declare('help', {
      flag: 'h',
      kind: Kind.switch,
      default: 'false',
      help: 'Show this help message',
    });
  }

  /** Adds an option, replacing any earlier one with the same name. */
  declare(name: string, options: DeclareOptions): this {
    if (name.length === 0) {
      throw new InvalidDeclarationError(name, 'name must not be empty');
    }
    if (Array.from(options.flag).length !== 1) {
      throw new InvalidDeclarationError(name, `flag must be a single character, got '${options.flag}'`);
    }
    if (options.kind.type === 'positional' && !(Number.isInteger(options.kind.index) && options.kind.index >= 0)) {
      throw new InvalidDeclarationError(name, `positional index must be a non-negative integer, got ${options.kind.index}`);
    }

    this.declarations.set(name, {
      name,
      defaultValue: options.default,
      flag: options.flag,
      required: options.required ?? false,
      help: options.help ?? '',
      kind: options.kind,
    });
    return this;
  }

  remove(name: string): void {
    if (!this.declarations.delete(name)) {
      throw new UnknownOptionError(name);
    }
  }

  has(name: string): boolean {
    return this.declarations.has(name);
  }

  options(): readonly OptionSpec[] {
    return [...this.declarations.values()].map((spec) => ({ ...spec }));
  }

  /**
   * Parses `tokens`, program name first, e.g. `process.argv.slice(1)`.
   *
   * @throws ArgParseError when a value is missing or a required option was not given
   */
  parse(tokens: readonly string[]): ParseOutcome {
    const snapshot = new Map(this.options().map((spec) => [spec.name, spec] as const));
    return resolve(snapshot, tokens, { program: this.program, logger: this.logger });
  }

  tryParse(tokens: readonly string[]): ParseResult {
    try {
      return { ok: true, outcome: this.parse(tokens) };
    } catch (error) {
      if (isArgParseError(error)) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  help(options: HelpOptions = {}): string {
    return renderHelp(this.program, this.options(), options);
  }
}
