import type { LogTarget } from '../observability/logger.js';
import { EmptyRegistryError, MissingRequiredError, MissingValueError } from './errors.js';
import { isFlag, separateFlags } from './flags.js';
import { ParseOutcome } from './outcome.js';
import { TRUE_LITERAL, type OptionSpec, type ResolvedOption } from './types.js';
import { slide, type Window } from './window.js';

export interface ResolveOptions {
  program: string;
  logger?: LogTarget;
}

function matches(token: string, spec: OptionSpec): boolean {
  return token === `-${spec.flag}` || token === `--${spec.name}`;
}

function takeUntilFlag(rest: readonly string[]): readonly string[] {
  const end = rest.findIndex(isFlag);
  return end === -1 ? rest : rest.slice(0, end);
}

// Applies one flag match to `option`, recording every token index it claims
function consume(option: ResolvedOption, window: Window<string>, consumed: Set<number>): void {
  const { spec } = option;
  const { rest, index } = window;

  switch (spec.kind.type) {
    case 'switch':
      option.value = TRUE_LITERAL;
      break;
    case 'value': {
      const next = rest?.[0];
      if (next === undefined || isFlag(next)) {
        throw new MissingValueError(spec.name);
      }
      option.value = next;
      consumed.add(index + 1);
      break;
    }
    case 'multi':
    case 'keyValue': {
      if (!rest) {
        throw new MissingValueError(spec.name);
      }
      const taken = takeUntilFlag(rest);
      option.value = taken.join(' ');
      taken.forEach((_, offset) => consumed.add(index + 1 + offset));
      break;
    }
    case 'positional':
      // The flag is claimed, the value still comes from the stream position
      break;
  }
}

/**
 * Resolves a token stream against a set of declarations.
 *
 * Flags are matched first, each claiming its own token and whatever values it
 * takes. Positional options are then filled from the tokens nobody claimed,
 * not counting the program name at index 0. Finally every required option
 * must have ended up with a value.
 */
export function resolve(
  specs: ReadonlyMap<string, OptionSpec>,
  tokens: readonly string[],
  options: ResolveOptions
): ParseOutcome {
  if (specs.size === 0) {
    throw new EmptyRegistryError();
  }

  const argv = separateFlags(tokens);
  const consumed = new Set<number>();
  const working: ResolvedOption[] = [...specs.values()].map((spec) => ({
    spec,
    value: spec.defaultValue,
    count: 0,
  }));

  for (const option of working) {
    for (const window of slide(argv)) {
      if (!matches(window.token, option.spec)) continue;

      option.count += 1;
      consumed.add(window.index);
      consume(option, window, consumed);
    }
  }

  const free = argv.map((token, index) => ({ token, index })).filter(({ index }) => index > 0 && !consumed.has(index));

  for (const option of working) {
    const { kind } = option.spec;
    if (kind.type !== 'positional' || option.value !== undefined) continue;
    option.value = free[kind.index]?.token;
  }

  const missing = working.filter((option) => option.spec.required && option.value === undefined);
  if (missing.length > 0) {
    throw new MissingRequiredError(missing.map((option) => option.spec.name));
  }

  for (const option of working) {
    options.logger?.debug('Resolved option', {
      option: option.spec.name,
      value: option.value,
      count: option.count,
    });
  }

  return new ParseOutcome(options.program, working);
}
