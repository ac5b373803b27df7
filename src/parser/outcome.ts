import { applyConverter, scalars, type Converter, type ScalarName, type ScalarType } from './convert.js';
import type { OptionSpec, ResolvedOption } from './types.js';

export interface OutcomeEntry {
  value: string | null;
  count: number;
}

/**
 * The result of a successful parse. Holds its own copy of every option, so
 * changing the parser afterwards does not reach into an outcome already handed out.
 */
export class ParseOutcome {
  private readonly entries: ReadonlyMap<string, Readonly<ResolvedOption>>;

  constructor(
    readonly program: string,
    resolved: Iterable<ResolvedOption>
  ) {
    const entries = new Map<string, Readonly<ResolvedOption>>();
    for (const option of resolved) {
      entries.set(
        option.spec.name,
        Object.freeze({
          spec: Object.freeze({ ...option.spec, kind: { ...option.spec.kind } }),
          value: option.value,
          count: option.count,
        })
      );
    }
    this.entries = entries;
  }

  /** Raw resolved text, or converted with one of the built-in scalar parsers. */
  get(name: string): string | undefined;
  get<N extends ScalarName>(name: string, type: N): ScalarType<N> | undefined;
  get(name: string, type: ScalarName = 'string'): unknown {
    const convert: Converter<unknown> = scalars[type];
    return this.getWith(name, convert);
  }

  getWith<T>(name: string, converter: Converter<T>): T | undefined {
    const raw = this.entries.get(name)?.value;
    return raw === undefined ? undefined : applyConverter(converter, raw);
  }

  /** How many times the option's flag appeared; 0 for unknown names. */
  count(name: string): number {
    return this.entries.get(name)?.count ?? 0;
  }

  has(name: string): boolean {
    return this.entries.get(name)?.value !== undefined;
  }

  spec(name: string): Readonly<OptionSpec> | undefined {
    return this.entries.get(name)?.spec;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  toJSON(): Record<string, OutcomeEntry> {
    const out: Record<string, OutcomeEntry> = {};
    for (const [name, entry] of this.entries) {
      out[name] = { value: entry.value ?? null, count: entry.count };
    }
    return out;
  }
}
