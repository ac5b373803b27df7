export interface Window<T> {
  token: T;
  // undefined for the last token, otherwise everything after `token`
  rest: readonly T[] | undefined;
  index: number;
}

/**
 * Walks a token list, pairing each token with the slice that follows it.
 *
 * The returned iterable is lazy and can be iterated any number of times;
 * each pass starts from the first token again.
 */
export function slide<T>(items: readonly T[]): Iterable<Window<T>> {
  return {
    *[Symbol.iterator](): Iterator<Window<T>> {
      for (const [index, token] of items.entries()) {
        const rest = index + 1 < items.length ? items.slice(index + 1) : undefined;
        yield { token, rest, index };
      }
    },
  };
}
