const LETTER_PATTERN = /^\p{Alphabetic}$/u;

// `--name`, and the bare `--` separator
export function isLongFlag(token: string): boolean {
  return token.startsWith('--');
}

// `-x` or a bundle such as `-xyz`. Negative numbers (`-60`, `-1.5e3`) are not flags.
export function isShortFlag(token: string): boolean {
  const chars = Array.from(token);
  if (chars.length < 2 || chars[0] !== '-') return false;
  return LETTER_PATTERN.test(chars[1] ?? '');
}

export function isFlag(token: string): boolean {
  return isLongFlag(token) || isShortFlag(token);
}

/**
 * Expands bundled short flags so every short flag can be matched on its own:
 * `-xyz` becomes `-x -y -z`. Long flags, single short flags and anything that
 * is not a flag are passed through untouched.
 */
export function separateFlags(tokens: readonly string[]): string[] {
  const separated: string[] = [];

  for (const token of tokens) {
    if (isLongFlag(token) || !isShortFlag(token)) {
      separated.push(token);
      continue;
    }

    const chars = Array.from(token).slice(1);
    if (chars.length === 1) {
      separated.push(token);
    } else {
      for (const char of chars) {
        separated.push(`-${char}`);
      }
    }
  }

  return separated;
}
