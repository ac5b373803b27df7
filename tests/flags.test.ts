import { describe, it, expect } from 'vitest';
import { isFlag, isLongFlag, isShortFlag, separateFlags } from '../src/parser/flags.js';

describe('Flag classification', () => {
  it('should treat anything starting with two dashes as a long flag', () => {
    expect(isLongFlag('--name')).toBe(true);
    expect(isLongFlag('--')).toBe(true);
    expect(isLongFlag('-n')).toBe(false);
    expect(isLongFlag('name')).toBe(false);
  });

  it('should require a letter after the dash for short flags', () => {
    expect(isShortFlag('-x')).toBe(true);
    expect(isShortFlag('-xyz')).toBe(true);
    expect(isShortFlag('-é')).toBe(true);
    expect(isShortFlag('-')).toBe(false);
    expect(isShortFlag('x')).toBe(false);
    expect(isShortFlag('-1')).toBe(false);
  });

  it('should accept any alphabetic character after the dash', () => {
    expect(isShortFlag('-Ⅻ')).toBe(true);
    expect(isShortFlag('-ß')).toBe(true);
    expect(isShortFlag('-٣')).toBe(false);
  });

  it('should not mistake negative numbers for flags', () => {
    expect(isFlag('-60')).toBe(false);
    expect(isFlag('-6001.45e-2')).toBe(false);
    expect(isFlag('-.5')).toBe(false);
  });

  it('should accept both forms in isFlag', () => {
    expect(isFlag('--verbose')).toBe(true);
    expect(isFlag('-v')).toBe(true);
    expect(isFlag('verbose')).toBe(false);
  });
});

describe('Flag normalization', () => {
  it('should split short flag bundles into single flags', () => {
    expect(separateFlags(['./go', '-xyz'])).toEqual(['./go', '-x', '-y', '-z']);
  });

  it('should pass long flags through unchanged', () => {
    expect(separateFlags(['--verbose', '--dry-run'])).toEqual(['--verbose', '--dry-run']);
  });

  it('should pass single short flags and plain tokens through unchanged', () => {
    expect(separateFlags(['-v', 'file.txt', '-60', '-'])).toEqual(['-v', 'file.txt', '-60', '-']);
  });

  it('should keep bundle order among other tokens', () => {
    expect(separateFlags(['./go', '-ab', 'value', '--long', '-cd'])).toEqual([
      './go',
      '-a',
      '-b',
      'value',
      '--long',
      '-c',
      '-d',
    ]);
  });

  it('should never shrink the token list', () => {
    const input = ['prog', '-abc', '--x', 'y', '-1'];
    expect(separateFlags(input).length).toBeGreaterThanOrEqual(input.length);
  });

  it('should return an empty list for empty input', () => {
    expect(separateFlags([])).toEqual([]);
  });
});
