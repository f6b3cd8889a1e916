import { describe, expect, it } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { parseDiffMode, resolveDiffMode } from './diffOptions.js';
import { UnsupportedOptionCombination } from '../errors.js';
import { DiffMode } from '../types/enums.js';

describe('resolveDiffMode', () => {
  it('defaults to the file-name mode', () => {
    expect(resolveDiffMode({})).toEqual({ mode: DiffMode.FILE_NAME, deprecations: [] });
    expect(resolveDiffMode({ diff: DiffMode.GIT })).toEqual({ mode: DiffMode.GIT, deprecations: [] });
  });

  it('maps each deprecated flag with a warning', () => {
    expect(resolveDiffMode({ listDiff: true })).toEqual({
      mode: DiffMode.FILE_NAME,
      deprecations: ['Using the option "list-diff" is deprecated. Use "--diff=file-name" instead.']
    });
    expect(resolveDiffMode({ gnuDiff: true }).mode).toBe(DiffMode.GNU);
    expect(resolveDiffMode({ gitDiff: true }).deprecations).toEqual([
      'Using the option "git-diff" is deprecated. Use "--diff=git" instead.'
    ]);
  });

  it('accepts a deprecated flag agreeing with --diff', () => {
    expect(resolveDiffMode({ gnuDiff: true, diff: DiffMode.GNU }).mode).toBe(DiffMode.GNU);
  });

  it('rejects conflicting options', () => {
    expect(() => resolveDiffMode({ listDiff: true, gitDiff: true })).toThrow(UnsupportedOptionCombination);
    expect(() => resolveDiffMode({ listDiff: true, gitDiff: true })).toThrow(
      'Cannot use the options "list-diff", "git-diff" together. Use "--diff" instead.'
    );
    expect(() => resolveDiffMode({ gnuDiff: true, diff: DiffMode.GIT })).toThrow(
      'The option "gnu-diff" conflicts with "--diff=git". Use "--diff" only.'
    );
  });
});

describe('parseDiffMode', () => {
  it('accepts the known modes only', () => {
    expect(parseDiffMode('gnu')).toBe(DiffMode.GNU);
    expect(() => parseDiffMode('svn')).toThrow(InvalidArgumentError);
  });
});
