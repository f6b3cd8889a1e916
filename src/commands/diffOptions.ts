import { InvalidArgumentError } from 'commander';
import { UnsupportedOptionCombination } from '../errors.js';
import { DiffMode } from '../types/enums.js';

export interface DiffModeInput {
  diff?: DiffMode;
  listDiff?: boolean;
  gnuDiff?: boolean;
  gitDiff?: boolean;
}

export interface ResolvedDiffMode {
  mode: DiffMode;
  /** Warnings to print before anything else. */
  deprecations: string[];
}

const DEPRECATED_FLAGS = [
  { name: 'list-diff', key: 'listDiff', mode: DiffMode.FILE_NAME },
  { name: 'gnu-diff', key: 'gnuDiff', mode: DiffMode.GNU },
  { name: 'git-diff', key: 'gitDiff', mode: DiffMode.GIT }
] as const;

export function resolveDiffMode(input: DiffModeInput): ResolvedDiffMode {
  const used = DEPRECATED_FLAGS.filter((flag) => input[flag.key] === true);
  if (used.length > 1) {
    const names = used.map((flag) => `"${flag.name}"`).join(', ');
    throw new UnsupportedOptionCombination(`Cannot use the options ${names} together. Use "--diff" instead.`);
  }

  const [deprecated] = used;
  if (deprecated === undefined) {
    return { mode: input.diff ?? DiffMode.FILE_NAME, deprecations: [] };
  }
  if (input.diff !== undefined && input.diff !== deprecated.mode) {
    throw new UnsupportedOptionCombination(
      `The option "${deprecated.name}" conflicts with "--diff=${input.diff}". Use "--diff" only.`
    );
  }
  return {
    mode: deprecated.mode,
    deprecations: [`Using the option "${deprecated.name}" is deprecated. Use "--diff=${deprecated.mode}" instead.`]
  };
}

export function parseDiffMode(value: string): DiffMode {
  const mode = Object.values(DiffMode).find((candidate) => candidate === value);
  if (mode === undefined) {
    throw new InvalidArgumentError(`Allowed choices are ${Object.values(DiffMode).join(', ')}.`);
  }
  return mode;
}
