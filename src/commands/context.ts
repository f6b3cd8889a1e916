import path from 'node:path';
import { assertFileExists } from '../archive/ArchiveRegistry.js';
import type { IO } from '../console/IO.js';
import type { ArchiveDifferOptions } from '../diff/ArchiveDiffer.js';
import type { ExitCode } from '../types/enums.js';

export interface CommandContext {
  io: IO;
  /** Directory relative paths given on the command line resolve against. */
  cwd: string;
  differ: ArchiveDifferOptions;
  setExitCode(code: ExitCode): void;
}

/** Absolute path of an existing file; a missing one is reported under the name the user gave. */
export function resolveExistingFile(context: CommandContext, given: string): string {
  const resolved = path.resolve(context.cwd, given);
  assertFileExists(resolved, given);
  return resolved;
}
