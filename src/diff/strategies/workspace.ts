import fs from 'node:fs';
import path from 'node:path';
import type { ContentDiffContext } from './types.js';
import { extractArchive } from '../../archive/extract.js';

export interface ExtractedPair {
  /** Temporary directory holding both trees; the working directory of the tool. */
  root: string;
  /** Tree locations relative to `root`, `/`-separated. */
  dirA: string;
  dirB: string;
}

/**
 * Extracts both archives into a fresh temporary directory, hands their
 * locations to `fn`, and removes the directory afterwards whatever happens.
 */
export async function withExtractedArchives<T>(
  context: ContentDiffContext,
  options: { metadataSidecar: boolean },
  fn: (pair: ExtractedPair) => Promise<T>
): Promise<T> {
  const root = fs.mkdtempSync(path.join(context.tmpDir, 'pharsmith-diff-'));
  try {
    const [dirA, dirB] = treeNames(context.archiveA.path, context.archiveB.path);
    await extractArchive(context.archiveA, path.join(root, ...dirA.split('/')), options);
    await extractArchive(context.archiveB, path.join(root, ...dirB.split('/')), options);
    return await fn({ root, dirA, dirB });
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

export function treeNames(pathA: string, pathB: string): [string, string] {
  const nameA = path.basename(pathA);
  const nameB = path.basename(pathB);
  if (nameA === nameB) {
    return [`a/${nameA}`, `b/${nameB}`];
  }
  return [nameA, nameB];
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;
// cmd.exe expands %VAR%
const CMD_SAFE = /^[\w@+=:,./-]+$/;

export function quoteShellArgument(value: string, platform: NodeJS.Platform): string {
  if ((platform === 'win32' ? CMD_SAFE : SHELL_SAFE).test(value)) return value;
  if (platform === 'win32') return `"${value.replace(/"/g, '""')}"`;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
