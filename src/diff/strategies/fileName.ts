import path from 'node:path';
import type { ArchiveEntry } from '../../archive/types.js';
import type { ContentSection } from '../report.js';
import type { ContentDiffContext } from './types.js';
import { describeEntry } from '../summary.js';
import { ExitCode } from '../../types/enums.js';

export function diffFileNames(context: ContentDiffContext): ContentSection {
  const entriesA = context.archiveA.listEntries();
  const entriesB = context.archiveB.listEntries();
  const onlyInA = missingFrom(entriesA, entriesB);
  const onlyInB = missingFrom(entriesB, entriesA);
  const total = onlyInA.length + onlyInB.length;
  if (total === 0) {
    return { kind: 'no-difference' };
  }

  const nameA = path.basename(context.archiveA.path);
  const nameB = path.basename(context.archiveB.path);
  return {
    kind: 'difference',
    lines: [
      `--- Files present in "${nameA}" but not in "${nameB}"`,
      `+++ Files present in "${nameB}" but not in "${nameA}"`,
      '',
      ...onlyInA.map((entry) => formatEntry('-', entry)),
      '',
      ...onlyInB.map((entry) => formatEntry('+', entry))
    ],
    message: `${total} file(s) difference`,
    exitCode: ExitCode.FAILURE
  };
}

function formatEntry(marker: string, entry: ArchiveEntry): string {
  return `${marker} ${describeEntry(entry)}`;
}

function missingFrom(source: readonly ArchiveEntry[], other: readonly ArchiveEntry[]): ArchiveEntry[] {
  const paths = new Set(other.map((entry) => entry.path));
  return source.filter((entry) => !paths.has(entry.path));
}
