import type { ArchiveHandle } from '../archive/types.js';

/** Number of entries added, removed, or whose contents differ between the two archives. */
export async function countEntryDifferences(archiveA: ArchiveHandle, archiveB: ArchiveHandle): Promise<number> {
  const pathsB = new Set(archiveB.listEntries().map((entry) => entry.path));
  let differences = 0;
  for (const entry of archiveA.listEntries()) {
    if (!pathsB.delete(entry.path)) {
      differences += 1;
      continue;
    }
    const other = archiveB.statEntry(entry.path);
    if (entry.size !== other.size) {
      differences += 1;
      continue;
    }
    const [contentsA, contentsB] = await Promise.all([archiveA.readEntry(entry.path), archiveB.readEntry(entry.path)]);
    if (!contentsA.equals(contentsB)) differences += 1;
  }
  return differences + pathsB.size;
}

export function sameLines(linesA: readonly string[], linesB: readonly string[]): boolean {
  return linesA.length === linesB.length && linesA.every((line, index) => line === linesB[index]);
}
