import type { ArchiveEntry, ArchiveMetadata, ArchiveSignature } from './types.js';
import { ArchiveEntryError } from '../errors.js';
import { CompressionAlgorithm, ErrorCode } from '../types/enums.js';
import { utf8ByteCompare } from '../utils/utf8.js';

interface EntryRecord<R> {
  entry: ArchiveEntry;
  raw: R;
}

/** Entries of one archive keyed by relative path, iterated in UTF-8 byte order. */
export class EntryTable<R> {
  private readonly records = new Map<string, EntryRecord<R>>();
  private sorted: ArchiveEntry[] = [];

  add(entry: ArchiveEntry, raw: R): void {
    if (this.records.has(entry.path)) {
      throw new ArchiveEntryError(ErrorCode.INVALID_ENTRY_PATH, `Duplicate entry "${entry.path}"`);
    }
    this.records.set(entry.path, { entry, raw });
  }

  seal(): void {
    this.sorted = Array.from(this.records.values(), (record) => record.entry).sort((a, b) => utf8ByteCompare(a.path, b.path));
  }

  entries(): readonly ArchiveEntry[] {
    return this.sorted;
  }

  get(path: string): EntryRecord<R> {
    const record = this.records.get(path);
    if (!record) {
      throw new ArchiveEntryError(ErrorCode.ENTRY_NOT_FOUND, `Entry not found: "${path}"`);
    }
    return record;
  }
}

export function dominantCompression(entries: readonly ArchiveEntry[]): CompressionAlgorithm {
  const counts = new Map<CompressionAlgorithm, number>();
  for (const entry of entries) {
    counts.set(entry.compression, (counts.get(entry.compression) ?? 0) + 1);
  }
  let best = CompressionAlgorithm.NONE;
  let bestCount = 0;
  let tied = false;
  for (const [algorithm, count] of counts) {
    if (count > bestCount) {
      best = algorithm;
      bestCount = count;
      tied = false;
    } else if (count === bestCount) {
      tied = true;
    }
  }
  return tied ? CompressionAlgorithm.NONE : best;
}

export function buildMetadata(
  entries: readonly ArchiveEntry[],
  archive: { compression: CompressionAlgorithm; signature: ArchiveSignature; metadata: string | null; archiveSize: number }
): ArchiveMetadata {
  return {
    compression: archive.compression,
    filesCompression: dominantCompression(entries),
    signature: archive.signature,
    metadata: archive.metadata,
    entryCount: entries.length,
    totalUncompressedSize: entries.reduce((sum, entry) => sum + entry.size, 0),
    archiveSize: archive.archiveSize
  };
}
