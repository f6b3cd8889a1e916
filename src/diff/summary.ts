import path from 'node:path';
import type { ArchiveEntry, ArchiveMetadata } from '../archive/types.js';
import { SignatureAlgorithm } from '../types/enums.js';
import { formatFileCount, formatSize } from '../utils/size.js';

const ARCHIVE_LINE_PREFIX = 'Archive: ';

export function renderArchiveSummary(metadata: ArchiveMetadata, fileName: string): string[] {
  const lines = [
    `${ARCHIVE_LINE_PREFIX}${path.basename(fileName)}`,
    `Archive Compression: ${metadata.compression}`,
    `Files Compression: ${metadata.filesCompression}`,
    `Signature: ${metadata.signature.algorithm}`
  ];
  if (metadata.signature.algorithm !== SignatureAlgorithm.NONE) {
    lines.push(`Signature Hash: ${metadata.signature.hash}`);
  }
  lines.push(
    `Metadata: ${metadata.metadata ?? 'None'}`,
    `Contents: ${formatFileCount(metadata.entryCount)} (${formatSize(metadata.archiveSize)})`
  );
  return lines;
}

/** Summary lines that do not depend on the archive file name. */
export function summaryBody(lines: readonly string[]): string[] {
  return lines.filter((line) => !line.startsWith(ARCHIVE_LINE_PREFIX));
}

/** `<path> [<COMPRESSION>] - <size>` */
export function describeEntry(entry: ArchiveEntry): string {
  return `${entry.path} [${entry.compression.toUpperCase()}] - ${formatSize(entry.size)}`;
}
