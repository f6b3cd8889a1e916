import fs from 'node:fs';
import path from 'node:path';
import type { ArchiveHandle, ArchiveMetadata } from './types.js';

export const METADATA_SIDECAR = '.phar_meta.json';

export interface ExtractOptions {
  /** Writes the archive metadata next to the extracted files. */
  metadataSidecar?: boolean;
}

export async function extractArchive(handle: ArchiveHandle, targetDir: string, options: ExtractOptions = {}): Promise<number> {
  fs.mkdirSync(targetDir, { recursive: true });
  const root = path.resolve(targetDir);
  let count = 0;
  for (const entry of handle.listEntries()) {
    const destination = path.resolve(root, ...entry.path.split('/'));
    if (!destination.startsWith(`${root}${path.sep}`)) {
      throw new Error(`Refusing to extract "${entry.path}" outside of "${root}"`);
    }
    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.writeFileSync(destination, await handle.readEntry(entry.path));
    fs.utimesSync(destination, entry.timestamp, entry.timestamp);
    count += 1;
  }
  if (options.metadataSidecar) {
    fs.writeFileSync(path.join(root, METADATA_SIDECAR), `${JSON.stringify(sidecarContents(handle.metadata()), null, 2)}\n`);
  }
  return count;
}

function sidecarContents(metadata: ArchiveMetadata): Record<string, unknown> {
  return {
    compression: metadata.compression,
    filesCompression: metadata.filesCompression,
    signature: metadata.signature,
    metadata: metadata.metadata,
    entryCount: metadata.entryCount
  };
}
