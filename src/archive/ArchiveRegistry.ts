import fs from 'node:fs';
import path from 'node:path';
import { gunzipSync } from 'node:zlib';
import type { ArchiveFormat, ArchiveHandle, ArchiveReader } from './types.js';
import { sniffArchiveFormat } from './format.js';
import { FileNotFound, InvalidArchive } from '../errors.js';
import { CompressionAlgorithm } from '../types/enums.js';
import { PharArchiveReader } from './phar/PharArchiveReader.js';
import { ZipArchiveReader } from './zip/ZipArchiveReader.js';

export class ArchiveRegistry {
  private readonly readers: ArchiveReader[];

  constructor(readers: ArchiveReader[]) {
    this.readers = readers;
  }

  getReader(format: ArchiveFormat): ArchiveReader | undefined {
    return this.readers.find((reader) => reader.supports(format));
  }

  async open(filePath: string): Promise<ArchiveHandle> {
    assertFileExists(filePath);
    const resolved = path.resolve(filePath);
    const raw = fs.readFileSync(resolved);

    let buffer: Buffer = raw;
    let compression = CompressionAlgorithm.NONE;
    let format = sniffArchiveFormat(raw);
    if (format === 'gzip') {
      try {
        buffer = gunzipSync(raw);
      } catch (err) {
        throw InvalidArchive.wrap(resolved, err);
      }
      compression = CompressionAlgorithm.GZ;
      format = sniffArchiveFormat(buffer);
    }
    if (format === 'bzip2') {
      throw new InvalidArchive(resolved, 'bzip2-compressed archives are not supported');
    }
    if (format === undefined || format === 'gzip') {
      throw new InvalidArchive(resolved, 'unrecognized archive format');
    }

    const reader = this.getReader(format);
    if (!reader) {
      throw new InvalidArchive(resolved, `unsupported archive format "${format}"`);
    }
    try {
      return await reader.open({ path: resolved, buffer, fileSize: raw.length, compression });
    } catch (err) {
      throw InvalidArchive.wrap(resolved, err);
    }
  }
}

/** `displayPath` is the path the error message cites, as the user typed it. */
export function assertFileExists(filePath: string, displayPath: string = filePath): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new FileNotFound(displayPath);
    }
    throw err;
  }
  if (!stat.isFile()) {
    throw new FileNotFound(displayPath);
  }
}

export function createArchiveRegistry(): ArchiveRegistry {
  return new ArchiveRegistry([new PharArchiveReader(), new ZipArchiveReader()]);
}
