import { HALT_COMPILER_TOKEN } from '../format.js';

export const MANIFEST_FLAG_SIGNATURE = 0x00010000;
export const ENTRY_FLAG_GZ = 0x00001000;
export const ENTRY_FLAG_BZ2 = 0x00002000;
export const ENTRY_PERMISSIONS_MASK = 0x000001ff;
export const API_VERSION = [0x11, 0x10] as const;

export interface PharManifestEntry {
  name: string;
  size: number;
  timestamp: number;
  compressedSize: number;
  crc32: number;
  flags: number;
  metadata: string | null;
  /** Absolute offset of the entry contents in the archive buffer. */
  offset: number;
}

export interface PharManifest {
  stubLength: number;
  apiVersion: string;
  flags: number;
  alias: string;
  metadata: string | null;
  entries: PharManifestEntry[];
  /** Offset right after the last entry contents. */
  dataEnd: number;
}

export class ManifestError extends Error {}

class Cursor {
  constructor(private readonly data: Buffer, public offset: number, private readonly end: number) {}

  uint32(label: string): number {
    this.ensure(4, label);
    const value = this.data.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  bytes(length: number, label: string): Buffer {
    this.ensure(length, label);
    const value = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  private ensure(length: number, label: string): void {
    if (this.offset + length > this.end) {
      throw new ManifestError(`truncated manifest while reading the ${label}`);
    }
  }
}

/** Offset of the first manifest byte, right after `__HALT_COMPILER();` and its optional ` ?>` and newline. */
export function findStubEnd(data: Buffer): number {
  const token = data.indexOf(HALT_COMPILER_TOKEN, 0, 'latin1');
  if (token === -1) {
    throw new ManifestError(`missing the ${HALT_COMPILER_TOKEN} token`);
  }
  let offset = token + HALT_COMPILER_TOKEN.length;
  const isSpace = data[offset] === 0x20 || data[offset] === 0x0a;
  if (isSpace && data[offset + 1] === 0x3f && data[offset + 2] === 0x3e) {
    offset += 3;
    if (data[offset] === 0x0d) {
      if (data[offset + 1] !== 0x0a) {
        throw new ManifestError('malformed stub ending: "\\r" must be followed by "\\n"');
      }
      offset += 2;
    } else if (data[offset] === 0x0a) {
      offset += 1;
    }
  }
  return offset;
}

export function parseManifest(data: Buffer, end: number = data.length): PharManifest {
  const stubLength = findStubEnd(data);
  const header = new Cursor(data, stubLength, end);
  const manifestLength = header.uint32('manifest length');
  const manifestEnd = header.offset + manifestLength;
  if (manifestEnd > end) {
    throw new ManifestError('manifest length exceeds the archive size');
  }

  const cursor = new Cursor(data, header.offset, manifestEnd);
  const fileCount = cursor.uint32('file count');
  const version = cursor.bytes(2, 'API version');
  const apiVersion = `${version[0] >> 4}.${version[0] & 0x0f}.${version[1] >> 4}`;
  const flags = cursor.uint32('global flags');
  const alias = cursor.bytes(cursor.uint32('alias length'), 'alias').toString('utf8');
  const metadata = readMetadata(cursor);

  const entries: PharManifestEntry[] = [];
  let offset = manifestEnd;
  for (let i = 0; i < fileCount; i += 1) {
    const name = cursor.bytes(cursor.uint32('entry name length'), 'entry name').toString('utf8');
    const size = cursor.uint32('entry size');
    const timestamp = cursor.uint32('entry timestamp');
    const compressedSize = cursor.uint32('entry compressed size');
    const crc32 = cursor.uint32('entry CRC32');
    const entryFlags = cursor.uint32('entry flags');
    const entryMetadata = readMetadata(cursor);
    entries.push({ name, size, timestamp, compressedSize, crc32, flags: entryFlags, metadata: entryMetadata, offset });
    offset += compressedSize;
  }
  if (offset > end) {
    throw new ManifestError('entry contents exceed the archive size');
  }

  return { stubLength, apiVersion, flags, alias, metadata, entries, dataEnd: offset };
}

function readMetadata(cursor: Cursor): string | null {
  const length = cursor.uint32('metadata length');
  if (length === 0) return null;
  return cursor.bytes(length, 'metadata').toString('utf8');
}
