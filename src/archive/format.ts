import { ArchiveFormat } from './types.js';

export const HALT_COMPILER_TOKEN = '__HALT_COMPILER();';

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const ZIP_EMPTY_MAGIC = Buffer.from([0x50, 0x4b, 0x05, 0x06]);
const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);
const BZIP2_MAGIC = Buffer.from('BZh', 'latin1');

export type SniffResult = ArchiveFormat | 'gzip' | 'bzip2' | undefined;

export function sniffArchiveFormat(data: Buffer): SniffResult {
  if (startsWith(data, GZIP_MAGIC)) return 'gzip';
  if (startsWith(data, BZIP2_MAGIC)) return 'bzip2';
  if (startsWith(data, ZIP_MAGIC) || startsWith(data, ZIP_EMPTY_MAGIC)) return ArchiveFormat.ZIP;
  if (data.indexOf(HALT_COMPILER_TOKEN, 0, 'latin1') !== -1) return ArchiveFormat.PHAR;
  return undefined;
}

function startsWith(data: Buffer, magic: Buffer): boolean {
  return data.length >= magic.length && data.subarray(0, magic.length).equals(magic);
}
