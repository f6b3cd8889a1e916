import { inflateRawSync } from 'node:zlib';
import type { ArchiveEntry, ArchiveHandle, ArchiveReader, ArchiveSignature, ArchiveSource } from '../types.js';
import { ArchiveFormat } from '../types.js';
import { ENTRY_FLAG_BZ2, ENTRY_FLAG_GZ, MANIFEST_FLAG_SIGNATURE, ManifestError, parseManifest, type PharManifestEntry } from './manifest.js';
import { SIGNATURE_MAGIC, SIGNATURES, signatureAlgorithmFromFlag } from './signature.js';
import { normalizeEntryPath } from '../normalize.js';
import { buildMetadata, EntryTable } from '../entries.js';
import { ArchiveEntryError, InvalidArchive } from '../../errors.js';
import { CompressionAlgorithm, ErrorCode, SignatureAlgorithm } from '../../types/enums.js';
import { crc32 } from '../../utils/crc32.js';
import { digestHex } from '../../utils/crypto.js';
import { fromUnixTimestamp } from '../../utils/time.js';

interface SignatureTrailer {
  signature: ArchiveSignature;
  signedEnd: number;
}

export class PharArchiveReader implements ArchiveReader {
  supports(format: ArchiveFormat): boolean {
    return format === ArchiveFormat.PHAR;
  }

  async open(source: ArchiveSource): Promise<ArchiveHandle> {
    const buffer = source.buffer;
    const manifest = parseManifest(buffer);
    const trailer = readSignature(buffer, (manifest.flags & MANIFEST_FLAG_SIGNATURE) !== 0);
    if (manifest.dataEnd > trailer.signedEnd) {
      throw new ManifestError('entry contents overlap the signature');
    }

    const table = new EntryTable<PharManifestEntry>();
    for (const raw of manifest.entries) {
      if (raw.name.endsWith('/')) continue;
      table.add(
        {
          path: normalizeEntryPath(raw.name),
          size: raw.size,
          compressedSize: raw.compressedSize,
          compression: entryCompression(raw.flags),
          timestamp: fromUnixTimestamp(raw.timestamp),
          crc32: raw.crc32
        },
        raw
      );
    }
    table.seal();

    const metadata = buildMetadata(table.entries(), {
      compression: source.compression,
      signature: trailer.signature,
      metadata: manifest.metadata,
      archiveSize: source.fileSize
    });

    let data: Buffer | undefined = buffer;
    const contents = (): Buffer => {
      if (!data) throw new ArchiveEntryError(ErrorCode.INVALID_OPERATION, 'Archive handle is closed');
      return data;
    };

    return {
      path: source.path,
      format: ArchiveFormat.PHAR,
      metadata: () => metadata,
      listEntries: () => table.entries(),
      statEntry: (entryPath: string) => table.get(entryPath).entry,
      readEntry: async (entryPath: string) => {
        const { entry, raw } = table.get(entryPath);
        try {
          return decodeEntry(contents(), entry, raw);
        } catch (err) {
          throw InvalidArchive.wrap(source.path, err);
        }
      },
      close: () => {
        data = undefined;
      }
    };
  }
}

function entryCompression(flags: number): CompressionAlgorithm {
  if ((flags & ENTRY_FLAG_GZ) !== 0) return CompressionAlgorithm.GZ;
  if ((flags & ENTRY_FLAG_BZ2) !== 0) return CompressionAlgorithm.BZ2;
  return CompressionAlgorithm.NONE;
}

function readSignature(data: Buffer, signed: boolean): SignatureTrailer {
  if (!signed) {
    return { signature: { algorithm: SignatureAlgorithm.NONE }, signedEnd: data.length };
  }
  const end = data.length;
  if (end < 8 || data.toString('latin1', end - 4, end) !== SIGNATURE_MAGIC) {
    throw new ManifestError('missing the signature trailer');
  }
  const flag = data.readUInt32LE(end - 8);
  const algorithm = signatureAlgorithmFromFlag(flag);
  if (!algorithm) {
    throw new ManifestError(`unknown signature type 0x${flag.toString(16)}`);
  }

  const spec = SIGNATURES[algorithm];
  let signatureStart: number;
  let signatureEnd: number;
  if (spec.length === undefined) {
    if (end < 12) throw new ManifestError('truncated signature');
    signatureEnd = end - 12;
    signatureStart = signatureEnd - data.readUInt32LE(end - 12);
  } else {
    signatureEnd = end - 8;
    signatureStart = signatureEnd - spec.length;
  }
  if (signatureStart < 0) {
    throw new ManifestError('truncated signature');
  }

  const hash = data.toString('hex', signatureStart, signatureEnd).toUpperCase();
  if (spec.digest) {
    const actual = digestHex(spec.digest, data.subarray(0, signatureStart));
    if (actual !== hash) {
      throw new ManifestError(`the ${algorithm} signature does not match the archive contents`);
    }
  }
  return { signature: { algorithm, hash }, signedEnd: signatureStart };
}

function decodeEntry(data: Buffer, entry: ArchiveEntry, raw: PharManifestEntry): Buffer {
  const contents = decompress(data.subarray(raw.offset, raw.offset + raw.compressedSize), entry);
  if (contents.length !== entry.size || crc32(contents) !== raw.crc32) {
    throw new ArchiveEntryError(ErrorCode.INVALID_ARCHIVE, `CRC32 check failed for the entry "${entry.path}"`);
  }
  return contents;
}

function decompress(stored: Buffer, entry: ArchiveEntry): Buffer {
  switch (entry.compression) {
    case CompressionAlgorithm.NONE:
      return Buffer.from(stored);
    case CompressionAlgorithm.GZ:
      return inflateRawSync(stored);
    case CompressionAlgorithm.BZ2:
      throw new ArchiveEntryError(ErrorCode.UNSUPPORTED_COMPRESSION, `Cannot decompress "${entry.path}": BZ2 is not supported`);
  }
}
