import yauzl from 'yauzl';
import type { ArchiveHandle, ArchiveReader, ArchiveSignature, ArchiveSource } from '../types.js';
import { ArchiveFormat } from '../types.js';
import { normalizeEntryPath } from '../normalize.js';
import { buildMetadata, EntryTable } from '../entries.js';
import { signatureAlgorithmFromFlag } from '../phar/signature.js';
import { InvalidArchive } from '../../errors.js';
import { CompressionAlgorithm, SignatureAlgorithm } from '../../types/enums.js';
import { readStreamToBuffer } from '../../utils/streams.js';

const INTERNAL_DIR = '.phar/';
const SIGNATURE_ENTRY = '.phar/signature.bin';

export class ZipArchiveReader implements ArchiveReader {
  supports(format: ArchiveFormat): boolean {
    return format === ArchiveFormat.ZIP;
  }

  async open(source: ArchiveSource): Promise<ArchiveHandle> {
    const zipFile = await this.openZip(source.buffer);
    try {
      const { table, signatureEntry } = await this.collectEntries(zipFile);
      const signature = signatureEntry ? parseSignatureEntry(await readZipEntry(zipFile, signatureEntry)) : NO_SIGNATURE;
      const metadata = buildMetadata(table.entries(), {
        compression: source.compression,
        signature,
        metadata: null,
        archiveSize: source.fileSize
      });

      return {
        path: source.path,
        format: ArchiveFormat.ZIP,
        metadata: () => metadata,
        listEntries: () => table.entries(),
        statEntry: (entryPath: string) => table.get(entryPath).entry,
        readEntry: async (entryPath: string) => {
          const { raw } = table.get(entryPath);
          try {
            return await readZipEntry(zipFile, raw);
          } catch (err) {
            throw InvalidArchive.wrap(source.path, err);
          }
        },
        close: () => {
          zipFile.close();
        }
      };
    } catch (err) {
      zipFile.close();
      throw err;
    }
  }

  private openZip(buffer: Buffer): Promise<yauzl.ZipFile> {
    return new Promise((resolve, reject) => {
      yauzl.fromBuffer(buffer, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
        if (err || !zipfile) {
          reject(err ?? new Error('Failed to open zip'));
          return;
        }
        resolve(zipfile);
      });
    });
  }

  private async collectEntries(zipFile: yauzl.ZipFile): Promise<{ table: EntryTable<yauzl.Entry>; signatureEntry?: yauzl.Entry }> {
    const table = new EntryTable<yauzl.Entry>();
    let signatureEntry: yauzl.Entry | undefined;

    await new Promise<void>((resolve, reject) => {
      zipFile.on('entry', (entry: yauzl.Entry) => {
        try {
          if (entry.fileName === SIGNATURE_ENTRY) {
            signatureEntry = entry;
          } else if (!entry.fileName.endsWith('/') && !entry.fileName.startsWith(INTERNAL_DIR)) {
            table.add(
              {
                path: normalizeEntryPath(entry.fileName),
                size: entry.uncompressedSize,
                compressedSize: entry.compressedSize,
                compression: zipCompression(entry.compressionMethod),
                timestamp: entry.getLastModDate(),
                crc32: entry.crc32
              },
              entry
            );
          }
          zipFile.readEntry();
        } catch (err) {
          reject(err);
        }
      });
      zipFile.on('end', () => resolve());
      zipFile.on('error', (err) => reject(err));
      zipFile.readEntry();
    });

    table.seal();
    return { table, signatureEntry };
  }
}

const NO_SIGNATURE: ArchiveSignature = { algorithm: SignatureAlgorithm.NONE };

function zipCompression(method: number): CompressionAlgorithm {
  if (method === 8) return CompressionAlgorithm.GZ;
  if (method === 12) return CompressionAlgorithm.BZ2;
  return CompressionAlgorithm.NONE;
}

function parseSignatureEntry(contents: Buffer): ArchiveSignature {
  if (contents.length < 8) {
    throw new Error('truncated .phar/signature.bin');
  }
  const algorithm = signatureAlgorithmFromFlag(contents.readUInt32LE(0));
  const length = contents.readUInt32LE(4);
  if (!algorithm || contents.length < 8 + length) {
    throw new Error('malformed .phar/signature.bin');
  }
  return { algorithm, hash: contents.toString('hex', 8, 8 + length).toUpperCase() };
}

function readZipEntry(zipFile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Buffer> {
  return new Promise<NodeJS.ReadableStream>((resolve, reject) => {
    zipFile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error('Failed to open entry stream'));
        return;
      }
      resolve(stream);
    });
  }).then(readStreamToBuffer);
}
