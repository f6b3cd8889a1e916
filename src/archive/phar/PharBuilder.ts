import { createHash } from 'node:crypto';
import { deflateRawSync, gzipSync } from 'node:zlib';
import type { AddFileOptions, ArchiveBuilder, HashSignatureAlgorithm } from '../types.js';
import { HALT_COMPILER_TOKEN } from '../format.js';
import { normalizeEntryPath } from '../normalize.js';
import { API_VERSION, ENTRY_FLAG_GZ, ENTRY_PERMISSIONS_MASK, MANIFEST_FLAG_SIGNATURE } from './manifest.js';
import { SIGNATURE_MAGIC, SIGNATURES } from './signature.js';
import { PharsmithError } from '../../errors.js';
import { CompressionAlgorithm, ErrorCode, SignatureAlgorithm } from '../../types/enums.js';
import { crc32 } from '../../utils/crc32.js';
import { toUnixTimestamp } from '../../utils/time.js';

export const DEFAULT_STUB = `<?php ${HALT_COMPILER_TOKEN} ?>\r\n`;

interface PendingFile {
  path: string;
  contents: Buffer;
  timestamp: number;
  permissions: number;
}

export class PharBuilder implements ArchiveBuilder {
  private readonly files = new Map<string, PendingFile>();
  private stub = DEFAULT_STUB;
  private alias = '';
  private metadata: string | null = null;
  private filesCompression = CompressionAlgorithm.NONE;
  private archiveCompression = CompressionAlgorithm.NONE;
  private signatureAlgorithm: SignatureAlgorithm = SignatureAlgorithm.SHA1;

  constructor(private readonly defaultTimestamp: Date = new Date()) {}

  get count(): number {
    return this.files.size;
  }

  get size(): number {
    let total = 0;
    for (const file of this.files.values()) total += file.contents.length;
    return total;
  }

  addFile(path: string, contents: Buffer | string, options: AddFileOptions = {}): void {
    const normalized = normalizeEntryPath(path);
    this.files.set(normalized, {
      path: normalized,
      contents: typeof contents === 'string' ? Buffer.from(contents, 'utf8') : contents,
      timestamp: toUnixTimestamp(options.timestamp ?? this.defaultTimestamp),
      permissions: (options.permissions ?? 0o644) & ENTRY_PERMISSIONS_MASK
    });
  }

  setStub(stub: string): void {
    const index = stub.indexOf(HALT_COMPILER_TOKEN);
    if (index === -1) {
      throw new PharsmithError(ErrorCode.INVALID_OPERATION, `The stub must contain "${HALT_COMPILER_TOKEN}"`);
    }
    this.stub = `${stub.slice(0, index + HALT_COMPILER_TOKEN.length)} ?>\r\n`;
  }

  setAlias(alias: string): void {
    this.alias = alias;
  }

  setMetadata(metadata: string | null): void {
    this.metadata = metadata === '' ? null : metadata;
  }

  compressFiles(algorithm: CompressionAlgorithm): void {
    assertWritableCompression(algorithm);
    this.filesCompression = algorithm;
  }

  compressArchive(algorithm: CompressionAlgorithm): void {
    assertWritableCompression(algorithm);
    this.archiveCompression = algorithm;
  }

  setSignatureAlgorithm(algorithm: SignatureAlgorithm): void {
    if (algorithm === SignatureAlgorithm.OPENSSL) {
      throw new PharsmithError(ErrorCode.INVALID_OPERATION, 'OpenSSL signatures require a private key and are not supported');
    }
    this.signatureAlgorithm = algorithm;
  }

  build(): Buffer {
    const records: Buffer[] = [];
    const contents: Buffer[] = [];
    for (const file of this.files.values()) {
      const compressed = this.filesCompression === CompressionAlgorithm.GZ;
      const stored = compressed ? deflateRawSync(file.contents) : file.contents;
      const name = Buffer.from(file.path, 'utf8');
      records.push(
        uint32(name.length),
        name,
        uint32(file.contents.length),
        uint32(file.timestamp),
        uint32(stored.length),
        uint32(crc32(file.contents)),
        uint32(file.permissions | (compressed ? ENTRY_FLAG_GZ : 0)),
        uint32(0)
      );
      contents.push(stored);
    }

    const algorithm = this.signatureAlgorithm;
    const signed = algorithm !== SignatureAlgorithm.NONE;
    const alias = Buffer.from(this.alias, 'utf8');
    const metadata = Buffer.from(this.metadata ?? '', 'utf8');
    const manifest = Buffer.concat([
      uint32(this.files.size),
      Buffer.from(API_VERSION),
      uint32(signed ? MANIFEST_FLAG_SIGNATURE : 0),
      uint32(alias.length),
      alias,
      uint32(metadata.length),
      metadata,
      ...records
    ]);

    let archive: Buffer = Buffer.concat([Buffer.from(this.stub, 'utf8'), uint32(manifest.length), manifest, ...contents]);
    if (algorithm !== SignatureAlgorithm.NONE) {
      archive = sign(archive, algorithm);
    }
    return this.archiveCompression === CompressionAlgorithm.GZ ? gzipSync(archive) : archive;
  }
}

function sign(archive: Buffer, algorithm: HashSignatureAlgorithm): Buffer {
  const spec = SIGNATURES[algorithm];
  if (!spec.digest) {
    throw new PharsmithError(ErrorCode.INVALID_OPERATION, `Cannot sign with ${algorithm}`);
  }
  const digest = createHash(spec.digest).update(archive).digest();
  return Buffer.concat([archive, digest, uint32(spec.flag), Buffer.from(SIGNATURE_MAGIC, 'latin1')]);
}

function assertWritableCompression(algorithm: CompressionAlgorithm): void {
  if (algorithm === CompressionAlgorithm.BZ2) {
    throw new PharsmithError(ErrorCode.UNSUPPORTED_COMPRESSION, 'BZ2 compression is not supported');
  }
}

function uint32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value >>> 0);
  return buffer;
}
