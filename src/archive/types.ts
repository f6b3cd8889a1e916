import type { CompressionAlgorithm, SignatureAlgorithm } from '../types/enums.js';

export enum ArchiveFormat {
  PHAR = 'phar',
  ZIP = 'zip'
}

export type HashSignatureAlgorithm = Exclude<SignatureAlgorithm, SignatureAlgorithm.NONE>;

export type ArchiveSignature =
  | { algorithm: SignatureAlgorithm.NONE }
  | { algorithm: HashSignatureAlgorithm; hash: string };

export interface ArchiveMetadata {
  compression: CompressionAlgorithm;
  filesCompression: CompressionAlgorithm;
  signature: ArchiveSignature;
  metadata: string | null;
  entryCount: number;
  totalUncompressedSize: number;
  archiveSize: number;
}

export interface ArchiveEntry {
  path: string;
  size: number;
  compressedSize: number;
  compression: CompressionAlgorithm;
  timestamp: Date;
  crc32?: number;
}

export interface ArchiveSource {
  path: string;
  buffer: Buffer;
  fileSize: number;
  compression: CompressionAlgorithm;
}

export interface ArchiveHandle {
  readonly path: string;
  readonly format: ArchiveFormat;
  metadata(): ArchiveMetadata;
  listEntries(): readonly ArchiveEntry[];
  statEntry(path: string): ArchiveEntry;
  readEntry(path: string): Promise<Buffer>;
  close(): void;
}

export interface ArchiveReader {
  supports(format: ArchiveFormat): boolean;
  open(source: ArchiveSource): Promise<ArchiveHandle>;
}

export interface AddFileOptions {
  timestamp?: Date;
  permissions?: number;
}

/** Narrow surface the build pipeline drives to produce an archive. */
export interface ArchiveBuilder {
  readonly count: number;
  /** Total uncompressed size of the added files. */
  readonly size: number;
  addFile(path: string, contents: Buffer | string, options?: AddFileOptions): void;
  setStub(stub: string): void;
  setAlias(alias: string): void;
  setMetadata(metadata: string | null): void;
  compressFiles(algorithm: CompressionAlgorithm): void;
  compressArchive(algorithm: CompressionAlgorithm): void;
  setSignatureAlgorithm(algorithm: SignatureAlgorithm): void;
  build(): Buffer;
}
