import { SignatureAlgorithm } from '../../types/enums.js';
import type { HashSignatureAlgorithm } from '../types.js';

export const SIGNATURE_MAGIC = 'GBMB';

interface SignatureSpec {
  flag: number;
  /** Digest length in bytes; `undefined` for variable-length (OpenSSL) signatures. */
  length?: number;
  digest?: string;
}

export const SIGNATURES: Record<HashSignatureAlgorithm, SignatureSpec> = {
  [SignatureAlgorithm.MD5]: { flag: 0x1, length: 16, digest: 'md5' },
  [SignatureAlgorithm.SHA1]: { flag: 0x2, length: 20, digest: 'sha1' },
  [SignatureAlgorithm.SHA256]: { flag: 0x3, length: 32, digest: 'sha256' },
  [SignatureAlgorithm.SHA512]: { flag: 0x4, length: 64, digest: 'sha512' },
  [SignatureAlgorithm.OPENSSL]: { flag: 0x10 }
};

export function signatureAlgorithmFromFlag(flag: number): HashSignatureAlgorithm | undefined {
  for (const [algorithm, spec] of signatureEntries()) {
    if (spec.flag === flag) return algorithm;
  }
  return undefined;
}

function signatureEntries(): [HashSignatureAlgorithm, SignatureSpec][] {
  return [
    [SignatureAlgorithm.MD5, SIGNATURES[SignatureAlgorithm.MD5]],
    [SignatureAlgorithm.SHA1, SIGNATURES[SignatureAlgorithm.SHA1]],
    [SignatureAlgorithm.SHA256, SIGNATURES[SignatureAlgorithm.SHA256]],
    [SignatureAlgorithm.SHA512, SIGNATURES[SignatureAlgorithm.SHA512]],
    [SignatureAlgorithm.OPENSSL, SIGNATURES[SignatureAlgorithm.OPENSSL]]
  ];
}
