import { createHash } from 'node:crypto';

/** Upper-case hex digest, the form archive signatures are displayed in. */
export function digestHex(algorithm: string, data: Uint8Array): string {
  return createHash(algorithm).update(data).digest('hex').toUpperCase();
}
