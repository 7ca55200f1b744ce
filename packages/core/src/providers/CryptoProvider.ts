import type { webcrypto } from 'node:crypto';

export interface CryptoProvider {
  subtle: webcrypto.SubtleCrypto;
  getRandomValues(buf: Uint8Array): Uint8Array;
}
