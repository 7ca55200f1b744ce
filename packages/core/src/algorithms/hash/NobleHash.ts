import { pbkdf2Async } from '@noble/hashes/pbkdf2.js';
import type { CHash } from '@noble/hashes/utils.js';
import type { HashName, HashPrimitive } from '../../types/index.js';

/**
 * Hash primitives WebCrypto does not offer, computed in JS by `@noble/hashes`.
 * `pbkdf2Async` yields to the event loop between rounds.
 */
export class NobleHash implements HashPrimitive {
  readonly outputLength: number;

  constructor(
    readonly name: Exclude<HashName, 'sha256'>,
    private readonly hash: CHash,
  ) {
    this.outputLength = hash.outputLen;
  }

  async digest(data: Uint8Array): Promise<Uint8Array> {
    return this.hash(data);
  }

  async pbkdf2(
    password: Uint8Array,
    salt: Uint8Array,
    iterations: number,
    keyLength: number,
  ): Promise<Uint8Array> {
    return pbkdf2Async(this.hash, password, salt, { c: iterations, dkLen: keyLength });
  }
}
