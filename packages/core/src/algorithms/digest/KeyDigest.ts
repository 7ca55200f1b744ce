import type { HashPrimitive, IntegrityDigest } from '../../types/index.js';
import { KEY_HASH_LENGTH } from '../../container/codec.js';

/**
 * Key-verification hash: one pass of the active hash over the derived key.
 * Lets the decrypt path reject a wrong password before the ciphertext is touched.
 */
export class KeyDigest implements IntegrityDigest {
  constructor(private readonly hash: HashPrimitive) {
    if (hash.outputLength !== KEY_HASH_LENGTH) {
      throw new TypeError(`${hash.name} yields ${hash.outputLength} bytes, container needs ${KEY_HASH_LENGTH}`);
    }
  }

  digest(key: Uint8Array): Promise<Uint8Array> {
    return this.hash.digest(key);
  }
}
