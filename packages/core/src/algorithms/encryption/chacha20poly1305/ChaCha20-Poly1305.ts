import { chacha20poly1305 } from '@noble/ciphers/chacha.js';
import { BaseAEAD } from '../base/BaseAEAD.js';

/**
 * ChaCha20-Poly1305 (RFC 8439, 96-bit nonce) via `@noble/ciphers`.
 *
 * ## Framing
 * - Output is `ciphertext || tag(16)`; `@noble/ciphers` appends the tag itself.
 * - A fresh cipher object is built per call, so a key/nonce pair is never
 *   held past the operation.
 */
export class ChaCha20Poly1305 extends BaseAEAD {
  public readonly name = 'chacha20-poly1305';

  protected async encryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, plain: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array> {
    return chacha20poly1305(key, nonce, aad).encrypt(plain);
  }

  /** @throws Error from `@noble/ciphers` on tag mismatch; the base maps it to TamperedError. */
  protected async decryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array> {
    return chacha20poly1305(key, nonce, aad).decrypt(sealed);
  }
}
