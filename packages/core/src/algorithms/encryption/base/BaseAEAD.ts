// packages/core/src/algorithms/encryption/base/BaseAEAD.ts
import { PlaintextTooLargeError, TamperedError } from '../../../errors/index.js';
import { KEY_LENGTH, MAX_PLAINTEXT_BYTES, TAG_LENGTH } from '../../../config/defaults.js';
import { NONCE_LENGTH } from '../../../container/codec.js';
import type { AuthenticatedCipher, CipherName } from '../../../types/index.js';

/**
 * ## BaseAEAD
 *
 * Shared front half of every AEAD in the closed cipher set (AES-256-GCM,
 * ChaCha20-Poly1305). Both take a 256-bit key and a 96-bit nonce and append a
 * 128-bit tag, so the checks live here and subclasses only do the cipher work.
 *
 * ### Framing
 * Output of {@link encrypt} is `ciphertext || tag(16)`. The nonce is **not**
 * prepended: it travels in the container header.
 *
 * ### Failure mapping
 * - plaintext over {@link maxPlaintextBytes} → {@link PlaintextTooLargeError},
 *   raised before any encryption happens;
 * - any failure inside {@link decryptWithAAD} → {@link TamperedError};
 * - wrong key or nonce width → `TypeError` (a caller bug, not a runtime condition).
 */
export abstract class BaseAEAD implements AuthenticatedCipher {
  public abstract readonly name: CipherName;

  public readonly KEY_LENGTH   = KEY_LENGTH;
  public readonly NONCE_LENGTH = NONCE_LENGTH;
  public readonly TAG_LENGTH   = TAG_LENGTH;

  /**
   * @param maxPlaintextBytes - Largest plaintext accepted under one key/nonce pair.
   */
  constructor(public readonly maxPlaintextBytes: number = MAX_PLAINTEXT_BYTES) {}

  public assertPlaintextSize(byteLength: number): void {
    if (byteLength > this.maxPlaintextBytes) {
      throw new PlaintextTooLargeError(
        `Plaintext of ${byteLength} bytes exceeds the ${this.maxPlaintextBytes}-byte limit for ${this.name}`,
      );
    }
  }

  public async encrypt(
    key: Uint8Array,
    nonce: Uint8Array,
    plain: Uint8Array,
    aad: Uint8Array,
  ): Promise<Uint8Array> {
    this.checkKeyAndNonce(key, nonce);
    this.assertPlaintextSize(plain.byteLength);
    return this.encryptWithAAD(key, nonce, plain, aad);
  }

  public async decrypt(
    key: Uint8Array,
    nonce: Uint8Array,
    sealed: Uint8Array,
    aad: Uint8Array,
  ): Promise<Uint8Array> {
    this.checkKeyAndNonce(key, nonce);
    if (sealed.byteLength < this.TAG_LENGTH) {
      throw new TamperedError('Ciphertext shorter than its authentication tag');
    }
    try {
      return await this.decryptWithAAD(key, nonce, sealed, aad);
    } catch {
      throw new TamperedError('Authentication failed: ciphertext or filename was modified');
    }
  }

  // ---------------- abstract hooks for subclasses ----------------

  protected abstract encryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, plain: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array>;

  protected abstract decryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array>;

  // ---------------- internals ----------------

  private checkKeyAndNonce(key: Uint8Array, nonce: Uint8Array): void {
    if (key.byteLength !== this.KEY_LENGTH) {
      throw new TypeError(`${this.name} key must be ${this.KEY_LENGTH} bytes, got ${key.byteLength}`);
    }
    if (nonce.byteLength !== this.NONCE_LENGTH) {
      throw new TypeError(`${this.name} nonce must be ${this.NONCE_LENGTH} bytes, got ${nonce.byteLength}`);
    }
  }
}
