import type { CryptoProvider } from '../../../providers/CryptoProvider.js';
import { BaseAEAD } from '../base/BaseAEAD.js';

/**
 * AES-256-GCM through WebCrypto.
 *
 * The raw key is imported as a non-extractable {@link CryptoKey} for each call
 * and dropped afterwards; nothing is cached on the instance.
 *
 * @remarks
 * Output is `ciphertext || tag(16)`, which is exactly what WebCrypto returns
 * for a 128-bit `tagLength`.
 */
export class AESGCM extends BaseAEAD {
  public readonly name = 'aes-256-gcm';

  constructor(private readonly p: CryptoProvider, maxPlaintextBytes?: number) {
    super(maxPlaintextBytes);
  }

  protected async encryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, plain: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array> {
    const k = await this.p.subtle.importKey('raw', key, { name: 'AES-GCM' }, false, ['encrypt']);
    const out = await this.p.subtle.encrypt(
      { name: 'AES-GCM', iv: nonce, additionalData: aad, tagLength: this.TAG_LENGTH * 8 },
      k,
      plain,
    );
    return new Uint8Array(out);
  }

  protected async decryptWithAAD(
    key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array, aad: Uint8Array,
  ): Promise<Uint8Array> {
    const k = await this.p.subtle.importKey('raw', key, { name: 'AES-GCM' }, false, ['decrypt']);
    const out = await this.p.subtle.decrypt(
      { name: 'AES-GCM', iv: nonce, additionalData: aad, tagLength: this.TAG_LENGTH * 8 },
      k,
      sealed,
    );
    return new Uint8Array(out);
  }
}
