import type { CryptoProvider } from '../../providers/CryptoProvider.js';
import type { HashPrimitive } from '../../types/index.js';

/**
 * SHA-256 backed by the platform's WebCrypto implementation.
 *
 * PBKDF2 runs natively (`deriveBits`), which on Node means it is executed on
 * the libuv thread pool and does not block the event loop.
 */
export class WebCryptoSha256 implements HashPrimitive {
  readonly name = 'sha256';
  readonly outputLength = 32;

  constructor(private readonly p: CryptoProvider) {}

  async digest(data: Uint8Array): Promise<Uint8Array> {
    return new Uint8Array(await this.p.subtle.digest('SHA-256', data));
  }

  async pbkdf2(
    password: Uint8Array,
    salt: Uint8Array,
    iterations: number,
    keyLength: number,
  ): Promise<Uint8Array> {
    const base = await this.p.subtle.importKey('raw', password, 'PBKDF2', false, ['deriveBits']);
    const bits = await this.p.subtle.deriveBits(
      { name: 'PBKDF2', hash: 'SHA-256', salt, iterations },
      base,
      keyLength * 8,
    );
    return new Uint8Array(bits);
  }
}
