import type { CryptoProvider } from '../providers/CryptoProvider.js';
import type { CipherSuite } from '../types/index.js';
import { NONCE_LENGTH, SALT_LENGTH } from '../container/codec.js';

export interface ContextSeed {
  salt?  : Uint8Array;
  nonce? : Uint8Array;
}

/**
 * One encryption or decryption session.
 *
 * Encrypt builds it fresh (random salt and nonce every time); decrypt rebuilds
 * it from the salt and nonce stored in the container. Call {@link dispose}
 * once done so the derived key does not outlive the file it protected.
 */
export class CryptoContext {
  private key: Uint8Array | null;

  private constructor(
    readonly salt: Uint8Array,
    readonly nonce: Uint8Array,
    derivedKey: Uint8Array,
    readonly keyVerificationHash: Uint8Array,
  ) {
    this.key = derivedKey;
  }

  static async create(
    suite: CipherSuite,
    provider: CryptoProvider,
    password: Uint8Array,
    seed: ContextSeed = {},
  ): Promise<CryptoContext> {
    const salt  = seed.salt  ?? provider.getRandomValues(new Uint8Array(SALT_LENGTH));
    const nonce = seed.nonce ?? provider.getRandomValues(new Uint8Array(NONCE_LENGTH));
    if (nonce.byteLength !== NONCE_LENGTH) {
      throw new TypeError(`Nonce must be ${NONCE_LENGTH} bytes, got ${nonce.byteLength}`);
    }

    const derivedKey = await suite.kdf.derive(password, salt);
    const keyHash    = await suite.digest.digest(derivedKey);
    return new CryptoContext(salt, nonce, derivedKey, keyHash);
  }

  get derivedKey(): Uint8Array {
    if (!this.key) throw new Error('Crypto context already disposed');
    return this.key;
  }

  get disposed(): boolean { return this.key === null; }

  dispose(): void {
    this.key?.fill(0);
    this.key = null;
  }
}
