// packages/core/src/algorithms/kdf/Pbkdf2.ts
import type { HashPrimitive, KeyDerivation } from '../../types/index.js';
import { KeyDerivationError } from '../../errors/index.js';
import { KEY_LENGTH } from '../../config/defaults.js';
import { SALT_LENGTH } from '../../container/codec.js';

/**
 * PBKDF2-HMAC key derivation over the suite's hash primitive.
 * Same password and salt always give the same 32-byte key.
 */
export class Pbkdf2KDF implements KeyDerivation {
  readonly name: string;

  constructor(
    private readonly hash: HashPrimitive,
    readonly iterations: number,
  ) {
    this.name = `pbkdf2-${hash.name}`;
  }

  async derive(password: Uint8Array, salt: Uint8Array): Promise<Uint8Array> {
    if (salt.byteLength !== SALT_LENGTH) {
      throw new TypeError(`Salt must be ${SALT_LENGTH} bytes, got ${salt.byteLength}`);
    }
    try {
      return await this.hash.pbkdf2(password, salt, this.iterations, KEY_LENGTH);
    } catch (err) {
      throw new KeyDerivationError(
        err instanceof Error ? err.message : String(err),
      );
    }
  }
}
