// packages/core/src/index.ts

import type { CryptoProvider } from './providers/CryptoProvider.js';
import type { CipherName, CipherSuite, HashName, SuiteConfig } from './types/index.js';
import {
  DEFAULT_CIPHER,
  DEFAULT_HASH,
  DEFAULT_ITERATIONS,
  MAX_PLAINTEXT_BYTES,
  MIN_RECOMMENDED_ITERATIONS,
  TAG_LENGTH,
} from './config/defaults.js';
import { resolveSuite } from './config/suite.js';
import { CryptoContext } from './context/CryptoContext.js';
import { pack, unpack, unwrapName, wrapWithName } from './container/codec.js';
import { constantTimeEqual } from './util/constantTime.js';
import { passwordBytes, toHex, utf8Encode, wipe } from './util/bytes.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import { WrongPasswordOrTamperedError } from './errors/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring a Sealer instance.
 */
export interface SealerOptions {
  /** Hash used by PBKDF2 and the key-verification digest; defaults to `sha256` */
  hash?              : HashName;
  /** AEAD cipher; defaults to `aes-256-gcm` */
  cipher?            : CipherName;
  /** PBKDF2 rounds; must match between encryption and decryption */
  iterations?        : number;
  /** Plaintext ceiling in bytes; defaults to 2^31 - 1 */
  maxPlaintextBytes? : number;
  /** Verbosity level 0-4 for logging (0 = warnings only) */
  verbose?           : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?            : (msg: string) => void;
}

export interface OpenedContainer {
  /** Name recorded at encryption time */
  filename  : string;
  plaintext : Uint8Array;
}

export interface ContainerInfo {
  filename         : string;
  salt             : string;
  nonce            : string;
  keyHash          : string;
  ciphertextLength : number;
  plaintextLength  : number;
}

/**
 * Sealer turns a plaintext plus the name it is stored under into a
 * self-contained, password-protected container, and back.
 */
export class Sealer {
  private readonly suite : CipherSuite;

  // diagnostics
  private readonly log : Logger;

  /**
   * @param provider - Platform crypto (WebCrypto subtle + CSPRNG)
   * @param opt - Suite selection, KDF cost and logging
   * @throws ConfigError on an unknown algorithm name or bad number
   */
  constructor(
    private readonly provider: CryptoProvider,
    opt: SealerOptions = {},
  ) {
    this.log   = createLogger(opt.verbose ?? 0, opt.logger, 'sealer');
    this.suite = resolveSuite({
      hash              : opt.hash ?? DEFAULT_HASH,
      cipher            : opt.cipher ?? DEFAULT_CIPHER,
      iterations        : opt.iterations ?? DEFAULT_ITERATIONS,
      maxPlaintextBytes : opt.maxPlaintextBytes ?? MAX_PLAINTEXT_BYTES,
    }, provider);

    if (this.suite.config.iterations < MIN_RECOMMENDED_ITERATIONS) {
      this.log.log(0, `PBKDF2 iteration count ${this.suite.config.iterations} is below ${MIN_RECOMMENDED_ITERATIONS}`);
    }
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /** The resolved hash/cipher pair and tuning. */
  getSuite(): SuiteConfig { return this.suite.config; }

  /** Adjust verbosity level of internal logger at runtime. */
  setVerbose(level: Verbosity): void { this.log.level = level; }
  getVerbose(): Verbosity            { return this.log.level; }

  /**
   * Parse a container without a password. Nothing is decrypted.
   * @throws FormatError when the filename layer or header is malformed
   */
  static inspect(data: Uint8Array): ContainerInfo {
    const { filename, container } = unwrapName(data);
    const fields = unpack(container);
    return {
      filename,
      salt             : toHex(fields.salt),
      nonce            : toHex(fields.nonce),
      keyHash          : toHex(fields.keyHash),
      ciphertextLength : fields.ciphertext.byteLength,
      plaintextLength  : Math.max(0, fields.ciphertext.byteLength - TAG_LENGTH),
    };
  }

  /**
   * Reject a plaintext size up front, before any key is derived.
   * @throws PlaintextTooLargeError
   */
  assertPlaintextSize(byteLength: number): void {
    this.suite.cipher.assertPlaintextSize(byteLength);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  Seal / open
  // ════════════════════════════════════════════════════════════════════════

  /**
   * Encrypt `plain` under a fresh salt and nonce, binding `filename` as
   * associated data, and return `filename || '/' || container`.
   * @throws PlaintextTooLargeError, KeyDerivationError
   */
  async seal(
    plain: Uint8Array,
    filename: string,
    pass: Uint8Array | string,
  ): Promise<Uint8Array> {
    this.assertPlaintextSize(plain.byteLength);

    const secret = passwordBytes(pass);
    if (secret.bytes.byteLength === 0) this.log.log(0, 'Empty password provided to seal');
    this.log.log(1, `Sealing ${filename} (${plain.byteLength} bytes), suite: ${this.describeSuite()}`);

    let ctx: CryptoContext | null = null;
    try {
      this.log.log(2, 'Deriving key');
      const start = performance.now();
      ctx = await CryptoContext.create(this.suite, this.provider, secret.bytes);
      this.log.log(3, `Key derivation completed in ${(performance.now() - start).toFixed(1)} ms`);

      this.log.log(2, 'Encrypting payload');
      const sealed = await this.suite.cipher.encrypt(
        ctx.derivedKey, ctx.nonce, plain, utf8Encode(filename),
      );

      const container = pack(ctx.salt, ctx.keyVerificationHash, ctx.nonce, sealed);
      this.log.log(1, 'Sealing finished');
      return wrapWithName(filename, container);
    } finally {
      ctx?.dispose();
      if (secret.owned) wipe(secret.bytes);
    }
  }

  /**
   * Verify the password against the stored key hash, then decrypt and
   * authenticate the payload against the embedded filename.
   * @throws FormatError on a malformed container
   * @throws WrongPasswordOrTamperedError when the key hash does not match
   * @throws TamperedError when the AEAD tag does not verify
   */
  async open(data: Uint8Array, pass: Uint8Array | string): Promise<OpenedContainer> {
    this.log.log(1, `Opening container (${data.byteLength} bytes), suite: ${this.describeSuite()}`);

    this.log.log(3, 'Unwrapping filename and header');
    const { filename, nameBytes, container } = unwrapName(data);
    const fields = unpack(container);

    const secret = passwordBytes(pass);
    let ctx: CryptoContext | null = null;
    try {
      this.log.log(2, 'Re-deriving key from stored salt');
      ctx = await CryptoContext.create(this.suite, this.provider, secret.bytes, {
        salt  : fields.salt,
        nonce : fields.nonce,
      });

      if (!constantTimeEqual(ctx.keyVerificationHash, fields.keyHash)) {
        throw new WrongPasswordOrTamperedError('Wrong password or tampered container header');
      }

      this.log.log(2, `Decrypting payload for ${filename}`);
      const plaintext = await this.suite.cipher.decrypt(
        ctx.derivedKey, ctx.nonce, fields.ciphertext, nameBytes,
      );
      this.log.log(1, 'Opening finished');
      return { filename, plaintext };
    } finally {
      ctx?.dispose();
      if (secret.owned) wipe(secret.bytes);
    }
  }

  private describeSuite(): string {
    const { hash, cipher, iterations } = this.suite.config;
    return `pbkdf2-${hash}/${iterations} + ${cipher}`;
  }
}

export { CryptoContext } from './context/CryptoContext.js';
export { constantTimeEqual } from './util/constantTime.js';
export { createLogger, toVerbosity } from './util/logger.js';
export type { Logger, Verbosity } from './util/logger.js';
export { resolveSuite, isCipherName, isHashName } from './config/suite.js';
export * from './container/codec.js';
export * from './errors/index.js';
export * from './config/defaults.js';
export { HASH_NAMES, CIPHER_NAMES } from './types/index.js';
export type {
  AuthenticatedCipher,
  CipherName,
  CipherSuite,
  HashName,
  HashPrimitive,
  IntegrityDigest,
  KeyDerivation,
  SuiteConfig,
} from './types/index.js';
export type { CryptoProvider } from './providers/CryptoProvider.js';
