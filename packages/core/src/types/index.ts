/* ------------------------- Suite selection --------------------------- */
export const HASH_NAMES   = ['sha256', 'sha3-256', 'sha512-256'] as const;
export const CIPHER_NAMES = ['aes-256-gcm', 'chacha20-poly1305'] as const;

export type HashName   = typeof HASH_NAMES[number];
export type CipherName = typeof CIPHER_NAMES[number];

/* ------------------------- Hash primitive ---------------------------- */
export interface HashPrimitive {
  readonly name: HashName;
  readonly outputLength: number;
  digest(data: Uint8Array): Promise<Uint8Array>;
  pbkdf2(
    password   : Uint8Array,
    salt       : Uint8Array,
    iterations : number,
    keyLength  : number,
  ): Promise<Uint8Array>;
}

/* ------------------------- Key derivation ---------------------------- */
export interface KeyDerivation {
  readonly name: string;
  readonly iterations: number;
  derive(password: Uint8Array, salt: Uint8Array): Promise<Uint8Array>;
}

export interface IntegrityDigest {
  digest(key: Uint8Array): Promise<Uint8Array>;
}

/* ------------------------- Encryption engine ------------------------- */
export interface AuthenticatedCipher {
  readonly name: CipherName;
  readonly KEY_LENGTH: number;
  readonly NONCE_LENGTH: number;
  readonly TAG_LENGTH: number;
  readonly maxPlaintextBytes: number;
  assertPlaintextSize(byteLength: number): void;
  encrypt(key: Uint8Array, nonce: Uint8Array, plain: Uint8Array, aad: Uint8Array): Promise<Uint8Array>;
  decrypt(key: Uint8Array, nonce: Uint8Array, sealed: Uint8Array, aad: Uint8Array): Promise<Uint8Array>;
}

/* ---------------------------------------------------------------------
   One selectable hash/cipher pair plus its tuning. Passed explicitly to
   whatever needs it; nothing is looked up from process-wide state.
--------------------------------------------------------------------- */
export interface SuiteConfig {
  readonly hash: HashName;
  readonly cipher: CipherName;
  readonly iterations: number;
  readonly maxPlaintextBytes: number;
}

export interface CipherSuite {
  readonly config : SuiteConfig;
  readonly kdf    : KeyDerivation;
  readonly digest : IntegrityDigest;
  readonly cipher : AuthenticatedCipher;
}
