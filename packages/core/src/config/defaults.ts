import type { CipherName, HashName } from '../types/index.js';

export const DEFAULT_HASH  : HashName   = 'sha256';
export const DEFAULT_CIPHER: CipherName = 'aes-256-gcm';

/** PBKDF2 rounds used when nothing else is configured. */
export const DEFAULT_ITERATIONS = 600_000;
/** Below this the KDF still runs, but a warning is logged. */
export const MIN_RECOMMENDED_ITERATIONS = 300_000;

export const KEY_LENGTH   = 32;
export const TAG_LENGTH   = 16;

/** Largest plaintext accepted under one key/nonce pair (2^31 - 1 bytes). */
export const MAX_PLAINTEXT_BYTES = 2 ** 31 - 1;
