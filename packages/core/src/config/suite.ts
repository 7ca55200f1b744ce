// packages/core/src/config/suite.ts
import { sha3_256 } from '@noble/hashes/sha3.js';
import { sha512_256 } from '@noble/hashes/sha2.js';
import type { CryptoProvider } from '../providers/CryptoProvider.js';
import {
  CIPHER_NAMES,
  HASH_NAMES,
  type AuthenticatedCipher,
  type CipherName,
  type CipherSuite,
  type HashName,
  type HashPrimitive,
  type SuiteConfig,
} from '../types/index.js';
import { ConfigError } from '../errors/index.js';
import { WebCryptoSha256 } from '../algorithms/hash/WebCryptoSha256.js';
import { NobleHash } from '../algorithms/hash/NobleHash.js';
import { Pbkdf2KDF } from '../algorithms/kdf/Pbkdf2.js';
import { KeyDigest } from '../algorithms/digest/KeyDigest.js';
import { AESGCM } from '../algorithms/encryption/aes-gcm/AESGCM.js';
import { ChaCha20Poly1305 } from '../algorithms/encryption/chacha20poly1305/ChaCha20-Poly1305.js';

export function isHashName(v: string): v is HashName {
  return (HASH_NAMES as readonly string[]).includes(v);
}

export function isCipherName(v: string): v is CipherName {
  return (CIPHER_NAMES as readonly string[]).includes(v);
}

export function createHash(name: HashName, provider: CryptoProvider): HashPrimitive {
  switch (name) {
    case 'sha256':     return new WebCryptoSha256(provider);
    case 'sha3-256':   return new NobleHash(name, sha3_256);
    case 'sha512-256': return new NobleHash(name, sha512_256);
    default:           return unknown('hash', name);
  }
}

export function createCipher(
  name: CipherName,
  provider: CryptoProvider,
  maxPlaintextBytes: number,
): AuthenticatedCipher {
  switch (name) {
    case 'aes-256-gcm':       return new AESGCM(provider, maxPlaintextBytes);
    case 'chacha20-poly1305': return new ChaCha20Poly1305(maxPlaintextBytes);
    default:                  return unknown('cipher', name);
  }
}

/**
 * Resolve a {@link SuiteConfig} into concrete primitives, once.
 * @throws ConfigError on an unknown name or an unusable number
 */
export function resolveSuite(config: SuiteConfig, provider: CryptoProvider): CipherSuite {
  if (!Number.isInteger(config.iterations) || config.iterations < 1) {
    throw new ConfigError(`Invalid iteration count: ${config.iterations}. Must be a positive integer.`);
  }
  if (!Number.isInteger(config.maxPlaintextBytes) || config.maxPlaintextBytes < 0) {
    throw new ConfigError(`Invalid plaintext limit: ${config.maxPlaintextBytes}.`);
  }

  const hash = createHash(config.hash, provider);
  return {
    config : Object.freeze({ ...config }),
    kdf    : new Pbkdf2KDF(hash, config.iterations),
    digest : new KeyDigest(hash),
    cipher : createCipher(config.cipher, provider, config.maxPlaintextBytes),
  };
}

function unknown(kind: string, name: never): never {
  throw new ConfigError(`Unknown ${kind}: ${String(name)}`);
}
