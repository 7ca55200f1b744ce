// packages/core/src/container/codec.ts
import { FormatError } from '../errors/index.js';
import { concat, utf8DecodeStrict, utf8Encode } from '../util/bytes.js';

/*
 * Inner container, fixed offsets:
 *
 *   0..16   salt
 *   16..48  key-verification hash
 *   48..60  nonce
 *   60..    ciphertext || tag
 *
 * Outer layer: filename (UTF-8) || '/' || inner container.
 */
export const SALT_LENGTH     = 16;
export const KEY_HASH_LENGTH = 32;
export const NONCE_LENGTH    = 12;

export const SALT_OFFSET     = 0;
export const KEY_HASH_OFFSET = SALT_OFFSET + SALT_LENGTH;          // 16
export const NONCE_OFFSET    = KEY_HASH_OFFSET + KEY_HASH_LENGTH;  // 48
export const HEADER_LENGTH   = NONCE_OFFSET + NONCE_LENGTH;        // 60

/** ASCII '/', which no filename can contain. */
export const NAME_SEPARATOR  = 0x2f;

export interface ContainerFields {
  salt       : Uint8Array;
  keyHash    : Uint8Array;
  nonce      : Uint8Array;
  ciphertext : Uint8Array;
}

export interface NamedContainer {
  filename  : string;
  /** Raw filename bytes exactly as stored; these are the AEAD associated data. */
  nameBytes : Uint8Array;
  container : Uint8Array;
}

export function pack(
  salt: Uint8Array,
  keyHash: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
): Uint8Array {
  expectWidth('salt', salt, SALT_LENGTH);
  expectWidth('key hash', keyHash, KEY_HASH_LENGTH);
  expectWidth('nonce', nonce, NONCE_LENGTH);
  return concat(salt, keyHash, nonce, ciphertext);
}

export function unpack(buf: Uint8Array): ContainerFields {
  if (buf.byteLength < HEADER_LENGTH) {
    throw new FormatError(
      `Container too short: ${buf.byteLength} bytes, header needs ${HEADER_LENGTH}`,
    );
  }
  return {
    salt       : buf.slice(SALT_OFFSET, KEY_HASH_OFFSET),
    keyHash    : buf.slice(KEY_HASH_OFFSET, NONCE_OFFSET),
    nonce      : buf.slice(NONCE_OFFSET, HEADER_LENGTH),
    ciphertext : buf.slice(HEADER_LENGTH),
  };
}

/** The filesystem guarantees `filename` has no '/'; this codec does not re-check it. */
export function wrapWithName(filename: string, container: Uint8Array): Uint8Array {
  return concat(utf8Encode(filename), Uint8Array.of(NAME_SEPARATOR), container);
}

export function unwrapName(buf: Uint8Array): NamedContainer {
  const at = buf.indexOf(NAME_SEPARATOR);
  if (at < 0) throw new FormatError('Filename separator not found');

  const nameBytes = buf.slice(0, at);
  const filename  = utf8DecodeStrict(nameBytes, 'embedded filename');

  // the name becomes a path component on decrypt
  if (filename === '' || filename === '.' || filename === '..' || filename.includes('\0')) {
    throw new FormatError(`Unusable embedded filename: ${JSON.stringify(filename)}`);
  }

  return { filename, nameBytes, container: buf.slice(at + 1) };
}

function expectWidth(what: string, field: Uint8Array, width: number): void {
  if (field.byteLength !== width) {
    throw new TypeError(`${what} must be ${width} bytes, got ${field.byteLength}`);
  }
}
