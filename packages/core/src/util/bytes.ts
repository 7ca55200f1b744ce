import { FormatError } from '../errors/index.js';

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

export function utf8Encode(text: string): Uint8Array {
  return encoder.encode(text);
}

/** Decode UTF-8, rejecting malformed sequences instead of substituting U+FFFD. */
export function utf8DecodeStrict(bytes: Uint8Array, what = 'data'): string {
  try {
    return strictDecoder.decode(bytes);
  } catch {
    throw new FormatError(`Invalid UTF-8 in ${what}`);
  }
}

export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) out += b.toString(16).padStart(2, '0');
  return out;
}

/** Password input as bytes; `owned` tells the caller whether it may wipe them. */
export function passwordBytes(pass: Uint8Array | string): { bytes: Uint8Array; owned: boolean } {
  return typeof pass === 'string'
    ? { bytes: utf8Encode(pass), owned: true }
    : { bytes: pass, owned: false };
}

export function wipe(...buffers: (Uint8Array | null | undefined)[]): void {
  for (const b of buffers) b?.fill(0);
}
