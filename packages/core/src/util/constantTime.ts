import { FormatError } from '../errors/index.js';

/**
 * Compare two byte strings without an early exit.
 *
 * Every byte pair is folded into one accumulator, so the running time does not
 * depend on where the first mismatch sits. The lengths are fixed by the
 * container format, which is why a length mismatch is a format error and not
 * a plain `false`.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) {
    throw new FormatError(
      `Length mismatch in constant-time compare: ${a.byteLength} vs ${b.byteLength}`,
    );
  }
  let diff = 0;
  for (let i = 0; i < a.byteLength; i++) diff |= a[i] ^ b[i];
  return diff === 0;
}
