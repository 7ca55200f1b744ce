import { nodeProvider } from '../../node-runtime/src/provider.js';
import { Sealer, type SealerOptions } from '../src/index.js';

export { nodeProvider };

/** Low-cost, silent settings for tests that do not care about KDF strength. */
export const FAST: SealerOptions = { iterations: 1_000, logger: () => undefined };

export function sealer(opt: SealerOptions = {}): Sealer {
  return new Sealer(nodeProvider, { ...FAST, ...opt });
}

export function makePlain(n: number): Uint8Array {
  const u = new Uint8Array(n);
  for (let i = 0; i < n; i++) u[i] = (i * 11 + 5) & 0xff;
  return u;
}

export const te = new TextEncoder();
export const td = new TextDecoder();
