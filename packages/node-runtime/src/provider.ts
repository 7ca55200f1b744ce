import { webcrypto, randomFillSync } from 'node:crypto';
import type { CryptoProvider } from '../../core/src/providers/CryptoProvider.js';

export const nodeProvider: CryptoProvider = {
  subtle: webcrypto.subtle,
  getRandomValues(buf) {
    randomFillSync(buf);
    return buf;
  },
};
