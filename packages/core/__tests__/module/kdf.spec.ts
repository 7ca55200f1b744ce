import { Pbkdf2KDF } from '../../src/algorithms/kdf/Pbkdf2.js';
import { KeyDigest } from '../../src/algorithms/digest/KeyDigest.js';
import { WebCryptoSha256 } from '../../src/algorithms/hash/WebCryptoSha256.js';
import { KeyDerivationError } from '../../src/errors/index.js';
import type { HashPrimitive } from '../../src/types/index.js';
import { nodeProvider, te } from '../_helper.js';

function fakeHash(overrides: Partial<HashPrimitive> = {}): HashPrimitive {
  return {
    name         : 'sha256',
    outputLength : 32,
    digest       : async () => new Uint8Array(32),
    pbkdf2       : async (_p, _s, _c, len) => new Uint8Array(len),
    ...overrides,
  };
}

describe('Pbkdf2KDF', () => {
  const sha = new WebCryptoSha256(nodeProvider);
  const salt = new Uint8Array(16).fill(9);

  it('is deterministic and salt-sensitive', async () => {
    const kdf = new Pbkdf2KDF(sha, 1_000);
    const a = await kdf.derive(te.encode('pw'), salt);
    const b = await kdf.derive(te.encode('pw'), salt);
    const c = await kdf.derive(te.encode('pw'), new Uint8Array(16));

    expect(a.byteLength).toBe(32);
    expect(a).toEqual(b);
    expect(a).not.toEqual(c);
  });

  it('changes with the iteration count', async () => {
    const a = await new Pbkdf2KDF(sha, 1_000).derive(te.encode('pw'), salt);
    const b = await new Pbkdf2KDF(sha, 1_001).derive(te.encode('pw'), salt);
    expect(a).not.toEqual(b);
  });

  it('names itself after the hash', () => {
    expect(new Pbkdf2KDF(sha, 1).name).toBe('pbkdf2-sha256');
  });

  it('rejects a salt that is not 16 bytes', async () => {
    await expect(new Pbkdf2KDF(sha, 1).derive(te.encode('pw'), new Uint8Array(8)))
      .rejects.toThrow('Salt must be 16 bytes, got 8');
  });

  it('wraps primitive failures in KeyDerivationError', async () => {
    const broken = fakeHash({ pbkdf2: async () => { throw new Error('out of memory'); } });
    const err = await new Pbkdf2KDF(broken, 1).derive(te.encode('pw'), salt).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(KeyDerivationError);
    expect(err).toHaveProperty('message', 'out of memory');
  });
});

describe('KeyDigest', () => {
  it('hashes the key once with the suite hash', async () => {
    const sha = new WebCryptoSha256(nodeProvider);
    const key = new Uint8Array(32).fill(1);
    expect(await new KeyDigest(sha).digest(key)).toEqual(await sha.digest(key));
  });

  it('refuses a hash whose output does not fit the header', () => {
    expect(() => new KeyDigest(fakeHash({ outputLength: 64 })))
      .toThrow('sha256 yields 64 bytes, container needs 32');
  });
});
