import { Sealer } from '../src/index.js';
import { unwrapName } from '../src/container/codec.js';
import { CIPHER_NAMES, HASH_NAMES } from '../src/types/index.js';
import { WrongPasswordOrTamperedError } from '../src/errors/index.js';
import { makePlain, nodeProvider, sealer, td, te } from './_helper.js';

describe('Sealer round-trip', () => {
  const suites = HASH_NAMES.flatMap(hash => CIPHER_NAMES.map(cipher => [hash, cipher] as const));

  it.each(suites)('%s + %s', async (hash, cipher) => {
    const s     = sealer({ hash, cipher });
    const plain = makePlain(1_000);

    const sealed = await s.seal(plain, 'data.bin', 'test-secret');
    const { filename, plaintext } = await s.open(sealed, 'test-secret');

    expect(filename).toBe('data.bin');
    expect(plaintext).toEqual(plain);
  });

  it('two seals of the same input differ and both open', async () => {
    const s = sealer();
    const a = await s.seal(te.encode('same'), 'x.txt', 'pw');
    const b = await s.seal(te.encode('same'), 'x.txt', 'pw');

    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(false);
    expect(td.decode((await s.open(a, 'pw')).plaintext)).toBe('same');
    expect(td.decode((await s.open(b, 'pw')).plaintext)).toBe('same');
  });

  it('rejects the wrong password before decrypting', async () => {
    const s = sealer();
    const sealed = await s.seal(te.encode('top secret'), 'x.txt', 'right');
    await expect(s.open(sealed, 'wrong')).rejects.toThrow('Wrong password or tampered container header');
  });

  it('does not open under a different iteration count', async () => {
    const sealed = await sealer({ iterations: 1_000 }).seal(te.encode('x'), 'x.txt', 'pw');
    await expect(sealer({ iterations: 1_001 }).open(sealed, 'pw'))
      .rejects.toBeInstanceOf(WrongPasswordOrTamperedError);
  });

  it('accepts a password given as bytes and leaves it intact', async () => {
    const s  = sealer();
    const pw = te.encode('byte-pass');
    const sealed = await s.seal(te.encode('payload'), 'p.txt', pw);

    expect(td.decode(pw)).toBe('byte-pass');
    expect(td.decode((await s.open(sealed, 'byte-pass')).plaintext)).toBe('payload');
  });

  it('keeps non-ASCII filenames', async () => {
    const s = sealer({ cipher: 'chacha20-poly1305' });
    const sealed = await s.seal(te.encode('hola'), 'año 2024.txt', 'pw');
    expect((await s.open(sealed, 'pw')).filename).toBe('año 2024.txt');
  });

  it('0-byte empty.txt at default cost: 76-byte container, wrong password fails', async () => {
    const s = new Sealer(nodeProvider, { logger: () => undefined });
    expect(s.getSuite().iterations).toBe(600_000);

    const sealed = await s.seal(new Uint8Array(0), 'empty.txt', 'correct horse');
    const { filename, container } = unwrapName(sealed);

    expect(filename).toBe('empty.txt');
    expect(container.byteLength).toBe(76);
    expect(sealed.byteLength).toBe(86);

    const opened = await s.open(sealed, 'correct horse');
    expect(opened.filename).toBe('empty.txt');
    expect(opened.plaintext.byteLength).toBe(0);

    await expect(s.open(sealed, 'wrong')).rejects.toBeInstanceOf(WrongPasswordOrTamperedError);
  });
});
