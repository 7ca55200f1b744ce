import { Sealer } from '../src/index.js';
import {
  FormatError,
  TamperedError,
  WrongPasswordOrTamperedError,
} from '../src/errors/index.js';
import { CIPHER_NAMES } from '../src/types/index.js';
import { sealer, te } from './_helper.js';

/*
 * 'secret.txt' is 10 bytes, so with the separator the inner container starts
 * at 11: salt 11..27, key hash 27..59, nonce 59..71, ciphertext from 71.
 */
const NAME  = 'secret.txt';
const INNER = NAME.length + 1;

describe('Sealer tamper detection', () => {
  const s = sealer();
  let sealed: Uint8Array;

  beforeAll(async () => {
    sealed = await s.seal(te.encode('hello world'), NAME, 'pw');
  });

  function flipped(at: number, mask = 0x01): Uint8Array {
    const copy = sealed.slice();
    copy[at] ^= mask;
    return copy;
  }

  it('ciphertext bit flip → TamperedError', async () => {
    await expect(s.open(flipped(INNER + 60), 'pw')).rejects.toBeInstanceOf(TamperedError);
  });

  it('tag bit flip → TamperedError', async () => {
    await expect(s.open(flipped(sealed.length - 1, 0x80), 'pw')).rejects.toBeInstanceOf(TamperedError);
  });

  it('filename bit flip (secret → sdcret) → TamperedError', async () => {
    const copy = flipped(1);
    expect(Sealer.inspect(copy).filename).toBe('sdcret.txt');
    await expect(s.open(copy, 'pw')).rejects.toBeInstanceOf(TamperedError);
  });

  it('nonce bit flip → TamperedError', async () => {
    await expect(s.open(flipped(INNER + 48), 'pw')).rejects.toBeInstanceOf(TamperedError);
  });

  it('key hash bit flip → WrongPasswordOrTamperedError', async () => {
    await expect(s.open(flipped(INNER + 16), 'pw')).rejects.toBeInstanceOf(WrongPasswordOrTamperedError);
  });

  it('salt bit flip → WrongPasswordOrTamperedError', async () => {
    await expect(s.open(flipped(INNER), 'pw')).rejects.toBeInstanceOf(WrongPasswordOrTamperedError);
  });

  it('truncated header → FormatError', async () => {
    await expect(s.open(sealed.slice(0, INNER + 59), 'pw')).rejects.toBeInstanceOf(FormatError);
  });

  it('missing separator → FormatError', async () => {
    await expect(s.open(te.encode('no separator here'), 'pw'))
      .rejects.toThrow('Filename separator not found');
  });

  it('the untouched container still opens', async () => {
    expect((await s.open(sealed, 'pw')).filename).toBe(NAME);
  });
});

describe('Sealer every-bit tamper sweep', () => {
  it.each(CIPHER_NAMES)('%s rejects each single-bit flip in ciphertext and tag', async (cipher) => {
    const s    = sealer({ cipher });
    const box  = await s.seal(te.encode('abc'), NAME, 'pw');
    const body = INNER + 60;
    expect(box.length - body).toBe(3 + 16);

    const accepted: string[] = [];
    for (let at = body; at < box.length; at++) {
      for (let bit = 0; bit < 8; bit++) {
        const copy = box.slice();
        copy[at] ^= 1 << bit;
        const err = await s.open(copy, 'pw').then(() => null, (e: unknown) => e);
        if (!(err instanceof TamperedError)) accepted.push(`${at - body}:${bit}`);
      }
    }
    expect(accepted).toEqual([]);
  });
});
