import { formatOutcome, lineReporter } from '../src/report.js';
import { IOError } from '../../core/src/errors/index.js';

describe('outcome reporting', () => {
  it('formats each kind on one line', () => {
    expect(formatOutcome({ kind: 'encrypted', path: '/in/a.txt', output: '/out/a.enc' }))
      .toBe('Encrypted /in/a.txt -> /out/a.enc');
    expect(formatOutcome({ kind: 'decrypted', path: '/out/a.enc', output: '/in/a.txt' }))
      .toBe('Decrypted /out/a.enc -> /in/a.txt');
    expect(formatOutcome({ kind: 'failed', path: '/in/b.txt', reason: 'boom', error: new IOError('boom') }))
      .toBe('/in/b.txt: boom');
  });

  it('routes failures to the error stream', () => {
    const out: string[] = [];
    const err: string[] = [];
    const r = lineReporter(l => out.push(l), l => err.push(l));

    r.report({ kind: 'encrypted', path: 'a', output: 'b' });
    r.report({ kind: 'failed', path: 'c', reason: 'nope', error: null });

    expect(out).toEqual(['Encrypted a -> b']);
    expect(err).toEqual(['c: nope']);
  });
});
