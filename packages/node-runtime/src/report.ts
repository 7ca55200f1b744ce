import type { Outcome } from './fileTransform.js';
import type { Reporter } from './batch.js';

/** One human-readable line per outcome; failures read `<path>: <reason>`. */
export function formatOutcome(o: Outcome): string {
  switch (o.kind) {
    case 'encrypted': return `Encrypted ${o.path} -> ${o.output}`;
    case 'decrypted': return `Decrypted ${o.path} -> ${o.output}`;
    case 'failed':    return `${o.path}: ${o.reason}`;
  }
}

/** Successes go to `out`, failures to `err`. */
export function lineReporter(
  out: (line: string) => void,
  err: (line: string) => void,
): Reporter {
  return {
    report(o) {
      (o.kind === 'failed' ? err : out)(formatOutcome(o));
    },
  };
}
