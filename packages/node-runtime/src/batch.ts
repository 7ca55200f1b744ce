// packages/node-runtime/src/batch.ts
import { availableParallelism } from 'node:os';
import { resolve } from 'node:path';
import type { Sealer } from '../../core/src/index.js';
import { passwordBytes, wipe } from '../../core/src/util/bytes.js';
import { createLogger, type Verbosity } from '../../core/src/util/logger.js';
import { ConfigError } from '../../core/src/errors/index.js';
import { FileTransform, encryptedName, type Operation, type Outcome } from './fileTransform.js';

/** Receives every outcome as soon as its file is done. */
export interface Reporter {
  report(outcome: Outcome): void;
}

export interface BatchOptions {
  outputDir    : string;
  /** Delete each source after its output was written */
  remove?      : boolean;
  /** Parallel workers; defaults to the available CPU parallelism */
  concurrency? : number;
  /** Once aborted no further file is started */
  signal?      : AbortSignal;
  reporter?    : Reporter;
  verbose?     : Verbosity;
  logger?      : (msg: string) => void;
}

export interface BatchSummary {
  outcomes  : Outcome[];
  succeeded : number;
  failed    : number;
  /** True when the signal fired before the batch finished */
  aborted   : boolean;
}

/**
 * Runs {@link FileTransform} over many files with a fixed-size worker pool.
 * One file's failure never touches another file.
 */
export class BatchProcessor {
  constructor(private readonly sealer: Sealer) {}

  async process(
    paths: Iterable<string>,
    operation: Operation,
    pass: Uint8Array | string,
    opt: BatchOptions,
  ): Promise<BatchSummary> {
    const log   = createLogger(opt.verbose ?? 0, opt.logger, 'batch');
    const queue = dedupe(paths);
    const size  = poolSize(opt.concurrency, queue.length);

    if (operation === 'encrypt') warnCollisions(queue, msg => log.log(0, msg));
    log.log(1, `${operation}: ${queue.length} file(s), ${size} worker(s)`);

    const secret    = passwordBytes(pass);
    const transform = new FileTransform(this.sealer, secret.bytes, log);
    const outcomes: Outcome[] = [];
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < queue.length && !opt.signal?.aborted) {
        const source  = queue[next++];
        const outcome = await transform.run({
          source,
          operation,
          outputDir : opt.outputDir,
          remove    : opt.remove ?? false,
        });
        outcomes.push(outcome);
        opt.reporter?.report(outcome);
      }
    };

    try {
      await Promise.all(Array.from({ length: size }, worker));
    } finally {
      if (secret.owned) wipe(secret.bytes);
    }

    const failed     = outcomes.filter(o => o.kind === 'failed').length;
    const notStarted = queue.length - next;
    // a signal during the last file still counts: the run was interrupted
    const aborted    = notStarted > 0 || (opt.signal?.aborted ?? false);
    if (aborted) log.log(0, `Interrupted: ${notStarted} file(s) not started`);

    return { outcomes, failed, succeeded: outcomes.length - failed, aborted };
  }
}

/** Same file twice could race on read-then-delete. */
export function dedupe(paths: Iterable<string>): string[] {
  return [...new Set(Array.from(paths, p => resolve(p)))];
}

function poolSize(requested: number | undefined, jobs: number): number {
  const n = requested ?? availableParallelism();
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`Invalid concurrency: ${n}. Must be a positive integer.`);
  }
  return Math.max(1, Math.min(n, jobs));
}

/** Distinct inputs that share a stem land on one `<stem>.enc`; last writer wins. */
function warnCollisions(sources: string[], warn: (msg: string) => void): void {
  const byTarget = new Map<string, string[]>();
  for (const s of sources) {
    const name = encryptedName(s);
    byTarget.set(name, [...(byTarget.get(name) ?? []), s]);
  }
  for (const [name, group] of byTarget) {
    if (group.length > 1) {
      warn(`Output collision: ${group.join(', ')} all map to ${name} (last writer wins)`);
    }
  }
}
