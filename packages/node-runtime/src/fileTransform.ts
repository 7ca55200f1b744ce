// packages/node-runtime/src/fileTransform.ts
import { randomUUID } from 'node:crypto';
import { readFile, rename, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join, parse, resolve } from 'node:path';
import type { Sealer } from '../../core/src/index.js';
import { IOError, PwsealError } from '../../core/src/errors/index.js';
import { createLogger, type Logger } from '../../core/src/util/logger.js';
import { wipe } from '../../core/src/util/bytes.js';

export type Operation = 'encrypt' | 'decrypt';

/** One file in flight. Owned by a single {@link FileTransform.run} call. */
export interface FileRecord {
  source    : string;
  outputDir : string;
  operation : Operation;
  remove    : boolean;
}

export type Outcome =
  | { kind: 'encrypted'; path: string; output: string }
  | { kind: 'decrypted'; path: string; output: string }
  | { kind: 'failed';    path: string; reason: string; error: unknown };

export const ENCRYPTED_EXTENSION = '.enc';

/** `<stem>.enc`, where the stem drops only the last extension. */
export function encryptedName(source: string): string {
  return `${parse(source).name}${ENCRYPTED_EXTENSION}`;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Encrypt or decrypt one file end to end.
 *
 * Never throws: every failure comes back as a `failed` outcome so callers
 * can run many of these side by side.
 */
export class FileTransform {
  private readonly log: Logger;

  constructor(
    private readonly sealer: Sealer,
    private readonly password: Uint8Array,
    log?: Logger,
  ) {
    this.log = log ?? createLogger(0);
  }

  async run(record: FileRecord): Promise<Outcome> {
    const path = record.source;
    try {
      if (record.operation === 'encrypt') {
        return { kind: 'encrypted', path, output: await this.encrypt(record) };
      }
      return { kind: 'decrypted', path, output: await this.decrypt(record) };
    } catch (err) {
      this.log.log(2, `${path}: ${record.operation} failed (${err instanceof Error ? err.name : 'unknown'})`);
      return { kind: 'failed', path, reason: describeError(err), error: err };
    }
  }

  private async encrypt({ source, outputDir, remove }: FileRecord): Promise<string> {
    const info = await io(() => stat(source));
    if (!info.isFile()) throw new IOError(`Not a regular file: ${source}`);
    this.sealer.assertPlaintextSize(info.size);

    const plain = await io(() => readFile(source));
    let sealed: Uint8Array;
    try {
      sealed = await this.sealer.seal(plain, basename(source), this.password);
    } finally {
      wipe(plain);
    }

    const target = join(outputDir, encryptedName(source));
    await this.writeAtomic(target, sealed);
    await this.removeSource(source, target, remove);
    return target;
  }

  private async decrypt({ source, outputDir, remove }: FileRecord): Promise<string> {
    const data = await io(() => readFile(source));
    const { filename, plaintext } = await this.sealer.open(data, this.password);

    const target = join(outputDir, filename);
    try {
      await this.writeAtomic(target, plaintext);
    } finally {
      wipe(plaintext);
    }
    await this.removeSource(source, target, remove);
    return target;
  }

  /**
   * Write beside the target, then rename over it: readers see either the
   * previous file or the complete new one.
   */
  private async writeAtomic(target: string, data: Uint8Array): Promise<void> {
    // fixed-length name: a target near NAME_MAX must not push the temp file past it
    const tmp = join(dirname(target), `.${randomUUID()}.tmp`);
    try {
      await writeFile(tmp, data, { flag: 'wx', mode: 0o600 });
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this.log.log(0, `Could not remove temp file ${tmp}: ${describeError(cleanupErr)}`);
      });
      throw toIOError(err);
    }
  }

  private async removeSource(source: string, target: string, remove: boolean): Promise<void> {
    if (!remove) return;
    // output landed on the source path: deleting would destroy the result
    if (resolve(source) === resolve(target)) {
      this.log.log(0, `Kept ${source}: output was written over it`);
      return;
    }
    await io(() => unlink(source));
  }
}

async function io<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw toIOError(err);
  }
}

function toIOError(err: unknown): PwsealError {
  return err instanceof PwsealError ? err : new IOError(describeError(err));
}
