// packages/node-runtime/src/paths.ts
import { access, constants as fsConstants, realpath, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { IOError } from '../../core/src/errors/index.js';
import { dedupe } from './batch.js';

/**
 * Canonical, de-duplicated input paths. A path that cannot be resolved is
 * kept in absolute form so it fails on its own inside the batch.
 */
export async function canonicalizePaths(paths: readonly string[]): Promise<string[]> {
  const resolved = await Promise.all(
    paths.map(p => realpath(p).catch(() => resolve(p))),
  );
  return dedupe(resolved);
}

/**
 * Validate the output directory: it must exist, be a directory and be writable.
 * @returns its canonical path
 * @throws IOError
 */
export async function assertOutputDir(dir: string): Promise<string> {
  let real: string;
  try {
    real = await realpath(dir);
  } catch {
    throw new IOError(`Output directory does not exist: ${dir}`);
  }
  if (!(await stat(real)).isDirectory()) {
    throw new IOError(`Output path is not a directory: ${dir}`);
  }
  try {
    await access(real, fsConstants.W_OK);
  } catch {
    throw new IOError(`Output directory is not writeable: ${dir}`);
  }
  return real;
}
