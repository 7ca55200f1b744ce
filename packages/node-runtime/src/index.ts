// packages/node-runtime/src/index.ts
import { Sealer, type SealerOptions } from '../../core/src/index.js';
import { nodeProvider }                 from './provider.js';

export function createSealer(cfg?: SealerOptions): Sealer {
  return new Sealer(nodeProvider, cfg);
}

export { Sealer } from '../../core/src/index.js';
export { nodeProvider } from './provider.js';
export { FileTransform, encryptedName, ENCRYPTED_EXTENSION } from './fileTransform.js';
export type { FileRecord, Operation, Outcome } from './fileTransform.js';
export { BatchProcessor, dedupe } from './batch.js';
export type { BatchOptions, BatchSummary, Reporter } from './batch.js';
export { canonicalizePaths, assertOutputDir } from './paths.js';
export { formatOutcome, lineReporter } from './report.js';
