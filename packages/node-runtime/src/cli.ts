#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { availableParallelism } from 'node:os';
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import {
  CIPHER_NAMES,
  DEFAULT_CIPHER,
  DEFAULT_HASH,
  DEFAULT_ITERATIONS,
  HASH_NAMES,
  createLogger,
  isCipherName,
  isHashName,
  toVerbosity,
} from '../../core/src/index.js';
import { ConfigError } from '../../core/src/errors/index.js';
import { BatchProcessor } from './batch.js';
import type { Operation } from './fileTransform.js';
import { assertOutputDir, canonicalizePaths } from './paths.js';
import { lineReporter } from './report.js';
import { createSealer } from './index.js';

const PKG_VERSION = '1.0.0'; // sync with root package.json

interface GlobalOptions {
  hash       : string;
  cipher     : string;
  iterations : number;
  pass?      : string;
  jobs       : number;
  verbose    : number;
}

interface CommandOptions {
  outDir : string;
  remove : boolean;
}

async function promptPass(label = 'Password: '): Promise<string> {
  if (!stdin.isTTY) throw new Error('STDIN not a TTY; use --pass');
  stderr.write(label);
  stdin.setRawMode(true);
  stdin.resume();
  stdin.setEncoding('utf8');

  let buf = '';
  return new Promise(resolve => {
    function done() {
      stdin.setRawMode(false);
      stdin.pause();
      stderr.write('\n');
      stdin.off('data', onData);
      resolve(buf);
    }
    function onData(ch: string) {
      if (ch === '\u0003') processExit(130);
      if (ch === '\r' || ch === '\n') return done();
      if (ch === '\u0008' || ch === '\u007F') {
        buf = buf.slice(0, -1);
        return;
      }
      buf += ch;
    }
    stdin.on('data', onData);
  });
}

async function readPassword(operation: Operation, given?: string): Promise<string> {
  if (given !== undefined) return given;
  const first = await promptPass();
  if (!first) throw new ConfigError('Password cannot be empty');
  if (operation === 'encrypt' && (await promptPass('Repeat password: ')) !== first) {
    throw new ConfigError('Passwords do not match');
  }
  return first;
}

function positiveInt(what: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isInteger(n) || n < 1) {
      throw new Error(`${what} must be a positive integer`);
    }
    return n;
  };
}

const program = new Command();

program
  .name('pwseal')
  .version(PKG_VERSION)
  .description('Password-based file encryption\n' + 'Key: PBKDF2 over the selected hash / Cipher: AES-256-GCM or ChaCha20-Poly1305')

  .addOption(
    new Option('-H, --hash <name>', 'hash for key derivation and key check')
      .choices(HASH_NAMES)
      .default(DEFAULT_HASH)
  )
  .addOption(
    new Option('-C, --cipher <name>', 'AEAD cipher')
      .choices(CIPHER_NAMES)
      .default(DEFAULT_CIPHER)
  )
  .addOption(
    new Option('-i, --iterations <n>', 'PBKDF2 iteration count (must match on decrypt)')
      .argParser(positiveInt('Iteration count'))
      .default(DEFAULT_ITERATIONS)
  )

  // password (hidden from --help)
  .addOption(
    new Option('-p, --pass <password>', 'password (prompt if omitted)')
      .hideHelp()
      .argParser((v) => {
        if (!v.trim()) throw new Error('Password cannot be empty');
        return v;
      })
  )
  .addOption(
    new Option('-j, --jobs <n>', 'files processed in parallel')
      .argParser(positiveInt('Job count'))
      .default(availableParallelism())
  )

  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_: string, previous: number) => previous + 1)
  );


process.on('uncaughtException', err => {
  stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  processExit(1);
});

process.on('unhandledRejection', (err: unknown) => {
  if (err instanceof Error) {
    stderr.write(`Error [${err.constructor.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
});


async function run(operation: Operation, files: string[], cmd: CommandOptions): Promise<void> {
  const opts = program.opts<GlobalOptions>();
  const sink = (msg: string) => { stderr.write(msg + '\n'); };

  let outputDir: string;
  try {
    outputDir = await assertOutputDir(cmd.outDir);
  } catch (err) {
    stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    processExit(1);
  }

  if (!isHashName(opts.hash) || !isCipherName(opts.cipher)) {
    stderr.write(`Error: unsupported suite ${opts.hash} / ${opts.cipher}\n`);
    processExit(1);
  }

  const sealer = createSealer({
    hash       : opts.hash,
    cipher     : opts.cipher,
    iterations : opts.iterations,
    verbose    : toVerbosity(opts.verbose),
    logger     : sink,
  });

  let pass: string;
  try {
    pass = await readPassword(operation, opts.pass);
  } catch (err) {
    stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    processExit(1);
  }
  const sources = await canonicalizePaths(files);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    stderr.write('Interrupted: finishing files already in progress\n');
    controller.abort();
  });

  const summary = await new BatchProcessor(sealer).process(sources, operation, pass, {
    outputDir,
    remove      : cmd.remove,
    concurrency : opts.jobs,
    signal      : controller.signal,
    reporter    : lineReporter(line => stdout.write(line + '\n'), line => stderr.write(line + '\n')),
    verbose     : toVerbosity(opts.verbose),
    logger      : sink,
  });

  const log = createLogger(toVerbosity(opts.verbose), sink, 'cli');
  log.log(1, `${summary.succeeded} succeeded, ${summary.failed} failed`);

  if (summary.aborted) processExit(130);
  processExit(summary.failed > 0 ? 1 : 0);
}

for (const operation of ['encrypt', 'decrypt'] as const) {
  program
    .command(`${operation} <files...>`)
    .description(operation === 'encrypt'
      ? 'Encrypt files into <stem>.enc containers'
      : 'Decrypt .enc containers back to their recorded filenames')
    .option('-o, --out-dir <dir>', 'output directory', '.')
    .option('-r, --remove', 'remove each source after a successful write', false)
    .action((files: string[], cmd: CommandOptions) => run(operation, files, cmd));
}

await program.parseAsync();
