/* ------------------------------------------------------------------
   Tiny, dependency-free logger with five verbosity levels
   ------------------------------------------------------------------ */
export type Verbosity = 0 | 1 | 2 | 3 | 4;  // 0 = warnings only … 4 = trace

export interface Logger {
  level : Verbosity;
  log(lvl: Verbosity, msg: string): void;
}

export function createLogger(
  level: Verbosity = 0,
  sink : (msg: string) => void = console.info,
  scope?: string,
): Logger {
  const prefix = scope ? `[${scope}] ` : '';
  const logger: Logger = {
    level,
    log(lvl, msg) {
      if (lvl <= logger.level) sink(`${lvl}| ${prefix}${msg}`);
    },
  };
  return logger;
}

/** Clamp an arbitrary count (e.g. repeated `-v` flags) into a verbosity level. */
export function toVerbosity(n: number): Verbosity {
  if (n <= 0) return 0;
  if (n === 1) return 1;
  if (n === 2) return 2;
  if (n === 3) return 3;
  return 4;
}
