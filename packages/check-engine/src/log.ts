// packages/check-engine/src/log.ts
//
// Console-backed logger. Debug output is opt-in; warnings always print.

export type Logger = {
  debug: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
};

export function createLogger(opts: { debug: boolean; prefix?: string }): Logger {
  const prefix = opts.prefix ?? "checktree:";
  return {
    debug: (...args: unknown[]) => {
      if (opts.debug) console.debug(prefix, ...args);
    },
    warn: (...args: unknown[]) => {
      console.warn(prefix, ...args);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  warn: () => undefined,
};
