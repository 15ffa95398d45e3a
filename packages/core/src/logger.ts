export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function createConsoleLogger(prefix: string, level: LogLevel = 'info'): Logger {
  const min = LEVEL_ORDER[level];
  const tag = `[${prefix}]`;
  return {
    debug: m => { if (min <= LEVEL_ORDER.debug) console.debug(`${tag} ${m}`); },
    info: m => { if (min <= LEVEL_ORDER.info) console.log(`${tag} ${m}`); },
    warn: m => { if (min <= LEVEL_ORDER.warn) console.warn(`${tag} ${m}`); },
    error: m => { console.error(`${tag} ${m}`); },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
