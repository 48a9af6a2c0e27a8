export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
  enabled(level: LogLevel): boolean;
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const v = (raw ?? '').trim().toLowerCase();
  return v === 'error' || v === 'warn' || v === 'info' || v === 'debug' ? v : fallback;
}

// Console-backed logger, every line prefixed with [tag]
export function createConsoleLogger(tag: string, level: LogLevel = 'warn'): Logger {
  const max = LEVEL_RANK[level];
  const enabled = (l: LogLevel): boolean => LEVEL_RANK[l] <= max;
  const prefix = `[${tag}]`;
  return {
    enabled,
    error: (m) => { if (enabled('error')) console.error(`${prefix} ${m}`); },
    warn: (m) => { if (enabled('warn')) console.warn(`${prefix} ${m}`); },
    info: (m) => { if (enabled('info')) console.log(`${prefix} ${m}`); },
    debug: (m) => { if (enabled('debug')) console.log(`${prefix} ${m}`); },
  };
}
