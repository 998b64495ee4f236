export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

/**
 * Console logger that prefixes every line with a component tag, e.g.
 * `createLogger('FFMPEG').info('binary:', p)` → `[FFMPEG] binary: /usr/bin/ffmpeg`.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
