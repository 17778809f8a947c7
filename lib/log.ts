// Scoped console logger: createLogger('research').info('x') -> "[research] x"

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

// Read on every call so tests and the CLI can change it after import
function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS[level] >= LEVELS[currentLevel()];
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => { if (enabled('debug')) console.debug(prefix, ...args); },
    info: (...args) => { if (enabled('info')) console.log(prefix, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(prefix, ...args); },
    error: (...args) => { if (enabled('error')) console.error(prefix, ...args); }
  };
}
