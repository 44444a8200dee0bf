type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLevel(value: string): value is Level {
  return value in order;
}

// Read on every call so LOG_LEVEL can be changed at runtime (and in tests)
function getLevel(): Level {
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'warn' : 'info';
}

function shouldLog(level: Level) {
  return order[level] >= order[getLevel()];
}

function format(level: string, msg: string, source?: string) {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${msg}`;
}

export const log = {
  debug: (msg: string, source?: string) => {
    if (shouldLog('debug')) console.debug(format('debug', msg, source));
  },
  info: (msg: string, source?: string) => {
    if (shouldLog('info')) console.info(format('info', msg, source));
  },
  warn: (msg: string, source?: string) => {
    if (shouldLog('warn')) console.warn(format('warn', msg, source));
  },
  error: (msg: string, source?: string) => {
    if (shouldLog('error')) console.error(format('error', msg, source));
  },
};
