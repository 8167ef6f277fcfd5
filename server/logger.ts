export type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const order: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLevel(value: string): value is Level {
  return value in order;
}

function envLevel(): Level {
  const raw = (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'warn' : 'info')).toLowerCase();
  return isLevel(raw) ? raw : 'info';
}

function shouldLog(level: Level) {
  return order[level] >= order[envLevel()];
}

function format(level: string, msg: unknown, source?: string) {
  const time = new Date().toISOString();
  const text = msg instanceof Error ? msg.message : String(msg);
  return `[${time}]${source ? ` [${source}]` : ''} ${level.toUpperCase()}: ${text}`;
}

export interface Logger {
  debug: (msg: unknown, source?: string) => void;
  info: (msg: unknown, source?: string) => void;
  warn: (msg: unknown, source?: string) => void;
  error: (msg: unknown, source?: string) => void;
}

export const logger: Logger = {
  debug: (msg, source) => {
    if (shouldLog('debug')) console.debug(format('debug', msg, source));
  },
  info: (msg, source) => {
    if (shouldLog('info')) console.info(format('info', msg, source));
  },
  warn: (msg, source) => {
    if (shouldLog('warn')) console.warn(format('warn', msg, source));
  },
  error: (msg, source) => {
    if (shouldLog('error')) console.error(format('error', msg, source));
  }
};

// Discards everything; handy for tests and batch tools that print their own output.
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
