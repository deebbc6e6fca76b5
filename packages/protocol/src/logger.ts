export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  level: LogLevel;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const prefix = opts.prefix ? `${opts.prefix} ` : '';

  const logger: Logger = {
    level: opts.level ?? 'info',
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
  };

  function write(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: Record<string, unknown>) {
    if (SEVERITY[level] > SEVERITY[logger.level]) return;

    const time = new Date().toISOString();
    const line = `[${time}] ${prefix}${level.toUpperCase()} ${msg}`;
    const details = meta && Object.keys(meta).length ? meta : '';

    if (level === 'error' || level === 'warn') {
      console.error(line, details);
    } else {
      console.log(line, details);
    }
  }

  return logger;
}

export const noopLogger: Logger = {
  level: 'silent',
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
