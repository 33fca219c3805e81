import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

/**
 * Log levels, most severe first.
 *
 * Adds `notice` between warn and info and `trace` below debug. Extension
 * discovery reports skipped non-extension files at `trace`.
 */
export const LOG_LEVELS = {
  error: 0,
  warn: 1,
  notice: 2,
  info: 3,
  debug: 4,
  trace: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

winston.addColors({
  error: 'red',
  warn: 'yellow',
  notice: 'cyan',
  info: 'green',
  debug: 'blue',
  trace: 'gray',
});

/**
 * Rotating file transport limits
 */
const LOG_FILE_MAX_BYTES = 5 * 2 ** 12;
const LOG_FILE_MAX_FILES = 5;

/**
 * Custom format for development (human-readable)
 */
const devFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

/**
 * Custom format for production (JSON for log aggregation)
 */
const prodFormat = combine(timestamp(), json());

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Determine log level from environment
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function fileTransport(filename: string): winston.transport {
  return new winston.transports.File({
    filename,
    maxsize: LOG_FILE_MAX_BYTES,
    maxFiles: LOG_FILE_MAX_FILES,
    tailable: true,
  });
}

/**
 * Root winston instance
 */
export const rootLogger = winston.createLogger({
  levels: LOG_LEVELS,
  level: getLogLevel(),
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  transports: [new winston.transports.Console()],
  defaultMeta: { service: 'modebot' },
});

/**
 * Apply validated logging settings to the root logger
 */
export function configureLogging(options: { level: LogLevel; file?: string }): void {
  rootLogger.level = options.level;
  if (options.file) {
    rootLogger.add(fileTransport(options.file));
  }
}

export type LogMeta = Record<string, unknown>;

/**
 * Leveled logging handle
 *
 * Components take this instead of reaching for the winston instance, so
 * tests can hand them a fake.
 */
export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  notice(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  trace(message: string, meta?: LogMeta): void;
}

/**
 * Wrap a winston logger in the {@link Logger} interface
 */
export function wrapWinston(target: winston.Logger): Logger {
  const at = (level: LogLevel) => (message: string, meta: LogMeta = {}): void => {
    target.log(level, message, meta);
  };

  return {
    error: at('error'),
    warn: at('warn'),
    notice: at('notice'),
    info: at('info'),
    debug: at('debug'),
    trace: at('trace'),
  };
}

/**
 * Create a logger tagged with a component name
 */
export function createLogger(component: string): Logger {
  return wrapWinston(rootLogger.child({ component }));
}

/**
 * Main application logger
 */
export const logger: Logger = wrapWinston(rootLogger);

/**
 * Flatten an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
