import winston, { format, transports } from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export type LogThreshold = Exclude<LogLevel, 'success'> | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  success(message: string, meta?: LogMeta): void;
  child(context: string): Logger;
}

export interface LoggerOptions {
  level?: LogThreshold;
  context?: string;
  colors?: boolean;
  // Defaults to the console, with warnings and errors on stderr
  transports?: winston.LoggerOptions['transports'];
}

// success sits between warn and info, so an info threshold still prints it
const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  success: 2,
  info: 3,
  debug: 4
};

const colors: Record<LogLevel, string> = {
  error: 'red',
  warn: 'yellow',
  success: 'green',
  info: 'cyan',
  debug: 'gray'
};

const LOG_THRESHOLDS: string[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.includes(value);
}

export function parseLogLevel(value: string | undefined, fallback: LogThreshold = 'info'): LogThreshold {
  if (!value) return fallback;
  const lower = value.trim().toLowerCase();
  return isLogThreshold(lower) ? lower : fallback;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatMeta(meta: LogMeta): string {
  if (Object.keys(meta).length === 0) return '';
  return '\n  ' + JSON.stringify(meta, errorReplacer, 2).split('\n').join('\n  ');
}

const line = format.printf((info) => {
  const { level, message, timestamp, context, ...meta } = info;
  const prefix = typeof context === 'string' ? `[${context}] ` : '';
  return `${String(timestamp)} [${level}] ${prefix}${String(message)}${formatMeta(meta)}`;
});

function buildFormat(useColors: boolean) {
  const steps: winston.Logform.Format[] = [format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })];
  if (useColors) {
    steps.push(format.colorize({ colors }));
  }
  return format.combine(...steps, line);
}

/**
 * winston-backed logger with level tags and structured metadata.
 * Warnings and errors go to stderr so report output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? parseLogLevel(process.env.LOG_LEVEL);

  const base = winston.createLogger({
    levels,
    level: threshold === 'silent' ? 'error' : threshold,
    silent: threshold === 'silent',
    format: buildFormat(options.colors ?? true),
    defaultMeta: options.context ? { context: options.context } : undefined,
    transports: options.transports ?? [new transports.Console({ stderrLevels: ['error', 'warn'] })]
  });

  return wrap(base, options.context);
}

function wrap(target: winston.Logger, context: string | undefined): Logger {
  const write = (level: LogLevel, message: string, meta: LogMeta = {}): void => {
    target.log(level, message, meta);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    success: (message, meta) => write('success', message, meta),
    child: (childContext) => {
      const nested = context ? `${context}:${childContext}` : childContext;
      return wrap(target.child({ context: nested }), nested);
    }
  };
}

const logger = createLogger();

export default logger;
