/**
 * Logger for registry-bridge
 *
 * Every package logs through this interface. Output goes to stderr unless an
 * output function is injected, so stdout stays free for the host application.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogData = {
  [key: string]: unknown;
};

export type Logger = {
  readonly level: LogLevel;
  error(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  debug(message: string, data?: LogData): void;
  trace(message: string, data?: LogData): void;
  child(prefix: string): Logger;
};

/**
 * Log levels with numeric values for comparison
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5
};

/**
 * Check if a log level should be output
 */
export function shouldLog(currentLevel: LogLevel, messageLevel: LogLevel): boolean {
  return LOG_LEVELS[messageLevel] <= LOG_LEVELS[currentLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Logger configuration options
 */
export type LoggerOptions = {
  level?: LogLevel;
  prefix?: string;
  json?: boolean;
  output?: (line: string) => void;
  now?: () => Date;
};

export const defaultOutput = (line: string): void => {
  process.stderr.write(`${line}\n`);
};

function formatLogLine(
  level: LogLevel,
  timestamp: string,
  message: string,
  data: LogData | undefined,
  prefix: string,
  json: boolean
): string {
  if (json) {
    const record: LogData = { time: timestamp, level, msg: message };
    if (prefix) record.prefix = prefix;
    if (data && Object.keys(data).length > 0) record.data = data;
    return JSON.stringify(record);
  }

  const prefixStr = prefix ? ` ${prefix}` : '';
  const dataStr = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}]${prefixStr} ${message}${dataStr}`;
}

/**
 * Create a functional logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const prefix = options.prefix ?? '';
  const json = options.json ?? false;
  const output = options.output ?? defaultOutput;
  const now = options.now ?? (() => new Date());

  const log = (logLevel: LogLevel, message: string, data?: LogData): void => {
    if (!shouldLog(level, logLevel)) {
      return;
    }
    output(formatLogLine(logLevel, now().toISOString(), message, data, prefix, json));
  };

  return {
    level,
    error: (message, data) => log('error', message, data),
    warn: (message, data) => log('warn', message, data),
    info: (message, data) => log('info', message, data),
    debug: (message, data) => log('debug', message, data),
    trace: (message, data) => log('trace', message, data),
    child: (childPrefix: string) =>
      createLogger({
        ...options,
        prefix: `${prefix}[${childPrefix}]`
      })
  };
}

/**
 * Create a silent logger (no-op)
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'silent' });
}

/**
 * Build a logger from LOG_LEVEL, DEBUG and LOG_FORMAT
 */
export function createLoggerFromEnv(
  env: Record<string, string | undefined> = process.env,
  options: Omit<LoggerOptions, 'level' | 'json'> = {}
): Logger {
  const debugMode = env.DEBUG === 'true' || env.DEBUG === '*';
  const requested = env.LOG_LEVEL?.toLowerCase();
  const level: LogLevel = debugMode
    ? 'debug'
    : requested && isLogLevel(requested)
      ? requested
      : 'info';

  return createLogger({ ...options, level, json: env.LOG_FORMAT === 'json' });
}

/**
 * Render an unknown thrown value for log data
 */
export function errorData(error: unknown): LogData {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}
