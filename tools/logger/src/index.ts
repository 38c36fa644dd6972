type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Severity order, lowest first */
const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }

  /**
   * Wrap a set of log methods so that calls below `level` are dropped.
   */
  static withLevel(methods: LoggerMethods, level: LogLevel): Logger {
    const enabled = (target: Exclude<LogLevel, 'silent'>) =>
      LEVEL_ORDER[target] >= LEVEL_ORDER[level];

    return new Logger({
      debug: enabled('debug') ? methods.debug : noop,
      info: enabled('info') ? methods.info : noop,
      warn: enabled('warn') ? methods.warn : noop,
      error: enabled('error') ? methods.error : noop,
    });
  }
}

/**
 * Console-backed logger. Debug and info go to stdout, warn and error to stderr.
 */
function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  return Logger.withLevel(
    {
      debug: (...args) => console.debug(...args),
      info: (...args) => console.info(...args),
      warn: (...args) => console.warn(...args),
      error: (...args) => console.error(...args),
    },
    options.level ?? 'info',
  );
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export { Logger, createConsoleLogger, isLogLevel };
export type { LoggerMethods, LogFn, LogLevel };
