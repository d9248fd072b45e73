type LogFn = (...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

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
}

/**
 * Logger that discards everything; the default for components built
 * without one
 */
function createSilentLogger(): Logger {
  return new Logger({ debug: noop, info: noop, warn: noop, error: noop });
}

export { Logger, createSilentLogger };
export type { LoggerMethods, LogFn };
