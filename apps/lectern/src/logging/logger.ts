import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

// The terminal owns stdout while a reader session is active, so logs go to a
// file when one is configured and to stderr otherwise.

export interface CreateLoggerOptions {
  level?: string;
  /** Log file path; falls back to LECTERN_LOG_FILE, then stderr. */
  file?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? process.env.LECTERN_LOG_LEVEL ?? 'warn',
    base: {
      service: 'lectern',
    },
  };

  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }

  const file = options.file ?? process.env.LECTERN_LOG_FILE;
  const destination = file
    ? pino.destination({ dest: file, mkdir: true, sync: false })
    : pino.destination(2);
  return pino(loggerOptions, destination);
}

let rootLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return rootLogger;
}

export function setLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Child logger tagged with the component name, e.g. `componentLogger('PageBitmapCache')`.
 */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ component });
}

export type { Logger };
