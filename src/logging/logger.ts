import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** pino level. Default: MEDIASYNC_LOG_LEVEL or 'info' */
  level?: string;
  /** Human-readable output through pino-pretty (CLI use). */
  pretty?: boolean;
}

export function createLogger(name: string = 'mediasync', options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.MEDIASYNC_LOG_LEVEL ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ name, level }, pino.destination(2));
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}
