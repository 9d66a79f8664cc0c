import pino from 'pino';

const LEVEL_ALIASES: Record<string, pino.LevelWithSilent> = {
  trace: 'trace',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'fatal',
  critical: 'fatal',
  silent: 'silent',
};

/** Maps LOG_LEVEL (pino names or the classic WARNING/CRITICAL spelling) to a pino level. */
export function resolveLogLevel(raw: string | undefined): pino.LevelWithSilent | undefined {
  return LEVEL_ALIASES[(raw ?? 'info').trim().toLowerCase()];
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function createBaseLogger(): pino.Logger {
  // An invalid LOG_LEVEL is reported by config validation; log at info until then
  const level = resolveLogLevel(process.env.LOG_LEVEL) ?? 'info';
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'yyyy-mm-dd HH:MM:ss',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  return pino(loggerOptions);
}

const baseLogger = createBaseLogger();

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return baseLogger.child({ ...context });
}
