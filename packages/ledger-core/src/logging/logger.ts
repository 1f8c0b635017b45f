import pino from 'pino';

export type LoggerFormat = 'json' | 'pretty';

/**
 * pino options shared by the API server (as Fastify's logger) and the CLI
 */
export function loggerOptions(
  level: pino.LevelWithSilent = 'info',
  format: LoggerFormat = 'pretty',
): pino.LoggerOptions {
  return {
    level,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

/**
 * Create a configured logger instance
 */
export function createLogger(
  level: pino.LevelWithSilent = 'info',
  format: LoggerFormat = 'pretty',
): pino.Logger {
  return pino(loggerOptions(level, format));
}
