import pino, { Logger, LoggerOptions } from 'pino'

export type { Logger }

/** Shared by the engine logger and the Fastify instance. */
export function loggerOptions(level: string): LoggerOptions {
  return {
    level,
    ...(process.stdout.isTTY && level !== 'silent'
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
          },
        }
      : {}),
  }
}

export function createLogger(level: string): Logger {
  return pino(loggerOptions(level))
}
