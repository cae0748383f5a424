// packages/bot/src/utils/logger.ts - Logging
import pino from 'pino'
import { config, logConfig, isTest } from '../config'

function createLoggerInstance(): pino.Logger {
  return pino({
    level: isTest ? 'silent' : logConfig.level,
    transport: logConfig.pretty && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            messageFormat: '{levelLabel} - {msg}',
            errorLikeObjectKeys: ['err', 'error'],
          },
        }
      : undefined,
    base: {
      env: config.NODE_ENV,
    },
    serializers: {
      error: pino.stdSerializers.err,
      err: pino.stdSerializers.err,
    },
  })
}

export const logger: pino.Logger = createLoggerInstance()

// Create child loggers for different modules
export const createLogger = (module: string): pino.Logger => {
  return logger.child({ module })
}

// Structured logging helpers
export const logEvent = (event: string, data?: Record<string, unknown>): void => {
  logger.info({ event, ...data }, `Event: ${event}`)
}
