import pino, { type LoggerOptions } from 'pino'
import { env, type Env } from './config/env'

export function loggerOptions(settings: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>): LoggerOptions {
  const isDev = settings.NODE_ENV === 'development'
  const isTest = settings.NODE_ENV === 'test'

  return {
    name: 'resume-kit',
    level: settings.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' }
        }
      : undefined
  }
}

export const logger = pino(loggerOptions(env))
