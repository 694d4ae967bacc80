import pino from 'pino'

export const logger = pino({
  name: 'behavior-dispatch',
  level: process.env.LOG_LEVEL ?? 'info',
  base: undefined,
})

export type Logger = typeof logger
