import { pino, type Logger } from 'pino'

export const LOG_PREFIX = '[correction-surface]'

export function createLogger(level = 'info'): Logger {
  return pino({ name: 'correction-surface', level })
}
