import pino, { Logger } from 'pino'

export type { Logger }

/**
 * Root logger. Pretty-printed when attached to a terminal, newline-delimited
 * JSON otherwise so run output can be piped into other tools.
 */
export function createLogger(level = 'info'): Logger {
  return pino({
    level,
    transport: process.stdout.isTTY
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' } }
      : undefined,
  })
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' })
}
