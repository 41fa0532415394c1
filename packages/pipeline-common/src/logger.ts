import type { Writable } from 'node:stream'
import pc from 'picocolors'

export type LogLevel = 'info' | 'warn' | 'error'

export interface Logger {
  info: (message: string) => void
  warn: (message: string) => void
  error: (message: string) => void
}

export interface LoggerOptions {
  /** Defaults to whether the stream is a TTY. */
  colors?: boolean
}

const isTty = (stream: Writable): boolean => {
  return 'isTTY' in stream && stream.isTTY === true
}

/**
 * Creates a line logger bound to an explicit stream.
 * @param stream Diagnostic channel the lines are written to.
 */
export const createLogger = (stream: Writable, options: LoggerOptions = {}): Logger => {
  const colors = pc.createColors(options.colors ?? isTty(stream))
  const paint: Record<LogLevel, (text: string) => string> = {
    info: (text) => text,
    warn: colors.yellow,
    error: colors.red,
  }

  const write = (level: LogLevel, message: string): void => {
    stream.write(`${paint[level](message)}\n`)
  }

  return {
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  }
}
