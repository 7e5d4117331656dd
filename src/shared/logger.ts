export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const styles = {
  debug: { label: 'DEBUG', ansi: '\x1b[34m', rank: 0 },
  info: { label: 'INFO', ansi: '\x1b[32m', rank: 1 },
  warn: { label: 'WARN', ansi: '\x1b[33m', rank: 2 },
  error: { label: 'ERROR', ansi: '\x1b[31m', rank: 3 }
} satisfies Record<LogLevel, { label: string; ansi: string; rank: number }>

let threshold: LogLevel = 'warn'

/**
 * Suppresses every message below `level`.
 * The default is 'warn', so debug and info output only appears when asked for.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function emit(level: LogLevel, message: unknown, args: unknown[]): void {
  const style = styles[level]
  if (style.rank < styles[threshold].rank) return

  // stdout carries the report, so every level goes to stderr
  console.error(`${style.ansi}[${style.label}]\x1b[0m`, message, ...args)
}

export const log = {
  debug: (message: unknown, ...args: unknown[]) => emit('debug', message, args),
  info: (message: unknown, ...args: unknown[]) => emit('info', message, args),
  warn: (message: unknown, ...args: unknown[]) => emit('warn', message, args),
  error: (message: unknown, ...args: unknown[]) => emit('error', message, args)
}
