/**
 * Tagged console logger.
 *
 * Debug lines are gated by config; errors always print.
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export function createLogger(tag: string, debug: boolean): Logger {
  const prefix = `[${tag}]`
  return {
    debug(message, ...args) {
      if (!debug) return
      console.log(`${prefix} ${message}`, ...args)
    },
    error(message, ...args) {
      console.error(`${prefix} ${message}`, ...args)
    },
  }
}
