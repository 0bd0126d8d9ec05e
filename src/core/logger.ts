const PREFIX = '[gpucloud]'

/** Diagnostic sink. Plug in any logging library by implementing these four methods. */
export type TLogger = {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

/** Discards everything. Used when the caller configures no logger. */
export const noopLogger: TLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

export type TConsoleLoggerOptions = {
  /** Emit debug lines. @default false */
  debug?: boolean
}

export function createConsoleLogger(options?: TConsoleLoggerOptions): TLogger {
  const debugEnabled = options?.debug ?? false
  return {
    debug(message: string, ...args: unknown[]): void {
      if (debugEnabled) console.debug(PREFIX, '[DEBUG]', message, ...args)
    },

    info(message: string, ...args: unknown[]): void {
      console.info(PREFIX, '[INFO]', message, ...args)
    },

    warn(message: string, ...args: unknown[]): void {
      console.warn(PREFIX, '[WARN]', message, ...args)
    },

    error(message: string, ...args: unknown[]): void {
      console.error(PREFIX, '[ERROR]', message, ...args)
    },
  }
}
