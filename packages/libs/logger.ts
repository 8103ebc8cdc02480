import pino from "pino"

// stdout carries resource lists, so every log line goes to stderr
export const logger = pino(
  {
    name: "fnpipe",
    level: process.env.FNPIPE_LOG_LEVEL || process.env.LOG_LEVEL || "info",
    formatters: {
      level: (label: string) => {
        return { level: label.toUpperCase() }
      },
      bindings(_bindings: Record<string, unknown>) {
        return {}
      },
    },
    timestamp: false,
  },
  pino.destination({
    dest: process.stderr.fd,
    sync: true,
  })
)

// Export a function to create child loggers
export function createLogger(name: string) {
  return logger.child({ name })
}

export type Logger = ReturnType<typeof createLogger>

/**
 * Logs an error message and, at debug level, its stack trace
 */
export function logError(moduleLogger: Logger, message: string, err: unknown): void {
  const error = err instanceof Error ? err : new Error(String(err))
  moduleLogger.error(`${message}: ${error.message}`)
  if (error.stack) {
    moduleLogger.debug(`Stack trace: ${error.stack}`)
  }
}

// Export the logger as default
export default logger
