export { logger, createLogger, logError } from "./logger.ts"
export type { Logger } from "./logger.ts"
export { CONTAINER_RUNTIMES, loadConfig } from "./config.ts"
export type { FnpipeConfig } from "./config.ts"
