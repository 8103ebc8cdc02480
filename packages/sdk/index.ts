// Re-export logger from @fnpipe/libs
export { logger, createLogger } from "@fnpipe/libs"

// Export types
export type * from "./src/types.ts"

export * from "./src/annotations.ts"
export * from "./src/utils/resourceUtils.ts"
export * from "./src/utils/responseUtils.ts"
