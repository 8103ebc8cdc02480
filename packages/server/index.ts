export { createApp, createServer, shutdownServer } from "./src/server.ts"
export type { FunctionServerOptions } from "./src/server.ts"
