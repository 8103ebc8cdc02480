export * from "./src/local.ts"
export * from "./src/memory.ts"
export * from "./src/results.ts"
