export * from "./src/registry.ts"
export * from "./src/container.ts"
export * from "./src/exec.ts"
export * from "./src/module.ts"
export * from "./src/http.ts"
export * from "./src/process.ts"
export type * from "./src/types.ts"
