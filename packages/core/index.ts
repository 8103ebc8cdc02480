export * from "./src/errors.ts"
export * from "./src/schema.ts"
export * from "./src/wire.ts"
export * from "./src/declaration.ts"
export * from "./src/scope.ts"
export * from "./src/discover.ts"
export * from "./src/reconcile.ts"
export * from "./src/results.ts"
export * from "./src/executor.ts"
export * from "./src/pipeline.ts"
export * from "./src/types.ts"
