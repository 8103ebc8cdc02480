import type { Resource, ResourceList, ResultSet } from "@fnpipe/sdk"

import type { PipelineError } from "./errors.ts"

export interface ContainerMount {
  type: "bind" | "volume" | "tmpfs"
  src: string
  dst: string
  rw: boolean
}

export interface ContainerRuntime {
  kind: "container"
  image: string
  network: boolean
  env: string[]
  mounts: ContainerMount[]
}

export interface ExecRuntime {
  kind: "exec"
  path: string
  args: string[]
  env: string[]
}

export interface ModuleRuntime {
  kind: "module"
  path: string
  exportName: string
}

export interface HttpRuntime {
  kind: "http"
  url: string
}

/**
 * How a function is executed. Closed set: adding a runtime means adding a
 * variant here, a parser in declaration.ts and a runner.
 */
export type RuntimeDescriptor = ContainerRuntime | ExecRuntime | ModuleRuntime | HttpRuntime

export type RuntimeKind = RuntimeDescriptor["kind"]

export interface FunctionDeclaration {
  runtime: RuntimeDescriptor
  deferFailure: boolean
  /** Frozen copy of the declaring resource, passed as functionConfig */
  source: Readonly<Resource>
}

export interface FunctionInvocation {
  declaration: FunctionDeclaration
  /** Directory of the declaring resource; undefined when it has no path */
  anchorLocation: string | undefined
  sequenceIndex: number
  name: string
}

export type ExecutionPlan = readonly FunctionInvocation[]

export interface ParseFailure {
  ok: false
  reason: string
}

export interface RunContext {
  /** Absolute directory the invocation is anchored at */
  workDir: string
  timeoutMs?: number
  signal?: AbortSignal
}

export interface RunnerResult {
  response: ResourceList | ParseFailure
  exitCode: number
  diagnostics: string
}

/**
 * Executes one function invocation out of band. Implementations keep no
 * state between calls and never retain the request.
 */
export interface FunctionRunner {
  run(runtime: RuntimeDescriptor, request: ResourceList, context: RunContext): Promise<RunnerResult>
}

/**
 * Loads a package into memory and persists it back
 */
export interface ResourceStore {
  read(): Promise<Resource[]>
  write(items: Resource[]): Promise<void>
}

export type InvocationState = "pending" | "running" | "succeeded" | "failed" | "deferred"

export type RunState = "running" | "committed" | "aborted"

export interface InvocationRecord {
  invocation: FunctionInvocation
  state: InvocationState
  exitCode?: number
  diagnostics?: string
  error?: PipelineError
}

export interface RunOutcome {
  state: Exclude<RunState, "running">
  items: Resource[]
  results: ResultSet[]
  invocations: InvocationRecord[]
  exitCode: number
  error?: PipelineError
}

export function isParseFailure(response: RunnerResult["response"]): response is ParseFailure {
  return "ok" in response && response.ok === false
}
