import { RunnerInvocationError } from "@fnpipe/core"
import type { FunctionRunner, RunContext, RunnerResult, RuntimeDescriptor, RuntimeKind } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import type { ResourceList } from "@fnpipe/sdk"

import { ContainerRunner } from "./container.ts"
import { ExecRunner } from "./exec.ts"
import { HttpRunner } from "./http.ts"
import { ModuleRunner } from "./module.ts"
import type { KindRunner } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("registry")

/**
 * The runner of each runtime kind; a missing entry means the kind is disabled
 */
export interface RunnerMap {
  container?: KindRunner<"container">
  exec?: KindRunner<"exec">
  module?: KindRunner<"module">
  http?: KindRunner<"http">
}

const RUNTIME_KINDS: readonly RuntimeKind[] = ["container", "exec", "module", "http"]

function missing(kind: RuntimeKind): RunnerInvocationError {
  return new RunnerInvocationError(`No runner is registered for ${kind} functions`)
}

/**
 * Dispatches each invocation to the runner registered for its runtime kind
 */
export class RuntimeRegistry implements FunctionRunner {
  private readonly runners: RunnerMap

  constructor(runners: RunnerMap) {
    this.runners = runners
    moduleLogger.debug(`Registered runners: ${[...this.enabledRuntimes()].join(", ")}`)
  }

  /** Kinds that can run; anything else is skipped at discovery */
  enabledRuntimes(): Set<RuntimeKind> {
    return new Set(RUNTIME_KINDS.filter(kind => this.runners[kind] !== undefined))
  }

  async run(runtime: RuntimeDescriptor, request: ResourceList, context: RunContext): Promise<RunnerResult> {
    const { container, exec, module, http } = this.runners
    switch (runtime.kind) {
      case "container":
        if (!container) throw missing(runtime.kind)
        return container.run(runtime, request, context)
      case "exec":
        if (!exec) throw missing(runtime.kind)
        return exec.run(runtime, request, context)
      case "module":
        if (!module) throw missing(runtime.kind)
        return module.run(runtime, request, context)
      case "http":
        if (!http) throw missing(runtime.kind)
        return http.run(runtime, request, context)
    }
  }
}

export interface RegistryOptions {
  containerRuntime?: string
  enableExec?: boolean
  enableModule?: boolean
}

/**
 * Registry with the container and http runners, plus exec and module when enabled
 */
export function createRegistry(options: RegistryOptions = {}): RuntimeRegistry {
  return new RuntimeRegistry({
    container: new ContainerRunner(options.containerRuntime),
    http: new HttpRunner(),
    exec: options.enableExec ? new ExecRunner() : undefined,
    module: options.enableModule ? new ModuleRunner() : undefined,
  })
}
