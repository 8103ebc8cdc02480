import type { RunContext, RunnerResult, RuntimeDescriptor, RuntimeKind } from "@fnpipe/core"
import type { ResourceList } from "@fnpipe/sdk"

/**
 * Runs the functions of one runtime kind
 */
export interface KindRunner<K extends RuntimeKind> {
  run(
    runtime: Extract<RuntimeDescriptor, { kind: K }>,
    request: ResourceList,
    context: RunContext
  ): Promise<RunnerResult>
}
