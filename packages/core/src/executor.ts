import path from "path"

import { createLogger, logError } from "@fnpipe/libs"
import { RESOURCE_LIST_API_VERSION, RESOURCE_LIST_KIND, getPath } from "@fnpipe/sdk"
import type { FunctionResult, Resource, ResourceList } from "@fnpipe/sdk"

import {
  PipelineCancelledError,
  PipelineError,
  RunnerInvocationError,
  ScopeResolutionError,
  ValidationFailure,
} from "./errors.ts"
import { reconcile } from "./reconcile.ts"
import { ResultAggregator } from "./results.ts"
import { flattenResults } from "./schema.ts"
import { isOutsideScope, normalizeAnchor, resolveScope } from "./scope.ts"
import { isParseFailure } from "./types.ts"
import type {
  ExecutionPlan,
  FunctionInvocation,
  FunctionRunner,
  InvocationRecord,
  RunOutcome,
  RunnerResult,
} from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("executor")

export interface ExecutorOptions {
  runner: FunctionRunner
  /** Absolute package root; invocation work directories resolve against it */
  rootDir?: string
  /** Per-invocation timeout handed to the runner */
  timeoutMs?: number
  /** Aborts the whole run */
  signal?: AbortSignal
  /** Every function sees the whole package */
  globalScope?: boolean
}

// exit code reported when the runner could not produce one
const RUNNER_FAILURE_EXIT_CODE = 1

function failureResult(error: PipelineError): FunctionResult {
  return { severity: "error", message: error.message }
}

/**
 * Runs an execution plan over a resource collection, one invocation at a
 * time, each one seeing the output of the previous ones.
 */
export class PipelineExecutor {
  private readonly options: ExecutorOptions

  constructor(options: ExecutorOptions) {
    this.options = options
  }

  async execute(items: readonly Resource[], plan: ExecutionPlan): Promise<RunOutcome> {
    const { signal } = this.options
    const aggregator = new ResultAggregator()
    const records = plan.map((invocation): InvocationRecord => ({ invocation, state: "pending" }))
    let current: Resource[] = [...items]

    const abort = (record: InvocationRecord | undefined, error: PipelineError): RunOutcome => {
      aggregator.markAborted()
      if (record) {
        record.state = "failed"
        record.error = error
      }
      moduleLogger.error(`Pipeline aborted: ${error.message}`)
      return {
        state: "aborted",
        items: current,
        results: aggregator.resultSets(),
        invocations: records,
        exitCode: aggregator.finalStatus(),
        error,
      }
    }

    moduleLogger.info(`Running ${plan.length} functions over ${items.length} resources`)

    for (const record of records) {
      if (signal?.aborted) {
        return abort(undefined, new PipelineCancelledError())
      }

      const { invocation } = record
      const { declaration, name, sequenceIndex } = invocation

      let anchor: string
      let scope: ReturnType<typeof resolveScope>
      try {
        anchor = normalizeAnchor(invocation.anchorLocation)
        scope = resolveScope(current, anchor, { globalScope: this.options.globalScope })
      } catch (err) {
        if (err instanceof ScopeResolutionError) {
          return abort(record, err)
        }
        throw err
      }

      record.state = "running"
      moduleLogger.info(
        `[${sequenceIndex + 1}/${plan.length}] Running ${name} in ${anchor} over ${scope.scoped.length} resources`
      )

      const request: ResourceList = {
        apiVersion: RESOURCE_LIST_API_VERSION,
        kind: RESOURCE_LIST_KIND,
        items: structuredClone(scope.scoped.map(item => item.resource)),
        functionConfig: structuredClone(declaration.source),
      }

      let result: RunnerResult
      let runnerError: RunnerInvocationError | undefined
      try {
        result = await this.invoke(invocation, request, anchor)
      } catch (err) {
        if (signal?.aborted) {
          return abort(record, new PipelineCancelledError())
        }
        if (!(err instanceof RunnerInvocationError)) {
          logError(moduleLogger, `Unexpected error running ${name}`, err)
          throw err
        }
        runnerError = err
        result = {
          response: { ok: false, reason: err.message },
          exitCode: RUNNER_FAILURE_EXIT_CODE,
          diagnostics: err.message,
        }
      }

      if (signal?.aborted) {
        // the step finished, but a cancelled run never installs its output
        return abort(record, new PipelineCancelledError())
      }

      record.exitCode = result.exitCode
      record.diagnostics = result.diagnostics

      let response = isParseFailure(result.response) ? undefined : result.response
      const resultItems = response ? flattenResults(response.results) : []

      let scopeError: RunnerInvocationError | undefined
      if (response) {
        const outside = response.items.filter(item =>
          isOutsideScope(item, anchor, { globalScope: this.options.globalScope })
        )
        if (outside.length > 0) {
          const paths = [...new Set(outside.map(item => getPath(item) ?? ""))]
          scopeError = new RunnerInvocationError(
            `Function ${name} returned resources outside ${anchor}: ${paths.join(", ")}`
          )
          // none of its output is installed
          response = undefined
        }
      }

      const succeeded = result.exitCode === 0 && response !== undefined

      let failure: PipelineError | undefined
      if (!succeeded) {
        if (runnerError) {
          failure = runnerError
        } else if (scopeError) {
          failure = scopeError
        } else if (isParseFailure(result.response)) {
          const diagnostics = result.diagnostics.trim()
          failure = new RunnerInvocationError(
            `Function ${name} did not return a valid ResourceList (exit code ${result.exitCode}): ${result.response.reason}${diagnostics ? `; ${diagnostics}` : ""}`
          )
        } else {
          failure = new ValidationFailure(name, result.exitCode, result.diagnostics)
        }
        if (!resultItems.some(item => item.severity === "error")) {
          resultItems.push(failureResult(failure))
        }
      }

      aggregator.record({ name, sequenceIndex, items: resultItems })

      if (!failure) {
        record.state = "succeeded"
        current = reconcile(current, scope.scoped, response?.items ?? [], anchor)
        moduleLogger.debug(`${name} succeeded, collection now holds ${current.length} resources`)
        continue
      }

      if (!declaration.deferFailure) {
        return abort(record, failure)
      }

      record.state = "deferred"
      record.error = failure
      aggregator.markDeferred()
      if (response) {
        current = reconcile(current, scope.scoped, response.items, anchor)
        moduleLogger.warn(`${name} failed, continuing with its output: ${failure.message}`)
      } else {
        moduleLogger.warn(`${name} failed, continuing with its input unchanged: ${failure.message}`)
      }
    }

    const exitCode = aggregator.finalStatus()
    moduleLogger.info(
      `Pipeline committed with exit code ${exitCode}${aggregator.deferredCount > 0 ? ` (${aggregator.deferredCount} deferred failures)` : ""}`
    )
    return {
      state: "committed",
      items: current,
      results: aggregator.resultSets(),
      invocations: records,
      exitCode,
    }
  }

  private invoke(
    invocation: FunctionInvocation,
    request: ResourceList,
    anchor: string
  ): Promise<RunnerResult> {
    const { runner, rootDir, timeoutMs, signal } = this.options
    return runner.run(invocation.declaration.runtime, request, {
      workDir: path.resolve(rootDir ?? process.cwd(), anchor),
      timeoutMs,
      signal,
    })
  }
}
