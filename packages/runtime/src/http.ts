import { RunnerInvocationError, validateResourceList } from "@fnpipe/core"
import type { HttpRuntime, RunContext, RunnerResult } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import type { ResourceList } from "@fnpipe/sdk"
import { z } from "zod"

import type { KindRunner } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("http")

/**
 * Body a function server answers POST /execute with
 */
export const executeResponseSchema = z.object({
  resourceList: z.unknown().optional(),
  exitCode: z.number().int(),
  diagnostics: z.string().default(""),
})

export type ExecuteResponse = z.infer<typeof executeResponseSchema>

/**
 * Calls a function served over HTTP (see @fnpipe/server)
 */
export class HttpRunner implements KindRunner<"http"> {
  async run(runtime: HttpRuntime, request: ResourceList, context: RunContext): Promise<RunnerResult> {
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = context.timeoutMs
      ? setTimeout(() => {
          timedOut = true
          controller.abort()
        }, context.timeoutMs)
      : null
    const onAbort = () => controller.abort()
    context.signal?.addEventListener("abort", onAbort, { once: true })

    const timeoutError = () =>
      new RunnerInvocationError(`${runtime.url} timed out after ${(context.timeoutMs ?? 0) / 1000} seconds`)

    try {
      let body: string
      try {
        body = JSON.stringify(request)
      } catch (err) {
        throw new RunnerInvocationError(
          `Cannot send the resources to ${runtime.url} as JSON: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        )
      }

      moduleLogger.debug(`POST ${runtime.url}`)
      let response: Response
      try {
        response = await fetch(runtime.url, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body,
          signal: controller.signal,
        })
      } catch (err) {
        if (timedOut) {
          throw timeoutError()
        }
        throw new RunnerInvocationError(
          `Failed to call ${runtime.url}: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        )
      }

      if (!response.ok) {
        throw new RunnerInvocationError(`${runtime.url} answered ${response.status} ${response.statusText}`)
      }

      let answer: unknown
      try {
        answer = await response.json()
      } catch (err) {
        if (timedOut) {
          throw timeoutError()
        }
        throw new RunnerInvocationError(
          `${runtime.url} answered with a body that is not JSON: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        )
      }

      const parsed = executeResponseSchema.safeParse(answer)
      if (!parsed.success) {
        throw new RunnerInvocationError(`${runtime.url} answered with an unexpected body`)
      }

      const { resourceList, exitCode, diagnostics } = parsed.data
      if (resourceList === undefined) {
        return { response: { ok: false, reason: "no resourceList in response" }, exitCode, diagnostics }
      }
      const validated = validateResourceList(resourceList)
      return {
        response: validated.ok ? validated.value : validated,
        exitCode,
        diagnostics,
      }
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId)
      }
      context.signal?.removeEventListener("abort", onAbort)
    }
  }
}
