import path from "path"
import { pathToFileURL } from "url"

import { RunnerInvocationError, hasErrorResults, validateResourceList } from "@fnpipe/core"
import type { ModuleRuntime, RunContext, RunnerResult } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import type { ConfigFunction, ResourceList } from "@fnpipe/sdk"

import type { KindRunner } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("module")

// Used when the caller sets no timeout
const DEFAULT_EXECUTION_TIMEOUT = 25000

/**
 * Error information from running a module function
 */
export interface ModuleError {
  /** 408 timed out, 400 import failed, 422 the function threw, 500 anything else */
  code: number
  message: string
  stack?: string
}

export interface ModuleExecution {
  result?: ResourceList
  error?: ModuleError
}

function isConfigFunction(value: unknown): value is ConfigFunction {
  return typeof value === "function"
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Imports a module and calls one of its exports with a copy of the input
 * @param codeFilePath Absolute path of the module
 * @param exportName Export to call, "default" for the default export
 * @param input The ResourceList handed to the function
 * @param timeoutMs How long the function may run
 * @param signal Stops waiting for the function when aborted
 */
export async function executeModule(
  codeFilePath: string,
  exportName: string,
  input: ResourceList,
  timeoutMs: number = DEFAULT_EXECUTION_TIMEOUT,
  signal?: AbortSignal
): Promise<ModuleExecution> {
  let timeoutId: NodeJS.Timeout | null = null
  let onAbort: (() => void) | null = null

  try {
    // Create a promise that rejects after the timeout or on cancellation
    const interruptPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        reject(new Error(`Function execution timed out after ${timeoutMs / 1000} seconds`))
      }, timeoutMs)
      onAbort = () => reject(new Error("Function execution was cancelled"))
      signal?.addEventListener("abort", onAbort, { once: true })
    })

    const executionPromise = (async () => {
      moduleLogger.debug(`Importing module from file: ${codeFilePath}`)

      let loaded: unknown
      try {
        loaded = await import(pathToFileURL(codeFilePath).href)
      } catch (importErr) {
        const error = toError(importErr)
        moduleLogger.error(`Error importing module: ${error.message}`)
        if (error.stack) {
          moduleLogger.debug(`Import error stack trace: ${error.stack}`)
        }
        throw new Error(`Module import failed: ${error.message}`)
      }

      const candidate: unknown =
        loaded !== null && typeof loaded === "object" ? Reflect.get(loaded, exportName) : undefined
      if (!isConfigFunction(candidate)) {
        throw new Error(`Module import failed: ${codeFilePath} does not export a function named ${exportName}`)
      }

      moduleLogger.debug(`Executing exported function ${exportName}`)

      let output: unknown
      try {
        output = await candidate(structuredClone(input))
        moduleLogger.debug("Function execution completed")
      } catch (execErr) {
        const error = toError(execErr)
        moduleLogger.error(`Error during function execution: ${error.message}`)
        if (error.stack) {
          moduleLogger.debug(`Execution error stack trace: ${error.stack}`)
        }
        throw new Error(`Function execution error: ${error.message}`)
      }

      // the function's objects stay with the function
      let copy: unknown
      try {
        copy = structuredClone(output)
      } catch (cloneErr) {
        throw new Error(`Function returned a value that cannot be copied: ${toError(cloneErr).message}`)
      }
      const validated = validateResourceList(copy)
      if (!validated.ok) {
        throw new Error(`Function returned an invalid ResourceList: ${validated.reason}`)
      }
      return { result: validated.value }
    })()

    // Race the execution against the timeout
    return await Promise.race([executionPromise, interruptPromise])
  } catch (err: unknown) {
    const error = toError(err)
    moduleLogger.error(`Error executing function: ${error.message}`)
    if (error.stack) {
      moduleLogger.debug(`Stack trace: ${error.stack}`)
    }

    // Categorize the error
    let errorCode = 500
    if (error.message.includes("timed out")) {
      errorCode = 408 // Request Timeout
    } else if (error.message.includes("Module import failed")) {
      errorCode = 400 // Bad Request - code issue
    } else if (error.message.includes("Function execution error")) {
      errorCode = 422 // Unprocessable Entity - runtime error in user code
    }

    return {
      error: {
        code: errorCode,
        message: error.message || "Unknown error",
        stack: error.stack,
      },
    }
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId)
    }
    if (onAbort) {
      signal?.removeEventListener("abort", onAbort)
    }
  }
}

/**
 * Maps a module execution to the runner contract: the function throwing or
 * returning error results is a nonzero exit; a module that cannot be
 * imported, or a timeout, is an invocation error
 */
export function toRunnerResult(name: string, execution: ModuleExecution): RunnerResult {
  const { result, error } = execution
  if (result) {
    return { response: result, exitCode: hasErrorResults(result) ? 1 : 0, diagnostics: "" }
  }
  if (!error) {
    throw new RunnerInvocationError(`Function ${name} returned nothing`)
  }
  if (error.code === 408 || error.code === 400) {
    throw new RunnerInvocationError(error.message)
  }
  return {
    response: { ok: false, reason: error.message },
    exitCode: 1,
    diagnostics: error.stack ?? error.message,
  }
}

/**
 * Runs functions written as JS/TS modules inside this process. Modules are
 * cached by the module loader, so module-level state survives between calls.
 */
export class ModuleRunner implements KindRunner<"module"> {
  async run(runtime: ModuleRuntime, request: ResourceList, context: RunContext): Promise<RunnerResult> {
    const codeFilePath = path.resolve(context.workDir, runtime.path)
    const execution = await executeModule(
      codeFilePath,
      runtime.exportName,
      request,
      context.timeoutMs,
      context.signal
    )
    return toRunnerResult(runtime.path, execution)
  }
}
