import { spawn } from "child_process"

import { RunnerInvocationError } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"

// Create a logger for this module
const moduleLogger = createLogger("process")

export interface ProcessOptions {
  cwd: string
  env?: NodeJS.ProcessEnv
  /** Written to the child's stdin, which is then closed */
  input: string
  timeoutMs?: number
  signal?: AbortSignal
  /** Extra cleanup once the child has been killed (timeout or cancellation) */
  onTerminate?: () => Promise<void>
}

export interface ProcessResult {
  exitCode: number
  stdout: string
  stderr: string
}

/**
 * Runs a command, feeding it input on stdin and collecting stdout and stderr.
 * Resolves with the exit code whatever it is; rejects with a
 * RunnerInvocationError when the command cannot start, times out or is
 * cancelled.
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: ProcessOptions
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new RunnerInvocationError(`${command} was cancelled before it started`))
      return
    }

    moduleLogger.debug(`Spawning ${command} ${args.join(" ")}`)
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env,
      stdio: ["pipe", "pipe", "pipe"],
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let terminatedReason: string | undefined
    let settled = false
    let timeoutId: NodeJS.Timeout | null = null

    const cleanup = () => {
      if (timeoutId) {
        clearTimeout(timeoutId)
        timeoutId = null
      }
      options.signal?.removeEventListener("abort", onAbort)
    }

    const terminate = (reason: string) => {
      if (terminatedReason) {
        return
      }
      terminatedReason = reason
      moduleLogger.warn(`Terminating ${command}: ${reason}`)
      child.kill("SIGKILL")
      if (options.onTerminate) {
        options.onTerminate().catch(err => {
          moduleLogger.warn(`Cleanup after terminating ${command} failed: ${err}`)
        })
      }
    }

    function onAbort() {
      terminate("cancelled")
    }

    options.signal?.addEventListener("abort", onAbort, { once: true })
    if (options.timeoutMs) {
      const timeoutMs = options.timeoutMs
      timeoutId = setTimeout(() => {
        terminate(`timed out after ${timeoutMs / 1000} seconds`)
      }, timeoutMs)
    }

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk))

    child.on("error", err => {
      if (settled) return
      settled = true
      cleanup()
      reject(new RunnerInvocationError(`Failed to start ${command}: ${err.message}`, { cause: err }))
    })

    child.on("close", (code, signal) => {
      if (settled) return
      settled = true
      cleanup()
      if (terminatedReason) {
        reject(new RunnerInvocationError(`${command} ${terminatedReason}`))
        return
      }
      resolve({
        // a child killed by a signal reports no code
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      })
    })

    // the child may exit without reading its input
    child.stdin.on("error", err => {
      moduleLogger.debug(`stdin of ${command} closed early: ${err.message}`)
    })
    child.stdin.end(options.input)
  })
}

/**
 * Environment for a child: the host environment plus KEY=value entries.
 * A bare KEY keeps the host value.
 */
export function buildEnv(entries: readonly string[], base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base }
  for (const entry of entries) {
    const separator = entry.indexOf("=")
    if (separator > 0) {
      env[entry.slice(0, separator)] = entry.slice(separator + 1)
    }
  }
  return env
}
