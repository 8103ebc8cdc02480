import path from "path"

import { decodeResourceList, encodeResourceList } from "@fnpipe/core"
import type { ExecRuntime, RunContext, RunnerResult } from "@fnpipe/core"
import type { ResourceList } from "@fnpipe/sdk"

import { buildEnv, runProcess } from "./process.ts"
import type { KindRunner } from "./types.ts"

/**
 * Paths containing a separator resolve against the work directory; bare
 * names are looked up on PATH
 */
export function resolveExecutable(executable: string, workDir: string): string {
  if (path.isAbsolute(executable) || !/[\\/]/.test(executable)) {
    return executable
  }
  return path.resolve(workDir, executable)
}

/**
 * Runs a host executable speaking the ResourceList protocol on stdin/stdout
 */
export class ExecRunner implements KindRunner<"exec"> {
  async run(runtime: ExecRuntime, request: ResourceList, context: RunContext): Promise<RunnerResult> {
    const { exitCode, stdout, stderr } = await runProcess(
      resolveExecutable(runtime.path, context.workDir),
      runtime.args,
      {
        cwd: context.workDir,
        env: buildEnv(runtime.env),
        input: encodeResourceList(request),
        timeoutMs: context.timeoutMs,
        signal: context.signal,
      }
    )

    const decoded = decodeResourceList(stdout)
    return {
      response: decoded.ok ? decoded.value : decoded,
      exitCode,
      diagnostics: stderr,
    }
  }
}
