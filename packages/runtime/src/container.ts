import { execFile } from "child_process"
import { promisify } from "util"

import { decodeResourceList, encodeResourceList } from "@fnpipe/core"
import type { ContainerMount, ContainerRuntime, RunContext, RunnerResult } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import type { ResourceList } from "@fnpipe/sdk"
import { v4 as uuidv4 } from "uuid"

import { runProcess } from "./process.ts"
import type { KindRunner } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("container")

const execFileAsync = promisify(execFile)

function mountArg(mount: ContainerMount): string {
  const parts = [`type=${mount.type}`]
  if (mount.type !== "tmpfs") {
    parts.push(`source=${mount.src}`)
  }
  parts.push(`target=${mount.dst}`)
  if (!mount.rw) {
    parts.push("readonly")
  }
  return parts.join(",")
}

/**
 * Arguments of `<runtime> run` for a function container. Networking is off
 * unless the declaration asks for it.
 */
export function buildContainerArgs(runtime: ContainerRuntime, containerName: string): string[] {
  const args = ["run", "--rm", "-i", "--name", containerName, "--security-opt", "no-new-privileges"]
  if (!runtime.network) {
    args.push("--network", "none")
  }
  for (const entry of runtime.env) {
    args.push("-e", entry)
  }
  for (const mount of runtime.mounts) {
    args.push("--mount", mountArg(mount))
  }
  args.push(runtime.image)
  return args
}

export class ContainerRunner implements KindRunner<"container"> {
  private readonly binary: string

  /**
   * @param binary Container runtime CLI, docker or podman
   */
  constructor(binary = "docker") {
    this.binary = binary
  }

  async run(
    runtime: ContainerRuntime,
    request: ResourceList,
    context: RunContext
  ): Promise<RunnerResult> {
    const containerName = `fnpipe-${uuidv4()}`
    moduleLogger.debug(`Starting container ${containerName} from ${runtime.image}`)

    const { exitCode, stdout, stderr } = await runProcess(
      this.binary,
      buildContainerArgs(runtime, containerName),
      {
        cwd: context.workDir,
        input: encodeResourceList(request),
        timeoutMs: context.timeoutMs,
        signal: context.signal,
        onTerminate: () => this.remove(containerName),
      }
    )

    const decoded = decodeResourceList(stdout)
    return {
      response: decoded.ok ? decoded.value : decoded,
      exitCode,
      diagnostics: stderr,
    }
  }

  // killing the CLI client does not always stop the container itself
  private async remove(containerName: string): Promise<void> {
    await execFileAsync(this.binary, ["rm", "-f", containerName])
    moduleLogger.debug(`Removed container ${containerName}`)
  }
}
