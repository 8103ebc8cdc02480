/**
 * Runtime configuration read from the environment. CLI flags override
 * these values where both exist.
 */
export interface FnpipeConfig {
  /** Binary used to start function containers (docker or podman) */
  containerRuntime: string
  /** Per-invocation timeout, in milliseconds */
  functionTimeoutMs: number
  /** Allow `exec` declarations, which run host executables */
  enableExec: boolean
  /** Allow `module` declarations, which load code into this process */
  enableModule: boolean
  /** Where result sets are written, when set */
  resultsDir?: string
}

const DEFAULT_TIMEOUT_SECONDS = 300
export const CONTAINER_RUNTIMES = ["docker", "podman"]

type Env = Record<string, string | undefined>

function readBoolean(env: Env, name: string): boolean {
  const raw = env[name]
  if (raw === undefined || raw === "") {
    return false
  }
  switch (raw.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true
    case "0":
    case "false":
    case "no":
      return false
    default:
      throw new Error(`Invalid boolean for ${name}: ${raw}`)
  }
}

function readSeconds(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw === "") {
    return fallback * 1000
  }
  const seconds = Number(raw)
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid number of seconds for ${name}: ${raw}`)
  }
  return seconds * 1000
}

/**
 * Loads the configuration from environment variables
 * @param env The environment to read, process.env by default
 */
export function loadConfig(env: Env = process.env): FnpipeConfig {
  const containerRuntime = env.FNPIPE_CONTAINER_RUNTIME || "docker"
  if (!CONTAINER_RUNTIMES.includes(containerRuntime)) {
    throw new Error(
      `Invalid FNPIPE_CONTAINER_RUNTIME: ${containerRuntime} (expected one of ${CONTAINER_RUNTIMES.join(", ")})`
    )
  }

  return {
    containerRuntime,
    functionTimeoutMs: readSeconds(env, "FNPIPE_FN_TIMEOUT", DEFAULT_TIMEOUT_SECONDS),
    enableExec: readBoolean(env, "FNPIPE_ENABLE_EXEC"),
    enableModule: readBoolean(env, "FNPIPE_ENABLE_MODULE"),
    resultsDir: env.FNPIPE_RESULTS_DIR || undefined,
  }
}
