import { isPipelineError, runPipeline } from "@fnpipe/core"
import type { ResourceStore, RunOutcome } from "@fnpipe/core"
import { CONTAINER_RUNTIMES, createLogger, loadConfig } from "@fnpipe/libs"
import { createRegistry } from "@fnpipe/runtime"
import { LocalPackageStore, ResultsDirectory } from "@fnpipe/store"
import { Command, Option } from "commander"

import { processLifecycle } from "../../libs/lifecycle.ts"
import type { Lifecycle } from "../../libs/lifecycle.ts"
import { parseSeconds } from "../../libs/options.ts"
import { StdoutStore } from "./stdout-store.ts"

// Create a logger for this module
const moduleLogger = createLogger("render")

export interface RenderOptions {
  resultsDir?: string
  output?: "stdout"
  timeout?: number
  enableExec?: boolean
  enableModule?: boolean
  globalScope?: boolean
  containerRuntime?: string
}

function logOutcome(outcome: RunOutcome): void {
  for (const resultSet of outcome.results) {
    moduleLogger.info(`[${resultSet.sequenceIndex}] ${resultSet.name}: ${resultSet.items.length} results`)
    for (const result of resultSet.items) {
      const where = result.resourceRef?.name ? ` (${result.resourceRef.kind}/${result.resourceRef.name})` : ""
      const line = `[${resultSet.sequenceIndex}] ${result.message}${where}`
      if (result.severity === "error") {
        moduleLogger.error(line)
      } else if (result.severity === "warn") {
        moduleLogger.warn(line)
      } else {
        moduleLogger.info(line)
      }
    }
  }
  for (const record of outcome.invocations) {
    moduleLogger.debug(`[${record.invocation.sequenceIndex}] ${record.invocation.name}: ${record.state}`)
  }
}

/**
 * Renders the package in dir and returns the exit code of the run
 */
export async function renderAction(
  dir: string,
  options: RenderOptions,
  lifecycle: Lifecycle = processLifecycle
): Promise<number> {
  const config = loadConfig()
  const registry = createRegistry({
    containerRuntime: options.containerRuntime ?? config.containerRuntime,
    enableExec: options.enableExec || config.enableExec,
    enableModule: options.enableModule || config.enableModule,
  })

  const packageStore = new LocalPackageStore(dir)
  const store: ResourceStore = options.output === "stdout" ? new StdoutStore(packageStore) : packageStore
  const resultsDir = options.resultsDir ?? config.resultsDir

  const running = runPipeline({
    store,
    results: resultsDir ? new ResultsDirectory(resultsDir) : undefined,
    runner: registry,
    enabledRuntimes: registry.enabledRuntimes(),
    rootDir: packageStore.rootDir,
    timeoutMs: options.timeout ? options.timeout * 1000 : config.functionTimeoutMs,
    signal: lifecycle.signal,
    globalScope: options.globalScope,
  })

  // a cancelled run writes nothing, but a write already under way has to finish
  lifecycle.onShutdown(async () => {
    moduleLogger.info("Waiting for the render to stop")
    await running.then(
      () => undefined,
      (err: unknown) => moduleLogger.debug(`Render failed while shutting down: ${err}`)
    )
  })

  const outcome = await running

  logOutcome(outcome)
  if (outcome.state === "aborted") {
    moduleLogger.error(`Render aborted: ${outcome.error?.message ?? "unknown error"}`)
  } else {
    moduleLogger.info(`Render completed with exit code ${outcome.exitCode}`)
  }
  return outcome.exitCode
}

/**
 * Register the render command with the CLI
 * @param program The Commander program instance
 */
export default function (program: Command): void {
  program
    .command("render")
    .description("Run the functions declared in a package and write the result back")
    .argument("[dir]", "Package directory", ".")
    .option("--results-dir <dir>", "Write function results to this directory")
    .addOption(
      new Option("--output <target>", "Print the rendered resources instead of writing the package").choices([
        "stdout",
      ])
    )
    .option("--timeout <seconds>", "Timeout of each function", parseSeconds)
    .option("--enable-exec", "Allow functions that run host executables")
    .option("--enable-module", "Allow functions loaded as JS/TS modules into this process")
    .option("--global-scope", "Let every function see the whole package")
    .addOption(
      new Option("--container-runtime <binary>", "Container runtime binary").choices(CONTAINER_RUNTIMES)
    )
    .action(async (dir: string, options: RenderOptions) => {
      try {
        process.exitCode = await renderAction(dir, options)
      } catch (err) {
        if (isPipelineError(err)) {
          moduleLogger.error(`${err.code}: ${err.message}`)
        } else {
          moduleLogger.error(`Error running render command: ${err}`)
        }
        process.exit(1)
      }
    })
}
