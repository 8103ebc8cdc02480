import { createLogger } from "@fnpipe/libs"
import type { ResultSet } from "@fnpipe/sdk"

import { discover } from "./discover.ts"
import type { DiscoverOptions } from "./discover.ts"
import { PersistenceError } from "./errors.ts"
import { PipelineExecutor } from "./executor.ts"
import type { ExecutorOptions } from "./executor.ts"
import type { ResourceStore, RunOutcome } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("pipeline")

/**
 * Destination for result sets, written once per run
 */
export interface ResultsSink {
  writeResults(resultSets: ResultSet[]): Promise<void>
}

export interface PipelineOptions extends ExecutorOptions, DiscoverOptions {
  store: ResourceStore
  results?: ResultsSink
}

/**
 * Reads the package, runs every declared function and, when the run commits,
 * writes the package back. Result sets are written whether the run commits
 * or aborts.
 * @throws DeclarationParseError before anything runs
 * @throws PersistenceError when the package or the results cannot be written
 */
export async function runPipeline(options: PipelineOptions): Promise<RunOutcome> {
  const { store, results } = options

  const items = await store.read()
  moduleLogger.debug(`Read ${items.length} resources`)

  const plan = discover(items, options)
  const outcome = await new PipelineExecutor(options).execute(items, plan)

  if (outcome.state === "committed") {
    try {
      await store.write(outcome.items)
    } catch (err) {
      throw err instanceof PersistenceError
        ? err
        : new PersistenceError(
            `Failed to write resources: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err }
          )
    }
    moduleLogger.info(`Wrote ${outcome.items.length} resources`)
  } else {
    moduleLogger.warn("Run aborted, resources were not written")
  }

  if (results && outcome.results.length > 0) {
    try {
      await results.writeResults(outcome.results)
    } catch (err) {
      throw err instanceof PersistenceError
        ? err
        : new PersistenceError(
            `Failed to write results: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err }
          )
    }
  }

  return outcome
}
