import path from "path"

import { PersistenceError } from "@fnpipe/core"
import type { ResultsSink } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import { RESOURCE_LIST_API_VERSION, RESULT_LIST_KIND } from "@fnpipe/sdk"
import type { ResultSet } from "@fnpipe/sdk"
import fs from "fs-extra"
import YAML from "yaml"

// Create a logger for this module
const moduleLogger = createLogger("results")

export function resultFileName(resultSet: ResultSet): string {
  return `results-${resultSet.sequenceIndex}.yaml`
}

export function serializeResultSet(resultSet: ResultSet): string {
  return YAML.stringify({
    apiVersion: RESOURCE_LIST_API_VERSION,
    kind: RESULT_LIST_KIND,
    metadata: { name: resultSet.name },
    sequenceIndex: resultSet.sequenceIndex,
    items: resultSet.items,
  })
}

/**
 * Writes each result set to its own file in a directory
 */
export class ResultsDirectory implements ResultsSink {
  readonly dir: string

  constructor(dir: string) {
    this.dir = path.resolve(dir)
  }

  async writeResults(resultSets: ResultSet[]): Promise<void> {
    try {
      await fs.ensureDir(this.dir)
      for (const resultSet of resultSets) {
        const target = path.join(this.dir, resultFileName(resultSet))
        await fs.writeFile(target, serializeResultSet(resultSet))
        moduleLogger.debug(`Wrote results of ${resultSet.name} to ${target}`)
      }
    } catch (err) {
      throw new PersistenceError(
        `Failed to write results to ${this.dir}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      )
    }
    moduleLogger.info(`Wrote ${resultSets.length} result sets to ${this.dir}`)
  }
}
