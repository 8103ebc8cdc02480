import type { FunctionResult, ResourceList, ResultSet, Severity } from "@fnpipe/sdk"

import { flattenResults } from "./schema.ts"

const SEVERITY_RANK: Record<Severity, number> = { info: 1, warn: 2, error: 3 }

/**
 * Highest severity among the results, undefined when there are none
 */
export function maxSeverity(results: Iterable<FunctionResult>): Severity | undefined {
  let highest: Severity | undefined
  for (const result of results) {
    if (!highest || SEVERITY_RANK[result.severity] > SEVERITY_RANK[highest]) {
      highest = result.severity
    }
  }
  return highest
}

/**
 * Collects the result sets of a run and decides its exit status. The only
 * writer of the final status.
 */
export class ResultAggregator {
  private readonly sets: ResultSet[] = []
  private deferred = 0
  private aborted = false

  record(resultSet: ResultSet): void {
    this.sets.push({ ...resultSet, items: [...resultSet.items] })
  }

  markDeferred(): void {
    this.deferred++
  }

  markAborted(): void {
    this.aborted = true
  }

  get deferredCount(): number {
    return this.deferred
  }

  get isAborted(): boolean {
    return this.aborted
  }

  severity(): Severity | undefined {
    return maxSeverity(this.sets.flatMap(set => set.items))
  }

  /**
   * 1 when any result is an error, any invocation was deferred, or the run
   * was aborted; 0 otherwise
   */
  finalStatus(): number {
    if (this.aborted || this.deferred > 0 || this.severity() === "error") {
      return 1
    }
    return 0
  }

  /** Result sets in invocation order */
  resultSets(): ResultSet[] {
    return this.sets.map(set => ({ ...set, items: [...set.items] }))
  }
}

/**
 * True when a function's own results include an error
 */
export function hasErrorResults(list: ResourceList): boolean {
  return flattenResults(list.results).some(result => result.severity === "error")
}
