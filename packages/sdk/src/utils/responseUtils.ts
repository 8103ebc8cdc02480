import { RESOURCE_LIST_API_VERSION, RESOURCE_LIST_KIND } from "../annotations.ts"
import type { FunctionResult, Resource, ResourceList, Severity } from "../types.ts"
import { getIdentity, identityKey } from "./resourceUtils.ts"

/**
 * Builds the ResourceList a function returns. Starts from the items the
 * function received so that untouched resources flow through unchanged.
 */
export class FunctionResponse {
  items: Resource[]
  results: FunctionResult[]

  constructor(input: ResourceList) {
    this.items = [...input.items]
    this.results = []
  }

  /**
   * Replaces the resource with the same identity key, or appends it
   */
  upsert(resource: Resource): void {
    const key = identityKey(resource)
    const position = this.items.findIndex(item => identityKey(item) === key)
    if (position === -1) {
      this.items.push(resource)
    } else {
      this.items[position] = resource
    }
  }

  remove(predicate: (resource: Resource) => boolean): void {
    this.items = this.items.filter(item => !predicate(item))
  }

  addResult(severity: Severity, message: string, resource?: Resource): void {
    const result: FunctionResult = { severity, message }
    if (resource) {
      result.resourceRef = getIdentity(resource)
    }
    this.results.push(result)
  }

  hasErrors(): boolean {
    return this.results.some(result => result.severity === "error")
  }

  toResourceList(): ResourceList {
    const list: ResourceList = {
      apiVersion: RESOURCE_LIST_API_VERSION,
      kind: RESOURCE_LIST_KIND,
      items: this.items,
    }
    if (this.results.length > 0) {
      list.results = this.results
    }
    return list
  }
}
