import type { ResourceStore } from "@fnpipe/core"
import type { Resource } from "@fnpipe/sdk"

/**
 * Keeps a package in memory. Reads hand out copies; writes replace the
 * content and are counted.
 */
export class MemoryStore implements ResourceStore {
  private items: Resource[]
  writes = 0

  constructor(items: Resource[] = []) {
    this.items = structuredClone(items)
  }

  async read(): Promise<Resource[]> {
    return structuredClone(this.items)
  }

  async write(items: Resource[]): Promise<void> {
    this.items = structuredClone(items)
    this.writes++
  }

  get contents(): Resource[] {
    return structuredClone(this.items)
  }
}
