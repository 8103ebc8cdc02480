import { encodeResourceList } from "@fnpipe/core"
import type { ResourceStore } from "@fnpipe/core"
import type { Resource } from "@fnpipe/sdk"

/**
 * Reads from another store and prints the rendered ResourceList to stdout
 * instead of writing it back
 */
export class StdoutStore implements ResourceStore {
  private readonly source: ResourceStore
  private readonly out: NodeJS.WritableStream

  constructor(source: ResourceStore, out: NodeJS.WritableStream = process.stdout) {
    this.source = source
    this.out = out
  }

  read(): Promise<Resource[]> {
    return this.source.read()
  }

  async write(items: Resource[]): Promise<void> {
    this.out.write(encodeResourceList({ items }))
  }
}
