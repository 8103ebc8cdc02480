import path from "path"

import { PersistenceError, narrowIntegers, parseResource } from "@fnpipe/core"
import type { ResourceStore } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import { getIndex, getPath, normalizePath, setProvenance, stripProvenance } from "@fnpipe/sdk"
import type { Resource } from "@fnpipe/sdk"
import fs from "fs-extra"
import YAML from "yaml"

// Create a logger for this module
const moduleLogger = createLogger("store")

const RESOURCE_FILE = /\.ya?ml$/i
const SKIPPED_DIRECTORIES = new Set(["node_modules"])

/**
 * Parses a multi-document YAML file into resources, skipping empty documents
 * @param relativePath Path recorded as the resources' provenance
 */
export function parseResourceFile(content: string, relativePath: string): Resource[] {
  const resources: Resource[] = []
  const documents = YAML.parseAllDocuments(content, { intAsBigInt: true })
  documents.forEach((document, index) => {
    if (document.errors.length > 0) {
      throw new Error(`${relativePath}: invalid YAML in document ${index}: ${document.errors[0].message}`)
    }
    const value = narrowIntegers(document.toJS())
    if (value === null || value === undefined) {
      return
    }
    const parsed = parseResource(value)
    if (!parsed.ok) {
      throw new Error(`${relativePath}: document ${index} is not a resource: ${parsed.reason}`)
    }
    setProvenance(parsed.value, relativePath, index)
    resources.push(parsed.value)
  })
  return resources
}

/**
 * Serializes the documents of one file, ordered by index, without provenance
 */
export function serializeResourceFile(resources: readonly Resource[]): string {
  return resources
    .map((resource, position) => ({ resource, position, index: getIndex(resource) }))
    .sort((a, b) => (a.index ?? Infinity) - (b.index ?? Infinity) || a.position - b.position)
    .map(({ resource }) => YAML.stringify(stripProvenance(resource), { aliasDuplicateObjects: false }))
    .join("---\n")
}

/**
 * Stores a package as a directory tree of YAML files. Only files whose
 * documents changed are rewritten, so untouched files keep their formatting
 * and comments.
 */
export class LocalPackageStore implements ResourceStore {
  readonly rootDir: string
  // serialized content of each file as last read or written
  private snapshot = new Map<string, string>()

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir)
  }

  async read(): Promise<Resource[]> {
    if (!(await fs.pathExists(this.rootDir))) {
      throw new Error(`Package directory not found: ${this.rootDir}`)
    }
    const files = await this.listFiles(this.rootDir)
    const resources: Resource[] = []
    this.snapshot = new Map()

    for (const file of files) {
      const relativePath = normalizePath(path.relative(this.rootDir, file))
      const content = await fs.readFile(file, { encoding: "utf8" })
      const fileResources = parseResourceFile(content, relativePath)
      if (fileResources.length > 0) {
        this.snapshot.set(relativePath, serializeResourceFile(fileResources))
      }
      resources.push(...fileResources)
    }

    moduleLogger.debug(`Read ${resources.length} resources from ${files.length} files in ${this.rootDir}`)
    return resources
  }

  async write(items: Resource[]): Promise<void> {
    const byFile = new Map<string, Resource[]>()
    for (const item of items) {
      const filePath = getPath(item)
      if (filePath === undefined) {
        throw new PersistenceError(`Resource ${item.kind}/${item.metadata?.name ?? ""} has no path`)
      }
      const relativePath = normalizePath(filePath)
      const group = byFile.get(relativePath)
      if (group) {
        group.push(item)
      } else {
        byFile.set(relativePath, [item])
      }
    }

    try {
      for (const [relativePath, resources] of byFile) {
        const target = this.resolveInside(relativePath)
        const content = serializeResourceFile(resources)
        if (this.snapshot.get(relativePath) === content) {
          continue
        }
        await fs.outputFile(target, content)
        moduleLogger.info(`Wrote ${relativePath}`)
      }

      for (const relativePath of this.snapshot.keys()) {
        if (!byFile.has(relativePath)) {
          await fs.remove(this.resolveInside(relativePath))
          moduleLogger.info(`Removed ${relativePath}`)
        }
      }
    } catch (err) {
      if (err instanceof PersistenceError) {
        throw err
      }
      throw new PersistenceError(
        `Failed to write package ${this.rootDir}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      )
    }

    this.snapshot = new Map(
      [...byFile].map(([file, resources]): [string, string] => [file, serializeResourceFile(resources)])
    )
  }

  private resolveInside(relativePath: string): string {
    const target = path.resolve(this.rootDir, relativePath)
    if (target !== this.rootDir && !target.startsWith(`${this.rootDir}${path.sep}`)) {
      throw new PersistenceError(`Refusing to write outside the package: ${relativePath}`)
    }
    return target
  }

  private async listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true })
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    const files: string[] = []
    for (const entry of entries) {
      if (entry.name.startsWith(".") || SKIPPED_DIRECTORIES.has(entry.name)) {
        continue
      }
      const fullPath = path.join(dir, entry.name)
      if (entry.isDirectory()) {
        files.push(...(await this.listFiles(fullPath)))
      } else if (entry.isFile() && RESOURCE_FILE.test(entry.name)) {
        files.push(fullPath)
      }
    }
    return files
  }
}
