import path from "path"

import {
  INDEX_ANNOTATION,
  PATH_ANNOTATION,
  getIndex,
  getPath,
  identityKey,
  setAnnotation,
} from "@fnpipe/sdk"
import type { Resource } from "@fnpipe/sdk"

import type { ScopedItem } from "./scope.ts"

/**
 * Default file for a resource a function created without saying where it goes
 */
export function defaultPath(resource: Resource, anchor: string): string {
  const file = `${resource.kind.toLowerCase()}_${resource.metadata?.name ?? ""}.yaml`
  return anchor === "." ? file : path.posix.join(anchor, file)
}

interface Entry {
  key: string
  path: string
  resource: Resource
  consumed: boolean
}

// Later duplicates of the same (identity, path) replace earlier ones in place
function dedupe(response: readonly Resource[], anchor: string): Entry[] {
  const entries: Entry[] = []
  const seen = new Map<string, number>()

  for (const resource of response) {
    let filePath = getPath(resource)
    if (filePath === undefined) {
      filePath = defaultPath(resource, anchor)
      setAnnotation(resource, PATH_ANNOTATION, filePath)
    }
    const key = identityKey(resource)
    const slotKey = `${key}\u0000${filePath}`
    const existing = seen.get(slotKey)
    if (existing === undefined) {
      seen.set(slotKey, entries.length)
      entries.push({ key, path: filePath, resource, consumed: false })
    } else {
      entries[existing] = { key, path: filePath, resource, consumed: false }
    }
  }
  return entries
}

function takeMatch(candidates: Entry[] | undefined, filePath: string | undefined): Entry | undefined {
  if (!candidates) {
    return undefined
  }
  const free = candidates.filter(entry => !entry.consumed)
  const match = free.find(entry => entry.path === filePath) ?? free[0]
  if (match) {
    match.consumed = true
  }
  return match
}

// Gives each output resource lacking an index the next free index of its file
function assignMissingIndices(items: Resource[], output: ReadonlySet<Resource>): void {
  const next = new Map<string, number>()
  for (const item of items) {
    const filePath = getPath(item)
    const index = getIndex(item)
    if (filePath !== undefined && index !== undefined) {
      next.set(filePath, Math.max(next.get(filePath) ?? 0, index + 1))
    }
  }
  for (const item of items) {
    if (!output.has(item) || getIndex(item) !== undefined) {
      continue
    }
    const filePath = getPath(item)
    if (filePath === undefined) {
      continue
    }
    const index = next.get(filePath) ?? 0
    next.set(filePath, index + 1)
    setAnnotation(item, INDEX_ANNOTATION, String(index))
  }
}

/**
 * Installs a function's output in place of the scoped subset it was given.
 *
 * A scoped resource keeps its position when the output holds a resource with
 * the same identity key, and is deleted otherwise. Output resources matching
 * nothing are appended. Resources outside the scope are returned as the very
 * same objects.
 */
export function reconcile(
  current: readonly Resource[],
  scoped: readonly ScopedItem[],
  response: readonly Resource[],
  anchor: string
): Resource[] {
  const entries = dedupe(response, anchor)
  const byKey = new Map<string, Entry[]>()
  for (const entry of entries) {
    const group = byKey.get(entry.key)
    if (group) {
      group.push(entry)
    } else {
      byKey.set(entry.key, [entry])
    }
  }

  const scopedPositions = new Set(scoped.map(item => item.position))
  const merged: Resource[] = []

  current.forEach((resource, position) => {
    if (!scopedPositions.has(position)) {
      merged.push(resource)
      return
    }
    const match = takeMatch(byKey.get(identityKey(resource)), getPath(resource))
    if (match) {
      merged.push(match.resource)
    }
  })

  for (const entry of entries) {
    if (!entry.consumed) {
      merged.push(entry.resource)
    }
  }

  assignMissingIndices(merged, new Set(entries.map(entry => entry.resource)))
  return merged
}
