import path from "path"

import { getDirectory, getPath, normalizePath } from "@fnpipe/sdk"
import type { Resource } from "@fnpipe/sdk"

import { ScopeResolutionError } from "./errors.ts"

export interface ScopedItem {
  /** Position of the resource in the full collection */
  position: number
  resource: Resource
}

export interface ScopeResolution {
  scoped: ScopedItem[]
  complement: ScopedItem[]
}

export interface ScopeOptions {
  /** Every resource is visible, wherever the declaration lives */
  globalScope?: boolean
}

/**
 * Validates an anchor location and returns its normalized form
 * @throws ScopeResolutionError when the anchor is missing, absolute or leaves the package
 */
export function normalizeAnchor(anchorLocation: string | undefined): string {
  if (anchorLocation === undefined || anchorLocation.trim() === "") {
    throw new ScopeResolutionError("Function declaration has no source location to anchor its scope")
  }
  const anchor = normalizePath(anchorLocation)
  if (path.posix.isAbsolute(anchor) || /^[A-Za-z]:\//.test(anchor)) {
    throw new ScopeResolutionError(`Anchor location must be relative to the package: ${anchorLocation}`)
  }
  if (anchor === ".." || anchor.startsWith("../")) {
    throw new ScopeResolutionError(`Anchor location is outside the package: ${anchorLocation}`)
  }
  return anchor
}

/**
 * True when dir is the anchor directory or lies beneath it
 */
export function isWithin(dir: string, anchor: string): boolean {
  if (anchor === ".") {
    return true
  }
  return dir === anchor || dir.startsWith(`${anchor}/`)
}

/**
 * True when a resource returned by an invocation anchored at anchor is placed
 * somewhere that invocation may not write. Resources without a path are
 * placed under the anchor later, so they never count.
 */
export function isOutsideScope(resource: Resource, anchor: string, options: ScopeOptions = {}): boolean {
  if (getPath(resource) === undefined) {
    return false
  }
  const dir = getDirectory(resource)
  if (dir === ".." || dir.startsWith("../") || path.posix.isAbsolute(dir)) {
    return true
  }
  return !options.globalScope && !isWithin(dir, anchor)
}

/**
 * Splits the collection into the resources visible to an invocation anchored
 * at anchorLocation and the rest. Both halves keep collection order.
 */
export function resolveScope(
  items: readonly Resource[],
  anchorLocation: string | undefined,
  options: ScopeOptions = {}
): ScopeResolution {
  const anchor = normalizeAnchor(anchorLocation)
  const scoped: ScopedItem[] = []
  const complement: ScopedItem[] = []

  items.forEach((resource, position) => {
    if (options.globalScope || isWithin(getDirectory(resource), anchor)) {
      scoped.push({ position, resource })
    } else {
      complement.push({ position, resource })
    }
  })

  return { scoped, complement }
}
