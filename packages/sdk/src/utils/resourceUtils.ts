import path from "path"

import { INDEX_ANNOTATION, PATH_ANNOTATION, PROVENANCE_ANNOTATIONS } from "../annotations.ts"
import type { Resource, ResourceIdentity } from "../types.ts"

export function getIdentity(resource: Resource): ResourceIdentity {
  const identity: ResourceIdentity = {
    apiVersion: resource.apiVersion,
    kind: resource.kind,
    name: resource.metadata?.name ?? "",
  }
  if (resource.metadata?.namespace) {
    identity.namespace = resource.metadata.namespace
  }
  return identity
}

/**
 * String form of the identity key: apiVersion/kind/namespace/name
 */
export function identityKey(resource: Resource): string {
  const { apiVersion, kind, namespace, name } = getIdentity(resource)
  return `${apiVersion}/${kind}/${namespace ?? ""}/${name}`
}

export function getAnnotation(resource: Resource, key: string): string | undefined {
  return resource.metadata?.annotations?.[key]
}

/**
 * Sets an annotation in place, creating metadata and annotations as needed
 */
export function setAnnotation(resource: Resource, key: string, value: string): void {
  const metadata = resource.metadata ?? (resource.metadata = {})
  const annotations = metadata.annotations ?? (metadata.annotations = {})
  annotations[key] = value
}

export function getPath(resource: Resource): string | undefined {
  return getAnnotation(resource, PATH_ANNOTATION)
}

export function getIndex(resource: Resource): number | undefined {
  const raw = getAnnotation(resource, INDEX_ANNOTATION)
  if (raw === undefined) {
    return undefined
  }
  const index = Number.parseInt(raw, 10)
  return Number.isNaN(index) ? undefined : index
}

export function setProvenance(resource: Resource, filePath: string, index: number): void {
  setAnnotation(resource, PATH_ANNOTATION, filePath)
  setAnnotation(resource, INDEX_ANNOTATION, String(index))
}

/**
 * Returns a copy of the resource without provenance annotations. An
 * annotations map left empty is removed, and so is a metadata map left empty.
 */
export function stripProvenance(resource: Resource): Resource {
  const copy = structuredClone(resource)
  const annotations = copy.metadata?.annotations
  if (!copy.metadata || !annotations) {
    return copy
  }
  for (const key of PROVENANCE_ANNOTATIONS) {
    delete annotations[key]
  }
  if (Object.keys(annotations).length === 0) {
    delete copy.metadata.annotations
    if (Object.keys(copy.metadata).length === 0) {
      delete copy.metadata
    }
  }
  return copy
}

/**
 * Directory of a resource's source file; resources without a path live at the root
 */
export function getDirectory(resource: Resource): string {
  const filePath = getPath(resource)
  return filePath === undefined ? "." : path.posix.dirname(normalizePath(filePath))
}

/**
 * Normalizes a package-relative path to slash-separated form without a leading ./
 */
export function normalizePath(filePath: string): string {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, "/"))
  if (normalized === "" || normalized === "./") {
    return "."
  }
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized
}
