import { RESOURCE_LIST_API_VERSION, RESOURCE_LIST_KIND } from "@fnpipe/sdk"
import type { ResourceList } from "@fnpipe/sdk"
import YAML from "yaml"

import { validateResourceList } from "./schema.ts"
import type { ParseOutcome } from "./schema.ts"

const MIN_SAFE_INTEGER = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE_INTEGER = BigInt(Number.MAX_SAFE_INTEGER)

/**
 * Turns the bigints of a document parsed with intAsBigInt back into numbers,
 * except those a number cannot hold exactly
 */
export function narrowIntegers(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value >= MIN_SAFE_INTEGER && value <= MAX_SAFE_INTEGER ? Number(value) : value
  }
  if (Array.isArray(value)) {
    return value.map(narrowIntegers)
  }
  if (value !== null && typeof value === "object") {
    const narrowed: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      narrowed[key] = narrowIntegers(entry)
    }
    return narrowed
  }
  return value
}

/**
 * Serializes a ResourceList to YAML, filling in apiVersion and kind
 */
export function encodeResourceList(list: ResourceList): string {
  const document: ResourceList = {
    apiVersion: list.apiVersion ?? RESOURCE_LIST_API_VERSION,
    kind: list.kind ?? RESOURCE_LIST_KIND,
    items: list.items,
  }
  if (list.functionConfig) {
    document.functionConfig = list.functionConfig
  }
  if (list.results) {
    document.results = list.results
  }
  return YAML.stringify(document, { aliasDuplicateObjects: false })
}

/**
 * Decodes a function's output. JSON is a subset of YAML, so both are accepted.
 * Never throws: anything that is not a ResourceList is a parse failure.
 */
export function decodeResourceList(text: string): ParseOutcome<ResourceList> {
  if (text.trim() === "") {
    return { ok: false, reason: "empty output" }
  }

  let decoded: unknown
  try {
    const document = YAML.parseDocument(text, { intAsBigInt: true })
    if (document.errors.length > 0) {
      return { ok: false, reason: `invalid YAML: ${document.errors[0].message}` }
    }
    decoded = narrowIntegers(document.toJS())
  } catch (err) {
    return { ok: false, reason: `invalid YAML: ${err instanceof Error ? err.message : String(err)}` }
  }

  if (decoded === null || typeof decoded !== "object" || Array.isArray(decoded)) {
    return { ok: false, reason: "output is not a mapping" }
  }
  return validateResourceList(decoded)
}
