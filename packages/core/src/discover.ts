import path from "path"

import { createLogger } from "@fnpipe/libs"
import { getIndex, getPath, identityKey, normalizePath } from "@fnpipe/sdk"
import type { Resource } from "@fnpipe/sdk"

import { parseDeclaration, runtimeName } from "./declaration.ts"
import type { ExecutionPlan, FunctionDeclaration, FunctionInvocation, RuntimeKind } from "./types.ts"

// Create a logger for this module
const moduleLogger = createLogger("discover")

export interface DiscoverOptions {
  /** Runtime kinds allowed to run; declarations of other kinds are skipped */
  enabledRuntimes?: ReadonlySet<RuntimeKind>
}

interface Candidate {
  declaration: FunctionDeclaration
  anchorLocation: string | undefined
  segments: string[]
  file: string
  index: number
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0
  return a < b ? -1 : 1
}

/**
 * Post-order over directories: a directory's subdirectories (in lexical
 * order) come before its own declarations. Inside one directory, files are
 * lexical and documents keep their order.
 */
function compareCandidates(a: Candidate, b: Candidate): number {
  const shared = Math.min(a.segments.length, b.segments.length)
  for (let i = 0; i < shared; i++) {
    const order = compareStrings(a.segments[i], b.segments[i])
    if (order !== 0) {
      return order
    }
  }
  if (a.segments.length !== b.segments.length) {
    // the deeper one is inside the other's directory and runs first
    return b.segments.length - a.segments.length
  }
  return compareStrings(a.file, b.file) || a.index - b.index
}

function toCandidate(
  resource: Resource,
  declaration: FunctionDeclaration,
  position: number
): Candidate {
  const filePath = getPath(resource)
  if (filePath === undefined) {
    moduleLogger.warn(`Function declared on ${identityKey(resource)} has no source path`)
    return { declaration, anchorLocation: undefined, segments: [], file: "", index: position }
  }
  const normalized = normalizePath(filePath)
  const dir = path.posix.dirname(normalized)
  return {
    declaration,
    anchorLocation: dir,
    segments: dir === "." ? [] : dir.split("/"),
    file: path.posix.basename(normalized),
    index: getIndex(resource) ?? position,
  }
}

/**
 * Finds every function declared in the collection and orders them into an
 * execution plan. Any malformed declaration fails the whole discovery.
 * @throws DeclarationParseError
 */
export function discover(items: readonly Resource[], options: DiscoverOptions = {}): ExecutionPlan {
  const candidates: Candidate[] = []

  items.forEach((resource, position) => {
    const declaration = parseDeclaration(resource)
    if (!declaration) {
      return
    }
    const kind = declaration.runtime.kind
    if (options.enabledRuntimes && !options.enabledRuntimes.has(kind)) {
      moduleLogger.warn(
        `Skipping ${kind} function ${runtimeName(declaration.runtime)} declared on ${identityKey(resource)}: ${kind} functions are disabled`
      )
      return
    }
    candidates.push(toCandidate(resource, declaration, position))
  })

  candidates.sort(compareCandidates)

  const plan: FunctionInvocation[] = candidates.map((candidate, sequenceIndex) => ({
    declaration: candidate.declaration,
    anchorLocation: candidate.anchorLocation,
    sequenceIndex,
    name: runtimeName(candidate.declaration.runtime),
  }))

  moduleLogger.debug(`Discovered ${plan.length} function invocations`)
  return Object.freeze(plan)
}
