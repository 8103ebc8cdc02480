import { FUNCTION_ANNOTATION, LEGACY_FUNCTION_ANNOTATION, getAnnotation, identityKey } from "@fnpipe/sdk"
import type { Resource } from "@fnpipe/sdk"
import YAML from "yaml"
import { z } from "zod"

import { DeclarationParseError } from "./errors.ts"
import type { FunctionDeclaration, RuntimeDescriptor } from "./types.ts"

const envSchema = z.array(z.string().min(1)).default([])

const containerSchema = z
  .object({
    image: z.string().min(1),
    network: z.boolean().default(false),
    env: envSchema,
    mounts: z
      .array(
        z
          .object({
            type: z.enum(["bind", "volume", "tmpfs"]),
            src: z.string().min(1),
            dst: z.string().min(1),
            rw: z.boolean().default(false),
          })
          .strict()
      )
      .default([]),
  })
  .strict()

const execSchema = z
  .object({
    path: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: envSchema,
  })
  .strict()

const moduleSchema = z
  .object({
    path: z.string().min(1),
    export: z.string().min(1).default("default"),
  })
  .strict()

const httpSchema = z
  .object({
    url: z.string().url(),
  })
  .strict()

const declarationSchema = z
  .object({
    container: containerSchema.optional(),
    exec: execSchema.optional(),
    module: moduleSchema.optional(),
    http: httpSchema.optional(),
    deferFailure: z.boolean().default(false),
  })
  .strict()

type DeclarationBlock = z.infer<typeof declarationSchema>

// Each runtime key maps to its descriptor; exactly one may be present
const runtimeParsers: {
  [K in RuntimeDescriptor["kind"]]: (block: DeclarationBlock) => RuntimeDescriptor | undefined
} = {
  container: ({ container }) => container && { kind: "container", ...container },
  exec: ({ exec }) => exec && { kind: "exec", ...exec },
  module: ({ module }) => module && { kind: "module", path: module.path, exportName: module.export },
  http: ({ http }) => http && { kind: "http", url: http.url },
}

/**
 * Returns the raw annotation value declaring a function, if any
 */
export function getDeclarationAnnotation(resource: Resource): string | undefined {
  return (
    getAnnotation(resource, FUNCTION_ANNOTATION) ??
    getAnnotation(resource, LEGACY_FUNCTION_ANNOTATION)
  )
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Parses the function annotation of a resource into a declaration
 * @returns undefined when the resource declares no function
 * @throws DeclarationParseError when the annotation is malformed
 */
export function parseDeclaration(resource: Resource): FunctionDeclaration | undefined {
  const raw = getDeclarationAnnotation(resource)
  if (raw === undefined) {
    return undefined
  }
  const owner = identityKey(resource)

  let block: unknown
  try {
    block = YAML.parse(raw)
  } catch (err) {
    throw new DeclarationParseError(
      owner,
      `annotation is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    )
  }
  if (block === null || typeof block !== "object" || Array.isArray(block)) {
    throw new DeclarationParseError(owner, "annotation must be a mapping")
  }

  const parsed = declarationSchema.safeParse(block)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
    throw new DeclarationParseError(owner, `${where}${issue.message}`)
  }

  const runtimes: RuntimeDescriptor[] = []
  for (const parse of Object.values(runtimeParsers)) {
    const runtime = parse(parsed.data)
    if (runtime) {
      runtimes.push(runtime)
    }
  }
  if (runtimes.length === 0) {
    throw new DeclarationParseError(
      owner,
      `one of ${Object.keys(runtimeParsers).join(", ")} is required`
    )
  }
  if (runtimes.length > 1) {
    throw new DeclarationParseError(
      owner,
      `only one runtime may be declared, found ${runtimes.map(r => r.kind).join(", ")}`
    )
  }

  return {
    runtime: deepFreeze(runtimes[0]),
    deferFailure: parsed.data.deferFailure,
    source: deepFreeze(structuredClone(resource)),
  }
}

/**
 * Human-readable name of an invocation, used to name its results
 */
export function runtimeName(runtime: RuntimeDescriptor): string {
  switch (runtime.kind) {
    case "container":
      return runtime.image
    case "exec":
      return runtime.path
    case "module":
      return runtime.exportName === "default" ? runtime.path : `${runtime.path}#${runtime.exportName}`
    case "http":
      return runtime.url
  }
}
