import type { FunctionResult, NamedResults, Resource, ResourceList } from "@fnpipe/sdk"
import { z } from "zod"

const resourceShape = z
  .object({
    apiVersion: z.string().min(1),
    kind: z.string().min(1),
    metadata: z
      .object({
        name: z.string().optional(),
        namespace: z.string().optional(),
        labels: z.record(z.string()).optional(),
        annotations: z.record(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()

/**
 * Checks a resource against resourceShape but yields the decoded object
 * itself, keys in the order they were written
 */
export const resourceSchema = z.custom<Resource>().superRefine((value, ctx) => {
  const checked = resourceShape.safeParse(value)
  if (!checked.success) {
    for (const issue of checked.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message })
    }
  }
})

export const severitySchema = z.preprocess(
  value => (value === "warning" ? "warn" : value),
  z.enum(["error", "warn", "info"])
)

export const functionResultSchema = z.object({
  severity: severitySchema,
  message: z.string(),
  tags: z.record(z.string()).optional(),
  resourceRef: z
    .object({
      apiVersion: z.string().optional(),
      kind: z.string().optional(),
      namespace: z.string().optional(),
      name: z.string().optional(),
    })
    .optional(),
  file: z
    .object({
      path: z.string(),
      index: z.number().int().nonnegative().optional(),
    })
    .optional(),
  field: z
    .object({
      path: z.string(),
      currentValue: z.unknown().optional(),
      suggestedValue: z.unknown().optional(),
    })
    .optional(),
})

export const namedResultsSchema = z.object({
  name: z.string().optional(),
  items: z.array(functionResultSchema),
})

export const resourceListSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    items: z.array(resourceSchema),
    functionConfig: resourceSchema.optional(),
    results: z.union([z.array(functionResultSchema), z.array(namedResultsSchema)]).optional(),
  })
  .passthrough()

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; reason: string }

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ")
}

export function parseResource(value: unknown): ParseOutcome<Resource> {
  const parsed = resourceSchema.safeParse(value)
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) }
  }
  return { ok: true, value: parsed.data }
}

/**
 * Validates an already decoded ResourceList document
 */
export function validateResourceList(value: unknown): ParseOutcome<ResourceList> {
  const parsed = resourceListSchema.safeParse(value)
  if (!parsed.success) {
    return { ok: false, reason: describeIssues(parsed.error) }
  }
  const { apiVersion, kind, items, functionConfig, results } = parsed.data
  const list: ResourceList = { items }
  if (apiVersion !== undefined) list.apiVersion = apiVersion
  if (kind !== undefined) list.kind = kind
  if (functionConfig !== undefined) list.functionConfig = functionConfig
  if (results !== undefined) list.results = results
  return { ok: true, value: list }
}

function isNamedResults(entry: FunctionResult | NamedResults): entry is NamedResults {
  return "items" in entry && Array.isArray(entry.items)
}

/**
 * Flattens the results of a response, whichever of the two shapes it uses
 */
export function flattenResults(results: ResourceList["results"]): FunctionResult[] {
  if (!results) {
    return []
  }
  const flat: FunctionResult[] = []
  for (const entry of results) {
    if (isNamedResults(entry)) {
      flat.push(...entry.items)
    } else {
      flat.push(entry)
    }
  }
  return flat
}
