/**
 * Type definitions for @fnpipe/sdk
 */

// Resource metadata; fields other than these are carried as they are
export interface ResourceMetadata {
  name?: string
  namespace?: string
  labels?: Record<string, string>
  annotations?: Record<string, string>
  [key: string]: unknown
}

// A configuration document. Only apiVersion and kind are required.
export interface Resource {
  apiVersion: string
  kind: string
  metadata?: ResourceMetadata
  [key: string]: unknown
}

// Identity key of a resource
export interface ResourceIdentity {
  apiVersion: string
  kind: string
  namespace?: string
  name: string
}

// Reference from a result to a resource; every field is optional on the wire
export type ResourceRef = Partial<ResourceIdentity>

export type Severity = "error" | "warn" | "info"

export interface ResultFile {
  path: string
  index?: number
}

export interface ResultField {
  path: string
  currentValue?: unknown
  suggestedValue?: unknown
}

// A single validation or transformation result emitted by a function
export interface FunctionResult {
  severity: Severity
  message: string
  tags?: Record<string, string>
  resourceRef?: ResourceRef
  file?: ResultFile
  field?: ResultField
}

// Results of one invocation, as kept by the orchestrator
export interface ResultSet {
  name: string
  sequenceIndex: number
  items: FunctionResult[]
}

// Named group of results, as a function may emit them
export interface NamedResults {
  name?: string
  items: FunctionResult[]
}

// The document exchanged with functions
export interface ResourceList {
  apiVersion?: string
  kind?: string
  items: Resource[]
  functionConfig?: Resource
  results?: FunctionResult[] | NamedResults[]
}

// Type for module functions
export type ConfigFunction = (input: ResourceList) => ResourceList | Promise<ResourceList>
