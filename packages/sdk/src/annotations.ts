// Source file of a resource, relative to the package root
export const PATH_ANNOTATION = "config.kubernetes.io/path"

// Position of a resource within its source file
export const INDEX_ANNOTATION = "config.kubernetes.io/index"

// Declares a function invocation on the annotated resource
export const FUNCTION_ANNOTATION = "config.kubernetes.io/function"

// Older spelling of FUNCTION_ANNOTATION, still honoured
export const LEGACY_FUNCTION_ANNOTATION = "config.k8s.io/function"

export const PROVENANCE_ANNOTATIONS = [PATH_ANNOTATION, INDEX_ANNOTATION] as const

export const RESOURCE_LIST_API_VERSION = "config.kubernetes.io/v1"
export const RESOURCE_LIST_KIND = "ResourceList"
export const RESULT_LIST_KIND = "FunctionResultList"
