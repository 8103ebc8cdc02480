export type PipelineErrorCode =
  | "DECLARATION_PARSE"
  | "SCOPE_RESOLUTION"
  | "RUNNER_INVOCATION"
  | "VALIDATION_FAILURE"
  | "CANCELLED"
  | "PERSISTENCE"

/**
 * Base class of every error the orchestrator raises on purpose
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A function annotation could not be parsed. Raised before anything runs.
 */
export class DeclarationParseError extends PipelineError {
  readonly resource: string

  constructor(resource: string, message: string, options?: { cause?: unknown }) {
    super("DECLARATION_PARSE", `Invalid function declaration on ${resource}: ${message}`, options)
    this.resource = resource
  }
}

export class ScopeResolutionError extends PipelineError {
  constructor(message: string) {
    super("SCOPE_RESOLUTION", message)
  }
}

/**
 * The runtime could not be started, timed out, or produced output that is
 * not a ResourceList
 */
export class RunnerInvocationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RUNNER_INVOCATION", message, options)
  }
}

/**
 * A function answered with a well-formed list and a nonzero exit code
 */
export class ValidationFailure extends PipelineError {
  readonly exitCode: number

  constructor(name: string, exitCode: number, diagnostics: string) {
    const detail = diagnostics.trim()
    super(
      "VALIDATION_FAILURE",
      `Function ${name} exited with code ${exitCode}${detail ? `: ${detail}` : ""}`
    )
    this.exitCode = exitCode
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(message = "Pipeline run was cancelled") {
    super("CANCELLED", message)
  }
}

export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE", message, options)
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError
}
