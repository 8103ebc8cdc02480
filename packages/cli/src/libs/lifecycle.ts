type ShutdownHook = () => Promise<void> | void

/**
 * Cancellation signal plus the hooks to run when the process is asked to stop
 */
export class Lifecycle {
  private readonly controller = new AbortController()
  private readonly hooks: ShutdownHook[] = []

  /** Aborted when shutdown starts */
  get signal(): AbortSignal {
    return this.controller.signal
  }

  onShutdown(hook: ShutdownHook): void {
    this.hooks.push(hook)
  }

  /**
   * Cancels running work, then runs the registered hooks in order
   */
  async shutdown(): Promise<void> {
    this.controller.abort()
    for (const hook of this.hooks) {
      await hook()
    }
  }
}

// The lifecycle of this process, driven by its signal handlers
export const processLifecycle = new Lifecycle()

export const shutdownSignal: AbortSignal = processLifecycle.signal

export function onShutdown(hook: ShutdownHook): void {
  processLifecycle.onShutdown(hook)
}

export function shutdown(): Promise<void> {
  return processLifecycle.shutdown()
}
