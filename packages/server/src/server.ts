import type { Server } from "http"

import { hasErrorResults, validateResourceList } from "@fnpipe/core"
import { createLogger } from "@fnpipe/libs"
import { executeModule } from "@fnpipe/runtime"
import type { ExecuteResponse } from "@fnpipe/runtime"
import express from "express"
import type { Request, Response, NextFunction, RequestHandler } from "express"

// Create a logger for this module
const moduleLogger = createLogger("server")

export interface FunctionServerOptions {
  /** Export of the module to call */
  exportName?: string
  /** How long one execution may run, in milliseconds */
  timeoutMs?: number
}

/**
 * Creates the Express app serving one module function
 * @param codeFilePath Absolute path of the function module
 */
export function createApp(codeFilePath: string, options: FunctionServerOptions = {}) {
  const app = express()
  const exportName = options.exportName ?? "default"

  // Configure middleware
  app.use(express.json({ limit: "10mb" }))

  // Add request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    moduleLogger.debug(`${req.method} ${req.path}`)
    next()
  })

  // Readiness endpoint
  app.get("/ready", (req: Request, res: Response) => {
    res.status(200).json({
      status: "ready",
      timestamp: new Date().toISOString(),
    })
  })

  // Execute function endpoint: the body is a ResourceList
  const executeHandler: RequestHandler = async (req, res, _next) => {
    const request = validateResourceList(req.body)
    if (!request.ok) {
      moduleLogger.warn(`Rejected request: ${request.reason}`)
      res.status(400).json({
        error: {
          code: 400,
          message: `Request body is not a ResourceList: ${request.reason}`,
        },
      })
      return
    }

    moduleLogger.info(`Executing function with ${request.value.items.length} resources`)
    const execution = await executeModule(codeFilePath, exportName, request.value, options.timeoutMs)

    let body: ExecuteResponse
    if (execution.result) {
      const exitCode = hasErrorResults(execution.result) ? 1 : 0
      body = { resourceList: execution.result, exitCode, diagnostics: "" }
    } else {
      const message = execution.error?.message ?? "Unknown error"
      moduleLogger.error(`Error executing function: ${message}`)
      body = { exitCode: 1, diagnostics: message }
    }

    moduleLogger.info(`Function execution completed with exit code ${body.exitCode}`)
    res.json(body)
  }

  app.post("/execute", executeHandler)

  // Error handling middleware
  app.use(
    (err: Error | Record<string, unknown>, req: Request, res: Response, _next: NextFunction) => {
      moduleLogger.error(
        `Unhandled error: ${err instanceof Error ? err.message : JSON.stringify(err)}`
      )
      res.status(500).json({
        error: {
          code: 500,
          message: err instanceof Error ? err.message : "Internal server error",
        },
      })
    }
  )

  return app
}

/**
 * Creates the app and starts listening
 * @param port The port to listen on, 0 for any free port
 * @param codeFilePath Absolute path of the function module
 */
export function createServer(
  port: number,
  codeFilePath: string,
  options: FunctionServerOptions & { host?: string } = {}
): Server {
  const app = createApp(codeFilePath, options)
  const host = options.host ?? "0.0.0.0"

  const server = app.listen(port, host, () => {
    moduleLogger.info(`Server listening on ${host}:${port}`)
  })

  // Handle server errors
  server.on("error", (err: Error) => {
    moduleLogger.error(`Server error: ${err.message}`)
  })

  return server
}

/**
 * Gracefully shuts down the server
 * @param server The server to shut down
 * @returns A promise that resolves when the server is shut down
 */
export async function shutdownServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    moduleLogger.info("Shutting down server...")

    // Force close after timeout
    const forceTimeout = setTimeout(() => {
      moduleLogger.warn("Forcing server shutdown after timeout")
      resolve()
    }, 5000)

    server.close(err => {
      clearTimeout(forceTimeout)
      if (err) {
        moduleLogger.error(`Error shutting down server: ${err.message}`)
        reject(err)
      } else {
        moduleLogger.info("Server shut down successfully")
        resolve()
      }
    })
  })
}
