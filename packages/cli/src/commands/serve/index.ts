import path from "path"

import { createLogger, loadConfig } from "@fnpipe/libs"
import { createServer, shutdownServer } from "@fnpipe/server"
import { Command } from "commander"
import fs from "fs-extra"

import { onShutdown } from "../../libs/lifecycle.ts"
import { parsePort } from "../../libs/options.ts"

// Create a logger for this module
const moduleLogger = createLogger("serve")

// Default port for the HTTP server
const DEFAULT_PORT = 3000

interface ServeOptions {
  codeFilePath?: string
  export: string
  port?: number
}

/**
 * Register the serve command with the CLI
 * @param program The Commander program instance
 */
export default function (program: Command): void {
  program
    .command("serve")
    .description("Serve a module function over HTTP for the http runtime")
    .requiredOption("-c, --code-file-path <code-file-path>", "Path to the function module")
    .option("-e, --export <name>", "Export to call", "default")
    .option("-p, --port <number>", "Port to listen on", parsePort)
    .action(async (options: ServeOptions) => {
      const codeFilePath = path.resolve(options.codeFilePath ?? "")
      // Validate code file path
      if (!(await fs.pathExists(codeFilePath))) {
        moduleLogger.error(`Code file not found: ${codeFilePath}`)
        process.exit(1)
      }

      // Get the port from options or environment variable
      const port = options.port ?? Number.parseInt(process.env.PORT || String(DEFAULT_PORT), 10)
      if (Number.isNaN(port) || port < 0 || port > 65535) {
        moduleLogger.error(`Invalid port number: ${process.env.PORT}`)
        process.exit(1)
      }

      const config = loadConfig()
      const server = createServer(port, codeFilePath, {
        exportName: options.export,
        timeoutMs: config.functionTimeoutMs,
      })
      onShutdown(() => shutdownServer(server))
      moduleLogger.info(`Serving function from ${codeFilePath}`)
    })
}
