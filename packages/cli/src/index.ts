#!/usr/bin/env tsx
import path from "path"
import { fileURLToPath } from "url"

import { createLogger } from "@fnpipe/libs"
import { Command } from "commander"
import fs from "fs-extra"

// Import commands
import planCommand from "./commands/plan/index.ts"
import renderCommand from "./commands/render/index.ts"
import serveCommand from "./commands/serve/index.ts"
import { shutdown } from "./libs/lifecycle.ts"

// Create a logger for this module
const moduleLogger = createLogger("cli")

// Process state
let isShuttingDown = false

// Function to gracefully shutdown the process
async function gracefulShutdown(signal: string) {
  // Prevent multiple shutdown attempts
  if (isShuttingDown) {
    moduleLogger.info("Shutdown already in progress, ignoring additional signal")
    return
  }

  isShuttingDown = true
  moduleLogger.info(`Received ${signal}, starting graceful shutdown...`)

  // Set a timeout to force exit if graceful shutdown takes too long
  const forceExitTimeout = setTimeout(() => {
    moduleLogger.error("Forced exit due to timeout during graceful shutdown")
    process.exit(1)
  }, 5000) // 5 seconds timeout

  try {
    await shutdown()

    // Additional delay to ensure everything is written
    await new Promise(resolve => setTimeout(resolve, 1000))

    moduleLogger.info("Graceful shutdown complete")
    clearTimeout(forceExitTimeout)
    process.exit(process.exitCode ?? 0)
  } catch (err) {
    moduleLogger.error(`Error during graceful shutdown: ${err}`)
    process.exit(1)
  }
}

// Handle termination signals
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"))
process.on("SIGINT", () => void gracefulShutdown("SIGINT"))

// Set up error handling for uncaught exceptions
process.on("uncaughtException", err => {
  moduleLogger.error(`Uncaught exception: ${err.message}`)
  if (err.stack) {
    moduleLogger.debug(`Stack trace: ${err.stack}`)
  }
})

// Set up error handling for unhandled promise rejections
process.on("unhandledRejection", (reason, _promise) => {
  moduleLogger.error(`Unhandled promise rejection: ${reason}`)
})

// Create a new command instance
const program = new Command()

// Get the directory name from the import.meta.url
const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)
// The cli package root holds package.json
const cliRootPath = path.resolve(__dirname, "..")

const main = async () => {
  const pkgFile = path.join(cliRootPath, "package.json")
  const pkgJSON = await fs.readFile(pkgFile, { encoding: "utf-8" })
  const pkg: { description?: string; version?: string } = JSON.parse(pkgJSON)

  program
    .name("fnpipe")
    .description(pkg.description ?? "")
    .version(pkg.version ?? "0.0.0")

  // Register commands
  renderCommand(program)
  planCommand(program)
  serveCommand(program)

  // Parse command line arguments with Commander
  await program.parseAsync()
}

main().catch(err => {
  moduleLogger.error(`Error: ${err}`)
  process.exit(1)
})
