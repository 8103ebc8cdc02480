import { discover } from "@fnpipe/core"
import type { ExecutionPlan } from "@fnpipe/core"
import { createLogger, loadConfig } from "@fnpipe/libs"
import { createRegistry } from "@fnpipe/runtime"
import { LocalPackageStore } from "@fnpipe/store"
import { Command } from "commander"

// Create a logger for this module
const moduleLogger = createLogger("plan")

/**
 * One line per invocation: sequence index, runtime kind, name, anchor and
 * whether failures are deferred, tab separated
 */
export function formatPlan(plan: ExecutionPlan): string {
  return plan
    .map(invocation =>
      [
        invocation.sequenceIndex,
        invocation.declaration.runtime.kind,
        invocation.name,
        invocation.anchorLocation ?? "-",
        invocation.declaration.deferFailure ? "deferFailure" : "",
      ]
        .join("\t")
        .trimEnd()
    )
    .map(line => `${line}\n`)
    .join("")
}

async function planAction(dir: string, options: { enableExec?: boolean; enableModule?: boolean }) {
  const config = loadConfig()
  const registry = createRegistry({
    enableExec: options.enableExec || config.enableExec,
    enableModule: options.enableModule || config.enableModule,
  })
  const items = await new LocalPackageStore(dir).read()
  const plan = discover(items, { enabledRuntimes: registry.enabledRuntimes() })
  moduleLogger.info(`${plan.length} functions in ${dir}`)
  process.stdout.write(formatPlan(plan))
}

/**
 * Register the plan command with the CLI
 * @param program The Commander program instance
 */
export default function (program: Command): void {
  program
    .command("plan")
    .description("Print the functions a render would run, in order")
    .argument("[dir]", "Package directory", ".")
    .option("--enable-exec", "Include functions that run host executables")
    .option("--enable-module", "Include functions loaded as JS/TS modules")
    .action(async (dir: string, options: { enableExec?: boolean; enableModule?: boolean }) => {
      try {
        await planAction(dir, options)
      } catch (err) {
        moduleLogger.error(`Error running plan command: ${err}`)
        process.exit(1)
      }
    })
}
