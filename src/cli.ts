/**
 * CLI Commands
 *
 * Root options are declared here for `--help`; their values reach the kernel
 * through the layered ConfigProvider built in `main.ts`.
 */
import { Args, Command, Options } from "@effect/cli"
import { NodeStream } from "@effect/platform-node"
import { Console, Effect, Layer, Schema, Stream } from "effect"

import type { CellDefinition } from "./cell.ts"
import { lintCatalog, type LintFinding } from "./catalog.ts"
import { builtinCells } from "./cells/index.ts"
import { AppConfig, toKernelOptions } from "./config.ts"
import { Kernel } from "./kernel.ts"
import type { CellDescription } from "./registry.ts"

export const configFileOption = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to YAML config file"),
  Options.optional
)

export const consoleLogLevelOption = Options.choice("console-log-level", [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "none"
]).pipe(
  Options.withDescription("Console log level, written to stderr (overrides config)"),
  Options.optional
)

const cellsOption = Options.text("cells").pipe(
  Options.withDescription("Comma separated cell identifiers to load, in order"),
  Options.optional
)

const workersOption = Options.integer("workers").pipe(
  Options.withDescription("Worker process count"),
  Options.optional
)

const loadPolicyOption = Options.choice("load-policy", ["strict", "lenient"]).pipe(
  Options.withDescription("Abort on the first cell that fails to load, or skip it"),
  Options.optional
)

const concurrencyOption = Options.integer("concurrency").pipe(
  Options.withDescription("Messages handled at once; replies keep input order"),
  Options.withDefault(1)
)

// =============================================================================
// Kernel Wiring
// =============================================================================

/** Kernel built from the resolved configuration; torn down when the command ends */
const kernelLayer = (catalog: ReadonlyArray<CellDefinition>) =>
  Layer.unwrapEffect(
    Effect.map(AppConfig, (config) => Kernel.layer(toKernelOptions(config, catalog)))
  )

const withKernel = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(kernelLayer(builtinCells)))

// =============================================================================
// Commands
// =============================================================================

export class StdinError extends Schema.TaggedError<StdinError>()(
  "StdinError",
  { cause: Schema.Defect }
) {
  override get message() {
    return "Failed to read stdin"
  }
}

export class LintFailed extends Schema.TaggedError<LintFailed>()(
  "LintFailed",
  { errors: Schema.Number }
) {
  override get message() {
    return `Lint found ${this.errors} error(s)`
  }
}

const stdinLines = NodeStream.fromReadable(
  () => process.stdin,
  (cause) => new StdinError({ cause })
).pipe(
  Stream.decodeText(),
  Stream.splitLines,
  Stream.filter((line) => line.trim() !== "")
)

/** One message per stdin line, one reply per stdout line */
const serveCommand = Command.make(
  "serve",
  { concurrency: concurrencyOption },
  ({ concurrency }) =>
    withKernel(
      Effect.gen(function*() {
        const kernel = yield* Kernel
        yield* Effect.logInfo("Serving on stdio").pipe(Effect.annotateLogs("concurrency", concurrency))
        yield* stdinLines.pipe(
          Stream.mapEffect((line) => kernel.handle(line), { concurrency: Math.max(1, concurrency) }),
          Stream.runForEach((reply) => Console.log(reply))
        )
      })
    )
).pipe(Command.withDescription("Bridge stdin/stdout to the kernel, one message per line"))

const sendCommand = Command.make(
  "send",
  { messages: Args.text({ name: "message" }).pipe(Args.atLeast(1)) },
  ({ messages }) =>
    withKernel(
      Effect.gen(function*() {
        const kernel = yield* Kernel
        for (const message of messages) {
          yield* Console.log(yield* kernel.handle(message))
        }
      })
    )
).pipe(Command.withDescription("Handle each message in order and print its reply"))

const formatCell = (description: CellDescription): string => {
  const commands = Object.entries(description.commands).map(([name, text]) =>
    text === "" ? `  ${description.cell}:${name}` : `  ${description.cell}:${name}  ${text}`
  )
  const events = description.events.map((eventName) => `  on ${eventName}`)
  return [description.cell, ...commands, ...events].join("\n")
}

const cellsCommand = Command.make(
  "cells",
  { json: Options.boolean("json").pipe(Options.withDescription("Print descriptions as JSON")) },
  ({ json }) =>
    withKernel(
      Effect.gen(function*() {
        const kernel = yield* Kernel
        const descriptions = yield* kernel.describe
        const output = json ? JSON.stringify(descriptions, null, 2) : descriptions.map(formatCell).join("\n\n")
        yield* Console.log(output)
      })
    )
).pipe(Command.withDescription("Load the configured cells and list their commands"))

const formatFinding = (finding: LintFinding): string =>
  `${finding.severity.toUpperCase()} ${finding.id}: ${finding.message}`

const lintCommand = Command.make(
  "lint",
  {},
  () =>
    Effect.gen(function*() {
      const config = yield* AppConfig
      const selected = builtinCells.filter((definition) => config.cells.includes(definition.id))
      const unknown = config.cells.filter((id) => !builtinCells.some((definition) => definition.id === id))
      const findings: ReadonlyArray<LintFinding> = [
        ...unknown.map((id): LintFinding => ({ severity: "error", id, message: "Unknown cell identifier" })),
        ...lintCatalog(selected)
      ]
      for (const finding of findings) {
        yield* Console.log(formatFinding(finding))
      }
      const errors = findings.filter((finding) => finding.severity === "error").length
      if (errors > 0) {
        return yield* Effect.fail(new LintFailed({ errors }))
      }
      yield* Console.log(`${selected.length} cell(s) OK`)
    })
).pipe(Command.withDescription("Check the configured cells without constructing them"))

// Root command with global options
const rootCommand = Command.make(
  "cell-kernel",
  {
    configFile: configFileOption,
    consoleLogLevel: consoleLogLevelOption,
    cells: cellsOption,
    workers: workersOption,
    loadPolicy: loadPolicyOption
  }
).pipe(
  Command.withSubcommands([serveCommand, sendCommand, cellsCommand, lintCommand]),
  Command.withDescription("Microkernel routing text commands to cells")
)

export const cli = Command.run(rootCommand, {
  name: "cell-kernel",
  version: "0.1.0"
})
