#!/usr/bin/env -S node --import tsx
/**
 * Main Entry Point
 *
 * Sets up configuration and logging layers, then runs the CLI.
 */
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Cause, Console, Effect, Layer } from "effect"
import { cli } from "./cli.ts"
import { AppConfig, extractConfigPath, KernelConfig, makeConfigProvider } from "./config.ts"
import { createLoggingLayer } from "./logging.ts"

// =============================================================================
// Main Layer Composition
// =============================================================================

/**
 * Build the main application layer from CLI arguments.
 * Config is read before logging exists; everything after logs through it.
 */
const makeMainLayer = (args: ReadonlyArray<string>) =>
  Layer.unwrapEffect(
    Effect.gen(function*() {
      const configPath = extractConfigPath(args)
      const configProvider = yield* makeConfigProvider(configPath, args)
      const config = yield* KernelConfig.pipe(Effect.withConfigProvider(configProvider))

      const loggingLayer = createLoggingLayer({
        consoleLevel: config.consoleLogLevel,
        fileLogPath: config.logFile,
        fileLogLevel: config.fileLogLevel,
        baseDir: process.cwd()
      })

      return AppConfig.fromConfig(config).pipe(
        Layer.provideMerge(Layer.setConfigProvider(configProvider)),
        Layer.provideMerge(loggingLayer),
        Layer.provideMerge(NodeContext.layer)
      )
    }).pipe(
      Effect.provide(NodeContext.layer)
    )
  )

// =============================================================================
// Run
// =============================================================================

const args = process.argv.slice(2)

cli(process.argv).pipe(
  Effect.provide(makeMainLayer(args)),
  // Failures still reach runMain, which sets the exit code
  Effect.tapErrorCause((cause) =>
    Cause.isInterruptedOnly(cause) ? Effect.void : Console.error(`Fatal error: ${Cause.pretty(cause)}`)
  ),
  (effect) => NodeRuntime.runMain(effect, { disablePrettyLogger: true })
)
