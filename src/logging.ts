/**
 * Logging Module
 *
 * Console and file targets with separate levels. Console output goes to stderr
 * so stdout stays reserved for replies of the stdio bridge.
 */
import { FileSystem, PlatformLogger } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Console, Effect, Layer, Logger, LogLevel, Option } from "effect"
import * as Path from "node:path"

// =============================================================================
// Logging Configuration
// =============================================================================

export interface LoggingConfig {
  readonly consoleLevel: LogLevel.LogLevel
  readonly fileLogPath: Option.Option<string>
  readonly fileLogLevel: LogLevel.LogLevel
  /** Relative log file paths resolve against this directory */
  readonly baseDir: string
}

const atLeast = (minimum: LogLevel.LogLevel) => (level: LogLevel.LogLevel) =>
  LogLevel.greaterThanEqual(level, minimum)

const consoleLogger = (level: LogLevel.LogLevel) =>
  level === LogLevel.None
    ? Logger.none
    : Logger.filterLogLevel(Logger.prettyLogger({ stderr: true }), atLeast(level))

// =============================================================================
// Logger Creation
// =============================================================================

/**
 * Create a logging layer based on configuration.
 *
 * If the file logger cannot be set up, logging falls back to the console
 * target alone.
 */
export const createLoggingLayer = (config: LoggingConfig): Layer.Layer<never> => {
  const consoleTarget = consoleLogger(config.consoleLevel)

  if (Option.isNone(config.fileLogPath) || config.fileLogLevel === LogLevel.None) {
    return Logger.replace(Logger.defaultLogger, consoleTarget)
  }

  const filePath = config.fileLogPath.value
  const resolvedPath = Path.isAbsolute(filePath) ? filePath : Path.join(config.baseDir, filePath)

  const combinedLogger = Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    yield* fs.makeDirectory(Path.dirname(resolvedPath), { recursive: true })
    const fileLogger = yield* Logger.jsonLogger.pipe(
      PlatformLogger.toFile(resolvedPath, { batchWindow: "100 millis" })
    )
    return Logger.zip(consoleTarget, Logger.filterLogLevel(fileLogger, atLeast(config.fileLogLevel)))
  })

  return Logger.replaceScoped(Logger.defaultLogger, combinedLogger).pipe(
    Layer.provide(NodeContext.layer),
    Layer.catchAll((error) =>
      Layer.effectDiscard(Console.error(`File logging failed, using console only: ${error.message}`)).pipe(
        Layer.merge(Logger.replace(Logger.defaultLogger, consoleTarget))
      )
    )
  )
}

// =============================================================================
// Convenience Functions
// =============================================================================

/** Console-only logging at the given level */
export const consoleLoggingLayer = (level: LogLevel.LogLevel): Layer.Layer<never> =>
  Logger.replace(Logger.defaultLogger, consoleLogger(level))

/** Disable all logging */
export const noLoggingLayer: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.none)
