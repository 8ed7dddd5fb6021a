/**
 * Configuration Module
 *
 * Precedence: CLI arguments → Environment variables → YAML config file → Defaults
 */
import { FileSystem } from "@effect/platform"
import { Config, ConfigProvider, Context, Duration, Effect, Layer, LogLevel, Schema } from "effect"
import * as yaml from "yaml"

import type { CellDefinition } from "./cell.ts"
import { builtinCellIds } from "./cells/index.ts"
import { JsonObject } from "./domain.ts"
import type { KernelOptions } from "./kernel.ts"
import { defaultProcessManagerConfig } from "./process-manager/index.ts"

export const DEFAULT_CONFIG_FILE = "cell-kernel.config.yaml"

const decodeYamlDocument = Schema.decodeUnknown(JsonObject)

/** Create a ConfigProvider from a YAML config file. Returns empty if file doesn't exist. */
export const fromYamlFile = (path: string) =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const exists = yield* fs.exists(path)
    if (!exists) return ConfigProvider.fromMap(new Map())
    const content = yield* fs.readFileString(path)
    const parsed = yield* decodeYamlDocument(yaml.parse(content) ?? {})
    return ConfigProvider.fromJson(parsed)
  })

/** Parse CLI arguments into a ConfigProvider. Supports --key value and --key=value. */
export const fromCliArgs = (args: ReadonlyArray<string>): ConfigProvider.ConfigProvider => {
  const map = new Map<string, string>()
  const toKey = (flag: string) => flag.toUpperCase().replace(/-/g, "_")
  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === undefined || !arg.startsWith("--")) continue
    const eqIndex = arg.indexOf("=")
    if (eqIndex >= 0) {
      map.set(toKey(arg.slice(2, eqIndex)), arg.slice(eqIndex + 1))
      continue
    }
    const next = args[i + 1]
    if (next !== undefined && !next.startsWith("--")) {
      map.set(toKey(arg.slice(2)), next)
      i++
    } else {
      map.set(toKey(arg.slice(2)), "true")
    }
  }
  return ConfigProvider.fromMap(map)
}

/** Create composed ConfigProvider: CLI → env → YAML → defaults */
export const makeConfigProvider = (configPath: string, args: ReadonlyArray<string>) =>
  Effect.gen(function*() {
    const yamlProvider = yield* fromYamlFile(configPath)
    const cliProvider = fromCliArgs(args)
    const envProvider = ConfigProvider.fromEnv()
    const defaultsProvider = ConfigProvider.fromMap(
      new Map([
        ["CONSOLE_LOG_LEVEL", "warning"],
        ["FILE_LOG_LEVEL", "debug"]
      ])
    )

    return cliProvider.pipe(
      ConfigProvider.orElse(() => envProvider),
      ConfigProvider.orElse(() => yamlProvider),
      ConfigProvider.orElse(() => defaultsProvider)
    )
  })

export const logLevelConfig = (name: string) =>
  Config.string(name).pipe(
    Config.map((s): LogLevel.LogLevel => {
      const level = s.toLowerCase()
      if (level === "none" || level === "off") return LogLevel.None
      const literalMap: Record<string, LogLevel.Literal> = {
        trace: "Trace",
        debug: "Debug",
        info: "Info",
        warn: "Warning",
        warning: "Warning",
        error: "Error",
        fatal: "Fatal"
      }
      const literal = literalMap[level]
      if (literal === undefined) return LogLevel.Info
      return LogLevel.fromLiteral(literal)
    })
  )

/** Comma separated in flags and environment, a list in YAML */
const cellList = Config.array(Config.string(), "CELLS").pipe(
  Config.map((entries) => entries.map((id) => id.trim()).filter((id) => id !== ""))
)

export const KernelConfig = Config.all({
  cells: cellList.pipe(Config.withDefault(builtinCellIds)),
  loadPolicy: Config.literal("strict", "lenient")("LOAD_POLICY").pipe(Config.withDefault("strict" as const)),

  workers: Config.integer("WORKERS").pipe(
    Config.validate({ message: "WORKERS must be at least 1", validation: (n) => n >= 1 }),
    Config.withDefault(defaultProcessManagerConfig.workers)
  ),
  queueLimit: Config.integer("QUEUE_LIMIT").pipe(
    Config.validate({ message: "QUEUE_LIMIT must not be negative", validation: (n) => n >= 0 }),
    Config.withDefault(defaultProcessManagerConfig.queueLimit)
  ),
  workTimeout: Config.duration("WORK_TIMEOUT").pipe(Config.withDefault(Duration.seconds(30))),
  shutdownGrace: Config.duration("SHUTDOWN_GRACE").pipe(Config.withDefault(Duration.seconds(5))),
  processManagerEnabled: Config.boolean("PROCESS_MANAGER_ENABLED").pipe(Config.withDefault(true)),

  consoleLogLevel: logLevelConfig("CONSOLE_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Warning)),
  fileLogLevel: logLevelConfig("FILE_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Debug)),
  logFile: Config.string("LOG_FILE").pipe(Config.option)
})

export type KernelConfig = Config.Config.Success<typeof KernelConfig>

export class AppConfig extends Context.Tag("@cell-kernel/AppConfig")<
  AppConfig,
  KernelConfig
>() {
  static readonly layer = Layer.effect(AppConfig, KernelConfig)

  static fromConfig(config: KernelConfig): Layer.Layer<AppConfig> {
    return Layer.succeed(AppConfig, config)
  }
}

export const toKernelOptions = (config: KernelConfig, catalog: ReadonlyArray<CellDefinition>): KernelOptions => ({
  catalog,
  cells: config.cells,
  policy: config.loadPolicy,
  processManager: {
    ...defaultProcessManagerConfig,
    enabled: config.processManagerEnabled,
    workers: config.workers,
    queueLimit: config.queueLimit,
    defaultTimeout: config.workTimeout,
    shutdownGrace: config.shutdownGrace
  }
})

export const extractConfigPath = (args: ReadonlyArray<string>): string => {
  const configIdx = args.findIndex((a) => a === "--config" || a === "-c")
  const nextArg = configIdx >= 0 ? args[configIdx + 1] : undefined
  if (nextArg !== undefined) {
    return nextArg
  }
  const inline = args.find((a) => a.startsWith("--config="))
  return inline === undefined ? DEFAULT_CONFIG_FILE : inline.slice("--config=".length)
}
