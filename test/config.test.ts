import { FileSystem } from "@effect/platform"
import { describe, expect, it } from "@effect/vitest"
import { ConfigProvider, Duration, Effect, LogLevel, Option } from "effect"
import { builtinCellIds, builtinCells } from "../src/cells/index.ts"
import {
  DEFAULT_CONFIG_FILE,
  extractConfigPath,
  fromCliArgs,
  fromYamlFile,
  KernelConfig,
  toKernelOptions
} from "../src/config.ts"

const readWith = (entries: ReadonlyArray<readonly [string, string]>) =>
  KernelConfig.pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries))))

describe("KernelConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.gen(function*() {
      const config = yield* readWith([])
      expect(config.cells).toEqual(builtinCellIds)
      expect(config.loadPolicy).toBe("strict")
      expect(config.workers).toBe(2)
      expect(config.queueLimit).toBe(64)
      expect(Duration.toMillis(config.workTimeout)).toBe(30000)
      expect(config.processManagerEnabled).toBe(true)
      expect(config.consoleLogLevel).toBe(LogLevel.Warning)
      expect(Option.isNone(config.logFile)).toBe(true)
    }))

  it.effect("reads comma separated cells and trims them", () =>
    Effect.gen(function*() {
      const config = yield* readWith([["CELLS", "cells/greeter, cells/calculator"]])
      expect(config.cells).toEqual(["cells/greeter", "cells/calculator"])
    }))

  it.effect("parses levels, policies and durations", () =>
    Effect.gen(function*() {
      const config = yield* readWith([
        ["LOAD_POLICY", "lenient"],
        ["CONSOLE_LOG_LEVEL", "debug"],
        ["FILE_LOG_LEVEL", "off"],
        ["WORK_TIMEOUT", "2 seconds"],
        ["PROCESS_MANAGER_ENABLED", "false"]
      ])
      expect(config.loadPolicy).toBe("lenient")
      expect(config.consoleLogLevel).toBe(LogLevel.Debug)
      expect(config.fileLogLevel).toBe(LogLevel.None)
      expect(Duration.toMillis(config.workTimeout)).toBe(2000)
      expect(config.processManagerEnabled).toBe(false)
    }))

  it.effect("rejects a worker count below one", () =>
    Effect.gen(function*() {
      const result = yield* Effect.either(readWith([["WORKERS", "0"]]))
      expect(result._tag).toBe("Left")
    }))

  it.effect("maps onto kernel options", () =>
    Effect.gen(function*() {
      const config = yield* readWith([["WORKERS", "3"], ["QUEUE_LIMIT", "5"]])
      const options = toKernelOptions(config, builtinCells)
      expect(options.cells).toEqual(builtinCellIds)
      expect(options.policy).toBe("strict")
      expect(options.processManager.workers).toBe(3)
      expect(options.processManager.queueLimit).toBe(5)
      expect(options.processManager.enabled).toBe(true)
    }))
})

describe("fromCliArgs", () => {
  it.effect("turns flags into config keys", () =>
    Effect.gen(function*() {
      const provider = fromCliArgs(["--workers", "4", "--load-policy=lenient", "send", "--cells", "cells/greeter"])
      const config = yield* KernelConfig.pipe(Effect.withConfigProvider(provider))
      expect(config.workers).toBe(4)
      expect(config.loadPolicy).toBe("lenient")
      expect(config.cells).toEqual(["cells/greeter"])
    }))

  it.effect("treats a trailing flag as a boolean", () =>
    Effect.gen(function*() {
      const provider = fromCliArgs(["--process-manager-enabled"])
      const config = yield* KernelConfig.pipe(Effect.withConfigProvider(provider))
      expect(config.processManagerEnabled).toBe(true)
    }))
})

describe("extractConfigPath", () => {
  it("finds the config file in either form", () => {
    expect(extractConfigPath(["-c", "custom.yaml", "serve"])).toBe("custom.yaml")
    expect(extractConfigPath(["--config", "other.yaml"])).toBe("other.yaml")
    expect(extractConfigPath(["--config=inline.yaml"])).toBe("inline.yaml")
    expect(extractConfigPath(["serve"])).toBe(DEFAULT_CONFIG_FILE)
  })
})

describe("fromYamlFile", () => {
  it.effect("reads keys and lists from YAML", () =>
    Effect.gen(function*() {
      const provider = yield* fromYamlFile("kernel.yaml")
      const config = yield* KernelConfig.pipe(Effect.withConfigProvider(provider))
      expect(config.cells).toEqual(["cells/greeter", "cells/primes"])
      expect(config.workers).toBe(3)
    }).pipe(
      Effect.provide(FileSystem.layerNoop({
        exists: () => Effect.succeed(true),
        readFileString: () => Effect.succeed("CELLS:\n  - cells/greeter\n  - cells/primes\nWORKERS: 3\n")
      }))
    ))

  it.effect("yields an empty provider when the file is missing", () =>
    Effect.gen(function*() {
      const provider = yield* fromYamlFile("missing.yaml")
      const config = yield* KernelConfig.pipe(Effect.withConfigProvider(provider))
      expect(config.workers).toBe(2)
    }).pipe(Effect.provide(FileSystem.layerNoop({ exists: () => Effect.succeed(false) }))))
})
