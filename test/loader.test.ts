import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { type CellDefinition, defineCell, makeCell } from "../src/cell.ts"
import { CellCatalog } from "../src/catalog.ts"
import { EventBus } from "../src/event-bus.ts"
import { Injector } from "../src/injector.ts"
import { CellLoader } from "../src/loader.ts"
import { defaultProcessManagerConfig, InlineProcessManagerLive } from "../src/process-manager/index.ts"
import { CellRegistry } from "../src/registry.ts"

const loaderLayer = (definitions: ReadonlyArray<CellDefinition>) =>
  CellLoader.Default.pipe(
    Layer.provideMerge(Layer.mergeAll(CellRegistry.Default, Injector.Default, CellCatalog.make(definitions))),
    Layer.provideMerge(
      Layer.mergeAll(EventBus.Default, InlineProcessManagerLive({ ...defaultProcessManagerConfig, enabled: false }))
    )
  )

const simple = (name: string, cells: ReadonlyArray<string> = []) =>
  defineCell({
    id: `cells/${name}`,
    name,
    cells,
    make: (resolver) =>
      Effect.gen(function*() {
        for (const dependency of cells) yield* resolver.cell(dependency)
        return makeCell({ name, commands: { ping: () => Effect.succeed(name) } })
      })
  })

const broken = defineCell({
  id: "cells/broken",
  name: "broken",
  make: () => Effect.fail(new Error("constructor exploded"))
})

describe.concurrent("CellLoader", () => {
  it.effect("builds declared cell dependencies first", () =>
    Effect.gen(function*() {
      const report = yield* CellLoader.load(["cells/app", "cells/store"], "strict")
      expect(report.loaded).toEqual(["store", "app"])
      expect(report.failed).toEqual([])
      const names = (yield* CellRegistry.list).map((cell) => cell.name)
      expect(names).toEqual(["store", "app"])
    }).pipe(Effect.provide(loaderLayer([simple("app", ["store"]), simple("store")]))))

  it.effect("subscribes cell event handlers under the cell's name", () =>
    Effect.gen(function*() {
      yield* CellLoader.load(["cells/listener"], "strict")
      const bus = yield* EventBus
      expect(yield* bus.subscriberCount("thing.happened")).toBe(1)
      expect(yield* bus.unsubscribeAll("listener")).toBe(1)
    }).pipe(Effect.provide(loaderLayer([
      defineCell({
        id: "cells/listener",
        name: "listener",
        make: () =>
          Effect.succeed(makeCell({ name: "listener", commands: {}, events: { "thing.happened": () => Effect.void } }))
      })
    ]))))

  it.effect("strict loading stops at the first failure", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(CellLoader.load(["cells/first", "cells/broken", "cells/last"], "strict"))
      expect(error._tag).toBe("CellConstructionError")
      expect(error.message).toBe("constructor exploded")
      const names = (yield* CellRegistry.list).map((cell) => cell.name)
      expect(names).toEqual(["first"])
    }).pipe(Effect.provide(loaderLayer([simple("first"), broken, simple("last")]))))

  it.effect("lenient loading skips a failed cell and everything depending on it", () =>
    Effect.gen(function*() {
      const report = yield* CellLoader.load(["cells/first", "cells/broken", "cells/dependent", "cells/last"], "lenient")
      expect(report.loaded).toEqual(["first", "last"])
      expect(report.failed.map((failure) => [failure.id, failure.error._tag])).toEqual([
        ["cells/broken", "CellConstructionError"],
        ["cells/dependent", "UnresolvedDependency"]
      ])
      expect(report.failed[1]?.error.message).toBe("'dependent' depends on 'broken', which failed to load")
    }).pipe(Effect.provide(loaderLayer([simple("first"), broken, simple("dependent", ["broken"]), simple("last")]))))

  it.effect("detects circular cell dependencies", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(CellLoader.load(["cells/a"], "strict"))
      expect(error._tag).toBe("CircularDependency")
      expect(error.message).toBe("Circular dependency: a -> b -> a")
    }).pipe(Effect.provide(loaderLayer([simple("a", ["b"]), simple("b", ["a"])]))))

  it.effect("rejects unknown identifiers and unknown cell dependencies", () =>
    Effect.gen(function*() {
      const report = yield* CellLoader.load(["cells/missing", "cells/orphan"], "lenient")
      expect(report.loaded).toEqual([])
      expect(report.failed.map((failure) => failure.error._tag)).toEqual(["UnknownCell", "UnresolvedDependency"])
    }).pipe(Effect.provide(loaderLayer([simple("orphan", ["ghost"])]))))

  it.effect("rejects two definitions with the same cell name", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(CellLoader.load(["cells/one", "cells/two"], "strict"))
      expect(error._tag).toBe("DuplicateCell")
    }).pipe(Effect.provide(loaderLayer([
      defineCell({ id: "cells/one", name: "same", make: () => Effect.succeed(makeCell({ name: "same", commands: {} })) }),
      defineCell({ id: "cells/two", name: "same", make: () => Effect.succeed(makeCell({ name: "same", commands: {} })) })
    ]))))

  it.effect("rejects an identifier listed twice", () =>
    Effect.gen(function*() {
      const report = yield* CellLoader.load(["cells/first", "cells/first"], "lenient")
      expect(report.loaded).toEqual(["first"])
      expect(report.failed.map((failure) => failure.error._tag)).toEqual(["DuplicateCell"])
    }).pipe(Effect.provide(loaderLayer([simple("first")]))))

  it.effect("rejects a constructor that returns a differently named cell", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(CellLoader.load(["cells/liar"], "strict"))
      expect(error._tag).toBe("CellConstructionError")
      expect(error.message).toBe("Constructor returned a cell named 'other', expected 'liar'")
    }).pipe(Effect.provide(loaderLayer([
      defineCell({ id: "cells/liar", name: "liar", make: () => Effect.succeed(makeCell({ name: "other", commands: {} })) })
    ]))))
})
