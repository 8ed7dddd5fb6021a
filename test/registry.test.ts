import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, Option, Ref } from "effect"
import { makeCell } from "../src/cell.ts"
import { EventBus } from "../src/event-bus.ts"
import { CellRegistry, describeCell } from "../src/registry.ts"

const TestLayer = CellRegistry.Default.pipe(Layer.provideMerge(EventBus.Default))

describe.concurrent("CellRegistry", () => {
  it.effect("registers and resolves cells by name", () =>
    Effect.gen(function*() {
      const registry = yield* CellRegistry
      yield* registry.register(makeCell({ name: "greeter", commands: { greet: () => Effect.succeed("hi") } }))

      const cell = yield* registry.resolve("greeter")
      expect(cell.name).toBe("greeter")
      expect(yield* registry.has("greeter")).toBe(true)
      expect(Option.isNone(yield* registry.find("ghost"))).toBe(true)
    }).pipe(Effect.provide(TestLayer)))

  it.effect("rejects a second cell with the same name", () =>
    Effect.gen(function*() {
      const registry = yield* CellRegistry
      yield* registry.register(makeCell({ name: "greeter", commands: {} }))
      const error = yield* Effect.flip(registry.register(makeCell({ name: "greeter", commands: {} })))
      expect(error._tag).toBe("DuplicateCell")
      expect(error.message).toBe("A cell named 'greeter' is already registered")
    }).pipe(Effect.provide(TestLayer)))

  it.effect("fails with CellNotFound for unknown names", () =>
    Effect.gen(function*() {
      const error = yield* Effect.flip(CellRegistry.resolve("ghost"))
      expect(error._tag).toBe("CellNotFound")
      expect(error.cellName).toBe("ghost")
    }).pipe(Effect.provide(TestLayer)))

  it.effect("lists cells in load order", () =>
    Effect.gen(function*() {
      const registry = yield* CellRegistry
      for (const name of ["b", "a", "c"]) {
        yield* registry.register(makeCell({ name, commands: {} }))
      }
      const cells = yield* registry.list
      expect(cells.map((cell) => cell.name)).toEqual(["b", "a", "c"])
    }).pipe(Effect.provide(TestLayer)))

  it("describes commands and events", () => {
    const cell = makeCell({
      name: "calculator",
      commands: {
        calc: { description: "Evaluates", run: () => Effect.succeed(1) },
        clear: () => Effect.void
      },
      events: { "calc.done": () => Effect.void }
    })
    expect(describeCell(cell)).toEqual({
      cell: "calculator",
      commands: { calc: "Evaluates", clear: "" },
      events: ["calc.done"]
    })
  })

  it.effect("tears cells down in reverse load order and keeps going after a failure", () =>
    Effect.gen(function*() {
      const registry = yield* CellRegistry
      const bus = yield* EventBus
      const order = yield* Ref.make<ReadonlyArray<string>>([])
      const note = (name: string) => Ref.update(order, (current) => [...current, name])

      yield* registry.register(makeCell({ name: "first", commands: {}, teardown: note("first") }))
      yield* registry.register(
        makeCell({ name: "second", commands: {}, teardown: Effect.zipRight(note("second"), Effect.fail("broken")) })
      )
      yield* registry.register(makeCell({ name: "third", commands: {}, teardown: note("third") }))
      yield* bus.subscribe("tick", () => Effect.void, "second")

      yield* registry.teardownAll

      expect(yield* Ref.get(order)).toEqual(["third", "second", "first"])
      expect(yield* registry.list).toEqual([])
      expect(yield* bus.subscriberCount("tick")).toBe(0)
    }).pipe(Effect.provide(TestLayer)))
})
