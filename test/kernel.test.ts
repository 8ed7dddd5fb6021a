import { describe, expect, it } from "@effect/vitest"
import { Context, Effect, Exit, Layer, Ref, Scope } from "effect"
import { type CellDefinition, defineCell, makeCell } from "../src/cell.ts"
import { EventBus } from "../src/event-bus.ts"
import { serviceInstance } from "../src/injector.ts"
import { Kernel, type KernelOptions } from "../src/kernel.ts"
import { defaultProcessManagerConfig, ProcessManager } from "../src/process-manager/index.ts"

class Journal extends Context.Tag("test/Journal")<Journal, Ref.Ref<ReadonlyArray<string>>>() {}

const note = (journal: Ref.Ref<ReadonlyArray<string>>, entry: string) =>
  Ref.update(journal, (current) => [...current, entry])

/** Records its teardown along with whether the process manager still accepted work */
const recordingCell = (name: string, cells: ReadonlyArray<string> = []): CellDefinition =>
  defineCell({
    id: `cells/${name}`,
    name,
    services: [Journal, ProcessManager],
    cells,
    make: (resolver) =>
      Effect.gen(function*() {
        const journal = yield* resolver.service(Journal)
        const manager = yield* resolver.service(ProcessManager)
        yield* note(journal, `make ${name}`)
        return makeCell({
          name,
          commands: { whoami: () => Effect.succeed(name) },
          events: { "kernel.test": () => note(journal, `event ${name}`) },
          teardown: Effect.gen(function*() {
            const stats = yield* manager.stats
            yield* note(journal, `teardown ${name} accepting=${stats.accepting}`)
          })
        })
      })
  })

const failing = defineCell({
  id: "cells/failing",
  name: "failing",
  make: () => Effect.fail(new Error("cannot start"))
})

const options = (
  journal: Ref.Ref<ReadonlyArray<string>>,
  cells: ReadonlyArray<string>,
  policy: KernelOptions["policy"] = "strict"
): KernelOptions => ({
  catalog: [recordingCell("alpha"), recordingCell("beta", ["alpha"]), recordingCell("gamma"), failing],
  cells,
  policy,
  processManager: { ...defaultProcessManagerConfig, enabled: false },
  services: [serviceInstance(Journal, journal)]
})

describe("Kernel", () => {
  it.live("loads cells, routes commands and publishes events", () =>
    Effect.gen(function*() {
      const journal = yield* Ref.make<ReadonlyArray<string>>([])
      yield* Effect.gen(function*() {
        const kernel = yield* Kernel
        expect(kernel.report.loaded).toEqual(["alpha", "beta"])
        expect(yield* kernel.handle("beta:whoami")).toBe("beta")
        expect(yield* kernel.handle("{\"event_name\":\"kernel.test\"}")).toBe(
          "{\"event\":\"kernel.test\",\"delivered\":2,\"failed\":0}"
        )
        const described = yield* kernel.describe
        expect(described.map((description) => description.cell)).toEqual(["alpha", "beta"])
      }).pipe(Effect.provide(Kernel.layer(options(journal, ["cells/beta"]))))

      expect(yield* Ref.get(journal)).toEqual([
        "make alpha",
        "make beta",
        "event alpha",
        "event beta",
        "teardown beta accepting=false",
        "teardown alpha accepting=false"
      ])
    }))

  it.live("stops the process manager before tearing cells down in reverse order", () =>
    Effect.gen(function*() {
      const journal = yield* Ref.make<ReadonlyArray<string>>([])
      const scope = yield* Scope.make()
      const context = yield* Layer.buildWithScope(Kernel.layer(options(journal, ["cells/alpha", "cells/gamma"])), scope)
      const kernel = Context.get(context, Kernel)
      const bus = Context.get(context, EventBus)

      yield* kernel.shutdown
      expect(yield* Ref.get(journal)).toEqual([
        "make alpha",
        "make gamma",
        "teardown gamma accepting=false",
        "teardown alpha accepting=false"
      ])
      expect(yield* bus.subscriberCount("kernel.test")).toBe(0)
      expect(JSON.parse(yield* kernel.handle("alpha:whoami"))).toMatchObject({ error: "CellNotFound" })

      // Closing the scope afterwards does not run the sequence twice
      yield* Scope.close(scope, Exit.void)
      expect(yield* Ref.get(journal)).toHaveLength(4)
    }))

  it.live("lenient start skips cells that fail to load", () =>
    Effect.gen(function*() {
      const journal = yield* Ref.make<ReadonlyArray<string>>([])
      const report = yield* Kernel.pipe(
        Effect.map((kernel) => kernel.report),
        Effect.provide(Kernel.layer(options(journal, ["cells/failing", "cells/gamma"], "lenient")))
      )
      expect(report.loaded).toEqual(["gamma"])
      expect(report.failed.map((failure) => failure.id)).toEqual(["cells/failing"])
    }))

  it.live("strict start fails and still tears down what was built", () =>
    Effect.gen(function*() {
      const journal = yield* Ref.make<ReadonlyArray<string>>([])
      const exit = yield* Effect.exit(
        Effect.provide(Kernel, Kernel.layer(options(journal, ["cells/alpha", "cells/failing"])))
      )
      expect(Exit.isFailure(exit)).toBe(true)
      expect(yield* Ref.get(journal)).toEqual(["make alpha", "teardown alpha accepting=false"])
    }))
})
