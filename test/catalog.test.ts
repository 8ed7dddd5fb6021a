import { describe, expect, it } from "@effect/vitest"
import { Effect, Option } from "effect"
import { defineCell, makeCell } from "../src/cell.ts"
import { CellCatalog, lintCatalog } from "../src/catalog.ts"
import { builtinCells } from "../src/cells/index.ts"
import { EventBus } from "../src/event-bus.ts"

const stub = (id: string, name: string, cells: ReadonlyArray<string> = []) =>
  defineCell({ id, name, cells, make: () => Effect.succeed(makeCell({ name, commands: {} })) })

describe("CellCatalog", () => {
  it.effect("looks definitions up by identifier and by name", () =>
    Effect.gen(function*() {
      const catalog = yield* CellCatalog
      const definition = yield* catalog.lookup("cells/a")
      expect(definition.name).toBe("a")
      expect(Option.map(catalog.byName("b"), (found) => found.id)).toEqual(Option.some("cells/b"))

      const error = yield* Effect.flip(catalog.lookup("cells/missing"))
      expect(error._tag).toBe("UnknownCell")
      expect(error.message).toBe("No cell definition with identifier 'cells/missing'")
    }).pipe(Effect.provide(CellCatalog.make([stub("cells/a", "a"), stub("cells/b", "b")]))))
})

describe("lintCatalog", () => {
  it("accepts the built-in cells", () => {
    expect(lintCatalog(builtinCells)).toEqual([])
  })

  it("reports duplicate identifiers and names", () => {
    const findings = lintCatalog([stub("cells/a", "a"), stub("cells/a", "other"), stub("cells/c", "a")])
    expect(findings).toEqual([
      { severity: "error", id: "cells/a", message: "Duplicate identifier" },
      { severity: "error", id: "cells/c", message: "Cell name 'a' is already used by cells/a" }
    ])
  })

  it("reports invalid names and unknown dependencies", () => {
    const findings = lintCatalog([stub("cells/bad", "bad name"), stub("cells/x", "x", ["ghost"])])
    expect(findings).toEqual([
      { severity: "error", id: "cells/bad", message: "Invalid cell name 'bad name'" },
      { severity: "error", id: "cells/x", message: "Depends on unknown cell 'ghost'" }
    ])
  })

  it("reports dependency cycles once", () => {
    const findings = lintCatalog([stub("cells/a", "a", ["b"]), stub("cells/b", "b", ["a"]), stub("cells/c", "c", ["a"])])
    expect(findings).toEqual([
      { severity: "error", id: "cells/a", message: "Circular cell dependency: a -> b -> a" }
    ])
  })

  it("warns about services declared twice", () => {
    const definition = defineCell({
      id: "cells/noisy",
      name: "noisy",
      services: [EventBus, EventBus],
      make: () => Effect.succeed(makeCell({ name: "noisy", commands: {} }))
    })
    expect(lintCatalog([definition])).toEqual([
      { severity: "warning", id: "cells/noisy", message: "Service '@cell-kernel/EventBus' declared more than once" }
    ])
  })
})
