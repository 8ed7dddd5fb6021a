/**
 * CellRegistry - name → cell, written once per cell during loading.
 *
 * Registration order is kept: `list` returns cells in load order and
 * `teardownAll` walks them in reverse.
 */

import { Effect, Option, Ref } from "effect"
import type { Cell } from "./cell.ts"
import { CellNotFound, DuplicateCell } from "./errors.ts"
import { EventBus } from "./event-bus.ts"

export interface CellDescription {
  readonly cell: string
  readonly commands: Readonly<Record<string, string>>
  readonly events: ReadonlyArray<string>
}

export const describeCell = (cell: Cell): CellDescription => ({
  cell: cell.name,
  commands: Object.fromEntries(Array.from(cell.commands, ([name, spec]) => [name, spec.description])),
  events: Array.from(cell.events.keys())
})

export class CellRegistry extends Effect.Service<CellRegistry>()("@cell-kernel/CellRegistry", {
  effect: Effect.gen(function*() {
    const bus = yield* EventBus
    // Map iteration order is insertion order, i.e. load order
    const cells = yield* Ref.make<ReadonlyMap<string, Cell>>(new Map())

    const register = (cell: Cell): Effect.Effect<void, DuplicateCell> =>
      Ref.modify(cells, (current): [boolean, ReadonlyMap<string, Cell>] => {
        if (current.has(cell.name)) return [false, current]
        const next = new Map(current)
        next.set(cell.name, cell)
        return [true, next]
      }).pipe(
        Effect.flatMap((added) =>
          added
            ? Effect.logDebug("Cell registered").pipe(Effect.annotateLogs("cell", cell.name))
            : Effect.fail(new DuplicateCell({ cellName: cell.name }))
        )
      )

    const find = (name: string): Effect.Effect<Option.Option<Cell>> =>
      Ref.get(cells).pipe(Effect.map((current) => Option.fromNullable(current.get(name))))

    const resolve = (name: string): Effect.Effect<Cell, CellNotFound> =>
      find(name).pipe(
        Effect.flatMap(Option.match({
          onNone: () => Effect.fail(new CellNotFound({ cellName: name })),
          onSome: Effect.succeed
        }))
      )

    const has = (name: string): Effect.Effect<boolean> => Effect.map(find(name), Option.isSome)

    const list: Effect.Effect<ReadonlyArray<Cell>> = Ref.get(cells).pipe(
      Effect.map((current) => Array.from(current.values()))
    )

    const describe: Effect.Effect<ReadonlyArray<CellDescription>> = Effect.map(
      list,
      (current) => current.map(describeCell)
    )

    /** Unregisters every cell in reverse load order, dropping its subscriptions before its teardown */
    const teardownAll: Effect.Effect<void> = Effect.gen(function*() {
      const current = yield* Ref.getAndSet(cells, new Map())
      for (const cell of Array.from(current.values()).reverse()) {
        yield* bus.unsubscribeAll(cell.name)
        yield* Effect.suspend(() => cell.teardown).pipe(
          Effect.catchAllCause((cause) => Effect.logWarning("Cell teardown failed", cause)),
          Effect.annotateLogs("cell", cell.name)
        )
        yield* Effect.logDebug("Cell torn down").pipe(Effect.annotateLogs("cell", cell.name))
      }
    })

    return {
      register,
      find,
      resolve,
      has,
      list,
      describe,
      teardownAll
    }
  }),
  accessors: true
}) {}
