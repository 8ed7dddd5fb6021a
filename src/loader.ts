/**
 * CellLoader - builds configured cells in order.
 *
 * For each identifier: look up the definition, build its declared cell
 * dependencies first, resolve its services, run `make`, register the cell and
 * subscribe its event handlers. Under the `strict` policy the first error
 * aborts; under `lenient` the cell is skipped along with everything that
 * depends on it.
 */

import { Cause, Effect, Option, Ref } from "effect"
import type { Cell, CellDefinition } from "./cell.ts"
import { CellCatalog } from "./catalog.ts"
import {
  CellConstructionError,
  CircularDependency,
  describeFailure,
  DuplicateCell,
  isLoadError,
  type LoadError,
  UnresolvedDependency
} from "./errors.ts"
import { EventBus } from "./event-bus.ts"
import { Injector } from "./injector.ts"
import { CellRegistry } from "./registry.ts"

export type LoadPolicy = "strict" | "lenient"

export interface LoadFailure {
  readonly id: string
  readonly error: LoadError
}

export interface LoadReport {
  /** Cell names in load order, dependencies included */
  readonly loaded: ReadonlyArray<string>
  readonly failed: ReadonlyArray<LoadFailure>
}

interface LoaderState {
  /** name → the cell and the identifier of the definition that built it */
  readonly built: ReadonlyMap<string, { readonly id: string; readonly cell: Cell }>
  readonly failed: ReadonlyMap<string, LoadError>
  readonly report: ReadonlyArray<LoadFailure>
}

export class CellLoader extends Effect.Service<CellLoader>()("@cell-kernel/CellLoader", {
  effect: Effect.gen(function*() {
    const catalog = yield* CellCatalog
    const registry = yield* CellRegistry
    const injector = yield* Injector
    const bus = yield* EventBus

    const load = Effect.fn("CellLoader.load")(function*(ids: ReadonlyArray<string>, policy: LoadPolicy) {
      const state = yield* Ref.make<LoaderState>({ built: new Map(), failed: new Map(), report: [] })

      const recordFailure = (definition: CellDefinition, error: LoadError) =>
        Ref.update(state, (current) => {
          if (current.failed.has(definition.name)) return current
          const failed = new Map(current.failed)
          failed.set(definition.name, error)
          return { ...current, failed, report: [...current.report, { id: definition.id, error }] }
        })

      const runMake = (definition: CellDefinition): Effect.Effect<Cell, LoadError> =>
        injector.resolveFor(definition, registry.find).pipe(
          Effect.flatMap((resolver) => Effect.suspend(() => definition.make(resolver))),
          Effect.catchAllCause((cause) => {
            const error = Cause.squash(cause)
            return Effect.fail(
              isLoadError(error)
                ? error
                : new CellConstructionError({ id: definition.id, message: describeFailure(error), cause: error })
            )
          }),
          Effect.filterOrFail(
            (cell) => cell.name === definition.name,
            (cell) =>
              new CellConstructionError({
                id: definition.id,
                message: `Constructor returned a cell named '${cell.name}', expected '${definition.name}'`
              })
          )
        )

      const construct = (definition: CellDefinition, path: ReadonlyArray<string>): Effect.Effect<Cell, LoadError> =>
        Effect.gen(function*() {
          const current = yield* Ref.get(state)
          const existing = current.built.get(definition.name)
          if (existing !== undefined) {
            if (existing.id === definition.id) return existing.cell
            return yield* Effect.fail(new DuplicateCell({ cellName: definition.name }))
          }
          if (path.includes(definition.name)) {
            return yield* Effect.fail(new CircularDependency({ path: [...path, definition.name] }))
          }

          for (const dependencyName of definition.cells) {
            if (current.failed.has(dependencyName)) {
              return yield* Effect.fail(
                new UnresolvedDependency({ key: dependencyName, requester: definition.name, reason: "failed" })
              )
            }
            const dependency = catalog.byName(dependencyName)
            if (Option.isNone(dependency)) {
              return yield* Effect.fail(
                new UnresolvedDependency({ key: dependencyName, requester: definition.name, reason: "unknown" })
              )
            }
            yield* construct(dependency.value, [...path, definition.name])
          }

          const cell = yield* runMake(definition)
          yield* registry.register(cell)
          yield* Ref.update(state, (latest) => {
            const built = new Map(latest.built)
            built.set(cell.name, { id: definition.id, cell })
            return { ...latest, built }
          })
          for (const [eventName, handler] of cell.events) {
            yield* bus.subscribe(eventName, handler, cell.name)
          }
          yield* Effect.logInfo("Cell loaded").pipe(Effect.annotateLogs({ cell: cell.name, id: definition.id }))
          return cell
        }).pipe(Effect.tapError((error) => recordFailure(definition, error)))

      const seen = new Set<string>()
      for (const id of ids) {
        const attempt = Effect.gen(function*() {
          if (seen.has(id)) {
            const definition = yield* catalog.lookup(id)
            return yield* Effect.fail(new DuplicateCell({ cellName: definition.name }))
          }
          seen.add(id)
          const definition = yield* catalog.lookup(id)
          yield* construct(definition, [])
        })

        const outcome = yield* Effect.either(attempt)
        if (outcome._tag === "Right") continue

        const error = outcome.left
        const current = yield* Ref.get(state)
        if (!current.report.some((entry) => entry.error === error)) {
          yield* Ref.update(state, (latest) => ({ ...latest, report: [...latest.report, { id, error }] }))
        }
        if (policy === "strict") return yield* Effect.fail(error)
        yield* Effect.logError("Cell failed to load; skipping", error.message).pipe(
          Effect.annotateLogs({ id, error: error._tag })
        )
      }

      const final = yield* Ref.get(state)
      const report: LoadReport = { loaded: Array.from(final.built.keys()), failed: final.report }
      return report
    })

    return { load }
  }),
  accessors: true
}) {}
