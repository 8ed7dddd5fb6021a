/**
 * Kernel - wires every component and owns the shutdown sequence.
 *
 * Construction order: EventBus and ProcessManager, then Registry and
 * Injector, then the Loader builds the configured cells, then the Router.
 * Shutdown (explicit, or when the kernel scope closes):
 *   1. ProcessManager drains and stops its workers
 *   2. Cells are torn down in reverse load order
 *   3. The EventBus is cleared
 */

import { Effect, Layer, Ref } from "effect"
import type { CellDefinition } from "./cell.ts"
import { CellCatalog } from "./catalog.ts"
import { EventBus } from "./event-bus.ts"
import { Injector, type ServiceBinding } from "./injector.ts"
import { CellLoader, type LoadPolicy, type LoadReport } from "./loader.ts"
import { ProcessManager, ProcessManagerLive, type ProcessManagerConfig } from "./process-manager/index.ts"
import { CellRegistry } from "./registry.ts"
import { Router } from "./router.ts"

export interface KernelOptions {
  /** Available definitions; `cells` refers to them by identifier */
  readonly catalog: ReadonlyArray<CellDefinition>
  readonly cells: ReadonlyArray<string>
  readonly policy: LoadPolicy
  readonly processManager: ProcessManagerConfig
  /** Extra services cells may declare */
  readonly services?: ReadonlyArray<ServiceBinding>
}

const makeKernel = (options: KernelOptions) =>
  Effect.gen(function*() {
    const processManager = yield* ProcessManager
    const registry = yield* CellRegistry
    const bus = yield* EventBus
    const injector = yield* Injector
    const loader = yield* CellLoader
    const router = yield* Router

    const stopped = yield* Ref.make(false)
    const shutdown: Effect.Effect<void> = Effect.gen(function*() {
      if (yield* Ref.getAndSet(stopped, true)) return
      yield* Effect.logInfo("Kernel shutting down")
      yield* processManager.shutdown
      yield* registry.teardownAll
      yield* bus.clear
      yield* Effect.logInfo("Kernel stopped")
    })
    // Registered before loading so a failed strict load still tears down what it built
    yield* Effect.addFinalizer(() => shutdown)

    for (const binding of options.services ?? []) {
      yield* injector.provide(binding)
    }

    const report = yield* loader.load(options.cells, options.policy)
    yield* Effect.logInfo("Kernel started").pipe(
      Effect.annotateLogs({ loaded: report.loaded.length, failed: report.failed.length })
    )

    return {
      handle: router.handle,
      report,
      describe: registry.describe,
      stats: processManager.stats,
      shutdown
    }
  })

export class Kernel extends Effect.Tag("@cell-kernel/Kernel")<
  Kernel,
  Effect.Effect.Success<ReturnType<typeof makeKernel>>
>() {
  static readonly layer = (options: KernelOptions) =>
    Layer.scoped(Kernel, makeKernel(options)).pipe(
      Layer.provideMerge(Router.Default),
      Layer.provideMerge(CellLoader.Default),
      Layer.provideMerge(Layer.mergeAll(CellRegistry.Default, Injector.Default, CellCatalog.make(options.catalog))),
      Layer.provideMerge(Layer.mergeAll(EventBus.Default, ProcessManagerLive(options.processManager)))
    )
}

export type { LoadReport }
