/**
 * Inline Process Manager
 *
 * Runs work units in this process with the same admission, timeout and error
 * taxonomy as the worker pool. Used when the pool is disabled and in tests.
 * A unit that blocks the event loop blocks the kernel too.
 */
import { Deferred, Duration, Effect, Layer, Option, Ref } from "effect"

import { type JsonValue, WorkUnitId } from "../../domain.ts"
import { ExecutionError, Overloaded, ShuttingDown, Timeout, type WorkFailure } from "../../errors.ts"
import { ProcessManager } from "../services.ts"
import { runTask } from "../task-runner.ts"
import type { PoolStats, ProcessManagerConfig, WorkHandle, WorkUnit } from "../types.ts"

interface InlineState {
  readonly accepting: boolean
  readonly running: number
  readonly counter: number
  readonly outstanding: ReadonlyMap<WorkUnitId, Deferred.Deferred<JsonValue, WorkFailure>>
}

const queuedIn = (state: InlineState): number => state.outstanding.size - state.running

type Admission =
  | { readonly _tag: "Admitted"; readonly id: WorkUnitId }
  | { readonly _tag: "Rejected"; readonly error: Overloaded | ShuttingDown }

export const makeInlineManager = (config: ProcessManagerConfig) =>
  Effect.gen(function*() {
    const scope = yield* Effect.scope
    const slots = Math.max(1, config.workers)
    const permits = yield* Effect.makeSemaphore(slots)
    const state = yield* Ref.make<InlineState>({
      accepting: true,
      running: 0,
      counter: 0,
      outstanding: new Map()
    })
    const defaultTimeout = Duration.decode(config.defaultTimeout)

    const withOutstanding = (
      current: InlineState,
      update: (outstanding: Map<WorkUnitId, Deferred.Deferred<JsonValue, WorkFailure>>) => void
    ) => {
      const outstanding = new Map(current.outstanding)
      update(outstanding)
      return outstanding
    }

    const execute = (id: WorkUnitId, unit: WorkUnit, deferred: Deferred.Deferred<JsonValue, WorkFailure>) => {
      const timeout = unit.timeout === undefined ? defaultTimeout : Duration.decode(unit.timeout)
      const running = Effect.acquireUseRelease(
        Ref.update(state, (current) => ({ ...current, running: current.running + 1 })),
        () => runTask(unit.task, unit.args ?? [], unit.kwargs ?? {}),
        () => Ref.update(state, (current) => ({ ...current, running: current.running - 1 }))
      )

      return running.pipe(
        permits.withPermits(1),
        Effect.mapError((failure) => new ExecutionError({ id, message: failure.message, stack: failure.stack })),
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () => new Timeout({ id, timeoutMs: Duration.toMillis(timeout) })
        }),
        Effect.exit,
        Effect.flatMap((exit) => Deferred.done(deferred, exit)),
        Effect.ensuring(Ref.update(state, (current) => ({
          ...current,
          outstanding: withOutstanding(current, (outstanding) => outstanding.delete(id))
        })))
      )
    }

    const submitAsync = (unit: WorkUnit): Effect.Effect<WorkHandle, Overloaded | ShuttingDown> =>
      Effect.gen(function*() {
        const deferred = yield* Deferred.make<JsonValue, WorkFailure>()
        const admission = yield* Ref.modify(state, (current): [Admission, InlineState] => {
          if (!current.accepting) return [{ _tag: "Rejected", error: new ShuttingDown() }, current]
          if (current.running >= slots && queuedIn(current) >= config.queueLimit) {
            return [{ _tag: "Rejected", error: new Overloaded({ queueLimit: config.queueLimit }) }, current]
          }
          const id = WorkUnitId.make(`unit-${current.counter + 1}`)
          return [{ _tag: "Admitted", id }, {
            ...current,
            counter: current.counter + 1,
            outstanding: withOutstanding(current, (outstanding) => outstanding.set(id, deferred))
          }]
        })
        if (admission._tag === "Rejected") return yield* Effect.fail(admission.error)

        const id = admission.id
        yield* Effect.forkIn(execute(id, unit, deferred), scope)
        return {
          id,
          await: Deferred.await(deferred),
          poll: Deferred.poll(deferred).pipe(
            Effect.flatMap(Option.match({
              onNone: () => Effect.succeedNone,
              onSome: (result) => Effect.asSome(Effect.exit(result))
            }))
          )
        }
      })

    const submit = (unit: WorkUnit) => Effect.flatMap(submitAsync(unit), (handle) => handle.await)

    const stats: Effect.Effect<PoolStats> = Effect.map(Ref.get(state), (current) => ({
      workers: slots,
      idle: slots - current.running,
      busy: current.running,
      queued: queuedIn(current),
      inFlight: current.outstanding.size,
      accepting: current.accepting
    }))

    const shutdown: Effect.Effect<void> = Effect.gen(function*() {
      const previous = yield* Ref.getAndUpdate(state, (current) => ({ ...current, accepting: false }))
      if (!previous.accepting) return
      const outstanding = Array.from(previous.outstanding.values())
      yield* Effect.forEach(outstanding, (deferred) => Effect.exit(Deferred.await(deferred)), {
        concurrency: "unbounded",
        discard: true
      }).pipe(Effect.timeoutOption(config.shutdownGrace))
      const left = (yield* Ref.get(state)).outstanding
      yield* Effect.forEach(left.values(), (deferred) => Deferred.fail(deferred, new ShuttingDown()), {
        discard: true
      })
      yield* Effect.logDebug("Inline process manager stopped")
    })

    yield* Effect.addFinalizer(() => shutdown)

    return ProcessManager.of({
      submit,
      submitAsync,
      submitAll: (batch) => Effect.forEach(batch, submit, { concurrency: slots }),
      stats,
      shutdown
    })
  })

export const InlineProcessManagerLive = (config: ProcessManagerConfig) =>
  Layer.scoped(ProcessManager, makeInlineManager(config))
