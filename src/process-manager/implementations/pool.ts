/**
 * Worker Process Pool
 *
 * Forks `workers` Node processes running `worker.ts` and feeds them one work
 * unit at a time over IPC. Worker output goes to stderr; stdout carries replies.
 *
 * - A unit goes to an idle worker, else into a bounded FIFO queue
 * - Deadlines are measured from submission; a running unit that misses its
 *   deadline costs its worker, which is killed and respawned
 * - A worker that exits mid-unit fails that unit with WorkerCrashed
 *
 * Slot, queue and unit bookkeeping is only touched while holding `lock`.
 * Child process events are pushed onto a mailbox and handled in order by a
 * single supervisor fiber.
 */
import { type ChildProcess, fork } from "node:child_process"
import { fileURLToPath } from "node:url"

import { Data, Deferred, Duration, Effect, Either, Exit, Fiber, Layer, Option, Queue } from "effect"

import { type JsonValue, WorkUnitId } from "../../domain.ts"
import {
  ExecutionError,
  Overloaded,
  ShuttingDown,
  Timeout,
  WorkerCrashed,
  type WorkFailure,
  WorkerStartupFailed
} from "../../errors.ts"
import { decodeWorkerMessage, type RunRequest } from "../protocol.ts"
import { ProcessManager } from "../services.ts"
import type { PoolStats, ProcessManagerConfig, WorkHandle, WorkUnit } from "../types.ts"

const workerEntry = fileURLToPath(new URL("../worker.ts", import.meta.url))

type SlotStatus = "starting" | "idle" | "busy" | "recycling" | "stopping" | "stopped"

interface WorkerSlot {
  readonly id: number
  child: ChildProcess
  status: SlotStatus
  current: Option.Option<WorkUnitId>
  failedStarts: number
  exited: Deferred.Deferred<void>
  readonly ready: Deferred.Deferred<void, WorkerStartupFailed>
}

interface PendingUnit {
  readonly request: RunRequest
  readonly timeoutMs: number
  readonly deferred: Deferred.Deferred<JsonValue, WorkFailure>
  timer: Option.Option<Fiber.RuntimeFiber<void>>
  worker: Option.Option<number>
}

type Signal = Data.TaggedEnum<{
  Message: { readonly slotId: number; readonly child: ChildProcess; readonly raw: unknown }
  Exit: {
    readonly slotId: number
    readonly child: ChildProcess
    readonly code: number | null
    readonly signal: string | null
  }
  Error: { readonly slotId: number; readonly child: ChildProcess; readonly error: Error }
}>
const Signal = Data.taggedEnum<Signal>()

const makeHandle = (id: WorkUnitId, deferred: Deferred.Deferred<JsonValue, WorkFailure>): WorkHandle => ({
  id,
  await: Deferred.await(deferred),
  poll: Deferred.poll(deferred).pipe(
    Effect.flatMap(Option.match({
      onNone: () => Effect.succeedNone,
      onSome: (result) => Effect.asSome(Effect.exit(result))
    }))
  )
})

export const makeWorkerPool = (config: ProcessManagerConfig) =>
  Effect.gen(function*() {
    const scope = yield* Effect.scope
    const lock = yield* Effect.makeSemaphore(1)
    const locked = lock.withPermits(1)
    const mailbox = yield* Queue.unbounded<Signal>()

    const slots = new Map<number, WorkerSlot>()
    const units = new Map<WorkUnitId, PendingUnit>()
    const queue: Array<WorkUnitId> = []
    let accepting = true
    let unitCounter = 0

    const defaultTimeout = Duration.decode(config.defaultTimeout)

    // -------------------------------------------------------------------------
    // Child processes
    // -------------------------------------------------------------------------

    const post = (signal: Signal) => {
      Effect.runSync(Queue.offer(mailbox, signal))
    }

    const spawn = (slotId: number): Effect.Effect<ChildProcess> =>
      Effect.sync(() => {
        const child = fork(workerEntry, [], {
          execArgv: [...config.workerExecArgv],
          stdio: ["ignore", 2, 2, "ipc"]
        })
        child.on("message", (raw: unknown) => post(Signal.Message({ slotId, child, raw })))
        child.on("exit", (code, signal) => post(Signal.Exit({ slotId, child, code, signal })))
        child.on("error", (error) => post(Signal.Error({ slotId, child, error })))
        return child
      })

    const kill = (child: ChildProcess, signal: NodeJS.Signals) =>
      Effect.sync(() => {
        if (child.exitCode === null && child.signalCode === null) child.kill(signal)
      })

    // -------------------------------------------------------------------------
    // Transitions (caller holds the lock)
    // -------------------------------------------------------------------------

    const settle = (id: WorkUnitId, exit: Exit.Exit<JsonValue, WorkFailure>, cancelTimer: boolean) =>
      Effect.gen(function*() {
        const unit = units.get(id)
        if (unit === undefined) return
        units.delete(id)
        if (cancelTimer && Option.isSome(unit.timer)) {
          yield* Fiber.interruptFork(unit.timer.value)
        }
        yield* Deferred.done(unit.deferred, exit)
      })

    const assign = (slot: WorkerSlot, id: WorkUnitId, unit: PendingUnit) =>
      Effect.gen(function*() {
        slot.status = "busy"
        slot.current = Option.some(id)
        unit.worker = Option.some(slot.id)
        const child = slot.child
        yield* Effect.sync(() => {
          if (!child.connected) {
            child.kill("SIGKILL")
            return
          }
          child.send(unit.request, (error) => {
            if (error !== null) child.kill("SIGKILL")
          })
        })
        yield* Effect.logDebug("Work unit dispatched").pipe(Effect.annotateLogs({ unit: id, worker: slot.id }))
      })

    const dispatchNext = (slot: WorkerSlot) =>
      Effect.gen(function*() {
        while (slot.status === "idle" && queue.length > 0) {
          const id = queue.shift()
          const unit = id === undefined ? undefined : units.get(id)
          if (id !== undefined && unit !== undefined) yield* assign(slot, id, unit)
        }
      })

    const findIdle = (): Option.Option<WorkerSlot> =>
      Option.fromNullable(Array.from(slots.values()).find((slot) => slot.status === "idle"))

    const respawn = (slot: WorkerSlot) =>
      Effect.gen(function*() {
        slot.child = yield* spawn(slot.id)
        slot.status = "starting"
        slot.current = Option.none()
        slot.exited = yield* Deferred.make<void>()
      })

    const expire = (id: WorkUnitId) =>
      Effect.gen(function*() {
        const unit = units.get(id)
        if (unit === undefined) return
        const position = queue.indexOf(id)
        if (position >= 0) queue.splice(position, 1)
        yield* settle(id, Exit.fail(new Timeout({ id, timeoutMs: unit.timeoutMs })), false)
        yield* Effect.logWarning("Work unit timed out").pipe(Effect.annotateLogs({ unit: id }))

        if (Option.isNone(unit.worker)) return
        const slot = slots.get(unit.worker.value)
        if (slot === undefined || Option.getOrUndefined(slot.current) !== id) return
        slot.status = "recycling"
        slot.current = Option.none()
        yield* kill(slot.child, "SIGKILL")
      })

    // -------------------------------------------------------------------------
    // Supervisor
    // -------------------------------------------------------------------------

    const onMessage = (slot: WorkerSlot, raw: unknown) =>
      Either.match(decodeWorkerMessage(raw), {
        onLeft: (error) =>
          Effect.logWarning("Unrecognised worker message", error.message).pipe(
            Effect.annotateLogs("worker", slot.id)
          ),
        onRight: (message) =>
          Effect.gen(function*() {
            if (message._tag === "Ready") {
              if (slot.status !== "starting") return
              slot.status = "idle"
              slot.failedStarts = 0
              yield* Deferred.succeed(slot.ready, undefined)
              yield* Effect.logDebug("Worker ready").pipe(Effect.annotateLogs("worker", slot.id))
              return yield* dispatchNext(slot)
            }

            const id = WorkUnitId.make(message.id)
            if (Option.getOrUndefined(slot.current) !== id) {
              // Response for a unit that already timed out
              return yield* Effect.logDebug("Ignoring late worker response").pipe(
                Effect.annotateLogs({ unit: id, worker: slot.id })
              )
            }
            slot.current = Option.none()
            slot.status = "idle"
            yield* settle(
              id,
              message._tag === "Done"
                ? Exit.succeed(message.value)
                : Exit.fail(new ExecutionError({ id, message: message.message, stack: message.stack })),
              true
            )
            yield* dispatchNext(slot)
          })
      })

    const onExit = (slot: WorkerSlot, code: number | null, signal: string | null) =>
      Effect.gen(function*() {
        yield* Deferred.succeed(slot.exited, undefined)
        const interrupted = slot.current
        slot.current = Option.none()

        if (Option.isSome(interrupted)) {
          const id = interrupted.value
          yield* settle(id, Exit.fail(new WorkerCrashed({ id, workerId: slot.id, exitCode: code, signal })), true)
          yield* Effect.logWarning("Worker crashed while running a work unit").pipe(
            Effect.annotateLogs({ unit: id, worker: slot.id, code, signal })
          )
        }

        if (!accepting || slot.status === "stopping") {
          slot.status = "stopped"
          return
        }

        if (slot.status === "starting") {
          slot.failedStarts++
          if (slot.failedStarts >= config.maxStartAttempts) {
            slot.status = "stopped"
            yield* Effect.logError("Worker failed to start; giving up on slot").pipe(
              Effect.annotateLogs({ worker: slot.id, attempts: slot.failedStarts })
            )
            yield* Deferred.fail(
              slot.ready,
              new WorkerStartupFailed({
                message: `Worker ${slot.id} exited ${slot.failedStarts} times before becoming ready`
              })
            )
            return
          }
        }

        yield* respawn(slot)
      })

    const handleSignal = (signal: Signal) =>
      Effect.gen(function*() {
        const slot = slots.get(signal.slotId)
        // Events from a replaced child process
        if (slot === undefined || slot.child !== signal.child) return

        yield* Signal.$match(signal, {
          Message: ({ raw }) => onMessage(slot, raw),
          Exit: ({ code, signal: killSignal }) => onExit(slot, code, killSignal),
          Error: ({ error }) =>
            Effect.logWarning("Worker process error", error.message).pipe(Effect.annotateLogs("worker", slot.id))
        })
      })

    // -------------------------------------------------------------------------
    // Submission
    // -------------------------------------------------------------------------

    const admit = (unit: WorkUnit) =>
      locked(
        Effect.gen(function*() {
          if (!accepting) return yield* Effect.fail(new ShuttingDown())
          const idle = findIdle()
          if (Option.isNone(idle) && queue.length >= config.queueLimit) {
            return yield* Effect.fail(new Overloaded({ queueLimit: config.queueLimit }))
          }

          unitCounter++
          const id = WorkUnitId.make(`unit-${unitCounter}`)
          const timeout = unit.timeout === undefined ? defaultTimeout : Duration.decode(unit.timeout)
          const deferred = yield* Deferred.make<JsonValue, WorkFailure>()
          const pending: PendingUnit = {
            request: { _tag: "Run", id, task: unit.task, args: unit.args ?? [], kwargs: unit.kwargs ?? {} },
            timeoutMs: Duration.toMillis(timeout),
            deferred,
            timer: Option.none(),
            worker: Option.none()
          }
          units.set(id, pending)
          // Cannot fire before we release the lock
          const timer = yield* Effect.sleep(timeout).pipe(
            Effect.zipRight(locked(expire(id))),
            Effect.forkIn(scope)
          )
          pending.timer = Option.some(timer)

          if (Option.isSome(idle)) yield* assign(idle.value, id, pending)
          else queue.push(id)

          return makeHandle(id, deferred)
        })
      )

    const submit = (unit: WorkUnit) => Effect.flatMap(admit(unit), (handle) => handle.await)

    const stats: Effect.Effect<PoolStats> = locked(
      Effect.sync(() => {
        const all = Array.from(slots.values())
        return {
          workers: all.filter((slot) => slot.status !== "stopped").length,
          idle: all.filter((slot) => slot.status === "idle").length,
          busy: all.filter((slot) => slot.status === "busy").length,
          queued: queue.length,
          inFlight: units.size,
          accepting
        }
      })
    )

    // -------------------------------------------------------------------------
    // Shutdown
    // -------------------------------------------------------------------------

    const shutdown: Effect.Effect<void> = Effect.gen(function*() {
      const first = yield* locked(Effect.sync(() => {
        const wasAccepting = accepting
        accepting = false
        return wasAccepting
      }))
      if (!first) return

      const outstanding = yield* locked(Effect.sync(() => Array.from(units.values(), (unit) => unit.deferred)))
      yield* Effect.logDebug("Process manager draining").pipe(Effect.annotateLogs("outstanding", outstanding.length))
      yield* Effect.forEach(outstanding, (deferred) => Effect.exit(Deferred.await(deferred)), {
        concurrency: "unbounded",
        discard: true
      }).pipe(Effect.timeoutOption(config.shutdownGrace))

      const exits = yield* locked(Effect.gen(function*() {
        queue.length = 0
        for (const id of Array.from(units.keys())) {
          yield* settle(id, Exit.fail(new ShuttingDown()), true)
        }
        const live = Array.from(slots.values()).filter((slot) => slot.status !== "stopped")
        for (const slot of live) {
          slot.status = "stopping"
          slot.current = Option.none()
          yield* kill(slot.child, "SIGTERM")
        }
        return live.map((slot) => ({ child: slot.child, exited: slot.exited }))
      }))

      const stopped = yield* Effect.forEach(exits, ({ exited }) => Deferred.await(exited), {
        concurrency: "unbounded",
        discard: true
      }).pipe(Effect.timeoutOption(config.killDelay))
      if (Option.isNone(stopped)) {
        yield* Effect.logWarning("Workers ignored SIGTERM; killing")
        yield* Effect.forEach(exits, ({ child }) => kill(child, "SIGKILL"), { discard: true })
      }
      yield* Effect.logDebug("Process manager stopped")
    })

    // -------------------------------------------------------------------------
    // Startup
    // -------------------------------------------------------------------------

    for (let id = 0; id < config.workers; id++) {
      slots.set(id, {
        id,
        child: yield* spawn(id),
        status: "starting",
        current: Option.none(),
        failedStarts: 0,
        exited: yield* Deferred.make<void>(),
        ready: yield* Deferred.make<void, WorkerStartupFailed>()
      })
    }

    yield* Queue.take(mailbox).pipe(
      Effect.flatMap((signal) => locked(handleSignal(signal))),
      Effect.forever,
      Effect.forkScoped
    )
    // Added after the supervisor so it runs first while child exits are still observed
    yield* Effect.addFinalizer(() => shutdown)

    yield* Effect.forEach(slots.values(), (slot) => Deferred.await(slot.ready), {
      concurrency: "unbounded",
      discard: true
    }).pipe(
      Effect.timeoutFail({
        duration: config.startupTimeout,
        onTimeout: () =>
          new WorkerStartupFailed({
            message: `Workers not ready within ${Duration.format(Duration.decode(config.startupTimeout))}`
          })
      })
    )
    yield* Effect.logDebug("Worker pool started").pipe(Effect.annotateLogs("workers", config.workers))

    return ProcessManager.of({
      submit,
      submitAsync: admit,
      submitAll: (batch) => Effect.forEach(batch, submit, { concurrency: Math.max(1, config.workers) }),
      stats,
      shutdown
    })
  })

export const WorkerPoolLive = (config: ProcessManagerConfig) => Layer.scoped(ProcessManager, makeWorkerPool(config))
