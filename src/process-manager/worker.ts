/**
 * Worker process entry point.
 *
 * Forked by the pool with an IPC channel. Announces Ready, then answers each
 * Run with Done or Failed. Exits when the manager disconnects.
 */
import { Cause, Effect, Either, Exit, Option } from "effect"

import { decodeRunRequest, type RunRequest, type WorkerMessage } from "./protocol.ts"
import { runTask } from "./task-runner.ts"

const send = (message: WorkerMessage): Effect.Effect<void> =>
  Effect.async<void>((resume) => {
    if (process.send === undefined || !process.connected) {
      resume(Effect.void)
      return
    }
    process.send(message, undefined, undefined, () => resume(Effect.void))
  })

const run = (request: RunRequest): Effect.Effect<void> =>
  runTask(request.task, request.args, request.kwargs).pipe(
    Effect.exit,
    Effect.flatMap((exit) =>
      send(
        Exit.match(exit, {
          onSuccess: (value): WorkerMessage => ({ _tag: "Done", id: request.id, value }),
          onFailure: (cause) =>
            Option.match(Cause.failureOption(cause), {
              onNone: (): WorkerMessage => ({ _tag: "Failed", id: request.id, message: Cause.pretty(cause) }),
              onSome: (failure): WorkerMessage => ({
                _tag: "Failed",
                id: request.id,
                message: failure.message,
                stack: failure.stack
              })
            })
        })
      )
    )
  )

process.on("message", (raw: unknown) => {
  Either.match(decodeRunRequest(raw), {
    onLeft: (error) => Effect.runFork(Effect.logWarning("Ignoring malformed request", error.message)),
    onRight: (request) => Effect.runFork(run(request))
  })
})

process.on("disconnect", () => process.exit(0))

Effect.runFork(send({ _tag: "Ready" }))
