/**
 * Router - single entry point for inbound messages.
 *
 * `handle` never fails: every problem becomes an error envelope. Command
 * handlers run in the calling fiber; there is no per-cell serialization.
 */

import { Cause, Effect, Either } from "effect"
import { decodeArgumentsLogged } from "./arguments.ts"
import type { Address } from "./domain.ts"
import { CommandNotFound, describeFailure, HandlerFailure, isKernelError, type KernelError } from "./errors.ts"
import { EventBus } from "./event-bus.ts"
import { decodeEnvelope, encodeAck, encodeError, encodeResult, isCommandMessage, parseAddress } from "./protocol.ts"
import { CellRegistry } from "./registry.ts"

const classifyFailure = (address: Address, cause: Cause.Cause<unknown>): KernelError | HandlerFailure => {
  const error = Cause.squash(cause)
  return isKernelError(error)
    ? error
    : new HandlerFailure({
      cellName: address.cellName,
      target: address.command,
      message: describeFailure(error),
      cause: error
    })
}

export class Router extends Effect.Service<Router>()("@cell-kernel/Router", {
  effect: Effect.gen(function*() {
    const registry = yield* CellRegistry
    const bus = yield* EventBus

    const dispatch = Effect.fn("Router.dispatch")(function*(address: Address) {
      const cell = yield* registry.resolve(address.cellName)
      const command = cell.commands.get(address.command)
      if (command === undefined) {
        return yield* Effect.fail(new CommandNotFound({ cellName: address.cellName, command: address.command }))
      }
      const args = yield* decodeArgumentsLogged(address.rawArgs)
      return yield* Effect.suspend(() => command.run(args)).pipe(
        Effect.flatMap((result) => Effect.sync(() => encodeResult(result))),
        Effect.catchAllCause((cause) => Effect.fail(classifyFailure(address, cause)))
      )
    })

    const handleCommand = (message: string): Effect.Effect<string> =>
      Either.match(parseAddress(message), {
        onLeft: (error) =>
          Effect.logWarning("Rejected command message", error.message).pipe(Effect.as(encodeError(error))),
        onRight: (address) =>
          dispatch(address).pipe(
            Effect.tap(() => Effect.logDebug("Command handled")),
            Effect.catchAll((error) =>
              Effect.logWarning("Command failed", error.message).pipe(
                Effect.annotateLogs("error", error._tag),
                Effect.as(encodeError(error))
              )
            ),
            Effect.annotateLogs({ cell: address.cellName, command: address.command })
          )
      })

    const handleEvent = (message: string): Effect.Effect<string> =>
      Either.match(decodeEnvelope(message), {
        onLeft: (error) =>
          Effect.logWarning("Rejected event message", error.message).pipe(Effect.as(encodeError(error))),
        onRight: (envelope) =>
          bus.publish(envelope.event_name, envelope.payload).pipe(
            Effect.map((report) => encodeAck(report.eventName, report.delivered, report.failed.length))
          )
      })

    const handle = (message: string): Effect.Effect<string> =>
      (isCommandMessage(message) ? handleCommand(message) : handleEvent(message)).pipe(
        Effect.catchAllDefect((defect) =>
          Effect.logError("Unexpected routing defect", defect).pipe(
            Effect.as(encodeError({ _tag: "HandlerFailure", message: describeFailure(defect) }))
          )
        )
      )

    return { handle }
  }),
  accessors: true
}) {}
