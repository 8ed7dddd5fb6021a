/**
 * Calculator cell.
 *
 * Evaluates arithmetic expressions and keeps a bounded history. Each request
 * publishes `calc.requested` followed by `calc.completed` or `calc.error`; the
 * cell subscribes to those events itself and logs them.
 */
import { Effect, Either, Ref } from "effect"
import { argumentText } from "../arguments.ts"
import { type CellLog, defineCell, type EventHandler, makeCell } from "../cell.ts"
import type { JsonObject, JsonValue } from "../domain.ts"
import { EventBus } from "../event-bus.ts"
import { evaluate } from "./arithmetic.ts"

export const HISTORY_LIMIT = 50

export interface HistoryEntry {
  readonly expression: string
  readonly result: number
}

const field = (payload: JsonObject, key: string): string => {
  const value = payload[key]
  return value === undefined ? "" : typeof value === "string" ? value : JSON.stringify(value)
}

const eventLoggers = (log: CellLog): Record<string, EventHandler> => ({
  "calc.requested": (_, payload) => log.info(`Calculation requested: ${field(payload, "expression")}`),
  "calc.completed": (_, payload) =>
    log.info(`Calculation completed: ${field(payload, "expression")} = ${field(payload, "result")}`),
  "calc.error": (_, payload) =>
    log.warning(`Calculation failed: ${field(payload, "expression")} - ${field(payload, "error")}`)
})

export const Calculator = defineCell({
  id: "cells/calculator",
  name: "calculator",
  services: [EventBus],
  make: (resolver) =>
    Effect.gen(function*() {
      const bus = yield* resolver.service(EventBus)
      const history = yield* Ref.make<ReadonlyArray<HistoryEntry>>([])
      // Publish and record as one step so history order matches event order
      const lock = yield* Effect.makeSemaphore(1)

      const calculate = (expression: string) =>
        lock.withPermits(1)(
          Effect.gen(function*() {
            yield* bus.publish("calc.requested", { expression })
            const result = evaluate(expression)
            if (Either.isLeft(result)) {
              yield* bus.publish("calc.error", { expression, error: result.left.message })
              return yield* Effect.fail(result.left)
            }
            yield* bus.publish("calc.completed", { expression, result: result.right })
            const entry: HistoryEntry = { expression, result: result.right }
            yield* Ref.update(history, (entries) => [...entries, entry].slice(-HISTORY_LIMIT))
            return result.right
          })
        )

      return makeCell({
        name: "calculator",
        commands: {
          calc: {
            description: "Evaluates an arithmetic expression, e.g. calculator:calc:2*(3+4)",
            run: (args) => calculate(argumentText(args))
          },
          eval: {
            description: "Same as calc",
            run: (args) => calculate(argumentText(args))
          },
          history: {
            description: "Lists recent calculations, oldest first",
            run: () =>
              Ref.get(history).pipe(
                Effect.map((entries): JsonValue => entries.map(({ expression, result }) => ({ expression, result })))
              )
          },
          clear: {
            description: "Clears the history",
            run: () => Ref.set(history, [])
          }
        },
        events: eventLoggers(resolver.log)
      })
    })
})
