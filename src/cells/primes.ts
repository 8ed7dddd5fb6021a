/**
 * Primes cell. Offloads CPU-bound math to the process manager so dispatch
 * never blocks on it.
 */
import { Effect, Option, Schema } from "effect"
import { argumentList, argumentText } from "../arguments.ts"
import { defineCell, makeCell } from "../cell.ts"
import type { ArgumentValue } from "../domain.ts"
import { ProcessManager, taskRef, type WorkUnit } from "../process-manager/index.ts"

const MATH_TASKS = new URL("../tasks/math.ts", import.meta.url)

export const countPrimesTask = taskRef(MATH_TASKS, "countPrimes")
export const fibonacciTask = taskRef(MATH_TASKS, "fibonacci")

export class InvalidLimit extends Schema.TaggedError<InvalidLimit>()(
  "InvalidLimit",
  { input: Schema.String }
) {
  override get message() {
    return `Expected a non-negative integer, got '${this.input}'`
  }
}

const parseCount = (raw: string): Effect.Effect<number, InvalidLimit> => {
  const trimmed = raw.trim()
  return /^\d+$/.test(trimmed)
    ? Effect.succeed(Number(trimmed))
    : Effect.fail(new InvalidLimit({ input: raw }))
}

const parseCounts = (args: ArgumentValue): Effect.Effect<ReadonlyArray<number>, InvalidLimit> =>
  Option.match(argumentList(args), {
    onNone: () => Effect.forEach(argumentText(args).split(","), parseCount),
    onSome: (items) =>
      Effect.forEach(items, (item): Effect.Effect<number, InvalidLimit> =>
        typeof item === "number" && Number.isInteger(item) && item >= 0
          ? Effect.succeed(item)
          : Effect.fail(new InvalidLimit({ input: JSON.stringify(item) })))
  })

export const Primes = defineCell({
  id: "cells/primes",
  name: "primes",
  services: [ProcessManager],
  make: (resolver) =>
    Effect.gen(function*() {
      const processManager = yield* resolver.service(ProcessManager)

      const countUnit = (limit: number): WorkUnit => ({ task: countPrimesTask, args: [limit] })

      return makeCell({
        name: "primes",
        commands: {
          count: {
            description: "Counts primes below a limit, e.g. primes:count:100000",
            run: (args) =>
              parseCount(argumentText(args)).pipe(
                Effect.flatMap((limit) => processManager.submit(countUnit(limit)))
              )
          },
          batch: {
            description: "Counts primes for several limits in parallel, e.g. primes:batch:[10,100,1000]",
            run: (args) =>
              parseCounts(args).pipe(
                Effect.flatMap((limits) => processManager.submitAll(limits.map(countUnit)))
              )
          },
          fibonacci: {
            description: "Computes the n-th Fibonacci number",
            run: (args) =>
              parseCount(argumentText(args)).pipe(
                Effect.flatMap((n) => processManager.submit({ task: fibonacciTask, args: [n] }))
              )
          }
        }
      })
    })
})
