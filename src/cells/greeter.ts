/**
 * Greeter cell: `greeter:greet:<text>`
 */
import { Effect } from "effect"
import { argumentText } from "../arguments.ts"
import { defineCell, makeCell } from "../cell.ts"

export const greet = (text: string): string => {
  const trimmed = text.trim()
  return trimmed === "" ? "Hello" : `Hello, ${trimmed}`
}

export const Greeter = defineCell({
  id: "cells/greeter",
  name: "greeter",
  make: () =>
    Effect.succeed(makeCell({
      name: "greeter",
      commands: {
        greet: {
          description: "Greets the given text, e.g. greeter:greet:world",
          run: (args) => Effect.sync(() => greet(argumentText(args)))
        }
      }
    }))
})
