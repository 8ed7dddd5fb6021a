/**
 * JSON echo cell. Shows how text, mapping and list arguments reach handlers.
 */
import { Effect, Option } from "effect"
import { argumentList, argumentMapping, argumentText } from "../arguments.ts"
import { defineCell, makeCell } from "../cell.ts"
import type { ArgumentValue, JsonObject, JsonValue } from "../domain.ts"

const SALUTATIONS: Readonly<Record<string, string>> = {
  en: "Hello, {name}!",
  de: "Hallo, {name}!",
  zh: "你好，{name}！"
}

const text = (value: JsonValue | undefined, fallback: string): string =>
  typeof value === "string" ? value : fallback

const mappingOrEmpty = (args: ArgumentValue): JsonObject => Option.getOrElse(argumentMapping(args), () => ({}))

export const salute = (data: JsonObject): string => {
  const name = text(data["name"], "Unknown")
  const template = SALUTATIONS[text(data["language"], "en")] ?? "Hello, {name}!"
  return template.replace("{name}", name)
}

export const summarize = (items: ReadonlyArray<JsonValue>): string =>
  `Received ${items.length} item(s): ${
    items.map((item) => (typeof item === "string" ? item : JSON.stringify(item))).join(", ")
  }`

export const JsonEcho = defineCell({
  id: "cells/json-echo",
  name: "json_echo",
  make: () =>
    Effect.succeed(makeCell({
      name: "json_echo",
      commands: {
        echo: {
          description: "Echoes the raw argument text",
          run: (args) => Effect.succeed(`Echo: ${argumentText(args)}`)
        },
        greet: {
          description: "Greets {\"name\", \"language\"}; language is en, de or zh",
          run: (args) => Effect.succeed(salute(mappingOrEmpty(args)))
        },
        batch: {
          description: "Summarizes a JSON list",
          run: (args) =>
            Effect.succeed(summarize(Option.getOrElse(argumentList(args), (): ReadonlyArray<JsonValue> => [])))
        },
        complex: {
          description: "Echoes the user, tags and metadata fields of a JSON object",
          run: (args) => {
            const data = mappingOrEmpty(args)
            const result: JsonObject = {
              status: "success",
              user: data["user"] ?? {},
              tags: data["tags"] ?? [],
              metadata: data["metadata"] ?? {}
            }
            return Effect.succeed(result)
          }
        }
      }
    }))
})
