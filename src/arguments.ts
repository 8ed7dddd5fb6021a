/**
 * Argument decoding.
 *
 * Raw argument strings starting with `{` or `[` are decoded as JSON; anything
 * else, and anything that fails to decode, is passed through as text.
 */
import { Effect, Either, Option, Schema } from "effect"
import { ArgumentValue, JsonArray, JsonObject } from "./domain.ts"
import { ArgumentDecodeFallback } from "./errors.ts"

const decodeMapping = Schema.decodeEither(Schema.parseJson(JsonObject))
const decodeList = Schema.decodeEither(Schema.parseJson(JsonArray))

export interface DecodedArguments {
  readonly value: ArgumentValue
  readonly fallback: Option.Option<ArgumentDecodeFallback>
}

const settle = (
  raw: string,
  decoded: Either.Either<ArgumentValue, { readonly message: string }>
): DecodedArguments =>
  Either.match(decoded, {
    onLeft: (error) => ({
      value: ArgumentValue.Text({ value: raw }),
      fallback: Option.some(new ArgumentDecodeFallback({ raw, reason: error.message }))
    }),
    onRight: (value) => ({ value, fallback: Option.none() })
  })

/** Pure decoder; never throws */
export const decodeArguments = (raw: string): DecodedArguments => {
  if (raw.startsWith("{")) {
    return settle(raw, Either.map(decodeMapping(raw), (entries) => ArgumentValue.Mapping({ entries })))
  }
  if (raw.startsWith("[")) {
    return settle(raw, Either.map(decodeList(raw), (items) => ArgumentValue.List({ items })))
  }
  return { value: ArgumentValue.Text({ value: raw }), fallback: Option.none() }
}

/** Decodes and logs a fallback at debug level */
export const decodeArgumentsLogged = (raw: string): Effect.Effect<ArgumentValue> => {
  const { fallback, value } = decodeArguments(raw)
  return Option.match(fallback, {
    onNone: () => Effect.succeed(value),
    onSome: (record) =>
      Effect.logDebug("Structured arguments fell back to text", record.reason).pipe(
        Effect.annotateLogs("raw", record.raw),
        Effect.as(value)
      )
  })
}

// =============================================================================
// Handler Helpers
// =============================================================================

/** Text of the arguments; structured values are re-encoded as JSON */
export const argumentText = (args: ArgumentValue): string =>
  ArgumentValue.$match(args, {
    Text: ({ value }) => value,
    List: ({ items }) => JSON.stringify(items),
    Mapping: ({ entries }) => JSON.stringify(entries)
  })

export const argumentMapping = (args: ArgumentValue): Option.Option<JsonObject> =>
  ArgumentValue.$is("Mapping")(args) ? Option.some(args.entries) : Option.none()

export const argumentList = (args: ArgumentValue): Option.Option<JsonArray> =>
  ArgumentValue.$is("List")(args) ? Option.some(args.items) : Option.none()
