/**
 * Domain types for the cell kernel.
 *
 * The view layer addresses a cell and one of its commands with a plain string;
 * the argument part stays opaque until it is decoded into an ArgumentValue.
 * Event messages carry a JSON envelope instead.
 */
import { Data, Schema } from "effect"

// -----------------------------------------------------------------------------
// Branded Names
// -----------------------------------------------------------------------------

const identifier = Schema.String.pipe(
  Schema.pattern(/^[A-Za-z0-9_.-]+$/, {
    message: () => "expected a non-empty identifier of letters, digits, '_', '.' or '-'"
  })
)

export const CellName = identifier.pipe(Schema.brand("CellName"))
export type CellName = typeof CellName.Type

export const CommandName = identifier.pipe(Schema.brand("CommandName"))
export type CommandName = typeof CommandName.Type

export const WorkUnitId = Schema.String.pipe(Schema.brand("WorkUnitId"))
export type WorkUnitId = typeof WorkUnitId.Type

// -----------------------------------------------------------------------------
// JSON Values
// -----------------------------------------------------------------------------

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue }

export const JsonValue: Schema.Schema<JsonValue> = Schema.Union(
  Schema.String,
  Schema.Number,
  Schema.Boolean,
  Schema.Null,
  Schema.Array(Schema.suspend((): Schema.Schema<JsonValue> => JsonValue)),
  Schema.Record({ key: Schema.String, value: Schema.suspend((): Schema.Schema<JsonValue> => JsonValue) })
)

export const JsonObject = Schema.Record({ key: Schema.String, value: JsonValue })
export type JsonObject = typeof JsonObject.Type

export const JsonArray = Schema.Array(JsonValue)
export type JsonArray = typeof JsonArray.Type

/** Payload delivered with a published event */
export type EventPayload = JsonObject

// -----------------------------------------------------------------------------
// Argument Values
// -----------------------------------------------------------------------------

/**
 * Decoded command arguments.
 *
 * Only the outer shape is tagged: `Text` for plain strings (including anything
 * that failed structured decoding), `List` for a JSON array, `Mapping` for a
 * JSON object. Nested elements stay plain JSON values.
 */
export type ArgumentValue = Data.TaggedEnum<{
  Text: { readonly value: string }
  List: { readonly items: JsonArray }
  Mapping: { readonly entries: JsonObject }
}>
export const ArgumentValue = Data.taggedEnum<ArgumentValue>()

// -----------------------------------------------------------------------------
// Addresses & Envelopes
// -----------------------------------------------------------------------------

/** Parsed `<cell>:<command>:<args>` triple */
export class Address extends Schema.Class<Address>("Address")({
  cellName: CellName,
  command: CommandName,
  rawArgs: Schema.String
}) {}

/** JSON envelope of an event message */
export const EventEnvelope = Schema.Struct({
  event_name: Schema.NonEmptyString,
  payload: Schema.optionalWith(JsonObject, { default: () => ({}) })
})
export type EventEnvelope = typeof EventEnvelope.Type
