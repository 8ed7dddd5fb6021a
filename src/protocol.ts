/**
 * Inbound message grammar and reply encoding.
 *
 * Command messages:  `<cell>:<command>[:<args>]` (args may contain `:`)
 * Event messages:    `{"event_name": "...", "payload": {...}}`
 * Replies:           plain result text, an event acknowledgement, or
 *                    `{"error": "<kind>", "message": "<detail>"}`
 */
import { Either, Schema } from "effect"
import { Address, EventEnvelope } from "./domain.ts"
import { InvalidAddress, InvalidEnvelope } from "./errors.ts"

// =============================================================================
// Classification
// =============================================================================

/** A `:` before any `{` or `[` marks a command message */
export const isCommandMessage = (message: string): boolean => {
  for (const char of message) {
    if (char === ":") return true
    if (char === "{" || char === "[") return false
  }
  return false
}

// =============================================================================
// Command Addresses
// =============================================================================

const decodeAddress = Schema.decodeUnknownEither(Address)

export const parseAddress = (message: string): Either.Either<Address, InvalidAddress> => {
  const first = message.indexOf(":")
  if (first < 0) {
    return Either.left(
      new InvalidAddress({ input: message, message: "Expected '<cell>:<command>[:<args>]'" })
    )
  }
  const second = message.indexOf(":", first + 1)
  const cellName = message.slice(0, first)
  const command = second < 0 ? message.slice(first + 1) : message.slice(first + 1, second)
  const rawArgs = second < 0 ? "" : message.slice(second + 1)

  return Either.mapLeft(
    decodeAddress({ cellName, command, rawArgs }),
    () =>
      new InvalidAddress({
        input: message,
        message: `Invalid address '${cellName}:${command}': cell and command must be non-empty identifiers`
      })
  )
}

/** Builds a command message, encoding structured arguments as JSON */
export const formatCommand = (cellName: string, command: string, args: unknown = ""): string =>
  `${cellName}:${command}:${typeof args === "string" ? args : JSON.stringify(args)}`

// =============================================================================
// Event Envelopes
// =============================================================================

const decodeEnvelopeJson = Schema.decodeEither(Schema.parseJson(EventEnvelope))

export const decodeEnvelope = (message: string): Either.Either<EventEnvelope, InvalidEnvelope> =>
  Either.mapLeft(decodeEnvelopeJson(message), (error) => new InvalidEnvelope({ message: error.message }))

export const encodeAck = (eventName: string, delivered: number, failed: number): string =>
  JSON.stringify({ event: eventName, delivered, failed })

// =============================================================================
// Replies
// =============================================================================

export const encodeResult = (value: unknown): string => {
  if (value === undefined) return ""
  if (typeof value === "string") return value
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value)
  }
  return JSON.stringify(value)
}

export const encodeError = (error: { readonly _tag: string; readonly message: string }): string =>
  JSON.stringify({ error: error._tag, message: error.message })
