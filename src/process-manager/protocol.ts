/**
 * Worker IPC messages.
 *
 * manager → worker: Run
 * worker → manager: Ready once at startup, then Done or Failed per Run
 */
import { Schema } from "effect"

import { JsonObject, JsonValue } from "../domain.ts"

export const TaskRefSchema = Schema.Struct({
  module: Schema.String,
  name: Schema.String
})

export const RunRequest = Schema.TaggedStruct("Run", {
  id: Schema.String,
  task: TaskRefSchema,
  args: Schema.Array(JsonValue),
  kwargs: JsonObject
})
export type RunRequest = typeof RunRequest.Type

export const WorkerReady = Schema.TaggedStruct("Ready", {})

export const WorkDone = Schema.TaggedStruct("Done", {
  id: Schema.String,
  value: JsonValue
})

export const WorkFailed = Schema.TaggedStruct("Failed", {
  id: Schema.String,
  message: Schema.String,
  stack: Schema.optional(Schema.String)
})

export const WorkerMessage = Schema.Union(WorkerReady, WorkDone, WorkFailed)
export type WorkerMessage = typeof WorkerMessage.Type

export const decodeRunRequest = Schema.decodeUnknownEither(RunRequest)
export const decodeWorkerMessage = Schema.decodeUnknownEither(WorkerMessage)
