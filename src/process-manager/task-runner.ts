/**
 * Loads a task module and calls the named export.
 *
 * Shared by the worker process and the inline manager. Positional arguments
 * are spread; keyword arguments, when present, are passed as one trailing
 * object.
 */
import { Effect, Predicate, Schema } from "effect"

import { type JsonArray, type JsonObject, JsonValue } from "../domain.ts"
import { taskModuleUrl, type TaskRef } from "./types.ts"

export class TaskFailure extends Schema.TaggedError<TaskFailure>()(
  "TaskFailure",
  {
    message: Schema.String,
    stack: Schema.optional(Schema.String)
  }
) {}

const fromThrown = (prefix: string) => (error: unknown): TaskFailure =>
  error instanceof Error
    ? new TaskFailure({ message: `${prefix}${error.message}`, stack: error.stack })
    : new TaskFailure({ message: `${prefix}${String(error)}` })

const decodeResult = Schema.decodeUnknown(JsonValue)

export const runTask = (
  task: TaskRef,
  args: JsonArray,
  kwargs: JsonObject
): Effect.Effect<JsonValue, TaskFailure> =>
  Effect.gen(function*() {
    const loaded = yield* Effect.tryPromise({
      try: (): Promise<unknown> => import(taskModuleUrl(task)),
      catch: fromThrown(`Cannot load task module ${task.module}: `)
    })
    const fn = Predicate.hasProperty(loaded, task.name) ? loaded[task.name] : undefined
    if (!Predicate.isFunction(fn)) {
      return yield* Effect.fail(new TaskFailure({ message: `${task.module} has no callable export '${task.name}'` }))
    }

    const callArgs = Object.keys(kwargs).length > 0 ? [...args, kwargs] : [...args]
    const result = yield* Effect.tryPromise({
      try: async (): Promise<unknown> => fn(...callArgs),
      catch: fromThrown("")
    })

    return yield* decodeResult(result === undefined ? null : result).pipe(
      Effect.mapError(() => new TaskFailure({ message: `Task '${task.name}' returned a value that is not JSON` }))
    )
  })
