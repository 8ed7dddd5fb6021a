/**
 * Process Manager Types
 */
import type { Duration, Effect, Exit, Option } from "effect"
import { pathToFileURL } from "node:url"

import type { JsonArray, JsonObject, JsonValue, WorkUnitId } from "../domain.ts"
import type { Overloaded, ShuttingDown, WorkFailure } from "../errors.ts"

/**
 * A callable exported by a module; `module` is an absolute path or `file:` URL
 */
export interface TaskRef {
  readonly module: string
  readonly name: string
}

export const taskRef = (module: string | URL, name: string): TaskRef => ({
  module: module instanceof URL ? module.href : module,
  name
})

/** Import specifier for a task module */
export const taskModuleUrl = (task: TaskRef): string =>
  task.module.startsWith("file:") ? task.module : pathToFileURL(task.module).href

export interface WorkUnit {
  readonly task: TaskRef
  readonly args?: JsonArray
  readonly kwargs?: JsonObject
  /** Measured from submission; falls back to `defaultTimeout` */
  readonly timeout?: Duration.DurationInput
}

export interface WorkHandle {
  readonly id: WorkUnitId
  readonly await: Effect.Effect<JsonValue, WorkFailure>
  readonly poll: Effect.Effect<Option.Option<Exit.Exit<JsonValue, WorkFailure>>>
}

export type SubmitError = Overloaded | ShuttingDown

export interface PoolStats {
  readonly workers: number
  readonly idle: number
  readonly busy: number
  readonly queued: number
  readonly inFlight: number
  readonly accepting: boolean
}

export interface ProcessManagerConfig {
  /** Inline mode runs units in this process when false */
  readonly enabled: boolean
  readonly workers: number
  readonly queueLimit: number
  readonly defaultTimeout: Duration.DurationInput
  readonly shutdownGrace: Duration.DurationInput
  readonly startupTimeout: Duration.DurationInput
  /** SIGTERM → SIGKILL delay at shutdown */
  readonly killDelay: Duration.DurationInput
  /** Consecutive exits before Ready after which a worker slot is abandoned */
  readonly maxStartAttempts: number
  readonly workerExecArgv: ReadonlyArray<string>
}

export const defaultProcessManagerConfig: ProcessManagerConfig = {
  enabled: true,
  workers: 2,
  queueLimit: 64,
  defaultTimeout: "30 seconds",
  shutdownGrace: "5 seconds",
  startupTimeout: "30 seconds",
  killDelay: "1 second",
  maxStartAttempts: 3,
  workerExecArgv: ["--import", "tsx"]
}
