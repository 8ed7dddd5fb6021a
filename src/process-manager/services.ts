/**
 * Process Manager Service Interface
 */
import type { Effect } from "effect"
import { Context } from "effect"

import type { JsonValue } from "../domain.ts"
import type { WorkFailure } from "../errors.ts"
import type { PoolStats, SubmitError, WorkHandle, WorkUnit } from "./types.ts"

/**
 * Runs work units off the dispatch path, in worker processes or inline
 */
export class ProcessManager extends Context.Tag("@cell-kernel/ProcessManager")<
  ProcessManager,
  {
    /** Waits for the result, a failure or the unit's timeout */
    readonly submit: (unit: WorkUnit) => Effect.Effect<JsonValue, WorkFailure>
    readonly submitAsync: (unit: WorkUnit) => Effect.Effect<WorkHandle, SubmitError>
    /** Results in input order */
    readonly submitAll: (units: ReadonlyArray<WorkUnit>) => Effect.Effect<ReadonlyArray<JsonValue>, WorkFailure>
    readonly stats: Effect.Effect<PoolStats>
    /** Stops accepting, drains for the grace period, then stops workers */
    readonly shutdown: Effect.Effect<void>
  }
>() {}
