/**
 * Process Manager
 *
 * Offloads blocking or CPU-bound work from the dispatch path.
 *
 * @example
 * ```ts
 * import { Effect } from "effect"
 * import { ProcessManager, taskRef } from "./process-manager/index.ts"
 *
 * const program = Effect.gen(function*() {
 *   const manager = yield* ProcessManager
 *   return yield* manager.submit({
 *     task: taskRef(new URL("../tasks/math.ts", import.meta.url), "countPrimes"),
 *     args: [100_000],
 *     timeout: "10 seconds"
 *   })
 * })
 * ```
 */
import type { Layer } from "effect"

import type { WorkerStartupFailed } from "../errors.ts"
import { InlineProcessManagerLive } from "./implementations/inline.ts"
import { WorkerPoolLive } from "./implementations/pool.ts"
import { ProcessManager } from "./services.ts"
import type { ProcessManagerConfig } from "./types.ts"

// Types
export type { PoolStats, ProcessManagerConfig, SubmitError, TaskRef, WorkHandle, WorkUnit } from "./types.ts"
export { defaultProcessManagerConfig, taskRef } from "./types.ts"

// Services
export { ProcessManager } from "./services.ts"

// Implementations (for custom composition)
export { InlineProcessManagerLive, makeInlineManager } from "./implementations/inline.ts"
export { makeWorkerPool, WorkerPoolLive } from "./implementations/pool.ts"

/** Worker pool when enabled, inline execution otherwise */
export const ProcessManagerLive = (
  config: ProcessManagerConfig
): Layer.Layer<ProcessManager, WorkerStartupFailed> =>
  config.enabled ? WorkerPoolLive(config) : InlineProcessManagerLive(config)
