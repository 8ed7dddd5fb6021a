/**
 * Kernel Error Types
 *
 * The `_tag` of each error is the `error` kind written into reply envelopes.
 */
import { Predicate, Schema } from "effect"

// =============================================================================
// Routing Errors
// =============================================================================

/** Command message that does not parse as `<cell>:<command>[:<args>]` */
export class InvalidAddress extends Schema.TaggedError<InvalidAddress>()(
  "InvalidAddress",
  {
    input: Schema.String,
    message: Schema.String
  }
) {}

/** Event message that is not a valid JSON envelope */
export class InvalidEnvelope extends Schema.TaggedError<InvalidEnvelope>()(
  "InvalidEnvelope",
  {
    message: Schema.String
  }
) {}

export class CellNotFound extends Schema.TaggedError<CellNotFound>()(
  "CellNotFound",
  { cellName: Schema.String }
) {
  override get message() {
    return `Cell '${this.cellName}' is not registered`
  }
}

export class CommandNotFound extends Schema.TaggedError<CommandNotFound>()(
  "CommandNotFound",
  {
    cellName: Schema.String,
    command: Schema.String
  }
) {
  override get message() {
    return `Cell '${this.cellName}' has no command '${this.command}'`
  }
}

/** A command handler or event handler failed; wraps any non-kernel failure */
export class HandlerFailure extends Schema.TaggedError<HandlerFailure>()(
  "HandlerFailure",
  {
    cellName: Schema.String,
    target: Schema.String,
    message: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {}

// =============================================================================
// Load Errors
// =============================================================================

export class DuplicateCell extends Schema.TaggedError<DuplicateCell>()(
  "DuplicateCell",
  { cellName: Schema.String }
) {
  override get message() {
    return `A cell named '${this.cellName}' is already registered`
  }
}

export class CircularDependency extends Schema.TaggedError<CircularDependency>()(
  "CircularDependency",
  { path: Schema.Array(Schema.String) }
) {
  override get message() {
    return `Circular dependency: ${this.path.join(" -> ")}`
  }
}

export class UnresolvedDependency extends Schema.TaggedError<UnresolvedDependency>()(
  "UnresolvedDependency",
  {
    key: Schema.String,
    requester: Schema.String,
    reason: Schema.Literal("undeclared", "unknown", "failed")
  }
) {
  override get message() {
    switch (this.reason) {
      case "undeclared":
        return `'${this.requester}' asked for '${this.key}' without declaring it`
      case "unknown":
        return `'${this.requester}' depends on '${this.key}', which has no provider`
      case "failed":
        return `'${this.requester}' depends on '${this.key}', which failed to load`
    }
  }
}

export class UnknownCell extends Schema.TaggedError<UnknownCell>()(
  "UnknownCell",
  { id: Schema.String }
) {
  override get message() {
    return `No cell definition with identifier '${this.id}'`
  }
}

export class CellConstructionError extends Schema.TaggedError<CellConstructionError>()(
  "CellConstructionError",
  {
    id: Schema.String,
    message: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {}

export class ServiceConstructionError extends Schema.TaggedError<ServiceConstructionError>()(
  "ServiceConstructionError",
  {
    key: Schema.String,
    message: Schema.String,
    cause: Schema.optional(Schema.Defect)
  }
) {}

export const InjectionError = Schema.Union(CircularDependency, UnresolvedDependency, ServiceConstructionError)
export type InjectionError = typeof InjectionError.Type

export const LoadError = Schema.Union(
  DuplicateCell,
  CircularDependency,
  UnresolvedDependency,
  UnknownCell,
  CellConstructionError,
  ServiceConstructionError
)
export type LoadError = typeof LoadError.Type
export const isLoadError = Schema.is(LoadError)

// =============================================================================
// Work Errors
// =============================================================================

export class Overloaded extends Schema.TaggedError<Overloaded>()(
  "Overloaded",
  { queueLimit: Schema.Number }
) {
  override get message() {
    return `Work queue is full (${this.queueLimit} units waiting)`
  }
}

export class Timeout extends Schema.TaggedError<Timeout>()(
  "Timeout",
  {
    id: Schema.String,
    timeoutMs: Schema.Number
  }
) {
  override get message() {
    return `Work unit ${this.id} did not finish within ${this.timeoutMs}ms`
  }
}

export class WorkerCrashed extends Schema.TaggedError<WorkerCrashed>()(
  "WorkerCrashed",
  {
    id: Schema.String,
    workerId: Schema.Number,
    exitCode: Schema.NullOr(Schema.Number),
    signal: Schema.NullOr(Schema.String)
  }
) {
  override get message() {
    const how = this.signal !== null ? `signal ${this.signal}` : `exit code ${this.exitCode}`
    return `Worker ${this.workerId} died (${how}) while running work unit ${this.id}`
  }
}

/** The task itself failed, or could not be loaded, inside the worker */
export class ExecutionError extends Schema.TaggedError<ExecutionError>()(
  "ExecutionError",
  {
    id: Schema.String,
    message: Schema.String,
    stack: Schema.optional(Schema.String)
  }
) {}

export class ShuttingDown extends Schema.TaggedError<ShuttingDown>()(
  "ShuttingDown",
  {}
) {
  override get message() {
    return "Process manager is shutting down"
  }
}

export class WorkerStartupFailed extends Schema.TaggedError<WorkerStartupFailed>()(
  "WorkerStartupFailed",
  {
    message: Schema.String
  }
) {}

export const WorkFailure = Schema.Union(Overloaded, Timeout, WorkerCrashed, ExecutionError, ShuttingDown)
export type WorkFailure = typeof WorkFailure.Type

// =============================================================================
// Reply Envelope Kinds
// =============================================================================

/** Errors that keep their own kind when a handler fails with them */
export const KernelError = Schema.Union(
  Overloaded,
  Timeout,
  WorkerCrashed,
  ExecutionError,
  ShuttingDown,
  CellNotFound,
  CommandNotFound
)
export type KernelError = typeof KernelError.Type
export const isKernelError = Schema.is(KernelError)

// =============================================================================
// Records
// =============================================================================

/** Logged when structured argument decoding falls back to plain text */
export class ArgumentDecodeFallback extends Schema.TaggedClass<ArgumentDecodeFallback>()(
  "ArgumentDecodeFallback",
  {
    raw: Schema.String,
    reason: Schema.String
  }
) {}

/** Human readable text for anything a handler may fail or die with */
export const describeFailure = (error: unknown): string => {
  if (error instanceof Error && error.message !== "") return error.message
  if (Predicate.hasProperty(error, "_tag") && Predicate.isString(error._tag)) return error._tag
  if (error instanceof Error) return error.name
  return String(error)
}
