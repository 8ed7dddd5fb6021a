/**
 * Cell contract.
 *
 * A cell is a named table of commands plus optional event handlers and a
 * teardown effect. Cells are described by a `CellDefinition`, which declares the
 * services and sibling cells its constructor needs; the kernel resolves those
 * before `make` runs.
 */
import { type Context, Effect } from "effect"
import { type ArgumentValue, CellName, type EventPayload, type JsonValue } from "./domain.ts"
import { CommandNotFound, type UnresolvedDependency } from "./errors.ts"

// =============================================================================
// Commands & Events
// =============================================================================

/** What a command may return; `undefined` encodes as the empty reply */
export type CommandResult = JsonValue | undefined | void

export interface CommandSpec {
  readonly description: string
  readonly run: (args: ArgumentValue) => Effect.Effect<CommandResult, unknown>
}

export type EventHandler = (eventName: string, payload: EventPayload) => Effect.Effect<void, unknown>

export interface Cell {
  readonly name: CellName
  readonly commands: ReadonlyMap<string, CommandSpec>
  readonly events: ReadonlyMap<string, EventHandler>
  readonly teardown: Effect.Effect<void, unknown>
}

export interface CellSpec {
  readonly name: string
  readonly commands: Readonly<Record<string, CommandSpec | CommandSpec["run"]>>
  readonly events?: Readonly<Record<string, EventHandler>>
  readonly teardown?: Effect.Effect<void, unknown>
}

/**
 * Freezes a declarative spec into a Cell. Bare functions become commands with
 * an empty description.
 */
export const makeCell = (spec: CellSpec): Cell => ({
  name: CellName.make(spec.name),
  commands: new Map(
    Object.entries(spec.commands).map(([name, command]): [string, CommandSpec] => [
      name,
      typeof command === "function" ? { description: "", run: command } : command
    ])
  ),
  events: new Map(Object.entries(spec.events ?? {})),
  teardown: spec.teardown ?? Effect.void
})

/** Runs a command of another cell directly, bypassing the text protocol */
export const invoke = (
  cell: Cell,
  command: string,
  args: ArgumentValue
): Effect.Effect<CommandResult, unknown> => {
  const spec = cell.commands.get(command)
  return spec === undefined
    ? Effect.fail(new CommandNotFound({ cellName: cell.name, command }))
    : Effect.suspend(() => spec.run(args))
}

// =============================================================================
// Construction
// =============================================================================

/** Anything with a `Context.Tag` key */
export interface ServiceKey {
  readonly key: string
}

/** Log handle given to cells; entries carry a `cell` annotation */
export interface CellLog {
  readonly debug: (...message: ReadonlyArray<unknown>) => Effect.Effect<void>
  readonly info: (...message: ReadonlyArray<unknown>) => Effect.Effect<void>
  readonly warning: (...message: ReadonlyArray<unknown>) => Effect.Effect<void>
  readonly error: (...message: ReadonlyArray<unknown>) => Effect.Effect<void>
}

export const makeCellLog = (cellName: string): CellLog => {
  const annotate = <A>(effect: Effect.Effect<A>) => Effect.annotateLogs(effect, "cell", cellName)
  return {
    debug: (...message) => annotate(Effect.logDebug(...message)),
    info: (...message) => annotate(Effect.logInfo(...message)),
    warning: (...message) => annotate(Effect.logWarning(...message)),
    error: (...message) => annotate(Effect.logError(...message))
  }
}

/** Dependencies handed to a cell constructor; only declared ones resolve */
export interface Resolver {
  readonly requester: string
  readonly service: <I, S>(tag: Context.Tag<I, S>) => Effect.Effect<S, UnresolvedDependency>
  readonly cell: (name: string) => Effect.Effect<Cell, UnresolvedDependency>
  readonly log: CellLog
}

export interface CellDefinition {
  /** Identifier configuration refers to, e.g. `cells/greeter` */
  readonly id: string
  readonly name: string
  readonly services: ReadonlyArray<ServiceKey>
  readonly cells: ReadonlyArray<string>
  readonly make: (resolver: Resolver) => Effect.Effect<Cell, unknown>
}

export const defineCell = (definition: {
  readonly id: string
  readonly name: string
  readonly services?: ReadonlyArray<ServiceKey>
  readonly cells?: ReadonlyArray<string>
  readonly make: (resolver: Resolver) => Effect.Effect<Cell, unknown>
}): CellDefinition => ({
  ...definition,
  services: definition.services ?? [],
  cells: definition.cells ?? []
})
