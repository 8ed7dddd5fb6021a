/**
 * CellCatalog - identifier → cell definition.
 *
 * Configuration lists identifiers such as `cells/greeter`; the catalog maps
 * them to definitions. `lintCatalog` checks a set of definitions without
 * constructing anything.
 */

import { Context, Effect, Layer, Option, Schema } from "effect"
import type { CellDefinition } from "./cell.ts"
import { CellName } from "./domain.ts"
import { UnknownCell } from "./errors.ts"

export class CellCatalog extends Context.Tag("@cell-kernel/CellCatalog")<
  CellCatalog,
  {
    readonly lookup: (id: string) => Effect.Effect<CellDefinition, UnknownCell>
    readonly byName: (name: string) => Option.Option<CellDefinition>
    readonly definitions: ReadonlyArray<CellDefinition>
  }
>() {
  static readonly make = (definitions: ReadonlyArray<CellDefinition>): Layer.Layer<CellCatalog> =>
    Layer.succeed(
      CellCatalog,
      CellCatalog.of({
        lookup: (id) =>
          Option.match(Option.fromNullable(definitions.find((definition) => definition.id === id)), {
            onNone: () => Effect.fail(new UnknownCell({ id })),
            onSome: Effect.succeed
          }),
        byName: (name) => Option.fromNullable(definitions.find((definition) => definition.name === name)),
        definitions
      })
    )
}

// =============================================================================
// Lint
// =============================================================================

export interface LintFinding {
  readonly severity: "error" | "warning"
  readonly id: string
  readonly message: string
}

const isCellName = Schema.is(CellName)

const findCycles = (definitions: ReadonlyArray<CellDefinition>): ReadonlyArray<ReadonlyArray<string>> => {
  const byName = new Map(
    definitions.map((definition): [string, CellDefinition] => [definition.name, definition])
  )
  const cycles: Array<ReadonlyArray<string>> = []
  const done = new Set<string>()

  const visit = (name: string, path: ReadonlyArray<string>): void => {
    if (done.has(name)) return
    const start = path.indexOf(name)
    if (start >= 0) {
      cycles.push([...path.slice(start), name])
      return
    }
    const definition = byName.get(name)
    if (definition === undefined) return
    for (const dependency of definition.cells) visit(dependency, [...path, name])
    done.add(name)
  }

  for (const definition of definitions) visit(definition.name, [])
  return cycles
}

export const lintCatalog = (definitions: ReadonlyArray<CellDefinition>): ReadonlyArray<LintFinding> => {
  const findings: Array<LintFinding> = []
  const names = new Map<string, string>()
  const ids = new Set<string>()

  for (const definition of definitions) {
    if (ids.has(definition.id)) {
      findings.push({ severity: "error", id: definition.id, message: "Duplicate identifier" })
    }
    ids.add(definition.id)

    const owner = names.get(definition.name)
    if (owner !== undefined) {
      findings.push({
        severity: "error",
        id: definition.id,
        message: `Cell name '${definition.name}' is already used by ${owner}`
      })
    } else {
      names.set(definition.name, definition.id)
    }

    if (!isCellName(definition.name)) {
      findings.push({ severity: "error", id: definition.id, message: `Invalid cell name '${definition.name}'` })
    }
  }

  for (const definition of definitions) {
    for (const dependency of definition.cells) {
      if (!names.has(dependency)) {
        findings.push({ severity: "error", id: definition.id, message: `Depends on unknown cell '${dependency}'` })
      }
    }
    const services = definition.services.map((service) => service.key)
    const repeated = services.filter((key, index) => services.indexOf(key) !== index)
    for (const key of new Set(repeated)) {
      findings.push({ severity: "warning", id: definition.id, message: `Service '${key}' declared more than once` })
    }
  }

  for (const cycle of findCycles(definitions)) {
    findings.push({
      severity: "error",
      id: names.get(cycle[0]) ?? cycle[0],
      message: `Circular cell dependency: ${cycle.join(" -> ")}`
    })
  }

  return findings
}
