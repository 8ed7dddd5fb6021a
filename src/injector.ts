/**
 * Injector - service providers and per-cell dependency resolution.
 *
 * Providers are keyed by their `Context.Tag` key and built once, eagerly,
 * depth-first through their declared dependencies. Built singletons are kept in
 * a single `Context`, so lookups go through the tag and stay typed.
 */

import { Cause, Context, Effect, Option, Ref } from "effect"
import { type Cell, type CellDefinition, makeCellLog, type Resolver, type ServiceKey } from "./cell.ts"
import {
  CircularDependency,
  describeFailure,
  type InjectionError,
  ServiceConstructionError,
  UnresolvedDependency
} from "./errors.ts"
import { EventBus } from "./event-bus.ts"
import { ProcessManager } from "./process-manager/services.ts"

// =============================================================================
// Providers
// =============================================================================

/** Lookup handed to service providers; limited to their declared dependencies */
export interface ServiceResolver {
  readonly service: <I, S>(tag: Context.Tag<I, S>) => Effect.Effect<S, UnresolvedDependency>
}

/** A provider with its service type erased; build it with `serviceProvider` */
export interface ServiceBinding {
  readonly key: string
  readonly dependsOn: ReadonlyArray<string>
  readonly build: (resolver: ServiceResolver) => Effect.Effect<Context.Context<never>, unknown>
}

export const serviceProvider = <I, S>(
  tag: Context.Tag<I, S>,
  options: {
    readonly dependsOn?: ReadonlyArray<ServiceKey>
    readonly make: (resolver: ServiceResolver) => Effect.Effect<S, unknown>
  }
): ServiceBinding => ({
  key: tag.key,
  dependsOn: (options.dependsOn ?? []).map((dependency) => dependency.key),
  build: (resolver) => Effect.map(options.make(resolver), (service) => Context.make(tag, service))
})

export const serviceInstance = <I, S>(tag: Context.Tag<I, S>, service: S): ServiceBinding => ({
  key: tag.key,
  dependsOn: [],
  build: () => Effect.succeed(Context.make(tag, service))
})

// =============================================================================
// Injector Service
// =============================================================================

interface InjectorState {
  readonly bindings: ReadonlyMap<string, ServiceBinding>
  readonly built: Context.Context<never>
  readonly builtKeys: ReadonlySet<string>
}

const lookup = <I, S>(
  context: Context.Context<never>,
  tag: Context.Tag<I, S>,
  requester: string
): Effect.Effect<S, UnresolvedDependency> =>
  Option.match(Context.getOption(context, tag), {
    onNone: () => Effect.fail(new UnresolvedDependency({ key: tag.key, requester, reason: "unknown" })),
    onSome: Effect.succeed
  })

export class Injector extends Effect.Service<Injector>()("@cell-kernel/Injector", {
  effect: Effect.gen(function*() {
    const bus = yield* EventBus
    const processManager = yield* ProcessManager

    const state = yield* Ref.make<InjectorState>({
      bindings: new Map([
        [EventBus.key, serviceInstance(EventBus, bus)],
        [ProcessManager.key, serviceInstance(ProcessManager, processManager)]
      ]),
      built: Context.make(EventBus, bus).pipe(Context.add(ProcessManager, processManager)),
      builtKeys: new Set([EventBus.key, ProcessManager.key])
    })
    // Public entry points are serialized; `ensure` recurses without the lock
    const lock = yield* Effect.makeSemaphore(1)

    const provide = (binding: ServiceBinding): Effect.Effect<void> =>
      Ref.update(state, (current) => {
        const bindings = new Map(current.bindings)
        bindings.set(binding.key, binding)
        return { ...current, bindings }
      })

    const resolverFor = (requester: string, declared: ReadonlyArray<string>): ServiceResolver => ({
      service: (tag) =>
        declared.includes(tag.key)
          ? Effect.flatMap(Ref.get(state), (current) => lookup(current.built, tag, requester))
          : Effect.fail(new UnresolvedDependency({ key: tag.key, requester, reason: "undeclared" }))
    })

    const ensure = (key: string, path: ReadonlyArray<string>): Effect.Effect<void, InjectionError> =>
      Effect.gen(function*() {
        const current = yield* Ref.get(state)
        if (current.builtKeys.has(key)) return
        if (path.includes(key)) {
          return yield* Effect.fail(new CircularDependency({ path: [...path, key] }))
        }
        const binding = current.bindings.get(key)
        if (binding === undefined) {
          return yield* Effect.fail(
            new UnresolvedDependency({ key, requester: path.at(-1) ?? "kernel", reason: "unknown" })
          )
        }

        for (const dependency of binding.dependsOn) {
          yield* ensure(dependency, [...path, key])
        }

        const context = yield* Effect.suspend(() => binding.build(resolverFor(key, binding.dependsOn))).pipe(
          Effect.catchAllCause((cause) => {
            const error = Cause.squash(cause)
            return Effect.fail(new ServiceConstructionError({ key, message: describeFailure(error), cause: error }))
          })
        )
        yield* Ref.update(state, (latest) => ({
          ...latest,
          built: Context.merge(latest.built, context),
          builtKeys: new Set([...latest.builtKeys, key])
        }))
        yield* Effect.logDebug("Service built").pipe(Effect.annotateLogs("service", key))
      })

    const resolve = <I, S>(tag: Context.Tag<I, S>): Effect.Effect<S, InjectionError> =>
      lock.withPermits(1)(
        ensure(tag.key, []).pipe(
          Effect.zipRight(Ref.get(state)),
          Effect.flatMap((current) => lookup(current.built, tag, "kernel"))
        )
      )

    /**
     * Builds every service a cell declares and returns its Resolver.
     * `findCell` looks up already constructed cells.
     */
    const resolveFor = (
      definition: CellDefinition,
      findCell: (name: string) => Effect.Effect<Option.Option<Cell>>
    ): Effect.Effect<Resolver, InjectionError> =>
      lock.withPermits(1)(
        Effect.gen(function*() {
          for (const service of definition.services) {
            yield* ensure(service.key, [definition.name])
          }
          const services = resolverFor(definition.name, definition.services.map((service) => service.key))
          const resolver: Resolver = {
            requester: definition.name,
            service: services.service,
            cell: (name) =>
              definition.cells.includes(name)
                ? findCell(name).pipe(
                  Effect.flatMap(Option.match({
                    onNone: () =>
                      Effect.fail(
                        new UnresolvedDependency({ key: name, requester: definition.name, reason: "unknown" })
                      ),
                    onSome: Effect.succeed
                  }))
                )
                : Effect.fail(new UnresolvedDependency({ key: name, requester: definition.name, reason: "undeclared" })),
            log: makeCellLog(definition.name)
          }
          return resolver
        })
      )

    return {
      provide,
      resolve,
      resolveFor
    }
  }),
  accessors: true
}) {}
