/**
 * EventBus - In-process publish/subscribe.
 *
 * Handlers run in the publisher's fiber, in subscription order, against a
 * snapshot of the subscriber list taken when `publish` starts. Each handler is
 * isolated: a failure or defect is logged and counted, and delivery continues.
 */

import { Cause, Effect, Exit, Option, Ref } from "effect"
import type { EventHandler } from "./cell.ts"
import type { EventPayload } from "./domain.ts"
import { describeFailure, HandlerFailure } from "./errors.ts"

export interface SubscriptionHandle {
  readonly id: number
  readonly eventName: string
  readonly subscriber: string
}

interface Subscription extends SubscriptionHandle {
  readonly handler: EventHandler
}

interface BusState {
  readonly byEvent: ReadonlyMap<string, ReadonlyArray<Subscription>>
  readonly nextId: number
}

export interface PublishReport {
  readonly eventName: string
  readonly delivered: number
  readonly failed: ReadonlyArray<HandlerFailure>
}

const ANONYMOUS = "anonymous"

const withoutWhere = (
  byEvent: ReadonlyMap<string, ReadonlyArray<Subscription>>,
  drop: (subscription: Subscription) => boolean
): ReadonlyMap<string, ReadonlyArray<Subscription>> => {
  const next = new Map<string, ReadonlyArray<Subscription>>()
  for (const [eventName, subscriptions] of byEvent) {
    const kept = subscriptions.filter((subscription) => !drop(subscription))
    if (kept.length > 0) next.set(eventName, kept)
  }
  return next
}

const isActive = (state: BusState, subscription: Subscription): boolean =>
  state.byEvent.get(subscription.eventName)?.some((current) => current.id === subscription.id) ?? false

export class EventBus extends Effect.Service<EventBus>()("@cell-kernel/EventBus", {
  effect: Effect.gen(function*() {
    const state = yield* Ref.make<BusState>({ byEvent: new Map(), nextId: 1 })

    const subscribe = (
      eventName: string,
      handler: EventHandler,
      subscriber: string = ANONYMOUS
    ): Effect.Effect<SubscriptionHandle> =>
      Ref.modify(state, (current) => {
        const subscription: Subscription = { id: current.nextId, eventName, subscriber, handler }
        const byEvent = new Map(current.byEvent)
        byEvent.set(eventName, [...(current.byEvent.get(eventName) ?? []), subscription])
        const handle: SubscriptionHandle = { id: subscription.id, eventName, subscriber }
        return [handle, { byEvent, nextId: current.nextId + 1 }]
      })

    const unsubscribe = (handle: SubscriptionHandle): Effect.Effect<void> =>
      Ref.update(state, (current) => ({
        ...current,
        byEvent: withoutWhere(current.byEvent, (subscription) => subscription.id === handle.id)
      }))

    /** Removes every subscription of one subscriber; returns how many were removed */
    const unsubscribeAll = (subscriber: string): Effect.Effect<number> =>
      Ref.modify(state, (current) => {
        const byEvent = withoutWhere(current.byEvent, (subscription) => subscription.subscriber === subscriber)
        const before = Array.from(current.byEvent.values()).reduce((n, list) => n + list.length, 0)
        const after = Array.from(byEvent.values()).reduce((n, list) => n + list.length, 0)
        return [before - after, { ...current, byEvent }]
      })

    const deliver = (subscription: Subscription, payload: EventPayload): Effect.Effect<Option.Option<HandlerFailure>> =>
      Effect.suspend(() => subscription.handler(subscription.eventName, payload)).pipe(
        Effect.exit,
        Effect.flatMap((exit): Effect.Effect<Option.Option<HandlerFailure>> => {
          if (Exit.isSuccess(exit)) return Effect.succeedNone
          const error = Cause.squash(exit.cause)
          const failure = new HandlerFailure({
            cellName: subscription.subscriber,
            target: subscription.eventName,
            message: describeFailure(error),
            cause: error
          })
          return Effect.logWarning("Event handler failed", failure.message).pipe(
            Effect.annotateLogs({ event: subscription.eventName, subscriber: subscription.subscriber }),
            Effect.asSome(failure)
          )
        })
      )

    const publish = Effect.fn("EventBus.publish")(function*(eventName: string, payload: EventPayload = {}) {
      const snapshot = (yield* Ref.get(state)).byEvent.get(eventName) ?? []
      const failed: Array<HandlerFailure> = []
      let delivered = 0

      for (const subscription of snapshot) {
        if (!isActive(yield* Ref.get(state), subscription)) continue
        const failure = yield* deliver(subscription, payload)
        if (Option.isSome(failure)) failed.push(failure.value)
        else delivered++
      }

      yield* Effect.logDebug("Event published").pipe(
        Effect.annotateLogs({ event: eventName, delivered, failed: failed.length })
      )
      const report: PublishReport = { eventName, delivered, failed }
      return report
    })

    const subscriberCount = (eventName: string): Effect.Effect<number> =>
      Ref.get(state).pipe(Effect.map((current) => current.byEvent.get(eventName)?.length ?? 0))

    const hasSubscribers = (eventName: string): Effect.Effect<boolean> =>
      Effect.map(subscriberCount(eventName), (count) => count > 0)

    const clear: Effect.Effect<void> = Ref.update(state, (current) => ({ ...current, byEvent: new Map() }))

    return {
      subscribe,
      unsubscribe,
      unsubscribeAll,
      publish,
      subscriberCount,
      hasSubscribers,
      clear
    }
  }),
  accessors: true
}) {}
