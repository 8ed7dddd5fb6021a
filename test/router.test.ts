import { describe, expect, it } from "@effect/vitest"
import { Effect, Layer, Option, Ref } from "effect"
import { argumentMapping, argumentText } from "../src/arguments.ts"
import { makeCell } from "../src/cell.ts"
import { Timeout } from "../src/errors.ts"
import { EventBus } from "../src/event-bus.ts"
import { CellRegistry } from "../src/registry.ts"
import { Router } from "../src/router.ts"

const TestLayer = Router.Default.pipe(
  Layer.provideMerge(CellRegistry.Default),
  Layer.provideMerge(EventBus.Default)
)

const echo = makeCell({
  name: "echo",
  commands: {
    say: { description: "Echoes its argument text", run: (args) => Effect.succeed(argumentText(args)) },
    shape: (args) => Effect.succeed(args._tag),
    keys: (args) => Effect.succeed(Object.keys(Option.getOrElse(argumentMapping(args), () => ({})))),
    nothing: () => Effect.void,
    fail: () => Effect.fail(new Error("nope")),
    die: () => Effect.die(new Error("kaboom")),
    throws: () => {
      throw new Error("thrown outside the effect")
    },
    slow: () => Effect.fail(new Timeout({ id: "unit-1", timeoutMs: 5 }))
  }
})

const handleWithEcho = (message: string) =>
  Effect.gen(function*() {
    yield* CellRegistry.register(echo)
    return yield* Router.handle(message)
  }).pipe(Effect.provide(TestLayer))

const parsed = (reply: string): unknown => JSON.parse(reply)

describe.concurrent("Router", () => {
  it.effect("returns the handler result as the reply", () =>
    Effect.gen(function*() {
      expect(yield* handleWithEcho("echo:say:hello:world")).toBe("hello:world")
      expect(yield* handleWithEcho("echo:say")).toBe("")
      expect(yield* handleWithEcho("echo:nothing:")).toBe("")
    }))

  it.effect("hands structured arguments to the handler", () =>
    Effect.gen(function*() {
      expect(yield* handleWithEcho("echo:shape:{\"a\":1}")).toBe("Mapping")
      expect(yield* handleWithEcho("echo:shape:[1,2]")).toBe("List")
      expect(yield* handleWithEcho("echo:shape:{oops")).toBe("Text")
      expect(yield* handleWithEcho("echo:keys:{\"a\":1,\"b\":2}")).toBe("[\"a\",\"b\"]")
    }))

  it.effect("reports unknown cells and commands", () =>
    Effect.gen(function*() {
      expect(parsed(yield* handleWithEcho("ghost:say:x"))).toEqual({
        error: "CellNotFound",
        message: "Cell 'ghost' is not registered"
      })
      expect(parsed(yield* handleWithEcho("echo:shout:x"))).toEqual({
        error: "CommandNotFound",
        message: "Cell 'echo' has no command 'shout'"
      })
    }))

  it.effect("rejects malformed addresses", () =>
    Effect.gen(function*() {
      expect(parsed(yield* handleWithEcho("echo:"))).toEqual({
        error: "InvalidAddress",
        message: "Invalid address 'echo:': cell and command must be non-empty identifiers"
      })
    }))

  it.effect("wraps handler failures, defects and throws", () =>
    Effect.gen(function*() {
      expect(parsed(yield* handleWithEcho("echo:fail"))).toEqual({ error: "HandlerFailure", message: "nope" })
      expect(parsed(yield* handleWithEcho("echo:die"))).toEqual({ error: "HandlerFailure", message: "kaboom" })
      expect(parsed(yield* handleWithEcho("echo:throws"))).toEqual({
        error: "HandlerFailure",
        message: "thrown outside the effect"
      })
    }))

  it.effect("keeps the kind of kernel errors raised by handlers", () =>
    Effect.gen(function*() {
      expect(parsed(yield* handleWithEcho("echo:slow"))).toEqual({
        error: "Timeout",
        message: "Work unit unit-1 did not finish within 5ms"
      })
    }))

  it.effect("publishes event envelopes and acknowledges delivery", () =>
    Effect.gen(function*() {
      const bus = yield* EventBus
      const received = yield* Ref.make<ReadonlyArray<unknown>>([])
      yield* bus.subscribe("user.login", (_, payload) => Ref.update(received, (current) => [...current, payload]))
      yield* bus.subscribe("user.login", () => Effect.fail("unlucky"))

      const reply = yield* Router.handle("{\"event_name\":\"user.login\",\"payload\":{\"id\":1}}")

      expect(reply).toBe("{\"event\":\"user.login\",\"delivered\":1,\"failed\":1}")
      expect(yield* Ref.get(received)).toEqual([{ id: 1 }])
    }).pipe(Effect.provide(TestLayer)))

  it.effect("rejects messages that are neither commands nor envelopes", () =>
    Effect.gen(function*() {
      const reply = yield* Router.handle("just some text")
      expect(JSON.parse(reply)).toMatchObject({ error: "InvalidEnvelope" })
      const payloadReply = yield* Router.handle("{\"event_name\":\"x\",\"payload\":5}")
      expect(JSON.parse(payloadReply)).toMatchObject({ error: "InvalidEnvelope" })
    }).pipe(Effect.provide(TestLayer)))
})
