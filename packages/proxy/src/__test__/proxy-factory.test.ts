import { describe, test, expect, vi } from "vitest"
import { BadInput, ConsoleLogger, SurrogateError } from "@surrogate/core"
import {
  ClassDef,
  ErrBlueprintIdentityConflict,
  ErrHandlerRequired,
  ErrInvalidTarget,
  ErrNoInterfaces,
  ErrResultNotConvertible,
  ErrTargetKindMismatch,
  InMemoryDescriptorCache,
  InterfaceDef,
  InvocationHandler,
  Method,
  ProxyFactory,
  ProxyObject,
  Type,
} from "../index.js"
import {
  AsyncCalc,
  Calc,
  CalcService,
  Counter,
  Kitchen,
  Logger,
  caught,
  isolatedFactory,
  recordingHandler,
} from "./fixtures.js"

describe("ProxyFactory.create", () => {
  test("forwards a call and converts the result", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler(({ args }) => Number(args[0]) + Number(args[1]))

    const calc = factory.create(handler, Calc)

    expect(calc.add(2, 3)).toBe(5)
  })

  test("hands the handler the proxy, descriptor and arguments", () => {
    const factory = isolatedFactory()
    const { handler, calls } = recordingHandler(() => "ignored")

    const logger = factory.create(handler, Logger)
    const result = logger.log("x")

    expect(result).toBeUndefined()
    expect(calls).toHaveLength(1)
    expect(calls[0]?.proxy).toBe(logger)
    expect(calls[0]?.method.name).toBe("log")
    expect(calls[0]?.method.index).toBe(0)
    expect(calls[0]?.method.declaringInterface).toBe("demo.Logger")
    expect(calls[0]?.args).toEqual(["x"])
  })

  test("inherited members report their declaring interface", () => {
    const factory = isolatedFactory()
    const { handler, calls } = recordingHandler(() => 0)

    factory.create(handler, Logger).add(1, 2)

    expect(calls[0]?.method.declaringInterface).toBe("demo.Calc")
    expect(calls[0]?.method.index).toBe(0)
  })

  test("each proxy answers through its own handler", () => {
    const factory = isolatedFactory()
    const first = factory.create(InvocationHandler.from(() => 1000), Calc)
    const second = factory.create(InvocationHandler.from(() => 2000), Calc)

    expect(first.add(0, 0)).toBe(1000)
    expect(second.add(0, 0)).toBe(2000)
  })

  test("instances are distinct but share one blueprint", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler()

    const a = factory.create(handler, Calc)
    const b = factory.create(handler, Calc)

    expect(a).not.toBe(b)
    expect(factory.blueprintOf(a)).toBe(factory.blueprintOf(b))
    expect(factory.blueprintOf(a)?.name).toBe("demo.CalcProxy")
    expect(factory.size).toBe(1)
  })

  test("interleaved first-time creation builds one blueprint", async () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler()

    const proxies = await Promise.all(
      Array.from({ length: 8 }, async () => {
        await Promise.resolve()
        return factory.create(handler, Calc)
      }),
    )

    const blueprints = new Set(proxies.map((proxy) => factory.blueprintOf(proxy)))
    expect(blueprints.size).toBe(1)
    expect(factory.size).toBe(1)
  })

  test("missing handler fails with BadInput", () => {
    const factory = isolatedFactory()

    const err = caught(() => factory.create(null, Calc))

    expect(ErrHandlerRequired.is(err)).toBe(true)
    expect(SurrogateError.has(err, BadInput)).toBe(true)
    expect(err.data).toEqual({ blueprint: "demo.CalcProxy" })
    expect(factory.size).toBe(0)
  })

  test("a handler without invoke is rejected", () => {
    const factory = isolatedFactory()
    const notAHandler = { invoke: "nope" }

    const err = caught(() => factory.create(JSON.parse(JSON.stringify(notAHandler)), Calc))

    expect(err.code).toBe("proxy.invalid_handler")
    expect(SurrogateError.has(err, BadInput)).toBe(true)
  })

  test("a target that is not a definition fails", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler()

    const err = caught(() => factory.create(handler, JSON.parse('{"kind":"enum"}')))

    expect(ErrInvalidTarget.is(err)).toBe(true)
    expect(err.data).toEqual({ received: "enum" })
  })
})

describe("class targets", () => {
  test("a class definition proxies every implemented interface", () => {
    const factory = isolatedFactory()
    const { handler, calls } = recordingHandler(({ method }) => (method.name === "add" ? 7 : true))

    const service = factory.create(handler, CalcService, false)

    expect(service.add(3, 4)).toBe(7)
    expect(service.print("page")).toBe(true)
    expect(calls.map((call) => call.method.declaringInterface)).toEqual(["demo.Calc", "demo.Printer"])
    expect(factory.blueprintOf(service)?.name).toBe("demo.CalcServiceProxy")
  })

  test("a flag contradicting the target's kind fails", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler()

    expect(ErrTargetKindMismatch.is(caught(() => factory.create(handler, Calc, false)))).toBe(true)
    expect(ErrTargetKindMismatch.is(caught(() => factory.create(handler, CalcService, true)))).toBe(true)
  })

  test("a class implementing nothing fails", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler()
    const Empty = ClassDef.create("demo.Empty", { implements: [] })

    const err = caught(() => factory.create(handler, Empty))

    expect(ErrNoInterfaces.is(err)).toBe(true)
    expect(factory.size).toBe(0)
  })
})

describe("result conversion", () => {
  const answers: Record<string, unknown> = {
    flag: true,
    short: -12,
    int: 2_000_000_000,
    long: 2n ** 40n,
    ushort: 65_535,
    uint: 4_000_000_000,
    ulong: 7,
    single: 0.1,
    double: 0.1,
    color: "Blue",
    label: "kitchen",
  }

  function kitchen() {
    const { handler } = recordingHandler(({ method, args }) =>
      method.name === "move" ? args[0] : answers[method.name],
    )
    return isolatedFactory().create(handler, Kitchen)
  }

  test("values round-trip through the declared representation", () => {
    const k = kitchen()

    expect(k.flag()).toBe(true)
    expect(k.short()).toBe(-12)
    expect(k.int()).toBe(2_000_000_000)
    expect(k.long()).toBe(2n ** 40n)
    expect(k.ushort()).toBe(65_535)
    expect(k.uint()).toBe(4_000_000_000)
    expect(k.ulong()).toBe(7n)
    expect(k.single()).toBe(Math.fround(0.1))
    expect(k.double()).toBe(0.1)
    expect(k.color()).toBe(2)
    expect(k.label()).toBe("kitchen")
  })

  test("struct arguments and results are copied", () => {
    const k = kitchen()
    const point = { x: 1, y: 2 }

    const moved = k.move(point, 1)

    expect(moved).toEqual({ x: 1, y: 2 })
    expect(moved).not.toBe(point)
  })

  test("a result outside the declared range fails the call", () => {
    const { handler } = recordingHandler(() => 40_000)
    const k = isolatedFactory().create(handler, Kitchen)

    const err = caught(() => k.short())

    expect(ErrResultNotConvertible.is(err)).toBe(true)
    expect(SurrogateError.has(err, BadInput)).toBe(true)
    expect(err.data).toEqual({
      interfaceName: "demo.Kitchen",
      member: "short",
      expected: "int16",
      reason: "40000 is outside [-32768, 32767]",
    })
  })

  test("handler errors propagate unchanged", () => {
    const boom = new Error("handler exploded")
    const calc = isolatedFactory().create(
      InvocationHandler.from(() => {
        throw boom
      }),
      Calc,
    )

    expect(() => calc.add(1, 1)).toThrow(boom)
  })

  test("promise results are awaited and converted", async () => {
    const { handler } = recordingHandler(({ method }) => (method.name === "add" ? Promise.resolve(9) : "done"))
    const calc = isolatedFactory().create(handler, AsyncCalc)

    await expect(calc.add(4, 5)).resolves.toBe(9)
    await expect(calc.flush()).resolves.toBeUndefined()
  })

  test("non-thenable results of promise members are wrapped", async () => {
    const { handler } = recordingHandler(() => 3)
    const calc = isolatedFactory().create(handler, AsyncCalc)

    await expect(calc.add(1, 2)).resolves.toBe(3)
  })

  test("a settled value outside the inner type rejects", async () => {
    const { handler } = recordingHandler(() => Promise.resolve("three"))
    const calc = isolatedFactory().create(handler, AsyncCalc)

    const err: unknown = await calc.add(1, 2).catch((e: unknown) => e)
    expect(ErrResultNotConvertible.is(err)).toBe(true)
  })
})

describe("properties", () => {
  test("accessors forward as get_/set_ methods", () => {
    const state = { count: 0 }
    const { handler, calls } = recordingHandler(({ method, args }) => {
      if (method.name === "get_count") return state.count
      if (method.name === "set_count") state.count = Number(args[0])
      if (method.name === "get_label") return "clicks"
      return undefined
    })
    const counter = isolatedFactory().create(handler, Counter)

    counter.count = 5
    expect(counter.count).toBe(5)
    expect(counter.label).toBe("clicks")
    counter.reset()

    expect(calls.map((call) => [call.method.name, call.method.index])).toEqual([
      ["set_count", 2],
      ["get_count", 1],
      ["get_label", 3],
      ["reset", 0],
    ])
  })

  test("readonly properties have no setter", () => {
    const { handler, calls } = recordingHandler()
    const counter = isolatedFactory().create(handler, Counter)

    expect(Reflect.set(counter, "label", "other")).toBe(false)
    expect(calls).toHaveLength(0)
  })
})

describe("proxy state", () => {
  test("the handler is fixed for the proxy's lifetime", () => {
    const factory = isolatedFactory()
    const { handler } = recordingHandler(() => 1)
    const calc = factory.create(handler, Calc)

    expect(factory.handlerOf(calc)).toBe(handler)
    expect(Object.keys(calc)).toEqual([])
    expect(Reflect.set(calc, "add", () => 99)).toBe(false)
    expect(calc.add(0, 0)).toBe(1)
  })

  test("proxies are ProxyObjects and recognizable", () => {
    const factory = isolatedFactory()
    const calc = factory.create(recordingHandler().handler, Calc)

    expect(calc).toBeInstanceOf(ProxyObject)
    expect(factory.isProxy(calc)).toBe(true)
    expect(factory.isProxy({ add: () => 0 })).toBe(false)
    expect(factory.handlerOf({})).toBeUndefined()
  })
})

describe("blueprint cache", () => {
  test("a different definition under a cached identity fails", () => {
    const factory = isolatedFactory()
    const Impostor = InterfaceDef.create("demo.Calc", {
      methods: { add: Method.define([Type.int32], Type.int32) },
    })
    factory.blueprintFor(Calc)

    const err = caught(() => factory.blueprintFor(Impostor))

    expect(ErrBlueprintIdentityConflict.is(err)).toBe(true)
    expect(err.data).toEqual({ blueprint: "demo.CalcProxy" })
  })

  test("getInstance returns one process-wide factory", () => {
    expect(ProxyFactory.getInstance()).toBe(ProxyFactory.getInstance())
  })
})

describe("logging", () => {
  function recordingLogger() {
    const sink = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() }
    return { sink, logger: new ConsoleLogger("debug", sink) }
  }

  test("synthesis is logged at debug", () => {
    const { sink, logger } = recordingLogger()
    const factory = new ProxyFactory({ descriptors: new InMemoryDescriptorCache(), logger })

    factory.create(recordingHandler().handler, Logger)
    factory.create(recordingHandler().handler, Logger)

    expect(sink.debug).toHaveBeenCalledTimes(1)
    expect(sink.debug).toHaveBeenCalledWith(
      '[DEBUG] Synthesized proxy blueprint {"blueprint":"demo.LoggerProxy","interfaces":2,"methods":2}',
    )
  })

  test("a rejection returned for a void member is logged, not left unhandled", async () => {
    const { sink, logger } = recordingLogger()
    const factory = new ProxyFactory({ descriptors: new InMemoryDescriptorCache(), logger })
    const unhandled: unknown[] = []
    const onUnhandled = (reason: unknown) => unhandled.push(reason)
    process.on("unhandledRejection", onUnhandled)

    try {
      const proxy = factory.create(
        InvocationHandler.from(async () => {
          throw new Error("async boom")
        }),
        Logger,
      )

      expect(proxy.log("x")).toBeUndefined()
      await new Promise((resolve) => setTimeout(resolve, 20))
    } finally {
      process.off("unhandledRejection", onUnhandled)
    }

    expect(unhandled).toEqual([])
    expect(sink.warn).toHaveBeenCalledWith(
      '[WARN] Rejection from a void member discarded {"interfaceName":"demo.Logger","member":"log","error":"async boom"}',
    )
  })

  test("failed synthesis is logged at warn", () => {
    const { sink, logger } = recordingLogger()
    const factory = new ProxyFactory({ descriptors: new InMemoryDescriptorCache(), logger })

    caught(() => factory.blueprintFor(ClassDef.create("demo.Empty", { implements: [] })))

    expect(sink.warn).toHaveBeenCalledWith(
      '[WARN] Proxy blueprint synthesis failed {"blueprint":"demo.EmptyProxy","code":"proxy.no_interfaces"}',
    )
  })
})
