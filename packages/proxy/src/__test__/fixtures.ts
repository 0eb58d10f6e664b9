/**
 * Shared definitions and helpers for proxy tests.
 */

import { createLogger, SurrogateError } from "@surrogate/core"
import { ClassDef, InterfaceDef, Method, Property, Type } from "../index.js"
import { InMemoryDescriptorCache, InvocationHandler, ProxyFactory, type MethodDescriptor } from "../index.js"

// -- Definitions ---------------------------------------------------------------

export const Calc = InterfaceDef.create("demo.Calc", {
  methods: {
    add: Method.define([Type.int32, Type.int32], Type.int32, { paramNames: ["a", "b"] }),
  },
})

export const Logger = InterfaceDef.create("demo.Logger", {
  extends: [Calc],
  methods: {
    log: Method.define([Type.string], Type.void, { paramNames: ["msg"] }),
  },
})

export const Printer = InterfaceDef.create("demo.Printer", {
  methods: {
    print: Method.define([Type.string], Type.boolean),
  },
})

export const CalcService = ClassDef.create("demo.CalcService", { implements: [Calc, Printer] })

export const Counter = InterfaceDef.create("demo.Counter", {
  methods: {
    reset: Method.define([], Type.void),
  },
  properties: {
    count: Property.mutable(Type.int32),
    label: Property.readonly(Type.string),
  },
})

export const Color = Type.enum("demo.Color", { Red: 0, Green: 1, Blue: 2 })

export interface Point {
  x: number
  y: number
}

export const PointType = Type.struct<Point>("demo.Point")

export const Kitchen = InterfaceDef.create("demo.Kitchen", {
  methods: {
    flag: Method.define([], Type.boolean),
    short: Method.define([], Type.int16),
    int: Method.define([], Type.int32),
    long: Method.define([], Type.int64),
    ushort: Method.define([], Type.uint16),
    uint: Method.define([], Type.uint32),
    ulong: Method.define([], Type.uint64),
    single: Method.define([], Type.float32),
    double: Method.define([], Type.float64),
    color: Method.define([], Color),
    move: Method.define([PointType, Type.int32], PointType),
    label: Method.define([], Type.string),
  },
})

export const Shape = InterfaceDef.create("demo.Shape", {
  methods: { area: Method.define([], Type.float64) },
})

export const Left = InterfaceDef.create("demo.Left", {
  extends: [Shape],
  methods: { left: Method.define([], Type.int32) },
})

export const Right = InterfaceDef.create("demo.Right", {
  extends: [Shape],
  methods: { right: Method.define([], Type.int32) },
})

export const Diamond = InterfaceDef.create("demo.Diamond", {
  extends: [Left, Right],
})

export const AsyncCalc = InterfaceDef.create("demo.AsyncCalc", {
  methods: {
    add: Method.define([Type.int32, Type.int32], Type.promise(Type.int32)),
    flush: Method.define([], Type.promise(Type.void)),
  },
})

// -- Helpers -------------------------------------------------------------------

export interface RecordedCall {
  readonly proxy: object
  readonly method: MethodDescriptor
  readonly args: readonly unknown[]
}

/** A handler that records every call and answers with `answer` */
export function recordingHandler(answer: (call: RecordedCall) => unknown = () => undefined) {
  const calls: RecordedCall[] = []
  const handler = InvocationHandler.from((proxy, method, args) => {
    const call: RecordedCall = { proxy, method, args }
    calls.push(call)
    return answer(call)
  })
  return { handler, calls }
}

/** A factory with its own descriptor cache and no log output */
export function isolatedFactory(): ProxyFactory {
  return new ProxyFactory({ descriptors: new InMemoryDescriptorCache(), logger: createLogger("silent") })
}

/** The SurrogateError thrown by `fn` */
export function caught(fn: () => unknown): SurrogateError {
  try {
    fn()
  } catch (err) {
    if (SurrogateError.isSurrogateError(err)) return err
    throw err
  }
  throw new Error("expected a SurrogateError to be thrown")
}
