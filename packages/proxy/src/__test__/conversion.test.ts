import { describe, test, expect } from "vitest"
import { PRIMITIVE_CONVERSIONS, Type, boxArgument, convertResult, describeValue, type Conversion } from "../index.js"
import { Color, PointType } from "./fixtures.js"

function value(conversion: Conversion): unknown {
  if (!conversion.ok) throw new Error(`unexpected failure: ${conversion.reason}`)
  return conversion.value
}

function reason(conversion: Conversion): string {
  if (conversion.ok) throw new Error("expected the conversion to fail")
  return conversion.reason
}

describe("PRIMITIVE_CONVERSIONS", () => {
  test("boolean accepts booleans only", () => {
    expect(value(PRIMITIVE_CONVERSIONS.boolean(false))).toBe(false)
    expect(reason(PRIMITIVE_CONVERSIONS.boolean(0))).toBe("0 is not a boolean")
  })

  test("16- and 32-bit integers are range checked", () => {
    expect(value(PRIMITIVE_CONVERSIONS.int16(-32768))).toBe(-32768)
    expect(reason(PRIMITIVE_CONVERSIONS.int16(32768))).toBe("32768 is outside [-32768, 32767]")
    expect(reason(PRIMITIVE_CONVERSIONS.uint16(-1))).toBe("-1 is outside [0, 65535]")
    expect(value(PRIMITIVE_CONVERSIONS.uint32(4294967295))).toBe(4294967295)
    expect(reason(PRIMITIVE_CONVERSIONS.int32(2 ** 31))).toBe("2147483648 is outside [-2147483648, 2147483647]")
  })

  test("integers must be integral", () => {
    expect(reason(PRIMITIVE_CONVERSIONS.int32(1.5))).toBe("1.5 is not an integer")
    expect(reason(PRIMITIVE_CONVERSIONS.int32("1"))).toBe('"1" is not an integer')
  })

  test("narrow integers accept bigints in range", () => {
    expect(value(PRIMITIVE_CONVERSIONS.int32(12n))).toBe(12)
    expect(reason(PRIMITIVE_CONVERSIONS.uint16(70000n))).toBe("70000n is outside [0, 65535]")
  })

  test("64-bit integers are bigints", () => {
    expect(value(PRIMITIVE_CONVERSIONS.int64(-(2n ** 63n)))).toBe(-(2n ** 63n))
    expect(value(PRIMITIVE_CONVERSIONS.int64(42))).toBe(42n)
    expect(value(PRIMITIVE_CONVERSIONS.uint64(2n ** 64n - 1n))).toBe(2n ** 64n - 1n)
    expect(reason(PRIMITIVE_CONVERSIONS.uint64(-1n))).toBe("-1n is outside [0, 18446744073709551615]")
    expect(reason(PRIMITIVE_CONVERSIONS.int64(2 ** 60))).toBe("1152921504606846976 is not a bigint or safe integer")
  })

  test("float32 rounds to single precision", () => {
    expect(value(PRIMITIVE_CONVERSIONS.float32(1.1))).toBe(Math.fround(1.1))
    expect(value(PRIMITIVE_CONVERSIONS.float64(1.1))).toBe(1.1)
    expect(reason(PRIMITIVE_CONVERSIONS.float64(null))).toBe("null is not a number")
  })
})

describe("convertResult", () => {
  test("void discards the value", () => {
    expect(value(convertResult(Type.void, 123))).toBeUndefined()
  })

  test("enums take member values, names and any int32", () => {
    expect(value(convertResult(Color, 1))).toBe(1)
    expect(value(convertResult(Color, "Green"))).toBe(1)
    expect(value(convertResult(Color, 17))).toBe(17)
    expect(reason(convertResult(Color, "Purple"))).toBe('"Purple" is not a member of demo.Color')
  })

  test("enum members at the int32 limits convert by value and by name", () => {
    const Edge = Type.enum("demo.Edge", { Min: -(2 ** 31), Max: 2 ** 31 - 1 })

    expect(value(convertResult(Edge, Edge.members.Max))).toBe(2147483647)
    expect(value(convertResult(Edge, "Min"))).toBe(-2147483648)
  })

  test("structs are shallow-copied records", () => {
    const point = { x: 1, y: 2 }
    const converted = value(convertResult(PointType, point))

    expect(converted).toEqual(point)
    expect(converted).not.toBe(point)
    expect(reason(convertResult(PointType, [1, 2]))).toBe("array is not a record")
  })

  test("references pass through unchanged", () => {
    const customer = { id: "c1" }
    expect(value(convertResult(Type.ref("demo.Customer"), customer))).toBe(customer)
  })
})

describe("boxArgument", () => {
  test("struct arguments become frozen copies", () => {
    const point = { x: 1, y: 2 }
    const boxed = boxArgument(PointType, point)

    expect(boxed).toEqual(point)
    expect(boxed).not.toBe(point)
    expect(Object.isFrozen(boxed)).toBe(true)
  })

  test("other arguments are passed as is", () => {
    const customer = { id: "c1" }
    expect(boxArgument(Type.object, customer)).toBe(customer)
    expect(boxArgument(Type.int32, 7)).toBe(7)
  })
})

describe("describeValue", () => {
  test("renders values compactly", () => {
    expect(describeValue("x")).toBe('"x"')
    expect(describeValue(3n)).toBe("3n")
    expect(describeValue(undefined)).toBe("undefined")
    expect(describeValue({})).toBe("object")
  })
})
