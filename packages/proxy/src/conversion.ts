/**
 * Value conversion between a proxy's declared types and the handler's
 * generic representation.
 *
 * Arguments are boxed on the way in (value-semantics records are copied);
 * results are narrowed on the way out through one explicit table per
 * primitive kind. A result that does not fit the declared representation is
 * reported, never coerced.
 */

import type {
  EnumType,
  PrimitiveKind,
  PrimitiveValues,
  SemanticTypeAny,
  SyncSemanticType,
} from "./semantic-type.js"

export type Conversion<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string }

function ok<T>(value: T): Conversion<T> {
  return { ok: true, value }
}

function fail(reason: string): Conversion<never> {
  return { ok: false, reason }
}

/** Short rendering of an arbitrary value for conversion messages */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value)
    case "number":
    case "boolean":
      return String(value)
    case "bigint":
      return `${value}n`
    case "object":
      return value === null ? "null" : Array.isArray(value) ? "array" : "object"
    default:
      return typeof value
  }
}

// ============================================================================
// Integral narrowing
// ============================================================================

function narrowNumber(min: number, max: number): (value: unknown) => Conversion<number> {
  return (value) => {
    if (typeof value === "bigint") {
      if (value < BigInt(min) || value > BigInt(max)) {
        return fail(`${describeValue(value)} is outside [${min}, ${max}]`)
      }
      return ok(Number(value))
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      return fail(`${describeValue(value)} is not an integer`)
    }
    if (value < min || value > max) {
      return fail(`${describeValue(value)} is outside [${min}, ${max}]`)
    }
    return ok(value)
  }
}

function narrowBigInt(min: bigint, max: bigint): (value: unknown) => Conversion<bigint> {
  return (value) => {
    let n: bigint
    if (typeof value === "bigint") {
      n = value
    } else if (typeof value === "number" && Number.isSafeInteger(value)) {
      n = BigInt(value)
    } else {
      return fail(`${describeValue(value)} is not a bigint or safe integer`)
    }
    if (n < min || n > max) {
      return fail(`${describeValue(n)} is outside [${min}, ${max}]`)
    }
    return ok(n)
  }
}

export const INT16_RANGE = [-0x8000, 0x7fff] as const
export const UINT16_RANGE = [0, 0xffff] as const
export const INT32_RANGE = [-0x80000000, 0x7fffffff] as const
export const UINT32_RANGE = [0, 0xffffffff] as const
export const INT64_RANGE = [-(2n ** 63n), 2n ** 63n - 1n] as const
export const UINT64_RANGE = [0n, 2n ** 64n - 1n] as const

// ============================================================================
// Primitive table
// ============================================================================

/** One narrowing per primitive kind */
export const PRIMITIVE_CONVERSIONS: { readonly [K in PrimitiveKind]: (value: unknown) => Conversion<PrimitiveValues[K]> } = {
  boolean: (value) => (typeof value === "boolean" ? ok(value) : fail(`${describeValue(value)} is not a boolean`)),
  int16: narrowNumber(...INT16_RANGE),
  int32: narrowNumber(...INT32_RANGE),
  int64: narrowBigInt(...INT64_RANGE),
  uint16: narrowNumber(...UINT16_RANGE),
  uint32: narrowNumber(...UINT32_RANGE),
  uint64: narrowBigInt(...UINT64_RANGE),
  float32: (value) => (typeof value === "number" ? ok(Math.fround(value)) : fail(`${describeValue(value)} is not a number`)),
  float64: (value) => (typeof value === "number" ? ok(value) : fail(`${describeValue(value)} is not a number`)),
}

const toInt32 = PRIMITIVE_CONVERSIONS.int32

// ============================================================================
// Enum / struct
// ============================================================================

/** Member names are reinterpreted as their value; any int32 is accepted as is */
function toEnum(type: EnumType, value: unknown): Conversion<number> {
  if (typeof value === "string") {
    return Object.hasOwn(type.members, value)
      ? ok(type.members[value])
      : fail(`${describeValue(value)} is not a member of ${type.name}`)
  }
  return toInt32(value)
}

function toStruct(value: unknown): Conversion<object> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return fail(`${describeValue(value)} is not a record`)
  }
  return ok({ ...value })
}

// ============================================================================
// Public
// ============================================================================

/** Narrow a handler result to the representation of a synchronous return type */
export function convertResult(type: SyncSemanticType, value: unknown): Conversion {
  switch (type.kind) {
    case "void":
      return ok(undefined)
    case "primitive":
      return PRIMITIVE_CONVERSIONS[type.name](value)
    case "enum":
      return toEnum(type, value)
    case "struct":
      return toStruct(value)
    case "reference":
      return ok(value)
  }
}

/** Box an argument into the handler's representation */
export function boxArgument(type: SemanticTypeAny, value: unknown): unknown {
  if (type.kind === "struct" && typeof value === "object" && value !== null) {
    return Object.freeze({ ...value })
  }
  return value
}
