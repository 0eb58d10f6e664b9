/**
 * Semantic types — run-time descriptions of declared parameter and return types.
 *
 * TypeScript erases interface signatures, so every proxied member names its
 * types explicitly:
 *
 *   Method.define([Type.int32, Type.int32], Type.int32)
 *
 * Each semantic type carries its static value type as a phantom, so the proxy's
 * methods are typed from the same definition the forwarding routines read.
 */

import { StaticTypeCompanion } from "@surrogate/core"
import { ErrInvalidEnumValue } from "./errors.js"

// ============================================================================
// Kinds
// ============================================================================

export type PrimitiveKind =
  | "boolean"
  | "int16"
  | "int32"
  | "int64"
  | "uint16"
  | "uint32"
  | "uint64"
  | "float32"
  | "float64"

/** Static representation of each primitive. 64-bit integers are bigints. */
export interface PrimitiveValues {
  boolean: boolean
  int16: number
  int32: number
  int64: bigint
  uint16: number
  uint32: number
  uint64: bigint
  float32: number
  float64: number
}

export type Semantics = "value" | "reference" | "void"

export type SemanticKind = "void" | "primitive" | "enum" | "struct" | "reference" | "promise"

// ============================================================================
// Types
// ============================================================================

export interface SemanticType<TValue = unknown> {
  readonly kind: SemanticKind
  readonly name: string
  readonly semantics: Semantics
  readonly _value?: TValue // phantom type for compile-time inference
}

export interface VoidType extends SemanticType<void> {
  readonly kind: "void"
  readonly semantics: "void"
}

export interface PrimitiveType<K extends PrimitiveKind = PrimitiveKind> extends SemanticType<PrimitiveValues[K]> {
  readonly kind: "primitive"
  readonly name: K
  readonly semantics: "value"
}

export type EnumMembers = Readonly<Record<string, number>>

/** Enumerations travel as their underlying integral value */
export interface EnumType<M extends EnumMembers = EnumMembers> extends SemanticType<M[keyof M]> {
  readonly kind: "enum"
  readonly semantics: "value"
  readonly members: M
}

/** Named record with value semantics: copied whenever it crosses the handler */
export interface StructType<T extends object = object> extends SemanticType<T> {
  readonly kind: "struct"
  readonly semantics: "value"
}

/** Passed through untouched */
export interface ReferenceType<T = unknown> extends SemanticType<T> {
  readonly kind: "reference"
  readonly semantics: "reference"
}

export type SyncSemanticType = VoidType | PrimitiveType | EnumType | StructType | ReferenceType

/** Asynchronous result; the settled value is converted with `inner` */
export interface PromiseType<Inner extends SyncSemanticType = SyncSemanticType>
  extends SemanticType<Promise<ValueOf<Inner>>> {
  readonly kind: "promise"
  readonly semantics: "reference"
  readonly inner: Inner
}

export type SemanticTypeAny = SyncSemanticType | PromiseType

/** The static value type a semantic type describes */
export type ValueOf<T> = T extends SemanticType<infer V> ? V : never

// ============================================================================
// Construction
// ============================================================================

function primitive<K extends PrimitiveKind>(name: K): PrimitiveType<K> {
  const type: PrimitiveType<K> = { kind: "primitive", name, semantics: "value" }
  Object.freeze(type)
  return type
}

function reference<T>(name: string): ReferenceType<T> {
  const type: ReferenceType<T> = { kind: "reference", name, semantics: "reference" }
  Object.freeze(type)
  return type
}

const voidType: VoidType = { kind: "void", name: "void", semantics: "void" }
Object.freeze(voidType)

const KINDS: ReadonlySet<string> = new Set<SemanticKind>(["void", "primitive", "enum", "struct", "reference", "promise"])

export const Type = StaticTypeCompanion({
  void: voidType,
  boolean: primitive("boolean"),
  int16: primitive("int16"),
  int32: primitive("int32"),
  int64: primitive("int64"),
  uint16: primitive("uint16"),
  uint32: primitive("uint32"),
  uint64: primitive("uint64"),
  float32: primitive("float32"),
  float64: primitive("float64"),

  string: reference<string>("string"),
  object: reference<object>("object"),
  unknown: reference<unknown>("unknown"),

  /** A named reference type, e.g. `Type.ref<Customer>("Customer")` */
  ref<T>(name: string): ReferenceType<T> {
    return reference<T>(name)
  },

  /** A named value-semantics record */
  struct<T extends object>(name: string): StructType<T> {
    const type: StructType<T> = { kind: "struct", name, semantics: "value" }
    Object.freeze(type)
    return type
  },

  /**
   * An enumeration over int32 values.
   *
   *   const Color = Type.enum("Color", { Red: 0, Green: 1, Blue: 2 })
   */
  enum<const M extends EnumMembers>(name: string, members: M): EnumType<M> {
    for (const [member, value] of Object.entries(members)) {
      if ((value | 0) !== value) {
        throw ErrInvalidEnumValue.create({ enumName: name, member, value })
      }
    }
    const frozen: M = { ...members }
    Object.freeze(frozen)
    const type: EnumType<M> = { kind: "enum", name, semantics: "value", members: frozen }
    Object.freeze(type)
    return type
  },

  promise<Inner extends SyncSemanticType>(inner: Inner): PromiseType<Inner> {
    const type: PromiseType<Inner> = { kind: "promise", name: `Promise<${inner.name}>`, semantics: "reference", inner }
    Object.freeze(type)
    return type
  },

  isVoid(type: SemanticTypeAny): type is VoidType {
    return type.kind === "void"
  },

  isValue(type: SemanticTypeAny): type is PrimitiveType | EnumType | StructType {
    return type.semantics === "value"
  },

  /** Structural check for definitions assembled outside the Type helpers */
  is(value: unknown): value is SemanticTypeAny {
    return (
      typeof value === "object" &&
      value !== null &&
      "kind" in value &&
      typeof value.kind === "string" &&
      KINDS.has(value.kind) &&
      "name" in value &&
      typeof value.name === "string"
    )
  },
})
