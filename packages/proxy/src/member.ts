/**
 * Member signatures — what an interface declares.
 *
 *   add: Method.define([Type.int32, Type.int32], Type.int32, { paramNames: ["a", "b"] })
 *   name: Property.readonly(Type.string)
 */

import { StaticTypeCompanion } from "@surrogate/core"
import type { SemanticTypeAny, ValueOf } from "./semantic-type.js"

export interface MethodSignature<
  P extends readonly SemanticTypeAny[] = readonly SemanticTypeAny[],
  R extends SemanticTypeAny = SemanticTypeAny,
> {
  readonly kind: "method"
  readonly params: P
  readonly returns: R
  readonly paramNames: readonly string[]
}

export interface PropertySignature<T extends SemanticTypeAny = SemanticTypeAny, RO extends boolean = boolean> {
  readonly kind: "property"
  readonly type: T
  readonly readonly: RO
}

export type MemberSignature = MethodSignature | PropertySignature

/** Parameter value tuple of a method signature */
export type ParamValues<P extends readonly SemanticTypeAny[]> = { -readonly [I in keyof P]: ValueOf<P[I]> }

/** The callable a method signature describes */
export type MethodFn<M> = M extends MethodSignature<infer P extends readonly SemanticTypeAny[], infer R> ? (...args: ParamValues<P>) => ValueOf<R> : never

export const Method = StaticTypeCompanion({
  /**
   * Declare a method. Parameter names are optional and only surface in
   * descriptors; unnamed parameters are called `arg0`, `arg1`, ...
   */
  define<const P extends readonly SemanticTypeAny[], R extends SemanticTypeAny>(
    params: P,
    returns: R,
    opts: { paramNames?: readonly string[] } = {},
  ): MethodSignature<P, R> {
    const names = params.map((_, i) => opts.paramNames?.[i] ?? `arg${i}`)
    const signature: MethodSignature<P, R> = {
      kind: "method",
      params,
      returns,
      paramNames: Object.freeze(names),
    }
    Object.freeze(signature)
    return signature
  },

  is(value: unknown): value is MethodSignature {
    return typeof value === "object" && value !== null && "kind" in value && value.kind === "method"
  },
})

export const Property = StaticTypeCompanion({
  readonly<T extends SemanticTypeAny>(type: T): PropertySignature<T, true> {
    const signature: PropertySignature<T, true> = { kind: "property", type, readonly: true }
    Object.freeze(signature)
    return signature
  },

  mutable<T extends SemanticTypeAny>(type: T): PropertySignature<T, false> {
    const signature: PropertySignature<T, false> = { kind: "property", type, readonly: false }
    Object.freeze(signature)
    return signature
  },

  is(value: unknown): value is PropertySignature {
    return typeof value === "object" && value !== null && "kind" in value && value.kind === "property"
  },

  getterName(property: string): string {
    return `get_${property}`
  },

  setterName(property: string): string {
    return `set_${property}`
  },
})
