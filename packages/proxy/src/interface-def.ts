/**
 * Interface definitions.
 *
 * An InterfaceDef is the run-time stand-in for a TypeScript interface: its
 * qualified name, its own methods and properties in declaration order, and the
 * interfaces it directly extends.
 *
 *   const Calc = InterfaceDef.create("demo.Calc", {
 *     methods: { add: Method.define([Type.int32, Type.int32], Type.int32) },
 *   })
 *
 *   const Logger = InterfaceDef.create("demo.Logger", {
 *     extends: [Calc],
 *     methods: { log: Method.define([Type.string], Type.void) },
 *   })
 *
 * `InterfaceShape<typeof Logger>` is `{ add(a: number, b: number): number; log(msg: string): void }`.
 */

import { StaticTypeCompanion, type Id, type UnionToIntersection } from "@surrogate/core"
import { Method, Property, type MethodFn, type MethodSignature, type PropertySignature } from "./member.js"
import type { SemanticTypeAny, ValueOf } from "./semantic-type.js"
import {
  ErrInvalidInterfaceName,
  ErrInvalidMemberName,
  ErrInvalidTarget,
  ErrUnsupportedMember,
} from "./errors.js"

export type InterfaceName = Id<"interface-name">

export type MethodDefinitions = { readonly [name: string]: MethodSignature }
export type PropertyDefinitions = { readonly [name: string]: PropertySignature }

export interface InterfaceDef<
  M extends MethodDefinitions = MethodDefinitions,
  P extends PropertyDefinitions = PropertyDefinitions,
  X extends readonly InterfaceDefAny[] = readonly InterfaceDefAny[],
> {
  readonly kind: "interface"
  readonly name: InterfaceName
  readonly methods: M
  readonly properties: P
  readonly extends: X
}

export type InterfaceDefAny = InterfaceDef<MethodDefinitions, PropertyDefinitions, readonly InterfaceDefAny[]>

// ============================================================================
// Static shape
// ============================================================================

type MethodsShape<M> = { [K in keyof M]: MethodFn<M[K]> }

type PropertyValue<S> = S extends PropertySignature<infer T> ? ValueOf<T> : never

type PropertiesShape<P> = {
  readonly [K in keyof P as P[K] extends PropertySignature<SemanticTypeAny, true> ? K : never]: PropertyValue<P[K]>
} & {
  -readonly [K in keyof P as P[K] extends PropertySignature<SemanticTypeAny, false> ? K : never]: PropertyValue<P[K]>
}

/** The members an object implementing I (and everything I extends) exposes */
export type InterfaceShape<I> = I extends InterfaceDef<infer M, infer P, infer X extends readonly InterfaceDefAny[]>
  ? MethodsShape<M> & PropertiesShape<P> & UnionToIntersection<InterfaceShape<X[number]>>
  : never

// ============================================================================
// Validation
// ============================================================================

/** Dot-separated identifiers, as interface and class names are written */
export const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/
const MEMBER_NAME = /^[A-Za-z_$][\w$]*$/
const RESERVED_MEMBERS: ReadonlySet<string> = new Set(["constructor", "__proto__", "prototype"])

export function memberKind(value: unknown): string {
  if (typeof value === "object" && value !== null && "kind" in value && typeof value.kind === "string") {
    return value.kind
  }
  return value === null ? "null" : typeof value
}

function checkMemberName(interfaceName: string, member: string): void {
  if (!MEMBER_NAME.test(member)) {
    throw ErrInvalidMemberName.create({ interfaceName, member, reason: "not an identifier" })
  }
  if (RESERVED_MEMBERS.has(member)) {
    throw ErrInvalidMemberName.create({ interfaceName, member, reason: "reserved name" })
  }
}

/**
 * Verify that every member of `def` is a method or property signature with a
 * usable name. Used when a definition is created and again when it is
 * reflected, since definitions can also be assembled by hand.
 */
export function checkInterfaceShape(def: InterfaceDefAny): void {
  const interfaceName = def.name
  if (typeof interfaceName !== "string" || !QUALIFIED_NAME.test(interfaceName)) {
    throw ErrInvalidInterfaceName.create({ interfaceName: String(interfaceName) })
  }

  const accessorNames = new Set<string>()
  for (const [member, signature] of Object.entries(def.properties)) {
    if (!Property.is(signature)) {
      throw ErrUnsupportedMember.create({ interfaceName, member, received: memberKind(signature) })
    }
    checkMemberName(interfaceName, member)
    accessorNames.add(Property.getterName(member))
    accessorNames.add(Property.setterName(member))
  }

  for (const [member, signature] of Object.entries(def.methods)) {
    if (!Method.is(signature)) {
      throw ErrUnsupportedMember.create({ interfaceName, member, received: memberKind(signature) })
    }
    checkMemberName(interfaceName, member)
    if (Object.hasOwn(def.properties, member)) {
      throw ErrInvalidMemberName.create({ interfaceName, member, reason: "declared as both a method and a property" })
    }
    if (accessorNames.has(member)) {
      throw ErrInvalidMemberName.create({ interfaceName, member, reason: "reserved for a property accessor" })
    }
  }

  for (const parent of def.extends) {
    if (!InterfaceDef.is(parent)) {
      throw ErrInvalidTarget.create({ received: memberKind(parent) })
    }
  }
}

// ============================================================================
// InterfaceDef Implementation (internal)
// ============================================================================

class InterfaceDefImpl<
  M extends MethodDefinitions,
  P extends PropertyDefinitions,
  X extends readonly InterfaceDefAny[],
> implements InterfaceDef<M, P, X> {
  readonly kind = "interface"
  readonly extends: X

  constructor(
    readonly name: InterfaceName,
    readonly methods: M,
    readonly properties: P,
    parents: X,
  ) {
    this.extends = parents
  }

  toString(): string {
    return `InterfaceDef(${this.name})`
  }
}

// ============================================================================
// InterfaceDef Static Methods
// ============================================================================

export const InterfaceDef = StaticTypeCompanion({
  /**
   * Create an interface definition. Member names must be identifiers, and
   * declaration order is the order of the keys given.
   */
  create<
    const M extends MethodDefinitions = {},
    const P extends PropertyDefinitions = {},
    const X extends readonly InterfaceDefAny[] = readonly [],
  >(
    name: string,
    shape: { methods?: M; properties?: P; extends?: X },
  ): InterfaceDef<M, P, X> {
    const methods: M = { ...(shape.methods ?? ({} as M)) }
    const properties: P = { ...(shape.properties ?? ({} as P)) }
    const parents: X = [...(shape.extends ?? [])] as readonly InterfaceDefAny[] as X

    Object.freeze(methods)
    Object.freeze(properties)
    Object.freeze(parents)

    const def = new InterfaceDefImpl(name, methods, properties, parents)
    checkInterfaceShape(def)
    Object.freeze(def)
    return def
  },

  is(value: unknown): value is InterfaceDefAny {
    return value instanceof InterfaceDefImpl || (typeof value === "object" && value !== null && "kind" in value && value.kind === "interface")
  },
})
