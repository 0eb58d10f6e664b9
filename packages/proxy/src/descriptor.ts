/**
 * Descriptors — reflected, immutable metadata handed to invocation handlers.
 *
 * An interface's methods are numbered in declaration order; property
 * accessors follow as ordinary methods (`get_x`, then `set_x` when mutable),
 * in property declaration order. The index of a MethodDescriptor is the
 * position forwarding routines use to find it again.
 */

import { Property } from "./member.js"
import { checkInterfaceShape, type InterfaceDefAny, type InterfaceName } from "./interface-def.js"
import { Type, type SemanticTypeAny } from "./semantic-type.js"

export type MethodKind = "method" | "getter" | "setter"

export interface MethodDescriptor {
  readonly name: string
  readonly kind: MethodKind
  readonly params: readonly SemanticTypeAny[]
  readonly paramNames: readonly string[]
  readonly returns: SemanticTypeAny
  /** Position within the declaring interface's method list */
  readonly index: number
  readonly declaringInterface: InterfaceName
  /** Property name, for accessors */
  readonly property?: string
}

export interface PropertyDescriptor {
  readonly name: string
  readonly type: SemanticTypeAny
  readonly readonly: boolean
  readonly index: number
  readonly declaringInterface: InterfaceName
  readonly getter: MethodDescriptor
  readonly setter?: MethodDescriptor
}

export interface InterfaceDescriptor {
  readonly name: InterfaceName
  readonly def: InterfaceDefAny
  readonly methods: readonly MethodDescriptor[]
  readonly properties: readonly PropertyDescriptor[]
  /** Directly extended interfaces */
  readonly parents: readonly InterfaceName[]
}

function describeMethod(
  declaringInterface: InterfaceName,
  index: number,
  name: string,
  kind: MethodKind,
  params: readonly SemanticTypeAny[],
  paramNames: readonly string[],
  returns: SemanticTypeAny,
  property?: string,
): MethodDescriptor {
  const descriptor: MethodDescriptor = {
    name,
    kind,
    params: Object.freeze([...params]),
    paramNames: Object.freeze([...paramNames]),
    returns,
    index,
    declaringInterface,
    ...(property === undefined ? {} : { property }),
  }
  Object.freeze(descriptor)
  return descriptor
}

/** Reflect an interface definition into its descriptor */
export function reflectInterface(def: InterfaceDefAny): InterfaceDescriptor {
  checkInterfaceShape(def)

  const methods: MethodDescriptor[] = []
  for (const [name, signature] of Object.entries(def.methods)) {
    methods.push(describeMethod(def.name, methods.length, name, "method", signature.params, signature.paramNames, signature.returns))
  }

  const properties: PropertyDescriptor[] = []
  for (const [name, signature] of Object.entries(def.properties)) {
    const getter = describeMethod(def.name, methods.length, Property.getterName(name), "getter", [], [], signature.type, name)
    methods.push(getter)

    let setter: MethodDescriptor | undefined
    if (!signature.readonly) {
      setter = describeMethod(def.name, methods.length, Property.setterName(name), "setter", [signature.type], ["value"], Type.void, name)
      methods.push(setter)
    }

    const property: PropertyDescriptor = {
      name,
      type: signature.type,
      readonly: signature.readonly,
      index: properties.length,
      declaringInterface: def.name,
      getter,
      ...(setter === undefined ? {} : { setter }),
    }
    Object.freeze(property)
    properties.push(property)
  }

  const descriptor: InterfaceDescriptor = {
    name: def.name,
    def,
    methods: Object.freeze(methods),
    properties: Object.freeze(properties),
    parents: Object.freeze(def.extends.map((parent) => parent.name)),
  }
  Object.freeze(descriptor)
  return descriptor
}
