/**
 * Class definitions — concrete types known only by the interfaces they implement.
 *
 *   const CalcService = ClassDef.create("demo.CalcService", { implements: [Calc, Logger] })
 *   factory.create(handler, CalcService, false)
 */

import { StaticTypeCompanion, type UnionToIntersection } from "@surrogate/core"
import {
  InterfaceDef,
  QUALIFIED_NAME,
  memberKind,
  type InterfaceDefAny,
  type InterfaceName,
  type InterfaceShape,
} from "./interface-def.js"
import { ErrInvalidInterfaceName, ErrInvalidTarget } from "./errors.js"

export interface ClassDef<X extends readonly InterfaceDefAny[] = readonly InterfaceDefAny[]> {
  readonly kind: "class"
  readonly name: InterfaceName
  readonly implements: X
}

export type ClassDefAny = ClassDef<readonly InterfaceDefAny[]>

/** Anything the factory can build a proxy for */
export type TypeDefAny = InterfaceDefAny | ClassDefAny

/** The instance type a proxy for T exposes */
export type ProxyOf<T> = T extends InterfaceDefAny
  ? InterfaceShape<T>
  : T extends ClassDef<infer X extends readonly InterfaceDefAny[]>
    ? UnionToIntersection<InterfaceShape<X[number]>>
    : never

export const ClassDef = StaticTypeCompanion({
  create<const X extends readonly InterfaceDefAny[]>(name: string, shape: { implements: X }): ClassDef<X> {
    if (!QUALIFIED_NAME.test(name)) {
      throw ErrInvalidInterfaceName.create({ interfaceName: name })
    }
    for (const iface of shape.implements) {
      if (!InterfaceDef.is(iface)) {
        throw ErrInvalidTarget.create({ received: memberKind(iface) })
      }
    }
    const implemented: X = [...shape.implements] as readonly InterfaceDefAny[] as X
    Object.freeze(implemented)
    const def: ClassDef<X> = { kind: "class", name, implements: implemented }
    Object.freeze(def)
    return def
  },

  is(value: unknown): value is ClassDefAny {
    return typeof value === "object" && value !== null && "kind" in value && value.kind === "class"
  },
})
