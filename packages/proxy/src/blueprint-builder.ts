/**
 * BlueprintBuilder — synthesizes one sealed proxy class per blueprint.
 *
 * The class extends the requested base (ProxyObject by default), keeps its
 * handler in a private field, and carries one forwarding routine per method
 * and one accessor pair per property of every interface in the closure.
 *
 * Build steps:
 *   1. Validate the request (contract, interfaces, base)
 *   2. Flatten the interface closure, skipping ancestors reached twice
 *   3. Register each interface's descriptor (staged until the build succeeds)
 *   4. Reject member names provided twice, by the base or another interface
 *   5. Install routines and accessors, then freeze prototype and class
 */

import { createLogger, Inspect, StaticTypeCompanion, SurrogateConfig, type Logger } from "@surrogate/core"
import { DescriptorCache } from "./descriptor-cache.js"
import type { InterfaceDescriptor, MethodDescriptor } from "./descriptor.js"
import { InterfaceDef, type InterfaceDefAny } from "./interface-def.js"
import type { TypeDefAny } from "./class-def.js"
import type { HandlerContract, InvocationHandler } from "./invocation-handler.js"
import { ProxyObject, type ProxyBase } from "./proxy-object.js"
import {
  createForwardingRoutine,
  forward,
  type BindingResolver,
  type ForwardingContext,
  type ProxyBinding,
} from "./forwarding.js"
import {
  ErrBlueprintSealed,
  ErrHandlerContractRequired,
  ErrHandlerRequired,
  ErrIllegalInvocation,
  ErrInvalidBaseType,
  ErrInvalidHandler,
  ErrInvalidTarget,
  ErrMemberConflict,
  ErrNoInterfaces,
  ProxyBoundary,
} from "./errors.js"

// ============================================================================
// Types
// ============================================================================

/** Constructor of a synthesized proxy class */
export type ProxyClass = new (handler: InvocationHandler) => ProxyObject

export interface ProxyBlueprint {
  /** `<target name>Proxy` */
  readonly name: string
  readonly target: TypeDefAny
  /** Flattened interface closure, first-reached order */
  readonly interfaces: readonly InterfaceDefAny[]
  /** Every forwarded method, accessors included */
  readonly methods: readonly MethodDescriptor[]
  readonly class: ProxyClass

  /** A new proxy bound to `handler`; use ProxyFactory.create for a typed one */
  instantiate(handler: InvocationHandler): ProxyObject
  /** The handler `value` was constructed with, if it is an instance of this blueprint */
  handlerOf(value: unknown): InvocationHandler | undefined
}

export interface BlueprintRequest {
  readonly name: string
  readonly target: TypeDefAny
  readonly interfaces: readonly InterfaceDefAny[]
  readonly contract: HandlerContract | undefined
  readonly base?: ProxyBase
}

interface SynthesizedClass {
  readonly cls: ProxyClass
  readonly bindingOf: (value: unknown) => ProxyBinding | undefined
}

const blueprintsByPrototype = new WeakMap<object, ProxyBlueprint>()

// ============================================================================
// Closure
// ============================================================================

/** Depth-first, first-reached order; an interface reached again is skipped */
export function interfaceClosure(roots: readonly InterfaceDefAny[]): InterfaceDefAny[] {
  const seen = new Set<InterfaceDefAny>()
  const order: InterfaceDefAny[] = []
  const visit = (def: InterfaceDefAny): void => {
    if (seen.has(def)) return
    seen.add(def)
    order.push(def)
    def.extends.forEach(visit)
  }
  roots.forEach(visit)
  return order
}

function baseMemberNames(base: ProxyBase): Set<string> {
  const names = new Set<string>()
  const root: unknown = base.prototype
  let proto: object | null = typeof root === "object" ? root : null
  while (proto !== null && proto !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name !== "constructor") names.add(name)
    }
    proto = Object.getPrototypeOf(proto)
  }
  return names
}

// ============================================================================
// Synthesis
// ============================================================================

function synthesizeClass(name: string, base: ProxyBase, contract: HandlerContract): SynthesizedClass {
  class Synthesized extends base {
    readonly #handler: InvocationHandler

    constructor(handler: InvocationHandler) {
      if (new.target !== Synthesized) {
        throw ErrBlueprintSealed.create({ blueprint: name })
      }
      if (handler === null || handler === undefined) {
        throw ErrHandlerRequired.create({ blueprint: name })
      }
      if (!contract.is(handler)) {
        throw ErrInvalidHandler.create({ blueprint: name, contract: contract.name })
      }
      super()
      this.#handler = handler
    }

    static bindingOf(value: unknown): ProxyBinding | undefined {
      if (typeof value !== "object" || value === null || !(#handler in value)) return undefined
      return { proxy: value, handler: value.#handler }
    }
  }

  Object.defineProperty(Synthesized, "name", { value: name })
  return { cls: Synthesized, bindingOf: (value) => Synthesized.bindingOf(value) }
}

function installMembers(
  prototype: object,
  context: ForwardingContext,
  closure: readonly InterfaceDescriptor[],
  resolveBinding: BindingResolver,
): void {
  for (const iface of closure) {
    for (const method of iface.methods) {
      if (method.kind !== "method") continue
      Object.defineProperty(prototype, method.name, {
        value: createForwardingRoutine(context, { interfaceName: iface.name, index: method.index, member: method.name }, resolveBinding),
        writable: false,
        enumerable: false,
        configurable: false,
      })
    }

    for (const property of iface.properties) {
      const getter = { interfaceName: iface.name, index: property.getter.index, member: property.name }
      const setterDescriptor = property.setter
      Object.defineProperty(prototype, property.name, {
        get(this: unknown): unknown {
          return forward(context, getter, resolveBinding(this, property.name), [])
        },
        set: setterDescriptor === undefined
          ? undefined
          : function (this: unknown, value: unknown): void {
              const setter = { interfaceName: iface.name, index: setterDescriptor.index, member: property.name }
              forward(context, setter, resolveBinding(this, property.name), [value])
            },
        enumerable: false,
        configurable: false,
      })
    }
  }
}

// ============================================================================
// ProxyBlueprint Implementation (internal)
// ============================================================================

class ProxyBlueprintImpl implements ProxyBlueprint {
  constructor(
    readonly name: string,
    readonly target: TypeDefAny,
    readonly interfaces: readonly InterfaceDefAny[],
    readonly methods: readonly MethodDescriptor[],
    private readonly synthesized: SynthesizedClass,
  ) {}

  get class(): ProxyClass {
    return this.synthesized.cls
  }

  instantiate(handler: InvocationHandler): ProxyObject {
    return new this.synthesized.cls(handler)
  }

  handlerOf(value: unknown): InvocationHandler | undefined {
    return this.synthesized.bindingOf(value)?.handler
  }

  static {
    Inspect(this, (self) => ({
      format: "ProxyBlueprint( %s, %d interfaces, %d methods )",
      params: [self.name, self.interfaces.length, self.methods.length],
    }))
  }
}

// ============================================================================
// BlueprintBuilder
// ============================================================================

export class BlueprintBuilder {
  constructor(
    private readonly descriptors: DescriptorCache = DescriptorCache.global(),
    private readonly logger: Logger = createLogger(SurrogateConfig.build().logLevel),
  ) {}

  /**
   * Synthesize a blueprint. Fails without side effects: descriptors
   * registered along the way are only committed when the build succeeds.
   */
  build(request: BlueprintRequest): ProxyBlueprint {
    const { name, target, interfaces, contract } = request
    const base = request.base ?? ProxyObject

    return ProxyBoundary.wrap({ blueprint: name }, () => {
      if (!contract) {
        throw ErrHandlerContractRequired.create({ blueprint: name })
      }
      if (interfaces.length === 0) {
        throw ErrNoInterfaces.create({ blueprint: name })
      }
      for (const iface of interfaces) {
        if (!InterfaceDef.is(iface)) {
          throw ErrInvalidTarget.create({ received: iface === null ? "null" : typeof iface })
        }
      }
      if (typeof base !== "function" || base.length > 0) {
        throw ErrInvalidBaseType.create({ blueprint: name })
      }

      return this.descriptors.transaction((tx) => {
        const closure = interfaceClosure(interfaces).map((def) => tx.register(def))

        const provided = new Map<string, string>()
        for (const member of baseMemberNames(base)) {
          provided.set(member, base.name || "base type")
        }
        for (const iface of closure) {
          const members = [...iface.methods.filter((m) => m.kind === "method"), ...iface.properties]
          for (const { name: member } of members) {
            const existing = provided.get(member)
            if (existing !== undefined) {
              throw ErrMemberConflict.create({ blueprint: name, interfaceName: iface.name, member, existing })
            }
            provided.set(member, iface.name)
          }
        }

        const synthesized = synthesizeClass(name, base, contract)
        const resolveBinding: BindingResolver = (receiver, member) => {
          const binding = synthesized.bindingOf(receiver)
          if (!binding) {
            throw ErrIllegalInvocation.create({ blueprint: name, member })
          }
          return binding
        }
        installMembers(synthesized.cls.prototype, { descriptors: this.descriptors, logger: this.logger }, closure, resolveBinding)
        Object.freeze(synthesized.cls.prototype)
        Object.freeze(synthesized.cls)

        const blueprint = new ProxyBlueprintImpl(
          name,
          target,
          Object.freeze(closure.map((iface) => iface.def)),
          Object.freeze(closure.flatMap((iface) => iface.methods)),
          synthesized,
        )
        Object.freeze(blueprint)
        blueprintsByPrototype.set(synthesized.cls.prototype, blueprint)
        return blueprint
      })
    })
  }
}

// ============================================================================
// ProxyBlueprint Static Methods
// ============================================================================

export const ProxyBlueprint = StaticTypeCompanion({
  /** The blueprint `value` was instantiated from, if it is a proxy */
  of(value: unknown): ProxyBlueprint | undefined {
    if (typeof value !== "object" || value === null) return undefined
    const blueprint = blueprintsByPrototype.get(Object.getPrototypeOf(value))
    return blueprint?.handlerOf(value) === undefined ? undefined : blueprint
  },
})
