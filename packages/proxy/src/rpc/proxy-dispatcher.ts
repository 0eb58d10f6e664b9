/**
 * ProxyDispatcher — Receiver-side mirror of RpcInvocationHandler.
 *
 * Routes an RpcRequest to the implementation registered for its target
 * interface, using the same descriptors the caller's proxy was built from.
 * Failures never escape `dispatch`: they are serialized into the response.
 */

import { RpcResponse, SurrogateError, ErrUnknownMethod, ErrUnknownTarget, type Logger, type RpcRequest } from "@surrogate/core"
import { DescriptorCache } from "../descriptor-cache.js"
import type { InterfaceDescriptor } from "../descriptor.js"
import type { InterfaceDefAny, InterfaceShape } from "../interface-def.js"
import { interfaceClosure } from "../blueprint-builder.js"

interface DispatchTarget {
  readonly descriptor: InterfaceDescriptor
  readonly implementation: object
}

export interface ProxyDispatcherOptions {
  descriptors?: DescriptorCache
  logger?: Logger
}

export class ProxyDispatcher {
  private readonly targets = new Map<string, DispatchTarget>()
  private readonly descriptors: DescriptorCache
  private readonly logger: Logger | undefined

  constructor(opts: ProxyDispatcherOptions = {}) {
    this.descriptors = opts.descriptors ?? DescriptorCache.global()
    this.logger = opts.logger
  }

  /**
   * Serve `implementation` for `def` and every interface it extends.
   * A later registration for the same interface replaces the earlier one.
   */
  register<T extends InterfaceDefAny>(def: T, implementation: InterfaceShape<T> & object): void {
    for (const iface of interfaceClosure([def])) {
      const descriptor = this.descriptors.register(iface)
      this.targets.set(descriptor.name, { descriptor, implementation })
    }
  }

  /** Usable directly as a LoopbackTransport's DispatchFn */
  readonly dispatch = async (request: RpcRequest): Promise<RpcResponse> => {
    try {
      const result = await this.route(request)
      return RpcResponse.ok(request.id, result)
    } catch (err) {
      this.logger?.debug("RPC dispatch failed", { target: request.target, method: request.method })
      return RpcResponse.error(request.id, SurrogateError.serialize(err))
    }
  }

  private route(request: RpcRequest): unknown {
    const target = this.targets.get(request.target)
    if (!target) {
      throw ErrUnknownTarget.create({ target: request.target })
    }

    const method = target.descriptor.methods.find((m) => m.name === request.method)
    if (!method) {
      throw ErrUnknownMethod.create({ target: request.target, method: request.method })
    }

    const { implementation } = target
    switch (method.kind) {
      case "getter":
        return Reflect.get(implementation, method.property ?? method.name)
      case "setter":
        Reflect.set(implementation, method.property ?? method.name, request.args[0])
        return undefined
      case "method": {
        const fn: unknown = Reflect.get(implementation, method.name)
        if (typeof fn !== "function") {
          throw ErrUnknownMethod.create({ target: request.target, method: request.method })
        }
        return Reflect.apply(fn, implementation, [...request.args])
      }
    }
  }
}
