/**
 * Forwarding routines — the body of every synthesized proxy member.
 *
 * A routine knows only its interface name, its method index and how to find
 * its proxy's handler. On each call it resolves the MethodDescriptor from the
 * cache, boxes the arguments, invokes the handler and converts the result.
 */

import type { Logger } from "@surrogate/core"
import type { DescriptorCache } from "./descriptor-cache.js"
import type { MethodDescriptor } from "./descriptor.js"
import type { InvocationHandler } from "./invocation-handler.js"
import type { SyncSemanticType } from "./semantic-type.js"
import { boxArgument, convertResult } from "./conversion.js"
import { ErrResultNotConvertible } from "./errors.js"

/** A proxy and the handler it was constructed with */
export interface ProxyBinding {
  readonly proxy: object
  readonly handler: InvocationHandler
}

/** Finds the binding of the receiver a routine was called on; throws when there is none */
export type BindingResolver = (receiver: unknown, member: string) => ProxyBinding

export interface ForwardingSite {
  readonly interfaceName: string
  readonly index: number
  /** Name the routine is installed under, for receiver errors */
  readonly member: string
}

/** What every routine of one blueprint shares */
export interface ForwardingContext {
  readonly descriptors: DescriptorCache
  /** Receives rejections of promises returned for void members */
  readonly logger: Logger
}

export type ForwardingRoutine = (this: unknown, ...args: unknown[]) => unknown

function expectConverted(method: MethodDescriptor, type: SyncSemanticType, value: unknown): unknown {
  const conversion = convertResult(type, value)
  if (!conversion.ok) {
    throw ErrResultNotConvertible.create({
      interfaceName: method.declaringInterface,
      member: method.name,
      expected: type.name,
      reason: conversion.reason,
    })
  }
  return conversion.value
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (typeof value === "object" || typeof value === "function") && value !== null && "then" in value && typeof value.then === "function"
}

/** Convert a handler result to the method's declared return representation */
export function completeCall(method: MethodDescriptor, result: unknown, logger: Logger): unknown {
  const returns = method.returns
  switch (returns.kind) {
    case "void":
      if (isThenable(result)) {
        void Promise.resolve(result).catch((error: unknown) => {
          logger.warn("Rejection from a void member discarded", {
            interfaceName: method.declaringInterface,
            member: method.name,
            error: error instanceof Error ? error.message : String(error),
          })
        })
      }
      return undefined
    case "promise":
      return Promise.resolve(result).then((settled) => expectConverted(method, returns.inner, settled))
    default:
      return expectConverted(method, returns, result)
  }
}

/** Run one call through the handler */
export function forward(
  context: ForwardingContext,
  site: ForwardingSite,
  binding: ProxyBinding,
  received: readonly unknown[],
): unknown {
  const method = context.descriptors.resolveMethod(site.interfaceName, site.index)
  const args = method.params.map((type, i) => boxArgument(type, received[i]))
  const result = binding.handler.invoke(binding.proxy, method, args)
  return completeCall(method, result, context.logger)
}

export function createForwardingRoutine(
  context: ForwardingContext,
  site: ForwardingSite,
  resolveBinding: BindingResolver,
): ForwardingRoutine {
  return function (this: unknown, ...args: unknown[]): unknown {
    return forward(context, site, resolveBinding(this, site.member), args)
  }
}
