/**
 * InvocationHandler — the single capability every proxy forwards to.
 *
 * A handler receives the proxy that was called, the MethodDescriptor of the
 * member, and the boxed arguments. Its result is converted back to the
 * member's declared return type. One handler may serve many proxies.
 */

import { StaticTypeCompanion } from "@surrogate/core"
import type { MethodDescriptor } from "./descriptor.js"

export interface InvocationHandler {
  invoke(proxy: object, method: MethodDescriptor, args: readonly unknown[]): unknown
}

export type InvokeFn = InvocationHandler["invoke"]

export const InvocationHandler = StaticTypeCompanion({
  /** Wrap a bare function as a handler */
  from(invoke: InvokeFn): InvocationHandler {
    return { invoke }
  },

  is(value: unknown): value is InvocationHandler {
    return typeof value === "object" && value !== null && "invoke" in value && typeof value.invoke === "function"
  },
})

/**
 * What a blueprint's constructor checks its handler against. Narrower
 * contracts (a specific handler class, say) can be passed to the builder.
 */
export interface HandlerContract<H extends InvocationHandler = InvocationHandler> {
  readonly name: string
  is(value: unknown): value is H
}

export const HandlerContract = StaticTypeCompanion({
  /** Any object with an `invoke` function */
  invocation: {
    name: "InvocationHandler",
    is: InvocationHandler.is,
  } satisfies HandlerContract,

  /** Handlers that are instances of `cls` */
  instanceOf<H extends InvocationHandler>(cls: abstract new (...args: never[]) => H): HandlerContract<H> {
    return {
      name: cls.name,
      is: (value: unknown): value is H => value instanceof cls,
    }
  },
})
