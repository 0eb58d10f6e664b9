/**
 * RpcInvocationHandler — an invocation handler that forwards over a Transport.
 *
 * Each call becomes one RpcRequest targeted at the member's declaring
 * interface. Only members returning a promise can be stubbed this way; a
 * synchronous member cannot wait for the wire.
 *
 *   const calc = factory.create(new RpcInvocationHandler(transport), RemoteCalc)
 *   await calc.add(2, 3)
 */

import { randomUUID } from "node:crypto"
import type { RpcRequest, Transport } from "@surrogate/core"
import type { MethodDescriptor } from "../descriptor.js"
import type { InvocationHandler } from "../invocation-handler.js"
import { ErrRpcRequiresAsync } from "../errors.js"

export class RpcInvocationHandler implements InvocationHandler {
  constructor(
    private readonly transport: Transport,
    private readonly nextId: () => string = randomUUID,
  ) {}

  invoke(_proxy: object, method: MethodDescriptor, args: readonly unknown[]): Promise<unknown> {
    if (method.returns.kind !== "promise") {
      throw ErrRpcRequiresAsync.create({ interfaceName: method.declaringInterface, member: method.name })
    }
    const request: RpcRequest = {
      id: this.nextId(),
      target: method.declaringInterface,
      method: method.name,
      args,
    }
    return this.transport.send(request)
  }
}
