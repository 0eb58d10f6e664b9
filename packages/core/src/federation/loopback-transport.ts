/**
 * LoopbackTransport — In-process transport for caller+dispatcher pairs.
 *
 * Takes a dispatch function that mirrors what a real dispatcher does:
 * receives an RpcRequest, returns an RpcResponse. The loopback transport
 * calls it in-memory, unwraps the response, and returns the result
 * (or throws a reconstituted error).
 */

import type { Transport } from "./transport.js"
import type { RpcRequest, RpcResponse } from "./rpc.js"
import { SurrogateError } from "../surrogate-error.js"
import { ErrTransportClosed } from "./rpc-errors.js"

export type DispatchFn = (request: RpcRequest) => Promise<RpcResponse>

export class LoopbackTransport implements Transport {
  private closed = false

  constructor(private readonly dispatch: DispatchFn) {}

  async send(request: RpcRequest): Promise<unknown> {
    if (this.closed) {
      throw ErrTransportClosed.create({})
    }
    const response = await this.dispatch(request)
    if (response.ok) {
      return response.result
    }
    throw SurrogateError.reconstitute(response.error)
  }

  async close(): Promise<void> {
    this.closed = true
  }
}
