/**
 * Transport — Typed message passing between a caller and one dispatcher.
 *
 * `send` takes a typed RpcRequest. The transport reads the `id` field
 * for response matching but does NOT interpret the request contents
 * (target, method, args). It is a dumb pipe that knows the envelope shape.
 *
 * Resolves with the call's result, or rejects with the reconstituted error.
 */

import type { RpcRequest } from "./rpc.js"

export interface Transport {
  send(request: RpcRequest): Promise<unknown>
  close(): Promise<void>
}
