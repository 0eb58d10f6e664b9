/**
 * RPC wire protocol — shared contract between callers and dispatchers.
 *
 * Callers construct RpcRequest messages and send them via Transport.
 * Dispatchers receive them, route to real implementations, and return
 * RpcResponse messages.
 *
 * These types are transport-agnostic — they define the message shape,
 * not how it moves over the wire.
 */

import type { SerializedError } from '../surrogate-error.js'
import {StaticTypeCompanion} from "../companion.js";

/**
 * A single RPC method call.
 *
 * `id` is unique per request for response matching.
 * `target` names the interface that declares `method`.
 */
export interface RpcRequest {
  readonly id: string
  readonly target: string
  readonly method: string
  readonly args: readonly unknown[]
}

export type RpcResponse =
  | { readonly id: string; readonly ok: true; readonly result: unknown }
  | { readonly id: string; readonly ok: false; readonly error: SerializedError }

export const RpcResponse = StaticTypeCompanion({
  ok(id: string, result: unknown): RpcResponse {
    return { id, ok: true, result }
  },

  error(id: string, error: SerializedError): RpcResponse {
    return { id, ok: false, error }
  },
})
